import { Trit } from '../types/trit.js';
import type { Simulation } from '../core/simulation.js';
import { createClockTimer, type Timer, type TimerFactory } from '../core/event-queue.js';
import type { ConnectionPoint } from '../wiring/connection-point.js';
import type { Wire } from '../wiring/wire.js';

/**
 * One full period of the oscillator output, a quarter period per step.
 */
export const OSCILLATION_SEQUENCE: readonly [Trit, Trit, Trit, Trit] = [
  Trit.NEUTRAL,
  Trit.PLUS,
  Trit.NEUTRAL,
  Trit.MINUS,
];

export interface OscillatorOptions {
  /** Full period in ms */
  periodMs: number;
  /** Timer source (default: the simulation's clock) */
  timerFactory?: TimerFactory | undefined;
}

/**
 * Periodic driver: a writer point stepped through
 * (0), (+), (0), (-), ... each time its timer fires.
 */
export class Oscillator {
  readonly periodMs: number;
  private readonly output: ConnectionPoint;
  private readonly timer: Timer;
  private step = 0;

  constructor(sim: Simulation, options: OscillatorOptions) {
    const { periodMs } = options;
    if (!Number.isFinite(periodMs) || periodMs <= 0) {
      throw new RangeError(`Invalid oscillator period: ${String(periodMs)}`);
    }

    this.periodMs = periodMs;
    this.output = sim.writer(OSCILLATION_SEQUENCE[0]);

    const timerFactory = options.timerFactory ?? createClockTimer(sim.clock);
    this.timer = timerFactory(periodMs / OSCILLATION_SEQUENCE.length, () => this.advance());
    this.timer.start();
  }

  readOutput(): Trit {
    return this.output.value;
  }

  setOutputWire(wire: Wire): void {
    wire.connect(this.output);
  }

  stop(): void {
    this.timer.stop();
  }

  private advance(): void {
    this.step = (this.step + 1) % OSCILLATION_SEQUENCE.length;
    this.output.setFromWrite(OSCILLATION_SEQUENCE[this.step] ?? Trit.NEUTRAL);
  }

  toString(): string {
    return `Oscillator<period: ${String(this.periodMs)}ms, O: ${this.output.getName()}>`;
  }
}
