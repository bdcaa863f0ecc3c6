import { Trit, tritName } from '../types/trit.js';
import { ConnectionError } from '../core/errors.js';
import type { GateId, Recomputable, Simulation } from '../core/simulation.js';
import type { ConnectionPoint } from '../wiring/connection-point.js';
import type { Wire } from '../wiring/wire.js';
import {
  evaluateGate,
  hasOverflow,
  type DiadicKind,
  type GateKind,
  type MonadicKind,
} from './transfer.js';

/**
 * Per-gate construction options.
 */
export interface GateOptions {
  /** Output delay in simulated ms when propagation is delayed (default: config gateDelayMs) */
  delayMs?: number | undefined;
  /** Name used in logs and toString() (default: kind#id) */
  label?: string | undefined;
}

/**
 * Base gate: owns its output points, evaluates its transfer function
 * whenever an input point changes, and writes an output only when the
 * new value differs from the current one.
 */
export abstract class Gate<K extends GateKind = GateKind> implements Recomputable {
  readonly id: GateId;
  readonly kind: K;
  readonly delayMs: number;
  readonly label: string;
  protected readonly sim: Simulation;
  protected readonly output: ConnectionPoint;
  protected readonly overflow: ConnectionPoint | null;
  /** Last write queued per output, until it lands (delayed mode) */
  private readonly pending = new Map<ConnectionPoint, { value: Trit; eventId: number }>();

  protected constructor(sim: Simulation, kind: K, options: GateOptions = {}) {
    const delayMs = options.delayMs ?? sim.config.propagation.gateDelayMs;
    if (!Number.isFinite(delayMs) || delayMs < 0) {
      throw new RangeError(`Invalid gate delay: ${String(delayMs)}`);
    }

    this.sim = sim;
    this.kind = kind;
    this.delayMs = delayMs;
    this.id = sim.registerGate(this);
    this.label = options.label ?? `${kind}#${String(this.id)}`;
    this.output = sim.point('writer', Trit.NEUTRAL, this.id);
    this.overflow = hasOverflow(kind) ? sim.point('writer', Trit.NEUTRAL, this.id) : null;
  }

  setOutputWire(wire: Wire): void {
    wire.connect(this.output);
  }

  getOutput(): Trit {
    return this.output.value;
  }

  /**
   * Re-read the inputs and apply the transfer function.
   * Runs inside the simulation's cascade depth guard.
   */
  recompute(): void {
    this.sim.cascade(this, () => {
      const [input1, input2] = this.readInputs();
      const result = evaluateGate(this.kind, input1, input2);

      if (result.output !== null) {
        this.setOutputState(this.output, result.output);
      }
      if (this.overflow && result.overflow !== undefined) {
        this.setOutputState(this.overflow, result.overflow);
      }
    });
  }

  toString(): string {
    return `${this.label}<${this.describeInputs()}, O: ${tritName(this.output.value)}>`;
  }

  protected abstract readInputs(): readonly [Trit, Trit];

  protected abstract describeInputs(): string;

  private setOutputState(point: ConnectionPoint, value: Trit): void {
    // Against the write still queued for this output, if any
    const current = this.pending.get(point)?.value ?? point.value;
    if (current === value) return;

    if (this.sim.config.propagation.mode === 'delayed') {
      const eventId = this.sim.clock.schedule(
        this.delayMs,
        () => {
          if (this.pending.get(point)?.eventId === eventId) {
            this.pending.delete(point);
          }
          point.setFromWrite(value);
        },
        this.label
      );
      this.pending.set(point, { value, eventId });
      this.sim.logger.trace(
        { gate: this.label, value: tritName(value), eventId, delayMs: this.delayMs },
        'Gate output scheduled'
      );
      return;
    }

    this.sim.logger.trace({ gate: this.label, value: tritName(value) }, 'Gate output changed');
    point.setFromWrite(value);
  }

}

/**
 * One input, one output.
 */
export class MonadicGate extends Gate<MonadicKind> {
  private readonly input: ConnectionPoint;

  constructor(sim: Simulation, kind: MonadicKind, options: GateOptions = {}) {
    super(sim, kind, options);
    this.input = sim.point('reader', Trit.NEUTRAL, this.id);
  }

  setInputWire(wire: Wire): void {
    wire.connect(this.input);
  }

  protected readInputs(): readonly [Trit, Trit] {
    return [this.input.value, Trit.NEUTRAL];
  }

  protected describeInputs(): string {
    return `I: ${tritName(this.input.value)}`;
  }
}

/**
 * Two inputs; one output, plus an overflow output for `sum`.
 */
export class DiadicGate extends Gate<DiadicKind> {
  private readonly input1: ConnectionPoint;
  private readonly input2: ConnectionPoint;

  constructor(sim: Simulation, kind: DiadicKind, options: GateOptions = {}) {
    super(sim, kind, options);
    this.input1 = sim.point('reader', Trit.NEUTRAL, this.id);
    this.input2 = sim.point('reader', Trit.NEUTRAL, this.id);
  }

  setInputWire1(wire: Wire): void {
    wire.connect(this.input1);
  }

  setInputWire2(wire: Wire): void {
    wire.connect(this.input2);
  }

  /**
   * Attach the overflow output. Only `sum` gates have one.
   */
  setOverflowWire(wire: Wire): void {
    if (!this.overflow) {
      throw new ConnectionError(`${this.label} has no overflow output`);
    }
    wire.connect(this.overflow);
  }

  getOverflow(): Trit | null {
    return this.overflow?.value ?? null;
  }

  protected readInputs(): readonly [Trit, Trit] {
    return [this.input1.value, this.input2.value];
  }

  protected describeInputs(): string {
    return `I1: ${tritName(this.input1.value)}, I2: ${tritName(this.input2.value)}`;
  }
}
