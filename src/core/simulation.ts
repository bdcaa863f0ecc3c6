/**
 * Simulation - the composition root for one circuit.
 *
 * Every wire, connection point and gate is built against a Simulation,
 * which supplies:
 * - resolved configuration (propagation mode, limits, warning policy)
 * - the logger
 * - the simulated clock used for delayed gate outputs
 * - the gate arena: connection points refer to their owning gate by
 *   GateId, and the arena resolves the id when a reader changes
 * - the cascade depth guard against feedback loops
 * - a bounded log of non-fatal warnings
 */

import type { Logger } from '../types/logger.js';
import { Trit } from '../types/trit.js';
import { resolveSimulationConfig } from '../config/config-loader.js';
import type { SimulationConfig, SimulationConfigInput } from '../config/config-schema.js';
import { ConnectionPoint, type ConnectionRole } from '../wiring/connection-point.js';
import { Wire } from '../wiring/wire.js';
import { CascadeLimitError, ConnectionError } from './errors.js';
import { createEventQueue, type SimulationEventQueue } from './event-queue.js';
import { createLogger } from './logger.js';

/**
 * Handle of a gate in the simulation's arena.
 */
export type GateId = number;

/**
 * Anything that owns reader points and reacts to their changes.
 */
export interface Recomputable {
  recompute(): void;
  toString(): string;
}

/**
 * Non-fatal conditions. Execution continues after each of these.
 */
export type WarningCode = 'UNCONNECTED_DISCONNECT' | 'MULTIPLE_WRITERS' | 'ROLE_MISMATCH';

export interface SimulationWarning {
  code: WarningCode;
  message: string;
  context: Record<string, unknown>;
  /** Simulated time the warning was raised at */
  at: number;
}

export interface SimulationOptions {
  config?: SimulationConfigInput | undefined;
  logger?: Logger | undefined;
  clock?: SimulationEventQueue | undefined;
}

export class Simulation {
  readonly config: SimulationConfig;
  readonly logger: Logger;
  readonly clock: SimulationEventQueue;

  private readonly gates = new Map<GateId, Recomputable>();
  private nextGateId = 1;
  private nextWireId = 1;
  private cascadeDepth = 0;
  private warnings: SimulationWarning[] = [];

  constructor(config: SimulationConfig, logger: Logger, clock: SimulationEventQueue) {
    this.config = config;
    this.logger = logger.child({ component: 'simulation' });
    this.clock = clock;
  }

  // ============================================================
  // Gate arena
  // ============================================================

  registerGate(gate: Recomputable): GateId {
    const id = this.nextGateId++;
    this.gates.set(id, gate);
    return id;
  }

  /**
   * Remove a gate from the arena. Wires are left as they are; a later
   * change on one of the gate's reader points raises ConnectionError.
   */
  releaseGate(id: GateId): boolean {
    return this.gates.delete(id);
  }

  gateCount(): number {
    return this.gates.size;
  }

  /**
   * Called by a reader point whose value was set from its wire.
   */
  notifyOwner(id: GateId): void {
    const gate = this.gates.get(id);
    if (!gate) {
      throw new ConnectionError(`Gate #${String(id)} is not registered with this simulation`);
    }
    gate.recompute();
  }

  /**
   * Run one gate update as a nested step of the current cascade.
   * Throws CascadeLimitError past maxCascadeDepth nested updates.
   */
  cascade(gate: Recomputable, update: () => void): void {
    if (this.cascadeDepth >= this.config.maxCascadeDepth) {
      this.logger.error(
        { gate: gate.toString(), depth: this.cascadeDepth },
        'Cascade depth limit reached, wiring likely contains a feedback loop'
      );
      throw new CascadeLimitError(this.config.maxCascadeDepth, 'depth');
    }

    this.cascadeDepth++;
    try {
      update();
    } finally {
      this.cascadeDepth--;
    }
  }

  getCascadeDepth(): number {
    return this.cascadeDepth;
  }

  // ============================================================
  // Factories
  // ============================================================

  /**
   * External driver point: writes into whatever wire it joins.
   */
  writer(value: Trit = Trit.NEUTRAL): ConnectionPoint {
    return this.point('writer', value);
  }

  /**
   * External probe point: observes the resolved value of its wire.
   */
  reader(value: Trit = Trit.NEUTRAL): ConnectionPoint {
    return this.point('reader', value);
  }

  highImpedance(value: Trit = Trit.NEUTRAL): ConnectionPoint {
    return this.point('high-impedance', value);
  }

  point(role: ConnectionRole, value: Trit = Trit.NEUTRAL, owner: GateId | null = null): ConnectionPoint {
    return new ConnectionPoint(this, role, value, owner);
  }

  wire(): Wire {
    return new Wire(this);
  }

  allocateWireId(): number {
    return this.nextWireId++;
  }

  // ============================================================
  // Delayed propagation
  // ============================================================

  /**
   * Fire scheduled gate outputs until nothing is pending.
   * Throws CascadeLimitError past maxSettleEvents events.
   */
  settle(): number {
    const fired = this.clock.runUntilIdle(this.config.maxSettleEvents);
    if (fired > 0) {
      this.logger.debug({ fired, now: this.clock.now() }, 'Simulation settled');
    }
    return fired;
  }

  // ============================================================
  // Warnings
  // ============================================================

  warn(code: WarningCode, context: Record<string, unknown>, message: string): void {
    const retention = this.config.warningRetention;
    if (retention > 0) {
      this.warnings.push({ code, message, context, at: this.clock.now() });
      if (this.warnings.length > retention) {
        this.warnings = this.warnings.slice(-retention);
      }
    }
    this.logger.warn({ ...context, code }, message);
  }

  getWarnings(code?: WarningCode): readonly SimulationWarning[] {
    return code === undefined ? this.warnings : this.warnings.filter((w) => w.code === code);
  }

  clearWarnings(): void {
    this.warnings = [];
  }
}

/**
 * Create a simulation. Configuration is validated against the schema;
 * without a logger one is built from `config.logging`.
 */
export function createSimulation(options: SimulationOptions = {}): Simulation {
  const config = resolveSimulationConfig(options.config ?? {});
  const logger = options.logger ?? createLogger(config.logging);
  const clock = options.clock ?? createEventQueue();

  const simulation = new Simulation(config, logger, clock);
  simulation.logger.debug(
    {
      mode: config.propagation.mode,
      gateDelayMs: config.propagation.gateDelayMs,
      maxCascadeDepth: config.maxCascadeDepth,
    },
    'Simulation created'
  );
  return simulation;
}
