/**
 * tritwire - balanced-ternary logic circuit simulator.
 *
 * Build wires and gates against a Simulation, connect them, drive
 * writer points and observe reader points.
 */

export * from './types/index.js';

export {
  CircuitError,
  ConnectionError,
  InvalidValueError,
  CascadeLimitError,
  ConfigError,
  type CircuitErrorCode,
} from './core/errors.js';
export { createLogger, type LoggerConfig } from './core/logger.js';
export {
  SimulationEventQueue,
  createEventQueue,
  createClockTimer,
  type ScheduledEvent,
  type Timer,
  type TimerFactory,
} from './core/event-queue.js';
export {
  Simulation,
  createSimulation,
  type GateId,
  type Recomputable,
  type SimulationOptions,
  type SimulationWarning,
  type WarningCode,
} from './core/simulation.js';

export * from './config/index.js';
export * from './wiring/index.js';
export * from './gates/index.js';
export * from './circuits/index.js';
