export { Gate, MonadicGate, DiadicGate, type GateOptions } from './gate.js';
export {
  DIADIC_KINDS,
  GATE_KINDS,
  MONADIC_KINDS,
  evaluateGate,
  hasOverflow,
  type DiadicKind,
  type GateEvaluation,
  type GateKind,
  type MonadicKind,
} from './transfer.js';
export * as truthTables from './truth-tables.js';
