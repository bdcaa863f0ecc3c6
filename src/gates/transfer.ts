import { Trit } from '../types/trit.js';
import {
  AND,
  CONSENSUS,
  DECREMENT,
  IDENTITY,
  INCREMENT,
  IS_HIGH,
  IS_LOW,
  IS_NEUTRAL,
  NAND,
  NEGATE,
  NOR,
  OR,
  SUM,
  XNOR,
  XOR,
  lookup1,
  lookup2,
} from './truth-tables.js';

export const MONADIC_KINDS = [
  'identity',
  'increment',
  'decrement',
  'negate',
  'isHigh',
  'isNeutral',
  'isLow',
] as const;

export const DIADIC_KINDS = [
  'and',
  'or',
  'nand',
  'nor',
  'xor',
  'xnor',
  'consensus',
  'sum',
  'memory',
] as const;

export type MonadicKind = (typeof MONADIC_KINDS)[number];
export type DiadicKind = (typeof DIADIC_KINDS)[number];
export type GateKind = MonadicKind | DiadicKind;

export const GATE_KINDS: readonly GateKind[] = [...MONADIC_KINDS, ...DIADIC_KINDS];

/**
 * Kinds with a second (overflow) output.
 */
export function hasOverflow(kind: GateKind): boolean {
  return kind === 'sum';
}

/**
 * Result of one evaluation. `output: null` means hold the current value.
 */
export interface GateEvaluation {
  output: Trit | null;
  overflow?: Trit;
}

/**
 * Memory cell: control (+) passes data, (-) passes it negated,
 * (0) holds.
 */
function memory(data: Trit, control: Trit): Trit | null {
  switch (control) {
    case Trit.PLUS:
      return data;
    case Trit.MINUS:
      return lookup1(NEGATE, data);
    case Trit.NEUTRAL:
      return null;
  }
}

/**
 * Evaluate a gate's transfer function. Monadic kinds ignore `input2`.
 */
export function evaluateGate(kind: GateKind, input1: Trit, input2: Trit = Trit.NEUTRAL): GateEvaluation {
  switch (kind) {
    case 'identity':
      return { output: lookup1(IDENTITY, input1) };
    case 'increment':
      return { output: lookup1(INCREMENT, input1) };
    case 'decrement':
      return { output: lookup1(DECREMENT, input1) };
    case 'negate':
      return { output: lookup1(NEGATE, input1) };
    case 'isHigh':
      return { output: lookup1(IS_HIGH, input1) };
    case 'isNeutral':
      return { output: lookup1(IS_NEUTRAL, input1) };
    case 'isLow':
      return { output: lookup1(IS_LOW, input1) };
    case 'and':
      return { output: lookup2(AND, input1, input2) };
    case 'or':
      return { output: lookup2(OR, input1, input2) };
    case 'nand':
      return { output: lookup2(NAND, input1, input2) };
    case 'nor':
      return { output: lookup2(NOR, input1, input2) };
    case 'xor':
      return { output: lookup2(XOR, input1, input2) };
    case 'xnor':
      return { output: lookup2(XNOR, input1, input2) };
    case 'consensus':
      return { output: lookup2(CONSENSUS, input1, input2) };
    case 'sum':
      return {
        output: lookup2(SUM, input1, input2),
        overflow: lookup2(CONSENSUS, input1, input2),
      };
    case 'memory':
      return { output: memory(input1, input2) };
    default: {
      const unknown: never = kind;
      throw new Error(`Unknown gate kind: ${String(unknown)}`);
    }
  }
}
