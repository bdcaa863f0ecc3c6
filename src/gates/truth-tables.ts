/**
 * Truth tables for every table-driven gate, stored as data.
 *
 * Rows and columns run (+) (0) (-). Monadic tables map one input,
 * diadic tables are indexed [input1][input2].
 */

import { Trit } from '../types/trit.js';

export type TableRow = readonly [Trit, Trit, Trit];
export type MonadicTable = TableRow;
export type DiadicTable = readonly [TableRow, TableRow, TableRow];

type Axis = 0 | 1 | 2;

const P = Trit.PLUS;
const N = Trit.NEUTRAL;
const M = Trit.MINUS;

function axis(value: Trit): Axis {
  switch (value) {
    case Trit.PLUS:
      return 0;
    case Trit.NEUTRAL:
      return 1;
    case Trit.MINUS:
      return 2;
  }
}

export function lookup1(table: MonadicTable, input: Trit): Trit {
  return table[axis(input)];
}

export function lookup2(table: DiadicTable, input1: Trit, input2: Trit): Trit {
  return table[axis(input1)][axis(input2)];
}

function mapRow(row: TableRow, fn: (value: Trit) => Trit): TableRow {
  return [fn(row[0]), fn(row[1]), fn(row[2])];
}

// ============================================================
// Monadic
// ============================================================

export const IDENTITY: MonadicTable = [P, N, M];

/** Rotate forward on the ring MINUS -> NEUTRAL -> PLUS -> MINUS */
export const INCREMENT: MonadicTable = [M, P, N];

/** Rotate backward on the ring */
export const DECREMENT: MonadicTable = [N, M, P];

export const NEGATE: MonadicTable = [M, N, P];

export const IS_HIGH: MonadicTable = [P, M, M];

export const IS_NEUTRAL: MonadicTable = [M, P, M];

export const IS_LOW: MonadicTable = [M, M, P];

// ============================================================
// Diadic
// ============================================================

/**
 * Minimum.
 *       (+) (0) (-)
 *   (+)  +   0   -
 *   (0)  0   0   -
 *   (-)  -   -   -
 */
export const AND: DiadicTable = [
  [P, N, M],
  [N, N, M],
  [M, M, M],
];

/** Maximum. */
export const OR: DiadicTable = [
  [P, P, P],
  [P, N, N],
  [P, N, M],
];

/** (0) if either is (0), (+) if different, (-) if same. */
export const XOR: DiadicTable = [
  [M, N, P],
  [N, N, N],
  [P, N, M],
];

/** Common value if equal, else (0). Also the adder's overflow. */
export const CONSENSUS: DiadicTable = [
  [P, N, N],
  [N, N, N],
  [N, N, M],
];

/** Balanced-ternary sum digit. */
export const SUM: DiadicTable = [
  [M, P, N],
  [P, N, M],
  [N, M, P],
];

/**
 * Negation adapter: the same table with every output passed
 * through NEGATE.
 */
export function negated(table: DiadicTable): DiadicTable {
  const negate = (value: Trit): Trit => lookup1(NEGATE, value);
  return [mapRow(table[0], negate), mapRow(table[1], negate), mapRow(table[2], negate)];
}

export const NAND: DiadicTable = negated(AND);
export const NOR: DiadicTable = negated(OR);
export const XNOR: DiadicTable = negated(XOR);
