/**
 * Balanced ternary signal values.
 *
 * Every wire, connection point and gate output carries one of three
 * states. The numeric encoding gives the total ordering
 * PLUS > NEUTRAL > MINUS used by the min/max gates.
 */

import { z } from 'zod';
import { InvalidValueError } from '../core/errors.js';

export enum Trit {
  MINUS = -1,
  NEUTRAL = 0,
  PLUS = 1,
}

/**
 * All values, highest first (the row/column order of every truth table).
 */
export const TRITS: readonly Trit[] = [Trit.PLUS, Trit.NEUTRAL, Trit.MINUS];

export const TRIT_NAMES: Readonly<Record<Trit, string>> = {
  [Trit.PLUS]: '(+)',
  [Trit.NEUTRAL]: '(0)',
  [Trit.MINUS]: '(-)',
};

export const tritSchema = z.nativeEnum(Trit);

const TRIT_ALIASES: Readonly<Record<string, Trit>> = {
  '+': Trit.PLUS,
  '(+)': Trit.PLUS,
  plus: Trit.PLUS,
  '0': Trit.NEUTRAL,
  '(0)': Trit.NEUTRAL,
  neutral: Trit.NEUTRAL,
  '-': Trit.MINUS,
  '(-)': Trit.MINUS,
  minus: Trit.MINUS,
};

export function tritName(value: Trit): string {
  return TRIT_NAMES[value];
}

/**
 * Compare two values under PLUS > NEUTRAL > MINUS.
 * Negative when a < b, zero when equal, positive when a > b.
 */
export function compareTrits(a: Trit, b: Trit): number {
  return a - b;
}

/**
 * Convert a raw value (-1/0/1, a symbol, a display name or a word)
 * into a Trit. Throws InvalidValueError for anything else.
 */
export function parseTrit(raw: unknown): Trit {
  if (typeof raw === 'string') {
    const alias = TRIT_ALIASES[raw.trim().toLowerCase()];
    if (alias !== undefined) {
      return alias;
    }
    throw new InvalidValueError(raw);
  }

  const result = tritSchema.safeParse(raw);
  if (!result.success) {
    throw new InvalidValueError(raw);
  }
  return result.data;
}

export function isTrit(raw: unknown): raw is Trit {
  return tritSchema.safeParse(raw).success;
}
