/**
 * Core type definitions.
 */

export type * from './logger.js';
export { createNoOpLogger } from './logger.js';

export {
  Trit,
  TRITS,
  TRIT_NAMES,
  compareTrits,
  isTrit,
  parseTrit,
  tritName,
  tritSchema,
} from './trit.js';
