export { GateSumAlternate, type Adder } from './gate-sum-alternate.js';
export { Tryte, TRYTE_WIDTH } from './tryte.js';
export { Oscillator, OSCILLATION_SEQUENCE, type OscillatorOptions } from './oscillator.js';
