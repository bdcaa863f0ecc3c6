/**
 * Circuit Error Types
 *
 * Typed error classes for structural wiring violations, bad values
 * and runaway propagation. Non-fatal conditions (multiple writers,
 * role mismatches) are warnings, not errors - see Simulation.warn().
 */

/**
 * Circuit error codes for classification.
 */
export type CircuitErrorCode = 'CONNECTION' | 'INVALID_VALUE' | 'CASCADE_LIMIT' | 'CONFIG_INVALID';

/**
 * Base circuit error class.
 */
export class CircuitError extends Error {
  constructor(
    message: string,
    public readonly code: CircuitErrorCode
  ) {
    super(message);
    this.name = 'CircuitError';
  }
}

/**
 * Wiring is structurally wrong: double connect, removing a point a
 * wire does not hold, wrong wire count or index for a fixed-arity
 * component.
 * Fails at the violating call.
 */
export class ConnectionError extends CircuitError {
  constructor(message: string) {
    super(message, 'CONNECTION');
    this.name = 'ConnectionError';
  }
}

/**
 * A raw value outside the three-valued domain.
 */
export class InvalidValueError extends CircuitError {
  constructor(public readonly value: unknown) {
    super(`Cannot set state to: ${String(value)}`, 'INVALID_VALUE');
    this.name = 'InvalidValueError';
  }
}

/**
 * Propagation did not settle within the configured budget.
 * Usually a feedback loop that keeps changing its own inputs.
 */
export class CascadeLimitError extends CircuitError {
  constructor(
    public readonly limit: number,
    public readonly kind: 'depth' | 'events'
  ) {
    super(
      kind === 'depth'
        ? `Cascade exceeded max depth of ${String(limit)} gate updates`
        : `Settling exceeded ${String(limit)} scheduled events`,
      'CASCADE_LIMIT'
    );
    this.name = 'CascadeLimitError';
  }
}

/**
 * Configuration failed to load or validate.
 */
export class ConfigError extends CircuitError {
  constructor(message: string) {
    super(message, 'CONFIG_INVALID');
    this.name = 'ConfigError';
  }
}
