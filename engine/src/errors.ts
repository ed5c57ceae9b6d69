/**
 * Error types for the decision engine
 * Degraded input never throws; only broken invariants and bad configuration do
 */

/**
 * Base error class for all engine errors
 */
export class WolfpackError extends Error {
  constructor(message: string, public readonly code: string) {
    super(message);
    this.name = 'WolfpackError';
  }
}

/**
 * Thrown when a GameContext invariant is broken (development and tests only)
 */
export class InvariantViolationError extends WolfpackError {
  constructor(message: string, public readonly invariant: string) {
    super(message, 'INVARIANT_VIOLATION');
    this.name = 'InvariantViolationError';
  }
}

/**
 * Thrown when engine configuration fails validation
 */
export class EngineConfigError extends WolfpackError {
  constructor(message: string, public readonly issues: string[] = []) {
    super(message, 'ENGINE_CONFIG_ERROR');
    this.name = 'EngineConfigError';
  }
}
