/**
 * Custom Error Types for the Werewolf Agent Plugin
 */

/**
 * Base error class for all plugin errors
 */
export class WerewolfPluginError extends Error {
  constructor(message: string, public readonly code: string) {
    super(message);
    this.name = 'WerewolfPluginError';
  }
}

/**
 * Thrown when a speech classifier cannot produce a record
 */
export class ClassifierError extends WerewolfPluginError {
  constructor(message: string, public readonly speaker?: string, public readonly originalError?: Error) {
    super(message, 'CLASSIFIER_ERROR');
    this.name = 'ClassifierError';
  }
}

/**
 * Thrown when an inbound event or request fails validation
 */
export class ProtocolError extends WerewolfPluginError {
  constructor(message: string, public readonly issues: string[] = []) {
    super(message, 'PROTOCOL_ERROR');
    this.name = 'ProtocolError';
  }
}

/**
 * Thrown when a game id has no live session
 */
export class SessionNotFoundError extends WerewolfPluginError {
  constructor(public readonly gameId: string) {
    super(`No session for game ${gameId}`, 'SESSION_NOT_FOUND');
    this.name = 'SessionNotFoundError';
  }
}

export class ConfigurationError extends WerewolfPluginError {
  constructor(message: string, public readonly configKey?: string) {
    super(message, 'CONFIGURATION_ERROR');
    this.name = 'ConfigurationError';
  }
}

/**
 * Thrown when required services are not available
 */
export class ServiceNotAvailableError extends WerewolfPluginError {
  constructor(message: string, public readonly serviceType?: string) {
    super(message, 'SERVICE_NOT_AVAILABLE');
    this.name = 'ServiceNotAvailableError';
  }
}

/**
 * Thrown when the language model fails, times out or returns nothing usable
 */
export class GenerationError extends WerewolfPluginError {
  constructor(message: string, public readonly attempts: number = 1, public readonly originalError?: Error) {
    super(message, 'GENERATION_ERROR');
    this.name = 'GenerationError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
