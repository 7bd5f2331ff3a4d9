/**
 * Custom Error Classes
 */

/**
 * Base error class for all dropsort errors
 */
export class DropsortError extends Error {
  public readonly code: string;
  public readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    code: string,
    details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'DropsortError';
    this.code = code;
    this.details = details;
    
    // Maintains proper stack trace
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Invalid environment configuration
 */
export class ConfigurationError extends DropsortError {
  public readonly issues: string[];

  constructor(issues: string[]) {
    super(
      `Invalid configuration: ${issues.join('; ')}`,
      'CONFIGURATION_ERROR',
      { issues }
    );
    this.name = 'ConfigurationError';
    this.issues = issues;
  }
}

/**
 * A marker destination that cannot be turned into a safe target directory
 */
export class DestinationResolutionError extends DropsortError {
  constructor(markerDestination: string, reason: string) {
    super(
      `Cannot resolve destination "${markerDestination}": ${reason}`,
      'DESTINATION_RESOLUTION_ERROR',
      { markerDestination, reason }
    );
    this.name = 'DestinationResolutionError';
  }
}

/**
 * History file could not be written
 */
export class LedgerPersistenceError extends DropsortError {
  constructor(filePath: string, cause: unknown) {
    super(
      `Failed to persist delivery history to ${filePath}: ${getErrorMessage(cause)}`,
      'LEDGER_PERSISTENCE_ERROR',
      { filePath }
    );
    this.name = 'LedgerPersistenceError';
  }
}

/**
 * Listing or probing the source failed
 */
export class SourceUnavailableError extends DropsortError {
  constructor(source: string, operation: string, cause: unknown) {
    super(
      `Source ${source} unavailable during ${operation}: ${getErrorMessage(cause)}`,
      'SOURCE_UNAVAILABLE',
      { source, operation }
    );
    this.name = 'SourceUnavailableError';
  }
}

/**
 * Check if error is a dropsort error
 */
export function isDropsortError(error: unknown): error is DropsortError {
  return error instanceof DropsortError;
}

/**
 * Message of any thrown value
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  return String(error);
}
