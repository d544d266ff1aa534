/**
 * Error codes for frontend to distinguish between error types.
 * Use these to provide intelligent error handling and user messaging.
 */
export const ErrorCode = {
  // Generic errors
  UNKNOWN_ERROR: 'UNKNOWN_ERROR',
  VALIDATION_ERROR: 'VALIDATION_ERROR',
  NOT_FOUND: 'NOT_FOUND',
  INTERNAL_ERROR: 'INTERNAL_ERROR',

  // Upstream feed errors
  EXTERNAL_API_ERROR: 'EXTERNAL_API_ERROR',
  LEAGUE_NOT_FOUND: 'LEAGUE_NOT_FOUND',
  ROSTER_NOT_FOUND: 'ROSTER_NOT_FOUND',
  PLAYER_NOT_FOUND: 'PLAYER_NOT_FOUND',

  // Analysis conditions
  DRAFT_UNAVAILABLE: 'DRAFT_UNAVAILABLE',
  NO_MATCHUPS: 'NO_MATCHUPS',
  PLAYER_NOT_ON_ROSTER: 'PLAYER_NOT_ON_ROSTER',
  REQUEST_ABORTED: 'REQUEST_ABORTED',
} as const;

export type ErrorCodeType = (typeof ErrorCode)[keyof typeof ErrorCode];

/**
 * Base class for application exceptions
 */
export class AppException extends Error {
  constructor(
    message: string,
    public readonly statusCode: number,
    public readonly errorCode: ErrorCodeType = ErrorCode.UNKNOWN_ERROR
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Thrown when validation fails
 */
export class ValidationException extends AppException {
  constructor(message: string, errorCode: ErrorCodeType = ErrorCode.VALIDATION_ERROR) {
    super(message, 400, errorCode);
  }
}

/**
 * Thrown when resource is not found
 */
export class NotFoundException extends AppException {
  constructor(message: string, errorCode: ErrorCodeType = ErrorCode.NOT_FOUND) {
    super(message, 404, errorCode);
  }
}

/**
 * Thrown when the caller went away before the report was assembled.
 * 499 mirrors the nginx "client closed request" convention.
 */
export class RequestAbortedException extends AppException {
  constructor(operation: string) {
    super(`Request aborted during ${operation}`, 499, ErrorCode.REQUEST_ABORTED);
  }
}

/**
 * Thrown when an external API call fails (e.g., Sleeper).
 * Wraps the original error and provides context about the API and operation.
 */
export class ExternalApiException extends AppException {
  public readonly originalError?: Error;
  public readonly apiName: string;
  public readonly operation: string;

  constructor(
    apiName: string,
    operation: string,
    message: string,
    statusCode: number = 502,
    originalError?: Error
  ) {
    super(`[${apiName}] ${operation}: ${message}`, statusCode, ErrorCode.EXTERNAL_API_ERROR);
    this.apiName = apiName;
    this.operation = operation;
    this.originalError = originalError;
  }

  /**
   * Creates an ExternalApiException from a caught error.
   */
  static fromError(
    apiName: string,
    operation: string,
    error: unknown,
    statusCode: number = 502
  ): ExternalApiException {
    const originalError = error instanceof Error ? error : new Error(String(error));
    const message = originalError.message || 'Unknown error';
    return new ExternalApiException(apiName, operation, message, statusCode, originalError);
  }

  /**
   * Creates an ExternalApiException for timeout errors.
   */
  static timeout(apiName: string, operation: string): ExternalApiException {
    return new ExternalApiException(
      apiName,
      operation,
      'Request timed out',
      504,
      new Error('Timeout')
    );
  }

  /**
   * Creates an ExternalApiException for rate limit errors.
   */
  static rateLimited(apiName: string, operation: string): ExternalApiException {
    return new ExternalApiException(
      apiName,
      operation,
      'Rate limit exceeded',
      429,
      new Error('Rate limited')
    );
  }
}

// Domain-specific exception factory functions for common scenarios
export const LeagueErrors = {
  notFound: (leagueId: string) =>
    new NotFoundException(`League ${leagueId} not found`, ErrorCode.LEAGUE_NOT_FOUND),
  rosterNotFound: (rosterId: number) =>
    new NotFoundException(`Roster ${rosterId} not found in league`, ErrorCode.ROSTER_NOT_FOUND),
  playerNotFound: (playerId: string) =>
    new NotFoundException(`Player ${playerId} not found`, ErrorCode.PLAYER_NOT_FOUND),
  draftUnavailable: (reason: string) =>
    new NotFoundException(reason, ErrorCode.DRAFT_UNAVAILABLE),
  noMatchups: (week: number) =>
    new NotFoundException(`No matchups were played in week ${week}`, ErrorCode.NO_MATCHUPS),
  playerNotOnRoster: (playerId: string, rosterId: number) =>
    new ValidationException(`Player ${playerId} is not on roster ${rosterId}`, ErrorCode.PLAYER_NOT_ON_ROSTER),
};
