/**
 * Tagger error codes
 */
export enum TaggerErrorCode {
  CONFIG_ERROR = 'TAGGER_CONFIG_ERROR',
  LOG_SOURCE_ERROR = 'TAGGER_LOG_SOURCE_ERROR',
  INTERNAL_ERROR = 'TAGGER_INTERNAL_ERROR',
}

export class TaggerError extends Error {
  constructor(
    message: string,
    public readonly code: TaggerErrorCode,
    public readonly details?: unknown
  ) {
    super(message);
    this.name = 'TaggerError';
  }
}

/**
 * Failure raised by a tag backend itself rather than by the cloud API.
 * The code travels as `name`, like SDK service exceptions.
 */
export class BackendError extends Error {
  constructor(code: string, message: string) {
    super(message);
    this.name = code;
  }
}

/**
 * Normalize errors to TaggerError
 */
export function normalizeError(error: unknown): TaggerError {
  if (error instanceof TaggerError) {
    return error;
  }

  if (error instanceof Error) {
    return new TaggerError(
      error.message,
      TaggerErrorCode.INTERNAL_ERROR,
      { originalError: error.name }
    );
  }

  return new TaggerError(
    'Unknown error occurred',
    TaggerErrorCode.INTERNAL_ERROR,
    error
  );
}

/**
 * Error code and message of a failed AWS SDK call.
 *
 * SDK v3 service exceptions carry the service error code as `name`.
 */
export function describeFailure(error: unknown): { code: string; message?: string } {
  if (error instanceof Error) {
    return {
      code: error.name || 'Error',
      message: error.message || undefined,
    };
  }
  return { code: 'UnknownError', message: typeof error === 'string' ? error : undefined };
}
