export enum EngagespotErrorCode {
  UNKNOWN = 'UNKNOWN',
  CONFIGURATION_ERROR = 'CONFIGURATION_ERROR',
  INVALID_HEADER_VALUE = 'INVALID_HEADER_VALUE',
}

export class EngagespotError extends Error {
  public readonly code: EngagespotErrorCode;
  public readonly details?: Record<string, unknown>;
  public readonly timestamp: Date;

  constructor(
    message: string,
    code: EngagespotErrorCode = EngagespotErrorCode.UNKNOWN,
    details?: Record<string, unknown>,
    cause?: Error
  ) {
    super(message, cause ? { cause } : undefined);
    this.name = 'EngagespotError';
    this.code = code;
    this.details = details;
    this.timestamp = new Date();
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      ...(this.details && { details: this.details }),
      timestamp: this.timestamp.toISOString(),
      cause: this.cause instanceof Error ? this.cause.message : undefined,
    };
  }
}

/**
 * Thrown while building a client: bad credentials, bad header values or an
 * incomplete environment. Nothing is thrown once a client exists.
 */
export class ConfigurationError extends EngagespotError {
  constructor(
    message: string,
    details?: Record<string, unknown>,
    code: EngagespotErrorCode = EngagespotErrorCode.CONFIGURATION_ERROR
  ) {
    super(message, code, details);
    this.name = 'ConfigurationError';
  }

  static invalidHeaderValue(header: string): ConfigurationError {
    return new ConfigurationError(
      `Invalid value for header ${header}: contains characters not allowed in an HTTP header`,
      { header },
      EngagespotErrorCode.INVALID_HEADER_VALUE
    );
  }
}
