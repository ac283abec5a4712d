// ============================================
// ERROR TYPES
// ============================================

export enum OpenProjectErrorType {
  NETWORK_ERROR = 'NETWORK_ERROR',
  TIMEOUT = 'TIMEOUT',
  ABORTED = 'ABORTED',
  HTTP_ERROR = 'HTTP_ERROR',
  PARSE_ERROR = 'PARSE_ERROR',
  MODEL_VALIDATION_ERROR = 'MODEL_VALIDATION_ERROR',
  RESOLUTION_ERROR = 'RESOLUTION_ERROR',
  NOT_FOUND = 'NOT_FOUND',
  AMBIGUOUS = 'AMBIGUOUS',
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  UNKNOWN_ERROR = 'UNKNOWN_ERROR',
}

export class OpenProjectClientError extends Error {
  constructor(
    public type: OpenProjectErrorType,
    message: string,
    public details?: Record<string, unknown>,
    public hint?: string
  ) {
    super(message);
    this.name = 'OpenProjectClientError';
  }

  toJSON(): Record<string, unknown> {
    return {
      type: this.type,
      message: this.message,
      details: this.details,
      hint: this.hint,
    };
  }
}

export interface HttpErrorInit {
  statusCode: number;
  method: string;
  url: string;
  message: string;
  responseJson?: Record<string, unknown>;
  responseText?: string;
  hint?: string;
}

/**
 * Non-2xx response from the API. `reason` is the best-effort message pulled
 * from the body; `message` is the full `"<status> <METHOD> <url>: <reason>"` line.
 */
export class OpenProjectHttpError extends OpenProjectClientError {
  readonly statusCode: number;
  readonly method: string;
  readonly url: string;
  readonly reason: string;
  readonly responseJson?: Record<string, unknown>;
  readonly responseText?: string;

  constructor(init: HttpErrorInit) {
    super(
      OpenProjectErrorType.HTTP_ERROR,
      `${init.statusCode} ${init.method} ${init.url}: ${init.message}`,
      undefined,
      init.hint
    );
    this.name = 'OpenProjectHttpError';
    this.statusCode = init.statusCode;
    this.method = init.method;
    this.url = init.url;
    this.reason = init.message;
    this.responseJson = init.responseJson;
    this.responseText = init.responseText;
  }

  /** Same status, request and bodies; new message. */
  withMessage(message: string, hint?: string): OpenProjectHttpError {
    return new OpenProjectHttpError({
      statusCode: this.statusCode,
      method: this.method,
      url: this.url,
      message,
      responseJson: this.responseJson,
      responseText: this.responseText,
      hint: hint ?? this.hint,
    });
  }

  override toJSON(): Record<string, unknown> {
    return {
      type: this.type,
      message: this.reason,
      status: this.statusCode,
      method: this.method,
      url: this.url,
      details: this.responseJson ?? this.responseText,
      hint: this.hint,
    };
  }
}

export class OpenProjectParseError extends OpenProjectClientError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(OpenProjectErrorType.PARSE_ERROR, message, details);
    this.name = 'OpenProjectParseError';
  }
}

export class OpenProjectModelValidationError extends OpenProjectClientError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(OpenProjectErrorType.MODEL_VALIDATION_ERROR, message, details);
    this.name = 'OpenProjectModelValidationError';
  }
}

// ============================================
// RESOLUTION ERRORS
// ============================================

export class ResolutionError extends OpenProjectClientError {
  constructor(
    message: string,
    public readonly query: string,
    type: OpenProjectErrorType = OpenProjectErrorType.RESOLUTION_ERROR,
    details?: Record<string, unknown>
  ) {
    super(type, message, { query, ...details });
    this.name = 'ResolutionError';
  }
}

export class NotFoundResolutionError extends ResolutionError {
  constructor(message: string, query: string, public readonly available: string[]) {
    super(message, query, OpenProjectErrorType.NOT_FOUND, { available });
    this.name = 'NotFoundResolutionError';
  }
}

export class AmbiguousResolutionError extends ResolutionError {
  constructor(message: string, query: string, public readonly candidates: string[]) {
    super(message, query, OpenProjectErrorType.AMBIGUOUS, { candidates });
    this.name = 'AmbiguousResolutionError';
  }
}

// ============================================
// LOCAL VALIDATION
// ============================================

export class ValidationError extends OpenProjectClientError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(OpenProjectErrorType.VALIDATION_ERROR, message, details);
    this.name = 'ValidationError';
  }
}

export class DurationParseError extends ValidationError {
  constructor(message: string) {
    super(message, undefined);
    this.name = 'DurationParseError';
    this.hint = "Use hours (h) and minutes (m), e.g. '2h', '30m', '2h 30m', '1.5h'.";
  }
}
