/**
 * Error type for the Internet Archive client.
 * @module internet-archive-client/errors/error
 */

/**
 * Closed set of error kinds raised by the client.
 */
export enum ArchiveErrorKind {
  /** Identifier fails the item identifier rules. */
  InvalidIdentifier = 'invalid_identifier',
  /** Operation needs credentials but none are attached. */
  MissingCredentials = 'missing_credentials',
  /** Transport-level failure: connection, timeout, malformed response. */
  Request = 'request_error',
  /** Non-success HTTP status with a server-provided message. */
  Api = 'api_error',
  /** The file, item or task does not exist (HTTP 404). */
  NotFound = 'not_found',
  /** Invalid client configuration or request arguments. */
  Configuration = 'configuration',
}

/**
 * Optional fields carried by an ArchiveError.
 */
export interface ArchiveErrorOptions {
  /** HTTP status code, for errors produced from a response. */
  status?: number;
  /** Machine-readable code (S3 error code or a client code). */
  code?: string;
  /** Server request ID, when the response carried one. */
  requestId?: string;
  /** Additional structured context. */
  details?: Record<string, unknown>;
  /** Underlying error. */
  cause?: Error;
}

/**
 * Error raised by every client operation.
 *
 * `kind` is the discriminant; callers switch on it rather than on the class.
 */
export class ArchiveError extends Error {
  readonly kind: ArchiveErrorKind;
  readonly status?: number;
  readonly code?: string;
  readonly requestId?: string;
  readonly details?: Record<string, unknown>;

  constructor(kind: ArchiveErrorKind, message: string, options: ArchiveErrorOptions = {}) {
    super(message, options.cause ? { cause: options.cause } : undefined);

    // Set the prototype explicitly to maintain instanceof checks
    Object.setPrototypeOf(this, ArchiveError.prototype);

    this.name = 'ArchiveError';
    this.kind = kind;
    this.status = options.status;
    this.code = options.code;
    this.requestId = options.requestId;
    this.details = options.details;

    Error.captureStackTrace?.(this, ArchiveError);
  }

  static invalidIdentifier(identifier: string): ArchiveError {
    return new ArchiveError(
      ArchiveErrorKind.InvalidIdentifier,
      `Invalid item identifier: ${JSON.stringify(identifier)}`,
      { details: { identifier } }
    );
  }

  static missingCredentials(operation?: string): ArchiveError {
    return new ArchiveError(
      ArchiveErrorKind.MissingCredentials,
      operation
        ? `Credentials are required for ${operation}`
        : 'Access key and secret key are required',
      { details: operation ? { operation } : undefined }
    );
  }

  static request(message: string, cause?: Error): ArchiveError {
    return new ArchiveError(ArchiveErrorKind.Request, message, { cause });
  }

  static timeout(timeoutMs: number): ArchiveError {
    return new ArchiveError(ArchiveErrorKind.Request, `Request timed out after ${timeoutMs}ms`, {
      code: 'Timeout',
      details: { timeoutMs },
    });
  }

  /**
   * A response arrived but its body could not be decoded.
   */
  static malformedResponse(message: string, cause?: Error): ArchiveError {
    return new ArchiveError(ArchiveErrorKind.Request, message, {
      code: 'MalformedResponse',
      cause,
    });
  }

  static api(message: string, status: number, code?: string, requestId?: string): ArchiveError {
    return new ArchiveError(ArchiveErrorKind.Api, message, { status, code, requestId });
  }

  static notFound(message: string, requestId?: string): ArchiveError {
    return new ArchiveError(ArchiveErrorKind.NotFound, message, {
      status: 404,
      code: 'NotFound',
      requestId,
    });
  }

  static configuration(message: string, issues?: string[]): ArchiveError {
    return new ArchiveError(
      ArchiveErrorKind.Configuration,
      issues?.length ? `${message}: ${issues.join('; ')}` : message,
      { details: issues?.length ? { issues } : undefined }
    );
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      kind: this.kind,
      message: this.message,
      status: this.status,
      code: this.code,
      requestId: this.requestId,
      details: this.details,
    };
  }

  toString(): string {
    const parts = [this.name, this.kind];

    if (this.code) {
      parts.push(`[${this.code}]`);
    }

    if (this.status) {
      parts.push(`(${this.status})`);
    }

    parts.push(`- ${this.message}`);

    if (this.requestId) {
      parts.push(`(RequestId: ${this.requestId})`);
    }

    return parts.join(' ');
  }
}

/**
 * Type guard for ArchiveError.
 */
export function isArchiveError(error: unknown): error is ArchiveError {
  return error instanceof ArchiveError;
}

/**
 * Checks whether an error is an ArchiveError of the given kind.
 */
export function isErrorKind(error: unknown, kind: ArchiveErrorKind): error is ArchiveError {
  return error instanceof ArchiveError && error.kind === kind;
}
