/**
 * Error types for Telegraph operations
 */
export enum TelegraphErrorType {
  TRANSPORT_ERROR = "TRANSPORT_ERROR",
  HTTP_ERROR = "HTTP_ERROR",
  DECODE_ERROR = "DECODE_ERROR",
  API_ERROR = "API_ERROR",
  VALIDATION_ERROR = "VALIDATION_ERROR",
}

/**
 * Error strings the Telegraph API is known to report. Anything else maps to UNKNOWN.
 */
export const API_ERROR_KINDS = [
  "FLOOD_WAIT",
  "ACCESS_TOKEN_INVALID",
  "PAGE_NOT_FOUND",
  "PAGE_ACCESS_DENIED",
  "PAGE_SAVE_FAILED",
  "CONTENT_TOO_BIG",
  "CONTENT_REQUIRED",
  "CONTENT_FORMAT_INVALID",
  "TITLE_REQUIRED",
  "TITLE_TOO_LONG",
  "SHORT_NAME_REQUIRED",
  "AUTHOR_NAME_TOO_LONG",
  "AUTHOR_URL_TOO_LONG",
] as const;

export type ApiErrorKind = (typeof API_ERROR_KINDS)[number] | "UNKNOWN";

/**
 * Base class for every error raised by the SDK
 */
export class TelegraphError extends Error {
  public readonly timestamp: string;
  public readonly code?: string;
  public readonly details?: Record<string, unknown>;

  constructor(
    public readonly type: TelegraphErrorType,
    message: string,
    code?: string,
    details?: Record<string, unknown>
  ) {
    super(message);
    this.name = new.target.name;
    this.timestamp = new Date().toISOString();
    this.code = code;
    this.details = details;

    // Keep instanceof working for subclasses when compiled down
    Object.setPrototypeOf(this, new.target.prototype);
  }

  /**
   * Convert to JSON for logging
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      type: this.type,
      message: this.message,
      code: this.code,
      timestamp: this.timestamp,
      details: this.details,
    };
  }
}

/**
 * Network, DNS or timeout failure before a response was received
 */
export class TransportError extends TelegraphError {
  constructor(
    message: string,
    code: "NETWORK" | "TIMEOUT" = "NETWORK",
    public readonly cause?: unknown
  ) {
    super(TelegraphErrorType.TRANSPORT_ERROR, message, code);
  }

  static timeout(url: string, timeoutMs: number, cause?: unknown): TransportError {
    return new TransportError(
      `Request to ${url} timed out after ${timeoutMs}ms`,
      "TIMEOUT",
      cause
    );
  }
}

/**
 * Response with a non-2xx status
 */
export class HttpError extends TelegraphError {
  constructor(
    public readonly status: number,
    public readonly body: string = ""
  ) {
    super(TelegraphErrorType.HTTP_ERROR, `HTTP error! status: ${status}`, `HTTP_${status}`, {
      status,
    });
  }
}

/**
 * Malformed JSON or a payload missing a required field
 */
export class DecodeError extends TelegraphError {
  constructor(
    message: string,
    public readonly field?: string
  ) {
    super(TelegraphErrorType.DECODE_ERROR, message, "DECODE_ERROR", field ? { field } : undefined);
  }

  static missingField(field: string, expected: string): DecodeError {
    return new DecodeError(`Expected ${expected} at "${field}"`, field);
  }
}

/**
 * Business error reported by the API in an `{ ok: false, error }` envelope.
 * `message` is the raw error string.
 */
export class ApiError extends TelegraphError {
  public readonly kind: ApiErrorKind;
  /** Seconds to wait before retrying, for FLOOD_WAIT_N errors */
  public readonly retryAfter?: number;

  constructor(message: string) {
    const kind = classifyApiError(message);
    super(TelegraphErrorType.API_ERROR, message, kind);
    this.kind = kind;
    if (kind === "FLOOD_WAIT") {
      const seconds = parseInt(message.slice("FLOOD_WAIT_".length), 10);
      if (!Number.isNaN(seconds)) {
        this.retryAfter = seconds;
      }
    }
  }
}

/**
 * Local pre-flight check failure, raised before any request is made
 */
export class ValidationError extends TelegraphError {
  constructor(
    public readonly field: string,
    reason: string,
    public readonly value?: unknown
  ) {
    super(
      TelegraphErrorType.VALIDATION_ERROR,
      `Validation error for ${field}: ${reason}`,
      "VALIDATION_ERROR",
      { field }
    );
  }
}

export function classifyApiError(message: string): ApiErrorKind {
  for (const kind of API_ERROR_KINDS) {
    if (message === kind || message.startsWith(`${kind}_`)) {
      return kind;
    }
  }
  return "UNKNOWN";
}
