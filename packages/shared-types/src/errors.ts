/**
 * Error taxonomy: UserError (safe for clients) vs OperatorError (detailed for logs).
 */

/** Base class for all relay errors. */
export abstract class RelayError extends Error {
  abstract readonly kind: "user" | "operator";
  abstract readonly code: string;
  readonly timestamp: string;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
    this.timestamp = new Date().toISOString();
  }

  /** Structured representation for logging. */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      kind: this.kind,
      code: this.code,
      message: this.message,
      timestamp: this.timestamp,
      ...(this.cause != null ? { cause: String(this.cause) } : {}),
    };
  }
}

/**
 * Error safe to surface to a client (HTTP body or `system` frame).
 * Message is human-readable and contains no sensitive info.
 */
export class UserError extends RelayError {
  readonly kind = "user" as const;

  constructor(
    readonly code: string,
    message: string,
    options?: ErrorOptions,
  ) {
    super(message, options);
  }
}

/**
 * Error for operator/developer debugging only.
 * May contain sensitive details: never surface `detail` to a client.
 */
export class OperatorError extends RelayError {
  readonly kind = "operator" as const;
  readonly detail: string;

  constructor(
    readonly code: string,
    message: string,
    detail: string,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.detail = detail;
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      detail: this.detail,
    };
  }
}

/** Render any thrown value as a log-friendly string. */
export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

// ── Error codes ──

export const ErrorCodes = {
  // Request input
  INVALID_REQUEST: "INVALID_REQUEST",
  INVALID_PATIENT_ID: "INVALID_PATIENT_ID",
  INVALID_FILE_NAME: "INVALID_FILE_NAME",
  PAYLOAD_TOO_LARGE: "PAYLOAD_TOO_LARGE",

  // Documents
  DOCUMENT_NOT_FOUND: "DOCUMENT_NOT_FOUND",
  DOCUMENT_UNREADABLE: "DOCUMENT_UNREADABLE",
  PATIENT_ALREADY_EXISTS: "PATIENT_ALREADY_EXISTS",
  PATIENT_NOT_FOUND: "PATIENT_NOT_FOUND",
  STORAGE_UNAVAILABLE: "STORAGE_UNAVAILABLE",

  // Sessions
  MALFORMED_CONTROL_FRAME: "MALFORMED_CONTROL_FRAME",
  NO_ACTIVE_SESSION: "NO_ACTIVE_SESSION",
  SESSION_ALREADY_ACTIVE: "SESSION_ALREADY_ACTIVE",
  SEED_CONTEXT_UNAVAILABLE: "SEED_CONTEXT_UNAVAILABLE",
  ENGINE_FAILURE: "ENGINE_FAILURE",

  // STT
  STT_UNAVAILABLE: "STT_UNAVAILABLE",
  STT_TIMEOUT: "STT_TIMEOUT",
  STT_TRANSCRIPTION_FAILED: "STT_TRANSCRIPTION_FAILED",

  // Config
  INVALID_CONFIG: "INVALID_CONFIG",
  MISSING_CONFIG: "MISSING_CONFIG",

  // Server / lifecycle
  CORS_REJECTED: "CORS_REJECTED",
  NOT_READY: "NOT_READY",

  // General
  INTERNAL_ERROR: "INTERNAL_ERROR",
  RATE_LIMITED: "RATE_LIMITED",
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];
