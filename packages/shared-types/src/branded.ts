/**
 * Branded types for critical identifiers.
 * Prevents accidental misuse of string values across different domains.
 */

declare const __brand: unique symbol;

/** A branded type: structurally a string but nominally distinct. */
export type Brand<T, B extends string> = T & { readonly [__brand]: B };

/** Caller-supplied patient identifier; also the patient folder name. */
export type PatientId = Brand<string, "PatientId">;

/** Correlation ID for one duplex connection. */
export type SessionId = Brand<string, "SessionId">;

/** Correlation ID for one HTTP request. */
export type RequestId = Brand<string, "RequestId">;

// ── Constructors (runtime validation + branding) ──

/** Create a SessionId. Format: `sess_<time>_<random>` */
export function createSessionId(id?: string): SessionId {
  const value =
    id ?? `sess_${Date.now().toString(36)}_${Math.random().toString(36).slice(2, 8)}`;
  return value as SessionId;
}

/** Create a RequestId. Format: `req_<time>_<random>` */
export function createRequestId(id?: string): RequestId {
  const value =
    id ?? `req_${Date.now().toString(36)}_${Math.random().toString(36).slice(2, 8)}`;
  return value as RequestId;
}

/**
 * Brand a patient identifier.
 * Patient ids become a single path segment, so separators and dot-segments
 * are rejected. The id is kept verbatim: it is part of every blob key.
 */
export function createPatientId(id: string): PatientId {
  if (id.trim().length === 0) {
    throw new TypeError("PatientId cannot be empty");
  }
  if (/[/\\]/.test(id) || id === "." || id === "..") {
    throw new TypeError(`Invalid PatientId: "${id}"`);
  }
  return id as PatientId;
}
