/**
 * Duplex session types: inbound control frames, outbound frames, session state.
 *
 * Client → relay: JSON control frames and binary audio frames.
 * Relay → client: `system` frames plus engine-defined events.
 */

import type { PatientId } from "./branded.js";

// ── Session state ──

/** Lifecycle of the session attached to one connection. */
export type SessionState = "idle" | "active" | "finishing" | "closed";

/** Endpoint flavour sharing the same session protocol. */
export type SessionVariantName = "transcriber" | "playback";

// ── Inbound control messages ──

/** `{"type":"start","patient_id":...}` plus variant-specific fields. */
export interface StartControl {
  readonly kind: "start";
  /** Absent when the client omitted `patient_id`. */
  readonly patientId: PatientId | undefined;
  /** Variant-specific fields from the frame (e.g. `script_file`), untouched. */
  readonly fields: Readonly<Record<string, unknown>>;
}

/** `{"status": true}`: explicit end of session. */
export interface StopControl {
  readonly kind: "stop";
}

/** Any decoded JSON that is neither start nor stop. */
export interface UnknownControl {
  readonly kind: "unknown";
}

export type ControlMessage = StartControl | StopControl | UnknownControl;

// ── Outbound frames ──

/** Acknowledgment or warning frame written by the protocol layer itself. */
export interface SystemMessage {
  readonly type: "system";
  readonly message: string;
  /** Omitted for plain acknowledgments. */
  readonly level?: "warning" | "error";
}

/**
 * Engine-produced payload. Opaque to the protocol layer; it is only
 * required to be JSON-serializable and to carry a `type` tag.
 */
export interface RecognitionEvent {
  readonly type: string;
  readonly [field: string]: unknown;
}

/** Any frame the relay writes to a session connection. */
export type OutboundFrame = SystemMessage | RecognitionEvent;
