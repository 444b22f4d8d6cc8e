/**
 * Recognition engine contract.
 *
 * An engine consumes raw audio chunks and emits recognition events
 * asynchronously. The session bridge depends only on this contract, never
 * on concrete engine implementations.
 */

import type { PatientId, SessionId, RecognitionEvent } from "@clinic-relay/shared-types";
import type { Logger } from "@clinic-relay/logging";

/** Outbound sink for engine events. Must not block the caller. */
export type EventSink = (event: RecognitionEvent) => void;

/** Everything an engine is constructed with. */
export interface EngineInit {
  readonly sessionId: SessionId;
  readonly patientId: PatientId;
  /** Freeform seed text fetched from the document store. */
  readonly seedContext: string;
  readonly emit: EventSink;
  readonly logger: Logger;
}

/**
 * One engine instance per session.
 *
 * Implementations:
 * - TranscriptionEngine: windows PCM audio and transcribes each window
 * - ScriptedPlaybackEngine: replays a dialogue script, ignores audio
 */
export interface RecognitionEngine {
  /** Human-readable name for logs. */
  readonly name: string;

  /**
   * Ingestion routine. Consumes `audio` until it ends (graceful finish)
   * or `signal` aborts (teardown).
   *
   * On graceful finish the engine flushes pending recognition and emits
   * its final events before resolving. On abort it resolves promptly
   * without flushing. A rejection is an engine failure.
   */
  run(audio: AsyncIterable<Buffer>, signal: AbortSignal): Promise<void>;
}

/** Builds a fresh engine for a session start. */
export type EngineFactory = (init: EngineInit) => RecognitionEngine;
