/**
 * Speech-to-text abstraction consumed by the transcription engine.
 */

import type { SessionId } from "@clinic-relay/shared-types";

export interface TranscriptionRequest {
  /** Encoded audio (e.g. a WAV file). */
  readonly audio: Buffer;
  readonly contentType: string;
  /** Correlation ID for tracing. */
  readonly sessionId: SessionId;
  /** Context text to bias recognition (patient background, vocabulary). */
  readonly prompt?: string | undefined;
  /** Optional language hint (ISO 639-1). */
  readonly languageHint?: string | undefined;
  /** Abort signal for cancellation. */
  readonly signal?: AbortSignal | undefined;
}

export interface TranscriptionResult {
  /** Recognised text; empty when the window held no speech. */
  readonly text: string;
  readonly language: string;
  readonly model: string;
  readonly durationMs: number;
}

/** Health status of a transcriber backend. */
export interface TranscriberHealth {
  readonly healthy: boolean;
  readonly message: string;
  readonly latencyMs: number;
}

export interface Transcriber {
  readonly name: string;

  /**
   * Transcribe one encoded audio segment.
   *
   * @throws UserError for user-facing failures
   * @throws OperatorError for internal failures
   */
  transcribe(request: TranscriptionRequest): Promise<TranscriptionResult>;

  /** Used by /readyz. */
  healthCheck(): Promise<TranscriberHealth>;
}
