/**
 * Runtime configuration types.
 */

import type { PatientId } from "./branded.js";

/** Relay runtime configuration. */
export interface RelayConfig {
  /** Server configuration. */
  readonly server: ServerConfig;
  /** Blob storage backend. */
  readonly storage: StorageConfig;
  /** Session lifecycle settings. */
  readonly session: SessionConfig;
  /** Live transcription engine settings. */
  readonly transcription: TranscriptionConfig;
  /** Scripted playback engine settings. */
  readonly playback: PlaybackConfig;
}

export interface ServerConfig {
  readonly port: number;
  readonly host: string;
  readonly corsOrigins: readonly string[];
  /** Max JSON request body size. */
  readonly maxBodyBytes: number;
}

export type StorageBackend = "gcs" | "memory";

export interface StorageConfig {
  readonly backend: StorageBackend;
  readonly bucket: string;
  /** Root prefix under which every patient folder lives (no trailing slash). */
  readonly rootPrefix: string;
  /** Optional Google Cloud project id. */
  readonly projectId: string | undefined;
}

export interface SessionConfig {
  /** Used when a `start` frame carries no `patient_id`. */
  readonly defaultPatientId: PatientId;
  /** Seed context document for transcriber sessions. */
  readonly seedFileName: string;
  /** Bounded wait for the engine context to exit during teardown. */
  readonly stopTimeoutMs: number;
  /** Max buffered audio chunks per session before new chunks are dropped. */
  readonly audioQueueCapacity: number;
}

export interface TranscriptionConfig {
  readonly apiKey: string;
  readonly model: string;
  readonly language: string;
  /** PCM16 mono sample rate of inbound audio. */
  readonly sampleRate: number;
  /** Audio accumulated per transcription request. */
  readonly windowMs: number;
}

export interface PlaybackConfig {
  /** Script document used when `start` carries no `script_file`. */
  readonly defaultScriptFile: string;
  readonly turnIntervalMs: number;
}
