/**
 * Session variants: endpoints sharing the duplex session protocol.
 *
 * A variant decides where its seed context comes from, which engine it
 * runs and how a start is acknowledged. The protocol itself is identical.
 */

import type {
  PatientId,
  SessionVariantName,
  TranscriptionConfig,
  PlaybackConfig,
} from "@clinic-relay/shared-types";
import { UserError, ErrorCodes } from "@clinic-relay/shared-types";
import type { EngineFactory, Transcriber } from "@clinic-relay/engine-contract";
import type { DocumentStore } from "@clinic-relay/document-store";
import { TranscriptionEngine, ScriptedPlaybackEngine } from "@clinic-relay/engines";
import { validateFileName } from "@clinic-relay/validation";

export interface SessionVariant {
  readonly name: SessionVariantName;
  /** WebSocket upgrade path. */
  readonly path: string;
  /**
   * Fetch the seed context for a start.
   * @throws UserError(SEED_CONTEXT_UNAVAILABLE) when the seed document is missing
   */
  loadSeed(patientId: PatientId, fields: Readonly<Record<string, unknown>>): Promise<string>;
  readonly createEngine: EngineFactory;
  acknowledgment(patientId: PatientId): string;
}

async function readSeed(
  documents: DocumentStore,
  patientId: PatientId,
  fileName: string,
): Promise<string> {
  const result = await documents.getText(patientId, fileName);
  if (!result.ok) {
    throw new UserError(
      ErrorCodes.SEED_CONTEXT_UNAVAILABLE,
      `Seed context unavailable: ${fileName} not found for patient ${patientId}.`,
    );
  }
  return result.value;
}

export interface TranscriberVariantDeps {
  readonly documents: DocumentStore;
  readonly seedFileName: string;
  readonly transcriber: Transcriber;
  readonly transcription: Pick<TranscriptionConfig, "sampleRate" | "windowMs" | "language">;
}

/** Live transcription at `/ws/transcriber`, seeded with the patient profile. */
export function transcriberVariant(deps: TranscriberVariantDeps): SessionVariant {
  return {
    name: "transcriber",
    path: "/ws/transcriber",
    loadSeed: (patientId) => readSeed(deps.documents, patientId, deps.seedFileName),
    createEngine: (init) =>
      new TranscriptionEngine(init, {
        transcriber: deps.transcriber,
        sampleRate: deps.transcription.sampleRate,
        windowMs: deps.transcription.windowMs,
        languageHint: deps.transcription.language,
      }),
    acknowledgment: (patientId) => `Transcriber initialized for ${patientId}`,
  };
}

export interface PlaybackVariantDeps {
  readonly documents: DocumentStore;
  readonly playback: PlaybackConfig;
}

/**
 * Scripted playback at `/ws/simulation/audio`. The script document is
 * named by the start frame's `script_file`.
 */
export function playbackVariant(deps: PlaybackVariantDeps): SessionVariant {
  return {
    name: "playback",
    path: "/ws/simulation/audio",
    loadSeed: async (patientId, fields) => {
      const scriptFile = validateFileName(
        fields["script_file"] ?? deps.playback.defaultScriptFile,
        "script_file",
      );
      return readSeed(deps.documents, patientId, scriptFile);
    },
    createEngine: (init) =>
      new ScriptedPlaybackEngine(init, { turnIntervalMs: deps.playback.turnIntervalMs }),
    acknowledgment: (patientId) => `Playback initialized for ${patientId}`,
  };
}
