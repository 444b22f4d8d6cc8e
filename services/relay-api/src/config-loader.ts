/**
 * Configuration loader: reads from environment variables.
 */

import type { RelayConfig, StorageBackend } from "@clinic-relay/shared-types";
import {
  createPatientId,
  OperatorError,
  ErrorCodes,
  describeError,
} from "@clinic-relay/shared-types";

/**
 * NaN-safe parseInt wrapper. Returns defaultVal when raw is undefined/empty.
 * Throws OperatorError(INVALID_CONFIG) when the parsed result is NaN.
 */
function safeParseInt(
  raw: string | undefined,
  defaultVal: number,
  fieldName: string,
): number {
  if (raw === undefined || raw === "") return defaultVal;
  const parsed = parseInt(raw, 10);
  if (Number.isNaN(parsed)) {
    throw new OperatorError(
      ErrorCodes.INVALID_CONFIG,
      `Invalid integer for ${fieldName}`,
      `parseInt("${raw}", 10) returned NaN`,
    );
  }
  return parsed;
}

/**
 * NaN-safe parseInt that also enforces the value is positive (> 0).
 * Throws OperatorError(INVALID_CONFIG) when NaN or non-positive.
 */
function safeParsePositiveInt(
  raw: string | undefined,
  defaultVal: number,
  fieldName: string,
): number {
  const value = safeParseInt(raw, defaultVal, fieldName);
  if (value <= 0) {
    throw new OperatorError(
      ErrorCodes.INVALID_CONFIG,
      `${fieldName} must be positive`,
      `Got ${value}`,
    );
  }
  return value;
}

function parseStorageBackend(raw: string | undefined): StorageBackend {
  const value = (raw ?? "gcs").trim().toLowerCase();
  if (value === "gcs" || value === "memory") return value;
  throw new OperatorError(
    ErrorCodes.INVALID_CONFIG,
    "STORAGE_BACKEND must be gcs or memory",
    `Got "${raw ?? ""}"`,
  );
}

/** Strip surrounding slashes so keys join as `<root>/<pid>/<file>`. */
function normalizePrefix(raw: string | undefined, defaultVal: string): string {
  const value = (raw ?? defaultVal).replace(/^\/+|\/+$/g, "");
  if (value.length === 0) {
    throw new OperatorError(
      ErrorCodes.INVALID_CONFIG,
      "STORAGE_ROOT_PREFIX cannot be empty",
      `Got "${raw ?? ""}"`,
    );
  }
  return value;
}

function parseDefaultPatientId(raw: string | undefined): RelayConfig["session"]["defaultPatientId"] {
  try {
    return createPatientId(raw ?? "P0001");
  } catch (err) {
    throw new OperatorError(
      ErrorCodes.INVALID_CONFIG,
      "DEFAULT_PATIENT_ID is not a valid patient id",
      describeError(err),
    );
  }
}

/** Load relay configuration from environment variables. */
export function loadConfig(env: Record<string, string | undefined> = process.env): RelayConfig {
  return {
    server: {
      port: safeParseInt(env["PORT"], 8000, "PORT"),
      host: env["HOST"] ?? "0.0.0.0",
      corsOrigins: (env["CORS_ORIGINS"] ?? "")
        .split(",")
        .map((s) => s.trim())
        .filter((s) => s.length > 0),
      maxBodyBytes: safeParsePositiveInt(
        env["MAX_BODY_BYTES"],
        10 * 1024 * 1024,
        "MAX_BODY_BYTES",
      ),
    },
    storage: {
      backend: parseStorageBackend(env["STORAGE_BACKEND"]),
      bucket: env["STORAGE_BUCKET"] ?? "clinic_sim",
      rootPrefix: normalizePrefix(env["STORAGE_ROOT_PREFIX"], "patient_profile"),
      projectId: env["GOOGLE_CLOUD_PROJECT"] || undefined,
    },
    session: {
      defaultPatientId: parseDefaultPatientId(env["DEFAULT_PATIENT_ID"]),
      seedFileName: env["SEED_FILE_NAME"] ?? "patient_info.md",
      stopTimeoutMs: safeParsePositiveInt(
        env["SESSION_STOP_TIMEOUT_MS"],
        5000,
        "SESSION_STOP_TIMEOUT_MS",
      ),
      audioQueueCapacity: safeParsePositiveInt(
        env["AUDIO_QUEUE_CAPACITY"],
        512,
        "AUDIO_QUEUE_CAPACITY",
      ),
    },
    transcription: {
      apiKey: env["OPENAI_API_KEY"] ?? "",
      model: env["OPENAI_STT_MODEL"] ?? "whisper-1",
      language: env["OPENAI_STT_LANGUAGE"] ?? "en",
      sampleRate: safeParsePositiveInt(env["AUDIO_SAMPLE_RATE"], 16_000, "AUDIO_SAMPLE_RATE"),
      windowMs: safeParsePositiveInt(
        env["TRANSCRIPTION_WINDOW_MS"],
        5000,
        "TRANSCRIPTION_WINDOW_MS",
      ),
    },
    playback: {
      defaultScriptFile: env["PLAYBACK_SCRIPT_FILE"] ?? "scenario_script.json",
      turnIntervalMs: safeParsePositiveInt(
        env["PLAYBACK_TURN_INTERVAL_MS"],
        1500,
        "PLAYBACK_TURN_INTERVAL_MS",
      ),
    },
  };
}
