/**
 * OpenAI transcriber: synchronous transcriptions API.
 *
 * Flow:
 * 1. POST /v1/audio/transcriptions with multipart audio, model and prompt
 * 2. Get transcript text back synchronously
 */

import type { TranscriptionConfig } from "@clinic-relay/shared-types";
import {
  UserError,
  OperatorError,
  ErrorCodes,
  describeError,
} from "@clinic-relay/shared-types";
import type {
  Transcriber,
  TranscriptionRequest,
  TranscriptionResult,
  TranscriberHealth,
} from "@clinic-relay/engine-contract";
import type { Logger } from "@clinic-relay/logging";
import { isRecord } from "@clinic-relay/validation";

const OPENAI_API_BASE = "https://api.openai.com/v1";

/** The prompt field is capped by the API; keep the tail, which is most recent. */
const MAX_PROMPT_CHARS = 896;

export type OpenAITranscriberConfig = Pick<TranscriptionConfig, "apiKey" | "model" | "language">;

const DEFAULTS: OpenAITranscriberConfig = {
  apiKey: "",
  model: "whisper-1",
  language: "en",
};

export class OpenAITranscriber implements Transcriber {
  readonly name = "OpenAI STT";

  private readonly config: OpenAITranscriberConfig;
  private readonly log: Logger;

  constructor(config: Partial<OpenAITranscriberConfig>, logger: Logger) {
    this.config = { ...DEFAULTS, ...config };
    this.log = logger.child({ transcriber: "openai" });
  }

  async transcribe(request: TranscriptionRequest): Promise<TranscriptionResult> {
    const startMs = Date.now();
    const log = this.log.child({ sessionId: request.sessionId });

    if (this.config.apiKey.length === 0) {
      throw new OperatorError(
        ErrorCodes.MISSING_CONFIG,
        "OpenAI API key not configured",
        "OPENAI_API_KEY is empty",
      );
    }

    log.debug("Starting OpenAI transcription", {
      contentType: request.contentType,
      audioBytes: request.audio.length,
      model: this.config.model,
    });

    const formData = new FormData();
    const blob = new Blob([request.audio], { type: request.contentType });
    formData.append("file", blob, `audio.${extensionFor(request.contentType)}`);
    formData.append("model", this.config.model);
    formData.append("response_format", "verbose_json");

    const language = request.languageHint ?? this.config.language;
    if (language) {
      formData.append("language", language);
    }
    if (request.prompt) {
      formData.append("prompt", request.prompt.slice(-MAX_PROMPT_CHARS));
    }

    try {
      const response = await fetch(`${OPENAI_API_BASE}/audio/transcriptions`, {
        method: "POST",
        headers: {
          Authorization: `Bearer ${this.config.apiKey}`,
        },
        body: formData,
        signal: request.signal ?? AbortSignal.timeout(60_000),
      });

      if (!response.ok) {
        const body = await response.text().catch(() => "");
        if (response.status === 401) {
          throw new OperatorError(
            ErrorCodes.STT_UNAVAILABLE,
            "OpenAI authentication failed",
            `HTTP 401: ${body}`,
          );
        }
        if (response.status === 429) {
          throw new UserError(
            ErrorCodes.RATE_LIMITED,
            "OpenAI rate limit exceeded. Please try again shortly.",
          );
        }
        throw new OperatorError(
          ErrorCodes.STT_TRANSCRIPTION_FAILED,
          "OpenAI transcription failed",
          `HTTP ${response.status}: ${body}`,
        );
      }

      const data: unknown = await response.json();
      if (!isRecord(data)) {
        throw new OperatorError(
          ErrorCodes.STT_TRANSCRIPTION_FAILED,
          "OpenAI transcription failed",
          "Response body is not a JSON object",
        );
      }

      // Silence yields an empty transcript, which is not an error mid-stream.
      const text = typeof data["text"] === "string" ? data["text"].trim() : "";
      const detected = typeof data["language"] === "string" ? data["language"] : language;
      const durationMs = Date.now() - startMs;

      log.debug("OpenAI transcription complete", {
        durationMs,
        textLength: text.length,
        detectedLanguage: detected,
      });

      return {
        text,
        language: detected,
        model: this.config.model,
        durationMs,
      };
    } catch (err) {
      if (err instanceof UserError || err instanceof OperatorError) throw err;
      if (err instanceof Error && (err.name === "AbortError" || err.name === "TimeoutError")) {
        throw new UserError(
          ErrorCodes.STT_TIMEOUT,
          "Transcription timed out or was cancelled.",
        );
      }
      throw new OperatorError(
        ErrorCodes.STT_UNAVAILABLE,
        "Could not reach OpenAI API",
        describeError(err),
      );
    }
  }

  async healthCheck(): Promise<TranscriberHealth> {
    const startMs = Date.now();

    if (this.config.apiKey.length === 0) {
      return {
        healthy: false,
        message: "OpenAI API key not configured",
        latencyMs: 0,
      };
    }

    try {
      // Models endpoint as a lightweight health check
      const response = await fetch(`${OPENAI_API_BASE}/models/${this.config.model}`, {
        headers: {
          Authorization: `Bearer ${this.config.apiKey}`,
        },
        signal: AbortSignal.timeout(5000),
      });
      const latencyMs = Date.now() - startMs;

      return {
        healthy: response.ok,
        message: response.ok ? "OpenAI API healthy" : `HTTP ${response.status}`,
        latencyMs,
      };
    } catch (err) {
      return {
        healthy: false,
        message: `OpenAI unreachable: ${describeError(err)}`,
        latencyMs: Date.now() - startMs,
      };
    }
  }
}

function extensionFor(contentType: string): string {
  const map: Record<string, string> = {
    "audio/wav": "wav",
    "audio/x-wav": "wav",
    "audio/ogg": "ogg",
    "audio/mpeg": "mp3",
    "audio/webm": "webm",
  };
  return map[contentType] ?? "bin";
}
