/**
 * Live transcription engine.
 *
 * Accumulates inbound PCM into fixed windows, frames each window as WAV
 * and transcribes it with the patient's seed context plus the running
 * transcript as prompt.
 *
 * Events:
 *   {type:"transcript", seq, text, final:false}      one per non-silent window
 *   {type:"transcription_error", seq, message}       failed window, engine continues
 *   {type:"consultation_complete", patient_id, transcript}  after a graceful finish
 */

import { RelayError, describeError } from "@clinic-relay/shared-types";
import type { EngineInit, RecognitionEngine, Transcriber } from "@clinic-relay/engine-contract";
import type { Logger } from "@clinic-relay/logging";
import { bytesForDuration, blockAlign, encodeWav, type PcmFormat } from "./wav.js";

export interface TranscriptionEngineOptions {
  readonly transcriber: Transcriber;
  readonly sampleRate: number;
  readonly windowMs: number;
  readonly languageHint?: string | undefined;
}

export class TranscriptionEngine implements RecognitionEngine {
  readonly name = "transcription";

  private readonly init: EngineInit;
  private readonly transcriber: Transcriber;
  private readonly format: PcmFormat;
  private readonly windowBytes: number;
  private readonly languageHint: string | undefined;
  private readonly log: Logger;
  private readonly segments: string[] = [];
  private seq = 0;

  constructor(init: EngineInit, options: TranscriptionEngineOptions) {
    this.init = init;
    this.transcriber = options.transcriber;
    this.format = { sampleRate: options.sampleRate, channels: 1, bitsPerSample: 16 };
    this.windowBytes = bytesForDuration(this.format, options.windowMs);
    this.languageHint = options.languageHint;
    this.log = init.logger.child({ engine: this.name });
  }

  async run(audio: AsyncIterable<Buffer>, signal: AbortSignal): Promise<void> {
    let pending = Buffer.alloc(0);

    for await (const chunk of audio) {
      pending = pending.length === 0 ? chunk : Buffer.concat([pending, chunk]);
      while (pending.length >= this.windowBytes) {
        const window = pending.subarray(0, this.windowBytes);
        pending = pending.subarray(this.windowBytes);
        await this.transcribeWindow(window, signal);
        if (signal.aborted) return;
      }
    }
    if (signal.aborted) return;

    // Flush the partial window, trimmed to whole sample frames.
    const tail = pending.subarray(0, pending.length - (pending.length % blockAlign(this.format)));
    if (tail.length > 0) {
      await this.transcribeWindow(tail, signal);
      if (signal.aborted) return;
    }

    const transcript = this.segments.join(" ");
    this.log.info("Consultation transcribed", {
      windows: this.seq,
      transcriptLength: transcript.length,
    });
    this.init.emit({
      type: "consultation_complete",
      patient_id: this.init.patientId,
      transcript,
    });
  }

  private async transcribeWindow(pcm: Buffer, signal: AbortSignal): Promise<void> {
    const seq = ++this.seq;
    try {
      const result = await this.transcriber.transcribe({
        audio: encodeWav(pcm, this.format),
        contentType: "audio/wav",
        sessionId: this.init.sessionId,
        prompt: this.prompt(),
        languageHint: this.languageHint,
        signal,
      });
      if (result.text.length === 0) {
        this.log.debug("Silent window", { seq });
        return;
      }
      this.segments.push(result.text);
      this.init.emit({ type: "transcript", seq, text: result.text, final: false });
    } catch (err) {
      if (signal.aborted) return;
      this.log.warn("Window transcription failed", { seq, error: describeError(err) });
      this.init.emit({
        type: "transcription_error",
        seq,
        message: err instanceof RelayError ? err.message : "Transcription failed",
      });
    }
  }

  private prompt(): string {
    return [this.init.seedContext, ...this.segments].filter((s) => s.length > 0).join("\n");
  }
}
