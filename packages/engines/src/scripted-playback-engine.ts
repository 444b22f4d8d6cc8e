/**
 * Scripted playback engine.
 *
 * Replays a stored dialogue script turn by turn. Inbound audio is read and
 * discarded so the session protocol behaves the same as live transcription.
 *
 * Script document: `[{ "speaker": "...", "text": "..." }, ...]`, or an
 * object with the same array under `turns`.
 */

import { UserError, ErrorCodes, describeError } from "@clinic-relay/shared-types";
import type { EngineInit, RecognitionEngine } from "@clinic-relay/engine-contract";
import type { Logger } from "@clinic-relay/logging";
import { isRecord } from "@clinic-relay/validation";

export interface ScriptTurn {
  readonly speaker: string;
  readonly text: string;
}

export interface ScriptedPlaybackOptions {
  readonly turnIntervalMs: number;
}

/**
 * Parse and validate a script document.
 * @throws UserError(SEED_CONTEXT_UNAVAILABLE) when the document is not a script
 */
export function parseScript(raw: string): ScriptTurn[] {
  let doc: unknown;
  try {
    doc = JSON.parse(raw);
  } catch {
    throw new UserError(ErrorCodes.SEED_CONTEXT_UNAVAILABLE, "Script is not valid JSON.");
  }

  const entries = isRecord(doc) ? doc["turns"] : doc;
  if (!Array.isArray(entries)) {
    throw new UserError(
      ErrorCodes.SEED_CONTEXT_UNAVAILABLE,
      "Script must be an array of turns.",
    );
  }

  return entries.map((entry: unknown, index) => {
    if (
      !isRecord(entry) ||
      typeof entry["speaker"] !== "string" ||
      typeof entry["text"] !== "string"
    ) {
      throw new UserError(
        ErrorCodes.SEED_CONTEXT_UNAVAILABLE,
        `Script turn ${index} must have string "speaker" and "text".`,
      );
    }
    return { speaker: entry["speaker"], text: entry["text"] };
  });
}

export class ScriptedPlaybackEngine implements RecognitionEngine {
  readonly name = "scripted-playback";

  private readonly init: EngineInit;
  private readonly turns: readonly ScriptTurn[];
  private readonly turnIntervalMs: number;
  private readonly log: Logger;
  private audioEnded = false;

  /** @throws UserError when the seed context is not a valid script */
  constructor(init: EngineInit, options: ScriptedPlaybackOptions) {
    this.init = init;
    this.turns = parseScript(init.seedContext);
    this.turnIntervalMs = options.turnIntervalMs;
    this.log = init.logger.child({ engine: this.name });
  }

  async run(audio: AsyncIterable<Buffer>, signal: AbortSignal): Promise<void> {
    const inputEnded = this.discardAudio(audio);

    let played = 0;
    for (const [index, turn] of this.turns.entries()) {
      if (signal.aborted || this.audioEnded) break;
      if (index > 0 && !(await this.wait(this.turnIntervalMs, signal, inputEnded))) break;
      this.init.emit({ type: "transcript", index, speaker: turn.speaker, text: turn.text });
      played++;
    }

    if (!signal.aborted) {
      this.log.info("Playback finished", { played, total: this.turns.length });
      this.init.emit({ type: "simulation_complete", turns: played });
    }

    // Discarding continues until the bridge closes the audio channel.
  }

  private async discardAudio(audio: AsyncIterable<Buffer>): Promise<void> {
    let bytes = 0;
    try {
      for await (const chunk of audio) bytes += chunk.length;
    } catch (err) {
      this.log.warn("Audio input failed", { error: describeError(err) });
    } finally {
      this.audioEnded = true;
    }
    this.log.debug("Audio input ended", { discardedBytes: bytes });
  }

  /** Resolves false when aborted or when the audio input ends first. */
  private async wait(
    ms: number,
    signal: AbortSignal,
    inputEnded: Promise<void>,
  ): Promise<boolean> {
    let settle: (elapsed: boolean) => void = () => undefined;
    const onAbort = (): void => settle(false);
    const elapsed = new Promise<boolean>((resolve) => {
      settle = resolve;
    });
    const timer = setTimeout(() => settle(true), ms);
    signal.addEventListener("abort", onAbort, { once: true });
    try {
      return await Promise.race([elapsed, inputEnded.then(() => false)]);
    } finally {
      clearTimeout(timer);
      signal.removeEventListener("abort", onAbort);
    }
  }
}
