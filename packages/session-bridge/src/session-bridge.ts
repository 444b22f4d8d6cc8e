/**
 * Session Bridge: owns one recognition engine for the lifetime of a session.
 *
 * The engine's ingestion routine runs as a detached task with its own
 * AbortController, so the connection's receive loop never waits on it.
 * Two channels cross between the contexts:
 *
 *   connection ──feed()──▶ audio channel ──▶ engine.run()
 *   engine.emit() ──▶ event channel ──▶ drain loop ──▶ send()
 *
 * The drain loop is the only consumer of engine events, so delivery order
 * equals production order. Teardown happens once: `stop()` memoizes its
 * promise.
 */

import type {
  PatientId,
  SessionId,
  RecognitionEvent,
  OutboundFrame,
} from "@clinic-relay/shared-types";
import { describeError } from "@clinic-relay/shared-types";
import type { EngineFactory, RecognitionEngine } from "@clinic-relay/engine-contract";
import type { Logger } from "@clinic-relay/logging";
import { AsyncChannel } from "./channel.js";

/** How the engine's ingestion routine ended, when it ended on its own. */
export type BridgeExit =
  | { readonly reason: "completed" }
  | { readonly reason: "failed"; readonly error: unknown };

export interface SessionBridgeOptions {
  readonly sessionId: SessionId;
  readonly patientId: PatientId;
  readonly seedContext: string;
  readonly createEngine: EngineFactory;
  /** Connection send path. Rejections are logged, never rethrown. */
  readonly send: (frame: OutboundFrame) => void | Promise<void>;
  readonly logger: Logger;
  /** How long `stop()` waits for the engine before giving up on the join. */
  readonly stopTimeoutMs?: number | undefined;
  /** Audio chunks buffered ahead of the engine before new ones are dropped. */
  readonly audioQueueCapacity?: number | undefined;
  /**
   * Called once, after all events are delivered, when the engine ends
   * without `stop()` (graceful finish completed, or engine failure).
   */
  readonly onExit?: ((exit: BridgeExit) => void) | undefined;
}

const DEFAULT_STOP_TIMEOUT_MS = 5000;
const DEFAULT_AUDIO_QUEUE_CAPACITY = 512;

export class SessionBridge {
  readonly sessionId: SessionId;
  readonly patientId: PatientId;

  private readonly engine: RecognitionEngine;
  private readonly audio: AsyncChannel<Buffer>;
  private readonly events = new AsyncChannel<RecognitionEvent>();
  private readonly controller = new AbortController();
  private readonly send: SessionBridgeOptions["send"];
  private readonly onExit: SessionBridgeOptions["onExit"];
  private readonly stopTimeoutMs: number;
  private readonly log: Logger;

  private runTask: Promise<BridgeExit> | null = null;
  private drainTask: Promise<void> | null = null;
  private stopTask: Promise<void> | null = null;
  private running = false;
  private finishing = false;
  private droppedChunks = 0;

  constructor(options: SessionBridgeOptions) {
    this.sessionId = options.sessionId;
    this.patientId = options.patientId;
    this.send = options.send;
    this.onExit = options.onExit;
    this.stopTimeoutMs = options.stopTimeoutMs ?? DEFAULT_STOP_TIMEOUT_MS;
    this.audio = new AsyncChannel(options.audioQueueCapacity ?? DEFAULT_AUDIO_QUEUE_CAPACITY);
    this.log = options.logger.child({
      component: "session-bridge",
      sessionId: options.sessionId,
      patientId: options.patientId,
    });

    this.engine = options.createEngine({
      sessionId: options.sessionId,
      patientId: options.patientId,
      seedContext: options.seedContext,
      emit: (event) => {
        if (!this.events.push(event)) {
          this.log.debug("Event dropped after teardown", { type: event.type });
        }
      },
      logger: this.log,
    });
  }

  /** Whether audio fed now would reach the engine. */
  get live(): boolean {
    return this.running && !this.finishing;
  }

  /** Whether a graceful finish is in progress. */
  get isFinishing(): boolean {
    return this.running && this.finishing;
  }

  /** Launch the ingestion routine and the event drain loop. */
  start(): void {
    if (this.runTask || this.stopTask) return;
    this.running = true;
    this.drainTask = this.drainEvents();
    this.runTask = this.runEngine();
    this.log.info("Engine started", { engine: this.engine.name });
  }

  /**
   * Hand one audio chunk to the engine.
   * @returns false when the chunk was dropped (not live, or queue full)
   */
  feed(chunk: Buffer): boolean {
    if (!this.live) return false;
    if (this.audio.push(chunk)) return true;
    this.droppedChunks++;
    if (this.droppedChunks === 1 || this.droppedChunks % 100 === 0) {
      this.log.warn("Audio queue full, dropping chunks", {
        dropped: this.droppedChunks,
        buffered: this.audio.size,
      });
    }
    return false;
  }

  /** Stop accepting audio and let the engine flush what it has. */
  finish(): void {
    if (!this.live) return;
    this.finishing = true;
    this.audio.close();
    this.log.info("Graceful finish requested", { buffered: this.audio.size });
  }

  /**
   * Unconditional teardown. Idempotent: every call returns the same promise.
   * Never rejects.
   */
  stop(): Promise<void> {
    if (!this.stopTask) {
      this.stopTask = this.teardown();
    }
    return this.stopTask;
  }

  private async teardown(): Promise<void> {
    this.running = false;
    this.controller.abort();
    this.audio.close();

    const runTask = this.runTask;
    if (runTask) {
      const joined = await this.joinWithin(runTask, this.stopTimeoutMs);
      if (!joined) {
        this.log.warn("Engine did not exit within stop timeout", {
          timeoutMs: this.stopTimeoutMs,
        });
        void runTask.then(() => {
          this.log.info("Engine exited after stop timeout");
        });
      }
    }

    this.events.close();
    if (this.drainTask) await this.drainTask;
    this.log.info("Session bridge stopped", { droppedChunks: this.droppedChunks });
  }

  private async runEngine(): Promise<BridgeExit> {
    let exit: BridgeExit;
    try {
      await this.engine.run(this.audio, this.controller.signal);
      exit = { reason: "completed" };
    } catch (err) {
      exit = { reason: "failed", error: err };
      if (!this.controller.signal.aborted) {
        this.log.error("Engine failed", { error: describeError(err) });
      }
    }

    const stopped = this.stopTask !== null;
    this.running = false;
    this.audio.close();

    if (!stopped) {
      this.log.info("Engine exited", { reason: exit.reason });
      this.events.close();
      if (this.drainTask) await this.drainTask;
      if (this.stopTask === null) this.notifyExit(exit);
    }
    return exit;
  }

  private notifyExit(exit: BridgeExit): void {
    try {
      this.onExit?.(exit);
    } catch (err) {
      this.log.error("Exit handler threw", { error: describeError(err) });
    }
  }

  private async drainEvents(): Promise<void> {
    for await (const event of this.events) {
      try {
        await this.send(event);
      } catch (err) {
        this.log.warn("Failed to deliver event", {
          type: event.type,
          error: describeError(err),
        });
      }
    }
  }

  private async joinWithin(task: Promise<unknown>, timeoutMs: number): Promise<boolean> {
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<false>((resolve) => {
      timer = setTimeout(() => resolve(false), timeoutMs);
    });
    try {
      return await Promise.race([task.then(() => true), timeout]);
    } finally {
      clearTimeout(timer);
    }
  }
}
