/**
 * Duplex Session Protocol: one session per connection.
 *
 * Inbound frames are queued and handled strictly in arrival order by a
 * single loop, so a frame that arrives while a start is still fetching
 * its seed context is handled after that start completes. Handling a frame
 * never waits on the engine: audio is handed to the bridge without blocking.
 *
 * State machine:
 *   idle ──start──▶ active ──{status:true}──▶ finishing ──engine drained──▶ idle
 *   any ──close()──▶ closed
 *
 * Nothing thrown while handling a frame reaches the transport.
 */

import type {
  PatientId,
  SessionId,
  SessionState,
  ControlMessage,
  OutboundFrame,
  SystemMessage,
  StartControl,
} from "@clinic-relay/shared-types";
import {
  UserError,
  ErrorCodes,
  createSessionId,
  describeError,
} from "@clinic-relay/shared-types";
import { SessionBridge, AsyncChannel, type BridgeExit } from "@clinic-relay/session-bridge";
import type { Logger } from "@clinic-relay/logging";
import { parseControlFrame } from "./control-frame.js";
import type { SessionVariant } from "./session-variants.js";

/** Outbound half of a connection. */
export interface SessionTransport {
  /** Resolves once the frame is handed to the socket. Never called after close. */
  send(frame: OutboundFrame): Promise<void>;
}

export interface DuplexSessionOptions {
  readonly variant: SessionVariant;
  readonly transport: SessionTransport;
  readonly logger: Logger;
  readonly defaultPatientId: PatientId;
  readonly stopTimeoutMs?: number | undefined;
  readonly audioQueueCapacity?: number | undefined;
  readonly sessionId?: SessionId | undefined;
}

type InboundFrame =
  | { readonly kind: "control"; readonly text: string }
  | { readonly kind: "audio"; readonly data: Buffer };

export class DuplexSession {
  readonly id: SessionId;

  private readonly variant: SessionVariant;
  private readonly transport: SessionTransport;
  private readonly defaultPatientId: PatientId;
  private readonly stopTimeoutMs: number | undefined;
  private readonly audioQueueCapacity: number | undefined;
  private readonly log: Logger;
  private readonly inbox = new AsyncChannel<InboundFrame>();
  private readonly loop: Promise<void>;

  private state: SessionState = "idle";
  private bridge: SessionBridge | null = null;
  private closing: Promise<void> | null = null;

  constructor(options: DuplexSessionOptions) {
    this.id = options.sessionId ?? createSessionId();
    this.variant = options.variant;
    this.transport = options.transport;
    this.defaultPatientId = options.defaultPatientId;
    this.stopTimeoutMs = options.stopTimeoutMs;
    this.audioQueueCapacity = options.audioQueueCapacity;
    this.log = options.logger.child({ sessionId: this.id, variant: options.variant.name });
    this.loop = this.processInbox();
    this.log.info("Session connected");
  }

  get currentState(): SessionState {
    return this.state;
  }

  /** Patient of the running bridge, if any. */
  get patientId(): PatientId | undefined {
    return this.bridge?.patientId;
  }

  /** Queue one inbound frame. Called from the transport's message handler. */
  receive(data: Buffer, isBinary: boolean): void {
    if (this.state === "closed") return;
    this.inbox.push(
      isBinary ? { kind: "audio", data } : { kind: "control", text: data.toString("utf-8") },
    );
  }

  /**
   * Transport went away: tear everything down. Idempotent; never rejects.
   */
  close(): Promise<void> {
    if (!this.closing) {
      this.closing = this.teardown();
    }
    return this.closing;
  }

  private async teardown(): Promise<void> {
    const previous = this.state;
    this.state = "closed";
    this.inbox.close();
    const bridge = this.bridge;
    this.bridge = null;
    await Promise.all([bridge?.stop(), this.loop]);
    this.log.info("Session closed", { previousState: previous });
  }

  private async processInbox(): Promise<void> {
    for await (const frame of this.inbox) {
      if (this.state === "closed") continue;
      try {
        if (frame.kind === "audio") {
          this.handleAudio(frame.data);
        } else {
          await this.handleControl(frame.text);
        }
      } catch (err) {
        await this.reportFailure("Control frame rejected", err);
      }
    }
  }

  private handleAudio(data: Buffer): void {
    // Dropped silently unless an engine is live.
    if (this.state !== "active" || !this.bridge?.live) return;
    this.bridge.feed(data);
  }

  private async handleControl(text: string): Promise<void> {
    let message: ControlMessage;
    try {
      message = parseControlFrame(text);
    } catch (err) {
      if (err instanceof UserError && err.code === ErrorCodes.MALFORMED_CONTROL_FRAME) {
        this.log.warn("Malformed control frame ignored", { error: err.message, bytes: text.length });
        return;
      }
      throw err;
    }

    switch (message.kind) {
      case "stop":
        await this.handleStop();
        return;
      case "start":
        await this.handleStart(message);
        return;
      case "unknown":
        this.log.debug("Unrecognized control frame ignored");
        return;
    }
  }

  private async handleStop(): Promise<void> {
    const bridge = this.bridge;
    if (this.state !== "active" || !bridge) {
      this.log.warn("Stop requested with no active session", {
        code: ErrorCodes.NO_ACTIVE_SESSION,
        state: this.state,
      });
      await this.system(
        this.state === "finishing" ? "Session is already finishing." : "No active session to stop.",
        "warning",
      );
      return;
    }
    this.state = "finishing";
    bridge.finish();
    this.log.info("Session finishing", { patientId: bridge.patientId });
  }

  private async handleStart(message: StartControl): Promise<void> {
    if (this.state === "active" || this.state === "finishing") {
      this.log.warn("Start ignored, session already running", {
        code: ErrorCodes.SESSION_ALREADY_ACTIVE,
        state: this.state,
        patientId: this.bridge?.patientId,
      });
      await this.system(
        `Session already running for ${this.bridge?.patientId ?? "unknown"}; start ignored.`,
        "warning",
      );
      return;
    }

    const patientId = message.patientId ?? this.defaultPatientId;
    this.log.info("Starting session", { patientId });

    let seedContext: string;
    try {
      seedContext = await this.variant.loadSeed(patientId, message.fields);
    } catch (err) {
      await this.reportFailure("Session start failed", err);
      return;
    }
    // The connection may have gone away while the seed was loading.
    if (this.state !== "idle") return;

    let bridge: SessionBridge;
    try {
      bridge = new SessionBridge({
        sessionId: this.id,
        patientId,
        seedContext,
        createEngine: this.variant.createEngine,
        send: (frame) => this.transport.send(frame),
        logger: this.log,
        stopTimeoutMs: this.stopTimeoutMs,
        audioQueueCapacity: this.audioQueueCapacity,
        onExit: (exit) => this.onEngineExit(bridge, exit),
      });
    } catch (err) {
      // Engines validate their seed context on construction.
      await this.reportFailure("Session start failed", err);
      return;
    }
    this.bridge = bridge;
    this.state = "active";
    await this.system(this.variant.acknowledgment(patientId));
    // Acknowledge before the engine can emit anything.
    bridge.start();
  }

  private onEngineExit(bridge: SessionBridge, exit: BridgeExit): void {
    if (this.bridge !== bridge || this.state === "closed") return;
    this.bridge = null;
    this.state = "idle";
    if (exit.reason === "failed") {
      this.log.error("Session ended by engine failure", {
        code: ErrorCodes.ENGINE_FAILURE,
        error: describeError(exit.error),
      });
      void this.system("Session ended: the recognition engine failed.", "error");
    } else {
      this.log.info("Session finished", { patientId: bridge.patientId });
    }
  }

  private async reportFailure(context: string, err: unknown): Promise<void> {
    if (err instanceof UserError) {
      this.log.warn(context, { code: err.code, message: err.message });
      await this.system(`${context}: ${err.message}`, "error");
      return;
    }
    this.log.error(context, { error: describeError(err) });
    await this.system(`${context}: an internal error occurred.`, "error");
  }

  /** Best-effort system frame; delivery failures are only logged. */
  private async system(message: string, level?: SystemMessage["level"]): Promise<void> {
    if (this.state === "closed") return;
    const frame: SystemMessage = level ? { type: "system", message, level } : { type: "system", message };
    try {
      await this.transport.send(frame);
    } catch (err) {
      this.log.warn("Failed to send system frame", { error: describeError(err) });
    }
  }
}
