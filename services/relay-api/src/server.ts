/**
 * HTTP + WebSocket server.
 *
 * Endpoints:
 * - Document API: see document-routes.ts
 * - GET  /healthz: liveness check
 * - GET  /readyz: readiness check (blob store reachable)
 * - WS   /ws/transcriber, /ws/simulation/audio: duplex sessions, one per connection
 */

import { createServer, type Server, type IncomingMessage, type ServerResponse } from "node:http";
import type { Duplex } from "node:stream";
import { WebSocketServer, WebSocket, type RawData } from "ws";
import type { RelayConfig } from "@clinic-relay/shared-types";
import { ErrorCodes, createRequestId, describeError } from "@clinic-relay/shared-types";
import type { BlobStore } from "@clinic-relay/blob-store";
import type { DocumentStore } from "@clinic-relay/document-store";
import type { Logger } from "@clinic-relay/logging";
import { sendJson, handleCors, handleError } from "./http.js";
import { routeDocumentRequest } from "./document-routes.js";
import { DuplexSession, type SessionTransport } from "./duplex-session.js";
import type { SessionVariant } from "./session-variants.js";

export interface ServerDeps {
  readonly documents: DocumentStore;
  readonly blobs: BlobStore;
  readonly variants: readonly SessionVariant[];
  readonly config: RelayConfig;
  readonly logger: Logger;
  ready: boolean;
}

export interface RelayServer {
  readonly http: Server;
  /** Sessions whose connection is still open. */
  readonly sessions: ReadonlySet<DuplexSession>;
  /** Close every socket and tear down its session. */
  closeSessions(): Promise<void>;
}

/** Create the server (not yet listening). */
export function createRelayServer(deps: ServerDeps): RelayServer {
  const log = deps.logger.child({ component: "http-server" });
  const wss = new WebSocketServer({ noServer: true });
  const sessions = new Set<DuplexSession>();
  const variantsByPath = new Map(deps.variants.map((v) => [v.path, v]));

  const server = createServer(async (req, res) => {
    const requestLog = log.child({
      requestId: createRequestId(),
      method: req.method,
      url: req.url,
    });

    try {
      // Readiness gate: always allow /healthz (liveness probe)
      if (!deps.ready && req.url !== "/healthz") {
        sendJson(res, 503, {
          error: "Relay is starting up",
          code: ErrorCodes.NOT_READY,
        });
        return;
      }

      if (handleCors(req, res, deps.config.server.corsOrigins)) return;

      const url = new URL(req.url ?? "/", "http://localhost");
      const method = req.method ?? "GET";

      if (method === "GET" && url.pathname === "/healthz") {
        handleHealthz(res);
      } else if (method === "GET" && url.pathname === "/readyz") {
        await handleReadyz(res, deps);
      } else if (
        !(await routeDocumentRequest(req, res, url, {
          documents: deps.documents,
          maxBodyBytes: deps.config.server.maxBodyBytes,
          logger: requestLog,
        }))
      ) {
        sendJson(res, 404, { error: "Not found" });
      }
    } catch (err) {
      handleError(res, err, requestLog);
    }
  });

  server.on("upgrade", (req: IncomingMessage, socket: Duplex, head: Buffer) => {
    const path = new URL(req.url ?? "/", "http://localhost").pathname;
    const variant = variantsByPath.get(path);

    if (!deps.ready || !variant) {
      log.warn("WebSocket upgrade rejected", { path, ready: deps.ready });
      socket.write(`HTTP/1.1 ${variant ? "503 Service Unavailable" : "404 Not Found"}\r\n\r\n`);
      socket.destroy();
      return;
    }

    wss.handleUpgrade(req, socket, head, (ws) => {
      acceptSession(ws, variant);
    });
  });

  function acceptSession(ws: WebSocket, variant: SessionVariant): void {
    const session = new DuplexSession({
      variant,
      transport: socketTransport(ws),
      logger: deps.logger.child({ component: "duplex-session" }),
      defaultPatientId: deps.config.session.defaultPatientId,
      stopTimeoutMs: deps.config.session.stopTimeoutMs,
      audioQueueCapacity: deps.config.session.audioQueueCapacity,
    });
    sessions.add(session);

    ws.on("message", (data: RawData, isBinary: boolean) => {
      session.receive(toBuffer(data), isBinary);
    });

    ws.on("close", () => {
      sessions.delete(session);
      void session.close();
    });

    ws.on("error", (err) => {
      log.warn("WebSocket error", { sessionId: session.id, error: describeError(err) });
    });
  }

  return {
    http: server,
    sessions,
    async closeSessions(): Promise<void> {
      const open = [...sessions];
      sessions.clear();
      for (const client of wss.clients) {
        client.close(1001, "Server shutting down");
      }
      await Promise.all(open.map((s) => s.close()));
      log.info("All sessions closed", { count: open.length });
    },
  };
}

// ── Route Handlers ──

function handleHealthz(res: ServerResponse): void {
  sendJson(res, 200, { status: "ok", timestamp: new Date().toISOString() });
}

async function handleReadyz(res: ServerResponse, deps: ServerDeps): Promise<void> {
  const storage = await deps.blobs.healthCheck();
  sendJson(res, storage.healthy ? 200 : 503, {
    status: storage.healthy ? "ready" : "not_ready",
    checks: { storage },
    timestamp: new Date().toISOString(),
  });
}

// ── Helpers ──

function socketTransport(ws: WebSocket): SessionTransport {
  return {
    send: (frame) =>
      new Promise<void>((resolve, reject) => {
        if (ws.readyState !== WebSocket.OPEN) {
          reject(new Error("WebSocket is not open"));
          return;
        }
        ws.send(JSON.stringify(frame), (err) => {
          if (err) reject(err);
          else resolve();
        });
      }),
  };
}

function toBuffer(data: RawData): Buffer {
  if (Buffer.isBuffer(data)) return data;
  if (Array.isArray(data)) return Buffer.concat(data);
  return Buffer.from(data);
}
