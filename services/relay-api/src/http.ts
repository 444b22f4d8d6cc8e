/**
 * HTTP plumbing shared by the route handlers: JSON bodies, CORS, error mapping.
 */

import type { IncomingMessage, ServerResponse } from "node:http";
import {
  UserError,
  OperatorError,
  ErrorCodes,
  describeError,
} from "@clinic-relay/shared-types";
import { isRecord } from "@clinic-relay/validation";
import type { Logger } from "@clinic-relay/logging";

export function sendJson(res: ServerResponse, statusCode: number, body: unknown): void {
  res.writeHead(statusCode, { "Content-Type": "application/json" });
  res.end(JSON.stringify(body));
}

export function sendBytes(
  res: ServerResponse,
  statusCode: number,
  contentType: string,
  body: Buffer | string,
): void {
  res.writeHead(statusCode, { "Content-Type": contentType });
  res.end(body);
}

export function readBody(req: IncomingMessage, maxBytes: number): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let totalBytes = 0;
    let rejected = false;

    req.on("data", (chunk: Buffer) => {
      if (rejected) return;
      totalBytes += chunk.length;
      if (totalBytes > maxBytes) {
        rejected = true;
        reject(
          new UserError(
            ErrorCodes.PAYLOAD_TOO_LARGE,
            `Request body too large. Max: ${(maxBytes / 1024 / 1024).toFixed(1)}MB`,
          ),
        );
        return;
      }
      chunks.push(chunk);
    });

    req.on("end", () => {
      if (!rejected) resolve(Buffer.concat(chunks));
    });

    req.on("error", (err) => {
      if (rejected) return;
      reject(
        new OperatorError(
          ErrorCodes.INTERNAL_ERROR,
          "Failed to read request body",
          err.message,
        ),
      );
    });
  });
}

/** Read a JSON object body. */
export async function readJsonBody(
  req: IncomingMessage,
  maxBytes: number,
): Promise<Record<string, unknown>> {
  const body = await readBody(req, maxBytes);
  let parsed: unknown;
  try {
    parsed = JSON.parse(body.toString("utf-8"));
  } catch {
    throw new UserError(ErrorCodes.INVALID_REQUEST, "Request body is not valid JSON");
  }
  if (!isRecord(parsed)) {
    throw new UserError(ErrorCodes.INVALID_REQUEST, "Request body must be a JSON object");
  }
  return parsed;
}

function setCorsHeaders(res: ServerResponse, origin: string): void {
  res.setHeader("Access-Control-Allow-Origin", origin);
  res.setHeader("Access-Control-Allow-Methods", "GET, POST, DELETE, OPTIONS");
  res.setHeader("Access-Control-Allow-Headers", "Content-Type, Authorization");
  res.setHeader("Access-Control-Max-Age", "86400");
}

/**
 * CORS handler with strict origin rejection.
 *
 * - Non-empty allowlist and an Origin outside it: 403 CORS_REJECTED.
 * - Empty allowlist: allow all origins (development mode).
 * - Preflight (OPTIONS): 204, with CORS headers only when allowed.
 *
 * Returns true if the response has been fully handled (caller should return).
 */
export function handleCors(
  req: IncomingMessage,
  res: ServerResponse,
  allowedOrigins: readonly string[],
): boolean {
  const origin = req.headers["origin"];

  if (allowedOrigins.length > 0) {
    if (origin && allowedOrigins.includes(origin)) {
      setCorsHeaders(res, origin);
    } else if (origin) {
      if (req.method === "OPTIONS") {
        // Browser blocks the actual request without CORS headers.
        res.writeHead(204);
        res.end();
        return true;
      }
      sendJson(res, 403, {
        error: "Origin not allowed",
        code: ErrorCodes.CORS_REJECTED,
      });
      return true;
    }
    // No origin header (server-to-server): allow through without CORS headers.
  } else if (origin) {
    setCorsHeaders(res, origin);
  }

  if (req.method === "OPTIONS") {
    res.writeHead(204);
    res.end();
    return true;
  }

  return false;
}

/** Map a thrown value to a status and `{error}` body. Operator detail stays in the log. */
export function handleError(res: ServerResponse, err: unknown, log: Logger): void {
  if (err instanceof UserError) {
    log.warn("User error", { code: err.code, message: err.message });
    sendJson(res, err.code === ErrorCodes.PAYLOAD_TOO_LARGE ? 413 : 400, {
      error: err.message,
      code: err.code,
    });
  } else if (err instanceof OperatorError) {
    log.error("Operator error", err.toJSON());
    sendJson(res, 500, {
      error: err.message,
      code: err.code,
    });
  } else {
    log.error("Unexpected error", { error: describeError(err) });
    sendJson(res, 500, {
      error: "An unexpected error occurred.",
      code: ErrorCodes.INTERNAL_ERROR,
    });
  }
}
