/**
 * Document API route handlers.
 *
 * Endpoints:
 * - POST   /api/get-patient-file         : fetch one document, typed by extension
 * - GET    /api/admin/list-files/:pid    : list a patient's documents
 * - POST   /api/admin/save-file          : create or overwrite a text document
 * - DELETE /api/admin/delete-file?pid=&file_name=
 * - GET    /api/admin/list-patients
 * - POST   /api/admin/create-patient     : write the seed profile
 * - DELETE /api/admin/delete-patient?pid=
 *
 * Not-found and already-exists outcomes come back from the document store
 * as values and are mapped to 404/400 here. Validation failures are
 * UserErrors; storage failures are OperatorErrors. Both reach handleError.
 */

import type { IncomingMessage, ServerResponse } from "node:http";
import type { DocumentContent } from "@clinic-relay/shared-types";
import { UserError, ErrorCodes } from "@clinic-relay/shared-types";
import type { DocumentStore } from "@clinic-relay/document-store";
import type { Logger } from "@clinic-relay/logging";
import { validatePatientId, validateFileName, requireString } from "@clinic-relay/validation";
import { sendJson, sendBytes, readJsonBody } from "./http.js";

export interface DocumentRouteDeps {
  readonly documents: DocumentStore;
  readonly maxBodyBytes: number;
  readonly logger: Logger;
}

const LIST_FILES_PREFIX = "/api/admin/list-files/";

/**
 * Dispatch a document API request.
 * @returns false when no document route matches
 */
export async function routeDocumentRequest(
  req: IncomingMessage,
  res: ServerResponse,
  url: URL,
  deps: DocumentRouteDeps,
): Promise<boolean> {
  const method = req.method ?? "GET";
  const path = url.pathname;

  if (method === "POST" && path === "/api/get-patient-file") {
    await handleGetPatientFile(req, res, deps);
  } else if (method === "GET" && path.startsWith(LIST_FILES_PREFIX)) {
    await handleListFiles(res, decodeSegment(path.slice(LIST_FILES_PREFIX.length)), deps);
  } else if (method === "POST" && path === "/api/admin/save-file") {
    await handleSaveFile(req, res, deps);
  } else if (method === "DELETE" && path === "/api/admin/delete-file") {
    await handleDeleteFile(res, url.searchParams, deps);
  } else if (method === "GET" && path === "/api/admin/list-patients") {
    await handleListPatients(res, deps);
  } else if (method === "POST" && path === "/api/admin/create-patient") {
    await handleCreatePatient(req, res, deps);
  } else if (method === "DELETE" && path === "/api/admin/delete-patient") {
    await handleDeletePatient(res, url.searchParams, deps);
  } else {
    return false;
  }
  return true;
}

function decodeSegment(raw: string): string {
  try {
    return decodeURIComponent(raw);
  } catch {
    throw new UserError(ErrorCodes.INVALID_PATIENT_ID, `pid is not a valid path segment: "${raw}"`);
  }
}

function sendDocument(res: ServerResponse, content: DocumentContent): void {
  switch (content.kind) {
    case "json":
      sendJson(res, 200, content.value);
      return;
    case "text":
      sendBytes(res, 200, `${content.contentType}; charset=utf-8`, content.text);
      return;
    case "image":
    case "binary":
      sendBytes(res, 200, content.contentType, content.data);
      return;
  }
}

async function handleGetPatientFile(
  req: IncomingMessage,
  res: ServerResponse,
  deps: DocumentRouteDeps,
): Promise<void> {
  const body = await readJsonBody(req, deps.maxBodyBytes);
  const pid = validatePatientId(body["pid"]);
  const fileName = validateFileName(body["file_name"]);

  const result = await deps.documents.get(pid, fileName);
  if (!result.ok) {
    const path = deps.documents.keyFor(pid, fileName);
    deps.logger.warn("File not found", { code: ErrorCodes.DOCUMENT_NOT_FOUND, path });
    sendJson(res, 404, { error: "File not found", path });
    return;
  }
  sendDocument(res, result.value);
}

async function handleListFiles(
  res: ServerResponse,
  rawPid: string,
  deps: DocumentRouteDeps,
): Promise<void> {
  const pid = validatePatientId(rawPid);
  const files = await deps.documents.list(pid);
  sendJson(res, 200, {
    files: files.map((f) => ({
      name: f.name,
      full_path: f.fullPath,
      size: f.size,
      updated: f.updated ? f.updated.toISOString() : null,
    })),
  });
}

async function handleSaveFile(
  req: IncomingMessage,
  res: ServerResponse,
  deps: DocumentRouteDeps,
): Promise<void> {
  const body = await readJsonBody(req, deps.maxBodyBytes);
  const pid = validatePatientId(body["pid"]);
  const fileName = validateFileName(body["file_name"]);
  const content = requireString(body["content"], "content");

  const saved = await deps.documents.put(pid, fileName, content);
  sendJson(res, 200, { message: "File saved successfully", path: saved.path });
}

async function handleDeleteFile(
  res: ServerResponse,
  query: URLSearchParams,
  deps: DocumentRouteDeps,
): Promise<void> {
  const pid = validatePatientId(query.get("pid"));
  const fileName = validateFileName(query.get("file_name"));

  const result = await deps.documents.delete(pid, fileName);
  if (!result.ok) {
    deps.logger.warn("File not found", { code: ErrorCodes.DOCUMENT_NOT_FOUND, pid, fileName });
    sendJson(res, 404, { error: "File not found" });
    return;
  }
  sendJson(res, 200, { message: "File deleted successfully" });
}

async function handleListPatients(
  res: ServerResponse,
  deps: DocumentRouteDeps,
): Promise<void> {
  const patients = await deps.documents.listPatients();
  sendJson(res, 200, { patients });
}

async function handleCreatePatient(
  req: IncomingMessage,
  res: ServerResponse,
  deps: DocumentRouteDeps,
): Promise<void> {
  const body = await readJsonBody(req, deps.maxBodyBytes);
  const pid = validatePatientId(body["pid"]);

  const result = await deps.documents.createPatient(pid);
  if (!result.ok) {
    deps.logger.warn("Patient already exists", { code: ErrorCodes.PATIENT_ALREADY_EXISTS, pid });
    sendJson(res, 400, { error: "Patient already exists" });
    return;
  }
  deps.logger.info("Patient folder created", { pid });
  sendJson(res, 200, { message: "Patient created", pid });
}

async function handleDeletePatient(
  res: ServerResponse,
  query: URLSearchParams,
  deps: DocumentRouteDeps,
): Promise<void> {
  const pid = validatePatientId(query.get("pid"));

  const result = await deps.documents.deletePatient(pid);
  if (!result.ok) {
    deps.logger.warn("Patient not found", { code: ErrorCodes.PATIENT_NOT_FOUND, pid });
    sendJson(res, 404, { error: "Patient not found" });
    return;
  }
  sendJson(res, 200, {
    message: `Deleted ${result.value.deleted} files for patient ${pid}`,
  });
}
