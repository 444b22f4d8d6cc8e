/**
 * Integration test: document API over a real HTTP server on an ephemeral
 * port, backed by the in-memory blob store.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { createRelayServer, type RelayServer } from "../../services/relay-api/src/server.js";
import { loadConfig } from "../../services/relay-api/src/config-loader.js";
import { MemoryBlobStore } from "@clinic-relay/blob-store";
import { DocumentStore } from "@clinic-relay/document-store";
import { Logger } from "@clinic-relay/logging";
import { OperatorError, ErrorCodes } from "@clinic-relay/shared-types";

describe("Document API", () => {
  const logger = new Logger();
  let blobs: MemoryBlobStore;
  let relay: RelayServer | undefined;
  let baseUrl: string;

  async function startRelay(
    env: Record<string, string> = {},
    ready = true,
  ): Promise<void> {
    blobs = new MemoryBlobStore();
    relay = createRelayServer({
      documents: new DocumentStore(blobs, logger),
      blobs,
      variants: [],
      config: loadConfig({ STORAGE_BACKEND: "memory", MAX_BODY_BYTES: "1024", ...env }),
      logger,
      ready,
    });
    const http = relay.http;
    await new Promise<void>((resolve) => {
      http.listen(0, "127.0.0.1", resolve);
    });
    const addr = http.address();
    const port = typeof addr === "object" && addr !== null ? addr.port : 0;
    baseUrl = `http://127.0.0.1:${port}`;
  }

  function postJson(path: string, body: unknown): Promise<Response> {
    return fetch(`${baseUrl}${path}`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify(body),
    });
  }

  beforeEach(() => {
    vi.spyOn(process.stdout, "write").mockReturnValue(true);
    vi.spyOn(process.stderr, "write").mockReturnValue(true);
  });

  afterEach(async () => {
    const current = relay;
    relay = undefined;
    if (current) {
      await new Promise<void>((resolve) => {
        current.http.close(() => resolve());
        current.http.closeAllConnections();
      });
    }
    vi.restoreAllMocks();
  });

  describe("patients", () => {
    beforeEach(() => startRelay());

    it("creates a patient once and rejects a duplicate", async () => {
      const first = await postJson("/api/admin/create-patient", { pid: "P0001" });
      expect(first.status).toBe(200);
      expect(await first.json()).toEqual({ message: "Patient created", pid: "P0001" });

      const second = await postJson("/api/admin/create-patient", { pid: "P0001" });
      expect(second.status).toBe(400);
      expect(await second.json()).toEqual({ error: "Patient already exists" });
    });

    it("serves the seed profile of a new patient as markdown", async () => {
      await postJson("/api/admin/create-patient", { pid: "P0001" });

      const res = await postJson("/api/get-patient-file", {
        pid: "P0001",
        file_name: "patient_info.md",
      });
      expect(res.status).toBe(200);
      expect(res.headers.get("content-type")).toBe("text/markdown; charset=utf-8");
      expect(await res.text()).toBe("# Patient Profile\nName: \nAge: ");
    });

    it("lists patients and deletes one with a file count", async () => {
      await postJson("/api/admin/create-patient", { pid: "P0002" });
      await postJson("/api/admin/create-patient", { pid: "P0001" });
      await postJson("/api/admin/save-file", { pid: "P0001", file_name: "notes.txt", content: "x" });

      const listed = await fetch(`${baseUrl}/api/admin/list-patients`);
      expect(await listed.json()).toEqual({ patients: ["P0001", "P0002"] });

      const deleted = await fetch(`${baseUrl}/api/admin/delete-patient?pid=P0001`, {
        method: "DELETE",
      });
      expect(deleted.status).toBe(200);
      expect(await deleted.json()).toEqual({ message: "Deleted 2 files for patient P0001" });

      const again = await fetch(`${baseUrl}/api/admin/delete-patient?pid=P0001`, {
        method: "DELETE",
      });
      expect(again.status).toBe(404);
      expect(await again.json()).toEqual({ error: "Patient not found" });

      const after = await fetch(`${baseUrl}/api/admin/list-patients`);
      expect(await after.json()).toEqual({ patients: ["P0002"] });
    });
  });

  describe("files", () => {
    beforeEach(() => startRelay());

    it("saves a file and reports its path", async () => {
      const res = await postJson("/api/admin/save-file", {
        pid: "P0001",
        file_name: "notes.md",
        content: "# Visit",
      });
      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({
        message: "File saved successfully",
        path: "patient_profile/P0001/notes.md",
      });
    });

    it("returns a JSON document as parsed JSON", async () => {
      const script = [{ speaker: "Doctor", text: "Hello" }];
      await postJson("/api/admin/save-file", {
        pid: "P0001",
        file_name: "scenario_script.json",
        content: JSON.stringify(script),
      });

      const res = await postJson("/api/get-patient-file", {
        pid: "P0001",
        file_name: "scenario_script.json",
      });
      expect(res.headers.get("content-type")).toBe("application/json");
      expect(await res.json()).toEqual(script);
    });

    it("returns image bytes with the image content type", async () => {
      const jpeg = Buffer.from([0xff, 0xd8, 0xff, 0xe0, 0x00, 0x10]);
      await blobs.put("patient_profile/P0001/xray.jpg", jpeg, "image/jpeg");

      const res = await postJson("/api/get-patient-file", { pid: "P0001", file_name: "xray.jpg" });
      expect(res.headers.get("content-type")).toBe("image/jpeg");
      expect(Buffer.from(await res.arrayBuffer()).equals(jpeg)).toBe(true);
    });

    it("returns 404 with the blob path for a missing file", async () => {
      const res = await postJson("/api/get-patient-file", { pid: "P0001", file_name: "missing.md" });
      expect(res.status).toBe(404);
      expect(await res.json()).toEqual({
        error: "File not found",
        path: "patient_profile/P0001/missing.md",
      });
    });

    it("lists files with size and update time", async () => {
      await postJson("/api/admin/save-file", { pid: "P0001", file_name: "b.md", content: "bbb" });
      await postJson("/api/admin/save-file", { pid: "P0001", file_name: "a.json", content: "{}" });

      const res = await fetch(`${baseUrl}/api/admin/list-files/P0001`);
      const body = (await res.json()) as {
        files: Array<{ name: string; full_path: string; size: number; updated: unknown }>;
      };

      expect(body.files.map((f) => [f.name, f.full_path, f.size])).toEqual([
        ["a.json", "patient_profile/P0001/a.json", 2],
        ["b.md", "patient_profile/P0001/b.md", 3],
      ]);
      expect(typeof body.files[0]?.updated).toBe("string");
    });

    it("deletes a file and reports a second delete as not found", async () => {
      await postJson("/api/admin/save-file", { pid: "P0001", file_name: "a.md", content: "a" });

      const url = `${baseUrl}/api/admin/delete-file?pid=P0001&file_name=a.md`;
      const first = await fetch(url, { method: "DELETE" });
      expect(first.status).toBe(200);
      expect(await first.json()).toEqual({ message: "File deleted successfully" });

      const second = await fetch(url, { method: "DELETE" });
      expect(second.status).toBe(404);
      expect(await second.json()).toEqual({ error: "File not found" });
    });
  });

  describe("validation", () => {
    beforeEach(() => startRelay());

    it("rejects a patient id with a path separator", async () => {
      const res = await postJson("/api/admin/save-file", {
        pid: "P0001/../P0002",
        file_name: "a.md",
        content: "x",
      });
      expect(res.status).toBe(400);
      expect(await res.json()).toMatchObject({ code: ErrorCodes.INVALID_PATIENT_ID });
    });

    it("rejects a dot-segment file name", async () => {
      const res = await fetch(`${baseUrl}/api/admin/delete-file?pid=P0001&file_name=..`, {
        method: "DELETE",
      });
      expect(res.status).toBe(400);
      expect(await res.json()).toMatchObject({ code: ErrorCodes.INVALID_FILE_NAME });
    });

    it("rejects non-string content", async () => {
      const res = await postJson("/api/admin/save-file", {
        pid: "P0001",
        file_name: "a.md",
        content: 42,
      });
      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({
        error: "content must be a string.",
        code: ErrorCodes.INVALID_REQUEST,
      });
    });

    it("rejects a body that is not JSON", async () => {
      const res = await fetch(`${baseUrl}/api/admin/create-patient`, {
        method: "POST",
        body: "pid=P0001",
      });
      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({
        error: "Request body is not valid JSON",
        code: ErrorCodes.INVALID_REQUEST,
      });
    });

    it("keys names with surrounding whitespace apart from the bare name", async () => {
      await postJson("/api/admin/save-file", { pid: "P0001", file_name: "notes.md", content: "a" });
      const res = await postJson("/api/admin/save-file", {
        pid: "P0001",
        file_name: "notes.md ",
        content: "b",
      });

      expect(await res.json()).toEqual({
        message: "File saved successfully",
        path: "patient_profile/P0001/notes.md ",
      });
      expect((await blobs.list("")).map((b) => b.key)).toEqual([
        "patient_profile/P0001/notes.md",
        "patient_profile/P0001/notes.md ",
      ]);
    });

    it("fetches and deletes a listed name that starts with a space", async () => {
      await blobs.put("patient_profile/P0001/ spaced.md", Buffer.from("# Spaced"), "text/markdown");

      const listed = await fetch(`${baseUrl}/api/admin/list-files/P0001`);
      const { files } = (await listed.json()) as { files: Array<{ name: string }> };
      expect(files.map((f) => f.name)).toEqual([" spaced.md"]);

      const res = await postJson("/api/get-patient-file", { pid: "P0001", file_name: " spaced.md" });
      expect(res.status).toBe(200);
      expect(await res.text()).toBe("# Spaced");

      const del = await fetch(
        `${baseUrl}/api/admin/delete-file?pid=P0001&file_name=${encodeURIComponent(" spaced.md")}`,
        { method: "DELETE" },
      );
      expect(del.status).toBe(200);
      expect(await blobs.list("")).toEqual([]);
    });

    it("rejects a whitespace-only file name", async () => {
      const res = await postJson("/api/admin/save-file", {
        pid: "P0001",
        file_name: "   ",
        content: "x",
      });
      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({
        error: "file_name is required and cannot be empty.",
        code: ErrorCodes.INVALID_FILE_NAME,
      });
    });

    it("rejects a body over the size limit with 413", async () => {
      const res = await postJson("/api/admin/save-file", {
        pid: "P0001",
        file_name: "big.md",
        content: "x".repeat(2048),
      });
      expect(res.status).toBe(413);
      expect(await res.json()).toMatchObject({ code: ErrorCodes.PAYLOAD_TOO_LARGE });
    });
  });

  describe("failures and operations", () => {
    it("maps a storage failure to 500 without the operator detail", async () => {
      await startRelay();
      vi.spyOn(blobs, "list").mockRejectedValueOnce(
        new OperatorError(
          ErrorCodes.STORAGE_UNAVAILABLE,
          "Storage backend unavailable",
          "list clinic_sim/patient_profile/: connection reset",
        ),
      );

      const res = await fetch(`${baseUrl}/api/admin/list-patients`);
      expect(res.status).toBe(500);
      expect(await res.json()).toEqual({
        error: "Storage backend unavailable",
        code: ErrorCodes.STORAGE_UNAVAILABLE,
      });
    });

    it("answers liveness and readiness", async () => {
      await startRelay();

      const health = await fetch(`${baseUrl}/healthz`);
      expect(health.status).toBe(200);
      expect(await health.json()).toMatchObject({ status: "ok" });

      const ready = await fetch(`${baseUrl}/readyz`);
      expect(ready.status).toBe(200);
      expect(await ready.json()).toMatchObject({
        status: "ready",
        checks: { storage: { healthy: true } },
      });
    });

    it("gates everything but /healthz until ready", async () => {
      await startRelay({}, false);

      const gated = await fetch(`${baseUrl}/api/admin/list-patients`);
      expect(gated.status).toBe(503);
      expect(await gated.json()).toEqual({
        error: "Relay is starting up",
        code: ErrorCodes.NOT_READY,
      });

      const health = await fetch(`${baseUrl}/healthz`);
      expect(health.status).toBe(200);
    });

    it("returns 404 for an unknown route", async () => {
      await startRelay();
      const res = await fetch(`${baseUrl}/api/unknown`);
      expect(res.status).toBe(404);
      expect(await res.json()).toEqual({ error: "Not found" });
    });

    it("enforces the CORS allowlist", async () => {
      await startRelay({ CORS_ORIGINS: "https://clinic.test" });

      const rejected = await fetch(`${baseUrl}/api/admin/list-patients`, {
        headers: { Origin: "https://elsewhere.test" },
      });
      expect(rejected.status).toBe(403);
      expect(await rejected.json()).toEqual({
        error: "Origin not allowed",
        code: ErrorCodes.CORS_REJECTED,
      });

      const preflight = await fetch(`${baseUrl}/api/admin/delete-file`, {
        method: "OPTIONS",
        headers: { Origin: "https://clinic.test" },
      });
      expect(preflight.status).toBe(204);
      expect(preflight.headers.get("access-control-allow-origin")).toBe("https://clinic.test");
      expect(preflight.headers.get("access-control-allow-methods")).toBe(
        "GET, POST, DELETE, OPTIONS",
      );
    });
  });
});
