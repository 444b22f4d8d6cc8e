import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { DocumentStore } from "./document-store.js";
import { MemoryBlobStore } from "@clinic-relay/blob-store";
import { Logger } from "@clinic-relay/logging";
import {
  OperatorError,
  ErrorCodes,
  createPatientId,
} from "@clinic-relay/shared-types";

const P1 = createPatientId("P0001");
const P2 = createPatientId("P0002");

describe("DocumentStore", () => {
  let blobs: MemoryBlobStore;
  let store: DocumentStore;

  beforeEach(() => {
    vi.spyOn(process.stdout, "write").mockReturnValue(true);
    vi.spyOn(process.stderr, "write").mockReturnValue(true);
    blobs = new MemoryBlobStore();
    store = new DocumentStore(blobs, new Logger());
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe("keys", () => {
    it("addresses documents under root/patient/file", () => {
      expect(store.keyFor(P1, "patient_info.md")).toBe("patient_profile/P0001/patient_info.md");
      expect(store.patientPrefix(P1)).toBe("patient_profile/P0001/");
    });

    it("honours a custom root prefix", () => {
      const custom = new DocumentStore(blobs, new Logger(), { rootPrefix: "profiles" });
      expect(custom.keyFor(P2, "a.json")).toBe("profiles/P0002/a.json");
    });
  });

  describe("get / put", () => {
    it("round-trips JSON as a parsed value", async () => {
      const value = { name: "Test Patient", allergies: ["penicillin"], age: 42 };
      await store.put(P1, "record.json", JSON.stringify(value));

      const result = await store.get(P1, "record.json");
      expect(result).toEqual({
        ok: true,
        value: { kind: "json", contentType: "application/json", value },
      });
      expect(blobs.contentTypeOf("patient_profile/P0001/record.json")).toBe("application/json");
    });

    it("round-trips markdown and plain text as text", async () => {
      await store.put(P1, "notes.md", "# Notes\nfine");
      await store.put(P1, "notes.txt", "plain");

      expect(await store.get(P1, "notes.md")).toEqual({
        ok: true,
        value: { kind: "text", contentType: "text/markdown", text: "# Notes\nfine" },
      });
      expect(await store.get(P1, "notes.txt")).toEqual({
        ok: true,
        value: { kind: "text", contentType: "text/markdown", text: "plain" },
      });
    });

    it("round-trips image bytes untouched", async () => {
      const png = Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a, 0x00, 0xff]);
      await store.put(P1, "scan.png", png);

      const result = await store.get(P1, "scan.png");
      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.value.kind).toBe("image");
      expect(result.value.contentType).toBe("image/png");
      if (result.value.kind === "image") {
        expect(result.value.data.equals(png)).toBe(true);
      }
    });

    it("treats unknown extensions as opaque bytes", async () => {
      await store.put(P1, "blob.bin", Buffer.from([1, 2, 3]));

      const result = await store.get(P1, "blob.bin");
      expect(result.ok && result.value.contentType).toBe("application/octet-stream");
    });

    it("reports a missing document with its path", async () => {
      expect(await store.get(P1, "missing.md")).toEqual({
        ok: false,
        error: { kind: "document-not-found", path: "patient_profile/P0001/missing.md" },
      });
    });

    it("overwrites on a second put", async () => {
      await store.put(P1, "a.md", "first");
      await store.put(P1, "a.md", "second");

      expect(await store.getText(P1, "a.md")).toEqual({ ok: true, value: "second" });
    });

    it("raises DOCUMENT_UNREADABLE for a corrupt JSON blob", async () => {
      await store.put(P1, "bad.json", "{not json");

      const err = await store.get(P1, "bad.json").catch((e: unknown) => e);
      expect(err).toBeInstanceOf(OperatorError);
      expect(err).toMatchObject({ code: ErrorCodes.DOCUMENT_UNREADABLE });
    });
  });

  describe("list / delete", () => {
    it("lists file names with the prefix stripped", async () => {
      await store.put(P1, "b.md", "bb");
      await store.put(P1, "a.json", "{}");
      await store.put(P2, "other.md", "x");

      const files = await store.list(P1);
      expect(files.map((f) => [f.name, f.fullPath, f.size])).toEqual([
        ["a.json", "patient_profile/P0001/a.json", 2],
        ["b.md", "patient_profile/P0001/b.md", 2],
      ]);
    });

    it("skips the folder marker blob", async () => {
      await blobs.put("patient_profile/P0001/", Buffer.alloc(0), "application/x-directory");
      await store.put(P1, "a.md", "a");

      expect((await store.list(P1)).map((f) => f.name)).toEqual(["a.md"]);
    });

    it("returns an empty listing for an unknown patient", async () => {
      expect(await store.list(P2)).toEqual([]);
    });

    it("deletes a document and reports a second delete as not found", async () => {
      await store.put(P1, "a.md", "a");

      expect(await store.delete(P1, "a.md")).toEqual({
        ok: true,
        value: { path: "patient_profile/P0001/a.md" },
      });
      expect(await store.delete(P1, "a.md")).toEqual({
        ok: false,
        error: { kind: "document-not-found", path: "patient_profile/P0001/a.md" },
      });
    });
  });

  describe("patients", () => {
    it("creates a patient with the seed profile", async () => {
      const result = await store.createPatient(P1);

      expect(result).toEqual({
        ok: true,
        value: { path: "patient_profile/P0001/patient_info.md" },
      });
      expect(await store.getText(P1, "patient_info.md")).toEqual({
        ok: true,
        value: "# Patient Profile\nName: \nAge: ",
      });
    });

    it("refuses to create the same patient twice", async () => {
      await store.createPatient(P1);

      expect(await store.createPatient(P1)).toEqual({
        ok: false,
        error: { kind: "patient-already-exists", patientId: P1 },
      });
    });

    it("treats any blob under the prefix as an existing patient", async () => {
      await store.put(P1, "notes.txt", "x");

      const result = await store.createPatient(P1);
      expect(result.ok).toBe(false);
      expect(await store.getText(P1, "patient_info.md")).toEqual({
        ok: false,
        error: { kind: "document-not-found", path: "patient_profile/P0001/patient_info.md" },
      });
    });

    it("reports deleting a patient with no blobs as not found", async () => {
      expect(await store.deletePatient(P1)).toEqual({
        ok: false,
        error: { kind: "patient-not-found", patientId: P1 },
      });
    });

    it("deletes every blob of a patient and returns the count", async () => {
      await store.put(P1, "a.md", "a");
      await store.put(P1, "b.json", "{}");
      await store.put(P1, "c.png", Buffer.from([1]));
      await store.put(P2, "keep.md", "k");

      expect(await store.deletePatient(P1)).toEqual({ ok: true, value: { deleted: 3 } });
      expect(await store.list(P1)).toEqual([]);
      expect(await store.list(P2)).toHaveLength(1);
    });

    it("lists distinct patient folders and drops deleted ones", async () => {
      await store.createPatient(P2);
      await store.createPatient(P1);
      await store.put(P1, "extra.md", "x");
      await blobs.put("patient_profile/readme.txt", Buffer.from("root"), "text/plain");

      expect(await store.listPatients()).toEqual(["P0001", "P0002"]);

      await store.deletePatient(P1);
      expect(await store.listPatients()).toEqual(["P0002"]);
    });
  });
});
