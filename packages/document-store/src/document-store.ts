/**
 * Document Store: per-patient files over a prefix-addressed blob store.
 *
 * A document `(patientId, fileName)` lives at `<root>/<patientId>/<fileName>`.
 * Patient folders are not stored: a patient exists iff at least one blob
 * sits under `<root>/<patientId>/`. Listing, creation and deletion all read
 * that same predicate.
 *
 * Not-found / already-exists outcomes are returned as `DocumentResult`
 * values. Backend failures surface as `OperatorError(STORAGE_UNAVAILABLE)`
 * from the blob store.
 */

import type {
  PatientId,
  DocumentContent,
  DocumentResult,
  DocumentSummary,
} from "@clinic-relay/shared-types";
import type { BlobStore } from "@clinic-relay/blob-store";
import type { Logger } from "@clinic-relay/logging";
import { decodeDocument, encodeDocument, mediaTypeOf } from "./media-kind.js";

export interface DocumentStoreOptions {
  /** Root prefix, without trailing slash (e.g. `patient_profile`). */
  readonly rootPrefix: string;
  /** Seed document written by `createPatient`. */
  readonly seedFileName: string;
  readonly seedContent: string;
}

export const DEFAULT_DOCUMENT_STORE_OPTIONS: DocumentStoreOptions = {
  rootPrefix: "patient_profile",
  seedFileName: "patient_info.md",
  seedContent: "# Patient Profile\nName: \nAge: ",
};

export class DocumentStore {
  private readonly blobs: BlobStore;
  private readonly log: Logger;
  private readonly options: DocumentStoreOptions;

  constructor(blobs: BlobStore, logger: Logger, options: Partial<DocumentStoreOptions> = {}) {
    this.blobs = blobs;
    this.options = { ...DEFAULT_DOCUMENT_STORE_OPTIONS, ...options };
    this.log = logger.child({ component: "document-store", backend: blobs.name });
  }

  /** Blob key for one document. Total and deterministic. */
  keyFor(patientId: PatientId, fileName: string): string {
    return `${this.patientPrefix(patientId)}${fileName}`;
  }

  /** Prefix shared by every blob of one patient, with trailing slash. */
  patientPrefix(patientId: PatientId): string {
    return `${this.options.rootPrefix}/${patientId}/`;
  }

  async get(
    patientId: PatientId,
    fileName: string,
  ): Promise<DocumentResult<DocumentContent>> {
    const path = this.keyFor(patientId, fileName);
    const data = await this.blobs.get(path);
    if (data === null) {
      this.log.warn("Document not found", { path });
      return { ok: false, error: { kind: "document-not-found", path } };
    }
    return { ok: true, value: decodeDocument(fileName, data) };
  }

  /** Raw UTF-8 text of a document, regardless of its extension. */
  async getText(patientId: PatientId, fileName: string): Promise<DocumentResult<string>> {
    const path = this.keyFor(patientId, fileName);
    const data = await this.blobs.get(path);
    if (data === null) {
      return { ok: false, error: { kind: "document-not-found", path } };
    }
    return { ok: true, value: data.toString("utf-8") };
  }

  /** Create or overwrite. Last write wins. */
  async put(
    patientId: PatientId,
    fileName: string,
    content: string | Buffer,
  ): Promise<{ readonly path: string }> {
    const path = this.keyFor(patientId, fileName);
    const data = encodeDocument(content);
    await this.blobs.put(path, data, mediaTypeOf(fileName).contentType);
    this.log.info("Document saved", { path, bytes: data.length });
    return { path };
  }

  async list(patientId: PatientId): Promise<DocumentSummary[]> {
    const prefix = this.patientPrefix(patientId);
    const blobs = await this.blobs.list(prefix);
    const summaries: DocumentSummary[] = [];
    for (const blob of blobs) {
      const name = blob.key.slice(prefix.length);
      // The bare prefix is a directory marker, not a document.
      if (name.length === 0) continue;
      summaries.push({ name, fullPath: blob.key, size: blob.size, updated: blob.updated });
    }
    return summaries;
  }

  async delete(
    patientId: PatientId,
    fileName: string,
  ): Promise<DocumentResult<{ readonly path: string }>> {
    const path = this.keyFor(patientId, fileName);
    const deleted = await this.blobs.delete(path);
    if (!deleted) {
      return { ok: false, error: { kind: "document-not-found", path } };
    }
    this.log.info("Document deleted", { path });
    return { ok: true, value: { path } };
  }

  async patientExists(patientId: PatientId): Promise<boolean> {
    const blobs = await this.blobs.list(this.patientPrefix(patientId));
    return blobs.length > 0;
  }

  /** Create a patient folder by writing the seed document. */
  async createPatient(
    patientId: PatientId,
  ): Promise<DocumentResult<{ readonly path: string }>> {
    if (await this.patientExists(patientId)) {
      return { ok: false, error: { kind: "patient-already-exists", patientId } };
    }
    const saved = await this.put(patientId, this.options.seedFileName, this.options.seedContent);
    this.log.info("Patient created", { patientId });
    return { ok: true, value: saved };
  }

  /** Delete every blob under the patient's prefix in one bulk call. */
  async deletePatient(
    patientId: PatientId,
  ): Promise<DocumentResult<{ readonly deleted: number }>> {
    const blobs = await this.blobs.list(this.patientPrefix(patientId));
    if (blobs.length === 0) {
      return { ok: false, error: { kind: "patient-not-found", patientId } };
    }
    const deleted = await this.blobs.deleteMany(blobs.map((b) => b.key));
    if (deleted < blobs.length) {
      this.log.warn("Patient deletion was partial", {
        patientId,
        expected: blobs.length,
        deleted,
      });
    }
    this.log.info("Patient deleted", { patientId, deleted });
    return { ok: true, value: { deleted } };
  }

  /** Distinct first-level folder names under the root prefix, sorted. */
  async listPatients(): Promise<string[]> {
    const root = `${this.options.rootPrefix}/`;
    const blobs = await this.blobs.list(root);
    const patients = new Set<string>();
    for (const blob of blobs) {
      const rest = blob.key.slice(root.length);
      const slash = rest.indexOf("/");
      // Blobs directly under the root belong to no patient.
      if (slash > 0) patients.add(rest.slice(0, slash));
    }
    return [...patients].sort();
  }
}
