/**
 * Document store types.
 *
 * A document is one blob at `<root>/<patientId>/<fileName>`.
 */

import type { PatientId } from "./branded.js";

// ── Blobs ──

/** Metadata for one object in the blob store. */
export interface BlobObject {
  /** Full key, e.g. `patient_profile/P0001/patient_info.md`. */
  readonly key: string;
  /** Size in bytes. */
  readonly size: number;
  /** Last modification time, when the backend reports one. */
  readonly updated: Date | null;
}

// ── Media kinds ──

/** Media kind inferred from the file-name extension. */
export type MediaKind = "json" | "text" | "image" | "binary";

/** Decoded document content, discriminated by media kind. */
export type DocumentContent =
  | {
      readonly kind: "json";
      readonly contentType: "application/json";
      readonly value: unknown;
    }
  | {
      readonly kind: "text";
      readonly contentType: "text/markdown";
      readonly text: string;
    }
  | {
      readonly kind: "image";
      readonly contentType: "image/png" | "image/jpeg";
      readonly data: Buffer;
    }
  | {
      readonly kind: "binary";
      readonly contentType: "application/octet-stream";
      readonly data: Buffer;
    };

// ── Listings ──

/** One entry of a patient folder listing. */
export interface DocumentSummary {
  /** File name with the patient prefix stripped. */
  readonly name: string;
  /** Full blob key. */
  readonly fullPath: string;
  readonly size: number;
  readonly updated: Date | null;
}

// ── Results ──

export type DocumentError =
  | { readonly kind: "document-not-found"; readonly path: string }
  | { readonly kind: "patient-already-exists"; readonly patientId: PatientId }
  | { readonly kind: "patient-not-found"; readonly patientId: PatientId };

/** Typed outcome of a document store operation. */
export type DocumentResult<T> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: DocumentError };
