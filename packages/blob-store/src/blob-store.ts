/**
 * Blob Store Adapter contract.
 *
 * Uniform get/put/list/delete over a prefix-addressed key space.
 * No business logic lives behind this interface.
 */

import type { BlobObject } from "@clinic-relay/shared-types";

/** Health status of a blob backend. */
export interface BlobStoreHealth {
  readonly healthy: boolean;
  readonly message: string;
  readonly latencyMs: number;
}

export interface BlobStore {
  /** Human-readable backend name for logs. */
  readonly name: string;

  /** Read a blob; `null` when no blob exists at `key`. */
  get(key: string): Promise<Buffer | null>;

  /** Create or overwrite the blob at `key`. */
  put(key: string, data: Buffer, contentType: string): Promise<void>;

  /** Every blob whose key starts with `prefix`, in key order. */
  list(prefix: string): Promise<BlobObject[]>;

  /** Delete one blob; resolves `false` when it did not exist. */
  delete(key: string): Promise<boolean>;

  /**
   * Delete several blobs in one bulk call. Not atomic: resolves with the
   * number actually deleted; per-key failures are not reported individually.
   */
  deleteMany(keys: readonly string[]): Promise<number>;

  /** Whether the backend is reachable. */
  healthCheck(): Promise<BlobStoreHealth>;
}
