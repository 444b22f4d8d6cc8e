/**
 * In-process blob store. Used for local development (`STORAGE_BACKEND=memory`)
 * and as the storage stand-in in tests.
 */

import type { BlobObject } from "@clinic-relay/shared-types";
import type { BlobStore, BlobStoreHealth } from "./blob-store.js";

interface StoredBlob {
  readonly data: Buffer;
  readonly contentType: string;
  readonly updated: Date;
}

export class MemoryBlobStore implements BlobStore {
  readonly name = "memory";

  private readonly blobs = new Map<string, StoredBlob>();

  async get(key: string): Promise<Buffer | null> {
    const blob = this.blobs.get(key);
    return blob ? Buffer.from(blob.data) : null;
  }

  async put(key: string, data: Buffer, contentType: string): Promise<void> {
    // Copy so later mutation of the caller's buffer cannot leak in.
    this.blobs.set(key, {
      data: Buffer.from(data),
      contentType,
      updated: new Date(),
    });
  }

  async list(prefix: string): Promise<BlobObject[]> {
    return [...this.blobs.entries()]
      .filter(([key]) => key.startsWith(prefix))
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([key, blob]) => ({
        key,
        size: blob.data.length,
        updated: blob.updated,
      }));
  }

  async delete(key: string): Promise<boolean> {
    return this.blobs.delete(key);
  }

  async deleteMany(keys: readonly string[]): Promise<number> {
    let deleted = 0;
    for (const key of keys) {
      if (this.blobs.delete(key)) deleted++;
    }
    return deleted;
  }

  async healthCheck(): Promise<BlobStoreHealth> {
    return { healthy: true, message: "In-memory store", latencyMs: 0 };
  }

  /** Content type recorded at `put` time. */
  contentTypeOf(key: string): string | undefined {
    return this.blobs.get(key)?.contentType;
  }
}
