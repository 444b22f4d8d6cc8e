/**
 * Cloud Storage blob store, reached through the Firebase Admin SDK.
 *
 * The adapter depends on the narrow `StorageBucket` shape below rather than
 * on the SDK's `Bucket` class, so tests can hand it an in-process bucket.
 */

import { applicationDefault, getApps, initializeApp, type AppOptions } from "firebase-admin/app";
import { getStorage } from "firebase-admin/storage";
import type { BlobObject } from "@clinic-relay/shared-types";
import { OperatorError, ErrorCodes, describeError } from "@clinic-relay/shared-types";
import type { Logger } from "@clinic-relay/logging";
import type { BlobStore, BlobStoreHealth } from "./blob-store.js";
import { withRetry, type RetryOptions } from "./retry.js";

/** The subset of a Cloud Storage file object the adapter uses. */
export interface StorageFile {
  readonly name: string;
  readonly metadata: {
    readonly size?: string | number | undefined;
    readonly updated?: string | undefined;
  };
  download(): Promise<[Buffer]>;
  save(data: Buffer, options: { contentType: string; resumable: boolean }): Promise<void>;
  delete(): Promise<unknown>;
}

/** The subset of a Cloud Storage bucket the adapter uses. */
export interface StorageBucket {
  readonly name: string;
  file(name: string): StorageFile;
  getFiles(query: { prefix: string; autoPaginate: boolean }): Promise<[StorageFile[], ...unknown[]]>;
  exists(): Promise<[boolean]>;
}

export interface CloudBucketOptions {
  readonly bucket: string;
  readonly projectId?: string | undefined;
}

/**
 * Open a bucket with Application Default Credentials.
 * Reuses the first initialized Firebase app when one exists.
 */
export function openCloudBucket(options: CloudBucketOptions): StorageBucket {
  const appOptions: AppOptions = {
    credential: applicationDefault(),
    storageBucket: options.bucket,
    ...(options.projectId ? { projectId: options.projectId } : {}),
  };
  const app = getApps()[0] ?? initializeApp(appOptions);
  return getStorage(app).bucket(options.bucket);
}

/** Deletes in flight at once during `deleteMany`. */
export const DELETE_BATCH_SIZE = 10;

/** Whether a storage API error reports a missing object. */
function isNotFound(err: unknown): boolean {
  return err instanceof Error && Reflect.get(err, "code") === 404;
}

function toBlobObject(file: StorageFile): BlobObject {
  const { size, updated } = file.metadata;
  return {
    key: file.name,
    size: size === undefined ? 0 : Number(size),
    updated: updated ? new Date(updated) : null,
  };
}

export class CloudBlobStore implements BlobStore {
  readonly name: string;

  private readonly bucket: StorageBucket;
  private readonly log: Logger;
  private readonly retry: Partial<RetryOptions>;

  constructor(bucket: StorageBucket, logger: Logger, retry: Partial<RetryOptions> = {}) {
    this.bucket = bucket;
    this.name = `gcs:${bucket.name}`;
    this.log = logger.child({ component: "cloud-blob-store", bucket: bucket.name });
    this.retry = retry;
  }

  async get(key: string): Promise<Buffer | null> {
    try {
      const [data] = await withRetry(() => this.bucket.file(key).download(), this.retry);
      return data;
    } catch (err) {
      if (isNotFound(err)) return null;
      throw this.unavailable("download", key, err);
    }
  }

  async put(key: string, data: Buffer, contentType: string): Promise<void> {
    await this.call("save", key, () =>
      this.bucket.file(key).save(data, { contentType, resumable: false }),
    );
    this.log.debug("Blob saved", { key, bytes: data.length, contentType });
  }

  async list(prefix: string): Promise<BlobObject[]> {
    return this.call("list", prefix, async () => {
      const [files] = await this.bucket.getFiles({ prefix, autoPaginate: true });
      return files.map(toBlobObject);
    });
  }

  async delete(key: string): Promise<boolean> {
    try {
      await withRetry(() => this.bucket.file(key).delete(), this.retry);
      return true;
    } catch (err) {
      if (isNotFound(err)) return false;
      throw this.unavailable("delete", key, err);
    }
  }

  async deleteMany(keys: readonly string[]): Promise<number> {
    let deleted = 0;
    for (let start = 0; start < keys.length; start += DELETE_BATCH_SIZE) {
      const batch = keys.slice(start, start + DELETE_BATCH_SIZE);
      const outcomes = await Promise.allSettled(batch.map((key) => this.delete(key)));
      for (const [index, outcome] of outcomes.entries()) {
        if (outcome.status === "fulfilled") {
          if (outcome.value) deleted++;
        } else {
          this.log.warn("Bulk delete left a blob behind", {
            key: batch[index],
            error: describeError(outcome.reason),
          });
        }
      }
    }
    return deleted;
  }

  async healthCheck(): Promise<BlobStoreHealth> {
    const startMs = Date.now();
    try {
      const [exists] = await this.bucket.exists();
      return {
        healthy: exists,
        message: exists ? "Bucket reachable" : `Bucket ${this.bucket.name} does not exist`,
        latencyMs: Date.now() - startMs,
      };
    } catch (err) {
      return {
        healthy: false,
        message: `Storage unreachable: ${describeError(err)}`,
        latencyMs: Date.now() - startMs,
      };
    }
  }

  // ── Private ──

  private async call<T>(op: string, key: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await withRetry(fn, this.retry);
    } catch (err) {
      throw this.unavailable(op, key, err);
    }
  }

  private unavailable(op: string, key: string, err: unknown): OperatorError {
    return new OperatorError(
      ErrorCodes.STORAGE_UNAVAILABLE,
      "Storage request failed",
      `${op} ${this.bucket.name}/${key}: ${describeError(err)}`,
      { cause: err },
    );
  }
}
