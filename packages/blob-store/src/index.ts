/**
 * @clinic-relay/blob-store: prefix-addressed blob storage adapters.
 */

export type { BlobStore, BlobStoreHealth } from "./blob-store.js";
export { MemoryBlobStore } from "./memory-blob-store.js";
export {
  CloudBlobStore,
  openCloudBucket,
  type StorageBucket,
  type StorageFile,
  type CloudBucketOptions,
} from "./cloud-blob-store.js";
export { withRetry, isTransient, DEFAULT_RETRY_OPTIONS, type RetryOptions } from "./retry.js";
