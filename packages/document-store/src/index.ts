/**
 * @clinic-relay/document-store: per-patient documents over a blob store.
 */

export {
  DocumentStore,
  DEFAULT_DOCUMENT_STORE_OPTIONS,
  type DocumentStoreOptions,
} from "./document-store.js";
export {
  mediaTypeOf,
  extensionOf,
  decodeDocument,
  encodeDocument,
  type MediaType,
} from "./media-kind.js";
