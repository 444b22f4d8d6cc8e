/**
 * Media-kind dispatch by file-name extension.
 *
 *   json          → parsed JSON
 *   md, txt       → text
 *   png, jpg/jpeg → image bytes
 *   anything else → opaque bytes
 */

import type { DocumentContent, MediaKind } from "@clinic-relay/shared-types";
import { OperatorError, ErrorCodes, describeError } from "@clinic-relay/shared-types";

export interface MediaType {
  readonly kind: MediaKind;
  readonly contentType: DocumentContent["contentType"];
}

const BY_EXTENSION: Readonly<Record<string, MediaType>> = {
  json: { kind: "json", contentType: "application/json" },
  md: { kind: "text", contentType: "text/markdown" },
  txt: { kind: "text", contentType: "text/markdown" },
  png: { kind: "image", contentType: "image/png" },
  jpg: { kind: "image", contentType: "image/jpeg" },
  jpeg: { kind: "image", contentType: "image/jpeg" },
};

const OPAQUE: MediaType = { kind: "binary", contentType: "application/octet-stream" };

/** Lower-cased text after the last dot; the whole name when there is no dot. */
export function extensionOf(fileName: string): string {
  return fileName.toLowerCase().split(".").pop() ?? "";
}

export function mediaTypeOf(fileName: string): MediaType {
  return BY_EXTENSION[extensionOf(fileName)] ?? OPAQUE;
}

/**
 * Decode stored bytes according to the file's media kind.
 * @throws OperatorError(DOCUMENT_UNREADABLE) when a `.json` blob does not parse
 */
export function decodeDocument(fileName: string, data: Buffer): DocumentContent {
  const { kind } = mediaTypeOf(fileName);
  switch (kind) {
    case "json": {
      try {
        const value: unknown = JSON.parse(data.toString("utf-8"));
        return { kind, contentType: "application/json", value };
      } catch (err) {
        throw new OperatorError(
          ErrorCodes.DOCUMENT_UNREADABLE,
          `Stored JSON document is not valid JSON: ${fileName}`,
          describeError(err),
        );
      }
    }
    case "text":
      return { kind, contentType: "text/markdown", text: data.toString("utf-8") };
    case "image":
      return {
        kind,
        contentType: extensionOf(fileName) === "png" ? "image/png" : "image/jpeg",
        data,
      };
    case "binary":
      return { kind, contentType: "application/octet-stream", data };
  }
}

/** Encode caller content for storage. Strings are stored as UTF-8. */
export function encodeDocument(content: string | Buffer): Buffer {
  return typeof content === "string" ? Buffer.from(content, "utf-8") : content;
}
