/**
 * @clinic-relay/shared-types: canonical domain types for the clinic relay.
 */

export {
  type Brand,
  type PatientId,
  type SessionId,
  type RequestId,
  createSessionId,
  createRequestId,
  createPatientId,
} from "./branded.js";

export {
  RelayError,
  UserError,
  OperatorError,
  ErrorCodes,
  describeError,
  type ErrorCode,
} from "./errors.js";

export type {
  SessionState,
  SessionVariantName,
  StartControl,
  StopControl,
  UnknownControl,
  ControlMessage,
  SystemMessage,
  RecognitionEvent,
  OutboundFrame,
} from "./session.js";

export type {
  BlobObject,
  MediaKind,
  DocumentContent,
  DocumentSummary,
  DocumentError,
  DocumentResult,
} from "./documents.js";

export type {
  RelayConfig,
  ServerConfig,
  StorageBackend,
  StorageConfig,
  SessionConfig,
  TranscriptionConfig,
  PlaybackConfig,
} from "./config.js";
