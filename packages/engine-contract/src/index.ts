/**
 * @clinic-relay/engine-contract: recognition engine and transcriber interfaces.
 */

export type {
  EventSink,
  EngineInit,
  RecognitionEngine,
  EngineFactory,
} from "./engine.js";
export type {
  TranscriptionRequest,
  TranscriptionResult,
  TranscriberHealth,
  Transcriber,
} from "./transcriber.js";
