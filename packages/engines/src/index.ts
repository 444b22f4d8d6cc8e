/**
 * @clinic-relay/engines: concrete recognition engines.
 */

export {
  TranscriptionEngine,
  type TranscriptionEngineOptions,
} from "./transcription-engine.js";
export {
  ScriptedPlaybackEngine,
  parseScript,
  type ScriptTurn,
  type ScriptedPlaybackOptions,
} from "./scripted-playback-engine.js";
export {
  encodeWav,
  bytesForDuration,
  blockAlign,
  PCM16_MONO_16K,
  type PcmFormat,
} from "./wav.js";
