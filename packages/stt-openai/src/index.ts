export { OpenAITranscriber, type OpenAITranscriberConfig } from "./openai-transcriber.js";
