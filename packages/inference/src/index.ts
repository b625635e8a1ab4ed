export type { IInferenceBackend, GenerateRequest, GenerateResponse } from "./backend.interface.js";
export { OllamaBackend, normalizeOllamaBaseUrl, OLLAMA_DEFAULT_BASE } from "./ollama-backend.js";
export { InferenceClient } from "./inference-client.js";
export type { InferenceClientConfig, InferenceDefaults } from "./inference-client.js";
