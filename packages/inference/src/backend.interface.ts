import type { InferenceUsage } from "@docguard/types";

export interface GenerateRequest {
  model: string;
  prompt: string;
  temperature: number;
  maxTokens: number;
  signal: AbortSignal;
}

export interface GenerateResponse {
  text: string;
  model: string;
  usage: InferenceUsage;
}

/**
 * One model-serving host. Backends make exactly one request per call and
 * throw `BackendUnavailableError` for timeouts, connection failures and 5xx
 * responses; retrying and host failover belong to the client.
 */
export interface IInferenceBackend {
  readonly name: string;
  readonly baseUrl: string;

  generate(request: GenerateRequest): Promise<GenerateResponse>;
  /** Finite stream of text fragments; ends when the model reports `done`. */
  generateStream(request: GenerateRequest): AsyncIterable<string>;
  healthCheck(): Promise<boolean>;
}
