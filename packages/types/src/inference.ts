export interface InferenceOptions {
  temperature?: number;
  maxTokens?: number;
  timeoutMs?: number;
  signal?: AbortSignal;
}

export interface InferenceUsage {
  promptTokens: number;
  completionTokens: number;
}

export type InferenceResult =
  | {
      ok: true;
      text: string;
      model: string;
      usage: InferenceUsage;
      latencyMs: number;
      attempts: number;
    }
  | {
      ok: false;
      cause: Error;
      latencyMs: number;
      attempts: number;
    };
