import { z } from "zod";
import { AppError, BackendUnavailableError } from "@docguard/errors";
import type { GenerateRequest, GenerateResponse, IInferenceBackend } from "./backend.interface.js";

export const OLLAMA_DEFAULT_BASE = "http://localhost:11434";

/**
 * Accepts the forms people paste into config (`host:port/`, `.../v1`,
 * `.../api`) and returns the bare server origin.
 */
export function normalizeOllamaBaseUrl(baseUrl: string): string {
  return baseUrl
    .trim()
    .replace(/\/+$/, "")
    .replace(/\/(v1|api)$/, "");
}

const generateChunkSchema = z.object({
  model: z.string().optional(),
  response: z.string().default(""),
  done: z.boolean().default(false),
  prompt_eval_count: z.number().optional(),
  eval_count: z.number().optional(),
  error: z.string().optional(),
});

type GenerateChunk = z.infer<typeof generateChunkSchema>;

export class OllamaBackend implements IInferenceBackend {
  readonly name = "ollama";
  readonly baseUrl: string;

  constructor(baseUrl: string = OLLAMA_DEFAULT_BASE) {
    this.baseUrl = normalizeOllamaBaseUrl(baseUrl);
  }

  async generate(request: GenerateRequest): Promise<GenerateResponse> {
    const response = await this.post(request, false);
    const body = await response.text().catch((error: unknown) => {
      throw new BackendUnavailableError(`Ollama response from ${this.baseUrl} was interrupted`, this.name, {
        cause: error,
      });
    });
    const chunk = this.parseChunk(body);

    return {
      text: chunk.response,
      model: chunk.model ?? request.model,
      usage: {
        promptTokens: chunk.prompt_eval_count ?? 0,
        completionTokens: chunk.eval_count ?? 0,
      },
    };
  }

  async *generateStream(request: GenerateRequest): AsyncGenerator<string> {
    const response = await this.post(request, true);
    if (!response.body) {
      throw new BackendUnavailableError(`Ollama at ${this.baseUrl} returned no body`, this.name);
    }

    const reader = response.body.getReader();
    const decoder = new TextDecoder();
    let buffer = "";

    try {
      while (true) {
        const result = await reader.read().catch((error: unknown) => {
          throw new BackendUnavailableError(`Ollama stream from ${this.baseUrl} was interrupted`, this.name, {
            cause: error,
          });
        });

        buffer += result.done ? decoder.decode() : decoder.decode(result.value, { stream: true });

        let newlineIndex = buffer.indexOf("\n");
        while (newlineIndex !== -1) {
          const line = buffer.slice(0, newlineIndex).trim();
          buffer = buffer.slice(newlineIndex + 1);
          if (line) {
            const chunk = this.parseChunk(line);
            if (chunk.response) yield chunk.response;
            if (chunk.done) return;
          }
          newlineIndex = buffer.indexOf("\n");
        }

        if (result.done) break;
      }

      const tail = buffer.trim();
      if (tail) {
        const chunk = this.parseChunk(tail);
        if (chunk.response) yield chunk.response;
        if (chunk.done) return;
      }
      throw new BackendUnavailableError(`Ollama stream from ${this.baseUrl} ended before completion`, this.name);
    } finally {
      reader.releaseLock();
    }
  }

  async healthCheck(): Promise<boolean> {
    try {
      const response = await fetch(`${this.baseUrl}/api/tags`, {
        signal: AbortSignal.timeout(5_000),
      });
      return response.ok;
    } catch {
      return false;
    }
  }

  private async post(request: GenerateRequest, stream: boolean): Promise<Response> {
    let response: Response;
    try {
      response = await fetch(`${this.baseUrl}/api/generate`, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({
          model: request.model,
          prompt: request.prompt,
          stream,
          options: {
            temperature: request.temperature,
            num_predict: request.maxTokens,
          },
        }),
        signal: request.signal,
      });
    } catch (error: unknown) {
      throw new BackendUnavailableError(`Ollama unreachable at ${this.baseUrl}`, this.name, { cause: error });
    }

    if (response.status >= 500) {
      throw new BackendUnavailableError(
        `Ollama generate failed: ${String(response.status)} ${response.statusText}`,
        this.name,
      );
    }
    if (!response.ok) {
      throw new AppError({
        message: `Ollama rejected the generate request: ${String(response.status)} ${response.statusText}`,
        statusCode: 422,
        code: "INFERENCE_REJECTED",
      });
    }
    return response;
  }

  private parseChunk(raw: string): GenerateChunk {
    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error: unknown) {
      throw new BackendUnavailableError(`Ollama at ${this.baseUrl} sent malformed JSON`, this.name, {
        cause: error,
      });
    }
    const chunk = generateChunkSchema.parse(json);
    if (chunk.error !== undefined) {
      throw new BackendUnavailableError(`Ollama reported an error: ${chunk.error}`, this.name);
    }
    return chunk;
  }
}
