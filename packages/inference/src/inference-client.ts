import type CircuitBreaker from "opossum";
import type { InferenceOptions, InferenceResult } from "@docguard/types";
import type { Logger } from "@docguard/logger";
import {
  AppError,
  BackendUnavailableError,
  ConfigurationError,
  calculateDelay,
  createCircuitBreaker,
  isOpenCircuitError,
  sleep,
  withRetry,
} from "@docguard/errors";
import type { CircuitBreakerOptions } from "@docguard/errors";
import type { GenerateRequest, GenerateResponse, IInferenceBackend } from "./backend.interface.js";

export interface InferenceDefaults {
  temperature: number;
  maxTokens: number;
  timeoutMs: number;
}

export interface InferenceClientConfig {
  /** Tried in order on every attempt: primary host first, then fallbacks. */
  backends: IInferenceBackend[];
  model: string;
  defaults: InferenceDefaults;
  maxRetries: number;
  retryBaseDelayMs?: number;
  retryMaxDelayMs?: number;
  /** Omit to call the backends directly. */
  circuitBreaker?: CircuitBreakerOptions;
  logger: Logger;
}

const CIRCUIT_OPEN = "CIRCUIT_OPEN";

/** A call before it is bound to a backend; each backend call gets its own deadline. */
interface PendingCall {
  model: string;
  prompt: string;
  temperature: number;
  maxTokens: number;
  timeoutMs: number;
  signal?: AbortSignal;
}

function toUnavailable(error: unknown): BackendUnavailableError {
  if (error instanceof BackendUnavailableError) return error;
  const message = error instanceof Error ? error.message : "Inference backend unavailable";
  return new BackendUnavailableError(message, "inference", { cause: error });
}

/**
 * Single entry point to the model-serving backends. `complete` never throws
 * for backend trouble: once retries are exhausted it returns `{ ok: false }`.
 * The prompt is forwarded unchanged.
 */
export class InferenceClient {
  private readonly backends: IInferenceBackend[];
  private readonly breaker?: CircuitBreaker<[PendingCall], GenerateResponse>;
  private readonly logger: Logger;

  constructor(private readonly config: InferenceClientConfig) {
    if (config.backends.length === 0) {
      throw new ConfigurationError("InferenceClient needs at least one backend");
    }
    this.backends = config.backends;
    this.logger = config.logger;

    if (config.circuitBreaker) {
      this.breaker = createCircuitBreaker(
        "inference",
        (call: PendingCall) => this.walkBackends(call),
        { timeout: false, ...config.circuitBreaker },
        (name, state) => this.logger.warn({ breaker: name, state }, "Circuit breaker state changed"),
      );
    }
  }

  async complete(prompt: string, options: InferenceOptions = {}): Promise<InferenceResult> {
    const started = Date.now();
    let attempts = 0;

    try {
      const response = await withRetry(
        async () => {
          attempts++;
          return this.attempt(prompt, options);
        },
        {
          maxRetries: this.config.maxRetries,
          baseDelayMs: this.config.retryBaseDelayMs ?? 500,
          maxDelayMs: this.config.retryMaxDelayMs ?? 5_000,
          retryableErrors: ["BACKEND_UNAVAILABLE"],
          signal: options.signal,
          onRetry: (attempt, delayMs, error) => {
            this.logger.warn(
              { attempt, delayMs, err: error instanceof Error ? error.message : String(error) },
              "Inference attempt failed, retrying",
            );
          },
        },
      );

      return {
        ok: true,
        text: response.text,
        model: response.model,
        usage: response.usage,
        latencyMs: Date.now() - started,
        attempts,
      };
    } catch (error: unknown) {
      const cause = toUnavailable(error);
      this.logger.error({ attempts, err: cause.message }, "Inference unavailable after retries");
      return { ok: false, cause, latencyMs: Date.now() - started, attempts };
    }
  }

  /**
   * Fragments as the model produces them. Failures before the first fragment
   * are retried like `complete`; a failure after it is thrown to the consumer
   * as `BackendUnavailableError`.
   */
  async *stream(prompt: string, options: InferenceOptions = {}): AsyncGenerator<string> {
    let lastError: unknown;

    for (let attempt = 0; attempt <= this.config.maxRetries; attempt++) {
      if (this.breaker?.opened) {
        throw new BackendUnavailableError("Inference circuit is open", "inference");
      }

      const call = this.pendingCall(prompt, options);
      for (const backend of this.backends) {
        let started = false;
        try {
          for await (const fragment of backend.generateStream(this.toRequest(call))) {
            started = true;
            yield fragment;
          }
          return;
        } catch (error: unknown) {
          if (started || options.signal?.aborted) throw toUnavailable(error);
          lastError = error;
          this.logger.warn({ backend: backend.baseUrl, attempt: attempt + 1 }, "Inference stream failed to start");
        }
      }

      if (attempt < this.config.maxRetries) {
        await sleep(
          calculateDelay(attempt, this.config.retryBaseDelayMs ?? 500, this.config.retryMaxDelayMs ?? 5_000),
          options.signal,
        );
      }
    }

    throw toUnavailable(lastError);
  }

  /** Reachability probe; true when any configured backend answers. */
  async healthCheck(): Promise<boolean> {
    const results = await Promise.all(this.backends.map((backend) => backend.healthCheck()));
    return results.some(Boolean);
  }

  shutdown(): void {
    this.breaker?.shutdown();
  }

  private async attempt(prompt: string, options: InferenceOptions): Promise<GenerateResponse> {
    const call = this.pendingCall(prompt, options);
    if (!this.breaker) return this.walkBackends(call);

    try {
      return await this.breaker.fire(call);
    } catch (error: unknown) {
      if (isOpenCircuitError(error)) {
        throw new AppError({
          message: "Inference circuit is open",
          statusCode: 503,
          code: CIRCUIT_OPEN,
          cause: error,
        });
      }
      throw error;
    }
  }

  private async walkBackends(call: PendingCall): Promise<GenerateResponse> {
    let lastError: unknown;
    for (const backend of this.backends) {
      try {
        return await backend.generate(this.toRequest(call));
      } catch (error: unknown) {
        lastError = error;
        if (call.signal?.aborted) break;
        this.logger.warn(
          { backend: backend.baseUrl, err: error instanceof Error ? error.message : String(error) },
          "Inference backend failed",
        );
      }
    }
    throw lastError;
  }

  private pendingCall(prompt: string, options: InferenceOptions): PendingCall {
    const { defaults, model } = this.config;
    return {
      model,
      prompt,
      temperature: options.temperature ?? defaults.temperature,
      maxTokens: options.maxTokens ?? defaults.maxTokens,
      timeoutMs: options.timeoutMs ?? defaults.timeoutMs,
      signal: options.signal,
    };
  }

  private toRequest(call: PendingCall): GenerateRequest {
    const timeout = AbortSignal.timeout(call.timeoutMs);
    return {
      model: call.model,
      prompt: call.prompt,
      temperature: call.temperature,
      maxTokens: call.maxTokens,
      signal: call.signal ? AbortSignal.any([timeout, call.signal]) : timeout,
    };
  }
}
