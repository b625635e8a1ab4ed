import CircuitBreaker from "opossum";

export interface CircuitBreakerOptions {
  /** Timeout in milliseconds after which the call is considered failed. `false` disables it. Default: 10000 */
  timeout?: number | false;
  /** Error percentage at which to open the circuit. Default: 50 */
  errorThresholdPercentage?: number;
  /** Time in milliseconds to wait before attempting to close the circuit. Default: 30000 */
  resetTimeout?: number;
  /** Minimum number of calls in the rolling window before the circuit may open. Default: 0 */
  volumeThreshold?: number;
  /** Rolling count timeout in milliseconds. Default: 10000 */
  rollingCountTimeout?: number;
  /** Number of buckets in the rolling window. Default: 10 */
  rollingCountBuckets?: number;
}

export type CircuitState = "open" | "halfOpen" | "close";

const DEFAULT_OPTIONS: Required<
  Pick<CircuitBreakerOptions, "timeout" | "errorThresholdPercentage" | "resetTimeout">
> = {
  timeout: 10_000,
  errorThresholdPercentage: 50,
  resetTimeout: 30_000,
};

function defaultStateListener(name: string, state: CircuitState): void {
  console.warn(`[circuit-breaker] ${name}: circuit ${state.toUpperCase()}`);
}

export function createCircuitBreaker<TArgs extends unknown[], TResult>(
  name: string,
  fn: (...args: TArgs) => Promise<TResult>,
  options?: CircuitBreakerOptions,
  onStateChange: (name: string, state: CircuitState) => void = defaultStateListener,
): CircuitBreaker<TArgs, TResult> {
  const mergedOptions = { ...DEFAULT_OPTIONS, ...options, name };

  const breaker = new CircuitBreaker<TArgs, TResult>(fn, mergedOptions);

  breaker.on("open", () => onStateChange(name, "open"));
  breaker.on("halfOpen", () => onStateChange(name, "halfOpen"));
  breaker.on("close", () => onStateChange(name, "close"));

  return breaker;
}

/** opossum rejects with `code === "EOPENBREAKER"` while the circuit is open. */
export function isOpenCircuitError(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "EOPENBREAKER";
}
