export { AppError } from "./app-error.js";
export type { AppErrorOptions } from "./app-error.js";

export {
  ConfigurationError,
  BackendUnavailableError,
  DimensionMismatchError,
  EmptyInputError,
  NotFoundError,
  ValidationError,
} from "./errors.js";

export { createCircuitBreaker, isOpenCircuitError } from "./circuit-breaker.js";
export type { CircuitBreakerOptions, CircuitState } from "./circuit-breaker.js";

export { withRetry, calculateDelay, sleep } from "./retry.js";
export type { RetryOptions } from "./retry.js";
