/**
 * Reliability Utilities
 *
 * Retry and circuit breaker patterns for calls to external services.
 */

export {
  CircuitState,
  CircuitBreaker,
  CircuitOpenError,
  HttpStatusError,
  type RetryConfig,
  type CircuitBreakerConfig,
  type CircuitBreakerStats,
  withRetry,
  withCircuitBreaker,
  withReliability,
  embedderBreaker,
  isRetryableError,
} from './client_wrap';
