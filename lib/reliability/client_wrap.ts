/**
 * Retry + Circuit Breaker Utility
 *
 * Provides jittered exponential backoff and circuit breaker patterns
 * for wrapping calls to the embedding service.
 */

import { log } from "../../server/logger";

export enum CircuitState {
  CLOSED = 'closed',
  OPEN = 'open',
  HALF_OPEN = 'half-open',
}

export interface RetryConfig {
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs: number;
  jitterFactor: number;
  retryOn: (error: unknown) => boolean;
}

export interface CircuitBreakerConfig {
  failureThreshold: number;
  successThreshold: number;
  openDurationMs: number;
  name: string;
}

export interface CircuitBreakerStats {
  state: CircuitState;
  failures: number;
  successes: number;
  lastFailureTime: number | null;
  lastStateChange: number;
  totalRequests: number;
  totalFailures: number;
}

/**
 * Non-2xx answer from an upstream HTTP service.
 */
export class HttpStatusError extends Error {
  constructor(
    public readonly status: number,
    message: string
  ) {
    super(message);
    this.name = 'HttpStatusError';
  }
}

const DEFAULT_BREAKER_CONFIG: CircuitBreakerConfig = {
  failureThreshold: 5,
  successThreshold: 2,
  openDurationMs: 30000,
  name: 'default',
};

function statusOf(error: unknown): number | undefined {
  if (typeof error !== 'object' || error === null) {
    return undefined;
  }
  if ('status' in error && typeof error.status === 'number') {
    return error.status;
  }
  if ('statusCode' in error && typeof error.statusCode === 'number') {
    return error.statusCode;
  }
  return undefined;
}

export function isRetryableError(error: unknown): boolean {
  if (error instanceof Error) {
    const message = error.message.toLowerCase();
    const status = statusOf(error);

    if (status === 429) return true;
    if (status !== undefined && status >= 500 && status < 600) return true;

    if (message.includes('rate limit')) return true;
    if (message.includes('timeout')) return true;
    if (message.includes('econnreset')) return true;
    if (message.includes('econnrefused')) return true;
    if (message.includes('socket hang up')) return true;
    if (message.includes('fetch failed')) return true;
    if (message.includes('network')) return true;
  }

  return false;
}

const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxRetries: 3,
  baseDelayMs: 1000,
  maxDelayMs: 30000,
  jitterFactor: 0.3,
  retryOn: isRetryableError,
};

function calculateBackoff(
  attempt: number,
  baseDelayMs: number,
  maxDelayMs: number,
  jitterFactor: number
): number {
  const exponentialDelay = baseDelayMs * Math.pow(2, attempt);
  const cappedDelay = Math.min(exponentialDelay, maxDelayMs);

  const jitter = cappedDelay * jitterFactor * (Math.random() * 2 - 1);

  return Math.max(0, Math.round(cappedDelay + jitter));
}

function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

export class CircuitBreaker {
  private state: CircuitState = CircuitState.CLOSED;
  private failures: number = 0;
  private successes: number = 0;
  private lastFailureTime: number | null = null;
  private lastStateChange: number = Date.now();
  private totalRequests: number = 0;
  private totalFailures: number = 0;
  private pendingProbe: boolean = false;
  private readonly config: CircuitBreakerConfig;

  constructor(config: Partial<CircuitBreakerConfig> = {}) {
    this.config = { ...DEFAULT_BREAKER_CONFIG, ...config };
  }

  get currentState(): CircuitState {
    return this.state;
  }

  get stats(): CircuitBreakerStats {
    return {
      state: this.state,
      failures: this.failures,
      successes: this.successes,
      lastFailureTime: this.lastFailureTime,
      lastStateChange: this.lastStateChange,
      totalRequests: this.totalRequests,
      totalFailures: this.totalFailures,
    };
  }

  get name(): string {
    return this.config.name;
  }

  private transitionTo(newState: CircuitState): void {
    if (this.state === newState) {
      return;
    }
    log(`${this.state} -> ${newState}`, `circuit:${this.config.name}`);
    this.state = newState;
    this.lastStateChange = Date.now();
    this.pendingProbe = false;

    if (newState === CircuitState.CLOSED) {
      this.failures = 0;
      this.successes = 0;
    } else if (newState === CircuitState.HALF_OPEN) {
      this.successes = 0;
    }
  }

  private shouldAttemptReset(): boolean {
    if (this.state !== CircuitState.OPEN) return false;

    const timeSinceOpen = Date.now() - this.lastStateChange;
    return timeSinceOpen >= this.config.openDurationMs;
  }

  canExecute(): boolean {
    if (this.state === CircuitState.CLOSED) {
      return true;
    }

    if (this.state === CircuitState.OPEN) {
      if (!this.shouldAttemptReset()) {
        return false;
      }
      this.transitionTo(CircuitState.HALF_OPEN);
    }

    // HALF_OPEN: let exactly one probe through at a time
    if (!this.pendingProbe) {
      this.pendingProbe = true;
      return true;
    }
    return false;
  }

  recordSuccess(): void {
    this.totalRequests++;
    this.pendingProbe = false;

    if (this.state === CircuitState.HALF_OPEN) {
      this.successes++;
      if (this.successes >= this.config.successThreshold) {
        this.transitionTo(CircuitState.CLOSED);
      }
    } else if (this.state === CircuitState.CLOSED) {
      this.failures = 0;
    }
  }

  recordFailure(): void {
    this.totalRequests++;
    this.totalFailures++;
    this.failures++;
    this.lastFailureTime = Date.now();
    this.pendingProbe = false;

    if (this.state === CircuitState.HALF_OPEN) {
      this.transitionTo(CircuitState.OPEN);
    } else if (this.state === CircuitState.CLOSED && this.failures >= this.config.failureThreshold) {
      this.transitionTo(CircuitState.OPEN);
    }
  }
}

export class CircuitOpenError extends Error {
  constructor(
    public readonly circuitName: string,
    public readonly stats: CircuitBreakerStats
  ) {
    super(`Circuit breaker '${circuitName}' is open. Too many recent failures.`);
    this.name = 'CircuitOpenError';
  }
}

export async function withRetry<T>(
  fn: () => Promise<T>,
  config: Partial<RetryConfig> = {}
): Promise<T> {
  const opts = { ...DEFAULT_RETRY_CONFIG, ...config };

  let lastError: unknown;

  for (let attempt = 0; attempt <= opts.maxRetries; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error;

      if (attempt === opts.maxRetries || !opts.retryOn(error)) {
        break;
      }

      const delayMs = calculateBackoff(
        attempt,
        opts.baseDelayMs,
        opts.maxDelayMs,
        opts.jitterFactor
      );

      log(`Attempt ${attempt + 1} failed, retrying in ${delayMs}ms...`, 'withRetry');
      await sleep(delayMs);
    }
  }

  throw lastError;
}

/**
 * Runs `fn` through the breaker. Only errors for which `isFailure` holds count
 * against it; any other rejection means the service answered, so it is
 * recorded as a success and rethrown.
 */
export async function withCircuitBreaker<T>(
  fn: () => Promise<T>,
  breaker: CircuitBreaker,
  isFailure: (error: unknown) => boolean = () => true
): Promise<T> {
  if (!breaker.canExecute()) {
    throw new CircuitOpenError(breaker.name, breaker.stats);
  }

  try {
    const result = await fn();
    breaker.recordSuccess();
    return result;
  } catch (error) {
    if (isFailure(error)) {
      breaker.recordFailure();
    } else {
      breaker.recordSuccess();
    }
    throw error;
  }
}

export async function withReliability<T>(
  fn: () => Promise<T>,
  breaker: CircuitBreaker,
  retryConfig: Partial<RetryConfig> = {},
  isFailure?: (error: unknown) => boolean
): Promise<T> {
  return withCircuitBreaker(
    () => withRetry(fn, retryConfig),
    breaker,
    isFailure
  );
}

export const embedderBreaker = new CircuitBreaker({
  name: 'embedder',
  failureThreshold: 5,
  successThreshold: 2,
  openDurationMs: 30000,
});
