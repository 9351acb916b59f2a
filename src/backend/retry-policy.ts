/**
 * Retry Policy
 *
 * Bounded exponential-backoff retry around a single backend call.
 * Only errors marked retryable (network failures, timeouts, HTTP 5xx) are
 * attempted again; everything else is rethrown immediately.
 */

import { GatewayError, errorMessage, isGatewayError } from "../errors.js";
import type { StructuredLogger } from "../logging.js";

/**
 * Configuration for RetryPolicy
 */
export interface RetryPolicyConfig {
  /** Total attempts including the first (default: 3) */
  maxAttempts: number;
  /** Delay before the second attempt in ms (default: 500) */
  baseDelayMs: number;
  /** Upper bound on any single delay in ms (default: 8000) */
  maxDelayMs: number;
  /** Growth factor between consecutive delays (default: 2) */
  backoffMultiplier: number;
  /** Jitter as a fraction of the delay, applied ± (default: 0.1, 0 disables) */
  jitterRatio: number;
}

export const DEFAULT_RETRY_CONFIG: RetryPolicyConfig = {
  maxAttempts: 3,
  baseDelayMs: 500,
  maxDelayMs: 8000,
  backoffMultiplier: 2,
  jitterRatio: 0.1,
};

export interface RetryPolicyOptions {
  logger?: StructuredLogger;
  /** Replaces setTimeout-based waiting; tests pass a recorder */
  sleep?: (ms: number) => Promise<void>;
  /** Replaces Math.random for jitter */
  random?: () => number;
}

/**
 * Context passed to every attempt
 */
export interface AttemptContext {
  /** 1-based attempt number */
  attempt: number;
}

const defaultSleep = (ms: number): Promise<void> =>
  new Promise((resolve) => setTimeout(resolve, ms));

export function isRetryable(err: unknown): boolean {
  return isGatewayError(err) && err.retryable;
}

export class RetryPolicy {
  public readonly config: RetryPolicyConfig;
  private readonly logger?: StructuredLogger;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly random: () => number;

  constructor(config: Partial<RetryPolicyConfig> = {}, options: RetryPolicyOptions = {}) {
    this.config = { ...DEFAULT_RETRY_CONFIG, ...config };
    if (!Number.isInteger(this.config.maxAttempts) || this.config.maxAttempts < 1) {
      throw new Error(`maxAttempts must be a positive integer (got ${String(this.config.maxAttempts)})`);
    }
    this.logger = options.logger;
    this.sleep = options.sleep ?? defaultSleep;
    this.random = options.random ?? Math.random;
  }

  /**
   * Run `operation` until it succeeds, fails terminally, or attempts run out.
   *
   * @throws the terminal error unchanged, or a BackendUnavailable GatewayError
   *   wrapping the last retryable error once attempts are exhausted
   */
  public async execute<T>(
    operation: (context: AttemptContext) => Promise<T>,
    label = "backend_call"
  ): Promise<T> {
    let lastError: unknown;

    for (let attempt = 1; attempt <= this.config.maxAttempts; attempt++) {
      try {
        return await operation({ attempt });
      } catch (err) {
        if (!isRetryable(err)) {
          throw err;
        }
        lastError = err;

        if (attempt < this.config.maxAttempts) {
          const delay = this.calculateDelay(attempt);
          this.logger?.debug("retry_scheduled", {
            label,
            attempt,
            nextRetryMs: delay,
            error: errorMessage(err),
          });
          await this.sleep(delay);
        }
      }
    }

    this.logger?.warn("retry_exhausted", {
      label,
      attempts: this.config.maxAttempts,
      error: errorMessage(lastError),
    });

    const provider = isGatewayError(lastError) ? lastError.provider : undefined;
    throw new GatewayError("BackendUnavailable", errorMessage(lastError), {
      provider,
      cause: lastError,
      data: {
        attempts: this.config.maxAttempts,
        lastErrorKind: isGatewayError(lastError) ? lastError.kind : undefined,
      },
    });
  }

  /**
   * Delay after a failed attempt, with exponential backoff and jitter
   */
  public calculateDelay(attempt: number): number {
    const exponentialDelay =
      this.config.baseDelayMs * Math.pow(this.config.backoffMultiplier, attempt - 1);

    const cappedDelay = Math.min(exponentialDelay, this.config.maxDelayMs);

    // ±jitterRatio spread
    const jitter = cappedDelay * this.config.jitterRatio * (this.random() * 2 - 1);

    return Math.max(0, Math.round(cappedDelay + jitter));
  }
}
