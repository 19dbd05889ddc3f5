/**
 * Resilience policy: bounded retry with decorrelated-jitter backoff.
 *
 *   - Retries only errors classified retryable (transport failures, 408,
 *     429, 5xx).
 *   - `delay = min(maxDelay, random(baseDelay, prev * 3))`, seeded with
 *     `prev = baseDelay`.
 *   - A `retry_after` hint within `maxDelay` replaces the computed delay;
 *     a longer hint ends the call.
 *   - Nothing is retried once the caller's signal has fired.
 */

import type { Logger } from "pino";
import type { RetryConfig } from "../config/schema.js";
import { componentLogger } from "../logging/logger.js";
import {
  CommunicationError,
  type GatewayError,
  toGatewayError,
} from "../types/errors.js";
import { sleep, throwIfCanceled } from "./sleep.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface RetryEvent {
  /** 1-based number of the attempt that failed. */
  readonly attempt: number;
  /** Milliseconds until the next attempt. */
  readonly delay: number;
  readonly error: GatewayError;
  readonly provider?: string;
  readonly operation?: string;
}

export interface ResilienceOptions {
  /** Retries after the first attempt. Default: 3. */
  maxRetries: number;
  /** Milliseconds. Default: 1000. */
  baseDelay: number;
  /** Per-attempt cap in milliseconds. Default: 30000. */
  maxDelay: number;
  onRetry?: (event: RetryEvent) => void;
  /** Random source in [0, 1). Default: Math.random. */
  random?: () => number;
  logger?: Logger;
}

export interface ExecuteContext {
  signal?: AbortSignal;
  provider?: string;
  operation?: string;
  /** Per-call observer, called after the policy-wide one. */
  onRetry?: (event: RetryEvent) => void;
}

const DEFAULT_OPTIONS: ResilienceOptions = {
  maxRetries: 3,
  baseDelay: 1000,
  maxDelay: 30000,
};

// ---------------------------------------------------------------------------
// Delay
// ---------------------------------------------------------------------------

/**
 * Next decorrelated-jitter delay given the previous one.
 *
 * @param previous - previous delay, or `baseDelay` before the first retry
 */
export function calculateDelay(
  previous: number,
  options: Pick<ResilienceOptions, "baseDelay" | "maxDelay">,
  random: () => number = Math.random,
): number {
  const upper = Math.max(options.baseDelay, previous * 3);
  const delay = options.baseDelay + random() * (upper - options.baseDelay);
  return Math.min(options.maxDelay, Math.floor(delay));
}

// ---------------------------------------------------------------------------
// Policy
// ---------------------------------------------------------------------------

export class ResiliencePolicy {
  readonly options: Readonly<ResilienceOptions>;
  private readonly logger: Logger;

  constructor(options: Partial<ResilienceOptions> = {}) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
    this.logger = options.logger ?? componentLogger("resilience");
  }

  static fromConfig(
    config: RetryConfig,
    extra: Pick<ResilienceOptions, "onRetry" | "random" | "logger"> = {},
  ): ResiliencePolicy {
    return new ResiliencePolicy({
      maxRetries: config.maxRetries,
      baseDelay: config.baseDelayMs,
      maxDelay: config.maxDelayMs,
      ...extra,
    });
  }

  /** A policy that never retries. */
  static none(): ResiliencePolicy {
    return new ResiliencePolicy({ maxRetries: 0 });
  }

  /**
   * Run `operation`, retrying transient failures. Failures surface as
   * GatewayError tagged with the context's provider and operation.
   */
  async execute<T>(
    operation: (attempt: number) => Promise<T>,
    context: ExecuteContext = {},
  ): Promise<T> {
    const { maxRetries, maxDelay } = this.options;
    const random = this.options.random ?? Math.random;
    const origin = { provider: context.provider, operation: context.operation };
    let previous = this.options.baseDelay;

    for (let attempt = 1; ; attempt++) {
      try {
        throwIfCanceled(context.signal);
        return await operation(attempt);
      } catch (err: unknown) {
        const error = toGatewayError(err, context.signal, origin);

        if (!error.retryable || context.signal?.aborted || attempt > maxRetries) {
          throw error;
        }

        let delay: number;
        const retryAfter =
          error instanceof CommunicationError ? error.retry_after : undefined;
        if (retryAfter !== undefined && retryAfter > 0) {
          const retryAfterMs = retryAfter * 1000;
          if (retryAfterMs > maxDelay) {
            throw error;
          }
          delay = retryAfterMs;
        } else {
          delay = calculateDelay(previous, this.options, random);
        }
        previous = delay;

        this.logger.warn(
          { ...origin, attempt, delay, cause: error.message },
          "retrying after transient failure",
        );
        const event: RetryEvent = { attempt, delay, error, ...origin };
        this.options.onRetry?.(event);
        context.onRetry?.(event);

        await sleep(delay, context.signal);
      }
    }
  }
}
