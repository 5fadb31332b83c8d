/**
 * Retry with exponential backoff for registry requests
 *
 * Rate limiting (429) and transient server/network failures are retried
 * transparently; a server-supplied Retry-After delay takes precedence over
 * the computed backoff. Callers above the client never retry.
 */

import type { RetryConfig, RetryResult, ApiError } from './types.js';
import { logger, type Logger } from './logger.js';

// =============================================================================
// Constants
// =============================================================================

export const DEFAULT_RETRY_CONFIG: Required<RetryConfig> = {
  maxRetries: 3,
  baseDelayMs: 1000,
  maxDelayMs: 30000,
  jitterFactor: 0.1,
  retryableStatuses: [429, 500, 502, 503, 504],
};

export const RATE_LIMIT_STATUS = 429;
export const SERVER_ERROR_THRESHOLD = 500;

const NETWORK_ERROR_PATTERNS = [
  'econnreset',
  'econnrefused',
  'etimedout',
  'enotfound',
  'eai_again',
  'socket hang up',
  'fetch failed',
  'network',
];

// =============================================================================
// Types
// =============================================================================

export interface RetryOptions<T> extends RetryConfig {
  logger?: Logger;
  /** Called before each retry attempt */
  onRetry?: (attempt: number, error: Error, delayMs: number) => void;
  /** Overrides the default retryability check */
  isRetryable?: (error: Error) => boolean;
  onSuccess?: (result: T, attempts: number) => void;
  /** Called once all retries are used up */
  onExhausted?: (error: Error, attempts: number) => void;
  /** Replaces the wait between attempts (tests) */
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Non-2xx response from the registry
 */
export class RegistryRequestError extends Error {
  public readonly status: number;
  public readonly code?: string;
  public readonly details?: Record<string, unknown>;
  /** Server-requested delay in seconds */
  public readonly retryAfter?: number;

  constructor(
    message: string,
    status: number,
    options: {
      code?: string;
      details?: Record<string, unknown>;
      retryAfter?: number;
      cause?: Error;
    } = {}
  ) {
    super(message, options.cause ? { cause: options.cause } : undefined);
    this.name = 'RegistryRequestError';
    this.status = status;
    this.code = options.code;
    this.details = options.details;
    this.retryAfter = options.retryAfter;
  }

  toApiError(): ApiError {
    return {
      status: this.status,
      message: this.message,
      code: this.code,
      details: this.details,
    };
  }

  isRateLimited(): boolean {
    return this.status === RATE_LIMIT_STATUS;
  }

  isServerError(): boolean {
    return this.status >= SERVER_ERROR_THRESHOLD;
  }
}

// =============================================================================
// Delay Calculation
// =============================================================================

/**
 * Delay before the next attempt
 *
 * @param attempt - 1-indexed attempt that just failed
 * @param retryAfter - Retry-After value in seconds, if the server sent one
 */
export function calculateDelay(
  attempt: number,
  config: Required<RetryConfig>,
  retryAfter?: number
): number {
  if (retryAfter !== undefined && retryAfter > 0) {
    const jitter = Math.random() * config.baseDelayMs * config.jitterFactor;
    return Math.min(retryAfter * 1000 + jitter, config.maxDelayMs);
  }

  const exponential = config.baseDelayMs * 2 ** (attempt - 1);
  const spread = exponential * config.jitterFactor;
  const jittered = exponential + (Math.random() * 2 - 1) * spread;

  return Math.min(Math.max(jittered, 0), config.maxDelayMs);
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

// =============================================================================
// Retry Logic
// =============================================================================

/**
 * Default retryability: configured statuses, timeouts and network failures
 */
export function isRetryableError(error: Error, config: Required<RetryConfig>): boolean {
  if (error instanceof RegistryRequestError) {
    return config.retryableStatuses.includes(error.status);
  }

  if (error.name === 'AbortError' || error.name === 'TimeoutError') {
    return true;
  }

  const message = error.message.toLowerCase();
  return NETWORK_ERROR_PATTERNS.some((pattern) => message.includes(pattern));
}

/**
 * Parse a Retry-After header (delta seconds or HTTP date) into seconds
 */
export function parseRetryAfter(value: string | null, now: number = Date.now()): number | undefined {
  if (!value) return undefined;

  const trimmed = value.trim();
  if (/^\d+$/.test(trimmed)) {
    const seconds = Number.parseInt(trimmed, 10);
    return seconds > 0 ? seconds : undefined;
  }

  const date = Date.parse(trimmed);
  if (Number.isNaN(date)) return undefined;

  const delayMs = date - now;
  return delayMs > 0 ? Math.ceil(delayMs / 1000) : undefined;
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Run `fn`, retrying retryable failures with backoff
 *
 * Never throws; the outcome is reported through the returned RetryResult.
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  options: RetryOptions<T> = {}
): Promise<RetryResult<T>> {
  const config: Required<RetryConfig> = {
    maxRetries: options.maxRetries ?? DEFAULT_RETRY_CONFIG.maxRetries,
    baseDelayMs: options.baseDelayMs ?? DEFAULT_RETRY_CONFIG.baseDelayMs,
    maxDelayMs: options.maxDelayMs ?? DEFAULT_RETRY_CONFIG.maxDelayMs,
    jitterFactor: options.jitterFactor ?? DEFAULT_RETRY_CONFIG.jitterFactor,
    retryableStatuses: options.retryableStatuses ?? DEFAULT_RETRY_CONFIG.retryableStatuses,
  };
  const log = options.logger ?? logger;
  const wait = options.sleep ?? sleep;
  const startTime = Date.now();
  let attempt = 0;

  for (;;) {
    attempt++;
    try {
      const data = await fn();
      const totalTimeMs = Date.now() - startTime;
      if (attempt > 1) {
        log.info(`Request succeeded after ${attempt} attempts`, { attempts: attempt, totalTimeMs });
      }
      options.onSuccess?.(data, attempt);
      return { success: true, data, attempts: attempt, totalTimeMs };
    } catch (caught) {
      const error = toError(caught);
      const retryable = options.isRetryable ? options.isRetryable(error) : isRetryableError(error, config);
      const exhausted = attempt > config.maxRetries;

      if (!retryable || exhausted) {
        const totalTimeMs = Date.now() - startTime;
        if (retryable && config.maxRetries > 0) {
          log.warn(`All ${config.maxRetries} retry attempts exhausted`, {
            error: error.message,
            attempts: attempt,
            totalTimeMs,
          });
          options.onExhausted?.(error, attempt);
        } else if (!retryable) {
          log.debug('Error is not retryable', { error: error.message, attempts: attempt });
        }
        return { success: false, error, attempts: attempt, totalTimeMs };
      }

      const retryAfter = error instanceof RegistryRequestError ? error.retryAfter : undefined;
      const delayMs = calculateDelay(attempt, config, retryAfter);

      log.info(`Retry attempt ${attempt}/${config.maxRetries} in ${Math.round(delayMs)}ms`, {
        error: error.message,
        status: error instanceof RegistryRequestError ? error.status : undefined,
        delayMs: Math.round(delayMs),
      });
      options.onRetry?.(attempt, error, delayMs);

      await wait(delayMs);
    }
  }
}
