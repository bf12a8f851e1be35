/**
 * API Retry Runner
 *
 * Retries idempotent backup-service reads on throttling, server errors and
 * dropped connections. Restore submissions never go through this runner.
 */

import { ApiError, formatErrorMessage, isRestoreError } from "./errors.js";

/**
 * Retry configuration options
 */
export type RetryConfig = {
  attempts?: number;
  minDelayMs?: number;
  maxDelayMs?: number;
  jitter?: number;
};

/**
 * Retry attempt information
 */
export type RetryInfo = {
  attempt: number;
  maxAttempts: number;
  delayMs: number;
  err: unknown;
  label?: string;
};

export type RetryOptions = RetryConfig & {
  label?: string;
  shouldRetry?: (err: unknown, attempt: number) => boolean;
  retryAfterMs?: (err: unknown) => number | undefined;
  onRetry?: (info: RetryInfo) => void;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
};

export const RETRY_DEFAULTS: Required<RetryConfig> = {
  attempts: 3,
  minDelayMs: 100,
  maxDelayMs: 30_000,
  jitter: 0.2,
};

const sleep = (ms: number) => new Promise<void>((r) => setTimeout(r, ms));

export function resolveRetryConfig(overrides?: RetryConfig): Required<RetryConfig> {
  const attempts = Math.max(1, Math.round(overrides?.attempts ?? RETRY_DEFAULTS.attempts));
  const minDelayMs = Math.max(0, Math.round(overrides?.minDelayMs ?? RETRY_DEFAULTS.minDelayMs));
  const maxDelayMs = Math.max(minDelayMs, Math.round(overrides?.maxDelayMs ?? RETRY_DEFAULTS.maxDelayMs));
  const jitter = Math.min(1, Math.max(0, overrides?.jitter ?? RETRY_DEFAULTS.jitter));
  return { attempts, minDelayMs, maxDelayMs, jitter };
}

function applyJitter(delayMs: number, jitter: number, random: () => number): number {
  if (jitter <= 0) return delayMs;
  const offset = (random() * 2 - 1) * jitter;
  return Math.max(0, Math.round(delayMs * (1 + offset)));
}

/**
 * Run `fn`, retrying with exponential backoff while `shouldRetry` allows
 */
export async function retryAsync<T>(fn: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const { attempts, minDelayMs, maxDelayMs, jitter } = resolveRetryConfig(options);
  const shouldRetry = options.shouldRetry ?? (() => true);
  const wait = options.sleep ?? sleep;
  const random = options.random ?? Math.random;
  let lastErr: unknown;

  for (let attempt = 1; attempt <= attempts; attempt += 1) {
    try {
      return await fn();
    } catch (err) {
      lastErr = err;
      if (attempt >= attempts || !shouldRetry(err, attempt)) break;

      const retryAfterMs = options.retryAfterMs?.(err);
      const baseDelay =
        typeof retryAfterMs === "number" && Number.isFinite(retryAfterMs)
          ? Math.max(retryAfterMs, minDelayMs)
          : minDelayMs * 2 ** (attempt - 1);
      let delay = Math.min(baseDelay, maxDelayMs);
      delay = applyJitter(delay, jitter, random);
      delay = Math.min(Math.max(delay, minDelayMs), maxDelayMs);

      options.onRetry?.({ attempt, maxAttempts: attempts, delayMs: delay, err, label: options.label });
      await wait(delay);
    }
  }

  throw lastErr ?? new Error("Retry failed");
}

// =============================================================================
// Backup Service Retry Policy
// =============================================================================

const RETRYABLE_STATUS_CODES = new Set([429, 500, 502, 503, 504]);

const RETRYABLE_NETWORK_CODES = new Set([
  "ECONNRESET",
  "ETIMEDOUT",
  "ENOTFOUND",
  "ECONNREFUSED",
  "EAI_AGAIN",
  "UND_ERR_SOCKET",
  "UND_ERR_CONNECT_TIMEOUT",
]);

const NETWORK_ERROR_PATTERN = /fetch failed|socket hang up|ECONNRESET|ETIMEDOUT|network/i;

function extractErrorCode(err: unknown): string | undefined {
  if (!err || typeof err !== "object") return undefined;
  if ("code" in err && typeof err.code === "string") return err.code;
  if ("cause" in err) return extractErrorCode(err.cause);
  return undefined;
}

/**
 * Throttling, 5xx and connection failures are retried; every other
 * taxonomy error (auth, validation, not-found, 4xx) is final.
 */
export function shouldRetryApiError(err: unknown, _attempt: number): boolean {
  if (err instanceof ApiError) return RETRYABLE_STATUS_CODES.has(err.statusCode);
  if (isRestoreError(err)) return false;

  if (err instanceof Error && (err.name === "AbortError" || err.name === "TimeoutError")) return true;

  const code = extractErrorCode(err);
  if (code && RETRYABLE_NETWORK_CODES.has(code)) return true;

  return NETWORK_ERROR_PATTERN.test(formatErrorMessage(err));
}

/**
 * Honour a Retry-After (seconds) carried by a throttled ApiError
 */
export function getRetryAfterMs(err: unknown): number | undefined {
  if (!(err instanceof ApiError) || err.retryAfterSeconds === undefined) return undefined;
  return err.retryAfterSeconds * 1000;
}

export type ApiRetryRunner = <T>(fn: () => Promise<T>, label?: string) => Promise<T>;

/**
 * Create a retry runner bound to the backup-service policy
 */
export function createApiRetryRunner(
  config?: RetryConfig,
  hooks?: Pick<RetryOptions, "onRetry" | "sleep" | "random">,
): ApiRetryRunner {
  const resolved = resolveRetryConfig(config);
  return <T>(fn: () => Promise<T>, label?: string): Promise<T> =>
    retryAsync(fn, {
      ...resolved,
      ...hooks,
      label,
      shouldRetry: shouldRetryApiError,
      retryAfterMs: getRetryAfterMs,
    });
}
