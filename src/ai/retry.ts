import { createLogger } from "../infra/logger.js";

const log = createLogger("retry");

export interface RetryConfig {
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs: number;
  retryableStatuses: Set<number>;
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxRetries: 3,
  baseDelayMs: 1_000,
  maxDelayMs: 30_000,
  retryableStatuses: new Set([429, 500, 502, 503, 504]),
};

const JITTER_RATIO = 0.3;
const STATUS_IN_MESSAGE = /\b(429|5\d\d)\b/;

/**
 * Run a model call, backing off exponentially on rate limits and server
 * errors. A Retry-After header longer than the backoff wins.
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  config: RetryConfig = DEFAULT_RETRY_CONFIG,
  wait: (ms: number) => Promise<void> = sleep
): Promise<T> {
  let attempt = 0;
  while (true) {
    try {
      return await fn();
    } catch (err) {
      const status = extractStatusCode(err);
      if (status === null || !config.retryableStatuses.has(status) || attempt >= config.maxRetries) {
        throw err;
      }

      const retryAfterMs = (extractRetryAfter(err) ?? 0) * 1000;
      const delay = Math.max(retryAfterMs, backoffDelay(attempt, config));
      attempt++;
      log.warn(
        { status, attempt, maxRetries: config.maxRetries },
        "Model call failed, retrying in %dms",
        Math.round(delay)
      );
      await wait(delay);
    }
  }
}

export function backoffDelay(attempt: number, config: RetryConfig, random = Math.random): number {
  const exponential = config.baseDelayMs * 2 ** attempt;
  return Math.min(exponential * (1 + JITTER_RATIO * random()), config.maxDelayMs);
}

export function extractStatusCode(error: unknown): number | null {
  if (typeof error !== "object" || error === null) return null;

  if ("status" in error && typeof error.status === "number") return error.status;
  if ("statusCode" in error && typeof error.statusCode === "number") return error.statusCode;
  if (
    "response" in error &&
    typeof error.response === "object" &&
    error.response !== null &&
    "status" in error.response &&
    typeof error.response.status === "number"
  ) {
    return error.response.status;
  }

  const match = error instanceof Error ? STATUS_IN_MESSAGE.exec(error.message) : null;
  return match ? Number(match[1]) : null;
}

/**
 * Retry-After in seconds, matched case-insensitively; null when absent or
 * not a number.
 */
export function extractRetryAfter(error: unknown): number | null {
  if (typeof error !== "object" || error === null || !("headers" in error)) return null;
  const { headers } = error;
  if (typeof headers !== "object" || headers === null) return null;

  for (const [name, value] of Object.entries(headers)) {
    if (name.toLowerCase() !== "retry-after" || typeof value !== "string") continue;
    const seconds = Number.parseInt(value, 10);
    return Number.isNaN(seconds) ? null : seconds;
  }
  return null;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
