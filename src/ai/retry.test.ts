/**
 * Retry Tests
 * Status extraction, Retry-After handling and exponential backoff
 */

import { describe, it, expect, vi } from "vitest";
import {
  DEFAULT_RETRY_CONFIG,
  backoffDelay,
  extractRetryAfter,
  extractStatusCode,
  withRetry,
  type RetryConfig,
} from "./retry.js";
import { ProviderError } from "./provider.js";

const FAST: RetryConfig = {
  maxRetries: 2,
  baseDelayMs: 10,
  maxDelayMs: 100,
  retryableStatuses: new Set([429, 503]),
};

describe("HTTP Status Code Extraction", () => {
  it("should extract status from error.status", () => {
    expect(extractStatusCode(new ProviderError("rate limited", 429))).toBe(429);
  });

  it("should extract status from error.statusCode and error.response.status", () => {
    expect(extractStatusCode({ statusCode: 503 })).toBe(503);
    expect(extractStatusCode({ response: { status: 502 } })).toBe(502);
  });

  it("should extract status from the message", () => {
    expect(extractStatusCode(new Error("upstream returned 504"))).toBe(504);
  });

  it("should return null for anything else", () => {
    expect(extractStatusCode(null)).toBeNull();
    expect(extractStatusCode("429")).toBeNull();
    expect(extractStatusCode(new Error("boom"))).toBeNull();
  });
});

describe("Retry-After Header Extraction", () => {
  it("should read lowercase and capitalized headers", () => {
    expect(extractRetryAfter({ headers: { "retry-after": "7" } })).toBe(7);
    expect(extractRetryAfter({ headers: { "Retry-After": "3" } })).toBe(3);
  });

  it("should return null when the header is missing or invalid", () => {
    expect(extractRetryAfter({ headers: {} })).toBeNull();
    expect(extractRetryAfter({ headers: { "retry-after": "soon" } })).toBeNull();
    expect(extractRetryAfter(new Error("no headers"))).toBeNull();
  });
});

describe("Exponential Backoff Calculation", () => {
  it("should double the delay per attempt", () => {
    const noJitter = () => 0;
    expect(backoffDelay(0, DEFAULT_RETRY_CONFIG, noJitter)).toBe(1000);
    expect(backoffDelay(1, DEFAULT_RETRY_CONFIG, noJitter)).toBe(2000);
    expect(backoffDelay(2, DEFAULT_RETRY_CONFIG, noJitter)).toBe(4000);
  });

  it("should add at most 30% jitter", () => {
    expect(backoffDelay(0, DEFAULT_RETRY_CONFIG, () => 1)).toBe(1300);
  });

  it("should cap at maxDelayMs", () => {
    expect(backoffDelay(10, DEFAULT_RETRY_CONFIG, () => 0)).toBe(30000);
  });
});

describe("withRetry", () => {
  it("should not retry a successful call", async () => {
    const fn = vi.fn(async () => "ok");
    const wait = vi.fn(async (_ms: number) => {});

    await expect(withRetry(fn, FAST, wait)).resolves.toBe("ok");
    expect(fn).toHaveBeenCalledTimes(1);
    expect(wait).not.toHaveBeenCalled();
  });

  it("should retry retryable statuses", async () => {
    const fn = vi
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(new ProviderError("rate limited", 429))
      .mockResolvedValueOnce("ok");
    const wait = vi.fn(async (_ms: number) => {});

    await expect(withRetry(fn, FAST, wait)).resolves.toBe("ok");
    expect(fn).toHaveBeenCalledTimes(2);
    expect(wait).toHaveBeenCalledTimes(1);
  });

  it("should honor Retry-After", async () => {
    const fn = vi
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(new ProviderError("rate limited", 429, { headers: { "retry-after": "5" } }))
      .mockResolvedValueOnce("ok");
    const wait = vi.fn(async (_ms: number) => {});

    await withRetry(fn, FAST, wait);
    expect(wait).toHaveBeenCalledWith(5000);
  });

  it("should throw non-retryable errors immediately", async () => {
    const error = new ProviderError("bad request", 400);
    const fn = vi.fn<() => Promise<string>>().mockRejectedValue(error);
    const wait = vi.fn(async (_ms: number) => {});

    await expect(withRetry(fn, FAST, wait)).rejects.toBe(error);
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it("should give up after maxRetries", async () => {
    const fn = vi.fn<() => Promise<string>>().mockRejectedValue(new ProviderError("unavailable", 503));
    const wait = vi.fn(async (_ms: number) => {});

    await expect(withRetry(fn, FAST, wait)).rejects.toThrow("unavailable");
    expect(fn).toHaveBeenCalledTimes(3);
    expect(wait).toHaveBeenCalledTimes(2);
  });
});
