/**
 * Retry Utilities
 *
 * Response classification and exponential backoff with jitter for Graph
 * calls. The request loop itself lives in GraphClient; this module only
 * decides what an outcome is and how long to wait before the next attempt.
 */

import type { GraphRetryOptions } from "./types.js";

// =============================================================================
// Configuration
// =============================================================================

export type RetryPolicy = Required<GraphRetryOptions>;

export const GRAPH_RETRY_DEFAULTS: RetryPolicy = {
  maxRateLimitAttempts: 5,
  maxServerErrorAttempts: 3,
  maxNetworkAttempts: 3,
  baseDelayMs: 1_000,
  maxDelayMs: 30_000,
};

export function resolveRetryPolicy(options?: GraphRetryOptions): RetryPolicy {
  return {
    maxRateLimitAttempts: options?.maxRateLimitAttempts ?? GRAPH_RETRY_DEFAULTS.maxRateLimitAttempts,
    maxServerErrorAttempts: options?.maxServerErrorAttempts ?? GRAPH_RETRY_DEFAULTS.maxServerErrorAttempts,
    maxNetworkAttempts: options?.maxNetworkAttempts ?? GRAPH_RETRY_DEFAULTS.maxNetworkAttempts,
    baseDelayMs: options?.baseDelayMs ?? GRAPH_RETRY_DEFAULTS.baseDelayMs,
    maxDelayMs: options?.maxDelayMs ?? GRAPH_RETRY_DEFAULTS.maxDelayMs,
  };
}

// =============================================================================
// Outcome Classification
// =============================================================================

export type ResponseOutcome =
  | { kind: "success"; status: number }
  | { kind: "auth-expired"; status: number }
  | { kind: "rate-limited"; status: number; retryAfterMs: number | null }
  | { kind: "transient-error"; status: number }
  | { kind: "client-error"; status: number }
  | { kind: "network-failure"; timedOut: boolean; cause: unknown };

export type OutcomeKind = ResponseOutcome["kind"];

/**
 * Classify an HTTP status (plus its Retry-After header, if any).
 * 503 counts as rate limiting only when the server says when to come back.
 */
export function classifyStatus(status: number, retryAfter?: string | null, now = Date.now()): ResponseOutcome {
  if (status >= 200 && status < 300) return { kind: "success", status };
  if (status === 401) return { kind: "auth-expired", status };

  const retryAfterMs = parseRetryAfterMs(retryAfter, now);
  if (status === 429) return { kind: "rate-limited", status, retryAfterMs };
  if (status === 503 && retryAfterMs !== null) return { kind: "rate-limited", status, retryAfterMs };
  if (status >= 500 && status < 600) return { kind: "transient-error", status };

  return { kind: "client-error", status };
}

export function classifyNetworkFailure(error: unknown): ResponseOutcome {
  return { kind: "network-failure", timedOut: isTimeoutError(error), cause: error };
}

/**
 * AbortSignal.timeout() rejects with a DOMException named "TimeoutError";
 * older undici builds surface it as "AbortError".
 */
export function isTimeoutError(error: unknown): boolean {
  if (!(error instanceof Error)) return false;
  if (error.name === "TimeoutError" || error.name === "AbortError") return true;
  const cause = error.cause;
  return cause instanceof Error && (cause.name === "TimeoutError" || cause.name === "AbortError");
}

/**
 * Parse a Retry-After header value into milliseconds.
 * Accepts delta-seconds or an HTTP date; returns null when absent or invalid.
 */
export function parseRetryAfterMs(value: string | null | undefined, now = Date.now()): number | null {
  if (value === null || value === undefined) return null;
  const trimmed = value.trim();
  if (!trimmed) return null;

  if (/^\d+(\.\d+)?$/.test(trimmed)) {
    return Math.round(Number(trimmed) * 1000);
  }

  const date = Date.parse(trimmed);
  if (!Number.isNaN(date)) {
    return Math.max(0, date - now);
  }

  return null;
}

// =============================================================================
// Backoff
// =============================================================================

/**
 * `min(maxDelay, base * 2^attempt) * uniform(0.5, 1.5)`.
 * `attempt` counts retries already made in the same category, from 0.
 */
export function computeBackoffDelay(
  attempt: number,
  policy: Pick<RetryPolicy, "baseDelayMs" | "maxDelayMs">,
  random: () => number = Math.random,
): number {
  const exponential = policy.baseDelayMs * 2 ** Math.max(0, attempt);
  const capped = Math.min(policy.maxDelayMs, exponential);
  const jitter = 0.5 + random();
  return Math.round(capped * jitter);
}

export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = (ms) =>
  new Promise((resolve) => {
    setTimeout(resolve, ms);
  });

// =============================================================================
// Attempt Budget
// =============================================================================

export type RetryCategory = "rate-limit" | "server-error" | "network" | "auth";

/**
 * Per-call retry counters. Each category has its own budget so a burst of
 * throttling does not consume the allowance for server errors.
 */
export class RetryBudget {
  private used: Record<RetryCategory, number> = { "rate-limit": 0, "server-error": 0, network: 0, auth: 0 };
  private lastDelayMs: Record<RetryCategory, number> = { "rate-limit": 0, "server-error": 0, network: 0, auth: 0 };

  constructor(private readonly policy: RetryPolicy) {}

  /** Retries already spent in a category. */
  spent(category: RetryCategory): number {
    return this.used[category];
  }

  /** Total attempts made so far (first try included). */
  attempts(): number {
    return 1 + this.used["rate-limit"] + this.used["server-error"] + this.used.network + this.used.auth;
  }

  /** Reserve one retry. Returns false when the category is exhausted. */
  take(category: RetryCategory): boolean {
    if (this.used[category] >= this.limit(category)) return false;
    this.used[category]++;
    return true;
  }

  /**
   * Header-less delay before the retry just taken in `category`. Never
   * shorter than the previous delay in the same category, never above
   * `maxDelayMs`.
   */
  backoffDelay(category: RetryCategory, random: () => number = Math.random): number {
    const jittered = computeBackoffDelay(this.used[category] - 1, this.policy, random);
    const delayMs = Math.min(this.policy.maxDelayMs, Math.max(this.lastDelayMs[category], jittered));
    this.lastDelayMs[category] = delayMs;
    return delayMs;
  }

  private limit(category: RetryCategory): number {
    switch (category) {
      case "rate-limit":
        return this.policy.maxRateLimitAttempts;
      case "server-error":
        return this.policy.maxServerErrorAttempts;
      case "network":
        return this.policy.maxNetworkAttempts;
      case "auth":
        return 1;
    }
  }
}

// =============================================================================
// Method Semantics
// =============================================================================

export type HttpMethod = "GET" | "POST" | "PATCH" | "PUT" | "DELETE";

/** Only reads may be replayed after the server answered. */
export function isIdempotentMethod(method: HttpMethod): boolean {
  return method === "GET";
}
