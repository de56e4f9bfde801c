/**
 * Error Taxonomy
 *
 * Every failure surfaced by the access layer, the repositories and the
 * analyzers extends GovernanceError and carries a stable `code`.
 */

export type GovernanceErrorCode =
  | "AUTH_FAILED"
  | "RATE_LIMIT_EXCEEDED"
  | "TRANSIENT_SERVER_ERROR"
  | "REQUEST_FAILED"
  | "NETWORK_TIMEOUT"
  | "NETWORK_ERROR"
  | "PAGINATION_LIMIT"
  | "NOT_FOUND"
  | "MALFORMED_ENTITY"
  | "ANALYZER_FAILED"
  | "INVALID_CONFIG";

export class GovernanceError extends Error {
  constructor(
    message: string,
    public readonly code: GovernanceErrorCode,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "GovernanceError";
  }
}

/** Credential exchange rejected, or a request was refused twice with 401. */
export class AuthError extends GovernanceError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, "AUTH_FAILED", options);
    this.name = "AuthError";
  }
}

export class RateLimitExceededError extends GovernanceError {
  constructor(
    public readonly path: string,
    public readonly attempts: number,
    public readonly retryAfterMs: number | null,
  ) {
    super(`Rate limit still in effect for ${path} after ${attempts} attempt(s)`, "RATE_LIMIT_EXCEEDED");
    this.name = "RateLimitExceededError";
  }
}

export class TransientServerError extends GovernanceError {
  constructor(
    public readonly path: string,
    public readonly status: number,
    public readonly attempts: number,
    public readonly body?: unknown,
  ) {
    super(`Server error HTTP ${status} for ${path} after ${attempts} attempt(s)`, "TRANSIENT_SERVER_ERROR");
    this.name = "TransientServerError";
  }
}

/** Non-retryable 4xx. `body` holds the parsed error payload for diagnostics. */
export class RequestError extends GovernanceError {
  constructor(
    public readonly path: string,
    public readonly status: number,
    public readonly body: unknown,
  ) {
    super(`Request to ${path} failed with HTTP ${status}${describeGraphError(body)}`, "REQUEST_FAILED");
    this.name = "RequestError";
  }
}

export class NetworkTimeoutError extends GovernanceError {
  constructor(
    public readonly path: string,
    public readonly timeoutMs: number,
    public readonly attempts: number,
    options?: { cause?: unknown },
  ) {
    super(`Request to ${path} timed out after ${timeoutMs}ms (${attempts} attempt(s))`, "NETWORK_TIMEOUT", options);
    this.name = "NetworkTimeoutError";
  }
}

export class NetworkError extends GovernanceError {
  constructor(
    public readonly path: string,
    public readonly attempts: number,
    options?: { cause?: unknown },
  ) {
    super(`Request to ${path} failed before a response was received (${attempts} attempt(s))`, "NETWORK_ERROR", options);
    this.name = "NetworkError";
  }
}

/** The continuation chain did not terminate within the configured caps. */
export class PaginationError extends GovernanceError {
  constructor(
    public readonly path: string,
    public readonly pages: number,
    public readonly items: number,
  ) {
    super(`Pagination for ${path} exceeded safety cap (${pages} pages, ${items} items)`, "PAGINATION_LIMIT");
    this.name = "PaginationError";
  }
}

export class NotFoundError extends GovernanceError {
  constructor(public readonly resource: string, detail?: string) {
    super(`No ${resource} found${detail ? `: ${detail}` : ""}`, "NOT_FOUND");
    this.name = "NotFoundError";
  }
}

export class MalformedEntityError extends GovernanceError {
  constructor(
    public readonly entity: string,
    public readonly field: string,
    public readonly index?: number,
  ) {
    super(
      `Malformed ${entity}${index !== undefined ? ` at index ${index}` : ""}: missing or invalid "${field}"`,
      "MALFORMED_ENTITY",
    );
    this.name = "MalformedEntityError";
  }
}

export class AnalyzerError extends GovernanceError {
  constructor(
    public readonly analyzer: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(`${analyzer}: ${message}`, "ANALYZER_FAILED", options);
    this.name = "AnalyzerError";
  }
}

export class ConfigError extends GovernanceError {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration:\n  - ${issues.join("\n  - ")}`, "INVALID_CONFIG");
    this.name = "ConfigError";
  }
}

// =============================================================================
// Error Formatting
// =============================================================================

function describeGraphError(body: unknown): string {
  if (typeof body !== "object" || body === null || !("error" in body)) return "";
  const inner = body.error;
  if (typeof inner !== "object" || inner === null) return "";
  const code = "code" in inner && typeof inner.code === "string" ? inner.code : "";
  const message = "message" in inner && typeof inner.message === "string" ? inner.message : "";
  if (!code && !message) return "";
  return `: ${[code && `[${code}]`, message].filter(Boolean).join(" ")}`;
}

/**
 * Format any thrown value into a single human-readable line.
 */
export function formatErrorMessage(error: unknown): string {
  if (error === null || error === undefined) return "Unknown error";
  if (typeof error === "string") return error;

  if (error instanceof GovernanceError) {
    return `[${error.code}] ${error.message}`;
  }
  if (error instanceof Error) {
    return error.message || error.name;
  }
  return String(error);
}

export function isGovernanceError(error: unknown): error is GovernanceError {
  return error instanceof GovernanceError;
}
