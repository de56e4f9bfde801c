/**
 * Graph Client
 *
 * Bearer-authenticated JSON client for Microsoft Graph. Owns the retry loop,
 * the pagination loop and $batch dispatch. Each call keeps its own retry
 * state; the only state shared between concurrent calls is the token cache
 * behind the TokenProvider.
 */

import type { Credential, TokenProvider } from "../credentials/types.js";
import { emitGovernanceDiagnosticEvent } from "../diagnostics.js";
import {
  AuthError,
  GovernanceError,
  NetworkError,
  NetworkTimeoutError,
  PaginationError,
  RateLimitExceededError,
  RequestError,
  TransientServerError,
  formatErrorMessage,
  isGovernanceError,
} from "../errors.js";
import { isRecord, readNumber, readRecord, readString } from "../json.js";
import { createSilentLogger, type GovernanceLogger } from "../logging/index.js";
import { readAll, readWindow } from "../pagination.js";
import {
  RetryBudget,
  classifyNetworkFailure,
  classifyStatus,
  isIdempotentMethod,
  resolveRetryPolicy,
  sleep as defaultSleep,
  type HttpMethod,
  type ResponseOutcome,
  type RetryPolicy,
  type Sleep,
} from "../retry.js";
import type {
  BatchRequest,
  BatchResult,
  FetchLike,
  GraphApi,
  GraphClientOptions,
  Page,
  PagedResult,
  PaginationOptions,
  QueryParams,
  RequestOptions,
} from "./types.js";

export const GRAPH_ENDPOINT = "https://graph.microsoft.com/v1.0";
export const GRAPH_BETA_ENDPOINT = "https://graph.microsoft.com/beta";

export const GRAPH_CLIENT_DEFAULTS = {
  requestTimeoutMs: 30_000,
  batchSize: 20,
  maxPages: 1_000,
  maxItems: 100_000,
  cursorParam: "$skiptoken",
};

/** Graph rejects $batch payloads with more than 20 sub-requests. */
const GRAPH_MAX_BATCH_SIZE = 20;

type RawResponse = {
  status: number;
  headers: Headers;
  body: unknown;
};

type BatchEntry = {
  index: number;
  wireId: string;
  request: BatchRequest;
  budget: RetryBudget;
};

export class GraphClient implements GraphApi {
  private readonly tokenProvider: TokenProvider;
  private readonly baseUrl: string;
  private readonly retryPolicy: RetryPolicy;
  private readonly requestTimeoutMs: number;
  private readonly batchSize: number;
  private readonly maxPages: number;
  private readonly maxItems: number;
  private readonly cursorParam: string;
  private readonly fetchImpl: FetchLike;
  private readonly sleep: Sleep;
  private readonly random: () => number;
  private readonly logger: GovernanceLogger;

  constructor(options: GraphClientOptions) {
    this.tokenProvider = options.tokenProvider;
    this.baseUrl = (options.baseUrl ?? GRAPH_ENDPOINT).replace(/\/+$/, "");
    this.retryPolicy = resolveRetryPolicy(options.retry);
    this.requestTimeoutMs = options.requestTimeoutMs ?? GRAPH_CLIENT_DEFAULTS.requestTimeoutMs;
    this.batchSize = Math.min(GRAPH_MAX_BATCH_SIZE, Math.max(1, options.batchSize ?? GRAPH_CLIENT_DEFAULTS.batchSize));
    this.maxPages = options.maxPages ?? GRAPH_CLIENT_DEFAULTS.maxPages;
    this.maxItems = options.maxItems ?? GRAPH_CLIENT_DEFAULTS.maxItems;
    this.cursorParam = options.cursorParam ?? GRAPH_CLIENT_DEFAULTS.cursorParam;
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
    this.sleep = options.sleep ?? defaultSleep;
    this.random = options.random ?? Math.random;
    this.logger = options.logger ?? createSilentLogger();
  }

  // ---------------------------------------------------------------------------
  // Requests
  // ---------------------------------------------------------------------------

  /** Issue one call and return the parsed body (an empty object for empty bodies). */
  async request(method: HttpMethod, path: string, options: RequestOptions = {}): Promise<unknown> {
    const { response } = await this.execute(method, path, options);
    return response.body ?? {};
  }

  async get(path: string, params?: QueryParams): Promise<unknown> {
    return this.request("GET", path, { params });
  }

  async post(path: string, body: unknown): Promise<unknown> {
    return this.request("POST", path, { body });
  }

  async patch(path: string, body: unknown): Promise<unknown> {
    return this.request("PATCH", path, { body });
  }

  async delete(path: string): Promise<unknown> {
    return this.request("DELETE", path);
  }

  // ---------------------------------------------------------------------------
  // Pagination
  // ---------------------------------------------------------------------------

  /**
   * Lazy record sequence across every page of `path`. Each iteration starts
   * again from the first page; stopping early stops fetching.
   */
  pages(path: string, params?: QueryParams): AsyncIterable<unknown> {
    return {
      [Symbol.asyncIterator]: () => this.iterateRecords(path, params),
    };
  }

  async getAllPages(path: string, params?: QueryParams): Promise<unknown[]> {
    const items = await readAll(this.pages(path, params));
    this.logger.debug(`Retrieved ${items.length} items from ${path}`);
    return items;
  }

  /** Read at most `limit` records after `offset`, fetching only the pages needed. */
  async getPage(path: string, pagination: PaginationOptions, params?: QueryParams): Promise<PagedResult<unknown>> {
    return readWindow(this.pages(path, params), pagination);
  }

  private async *iterateRecords(path: string, params?: QueryParams): AsyncGenerator<unknown, void, undefined> {
    for await (const page of this.walkPages(path, params)) {
      yield* page.items;
    }
  }

  private async *walkPages(path: string, params?: QueryParams): AsyncGenerator<Page, void, undefined> {
    let target = path;
    let query = params;
    let pageCount = 0;
    let itemCount = 0;
    const seenCursors = new Set<string>();

    for (;;) {
      if (pageCount >= this.maxPages) {
        throw new PaginationError(path, pageCount, itemCount);
      }

      const { response } = await this.execute("GET", target, { params: query });
      const page = extractPage(response.body, response.headers);
      pageCount++;
      itemCount += page.items.length;

      if (itemCount > this.maxItems) {
        throw new PaginationError(path, pageCount, itemCount);
      }

      yield page;

      const cursor = page.nextCursor;
      if (!cursor) return;
      if (seenCursors.has(cursor)) {
        throw new PaginationError(path, pageCount, itemCount);
      }
      seenCursors.add(cursor);

      if (isAbsoluteUrl(cursor)) {
        target = cursor;
        query = undefined;
      } else {
        target = path;
        query = { ...params, [this.cursorParam]: cursor };
      }
    }
  }

  // ---------------------------------------------------------------------------
  // Batching
  // ---------------------------------------------------------------------------

  /**
   * Dispatch independent sub-requests through $batch, `batchSize` at a time.
   * Results line up one-to-one with `requests`; a failed sub-request is
   * reported in its slot and never aborts its siblings, and an envelope that
   * fails after its retries fails only the slots it carried.
   */
  async batch(requests: readonly BatchRequest[]): Promise<BatchResult[]> {
    const results: BatchResult[] = [];

    for (let start = 0; start < requests.length; start += this.batchSize) {
      const entries: BatchEntry[] = requests.slice(start, start + this.batchSize).map((request, offset) => ({
        index: start + offset,
        wireId: String(start + offset + 1),
        request,
        budget: new RetryBudget(this.retryPolicy),
      }));
      const chunkResults = await this.runBatchChunk(entries);
      for (const entry of entries) {
        const result = chunkResults.get(entry.index);
        results.push(result ?? missingSubResponse(entry));
      }
    }

    return results;
  }

  private async runBatchChunk(entries: BatchEntry[]): Promise<Map<number, BatchResult>> {
    const done = new Map<number, BatchResult>();
    let pending = entries;

    while (pending.length > 0) {
      const envelopeIdempotent = pending.every((e) => isIdempotentMethod(e.request.method));
      let envelope: { response: RawResponse; credential: Credential };
      try {
        envelope = await this.execute("POST", "$batch", {
          body: { requests: pending.map(toWireRequest) },
          idempotent: envelopeIdempotent,
        });
      } catch (error) {
        if (!isGovernanceError(error)) throw error;
        // The envelope itself failed for good: every sub-request still pending shares its error.
        this.logger.warn(`Batch envelope failed; reporting ${pending.length} sub-request(s) as failed`, { code: error.code });
        for (const entry of pending) done.set(entry.index, envelopeFailure(entry, error));
        break;
      }
      const { response, credential } = envelope;

      const subResponses = indexSubResponses(response.body);
      const retry: BatchEntry[] = [];
      let waitMs = 0;
      let refreshToken = false;

      for (const entry of pending) {
        const sub = subResponses.get(entry.wireId);
        if (!sub) {
          done.set(entry.index, missingSubResponse(entry));
          continue;
        }

        const outcome = classifyStatus(sub.status, sub.retryAfter);
        const id = entry.request.id ?? String(entry.index);
        const path = entry.request.path;
        const replayable = isIdempotentMethod(entry.request.method);

        switch (outcome.kind) {
          case "success":
            done.set(entry.index, { id, ok: true, status: sub.status, body: sub.body });
            break;
          case "auth-expired":
            if (entry.budget.take("auth")) {
              refreshToken = true;
              retry.push(entry);
            } else {
              done.set(entry.index, { id, ok: false, status: sub.status, error: new AuthError(`Sub-request ${path} rejected with 401 after token refresh`) });
            }
            break;
          case "rate-limited": {
            if (replayable && entry.budget.take("rate-limit")) {
              waitMs = Math.max(waitMs, outcome.retryAfterMs ?? entry.budget.backoffDelay("rate-limit", this.random));
              retry.push(entry);
            } else {
              done.set(entry.index, {
                id,
                ok: false,
                status: sub.status,
                error: new RateLimitExceededError(path, entry.budget.attempts(), outcome.retryAfterMs),
              });
            }
            break;
          }
          case "transient-error": {
            if (replayable && entry.budget.take("server-error")) {
              waitMs = Math.max(waitMs, entry.budget.backoffDelay("server-error", this.random));
              retry.push(entry);
            } else {
              done.set(entry.index, {
                id,
                ok: false,
                status: sub.status,
                error: new TransientServerError(path, sub.status, entry.budget.attempts(), sub.body),
              });
            }
            break;
          }
          case "client-error":
          case "network-failure":
            done.set(entry.index, { id, ok: false, status: sub.status, error: new RequestError(path, sub.status, sub.body) });
            break;
        }
      }

      if (refreshToken) {
        this.tokenProvider.invalidate(credential);
      }
      if (retry.length > 0) {
        this.logger.warn(`Retrying ${retry.length} batch sub-request(s)`, { delayMs: waitMs });
        emitGovernanceDiagnosticEvent({ type: "graph.retry", method: "POST", path: "$batch", delayMs: waitMs, outcome: "sub-request" });
        if (waitMs > 0) await this.sleep(waitMs);
      }
      pending = retry;
    }

    return done;
  }

  // ---------------------------------------------------------------------------
  // Retry loop
  // ---------------------------------------------------------------------------

  private async execute(
    method: HttpMethod,
    target: string,
    options: RequestOptions,
  ): Promise<{ response: RawResponse; credential: Credential }> {
    const url = this.resolveUrl(target, options.params);
    const path = describePath(target, this.baseUrl);
    const replayable = options.idempotent ?? isIdempotentMethod(method);
    const budget = new RetryBudget(this.retryPolicy);

    for (;;) {
      const credential = await this.tokenProvider.getToken();
      const attempt = budget.attempts();
      const started = Date.now();

      let outcome: ResponseOutcome;
      let response: RawResponse | null = null;
      try {
        const res = await this.fetchImpl(url, {
          method,
          headers: buildHeaders(credential, options),
          body: options.body === undefined ? undefined : JSON.stringify(options.body),
          signal: AbortSignal.timeout(this.requestTimeoutMs),
        });
        response = { status: res.status, headers: res.headers, body: await readBody(res) };
        outcome = classifyStatus(res.status, res.headers.get("retry-after"));
      } catch (error) {
        // Includes failures while reading the body; the status was never observed.
        response = null;
        outcome = classifyNetworkFailure(error);
      }

      emitGovernanceDiagnosticEvent({
        type: "graph.request",
        method,
        path,
        attempt,
        durationMs: Date.now() - started,
        statusCode: response?.status,
        outcome: outcome.kind,
      });

      switch (outcome.kind) {
        case "success":
          if (response === null) throw new NetworkError(path, attempt);
          return { response, credential };

        case "auth-expired":
          if (!budget.take("auth")) {
            throw this.fail(new AuthError(`Request to ${path} rejected with 401 after token refresh`), method, path);
          }
          this.logger.info(`Token rejected for ${path}; refreshing and retrying once`);
          this.tokenProvider.invalidate(credential);
          continue;

        case "rate-limited": {
          if (!replayable || !budget.take("rate-limit")) {
            throw this.fail(new RateLimitExceededError(path, budget.attempts(), outcome.retryAfterMs), method, path);
          }
          const delayMs = outcome.retryAfterMs ?? budget.backoffDelay("rate-limit", this.random);
          await this.backoff(method, path, outcome, delayMs);
          continue;
        }

        case "transient-error": {
          if (!replayable || !budget.take("server-error")) {
            throw this.fail(new TransientServerError(path, outcome.status, budget.attempts(), response?.body), method, path);
          }
          await this.backoff(method, path, outcome, budget.backoffDelay("server-error", this.random));
          continue;
        }

        case "client-error":
          throw this.fail(new RequestError(path, outcome.status, response?.body ?? null), method, path);

        case "network-failure": {
          // Nothing reached the server, so writes may be replayed too.
          if (!budget.take("network")) {
            const error = outcome.timedOut
              ? new NetworkTimeoutError(path, this.requestTimeoutMs, budget.attempts(), { cause: outcome.cause })
              : new NetworkError(path, budget.attempts(), { cause: outcome.cause });
            throw this.fail(error, method, path);
          }
          await this.backoff(method, path, outcome, budget.backoffDelay("network", this.random));
          continue;
        }
      }
    }
  }

  private async backoff(method: HttpMethod, path: string, outcome: ResponseOutcome, delayMs: number): Promise<void> {
    const reason = outcome.kind === "network-failure" ? formatErrorMessage(outcome.cause) : `HTTP ${outcome.status}`;
    this.logger.warn(`${method} ${path} ${outcome.kind} (${reason}); retrying in ${delayMs}ms`);
    emitGovernanceDiagnosticEvent({ type: "graph.retry", method, path, delayMs, outcome: outcome.kind });
    await this.sleep(delayMs);
  }

  private fail(error: GovernanceError, method: HttpMethod, path: string): GovernanceError {
    this.logger.error(`${method} ${path} failed: ${error.message}`);
    emitGovernanceDiagnosticEvent({ type: "graph.error", method, path, error: error.message, outcome: error.code });
    return error;
  }

  private resolveUrl(target: string, params?: QueryParams): string {
    const url = new URL(isAbsoluteUrl(target) ? target : `${this.baseUrl}/${target.replace(/^\/+/, "")}`);
    if (params) {
      for (const [key, value] of Object.entries(params)) {
        if (value !== undefined) url.searchParams.set(key, String(value));
      }
    }
    return url.toString();
  }
}

// =============================================================================
// Helpers
// =============================================================================

function isAbsoluteUrl(value: string): boolean {
  return /^https?:\/\//i.test(value);
}

function describePath(target: string, baseUrl: string): string {
  const relative = target.startsWith(baseUrl) ? target.slice(baseUrl.length) : target;
  return relative.replace(/^\/+/, "").split("?")[0] || "/";
}

function buildHeaders(credential: Credential, options: RequestOptions): Record<string, string> {
  const headers: Record<string, string> = {
    Authorization: `Bearer ${credential.accessToken}`,
    Accept: "application/json",
    ...options.headers,
  };
  if (options.body !== undefined) headers["Content-Type"] = "application/json";
  return headers;
}

async function readBody(res: Response): Promise<unknown> {
  const text = await res.text();
  if (!text) return undefined;
  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch {
    // Plain-text error pages are kept verbatim for diagnostics.
    return text;
  }
}

/**
 * Recognised envelopes: Graph `{ value, @odata.nextLink }`, generic
 * `{ items, nextCursor | next_cursor }`, and a bare array continued through
 * the `x-next-cursor` header. Any other object is a single record.
 */
export function extractPage(body: unknown, headers?: Headers): Page {
  if (body === undefined || body === null) return { items: [] };

  if (Array.isArray(body)) {
    return { items: body, nextCursor: headers?.get("x-next-cursor") ?? undefined };
  }

  if (isRecord(body)) {
    const value = body.value;
    if (Array.isArray(value)) {
      return { items: value, nextCursor: readString(body, "@odata.nextLink") };
    }
    const items = body.items;
    if (Array.isArray(items)) {
      return { items, nextCursor: readString(body, "nextCursor") ?? readString(body, "next_cursor") };
    }
    return { items: [body] };
  }

  return { items: [] };
}

function toWireRequest(entry: BatchEntry): Record<string, unknown> {
  const wire: Record<string, unknown> = {
    id: entry.wireId,
    method: entry.request.method,
    url: `/${entry.request.path.replace(/^\/+/, "")}`,
  };
  if (entry.request.body !== undefined) {
    wire.body = entry.request.body;
    wire.headers = { "Content-Type": "application/json", ...entry.request.headers };
  } else if (entry.request.headers) {
    wire.headers = entry.request.headers;
  }
  return wire;
}

type SubResponse = { status: number; body: unknown; retryAfter: string | null };

function indexSubResponses(body: unknown): Map<string, SubResponse> {
  const indexed = new Map<string, SubResponse>();
  if (!isRecord(body) || !Array.isArray(body.responses)) return indexed;

  for (const raw of body.responses) {
    if (!isRecord(raw)) continue;
    const id = readString(raw, "id");
    const status = readNumber(raw, "status");
    if (id === undefined || status === undefined) continue;
    const headers = readRecord(raw, "headers");
    const retryAfter = headers ? (readString(headers, "Retry-After") ?? readString(headers, "retry-after") ?? null) : null;
    indexed.set(id, { status, body: raw.body, retryAfter });
  }
  return indexed;
}

function envelopeFailure(entry: BatchEntry, error: GovernanceError): BatchResult {
  const status = error instanceof RequestError || error instanceof TransientServerError ? error.status : null;
  return { id: entry.request.id ?? String(entry.index), ok: false, status, error };
}

function missingSubResponse(entry: BatchEntry): BatchResult {
  return {
    id: entry.request.id ?? String(entry.index),
    ok: false,
    status: null,
    error: new GovernanceError(`No response returned for batch sub-request ${entry.request.path}`, "REQUEST_FAILED"),
  };
}
