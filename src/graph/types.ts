/**
 * Graph Client Types
 */

import type { TokenProvider } from "../credentials/types.js";
import type { GovernanceError } from "../errors.js";
import type { GovernanceLogger } from "../logging/index.js";
import type { HttpMethod, Sleep } from "../retry.js";
import type { GraphRetryOptions } from "../types.js";

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

export type QueryParams = Record<string, string | number | boolean | undefined>;

export type RequestOptions = {
  params?: QueryParams;
  body?: unknown;
  headers?: Record<string, string>;
  /**
   * Override the replay rule. Defaults to true for GET only; the batch
   * envelope sets it when every sub-request is a read.
   */
  idempotent?: boolean;
};

export type GraphClientOptions = {
  tokenProvider: TokenProvider;
  baseUrl?: string;
  retry?: GraphRetryOptions;
  requestTimeoutMs?: number;
  batchSize?: number;
  maxPages?: number;
  maxItems?: number;
  /** Query parameter carrying an opaque continuation cursor. */
  cursorParam?: string;
  fetch?: FetchLike;
  sleep?: Sleep;
  random?: () => number;
  logger?: GovernanceLogger;
};

/** One page of a list response. Consumed by the pagination loop, never retained. */
export type Page = {
  items: unknown[];
  nextCursor?: string;
};

export type BatchRequest = {
  /** Caller correlation id, echoed in the result. Defaults to the input position. */
  id?: string;
  method: HttpMethod;
  path: string;
  body?: unknown;
  headers?: Record<string, string>;
};

export type BatchResult =
  | { id: string; ok: true; status: number; body: unknown }
  | { id: string; ok: false; status: number | null; error: GovernanceError };

export type PagedResult<T> = {
  items: T[];
  hasMore: boolean;
  totalCount?: number;
};

export type PaginationOptions = {
  limit?: number;
  offset?: number;
};

/** Surface the repositories depend on; lets tests substitute an in-process client. */
export interface GraphApi {
  request(method: HttpMethod, path: string, options?: RequestOptions): Promise<unknown>;
  pages(path: string, params?: QueryParams): AsyncIterable<unknown>;
  getAllPages(path: string, params?: QueryParams): Promise<unknown[]>;
  batch(requests: readonly BatchRequest[]): Promise<BatchResult[]>;
}
