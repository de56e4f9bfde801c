/**
 * In-process GraphApi for repository and service tests. Collections are
 * served whole; failures are registered per path.
 */

import { GovernanceError, RequestError } from "../errors.js";
import type { BatchRequest, BatchResult, GraphApi, QueryParams, RequestOptions } from "../graph/types.js";
import type { HttpMethod } from "../retry.js";

export type FakeCall = { method: HttpMethod | "BATCH"; path: string; params?: QueryParams; body?: unknown };

export class FakeGraph implements GraphApi {
  readonly calls: FakeCall[] = [];
  private readonly collections = new Map<string, unknown[]>();
  private readonly bodies = new Map<string, unknown>();
  private readonly failures = new Map<string, GovernanceError>();

  /** Serve `items` for list reads of `path` (and as `{ value }` through $batch). */
  collection(path: string, items: unknown[]): this {
    this.collections.set(path, items);
    return this;
  }

  body(path: string, body: unknown): this {
    this.bodies.set(path, body);
    return this;
  }

  fail(path: string, error: GovernanceError): this {
    this.failures.set(path, error);
    return this;
  }

  callsTo(path: string): FakeCall[] {
    return this.calls.filter((c) => c.path === path);
  }

  async request(method: HttpMethod, path: string, options: RequestOptions = {}): Promise<unknown> {
    this.calls.push({ method, path, params: options.params, body: options.body });
    this.throwIfFailing(path);
    if (this.bodies.has(path)) return this.bodies.get(path);
    if (method !== "GET") return {};
    const items = this.collections.get(path);
    if (items) return { value: items };
    throw new RequestError(path, 404, null);
  }

  pages(path: string, params?: QueryParams): AsyncIterable<unknown> {
    const read = () => this.getAllPages(path, params);
    return {
      async *[Symbol.asyncIterator]() {
        yield* await read();
      },
    };
  }

  async getAllPages(path: string, params?: QueryParams): Promise<unknown[]> {
    this.calls.push({ method: "GET", path, params });
    this.throwIfFailing(path);
    const items = this.collections.get(path);
    if (!items) throw new RequestError(path, 404, null);
    return [...items];
  }

  async batch(requests: readonly BatchRequest[]): Promise<BatchResult[]> {
    return requests.map((r, index): BatchResult => {
      this.calls.push({ method: "BATCH", path: r.path, body: r.body });
      const id = r.id ?? String(index);
      const failure = this.failures.get(r.path);
      if (failure) {
        return { id, ok: false, status: failure instanceof RequestError ? failure.status : null, error: failure };
      }
      const items = this.collections.get(r.path);
      if (!items) return { id, ok: false, status: 404, error: new RequestError(r.path, 404, null) };
      return { id, ok: true, status: 200, body: { value: items } };
    });
  }

  private throwIfFailing(path: string): void {
    const failure = this.failures.get(path);
    if (failure) throw failure;
  }
}
