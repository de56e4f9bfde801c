/**
 * Record Windows
 *
 * Reads over the lazy record sequence of `GraphClient.pages()`. A window
 * pulls one record past its end to learn whether more exist, then stops, so
 * the rest of the continuation chain is never fetched.
 */

import { ConfigError } from "./errors.js";
import type { PagedResult, PaginationOptions } from "./graph/types.js";

function windowIssue(field: keyof PaginationOptions, value: number | undefined): string | undefined {
  if (value === undefined || (Number.isInteger(value) && value >= 0)) return undefined;
  return `pagination.${field} must be a non-negative integer (got ${value})`;
}

/** Rejects a limit or offset that is negative, fractional or not finite. */
export function validatePagination(window?: PaginationOptions): void {
  const issues = [windowIssue("limit", window?.limit), windowIssue("offset", window?.offset)].filter(
    (issue): issue is string => issue !== undefined,
  );
  if (issues.length > 0) throw new ConfigError(issues);
}

/**
 * Skip `offset` records, then take up to `limit`. `totalCount` is known only
 * when the sequence ran out inside the window.
 */
export async function readWindow<T>(records: AsyncIterable<T>, window: PaginationOptions = {}): Promise<PagedResult<T>> {
  validatePagination(window);
  const offset = window.offset ?? 0;
  const end = window.limit === undefined ? Number.POSITIVE_INFINITY : offset + window.limit;

  const items: T[] = [];
  let position = 0;
  for await (const record of records) {
    if (position >= end) return { items, hasMore: true };
    if (position >= offset) items.push(record);
    position++;
  }
  return { items, hasMore: false, totalCount: position };
}

/** Every record, in order. */
export async function readAll<T>(records: AsyncIterable<T>): Promise<T[]> {
  const items: T[] = [];
  for await (const record of records) items.push(record);
  return items;
}
