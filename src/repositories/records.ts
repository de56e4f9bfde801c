/**
 * Shared normalization helpers for repository mappers.
 */

import { MalformedEntityError } from "../errors.js";
import type { BatchResult, GraphApi } from "../graph/types.js";
import { isRecord, readString, type JsonRecord } from "../json.js";

/** Narrow a raw list item to an object carrying a string id. */
export function requireRecord(raw: unknown, entity: string, index: number, idField = "id"): { record: JsonRecord; id: string } {
  if (!isRecord(raw)) throw new MalformedEntityError(entity, idField, index);
  const id = readString(raw, idField);
  if (!id) throw new MalformedEntityError(entity, idField, index);
  return { record: raw, id };
}

export function mapRecords<T>(items: readonly unknown[], entity: string, map: (record: JsonRecord, id: string, index: number) => T, idField = "id"): T[] {
  return items.map((raw, index) => {
    const { record, id } = requireRecord(raw, entity, index, idField);
    return map(record, id, index);
  });
}

/** A string field the entity cannot be interpreted without. */
export function requireString(record: JsonRecord, field: string, entity: string, index: number): string {
  const value = readString(record, field);
  if (!value) throw new MalformedEntityError(entity, field, index);
  return value;
}

/**
 * Records of a collection returned through $batch. A sub-response carries only
 * its first page, so any continuation link is followed through the pager.
 * Failed sub-requests rethrow their error.
 */
export async function readBatchCollection(graph: GraphApi, result: BatchResult): Promise<unknown[]> {
  if (!result.ok) throw result.error;
  const body: JsonRecord = isRecord(result.body) ? result.body : {};
  const value: unknown[] = Array.isArray(body.value) ? body.value : [];
  const nextLink = readString(body, "@odata.nextLink");
  if (!nextLink) return value;
  return [...value, ...(await graph.getAllPages(nextLink))];
}
