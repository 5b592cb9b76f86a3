import { z } from 'zod';
import type { RawRecord } from '../types/telemetry.js';

const recordSchema = z.record(z.unknown());

export const searchHitSchema = z.object({
  _id: z.union([z.string(), z.number()]).optional(),
  _index: z.string().optional(),
  _source: recordSchema.optional(),
  fields: recordSchema.optional()
}).passthrough();

export const searchResponseSchema = z.object({
  _scroll_id: z.string().optional(),
  hits: z.object({
    total: z.union([z.number(), z.object({ value: z.number() }).passthrough()]).optional(),
    hits: z.array(searchHitSchema)
  }).passthrough()
}).passthrough();

export type SearchHit = z.infer<typeof searchHitSchema>;
export type SearchResponse = z.infer<typeof searchResponseSchema>;

/**
 * Total hit count, whichever shape the cluster reports it in
 */
export function totalHits(response: SearchResponse): number {
  const total = response.hits.total;
  if (total === undefined) {
    return response.hits.hits.length;
  }
  return typeof total === 'number' ? total : total.value;
}

/**
 * Flatten one hit into a parser row. `scripted_metric` values win over plain
 * `_source` keys; `fields` stays a nested collection and percentiles stay keyed.
 */
export function flattenHit(hit: SearchHit): RawRecord {
  const source = hit._source ?? {};
  const scripted = recordSchema.safeParse(source.scripted_metric);

  const row: Record<string, unknown> = { ...source };
  delete row.scripted_metric;

  if (scripted.success) {
    for (const [key, value] of Object.entries(scripted.data)) {
      if (value !== undefined && value !== null) {
        row[key] = value;
      }
    }
  }

  if (hit._id !== undefined) {
    row.id = String(hit._id);
  }
  if (hit.fields) {
    row.fields = hit.fields;
  }

  return row;
}

export function flattenHits(hits: readonly SearchHit[]): RawRecord[] {
  return hits.map(flattenHit);
}
