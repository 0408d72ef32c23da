import { isRecord } from "@/types";
import type { EmbeddedField } from "@/lib/catalog/schema";
import type { CatalogEvent, RecordFailure } from "@/lib/catalog/types";
import { normalizeRecord } from "@/lib/normalize/normalizeRecord";
import { errorMessage } from "./errors";

export interface NormalizedBatch {
  events: CatalogEvent[];
  /** Markers also present in `events`, at their original positions. */
  failures: RecordFailure[];
}

function isEmptyItem(item: unknown): boolean {
  return item == null || (isRecord(item) && Object.keys(item).length === 0);
}

/**
 * Normalize every item of a batch independently. Null and `{}` items are dropped;
 * an item that is not a mapping, or whose normalization throws, is replaced by a
 * failure marker so the rest of the batch still goes through.
 */
export function normalizeBatch(items: readonly unknown[], embeddedFields: readonly EmbeddedField[]): NormalizedBatch {
  const events: CatalogEvent[] = [];
  const failures: RecordFailure[] = [];

  for (const item of items) {
    if (isEmptyItem(item)) continue;
    try {
      if (!isRecord(item)) {
        throw new TypeError(`Expected a record object, got ${Array.isArray(item) ? "array" : typeof item}`);
      }
      events.push(normalizeRecord(item, embeddedFields));
    } catch (e) {
      const failure: RecordFailure = { error: errorMessage(e), raw_data: item };
      failures.push(failure);
      events.push(failure);
    }
  }

  return { events, failures };
}
