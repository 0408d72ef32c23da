import type { CatalogSource } from "@/lib/catalog/schema";
import type { OutputDocument, SourceMetadata } from "@/lib/catalog/types";
import { aggregate, assemble, type AggregateOptions } from "@/lib/stats/aggregateBatch";
import { normalizeBatch } from "./normalizeBatch";
import { readBatch } from "./readBatch";

export interface ProcessOptions extends AggregateOptions {
  /** Defaults to `options.now`, then the current time. */
  extractedAt?: Date;
}

/**
 * Fetched batch document → output document for one source.
 * Throws `BatchError` only when the document itself is unusable.
 */
export function processCatalog(
  input: unknown,
  source: CatalogSource,
  metadata: SourceMetadata = {},
  options: ProcessOptions = {}
): OutputDocument {
  const items = readBatch(input, source.listKey);
  const { events, failures } = normalizeBatch(items, source.embeddedFields);

  if (failures.length > 0) {
    console.warn(
      `[catalog] ${source.id}: ${failures.length} of ${events.length} records failed`,
      failures.slice(0, 3).map((f) => f.error)
    );
  }

  const report = aggregate(events, source.dimensions, options);
  const extractedAt = options.extractedAt ?? options.now ?? new Date();
  console.info(
    `[catalog] ${source.id}: ${report.total_events} events, ${report.venues.total_unique_venues} venues`
  );
  return assemble(events, report, metadata, extractedAt);
}
