import { DEFAULT_SAMPLE_DATES, DEFAULT_TOP_VENUES, isRecord, type Distribution } from "@/types";
import type { StatsDimensions } from "@/lib/catalog/schema";
import type {
  AggregateReport,
  CatalogEvent,
  DateRangeStats,
  OutputDocument,
  PriceStats,
  SourceMetadata,
} from "@/lib/catalog/types";

export interface AggregateOptions {
  /** How many venues go into `top_venues`. */
  topVenues?: number;
  /** How many period strings go into `date_range.sample_dates`. */
  sampleDates?: number;
  now?: Date;
}

/** Non-blank string (trimmed) or finite number; anything else is "no value". */
function labelOf(value: unknown): string | null {
  if (typeof value === "string") {
    const s = value.trim();
    return s ? s : null;
  }
  if (typeof value === "number" && Number.isFinite(value)) return String(value);
  return null;
}

class Counter {
  private readonly counts = new Map<string, number>();

  add(label: string | null): void {
    if (label == null) return;
    this.counts.set(label, (this.counts.get(label) ?? 0) + 1);
  }

  get size(): number {
    return this.counts.size;
  }

  /** Most common first; Map iteration order keeps ties in first-seen order. */
  mostCommon(limit?: number): Distribution {
    const entries = [...this.counts.entries()].sort((a, b) => b[1] - a[1]);
    return Object.fromEntries(limit == null ? entries : entries.slice(0, limit));
  }
}

function collectPrices(record: Record<string, unknown>, price: StatsDimensions["price"], into: number[]): void {
  if (!price) return;
  const tiers = record[price.collection];
  if (!Array.isArray(tiers)) return;
  for (const tier of tiers) {
    if (!isRecord(tier)) continue;
    const value = tier[price.field];
    if (typeof value === "number" && Number.isFinite(value)) into.push(value);
  }
}

function priceStats(prices: number[]): PriceStats {
  if (prices.length === 0) {
    return { min_price: null, max_price: null, avg_price: null, total_price_points: 0 };
  }
  let min = prices[0];
  let max = prices[0];
  let sum = 0;
  for (const p of prices) {
    if (p < min) min = p;
    if (p > max) max = p;
    sum += p;
  }
  return {
    min_price: min,
    max_price: max,
    avg_price: Math.round((sum / prices.length) * 100) / 100,
    total_price_points: prices.length,
  };
}

/**
 * Descriptive statistics over one batch, in a single pass.
 * A record missing a dimension is left out of that dimension's counts but is
 * always part of `total_events`.
 */
export function aggregate(
  records: readonly CatalogEvent[],
  dimensions: StatsDimensions,
  options: AggregateOptions = {}
): AggregateReport {
  const topVenues = options.topVenues ?? DEFAULT_TOP_VENUES;
  const sampleLimit = options.sampleDates ?? DEFAULT_SAMPLE_DATES;
  const sentinels = new Set(dimensions.dateSentinels);

  const categories = new Counter();
  const venues = new Counter();
  const regions = new Counter();
  const prices: number[] = [];
  const sampleDates: string[] = [];
  let dateEntries = 0;
  let earliestStart: string | null = null;
  let latestEnd: string | null = null;
  const flags = Object.entries(dimensions.flags ?? {});
  const flagCounts: Distribution = Object.fromEntries(flags.map(([label]) => [label, 0]));

  const read = (record: Record<string, unknown>, field: string | undefined): string | null =>
    field == null ? null : labelOf(record[field]);

  for (const record of records) {
    categories.add(read(record, dimensions.categoryField));
    venues.add(read(record, dimensions.venueField));
    regions.add(read(record, dimensions.regionField));
    collectPrices(record, dimensions.price, prices);

    const period = read(record, dimensions.periodField);
    if (period != null) {
      dateEntries++;
      if (sampleDates.length < sampleLimit) sampleDates.push(period);
    }

    const start = read(record, dimensions.startDateField);
    if (start != null && !sentinels.has(start) && (earliestStart == null || start < earliestStart)) {
      earliestStart = start;
    }
    const end = read(record, dimensions.endDateField);
    if (end != null && !sentinels.has(end) && (latestEnd == null || end > latestEnd)) {
      latestEnd = end;
    }

    for (const [label, flag] of flags) {
      if (record[flag.field] === flag.value) flagCounts[label]++;
    }
  }

  const dateRange: DateRangeStats = {
    total_date_entries: dateEntries,
    sample_dates: sampleDates,
    earliest_start: earliestStart,
    latest_end: latestEnd,
  };

  return {
    total_events: records.length,
    generated_at: (options.now ?? new Date()).toISOString(),
    categories: {
      total_categories: categories.size,
      category_distribution: categories.mostCommon(),
    },
    venues: {
      total_unique_venues: venues.size,
      top_venues: venues.mostCommon(topVenues),
      venue_distribution: venues.mostCommon(),
    },
    regions: {
      total_regions: regions.size,
      region_distribution: regions.mostCommon(),
    },
    pricing: priceStats(prices),
    date_range: dateRange,
    flag_counts: flagCounts,
  };
}

/** Wrap metadata, report and records into the output document. No computation. */
export function assemble(
  records: CatalogEvent[],
  report: AggregateReport,
  metadata: SourceMetadata,
  extractedAt: Date = new Date()
): OutputDocument {
  return {
    ...metadata,
    extracted_at: extractedAt.toISOString(),
    ...report,
    events: records,
  };
}
