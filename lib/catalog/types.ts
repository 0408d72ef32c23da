import type { Distribution } from "@/types";

/**
 * One record as the platform returned it, after the top-level JSON parse.
 * Embedded document fields still hold their string-encoded JSON.
 */
export type RawRecord = Record<string, unknown>;

/**
 * Raw record with embedded fields decoded and one array per extraction rule
 * attached under the rule's target field.
 */
export type NormalizedRecord = Record<string, unknown>;

/** Stands in for a record whose normalization threw. */
export type RecordFailure = {
  error: string;
  raw_data: unknown;
};

/** An entry of the output `events` list: a normalized record or a failure marker. */
export type CatalogEvent = NormalizedRecord;

/** Caller-defined description of where a batch came from (category, page, fetch time). */
export type SourceMetadata = Record<string, unknown>;

export interface PriceStats {
  min_price: number | null;
  max_price: number | null;
  avg_price: number | null;
  total_price_points: number;
}

export interface DateRangeStats {
  total_date_entries: number;
  sample_dates: string[];
  /** Earliest start value, sentinel dates excluded. */
  earliest_start: string | null;
  latest_end: string | null;
}

export interface AggregateReport {
  total_events: number;
  generated_at: string;
  categories: {
    total_categories: number;
    category_distribution: Distribution;
  };
  venues: {
    total_unique_venues: number;
    top_venues: Distribution;
    venue_distribution: Distribution;
  };
  regions: {
    total_regions: number;
    region_distribution: Distribution;
  };
  pricing: PriceStats;
  date_range: DateRangeStats;
  /** Configured flag label → matching records, in configuration order. */
  flag_counts: Distribution;
}

export type OutputDocument = SourceMetadata &
  AggregateReport & {
    extracted_at: string;
    events: CatalogEvent[];
  };
