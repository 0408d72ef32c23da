import type { AggregateReport } from "@/lib/catalog/types";

export interface CategoryBreakdown {
  name: string;
  total_events: number;
  unique_venues: number;
  regions: string[];
  top_venues: string[];
}

export interface CatalogSummary {
  total_events_across_categories: number;
  total_unique_venues: number;
  total_regions: number;
  venue_list: string[];
  region_list: string[];
  category_breakdown: Record<string, CategoryBreakdown>;
  price_range: { lowest_price: number; highest_price: number } | null;
  generated_at: string;
}

/** Category key → its aggregate report, with an optional display name. */
export interface CategoryReport {
  key: string;
  name?: string;
  report: AggregateReport;
}

const BREAKDOWN_TOP_VENUES = 5;

/** Merge per-category reports into one cross-category overview. */
export function summarizeCategories(categories: readonly CategoryReport[], now = new Date()): CatalogSummary {
  let totalEvents = 0;
  const venues = new Set<string>();
  const regions = new Set<string>();
  let lowest: number | null = null;
  let highest: number | null = null;
  const breakdown: Record<string, CategoryBreakdown> = {};

  for (const { key, name, report } of categories) {
    const venueNames = Object.keys(report.venues.venue_distribution);
    const regionNames = Object.keys(report.regions.region_distribution);

    breakdown[key] = {
      name: name ?? key,
      total_events: report.total_events,
      unique_venues: report.venues.total_unique_venues,
      regions: regionNames,
      top_venues: Object.keys(report.venues.top_venues).slice(0, BREAKDOWN_TOP_VENUES),
    };

    totalEvents += report.total_events;
    venueNames.forEach((v) => venues.add(v));
    regionNames.forEach((r) => regions.add(r));

    const { min_price, max_price } = report.pricing;
    if (min_price != null && (lowest == null || min_price < lowest)) lowest = min_price;
    if (max_price != null && (highest == null || max_price > highest)) highest = max_price;
  }

  return {
    total_events_across_categories: totalEvents,
    total_unique_venues: venues.size,
    total_regions: regions.size,
    venue_list: [...venues].sort(),
    region_list: [...regions].sort(),
    category_breakdown: breakdown,
    price_range: lowest != null && highest != null ? { lowest_price: lowest, highest_price: highest } : null,
    generated_at: now.toISOString(),
  };
}
