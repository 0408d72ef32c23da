import { DEFAULT_SAMPLE_DATES, DEFAULT_TOP_VENUES } from "@/types";

/**
 * Environment-driven knobs for the CLI. The pipeline itself never reads the
 * environment; callers pass these values in.
 */
function positiveIntFromEnv(name: string, fallback: number): number {
  const raw = process.env[name]?.trim();
  if (!raw) return fallback;
  const n = Number.parseInt(raw, 10);
  if (!Number.isFinite(n) || n <= 0) return fallback;
  return n;
}

export function getTopVenuesLimit(): number {
  return positiveIntFromEnv("CATALOG_TOP_VENUES", DEFAULT_TOP_VENUES);
}

export function getSampleDatesLimit(): number {
  return positiveIntFromEnv("CATALOG_SAMPLE_DATES", DEFAULT_SAMPLE_DATES);
}

/**
 * Date values that mean "no date" (comma-separated), replacing the source's own
 * list. Unset keeps the source's list; an empty string disables sentinels.
 */
export function getDateSentinels(): string[] | undefined {
  const raw = process.env.CATALOG_DATE_SENTINELS;
  if (raw == null) return undefined;
  return raw
    .split(",")
    .map((s) => s.trim())
    .filter(Boolean);
}
