/** Label → occurrence count, ordered by count descending. */
export type Distribution = Record<string, number>;

export const DEFAULT_TOP_VENUES = 10;
export const DEFAULT_SAMPLE_DATES = 5;
/** Melon uses 9999-12-31 for open-ended runs. */
export const DEFAULT_DATE_SENTINELS = ["99991231"] as const;

export function isRecord(value: unknown): value is Record<string, unknown> {
  return value != null && typeof value === "object" && !Array.isArray(value);
}
