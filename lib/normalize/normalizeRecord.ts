import type { EmbeddedField } from "@/lib/catalog/schema";
import type { NormalizedRecord, RawRecord } from "@/lib/catalog/types";
import { decodeEmbedded } from "./coerceScalar";
import { applyRule } from "./extractionRules";

/**
 * Decode the embedded document fields of one record and attach the collections
 * derived from them. Returns a new mapping; `raw` is left untouched.
 *
 * Every derived field is present, as `[]` when its document is missing or not
 * shaped as expected. Running this on its own output returns an equal record.
 */
export function normalizeRecord(
  raw: RawRecord,
  embeddedFields: readonly EmbeddedField[]
): NormalizedRecord {
  const out: NormalizedRecord = { ...raw };

  for (const { field } of embeddedFields) {
    if (Object.hasOwn(out, field)) out[field] = decodeEmbedded(out[field]);
  }

  for (const { field, rule } of embeddedFields) {
    if (!rule) continue;
    out[rule.target] = applyRule(rule, out[field]);
  }

  return out;
}
