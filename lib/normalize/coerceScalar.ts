/**
 * Interpret a string as an embedded JSON document.
 * Non-strings come back as-is; a blank string comes back trimmed; text that is
 * not valid JSON comes back as the original, untrimmed string.
 */
export function coerceScalar(value: unknown): unknown {
  if (typeof value !== "string") return value;
  const trimmed = value.trim();
  if (!trimmed) return trimmed;
  try {
    const parsed: unknown = JSON.parse(trimmed);
    return parsed;
  } catch {
    return value;
  }
}

/**
 * Apply `coerceScalar` until the value stops changing, so a document that was
 * string-encoded twice ends up fully decoded. Each successful pass on a string
 * strips at least its surrounding quotes, so the loop ends.
 */
export function decodeEmbedded(value: unknown): unknown {
  let current = value;
  while (typeof current === "string") {
    const next = coerceScalar(current);
    if (next === current) break;
    current = next;
  }
  return current;
}
