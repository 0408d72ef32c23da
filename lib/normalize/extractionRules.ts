import { isRecord } from "@/types";
import type { ExtractionRule } from "@/lib/catalog/schema";

/** Walk mapping keys; any non-mapping on the way yields undefined. */
export function readPath(doc: unknown, path: readonly string[]): unknown {
  let node = doc;
  for (const key of path) {
    if (!isRecord(node) || !Object.hasOwn(node, key)) return undefined;
    node = node[key];
  }
  return node;
}

function listAt(doc: unknown, path: readonly string[]): unknown[] {
  if (!isRecord(doc)) return [];
  const list = readPath(doc, path);
  return Array.isArray(list) ? list : [];
}

/**
 * One output row per (group, item): the group's identifying fields, read once,
 * merged with each item. Item keys win on conflict. Missing group fields are null.
 */
function flattenGroups(
  groups: unknown[],
  groupFields: readonly string[],
  itemsKey: string
): Record<string, unknown>[] {
  const rows: Record<string, unknown>[] = [];
  for (const group of groups) {
    if (!isRecord(group)) continue;
    const base: Record<string, unknown> = {};
    for (const f of groupFields) base[f] = group[f] ?? null;
    const items = group[itemsKey];
    if (!Array.isArray(items)) continue;
    for (const item of items) {
      if (!isRecord(item)) continue;
      rows.push({ ...base, ...item });
    }
  }
  return rows;
}

/** Derive the collection a rule describes from an already-decoded document. Never throws. */
export function applyRule(rule: ExtractionRule, decoded: unknown): unknown[] {
  switch (rule.kind) {
    case "list":
      return [...listAt(decoded, rule.path)];
    case "groups":
      return flattenGroups(listAt(decoded, rule.path), rule.groupFields, rule.itemsKey);
  }
}
