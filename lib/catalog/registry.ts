import { defineSource, type CatalogSource, type CatalogSourceInput } from "./schema";

const sources: CatalogSource[] = [];

export function registerSource(input: CatalogSourceInput): void {
  const source = defineSource(input);
  if (sources.some((s) => s.id === source.id)) return;
  sources.push(source);
}

export function getSources(): CatalogSource[] {
  return [...sources];
}

export function getSourceById(id: string): CatalogSource | undefined {
  return sources.find((s) => s.id === id);
}
