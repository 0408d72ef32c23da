import { basename, extname } from "node:path";
import type { CatalogSource } from "./schema";
import type { SourceMetadata } from "./types";
import { getMelonCategory, melonCategoryMetadata, melonSource, type MelonCategory } from "./sources/melon";

/** `melon_concerts_raw.json` and `concerts.json` both name the "concerts" category. */
export function categoryKeyFromFileName(file: string): string | undefined {
  const stem = basename(file, extname(file));
  return /^(?:melon_)?([a-z]+)(?:_raw)?$/.exec(stem)?.[1];
}

/**
 * The genre category a dump file belongs to. The file name wins; `fallbackKey`
 * covers files whose name does not name a category.
 */
export function resolveCategory(file: string, fallbackKey?: string): MelonCategory | undefined {
  const fromName = categoryKeyFromFileName(file);
  const named = fromName ? getMelonCategory(fromName) : undefined;
  if (named) return named;
  return fallbackKey ? getMelonCategory(fallbackKey) : undefined;
}

/** Metadata written at the top of the parsed document for one input file. */
export function fileMetadata(file: string, source: CatalogSource, fallbackCategory?: string): SourceMetadata {
  const category = source.id === melonSource.id ? resolveCategory(file, fallbackCategory) : undefined;
  return {
    source: source.id,
    source_name: source.name,
    source_file: basename(file),
    ...(category ? melonCategoryMetadata(category) : {}),
  };
}
