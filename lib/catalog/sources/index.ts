import { registerSource } from "../registry";
import { melonSource } from "./melon";
import { melonGlobalSource } from "./melonGlobal";

export function registerAllSources(): void {
  registerSource(melonSource);
  registerSource(melonGlobalSource);
}

export { melonSource, melonGlobalSource };
export { MELON_CATEGORIES, getMelonCategory, melonCategoryMetadata, type MelonCategory } from "./melon";
