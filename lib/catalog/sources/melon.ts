import type { CatalogSourceInput } from "../schema";

/** Melon Ticket (ticket.melon.com) `performance/ajax/prodList.json`. */
export const melonSource: CatalogSourceInput = {
  id: "melon",
  name: "Melon Ticket",
  description: "Korean domestic product list; seat grades, sale channels and related shows arrive as JSON strings.",
  listKey: "data",
  embeddedFields: [
    {
      field: "seatGradeJson",
      rule: { kind: "list", target: "seatGrades", path: ["data", "list"] },
    },
    {
      field: "saleTypeJson",
      rule: {
        kind: "groups",
        target: "saleTypes",
        path: ["data", "list"],
        groupFields: ["pocName", "pocCode"],
        itemsKey: "saleTypeCodeList",
      },
    },
    {
      field: "perfRelatJson",
      rule: { kind: "list", target: "perfRelat", path: ["data", "list"] },
    },
  ],
  dimensions: {
    categoryField: "perfTypeCode",
    venueField: "placeName",
    regionField: "regionName",
    price: { collection: "seatGrades", field: "basePrice" },
    periodField: "periodInfo",
  },
};

export interface MelonCategory {
  key: string;
  name: string;
  perfGenreCode: string;
  perfThemeCode: string;
  description: string;
}

/** Genre filters of the prodList endpoint. */
export const MELON_CATEGORIES: MelonCategory[] = [
  { key: "concerts", name: "Concerts", perfGenreCode: "GENRE_CON_ALL", perfThemeCode: "", description: "All concert events" },
  { key: "arts", name: "Arts & Theater", perfGenreCode: "GENRE_ART_ALL", perfThemeCode: "", description: "Theater, musicals, and art performances" },
  { key: "fanmeetings", name: "Fan Meetings", perfGenreCode: "GENRE_FAN_ALL", perfThemeCode: "", description: "Fan meetings and special events" },
  { key: "classical", name: "Classical", perfGenreCode: "GENRE_CLA_ALL", perfThemeCode: "", description: "Classical music and opera" },
  { key: "exhibitions", name: "Exhibitions", perfGenreCode: "GENRE_EXH_ALL", perfThemeCode: "", description: "Exhibitions and cultural events" },
  { key: "all", name: "All Categories", perfGenreCode: "GENRE_ALL", perfThemeCode: "THEME_ALL", description: "All available events across genres" },
];

export function getMelonCategory(key: string): MelonCategory | undefined {
  return MELON_CATEGORIES.find((c) => c.key === key);
}

/** Source metadata block written at the top of a parsed category document. */
export function melonCategoryMetadata(category: MelonCategory): Record<string, unknown> {
  return {
    category: category.key,
    category_name: category.name,
    description: category.description,
    source_url_params: {
      perfGenreCode: category.perfGenreCode,
      perfThemeCode: category.perfThemeCode,
    },
  };
}
