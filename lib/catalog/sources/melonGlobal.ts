import { DEFAULT_DATE_SENTINELS } from "@/types";
import type { CatalogSourceInput } from "../schema";

/**
 * Melon Ticket Global (tkglobal.melon.com) `endProdList` dump.
 * Fields are flat and upper-case; nothing is string-encoded.
 */
export const melonGlobalSource: CatalogSourceInput = {
  id: "melon-global",
  name: "Melon Ticket Global",
  listKey: "endProdList",
  embeddedFields: [],
  dimensions: {
    categoryField: "PERF_TYPE_EN",
    venueField: "PLACE_HALL_NAME_EN",
    periodField: "PERIOD_INFO",
    startDateField: "PERF_START_DT",
    endDateField: "PERF_END_DT",
    dateSentinels: [...DEFAULT_DATE_SENTINELS],
    flags: {
      english: { field: "SELL_STATE_YN_EN", value: "Y" },
      japanese: { field: "SELL_STATE_YN_JP", value: "Y" },
      chinese: { field: "SELL_STATE_YN_CN", value: "Y" },
    },
  },
};
