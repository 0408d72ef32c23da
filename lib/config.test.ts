import { describe, it, expect, afterEach } from "vitest";
import { getDateSentinels, getSampleDatesLimit, getTopVenuesLimit } from "./config";

const KEYS = ["CATALOG_TOP_VENUES", "CATALOG_SAMPLE_DATES", "CATALOG_DATE_SENTINELS"] as const;
const saved = Object.fromEntries(KEYS.map((k) => [k, process.env[k]]));

afterEach(() => {
  for (const k of KEYS) {
    const value = saved[k];
    if (value == null) delete process.env[k];
    else process.env[k] = value;
  }
});

describe("config", () => {
  it("falls back to defaults when unset or invalid", () => {
    delete process.env.CATALOG_TOP_VENUES;
    expect(getTopVenuesLimit()).toBe(10);
    process.env.CATALOG_TOP_VENUES = "lots";
    expect(getTopVenuesLimit()).toBe(10);
    process.env.CATALOG_SAMPLE_DATES = "-3";
    expect(getSampleDatesLimit()).toBe(5);
  });

  it("reads positive integers", () => {
    process.env.CATALOG_TOP_VENUES = " 25 ";
    expect(getTopVenuesLimit()).toBe(25);
    process.env.CATALOG_SAMPLE_DATES = "3";
    expect(getSampleDatesLimit()).toBe(3);
  });

  it("leaves sentinels to the source unless set", () => {
    delete process.env.CATALOG_DATE_SENTINELS;
    expect(getDateSentinels()).toBeUndefined();
    process.env.CATALOG_DATE_SENTINELS = "99991231, 00000000,";
    expect(getDateSentinels()).toEqual(["99991231", "00000000"]);
    process.env.CATALOG_DATE_SENTINELS = "";
    expect(getDateSentinels()).toEqual([]);
  });
});
