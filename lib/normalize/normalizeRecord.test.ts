import { describe, it, expect } from "vitest";
import type { EmbeddedField } from "@/lib/catalog/schema";
import type { RawRecord } from "@/lib/catalog/types";
import { normalizeRecord } from "./normalizeRecord";

const FIELDS: EmbeddedField[] = [
  { field: "priceTiersJson", rule: { kind: "list", target: "priceTiers", path: ["data", "list"] } },
  {
    field: "channelsJson",
    rule: {
      kind: "groups",
      target: "channels",
      path: ["data", "list"],
      groupFields: ["pocName"],
      itemsKey: "saleTypeCodeList",
    },
  },
  { field: "relatedJson", rule: { kind: "list", target: "related", path: ["data", "list"] } },
  { field: "extraJson" },
];

describe("normalizeRecord", () => {
  it("decodes price tiers into a derived list", () => {
    const out = normalizeRecord(
      { id: "e1", priceTiersJson: '{"data":{"list":[{"id":1,"basePrice":50000}]}}' },
      FIELDS
    );
    expect(out.priceTiersJson).toEqual({ data: { list: [{ id: 1, basePrice: 50000 }] } });
    expect(out.priceTiers).toEqual([{ id: 1, basePrice: 50000 }]);
    expect(out.channels).toEqual([]);
    expect(out.related).toEqual([]);
  });

  it("flattens channel groups in group-then-item order", () => {
    const out = normalizeRecord(
      {
        channelsJson:
          '{"data":{"list":[{"pocName":"A","saleTypeCodeList":[{"code":"X"},{"code":"Y"}]}]}}',
      },
      FIELDS
    );
    expect(out.channels).toEqual([
      { pocName: "A", code: "X" },
      { pocName: "A", code: "Y" },
    ]);
  });

  it("keeps an undecodable field as-is and derives an empty list", () => {
    const out = normalizeRecord({ channelsJson: "not json" }, FIELDS);
    expect(out.channels).toEqual([]);
    expect(out.channelsJson).toBe("not json");
  });

  it("exposes the related list verbatim", () => {
    const out = normalizeRecord({ relatedJson: '{"data":{"list":[{"prodId":7},{"prodId":8}]}}' }, FIELDS);
    expect(out.related).toEqual([{ prodId: 7 }, { prodId: 8 }]);
  });

  it("decodes fields without a rule and adds nothing for them", () => {
    const out = normalizeRecord({ extraJson: '{"note":"late show"}' }, FIELDS);
    expect(out.extraJson).toEqual({ note: "late show" });
    expect(Object.keys(out).sort()).toEqual(["channels", "extraJson", "priceTiers", "related"]);
  });

  it("does not add embedded fields that were absent", () => {
    const out = normalizeRecord({ title: "Jazz at Dusk" }, FIELDS);
    expect("priceTiersJson" in out).toBe(false);
    expect(out.title).toBe("Jazz at Dusk");
  });

  it("passes other fields through untouched and leaves the input alone", () => {
    const meta = { tags: ["a", { deep: '{"not":"decoded"}' }] };
    const raw: RawRecord = { meta, priceTiersJson: '{"data":{"list":[]}}', other: '{"x":1}' };
    const out = normalizeRecord(raw, FIELDS);
    expect(out.meta).toBe(meta);
    expect(out.other).toBe('{"x":1}');
    expect(raw.priceTiersJson).toBe('{"data":{"list":[]}}');
    expect("priceTiers" in raw).toBe(false);
  });

  it("accepts documents that arrive already decoded", () => {
    const out = normalizeRecord({ priceTiersJson: { data: { list: [{ id: 2 }] } } }, FIELDS);
    expect(out.priceTiers).toEqual([{ id: 2 }]);
  });

  it("is idempotent", () => {
    const records: RawRecord[] = [
      { id: 1, priceTiersJson: '{"data":{"list":[{"id":1,"basePrice":50000}]}}' },
      { channelsJson: '{"data":{"list":[{"pocName":"A","saleTypeCodeList":[{"code":"X"}]}]}}' },
      { channelsJson: "not json", relatedJson: "   " },
      { priceTiersJson: JSON.stringify(JSON.stringify({ data: { list: [3] } })) },
      { priceTiersJson: '"123"' },
    ];
    for (const raw of records) {
      const once = normalizeRecord(raw, FIELDS);
      expect(normalizeRecord(once, FIELDS)).toEqual(once);
    }
  });

  it("never throws on malformed embedded values", () => {
    const records: RawRecord[] = [
      {},
      { priceTiersJson: 5, channelsJson: null, relatedJson: true },
      { priceTiersJson: "[1,2]", channelsJson: "[]" },
      { channelsJson: '{"data":{"list":[null,3,{"pocName":"A","saleTypeCodeList":"x"}]}}' },
      { relatedJson: '{"data":[]}', priceTiersJson: '{"data":null}' },
      { priceTiersJson: ["already", "a", "list"] },
    ];
    for (const raw of records) {
      const out = normalizeRecord(raw, FIELDS);
      expect(out.priceTiers).toEqual([]);
      expect(out.channels).toEqual([]);
      expect(out.related).toEqual([]);
    }
  });
});
