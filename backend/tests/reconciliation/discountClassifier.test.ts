import { describe, expect, it } from "vitest";
import { classifyLines, isDiscountProxy } from "../../src/reconciliation-engine/classifier";
import { resolveConfig } from "../../src/reconciliation-engine/config";
import { computeLine } from "../../src/reconciliation-engine/line-computation";
import type { DocumentLine } from "../../src/reconciliation-engine/types";

const cfg = resolveConfig();
const keywords = cfg.discountKeywords;

function computed(id: string, quantity: number, itemName: string, extra: Partial<DocumentLine> = {}) {
  return computeLine(
    { id, quantity, unitPrice: 5, rawAmount: quantity * 5, itemName, vatRate: 0, ...extra },
    cfg.currencyDecimals
  );
}

describe("isDiscountProxy", () => {
  it("requires a negative quantity and a keyword in the name", () => {
    expect(isDiscountProxy({ quantity: -1, itemName: "DISCOUNT 10%" }, keywords)).toBe(true);
    expect(isDiscountProxy({ quantity: -2, itemName: "Reducere comerciala" }, keywords)).toBe(true);
    expect(isDiscountProxy({ quantity: 1, itemName: "Discount" }, keywords)).toBe(false);
    expect(isDiscountProxy({ quantity: -1, itemName: "Retur marfa" }, keywords)).toBe(false);
  });

  it("honours configured keywords", () => {
    expect(isDiscountProxy({ quantity: -1, itemName: "Rabatt" }, ["rabatt"])).toBe(true);
    expect(isDiscountProxy({ quantity: -1, itemName: "Discount" }, ["rabatt"])).toBe(false);
  });
});

describe("classifyLines", () => {
  it("partitions lines without overlap or loss, keeping order", () => {
    const lines = [
      computed("1", 2, "Cafea"),
      computed("2", -1, "Discount fidelitate"),
      computed("3", -1, "Retur cafea"),
      computed("4", 1, "Zahar"),
      computed("5", -1, "REDUCERE"),
    ];

    const result = classifyLines(lines, cfg);

    expect(result.productEntries.map((entry) => entry.id)).toEqual(["1", "3", "4"]);
    expect(result.discountEntries.map((entry) => entry.id)).toEqual(["2", "5"]);
    expect(result.productEntries.every((entry) => !entry.isDiscountProxy)).toBe(true);
    expect(result.discountEntries.every((entry) => entry.isDiscountProxy)).toBe(true);
  });

  it("does not consult line-level discount fields", () => {
    const proxy = computed("1", -1, "Discount", { lineLevelDiscount: 2 });
    const product = computed("2", 3, "Cafea", { lineLevelDiscount: 2 });

    const result = classifyLines([proxy, product], cfg);

    expect(result.discountEntries.map((entry) => entry.id)).toEqual(["1"]);
    expect(result.productEntries.map((entry) => entry.id)).toEqual(["2"]);
  });

  it("does not mutate the computed lines", () => {
    const proxy = computed("1", -1, "Discount");
    classifyLines([proxy], cfg);
    expect(proxy.isDiscountProxy).toBe(false);
  });
});
