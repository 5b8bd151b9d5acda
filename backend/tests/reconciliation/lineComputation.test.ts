import { describe, expect, it } from "vitest";
import { MalformedLineError } from "../../src/reconciliation-engine/errors";
import { computeLine, withFinalNet } from "../../src/reconciliation-engine/line-computation";
import type { DocumentLine } from "../../src/reconciliation-engine/types";

function line(overrides: Partial<DocumentLine>): DocumentLine {
  return {
    id: "1",
    quantity: 1,
    unitPrice: 10,
    rawAmount: 10,
    itemName: "Produs",
    vatRate: 0,
    ...overrides,
  };
}

describe("withFinalNet", () => {
  it("recomputes VAT and the tax-inclusive value from the new net", () => {
    const computed = computeLine(line({ quantity: 10, rawAmount: 100, vatRate: 21 }), 2);
    expect(computed.finalValue).toBe(121);

    const updated = withFinalNet(computed, 90, 2);

    expect(updated.finalNet).toBe(90);
    expect(updated.vatValue).toBe(18.9);
    expect(updated.finalValue).toBe(108.9);
    expect(computed.finalNet).toBe(100);
  });
});

describe("computeLine", () => {
  it("computes net and VAT for a discounted line", () => {
    const result = computeLine(
      line({ quantity: 10, unitPrice: 8.32, rawAmount: 83.2, lineLevelDiscount: 8.32, vatRate: 21 }),
      2
    );

    expect(result.netAfterLineDiscount).toBe(74.88);
    expect(result.vatValue).toBe(15.72);
    expect(result.netAfterLineDiscount + result.vatValue).toBeCloseTo(90.6, 10);
    expect(result.finalNet).toBe(74.88);
    expect(result.finalValue).toBe(90.6);
    expect(result.lineDiscount).toBe(8.32);
    expect(result.isDiscountProxy).toBe(false);
  });

  it("moves a negative-quantity line toward zero", () => {
    const result = computeLine(
      line({ quantity: -1, unitPrice: 334.8735, rawAmount: -334.87, lineLevelDiscount: 83.72 }),
      2
    );
    expect(result.netAfterLineDiscount).toBe(-251.15);
  });

  it("ignores the sign of the source discount", () => {
    const positive = computeLine(line({ rawAmount: 50, quantity: 5, lineLevelDiscount: 5 }), 2);
    const negative = computeLine(line({ rawAmount: 50, quantity: 5, lineLevelDiscount: -5 }), 2);
    expect(positive.netAfterLineDiscount).toBe(45);
    expect(negative.netAfterLineDiscount).toBe(45);
    expect(negative.lineDiscount).toBe(5);
  });

  it("adds line charges away from zero", () => {
    const invoiceLine = computeLine(
      line({ quantity: 2, unitPrice: 50, rawAmount: 100, lineLevelDiscount: 10, lineLevelCharge: -3 }),
      2
    );
    const creditLine = computeLine(
      line({ quantity: -2, unitPrice: 50, rawAmount: -100, lineLevelDiscount: 10, lineLevelCharge: 3 }),
      2
    );

    expect(invoiceLine.netAfterLineDiscount).toBe(93);
    expect(invoiceLine.lineCharge).toBe(3);
    expect(creditLine.netAfterLineDiscount).toBe(-93);
  });

  it("treats absent VAT and discount as zero", () => {
    const result = computeLine(line({ vatRate: null, lineLevelDiscount: undefined }), 2);
    expect(result.vatRate).toBe(0);
    expect(result.vatValue).toBe(0);
    expect(result.netAfterLineDiscount).toBe(10);
    expect(result.lineCharge).toBe(0);
  });

  it("normalizes optional text fields", () => {
    const result = computeLine(line({ unitCode: " H87 ", itemCode: "  ", itemName: "  " }), 2);
    expect(result.unitCode).toBe("H87");
    expect(result.itemCode).toBeNull();
    expect(result.itemName).toBe("Unknown");
  });

  it.each([
    [{ unitPrice: null }, "missing_unit_price"],
    [{ unitPrice: undefined }, "missing_unit_price"],
    [{ unitPrice: -1 }, "negative_unit_price"],
    [{ quantity: 0 }, "zero_quantity"],
    [{ rawAmount: Number.NaN }, "non_finite_amount"],
  ] as const)("rejects %o as %s", (overrides, reason) => {
    let thrown: unknown;
    try {
      computeLine(line({ id: "L7", ...overrides }), 2);
    } catch (error) {
      thrown = error;
    }
    expect(thrown).toBeInstanceOf(MalformedLineError);
    expect(thrown).toMatchObject({ code: "MALFORMED_LINE", lineId: "L7", reason });
  });
});
