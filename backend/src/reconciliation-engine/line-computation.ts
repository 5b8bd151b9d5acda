import { MalformedLineError } from "./errors";
import { roundHalfEven, signOf } from "./money";
import type { DocumentLine, LineComputation } from "./types";

export function computeLine(line: DocumentLine, decimals: number): LineComputation {
  const { quantity, rawAmount } = line;
  const vatRate = line.vatRate ?? 0;
  const discountSource = line.lineLevelDiscount ?? 0;
  const chargeSource = line.lineLevelCharge ?? 0;

  if (
    !Number.isFinite(quantity) ||
    !Number.isFinite(rawAmount) ||
    !Number.isFinite(vatRate) ||
    !Number.isFinite(discountSource) ||
    !Number.isFinite(chargeSource)
  ) {
    throw new MalformedLineError(line.id, "non_finite_amount");
  }
  if (line.unitPrice == null || Number.isNaN(line.unitPrice)) {
    throw new MalformedLineError(line.id, "missing_unit_price");
  }
  if (line.unitPrice < 0) {
    throw new MalformedLineError(line.id, "negative_unit_price");
  }
  if (quantity === 0) {
    throw new MalformedLineError(line.id, "zero_quantity");
  }

  // The discount always pulls the line toward zero, whatever sign the source
  // used; a charge pushes it away.
  const lineDiscount = Math.abs(discountSource);
  const lineCharge = Math.abs(chargeSource);
  const direction = signOf(quantity);
  const netAfterLineDiscount = roundHalfEven(
    rawAmount - direction * lineDiscount + direction * lineCharge,
    decimals
  );

  const computed: LineComputation = {
    id: line.id,
    quantity,
    unitPrice: line.unitPrice,
    unitCode: normalizeOptional(line.unitCode),
    rawAmount,
    itemName: line.itemName.trim() || "Unknown",
    itemCode: normalizeOptional(line.itemCode),
    vatRate,
    lineDiscount,
    lineCharge,
    netAfterLineDiscount,
    isDiscountProxy: false,
    allocatedShare: 0,
    finalNet: netAfterLineDiscount,
    vatValue: 0,
    finalValue: netAfterLineDiscount,
  };
  return withFinalNet(computed, netAfterLineDiscount, decimals);
}

// Sets the line's net and recomputes its VAT and tax-inclusive value from it.
export function withFinalNet<T extends LineComputation>(line: T, finalNet: number, decimals: number): T {
  const vatValue = roundHalfEven((finalNet * line.vatRate) / 100, decimals);
  return {
    ...line,
    finalNet,
    vatValue,
    finalValue: roundHalfEven(finalNet + vatValue, decimals),
  };
}

export function computeLines(lines: readonly DocumentLine[], decimals: number): LineComputation[] {
  return lines.map((line) => computeLine(line, decimals));
}

function normalizeOptional(value: string | null | undefined): string | null {
  if (value == null) return null;
  const trimmed = value.trim();
  return trimmed ? trimmed : null;
}
