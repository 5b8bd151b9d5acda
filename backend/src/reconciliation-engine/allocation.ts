import { resolveTolerance, type ReconciliationConfig } from "./config";
import { UnallocatableDiscountError } from "./errors";
import { withFinalNet } from "./line-computation";
import { exceedsTolerance, roundHalfEven, signOf, sumAmounts } from "./money";
import type { AllocationResult, ClassifiedLines, Document, ProductEntry } from "./types";

type DocumentTotals = Pick<Document, "totalInvoice" | "totalTaxExclusive" | "documentLevelDiscount">;

/**
 * Spreads discounts over the product entries of one document.
 *
 * Pass A runs when the document carries discount proxies: their summed net
 * (already negative for a reducing discount) is spread by |rawAmount|.
 * Pass B is a fallback for documents without proxies whose line nets do not
 * reach the document's net total: the document-level discount is spread the
 * same way. The net total is `totalTaxExclusive`, or `totalInvoice` less the
 * line VAT when the document does not state it.
 * Weighting by |rawAmount| keeps mixed-sign documents from cancelling out.
 */
export function allocateDiscounts(
  classified: ClassifiedLines,
  totals: DocumentTotals,
  cfg: ReconciliationConfig
): AllocationResult {
  const { productEntries, discountEntries } = classified;
  const decimals = cfg.currencyDecimals;

  if (discountEntries.length > 0) {
    const specialDiscount = sumAmounts(
      discountEntries.map((entry) => entry.netAfterLineDiscount),
      decimals
    );
    return {
      entries: distributeByRawAmount(productEntries, specialDiscount, decimals),
      pass: "fake_discount",
      distributed: specialDiscount,
    };
  }

  const netSum = sumAmounts(
    productEntries.map((entry) => entry.finalNet),
    decimals
  );
  const tolerance = resolveTolerance(cfg, productEntries.length);
  const netTarget = netTotal(productEntries, totals, decimals);
  const reconciles = !exceedsTolerance(roundHalfEven(netTarget - netSum, decimals), tolerance);
  const documentDiscount = roundHalfEven(Math.abs(totals.documentLevelDiscount ?? 0), decimals);

  // Line-level discounts already explain the total: never subtract twice.
  if (reconciles || documentDiscount === 0) {
    return { entries: productEntries, pass: "none", distributed: 0 };
  }

  const signed = -documentDirection(productEntries, totals.totalInvoice) * documentDiscount;
  return {
    entries: distributeByRawAmount(productEntries, signed, decimals),
    pass: "document_discount",
    distributed: signed,
  };
}

export function distributeByRawAmount(
  entries: readonly ProductEntry[],
  amount: number,
  decimals: number
): ProductEntry[] {
  let weightBase = 0;
  for (const entry of entries) weightBase += Math.abs(entry.rawAmount);

  if (!(weightBase > 0)) {
    throw new UnallocatableDiscountError(amount, entries.length);
  }

  return entries.map((entry) => {
    const share = (amount * Math.abs(entry.rawAmount)) / weightBase;
    const finalNet = roundHalfEven(entry.netAfterLineDiscount + share, decimals);
    return withFinalNet(
      { ...entry, allocatedShare: roundHalfEven(finalNet - entry.netAfterLineDiscount, decimals) },
      finalNet,
      decimals
    );
  });
}

// Credit notes (negative lines) get their allowance applied toward zero too.
function documentDirection(entries: readonly ProductEntry[], totalInvoice: number): -1 | 1 {
  let rawSum = 0;
  for (const entry of entries) rawSum += entry.rawAmount;
  const sign = signOf(rawSum) || signOf(totalInvoice);
  return sign === -1 ? -1 : 1;
}

function netTotal(entries: readonly ProductEntry[], totals: DocumentTotals, decimals: number): number {
  if (totals.totalTaxExclusive != null) return totals.totalTaxExclusive;
  const vat = sumAmounts(
    entries.map((entry) => entry.vatValue),
    decimals
  );
  return roundHalfEven(totals.totalInvoice - vat, decimals);
}
