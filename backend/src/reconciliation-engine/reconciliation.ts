import { resolveTolerance, type ReconciliationConfig } from "./config";
import { exceedsTolerance, roundHalfEven, sumAmounts } from "./money";
import type { ProductEntry, ReconciliationResult } from "./types";

// The residual between totalPayable and the summed tax-inclusive line values
// goes, whole, onto the last product entry in document order. Lines are not
// re-rounded.
export function reconcileToPayable(
  entries: readonly ProductEntry[],
  totalPayable: number,
  cfg: ReconciliationConfig
): ReconciliationResult {
  const decimals = cfg.currencyDecimals;
  const finalSum = sumAmounts(
    entries.map((entry) => entry.finalValue),
    decimals
  );
  const delta = roundHalfEven(totalPayable - finalSum, decimals);
  const tolerance = resolveTolerance(cfg, entries.length);
  const lastIndex = entries.length - 1;

  const corrected =
    delta === 0 || lastIndex < 0
      ? [...entries]
      : entries.map((entry, index) =>
          index === lastIndex
            ? { ...entry, finalValue: roundHalfEven(entry.finalValue + delta, decimals) }
            : entry
        );

  if (!exceedsTolerance(delta, tolerance)) {
    return { entries: corrected, delta, tolerance };
  }

  return {
    entries: corrected,
    delta,
    tolerance,
    warning: { residual: Math.abs(delta), tolerance },
  };
}
