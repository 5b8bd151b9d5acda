import type { ReconciliationConfig } from "./config";
import type {
  ClassifiedLines,
  DiscountProxyEntry,
  LineComputation,
  ProductEntry,
} from "./types";

// A discount proxy is a negative-quantity pseudo-product whose name says
// "discount". Line-level discount fields play no part in the decision.
export function isDiscountProxy(
  line: Pick<LineComputation, "quantity" | "itemName">,
  keywords: readonly string[]
): boolean {
  if (!(line.quantity < 0)) return false;
  const name = line.itemName.toLowerCase();
  return keywords.some((keyword) => name.includes(keyword.toLowerCase()));
}

export function classifyLines(
  lines: readonly LineComputation[],
  cfg: ReconciliationConfig
): ClassifiedLines {
  const productEntries: ProductEntry[] = [];
  const discountEntries: DiscountProxyEntry[] = [];

  for (const line of lines) {
    if (isDiscountProxy(line, cfg.discountKeywords)) {
      discountEntries.push({ ...line, isDiscountProxy: true });
    } else {
      productEntries.push({ ...line, isDiscountProxy: false });
    }
  }

  return { productEntries, discountEntries };
}
