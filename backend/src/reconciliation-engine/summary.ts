import { allocateDiscounts } from "./allocation";
import { classifyLines } from "./classifier";
import { resolveConfig, type ReconciliationConfig } from "./config";
import { ReconciliationError } from "./errors";
import { computeLines } from "./line-computation";
import { roundHalfEven, signOf } from "./money";
import { reconcileToPayable } from "./reconciliation";
import { matchesCriteria, normalizeCriteria } from "./selector";
import type {
  Document,
  DocumentInput,
  DocumentOutcome,
  DocumentSummaryRow,
  LoadedDocument,
  ProcessedDocument,
  ProductEntry,
  ProductSummary,
  ResultRow,
  SelectionCriteria,
} from "./types";

const LOG_TAG = "[product-summary]";
const DEFAULT_CURRENCY = "RON";
const RATE_DECIMALS = 2;

export type ProductSummaryOptions = {
  debug?: boolean;
};

// Line computation -> classification -> allocation -> reconciliation for one
// document. Throws MalformedLineError / UnallocatableDiscountError.
export function processDocument(
  document: Document,
  cfg: ReconciliationConfig = resolveConfig(),
  opts: ProductSummaryOptions = {}
): ProcessedDocument {
  const decimals = cfg.currencyDecimals;
  const computed = computeLines(document.lines, decimals);
  const classified = classifyLines(computed, cfg);
  const allocation = allocateDiscounts(classified, document, cfg);
  const reconciled = reconcileToPayable(allocation.entries, document.totalPayable, cfg);

  if (opts.debug) {
    console.debug(`${LOG_TAG} allocation`, {
      documentNumber: document.documentNumber,
      products: classified.productEntries.length,
      proxies: classified.discountEntries.length,
      pass: allocation.pass,
      distributed: allocation.distributed,
      delta: reconciled.delta,
      tolerance: reconciled.tolerance,
    });
  }

  const flagged = reconciled.warning !== undefined;
  return {
    rows: reconciled.entries.map((entry) => toResultRow(document, entry, flagged, decimals)),
    allocation: allocation.pass,
    delta: reconciled.delta,
    warning: reconciled.warning,
  };
}

/**
 * Runs the pipeline over every selected document, in input order.
 *
 * Criteria are validated before any document is looked at, so a
 * FilterUsageError never leaves a partial batch. Per-document failures
 * (load errors included) become `failed` outcomes; the rest of the batch
 * still produces rows.
 */
export function buildProductSummary(
  inputs: readonly DocumentInput[],
  criteria: SelectionCriteria = {},
  cfg: ReconciliationConfig = resolveConfig(),
  opts: ProductSummaryOptions = {}
): ProductSummary {
  const normalized = normalizeCriteria(criteria);
  const rows: ResultRow[] = [];
  const outcomes: DocumentOutcome[] = [];

  for (const input of inputs) {
    if (isLoadedDocument(input) && !input.ok) {
      const code = input.error instanceof ReconciliationError ? input.error.code : "DOCUMENT_LOAD";
      console.warn(`${LOG_TAG} document could not be loaded`, {
        source: input.source,
        message: input.error.message,
      });
      outcomes.push({
        status: "failed",
        source: input.source,
        documentNumber: null,
        supplierName: null,
        error: { code, message: input.error.message },
      });
      continue;
    }

    const document = isLoadedDocument(input) ? input.document : input;
    const source = isLoadedDocument(input) ? input.source : undefined;
    if (!matchesCriteria(document, normalized)) continue;

    let processed: ProcessedDocument;
    try {
      processed = processDocument(document, cfg, opts);
    } catch (error) {
      if (!(error instanceof ReconciliationError)) throw error;
      console.warn(`${LOG_TAG} document skipped`, {
        documentNumber: document.documentNumber,
        code: error.code,
        message: error.message,
      });
      outcomes.push({
        status: "failed",
        source,
        documentNumber: document.documentNumber,
        supplierName: document.supplierName,
        error: { code: error.code, message: error.message },
      });
      continue;
    }

    if (processed.warning) {
      console.warn(`${LOG_TAG} residual exceeds tolerance`, {
        documentNumber: document.documentNumber,
        residual: processed.warning.residual,
        tolerance: processed.warning.tolerance,
      });
    }

    rows.push(...processed.rows);
    outcomes.push({
      status: "ok",
      source,
      documentNumber: document.documentNumber,
      supplierName: document.supplierName,
      rowCount: processed.rows.length,
      warning: processed.warning,
    });
  }

  return { rows, outcomes };
}

// Document-level overview, sorted by date then number.
export function summarizeDocuments(
  documents: readonly Document[],
  criteria: SelectionCriteria = {},
  cfg: ReconciliationConfig = resolveConfig()
): DocumentSummaryRow[] {
  const normalized = normalizeCriteria(criteria);
  return documents
    .filter((document) => matchesCriteria(document, normalized))
    .map((document) => ({
      documentNumber: document.documentNumber,
      supplierName: document.supplierName.trim(),
      documentDate: document.documentDate,
      dueDate: document.dueDate ?? null,
      totalPayable: roundHalfEven(document.totalPayable, cfg.currencyDecimals),
      currency: normalizeCurrency(document.currency),
      kind: document.kind,
    }))
    .sort(
      (a, b) =>
        a.documentDate.localeCompare(b.documentDate) ||
        a.documentNumber.localeCompare(b.documentNumber)
    );
}

export function isLoadedDocument(input: DocumentInput): input is LoadedDocument {
  return "ok" in input;
}

function toResultRow(
  document: Document,
  entry: ProductEntry,
  reconciliationWarning: boolean,
  decimals: number
): ResultRow {
  // Line charges are not discounts: measure against the charged amount.
  const chargedAmount = entry.rawAmount + signOf(entry.quantity) * entry.lineCharge;
  const allocatedNet = roundHalfEven(entry.netAfterLineDiscount + entry.allocatedShare, decimals);
  const discountValue = roundHalfEven(Math.abs(chargedAmount - allocatedNet), decimals);
  const discountRate =
    discountValue > 0 && entry.rawAmount !== 0
      ? roundHalfEven((discountValue / Math.abs(entry.rawAmount)) * 100, RATE_DECIMALS)
      : undefined;

  return {
    documentKind: document.kind,
    supplierName: document.supplierName.trim(),
    documentNumber: document.documentNumber,
    documentDate: document.documentDate,
    currency: normalizeCurrency(document.currency),
    totalInvoice: roundHalfEven(document.totalInvoice, decimals),
    totalPayable: roundHalfEven(document.totalPayable, decimals),
    lineId: entry.id,
    productName: entry.itemName,
    ...(entry.itemCode !== null ? { productCode: entry.itemCode } : {}),
    quantity: entry.quantity,
    unitCode: entry.unitCode,
    unitPrice: entry.unitPrice,
    lineValue: roundHalfEven(entry.rawAmount, decimals),
    vatRate: entry.vatRate,
    vatValue: entry.vatValue,
    ...(discountRate !== undefined ? { discountRate } : {}),
    discountValue,
    finalValue: entry.finalValue,
    reconciliationWarning,
  };
}

function normalizeCurrency(value?: string | null): string {
  if (!value) return DEFAULT_CURRENCY;
  const trimmed = value.trim().toUpperCase();
  return trimmed || DEFAULT_CURRENCY;
}
