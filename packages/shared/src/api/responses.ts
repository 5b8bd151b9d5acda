import type { DocumentKind } from "../domain/document";

/** Residual left after correction that is larger than the tolerance. */
export interface ReconciliationWarning {
  residual: number;
  tolerance: number;
}

/** One output row per retained product line per document. */
export interface ResultRow {
  readonly documentKind: DocumentKind;
  readonly supplierName: string;
  readonly documentNumber: string;
  readonly documentDate: string;
  readonly currency: string;
  readonly totalInvoice: number;
  readonly totalPayable: number;
  readonly lineId: string;
  readonly productName: string;
  /** Only present when the source line carried an item code. */
  readonly productCode?: string;
  readonly quantity: number;
  readonly unitCode: string | null;
  readonly unitPrice: number;
  readonly lineValue: number;
  readonly vatRate: number;
  /** VAT on the line's net after discount allocation. */
  readonly vatValue: number;
  /** |discountValue| / |lineValue| × 100; absent when no discount applies. */
  readonly discountRate?: number;
  readonly discountValue: number;
  /** Tax-inclusive line value; a document's rows sum to its totalPayable. */
  readonly finalValue: number;
  readonly reconciliationWarning: boolean;
}

export type DocumentOutcome =
  | {
      status: "ok";
      source?: string;
      documentNumber: string;
      supplierName: string;
      rowCount: number;
      warning?: ReconciliationWarning;
    }
  | {
      status: "failed";
      source?: string;
      documentNumber: string | null;
      supplierName: string | null;
      error: { code: string; message: string };
    };

/** Document-level overview row (one per document, no line detail). */
export interface DocumentSummaryRow {
  documentNumber: string;
  supplierName: string;
  documentDate: string;
  dueDate: string | null;
  totalPayable: number;
  currency: string;
  kind: DocumentKind;
}
