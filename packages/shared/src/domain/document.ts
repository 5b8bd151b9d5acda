/**
 * Document types handed to the reconciliation engine.
 *
 * A "document" is an invoice or a credit note after XML parsing. Credit notes
 * arrive already signed: their quantities, line amounts and totals are
 * negative, while unit prices and discount magnitudes stay non-negative.
 */

/** Closed variant of document kinds. Both share one field layout. */
export type DocumentKind = "invoice" | "credit_note";

/** One priced product/service entry, as received from the parsing step. */
export interface DocumentLine {
  id: string;
  /** Signed; a line may carry a negative quantity on an invoice too. */
  quantity: number;
  /** Per-unit price, never signed. Missing or negative prices are rejected. */
  unitPrice?: number | null;
  unitCode?: string | null;
  /** Source-stated line extension amount (≈ quantity × unitPrice). */
  rawAmount: number;
  itemName: string;
  itemCode?: string | null;
  /** Percent, e.g. 21 for 21%. Absent means 0. */
  vatRate?: number | null;
  /** Only the magnitude is used; the source sign is ignored. */
  lineLevelDiscount?: number | null;
  /** Line-level charge magnitude; pushes the line away from zero. */
  lineLevelCharge?: number | null;
}

export interface Document {
  kind: DocumentKind;
  supplierName: string;
  documentNumber: string;
  /** ISO date (YYYY-MM-DD). */
  documentDate: string;
  dueDate?: string | null;
  currency?: string | null;
  /** Tax-inclusive total as stated by the document. */
  totalInvoice: number;
  /** Net total before VAT. When absent, totalInvoice minus the line VAT is used. */
  totalTaxExclusive?: number | null;
  /** Authoritative reconciliation target. */
  totalPayable: number;
  /** Magnitude of an allowance stated once for the whole document. */
  documentLevelDiscount?: number | null;
  /** Order is significant: it is kept in the output. */
  lines: DocumentLine[];
}
