import type {
  Document,
  DocumentOutcome,
  ReconciliationWarning,
  ResultRow,
} from "@line-recon/shared";

export type {
  Document,
  DocumentKind,
  DocumentLine,
  DocumentOutcome,
  DocumentSummaryRow,
  ReconciliationWarning,
  ResultRow,
  SelectionCriteria,
} from "@line-recon/shared";

// Normalized numeric view of one line. Private to a single document's pass.
export interface LineComputation {
  id: string;
  quantity: number;
  unitPrice: number;
  unitCode: string | null;
  rawAmount: number;
  itemName: string;
  itemCode: string | null;
  vatRate: number;
  // Magnitudes, always >= 0.
  lineDiscount: number;
  lineCharge: number;
  netAfterLineDiscount: number;
  isDiscountProxy: boolean;
  // Share of a redistributed discount (fake-line or document-level), signed.
  allocatedShare: number;
  finalNet: number;
  // VAT on finalNet.
  vatValue: number;
  // finalNet + vatValue; the corrector adjusts this one.
  finalValue: number;
}

export type ProductEntry = LineComputation & { isDiscountProxy: false };
export type DiscountProxyEntry = LineComputation & { isDiscountProxy: true };

export interface ClassifiedLines {
  productEntries: ProductEntry[];
  discountEntries: DiscountProxyEntry[];
}

export type AllocationPass = "fake_discount" | "document_discount" | "none";

export interface AllocationResult {
  entries: ProductEntry[];
  pass: AllocationPass;
  // Signed amount spread across product entries (0 when pass is "none").
  distributed: number;
}

export interface ReconciliationResult {
  entries: ProductEntry[];
  delta: number;
  tolerance: number;
  warning?: ReconciliationWarning;
}

export interface ProcessedDocument {
  rows: ResultRow[];
  allocation: AllocationPass;
  delta: number;
  warning?: ReconciliationWarning;
}

// Result of the document-loading collaborator for one source.
export type LoadedDocument =
  | { ok: true; source: string; document: Document }
  | { ok: false; source: string; error: Error };

export type DocumentInput = Document | LoadedDocument;

export interface ProductSummary {
  rows: ResultRow[];
  outcomes: DocumentOutcome[];
}
