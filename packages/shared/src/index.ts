/**
 * @line-recon/shared – shared contract between the reconciliation engine,
 * the document loader and any presentation layer.
 */

// Domain: documents
export type { DocumentKind, DocumentLine, Document } from "./domain/document";

// Domain: selection
export type { SelectionCriteria } from "./domain/selection";

// API: results
export type {
  ReconciliationWarning,
  ResultRow,
  DocumentOutcome,
  DocumentSummaryRow,
} from "./api/responses";
