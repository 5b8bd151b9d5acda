// Pipeline
export { processDocument, buildProductSummary, summarizeDocuments, isLoadedDocument } from "./summary";
export type { ProductSummaryOptions } from "./summary";

// Types
export type {
  Document,
  DocumentKind,
  DocumentLine,
  DocumentOutcome,
  DocumentSummaryRow,
  ReconciliationWarning,
  ResultRow,
  SelectionCriteria,
  LineComputation,
  ProductEntry,
  DiscountProxyEntry,
  ClassifiedLines,
  AllocationPass,
  AllocationResult,
  ReconciliationResult,
  ProcessedDocument,
  LoadedDocument,
  DocumentInput,
  ProductSummary,
} from "./types";

// Config
export { resolveConfig, resolveTolerance } from "./config";
export type { ReconciliationConfig } from "./config";

// Core modules
export { computeLine, computeLines, withFinalNet } from "./line-computation";
export { classifyLines, isDiscountProxy } from "./classifier";
export { allocateDiscounts, distributeByRawAmount } from "./allocation";
export { reconcileToPayable } from "./reconciliation";
export {
  normalizeCriteria,
  selectDocuments,
  matchesCriteria,
  matchesGlob,
  globToRegExp,
  isCalendarDate,
} from "./selector";
export type { NormalizedCriteria } from "./selector";

// Errors
export {
  ReconciliationError,
  MalformedLineError,
  UnallocatableDiscountError,
  FilterUsageError,
  DocumentLoadError,
  ConfigError,
} from "./errors";
export type { ReconciliationErrorCode, MalformedLineReason, FilterUsageReason } from "./errors";

// Utilities
export { roundHalfEven, sumAmounts, amountsEqual, minorUnit } from "./money";
