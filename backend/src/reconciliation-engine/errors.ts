export type ReconciliationErrorCode =
  | "MALFORMED_LINE"
  | "UNALLOCATABLE_DISCOUNT"
  | "FILTER_USAGE"
  | "DOCUMENT_LOAD"
  | "CONFIG";

export class ReconciliationError extends Error {
  readonly code: ReconciliationErrorCode;

  constructor(code: ReconciliationErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export type MalformedLineReason =
  | "missing_unit_price"
  | "negative_unit_price"
  | "zero_quantity"
  | "non_finite_amount";

export class MalformedLineError extends ReconciliationError {
  readonly lineId: string;
  readonly reason: MalformedLineReason;

  constructor(lineId: string, reason: MalformedLineReason) {
    super("MALFORMED_LINE", `Line ${lineId} is malformed: ${reason.replace(/_/g, " ")}`);
    this.lineId = lineId;
    this.reason = reason;
  }
}

export class UnallocatableDiscountError extends ReconciliationError {
  readonly amount: number;

  constructor(amount: number, productCount: number) {
    super(
      "UNALLOCATABLE_DISCOUNT",
      `Cannot allocate ${amount} across ${productCount} product line(s): weighting base is zero`
    );
    this.amount = amount;
  }
}

export type FilterUsageReason = "both_required" | "start_after_end" | "invalid_date";

const FILTER_MESSAGES: Record<FilterUsageReason, string> = {
  both_required: "both start date and end date must be supplied together",
  start_after_end: "start date must be before or equal to end date",
  invalid_date: "dates must be calendar dates in YYYY-MM-DD form",
};

export class FilterUsageError extends ReconciliationError {
  readonly reason: FilterUsageReason;

  constructor(reason: FilterUsageReason) {
    super("FILTER_USAGE", FILTER_MESSAGES[reason]);
    this.reason = reason;
  }
}

export class DocumentLoadError extends ReconciliationError {
  readonly source: string;

  constructor(source: string, message: string, options?: { cause?: unknown }) {
    super("DOCUMENT_LOAD", `${source}: ${message}`, options);
    this.source = source;
  }
}

export class ConfigError extends ReconciliationError {
  constructor(message: string) {
    super("CONFIG", message);
  }
}
