import { FilterUsageError } from "./errors";
import type { Document, SelectionCriteria } from "./types";

export type NormalizedCriteria = {
  supplierPattern: RegExp | null;
  invoicePattern: RegExp | null;
  range: { start: string; end: string } | null;
};

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;

// Validates criteria up front so a usage error never leaves a partial batch.
export function normalizeCriteria(criteria: SelectionCriteria = {}): NormalizedCriteria {
  const start = blankToNull(criteria.startDate);
  const end = blankToNull(criteria.endDate);

  if ((start === null) !== (end === null)) {
    throw new FilterUsageError("both_required");
  }

  let range: NormalizedCriteria["range"] = null;
  if (start !== null && end !== null) {
    if (!isCalendarDate(start) || !isCalendarDate(end)) {
      throw new FilterUsageError("invalid_date");
    }
    if (start > end) {
      throw new FilterUsageError("start_after_end");
    }
    range = { start, end };
  }

  const supplier = blankToNull(criteria.supplierName);
  const invoice = blankToNull(criteria.invoiceNumber);

  return {
    supplierPattern: supplier === null ? null : globToRegExp(supplier),
    invoicePattern: invoice === null ? null : globToRegExp(invoice),
    range,
  };
}

/**
 * Glob to anchored, case-insensitive RegExp. `*` matches any run of
 * characters, `?` exactly one; everything else is literal.
 * "ACME*" is a prefix match, "*ACME*" a substring match.
 */
export function globToRegExp(pattern: string): RegExp {
  let source = "";
  for (const ch of pattern) {
    if (ch === "*") source += "[\\s\\S]*";
    else if (ch === "?") source += "[\\s\\S]";
    else source += ch.replace(/[.+^${}()|[\]\\/-]/g, "\\$&");
  }
  return new RegExp(`^${source}$`, "i");
}

export function matchesGlob(value: string, pattern: string): boolean {
  return globToRegExp(pattern).test(value);
}

export function matchesCriteria(document: Document, criteria: NormalizedCriteria): boolean {
  if (criteria.supplierPattern && !criteria.supplierPattern.test(document.supplierName.trim())) {
    return false;
  }
  if (criteria.invoicePattern && !criteria.invoicePattern.test(document.documentNumber.trim())) {
    return false;
  }
  if (criteria.range) {
    const date = document.documentDate.slice(0, 10);
    if (date < criteria.range.start || date > criteria.range.end) return false;
  }
  return true;
}

// Keeps the collection's natural order.
export function selectDocuments<T extends Document>(
  documents: readonly T[],
  criteria: SelectionCriteria = {}
): T[] {
  const normalized = normalizeCriteria(criteria);
  return documents.filter((document) => matchesCriteria(document, normalized));
}

export function isCalendarDate(value: string): boolean {
  const match = ISO_DATE.exec(value);
  if (!match) return false;
  const [, y, m, d] = match;
  const date = new Date(Date.UTC(Number(y), Number(m) - 1, Number(d)));
  return (
    date.getUTCFullYear() === Number(y) &&
    date.getUTCMonth() === Number(m) - 1 &&
    date.getUTCDate() === Number(d)
  );
}

function blankToNull(value: string | null | undefined): string | null {
  if (value == null) return null;
  const trimmed = value.trim();
  return trimmed ? trimmed : null;
}
