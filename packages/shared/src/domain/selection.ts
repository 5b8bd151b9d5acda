/**
 * Filter criteria for picking documents out of a collection.
 *
 * Patterns are glob-style (`*`, `?`), case-insensitive and anchored to the
 * whole field. Dates are ISO (YYYY-MM-DD) and inclusive; both or neither.
 */
export interface SelectionCriteria {
  supplierName?: string | null;
  invoiceNumber?: string | null;
  startDate?: string | null;
  endDate?: string | null;
}
