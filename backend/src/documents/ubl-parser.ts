import { XMLParser } from "fast-xml-parser";
import { DocumentLoadError } from "../reconciliation-engine/errors";
import type { Document, DocumentKind, DocumentLine } from "../reconciliation-engine/types";

type XmlRecord = Record<string, unknown>;

const DEFAULT_CURRENCY = "RON";

// Elements that may repeat; always parsed as arrays.
const REPEATED_ELEMENTS = new Set(["InvoiceLine", "CreditNoteLine", "AllowanceCharge", "PaymentMeans"]);

const parser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: "@_",
  removeNSPrefix: true,
  parseTagValue: false,
  parseAttributeValue: false,
  trimValues: true,
  isArray: (tagName) => REPEATED_ELEMENTS.has(tagName),
});

function asRecord(value: unknown): XmlRecord {
  if (value && typeof value === "object" && !Array.isArray(value)) {
    return value as XmlRecord;
  }
  return {};
}

function asArray(value: unknown): unknown[] {
  if (value == null) return [];
  return Array.isArray(value) ? value : [value];
}

function textFromNode(node: unknown): string | null {
  if (node == null) return null;
  if (typeof node === "string" || typeof node === "number" || typeof node === "boolean") {
    const text = String(node).trim();
    return text ? text : null;
  }
  if (Array.isArray(node)) {
    return textFromNode(node[0]);
  }
  const value = asRecord(node)["#text"];
  return value == null ? null : textFromNode(value);
}

function numberFromNode(node: unknown): number | null {
  const text = textFromNode(node);
  if (text == null) return null;
  const parsed = Number(text);
  return Number.isFinite(parsed) ? parsed : null;
}

function attributeFromNode(node: unknown, name: string): string | null {
  return textFromNode(asRecord(node)[`@_${name}`]);
}

function child(node: unknown, ...names: string[]): unknown {
  let current: unknown = node;
  for (const name of names) {
    const record = asRecord(Array.isArray(current) ? current[0] : current);
    current = record[name];
    if (current == null) return undefined;
  }
  return current;
}

function negate(value: number): number {
  return value === 0 ? 0 : -value;
}

/**
 * Parses a UBL 2.1 Invoice or CreditNote into a `Document`.
 *
 * Credit notes are signed here: quantities, line amounts and totals come
 * out negative. Unit prices and discount magnitudes stay non-negative.
 */
export function parseUblDocument(xml: string, source = "<inline>"): Document {
  let parsed: XmlRecord;
  try {
    parsed = asRecord(parser.parse(xml, true));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new DocumentLoadError(source, `invalid XML (${message})`, { cause: error });
  }

  let kind: DocumentKind;
  let root: XmlRecord;
  if (parsed["Invoice"]) {
    kind = "invoice";
    root = asRecord(parsed["Invoice"]);
  } else if (parsed["CreditNote"]) {
    kind = "credit_note";
    root = asRecord(parsed["CreditNote"]);
  } else {
    throw new DocumentLoadError(source, "root element is neither Invoice nor CreditNote");
  }

  const sign = kind === "credit_note" ? -1 : 1;
  const signed = (value: number) => (sign === -1 ? negate(value) : value);
  const requireField = <T>(value: T | null, field: string): T => {
    if (value == null) throw new DocumentLoadError(source, `missing ${field}`);
    return value;
  };

  const documentNumber = requireField(textFromNode(root["ID"]), "ID");
  const documentDate = requireField(textFromNode(root["IssueDate"]), "IssueDate");
  const totalPayable = requireField(
    numberFromNode(child(root, "LegalMonetaryTotal", "PayableAmount")),
    "LegalMonetaryTotal/PayableAmount"
  );
  const totalInvoice =
    numberFromNode(child(root, "LegalMonetaryTotal", "TaxInclusiveAmount")) ?? totalPayable;
  const totalTaxExclusive = extractTaxExclusive(root, totalPayable);

  const lineTag = kind === "invoice" ? "InvoiceLine" : "CreditNoteLine";
  const quantityTag = kind === "invoice" ? "InvoicedQuantity" : "CreditedQuantity";
  const lines = asArray(root[lineTag]).map((node, index) =>
    parseLine(node, index, quantityTag, signed, requireField)
  );

  return {
    kind,
    supplierName: extractSupplierName(root),
    documentNumber,
    documentDate,
    dueDate: extractDueDate(root),
    currency: textFromNode(root["DocumentCurrencyCode"]) ?? DEFAULT_CURRENCY,
    totalInvoice: signed(totalInvoice),
    totalTaxExclusive: totalTaxExclusive == null ? null : signed(totalTaxExclusive),
    totalPayable: signed(totalPayable),
    documentLevelDiscount: extractDocumentDiscount(root),
    lines,
  };
}

function parseLine(
  node: unknown,
  index: number,
  quantityTag: string,
  signed: (value: number) => number,
  requireField: <T>(value: T | null, field: string) => T
): DocumentLine {
  const line = asRecord(node);
  const id = textFromNode(line["ID"]) ?? String(index + 1);
  const quantityNode = line[quantityTag];
  const quantity = requireField(numberFromNode(quantityNode), `${quantityTag} on line ${id}`);
  const rawAmount = requireField(
    numberFromNode(line["LineExtensionAmount"]),
    `LineExtensionAmount on line ${id}`
  );
  const item = asRecord(line["Item"]);

  return {
    id,
    quantity: signed(quantity),
    unitPrice: numberFromNode(child(line, "Price", "PriceAmount")),
    unitCode: attributeFromNode(quantityNode, "unitCode"),
    rawAmount: signed(rawAmount),
    itemName: textFromNode(item["Name"]) ?? "Unknown",
    itemCode: textFromNode(child(item, "SellersItemIdentification", "ID")),
    vatRate: numberFromNode(child(item, "ClassifiedTaxCategory", "Percent")) ?? 0,
    lineLevelDiscount: sumAllowanceCharges(line["AllowanceCharge"], "false"),
    lineLevelCharge: sumAllowanceCharges(line["AllowanceCharge"], "true"),
  };
}

function extractSupplierName(root: XmlRecord): string {
  const party = child(root, "AccountingSupplierParty", "Party");
  const name =
    textFromNode(child(party, "PartyName", "Name")) ??
    textFromNode(child(party, "PartyLegalEntity", "RegistrationName"));
  return name ?? "Unknown";
}

function extractDueDate(root: XmlRecord): string | null {
  const direct = textFromNode(root["DueDate"]);
  if (direct) return direct;
  for (const means of asArray(root["PaymentMeans"])) {
    const due = textFromNode(asRecord(means)["PaymentDueDate"]);
    if (due) return due;
  }
  return null;
}

function extractDocumentDiscount(root: XmlRecord): number | null {
  const allowanceTotal = numberFromNode(child(root, "LegalMonetaryTotal", "AllowanceTotalAmount"));
  if (allowanceTotal != null) return Math.abs(allowanceTotal);
  return sumAllowanceCharges(root["AllowanceCharge"], "false");
}

// TaxExclusiveAmount, else PayableAmount less TaxTotal/TaxAmount, else null.
function extractTaxExclusive(root: XmlRecord, totalPayable: number): number | null {
  const stated = numberFromNode(child(root, "LegalMonetaryTotal", "TaxExclusiveAmount"));
  if (stated != null) return stated;
  const tax = numberFromNode(child(root, "TaxTotal", "TaxAmount"));
  return tax == null ? null : totalPayable - tax;
}

// Sum of magnitudes of the entries with the given ChargeIndicator
// ("false" = allowance, "true" = charge); null when there are none.
function sumAllowanceCharges(nodes: unknown, chargeIndicator: "true" | "false"): number | null {
  let total: number | null = null;
  for (const node of asArray(nodes)) {
    const record = asRecord(node);
    const indicator = textFromNode(record["ChargeIndicator"])?.toLowerCase();
    if (indicator !== chargeIndicator) continue;
    const amount = numberFromNode(record["Amount"]);
    if (amount == null) continue;
    total = (total ?? 0) + Math.abs(amount);
  }
  return total;
}
