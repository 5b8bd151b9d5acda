import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { loadDocumentFile, loadDocumentsFromDirectory } from "../../src/documents/loader";
import { FilterUsageError } from "../../src/reconciliation-engine/errors";
import { buildProductSummary } from "../../src/reconciliation-engine/summary";

const fixturesDir = fileURLToPath(new URL("../fixtures/", import.meta.url));

describe("loadDocumentsFromDirectory", () => {
  beforeEach(() => {
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("returns one result per xml file, sorted by path", () => {
    const loaded = loadDocumentsFromDirectory(fixturesDir);

    expect(loaded.map((entry) => [path.basename(entry.source), entry.ok])).toEqual([
      ["broken.xml", false],
      ["credit-note-line-discounts.xml", true],
      ["invoice-document-discount.xml", true],
      ["invoice-fake-discount.xml", true],
    ]);
    expect(console.warn).toHaveBeenCalledTimes(1);
  });

  it("feeds the summary end to end", () => {
    const { rows, outcomes } = buildProductSummary(loadDocumentsFromDirectory(fixturesDir));

    expect(outcomes.map((outcome) => outcome.status)).toEqual(["failed", "ok", "ok", "ok"]);
    expect(outcomes[0]).toMatchObject({ error: { code: "DOCUMENT_LOAD" } });

    const creditRows = rows.filter((row) => row.documentNumber === "CN-042");
    expect(creditRows.map((row) => row.finalValue)).toEqual([-251.15, -217.67]);
    expect(creditRows.map((row) => row.discountValue)).toEqual([83.72, 117.21]);
    expect(creditRows.map((row) => row.discountRate)).toEqual([25, 35]);
    expect(creditRows.every((row) => !row.reconciliationWarning)).toBe(true);
    expect(creditRows[0].documentKind).toBe("credit_note");
    expect(rows).toHaveLength(5);
  });

  it("walks subdirectories only when recursive", () => {
    const root = fs.mkdtempSync(path.join(os.tmpdir(), "line-recon-"));
    try {
      fs.mkdirSync(path.join(root, "nested"));
      fs.copyFileSync(
        path.join(fixturesDir, "invoice-fake-discount.xml"),
        path.join(root, "nested", "a.XML")
      );
      fs.writeFileSync(path.join(root, "notes.txt"), "ignored");

      expect(loadDocumentsFromDirectory(root)).toEqual([]);
      const nested = loadDocumentsFromDirectory(root, { recursive: true });
      expect(nested).toHaveLength(1);
      expect(nested[0].ok).toBe(true);
    } finally {
      fs.rmSync(root, { recursive: true, force: true });
    }
  });

  it("validates criteria before reading any file", () => {
    const missing = path.join(fixturesDir, "missing");
    expect(() =>
      loadDocumentsFromDirectory(missing, { criteria: { startDate: "2025-01-01" } })
    ).toThrow(FilterUsageError);
    expect(() =>
      loadDocumentsFromDirectory(fixturesDir, { criteria: { startDate: "2025-03-01", endDate: "2025-01-01" } })
    ).toThrow(FilterUsageError);
    expect(console.warn).not.toHaveBeenCalled();
  });

  it("throws for a missing directory", () => {
    expect(() => loadDocumentsFromDirectory(path.join(fixturesDir, "missing"))).toThrow(
      /^Path not found/
    );
  });
});

describe("loadDocumentFile", () => {
  it("wraps read errors", () => {
    const missing = path.join(fixturesDir, "nope.xml");
    expect(() => loadDocumentFile(missing)).toThrow(`${missing}: cannot read file`);
  });
});
