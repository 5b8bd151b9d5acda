import fs from "node:fs";
import { DocumentLoadError } from "../reconciliation-engine/errors";
import { normalizeCriteria } from "../reconciliation-engine/selector";
import type { Document, LoadedDocument, SelectionCriteria } from "../reconciliation-engine/types";
import { listXmlFiles } from "./files";
import { parseUblDocument } from "./ubl-parser";

export function loadDocumentFile(filePath: string): Document {
  let xml: string;
  try {
    xml = fs.readFileSync(filePath, "utf8");
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new DocumentLoadError(filePath, `cannot read file (${message})`, { cause: error });
  }
  return parseUblDocument(xml, filePath);
}

// One result per *.xml file, sorted by path. Failures are returned, not dropped.
// Criteria, when given, are validated before any file is read.
export function loadDocumentsFromDirectory(
  directory: string,
  opts: { recursive?: boolean; criteria?: SelectionCriteria } = {}
): LoadedDocument[] {
  if (opts.criteria) normalizeCriteria(opts.criteria);
  const files = listXmlFiles(directory, opts.recursive ?? false);
  return files.map((source): LoadedDocument => {
    try {
      return { ok: true, source, document: loadDocumentFile(source) };
    } catch (error) {
      if (!(error instanceof Error)) throw error;
      console.warn("[documents] failed to load", { source, message: error.message });
      return { ok: false, source, error };
    }
  });
}
