import dotenv from "dotenv";
import path from "node:path";
import { loadConfigFromEnv } from "../src/config/env";
import { loadDocumentsFromDirectory } from "../src/documents/loader";
import {
  buildProductSummary,
  FilterUsageError,
  summarizeDocuments,
  type Document,
  type SelectionCriteria,
} from "../src/reconciliation-engine";

dotenv.config({ path: ".env.local" });
dotenv.config();

const USAGE =
  "Usage: npm run product-summary -- [documentsDir] [--supplier <glob>] [--invoice <glob>] " +
  "[--start YYYY-MM-DD --end YYYY-MM-DD] [--recursive] [--json] [--documents]";

const VALUE_FLAGS = new Set(["--supplier", "--invoice", "--start", "--end"]);

function parseArgs(argv: string[]) {
  const values = new Map<string, string>();
  const flags = new Set<string>();
  const positional: string[] = [];

  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    if (VALUE_FLAGS.has(arg)) {
      const value = argv[i + 1];
      if (value === undefined || value.startsWith("--")) {
        throw new Error(`Missing value for ${arg}`);
      }
      values.set(arg, value);
      i += 1;
    } else if (arg.startsWith("--")) {
      flags.add(arg);
    } else {
      positional.push(arg);
    }
  }

  const criteria: SelectionCriteria = {
    supplierName: values.get("--supplier") ?? null,
    invoiceNumber: values.get("--invoice") ?? null,
    startDate: values.get("--start") ?? null,
    endDate: values.get("--end") ?? null,
  };

  return {
    directory: positional[0] ?? null,
    criteria,
    recursive: flags.has("--recursive"),
    json: flags.has("--json"),
    documentsOnly: flags.has("--documents"),
    help: flags.has("--help"),
  };
}

async function main() {
  let args: ReturnType<typeof parseArgs>;
  try {
    args = parseArgs(process.argv.slice(2));
  } catch (e: unknown) {
    console.error(e instanceof Error ? e.message : String(e));
    console.log(USAGE);
    process.exit(1);
  }

  if (args.help) {
    console.log(USAGE);
    return;
  }

  const settings = loadConfigFromEnv(process.env);
  const directory = args.directory ?? settings.documentsDir;
  if (!directory) {
    console.error("No documents directory given and RECON_DOCUMENTS_DIR is not set.");
    console.log(USAGE);
    process.exit(1);
  }

  try {
    const loaded = loadDocumentsFromDirectory(directory, {
      recursive: args.recursive,
      criteria: args.criteria,
    });
    console.log(`Loaded ${loaded.length} file(s) from ${path.resolve(directory)}`);

    if (args.documentsOnly) {
      const documents: Document[] = [];
      for (const result of loaded) {
        if (result.ok) documents.push(result.document);
      }
      const rows = summarizeDocuments(documents, args.criteria, settings.reconciliation);
      if (args.json) console.log(JSON.stringify(rows, null, 2));
      else console.table(rows);
      return;
    }

    const summary = buildProductSummary(loaded, args.criteria, settings.reconciliation);
    if (summary.rows.length === 0) {
      console.log("No matching invoices or credit notes found.");
    } else if (args.json) {
      console.log(JSON.stringify(summary.rows, null, 2));
    } else {
      console.table(summary.rows);
    }

    for (const outcome of summary.outcomes) {
      if (outcome.status === "failed") {
        console.log(
          `[FAIL] ${outcome.documentNumber ?? path.basename(outcome.source ?? "?")} -> ${outcome.error.code}: ${outcome.error.message}`
        );
      } else if (outcome.warning) {
        console.log(
          `[WARN] ${outcome.documentNumber} -> residual ${outcome.warning.residual} exceeds tolerance ${outcome.warning.tolerance}`
        );
      }
    }

    const failed = summary.outcomes.filter((o) => o.status === "failed").length;
    console.log(`Done. OK=${summary.outcomes.length - failed}, Failed=${failed}, Rows=${summary.rows.length}`);
  } catch (e: unknown) {
    if (e instanceof FilterUsageError) {
      console.error(`Error: ${e.message}.`);
      console.log(USAGE);
      process.exit(1);
    }
    throw e;
  }
}

main().catch((e) => {
  console.error(e);
  process.exit(1);
});
