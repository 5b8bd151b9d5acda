import { resolveConfig, type ReconciliationConfig } from "../reconciliation-engine/config";
import { ConfigError } from "../reconciliation-engine/errors";

export type EnvRecord = Record<string, string | undefined>;

export type AppSettings = {
  reconciliation: ReconciliationConfig;
  documentsDir: string | null;
};

// Reads settings from an env record. Scripts load .env files via dotenv
// before calling this with process.env.
export function loadConfigFromEnv(env: EnvRecord = process.env): AppSettings {
  const keywords = optionalString(env.RECON_DISCOUNT_KEYWORDS);

  return {
    reconciliation: resolveConfig({
      currencyDecimals: optionalNumber(env, "RECON_CURRENCY_DECIMALS") ?? undefined,
      reconciliationTolerance: optionalNumber(env, "RECON_TOLERANCE"),
      discountKeywords: keywords ? keywords.split(",") : undefined,
    }),
    documentsDir: optionalString(env.RECON_DOCUMENTS_DIR),
  };
}

function optionalString(value: string | undefined): string | null {
  if (value == null) return null;
  const trimmed = value.trim();
  return trimmed ? trimmed : null;
}

function optionalNumber(env: EnvRecord, name: string): number | null {
  const raw = optionalString(env[name]);
  if (raw == null) return null;
  const parsed = Number(raw);
  if (!Number.isFinite(parsed)) {
    throw new ConfigError(`${name} must be a number, got "${raw}"`);
  }
  return parsed;
}
