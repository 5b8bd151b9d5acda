import { ConfigError } from "./errors";
import { minorUnit, roundHalfEven } from "./money";

export type ReconciliationConfig = {
  // Decimal places of the currency's minor unit (2 -> 0.01).
  currencyDecimals: number;
  // Absolute residual tolerance; null = one minor unit per product line.
  reconciliationTolerance: number | null;
  // Lowercase item-name fragments that mark a negative-quantity line as a discount.
  discountKeywords: string[];
};

const DEFAULT_CONFIG: ReconciliationConfig = {
  currencyDecimals: 2,
  reconciliationTolerance: null,
  discountKeywords: ["discount", "reducere"],
};

const MAX_CURRENCY_DECIMALS = 8;

export function resolveConfig(override?: Partial<ReconciliationConfig>): ReconciliationConfig {
  if (!override) return { ...DEFAULT_CONFIG, discountKeywords: [...DEFAULT_CONFIG.discountKeywords] };

  const cfg: ReconciliationConfig = {
    currencyDecimals: override.currencyDecimals ?? DEFAULT_CONFIG.currencyDecimals,
    reconciliationTolerance:
      override.reconciliationTolerance === undefined
        ? DEFAULT_CONFIG.reconciliationTolerance
        : override.reconciliationTolerance,
    discountKeywords: (override.discountKeywords ?? DEFAULT_CONFIG.discountKeywords)
      .map((keyword) => keyword.trim().toLowerCase())
      .filter(Boolean),
  };

  validateConfig(cfg);
  return cfg;
}

function validateConfig(cfg: ReconciliationConfig) {
  const { currencyDecimals, reconciliationTolerance, discountKeywords } = cfg;
  if (
    !Number.isInteger(currencyDecimals) ||
    currencyDecimals < 0 ||
    currencyDecimals > MAX_CURRENCY_DECIMALS
  ) {
    throw new ConfigError(
      `currencyDecimals must be an integer between 0 and ${MAX_CURRENCY_DECIMALS}, got ${currencyDecimals}`
    );
  }
  if (
    reconciliationTolerance !== null &&
    (!Number.isFinite(reconciliationTolerance) || reconciliationTolerance < 0)
  ) {
    throw new ConfigError(
      `reconciliationTolerance must be a non-negative number, got ${reconciliationTolerance}`
    );
  }
  if (discountKeywords.length === 0) {
    throw new ConfigError("discountKeywords must contain at least one keyword");
  }
}

// Tolerance for a document with `lineCount` product lines.
export function resolveTolerance(cfg: ReconciliationConfig, lineCount: number): number {
  if (cfg.reconciliationTolerance !== null) return cfg.reconciliationTolerance;
  return roundHalfEven(lineCount * minorUnit(cfg.currencyDecimals), cfg.currencyDecimals);
}
