import { describe, expect, it } from "vitest";
import { loadConfigFromEnv } from "../../src/config/env";
import { ConfigError } from "../../src/reconciliation-engine/errors";

describe("loadConfigFromEnv", () => {
  it("falls back to defaults for an empty env", () => {
    expect(loadConfigFromEnv({})).toEqual({
      reconciliation: {
        currencyDecimals: 2,
        reconciliationTolerance: null,
        discountKeywords: ["discount", "reducere"],
      },
      documentsDir: null,
    });
  });

  it("reads every RECON_ variable", () => {
    const settings = loadConfigFromEnv({
      RECON_CURRENCY_DECIMALS: "3",
      RECON_TOLERANCE: " 0.05 ",
      RECON_DISCOUNT_KEYWORDS: "Rabatt, remise,,",
      RECON_DOCUMENTS_DIR: "./invoices",
    });

    expect(settings).toEqual({
      reconciliation: {
        currencyDecimals: 3,
        reconciliationTolerance: 0.05,
        discountKeywords: ["rabatt", "remise"],
      },
      documentsDir: "./invoices",
    });
  });

  it("treats blank values as unset", () => {
    const settings = loadConfigFromEnv({ RECON_TOLERANCE: "  ", RECON_DOCUMENTS_DIR: "" });
    expect(settings.reconciliation.reconciliationTolerance).toBeNull();
    expect(settings.documentsDir).toBeNull();
  });

  it("names the variable that is not a number", () => {
    expect(() => loadConfigFromEnv({ RECON_TOLERANCE: "abc" })).toThrow(
      'RECON_TOLERANCE must be a number, got "abc"'
    );
    expect(() => loadConfigFromEnv({ RECON_CURRENCY_DECIMALS: "1.5" })).toThrow(ConfigError);
  });
});
