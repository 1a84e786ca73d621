/**
 * Token Engine Configuration Tests
 */

import { describe, it, expect } from "vitest";
import {
  createTokenEngineConfig,
  loadTokenEngineConfigFromEnv,
  type TokenEngineConfigInput,
} from "../config.js";
import { ValidationError } from "../errors.js";
import { ADMIN, ALICE, EXTERNAL_ASSET, ROUTER, TOKEN, thrown } from "./fixtures.js";

const UNIT = 10n ** 18n;

const REQUIRED: TokenEngineConfigInput = {
  tokenAddress: TOKEN,
  admin: ADMIN,
  router: ROUTER,
  externalAsset: EXTERNAL_ASSET,
};

const ENV = {
  LEVY_TOKEN_ADDRESS: TOKEN,
  LEVY_ADMIN: ADMIN,
  LEVY_ROUTER: ROUTER,
  LEVY_EXTERNAL_ASSET: EXTERNAL_ASSET,
};

describe("createTokenEngineConfig", () => {
  describe("defaults", () => {
    it("should fill in every optional section", () => {
      const config = createTokenEngineConfig(REQUIRED);

      expect(config.name).toBe("Levy");
      expect(config.symbol).toBe("LEVY");
      expect(config.decimals).toBe(18);
      expect(config.totalSupply).toBe(1_000_000_000n * UNIT);
      expect(config.burnThreshold).toBe(500_000_000n * UNIT);
      expect(config.initialBurn).toBe(0n);
      expect(config.maxTaxBps).toBe(2_500);
      expect(config.taxRates).toEqual({ buyBps: 500, sellBps: 500, walletBps: 0 });
      expect(config.taxSplit).toEqual({ burnPercent: 60, treasuryPercent: 25 });
      expect(config.liquidityRecipient).toBeUndefined();
    });

    it("should default the conversion, guard and distribution settings", () => {
      const config = createTokenEngineConfig(REQUIRED);

      expect(config.conversion).toEqual({
        swapEnabled: true,
        swapThreshold: 100_000n * UNIT,
        maxConversionAmount: 1_000_000n * UNIT,
        slippageBps: 500,
        deadlineWindowSeconds: 300n,
        buybackShareBps: 5_000,
      });
      expect(config.antiAbuse.launchGuardMode).toBe("contract-allowlist");
      expect(config.antiAbuse.antiBotWindowBlocks).toBe(3n);
      expect(config.distribution).toEqual({ minDelayBlocks: 100n, beneficiaries: [] });
    });
  });

  describe("normalisation", () => {
    it("should checksum lower-case addresses", () => {
      const config = createTokenEngineConfig({
        ...REQUIRED,
        admin: "0x52908400098527886e0f7030069857d2e4169ee7",
      });

      expect(config.admin).toBe("0x52908400098527886E0F7030069857D2E4169EE7");
    });

    it("should accept amounts as decimal strings and numbers", () => {
      const config = createTokenEngineConfig({
        ...REQUIRED,
        totalSupply: "5000",
        initialBurn: 100,
        burnThreshold: 2_500n,
      });

      expect(config.totalSupply).toBe(5_000n);
      expect(config.initialBurn).toBe(100n);
      expect(config.burnThreshold).toBe(2_500n);
    });
  });

  describe("validation", () => {
    it("should reject an initial burn above the supply", () => {
      const error = thrown(() =>
        createTokenEngineConfig({ ...REQUIRED, totalSupply: 1_000n, initialBurn: 2_000n })
      );

      expect(error).toBeInstanceOf(ValidationError);
      expect(error).toMatchObject({
        code: "InvalidConfiguration",
        message: "Invalid token engine configuration: initialBurn: initialBurn cannot exceed totalSupply",
      });
    });

    it("should reject tax rates above maxTaxBps", () => {
      const error = thrown(() =>
        createTokenEngineConfig({ ...REQUIRED, taxRates: { buyBps: 3_000 } })
      );

      expect(error).toMatchObject({
        message: "Invalid token engine configuration: taxRates.buyBps: buyBps exceeds maxTaxBps (2500)",
      });
    });

    it("should reject a split above 100 percent", () => {
      const error = thrown(() =>
        createTokenEngineConfig({ ...REQUIRED, taxSplit: { burnPercent: 80, treasuryPercent: 30 } })
      );

      expect(error).toMatchObject({
        message: "Invalid token engine configuration: taxSplit: burnPercent + treasuryPercent must not exceed 100",
      });
    });

    it("should require beneficiary shares to cover 10000 bps", () => {
      const error = thrown(() =>
        createTokenEngineConfig({
          ...REQUIRED,
          distribution: { beneficiaries: [{ account: ALICE, shareBps: 5_000 }] },
        })
      );

      expect(error).toMatchObject({
        details: { issues: ["distribution.beneficiaries: Beneficiary shares must sum to 10000, got 5000"] },
      });
    });

    it("should reject malformed addresses", () => {
      const error = thrown(() => createTokenEngineConfig({ ...REQUIRED, admin: "not-an-address" }));

      expect(error).toMatchObject({ message: "Invalid token engine configuration: admin: Invalid address" });
    });
  });
});

describe("loadTokenEngineConfigFromEnv", () => {
  it("should read LEVY_* variables", () => {
    const config = loadTokenEngineConfigFromEnv({
      ...ENV,
      LEVY_TOTAL_SUPPLY: "5000000",
      LEVY_SELL_TAX_BPS: "800",
      LEVY_SWAP_ENABLED: "false",
      LEVY_LAUNCH_GUARD_MODE: "origin-only",
    });

    expect(config.tokenAddress).toBe(TOKEN);
    expect(config.totalSupply).toBe(5_000_000n);
    expect(config.taxRates).toEqual({ buyBps: 500, sellBps: 800, walletBps: 0 });
    expect(config.conversion.swapEnabled).toBe(false);
    expect(config.antiAbuse.launchGuardMode).toBe("origin-only");
  });

  it("should let overrides win over the environment, field by field", () => {
    const config = loadTokenEngineConfigFromEnv(
      { ...ENV, LEVY_SELL_TAX_BPS: "800", LEVY_SLIPPAGE_BPS: "100" },
      { symbol: "TEST", taxRates: { buyBps: 100 }, conversion: { swapEnabled: false } }
    );

    expect(config.symbol).toBe("TEST");
    expect(config.taxRates).toEqual({ buyBps: 100, sellBps: 800, walletBps: 0 });
    expect(config.conversion.slippageBps).toBe(100);
    expect(config.conversion.swapEnabled).toBe(false);
  });

  it("should fail when a required address is missing", () => {
    const error = thrown(() => loadTokenEngineConfigFromEnv({}));

    expect(error).toMatchObject({
      code: "InvalidConfiguration",
      message: "Invalid token engine configuration: tokenAddress: Invalid address",
    });
  });

  it("should reject malformed boolean flags", () => {
    const error = thrown(() => loadTokenEngineConfigFromEnv({ ...ENV, LEVY_SWAP_ENABLED: "yes" }));

    expect(error).toMatchObject({ code: "InvalidConfiguration" });
    expect(error).toBeInstanceOf(ValidationError);
  });
});
