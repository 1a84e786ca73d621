/**
 * Token Engine Configuration
 */

import { z } from "zod";
import {
  addressSchema,
  bpsSchema,
  percentSchema,
  uint256Schema,
  BPS_DENOMINATOR,
  TOKEN_DEFAULTS,
} from "@levy/shared";
import { ValidationError } from "./errors.js";

const UNIT = 10n ** BigInt(TOKEN_DEFAULTS.decimals);

// ============================================
// TOKEN ENGINE CONFIG SCHEMA
// ============================================

const taxRatesSchema = z.object({
  buyBps: bpsSchema.default(500),
  sellBps: bpsSchema.default(500),
  // Independent of sellBps
  walletBps: bpsSchema.default(0),
});

const taxSplitSchema = z
  .object({
    burnPercent: percentSchema.default(60),
    treasuryPercent: percentSchema.default(25),
  })
  .refine(
    (split) => split.burnPercent + split.treasuryPercent <= 100,
    "burnPercent + treasuryPercent must not exceed 100"
  );

const antiAbuseSchema = z.object({
  maxTxAmount: uint256Schema.default(10_000_000n * UNIT),
  maxPairToPairAmount: uint256Schema.default(10_000_000n * UNIT),
  cooldownSeconds: uint256Schema.default(30n),
  antiBotWindowBlocks: uint256Schema.default(3n),
  launchGuardMode: z.enum(["contract-allowlist", "origin-only"]).default("contract-allowlist"),
  launchAllowList: z.array(addressSchema).default([]),
});

const conversionSchema = z.object({
  swapEnabled: z.boolean().default(true),
  swapThreshold: uint256Schema.default(100_000n * UNIT),
  maxConversionAmount: uint256Schema.default(1_000_000n * UNIT),
  slippageBps: bpsSchema.default(TOKEN_DEFAULTS.slippageBps),
  deadlineWindowSeconds: uint256Schema.default(TOKEN_DEFAULTS.deadlineWindowSeconds),
  buybackShareBps: bpsSchema.default(5_000),
});

const beneficiarySchema = z.object({
  account: addressSchema,
  shareBps: bpsSchema,
});

const distributionSchema = z.object({
  minDelayBlocks: uint256Schema.default(TOKEN_DEFAULTS.distributionDelayBlocks),
  beneficiaries: z.array(beneficiarySchema).default([]),
});

export const tokenEngineConfigSchema = z
  .object({
    // Metadata
    name: z.string().min(1).default("Levy"),
    symbol: z.string().min(1).default("LEVY"),
    decimals: z.number().int().min(0).max(36).default(TOKEN_DEFAULTS.decimals),

    // Well-known accounts
    tokenAddress: addressSchema,
    admin: addressSchema,
    router: addressSchema,
    externalAsset: addressSchema,
    /** Receives liquidity positions; defaults to the admin */
    liquidityRecipient: addressSchema.optional(),

    // Construction-time, frozen for the life of the instance
    totalSupply: uint256Schema.default(1_000_000_000n * UNIT),
    initialBurn: uint256Schema.default(0n),
    burnThreshold: uint256Schema.default(500_000_000n * UNIT),
    maxTaxBps: bpsSchema.default(TOKEN_DEFAULTS.maxTaxBps),

    taxRates: taxRatesSchema.default({}),
    taxSplit: taxSplitSchema.default({}),
    exempt: z.array(addressSchema).default([]),
    antiAbuse: antiAbuseSchema.default({}),
    conversion: conversionSchema.default({}),
    distribution: distributionSchema.default({}),
  })
  .superRefine((config, ctx) => {
    if (config.initialBurn > config.totalSupply) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["initialBurn"],
        message: "initialBurn cannot exceed totalSupply",
      });
    }

    if (config.burnThreshold === 0n) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["burnThreshold"],
        message: "burnThreshold must be positive",
      });
    }

    for (const key of ["buyBps", "sellBps", "walletBps"] as const) {
      if (config.taxRates[key] > config.maxTaxBps) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["taxRates", key],
          message: `${key} exceeds maxTaxBps (${config.maxTaxBps})`,
        });
      }
    }

    const { beneficiaries } = config.distribution;
    if (beneficiaries.length > 0) {
      const total = beneficiaries.reduce((sum, share) => sum + share.shareBps, 0);
      if (total !== Number(BPS_DENOMINATOR)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["distribution", "beneficiaries"],
          message: `Beneficiary shares must sum to 10000, got ${total}`,
        });
      }
    }
  });

export type TokenEngineConfig = z.infer<typeof tokenEngineConfigSchema>;
export type TokenEngineConfigInput = z.input<typeof tokenEngineConfigSchema>;

// ============================================
// LOAD CONFIGURATION
// ============================================

/**
 * Merge defaults into `input` and validate. Throws InvalidConfiguration with
 * every failing path listed.
 */
export function createTokenEngineConfig(input: TokenEngineConfigInput): TokenEngineConfig {
  const result = tokenEngineConfigSchema.safeParse(input);

  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`
    );
    throw new ValidationError("InvalidConfiguration", `Invalid token engine configuration: ${issues[0]}`, {
      issues,
    });
  }

  return result.data;
}

const tokenEngineEnvSchema = z.object({
  LEVY_TOKEN_ADDRESS: z.string().optional(),
  LEVY_ADMIN: z.string().optional(),
  LEVY_ROUTER: z.string().optional(),
  LEVY_EXTERNAL_ASSET: z.string().optional(),
  LEVY_LIQUIDITY_RECIPIENT: z.string().optional(),
  LEVY_TOKEN_NAME: z.string().optional(),
  LEVY_TOKEN_SYMBOL: z.string().optional(),
  LEVY_TOTAL_SUPPLY: z.string().optional(),
  LEVY_INITIAL_BURN: z.string().optional(),
  LEVY_BURN_THRESHOLD: z.string().optional(),
  LEVY_MAX_TAX_BPS: z.coerce.number().optional(),
  LEVY_BUY_TAX_BPS: z.coerce.number().optional(),
  LEVY_SELL_TAX_BPS: z.coerce.number().optional(),
  LEVY_WALLET_TAX_BPS: z.coerce.number().optional(),
  LEVY_SWAP_ENABLED: z
    .enum(["true", "false"])
    .transform((value) => value === "true")
    .optional(),
  LEVY_SWAP_THRESHOLD: z.string().optional(),
  LEVY_SLIPPAGE_BPS: z.coerce.number().optional(),
  LEVY_LAUNCH_GUARD_MODE: z.enum(["contract-allowlist", "origin-only"]).optional(),
});

/**
 * Read LEVY_* variables and overlay them on the defaults. `overrides` win
 * over the environment.
 */
export function loadTokenEngineConfigFromEnv(
  env: Record<string, string | undefined> = process.env,
  overrides: Partial<TokenEngineConfigInput> = {}
): TokenEngineConfig {
  const parsed = tokenEngineEnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new ValidationError("InvalidConfiguration", `Invalid environment: ${issues[0]}`, { issues });
  }
  const vars = parsed.data;

  const fromEnv: TokenEngineConfigInput = {
    tokenAddress: vars.LEVY_TOKEN_ADDRESS ?? "",
    admin: vars.LEVY_ADMIN ?? "",
    router: vars.LEVY_ROUTER ?? "",
    externalAsset: vars.LEVY_EXTERNAL_ASSET ?? "",
    liquidityRecipient: vars.LEVY_LIQUIDITY_RECIPIENT,
    name: vars.LEVY_TOKEN_NAME,
    symbol: vars.LEVY_TOKEN_SYMBOL,
    totalSupply: vars.LEVY_TOTAL_SUPPLY,
    initialBurn: vars.LEVY_INITIAL_BURN,
    burnThreshold: vars.LEVY_BURN_THRESHOLD,
    maxTaxBps: vars.LEVY_MAX_TAX_BPS,
    taxRates: {
      buyBps: vars.LEVY_BUY_TAX_BPS,
      sellBps: vars.LEVY_SELL_TAX_BPS,
      walletBps: vars.LEVY_WALLET_TAX_BPS,
    },
    conversion: {
      swapEnabled: vars.LEVY_SWAP_ENABLED,
      swapThreshold: vars.LEVY_SWAP_THRESHOLD,
      slippageBps: vars.LEVY_SLIPPAGE_BPS,
    },
    antiAbuse: {
      launchGuardMode: vars.LEVY_LAUNCH_GUARD_MODE,
    },
  };

  return createTokenEngineConfig({
    ...fromEnv,
    ...overrides,
    taxRates: { ...fromEnv.taxRates, ...overrides.taxRates },
    conversion: { ...fromEnv.conversion, ...overrides.conversion },
    antiAbuse: { ...fromEnv.antiAbuse, ...overrides.antiAbuse },
  });
}
