/**
 * Shared test harness: a token engine wired to the in-process exchange,
 * external asset and environment.
 */

import { getAddress, type Address } from "viem";
import type { TokenEngineConfigInput } from "../config.js";
import { SimulatedEnvironment } from "../environment.js";
import { InMemoryExternalAsset } from "../conversion/in-memory-external-asset.js";
import { MockExchangeGateway } from "../conversion/mock-exchange-gateway.js";
import { createTaxTokenEngine, type TaxTokenEngine } from "../engine/token-engine.js";

const account = (suffix: string): Address => getAddress(`0x${suffix.padStart(40, "0")}`);

export const TOKEN = account("70000001");
export const ADMIN = account("10000001");
export const ALICE = account("20000001");
export const BOB = account("20000002");
export const CAROL = account("20000003");
export const BOT = account("30000001");
export const ROUTER = account("40000001");
export const PAIR = account("50000001");
export const OTHER_PAIR = account("50000002");
export const EXTERNAL_ASSET = account("60000001");
export const LP_RECIPIENT = account("60000002");
// Hex letters, so checksummed and lower-case spellings differ
export const HEX_PAIR = account("abcdefabcdefabcdefabcdefabcdefabcdef0001");
export const HEX_HOLDER = account("fedcbafedcbafedcbafedcbafedcbafedcba0002");

/**
 * The all-lower-case spelling of an account
 */
export function lowerCase(value: Address): Address {
  return `0x${value.slice(2).toLowerCase()}`;
}

export interface Harness {
  engine: TaxTokenEngine;
  env: SimulatedEnvironment;
  gateway: MockExchangeGateway;
  external: InMemoryExternalAsset;
}

/**
 * Whole-unit amounts. 10 tokens trade for 1 unit of external asset.
 */
export function createHarness(overrides: Partial<TokenEngineConfigInput> = {}): Harness {
  const env = new SimulatedEnvironment();
  const external = new InMemoryExternalAsset({ address: EXTERNAL_ASSET });
  const gateway = new MockExchangeGateway(env, external, {
    routerAddress: ROUTER,
    pairAddress: PAIR,
    externalPerRate: 1n,
    tokensPerRate: 10n,
  });

  const engine = createTaxTokenEngine(
    {
      tokenAddress: TOKEN,
      admin: ADMIN,
      router: ROUTER,
      externalAsset: EXTERNAL_ASSET,
      liquidityRecipient: LP_RECIPIENT,
      totalSupply: 1_000_000n,
      initialBurn: 0n,
      burnThreshold: 500_000n,
      taxRates: { buyBps: 500, sellBps: 500, walletBps: 0 },
      taxSplit: { burnPercent: 60, treasuryPercent: 25 },
      antiAbuse: {
        maxTxAmount: 100_000n,
        maxPairToPairAmount: 10_000n,
        cooldownSeconds: 30n,
        antiBotWindowBlocks: 0n,
      },
      conversion: {
        swapEnabled: false,
        swapThreshold: 1_000n,
        maxConversionAmount: 10_000n,
        slippageBps: 500,
        deadlineWindowSeconds: 300n,
        buybackShareBps: 5_000,
      },
      distribution: { minDelayBlocks: 10n },
      ...overrides,
    },
    { environment: env, gateway, vault: external.vaultFor(TOKEN) }
  );
  gateway.bind(engine);

  return { engine, env, gateway, external };
}

/**
 * Set the primary pair, open trading and step past the launch window. The
 * pair is seeded with 100,000 tokens by the (exempt) admin.
 */
export async function launch({ engine, env }: Harness): Promise<void> {
  engine.setPrimaryPair(ADMIN, PAIR);
  engine.enableTrading(ADMIN);
  env.mine(1n);
  await engine.transfer(ADMIN, PAIR, 100_000n);
}

/**
 * Runs `fn` and returns what it threw, or undefined.
 */
export function thrown(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  return undefined;
}
