/**
 * Mock Exchange Gateway
 *
 * Fixed-rate in-process exchange. Token legs really move tokens through the
 * bound token's transfer entry points, so every nested call goes back through
 * the transfer pipeline exactly as a live router would.
 */

import { tokenEngineLogger } from "@levy/shared";
import type { Address } from "viem";
import { getAddress } from "viem";
import type { ExecutionEnvironment } from "../environment.js";
import { applyBps } from "../ledger/math.js";
import type { InMemoryExternalAsset } from "./in-memory-external-asset.js";
import type { ExchangeGateway, GatewayResult, LiquidityReceipt } from "./types.js";
import { gatewayFailure, gatewayOk } from "./types.js";

const mockLogger = tokenEngineLogger.child({ component: "mock-gateway" });

export type MockGatewayOperation =
  | "getQuote"
  | "swapExactTokensForExternal"
  | "swapExactExternalForTokens"
  | "addLiquidity"
  | "resolvePair";

export type MockFailureMode = "result" | "throw";

/**
 * What the gateway needs from the token it trades
 */
export interface GatewayTokenPort {
  readonly address: Address;
  transfer(sender: Address, to: Address, amount: bigint): Promise<unknown>;
  transferFrom(spender: Address, from: Address, to: Address, amount: bigint): Promise<unknown>;
}

export interface MockGatewayCall {
  operation: MockGatewayOperation;
  amountIn: bigint;
  minOut?: bigint;
  recipient?: Address;
  deadline?: bigint;
}

export interface MockExchangeGatewayOptions {
  routerAddress: Address;
  pairAddress: Address;
  /** Price as a ratio: `externalPerRate` external units buy `tokensPerRate` tokens */
  externalPerRate: bigint;
  tokensPerRate: bigint;
  /** Tokens withheld from buyback deliveries while still reporting full output */
  tokenDeliveryShortfallBps: number;
}

export class MockExchangeGateway implements ExchangeGateway {
  readonly routerAddress: Address;
  readonly pairAddress: Address;
  readonly calls: MockGatewayCall[] = [];

  tokenDeliveryShortfallBps: number;
  /** Runs inside every trading call before any value moves */
  beforeExecute: ((operation: MockGatewayOperation) => Promise<void>) | null = null;

  private readonly externalPerRate: bigint;
  private readonly tokensPerRate: bigint;
  private readonly failures: Map<MockGatewayOperation, MockFailureMode> = new Map();
  private token: GatewayTokenPort | null = null;
  private pairListed = false;

  constructor(
    private readonly environment: ExecutionEnvironment,
    private readonly externalAsset: InMemoryExternalAsset,
    options: Partial<MockExchangeGatewayOptions> = {}
  ) {
    this.routerAddress = getAddress(options.routerAddress ?? "0x00000000000000000000000000000000000A0001");
    this.pairAddress = getAddress(options.pairAddress ?? "0x00000000000000000000000000000000000B0001");
    this.externalPerRate = options.externalPerRate ?? 1n;
    this.tokensPerRate = options.tokensPerRate ?? 1_000n;
    this.tokenDeliveryShortfallBps = options.tokenDeliveryShortfallBps ?? 0;
  }

  bind(token: GatewayTokenPort): void {
    this.token = token;
  }

  /**
   * Make resolvePair return the pair address from now on
   */
  listPair(): void {
    this.pairListed = true;
  }

  failOn(operation: MockGatewayOperation, mode: MockFailureMode = "result"): void {
    this.failures.set(operation, mode);
  }

  restore(operation: MockGatewayOperation): void {
    this.failures.delete(operation);
  }

  tokensToExternal(amount: bigint): bigint {
    return (amount * this.externalPerRate) / this.tokensPerRate;
  }

  externalToTokens(amount: bigint): bigint {
    return (amount * this.tokensPerRate) / this.externalPerRate;
  }

  // ============================================
  // EXCHANGE GATEWAY
  // ============================================

  async getQuote(amountIn: bigint, path: readonly Address[]): Promise<GatewayResult<bigint>> {
    this.calls.push({ operation: "getQuote", amountIn });
    const failure = this.injectedFailure<bigint>("getQuote");
    if (failure) return failure;

    const sellingTokens = this.token !== null && path[0] === this.token.address;
    return gatewayOk(sellingTokens ? this.tokensToExternal(amountIn) : this.externalToTokens(amountIn));
  }

  async swapExactTokensForExternal(
    amountIn: bigint,
    minOut: bigint,
    _path: readonly Address[],
    recipient: Address,
    deadline: bigint
  ): Promise<GatewayResult<bigint>> {
    this.calls.push({ operation: "swapExactTokensForExternal", amountIn, minOut, recipient, deadline });
    const rejected = this.precheck<bigint>("swapExactTokensForExternal", deadline);
    if (rejected) return rejected;

    const token = this.requireToken();
    const out = this.tokensToExternal(amountIn);
    if (out < minOut) return gatewayFailure("insufficient output amount");

    await this.runHook("swapExactTokensForExternal");
    await token.transferFrom(this.routerAddress, token.address, this.pairAddress, amountIn);
    this.externalAsset.credit(recipient, out);

    return gatewayOk(out);
  }

  /**
   * The external asset is paid by the bound token's own account.
   */
  async swapExactExternalForTokens(
    externalAmountIn: bigint,
    minOut: bigint,
    _path: readonly Address[],
    recipient: Address,
    deadline: bigint
  ): Promise<GatewayResult<bigint>> {
    this.calls.push({ operation: "swapExactExternalForTokens", amountIn: externalAmountIn, minOut, recipient, deadline });
    const rejected = this.precheck<bigint>("swapExactExternalForTokens", deadline);
    if (rejected) return rejected;

    const token = this.requireToken();
    const out = this.externalToTokens(externalAmountIn);
    if (out < minOut) return gatewayFailure("insufficient output amount");

    await this.runHook("swapExactExternalForTokens");
    this.externalAsset.debit(token.address, externalAmountIn);

    const delivered = out - applyBps(out, this.tokenDeliveryShortfallBps);
    await token.transfer(this.pairAddress, recipient, delivered);

    return gatewayOk(out);
  }

  async addLiquidity(
    tokenAmount: bigint,
    externalAmount: bigint,
    minTokenAmount: bigint,
    minExternalAmount: bigint,
    _recipient: Address,
    deadline: bigint
  ): Promise<GatewayResult<LiquidityReceipt>> {
    this.calls.push({ operation: "addLiquidity", amountIn: tokenAmount, minOut: minTokenAmount, deadline });
    const rejected = this.precheck<LiquidityReceipt>("addLiquidity", deadline);
    if (rejected) return rejected;

    const token = this.requireToken();
    const externalNeeded = this.tokensToExternal(tokenAmount);

    let tokenUsed = tokenAmount;
    let externalUsed = externalNeeded;
    if (externalAmount < externalNeeded) {
      externalUsed = externalAmount;
      tokenUsed = this.externalToTokens(externalAmount);
    }

    if (tokenUsed < minTokenAmount || externalUsed < minExternalAmount) {
      return gatewayFailure("insufficient liquidity amounts");
    }
    if (this.externalAsset.balanceOf(token.address) < externalUsed) {
      return gatewayFailure("insufficient external asset for liquidity");
    }

    await this.runHook("addLiquidity");
    await token.transferFrom(this.routerAddress, token.address, this.pairAddress, tokenUsed);
    this.externalAsset.move(token.address, this.pairAddress, externalUsed);

    return gatewayOk({ tokenUsed, externalUsed, liquidity: tokenUsed });
  }

  async resolvePair(_tokenA: Address, _tokenB: Address): Promise<GatewayResult<Address | null>> {
    const failure = this.injectedFailure<Address | null>("resolvePair");
    if (failure) return failure;
    return gatewayOk(this.pairListed ? this.pairAddress : null);
  }

  // ============================================
  // PRIVATE HELPERS
  // ============================================

  private precheck<T>(operation: MockGatewayOperation, deadline: bigint): GatewayResult<T> | null {
    const failure = this.injectedFailure<T>(operation);
    if (failure) return failure;

    if (this.environment.currentTime() > deadline) {
      return gatewayFailure("deadline expired");
    }
    return null;
  }

  private injectedFailure<T>(operation: MockGatewayOperation): GatewayResult<T> | null {
    const mode = this.failures.get(operation);
    if (mode === undefined) return null;

    mockLogger.debug({ operation, mode }, "Injected gateway failure");
    if (mode === "throw") {
      throw new Error(`${operation} reverted`);
    }
    return gatewayFailure(`${operation} failed`);
  }

  private async runHook(operation: MockGatewayOperation): Promise<void> {
    if (this.beforeExecute) {
      await this.beforeExecute(operation);
    }
  }

  private requireToken(): GatewayTokenPort {
    if (this.token === null) {
      throw new Error("MockExchangeGateway is not bound to a token");
    }
    return this.token;
  }
}
