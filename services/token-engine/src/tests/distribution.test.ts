/**
 * Distribution Ledger Tests
 *
 * Queue/settle lifecycle, failed sends and their admin requeue, and the
 * ordering that keeps a re-entrant settle from paying twice.
 */

import { describe, it, expect, beforeEach } from "vitest";
import { NULL_ACCOUNT } from "@levy/shared";
import type { Address } from "viem";
import { SimulatedEnvironment } from "../environment.js";
import { NotificationLog } from "../notifications.js";
import { InMemoryExternalAsset } from "../conversion/index.js";
import type { ExternalAssetVault } from "../conversion/index.js";
import { DistributionLedger } from "../distribution/index.js";
import { ExternalDependencyError, isTokenEngineError } from "../errors.js";
import { ALICE, BOB, CAROL, TOKEN, thrown } from "./fixtures.js";

describe("DistributionLedger", () => {
  let env: SimulatedEnvironment;
  let notifications: NotificationLog;
  let asset: InMemoryExternalAsset;
  let reserved: bigint;
  let ledger: DistributionLedger;

  const create = (vault: ExternalAssetVault): DistributionLedger =>
    new DistributionLedger(
      {
        vault,
        unreservedExternal: async () => asset.balanceOf(TOKEN) - reserved,
        environment: env,
        notifications,
      },
      10n,
      [
        { account: ALICE, shareBps: 6_000 },
        { account: BOB, shareBps: 4_000 },
      ]
    );

  beforeEach(() => {
    env = new SimulatedEnvironment();
    notifications = new NotificationLog(env);
    asset = new InMemoryExternalAsset();
    reserved = 0n;
    ledger = create(asset.vaultFor(TOKEN));
  });

  describe("configureBeneficiaries", () => {
    it("should require shares summing to 10000", () => {
      const error = thrown(() =>
        ledger.configureBeneficiaries([
          { account: ALICE, shareBps: 5_000 },
          { account: BOB, shareBps: 4_999 },
        ])
      );
      expect(error).toMatchObject({ code: "InvalidShares" });
    });

    it("should reject duplicates, zero shares and the null account", () => {
      expect(
        thrown(() =>
          ledger.configureBeneficiaries([
            { account: ALICE, shareBps: 5_000 },
            { account: ALICE, shareBps: 5_000 },
          ])
        )
      ).toMatchObject({ code: "InvalidShares" });

      expect(
        thrown(() =>
          ledger.configureBeneficiaries([
            { account: ALICE, shareBps: 10_000 },
            { account: BOB, shareBps: 0 },
          ])
        )
      ).toMatchObject({ code: "InvalidShares" });

      expect(
        thrown(() => ledger.configureBeneficiaries([{ account: NULL_ACCOUNT, shareBps: 10_000 }]))
      ).toMatchObject({ code: "InvalidAccount" });
    });

    it("should publish the previous and new shares", () => {
      ledger.configureBeneficiaries([{ account: CAROL, shareBps: 10_000 }]);

      expect(notifications.ofType("BeneficiariesUpdated")[0].payload).toEqual({
        before: [
          { account: ALICE, shareBps: 6_000 },
          { account: BOB, shareBps: 4_000 },
        ],
        after: [{ account: CAROL, shareBps: 10_000 }],
      });
    });
  });

  describe("queueDistribution", () => {
    it("should fail with nothing to distribute", async () => {
      await expect(ledger.queueDistribution()).rejects.toMatchObject({ code: "NothingToDistribute" });
    });

    it("should floor each allocation", async () => {
      asset.credit(TOKEN, 1_001n);

      const queued = await ledger.queueDistribution();

      expect(queued).toEqual({
        total: 1_001n,
        allocations: [
          { beneficiary: ALICE, amount: 600n },
          { beneficiary: BOB, amount: 400n },
        ],
      });
      expect(ledger.pendingOf(ALICE)).toBe(600n);
      expect(ledger.state.queued).toBe(true);
    });

    it("should leave reserved external asset out of the total", async () => {
      asset.credit(TOKEN, 1_001n);
      reserved = 500n;

      const queued = await ledger.queueDistribution();

      expect(queued.total).toBe(501n);
      expect(ledger.pendingOf(ALICE)).toBe(300n);
      expect(ledger.pendingOf(BOB)).toBe(200n);
    });

    it("should refuse a second queue while one is pending", async () => {
      asset.credit(TOKEN, 1_000n);
      await ledger.queueDistribution();

      await expect(ledger.queueDistribution()).rejects.toMatchObject({ code: "AlreadyQueued" });
    });

    it("should enforce the minimum block delay between queues", async () => {
      asset.credit(TOKEN, 1_000n);
      await ledger.queueDistribution();
      await ledger.settle(ALICE);
      await ledger.settle(BOB);
      asset.credit(TOKEN, 1_000n);

      env.mine(9n);
      await expect(ledger.queueDistribution()).rejects.toMatchObject({ code: "TooSoon" });

      env.mine(1n);
      await expect(ledger.queueDistribution()).resolves.toMatchObject({ total: 1_000n });
    });
  });

  describe("settle", () => {
    beforeEach(async () => {
      asset.credit(TOKEN, 1_000n);
      await ledger.queueDistribution();
    });

    it("should pay once and fail the second time with NothingPending", async () => {
      await expect(ledger.settle(ALICE)).resolves.toBe(600n);
      await expect(ledger.settle(ALICE)).rejects.toMatchObject({ code: "NothingPending" });

      expect(asset.balanceOf(ALICE)).toBe(600n);
      expect(asset.balanceOf(TOKEN)).toBe(400n);
    });

    it("should clear the queue when every beneficiary is settled", async () => {
      await ledger.settle(ALICE);
      expect(ledger.state.queued).toBe(true);

      await ledger.settle(BOB);
      expect(ledger.state.queued).toBe(false);
    });

    it("should record a failed send without restoring pending", async () => {
      asset.rejectTransfersTo(BOB);

      const error = await ledger.settle(BOB).catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(ExternalDependencyError);
      expect(isTokenEngineError(error, "TransferFailed")).toBe(true);
      expect(isTokenEngineError(error, "NothingPending")).toBe(false);
      expect(ledger.pendingOf(BOB)).toBe(0n);
      expect(ledger.failedOf(BOB)).toBe(400n);
      expect(asset.balanceOf(TOKEN)).toBe(1_000n);
      await expect(ledger.settle(BOB)).rejects.toMatchObject({ code: "NothingPending" });
    });

    it("should not hand out failed amounts again in the next queue", async () => {
      asset.rejectTransfersTo(BOB);
      await ledger.settle(ALICE);
      await ledger.settle(BOB).catch(() => undefined);

      expect(await ledger.distributableBalance()).toBe(0n);
    });

    it("should pay a failed amount after an admin requeue", async () => {
      asset.rejectTransfersTo(BOB);
      await ledger.settle(BOB).catch(() => undefined);

      expect(ledger.requeueFailed(BOB)).toBe(400n);
      expect(ledger.pendingOf(BOB)).toBe(400n);
      expect(ledger.failedOf(BOB)).toBe(0n);

      asset.rejectTransfersTo(BOB, false);
      await expect(ledger.settle(BOB)).resolves.toBe(400n);
      expect(asset.balanceOf(BOB)).toBe(400n);
    });

    it("should refuse to requeue when nothing failed", () => {
      expect(thrown(() => ledger.requeueFailed(ALICE))).toMatchObject({ code: "NothingToRequeue" });
    });
  });

  describe("settle in flight", () => {
    it("should not allocate an amount whose send has not landed", async () => {
      const inner = asset.vaultFor(TOKEN);
      const slowVault: ExternalAssetVault = {
        balance: () => inner.balance(),
        send: async (to: Address, amount: bigint) => {
          await new Promise<void>((resolve) => setTimeout(resolve, 0));
          return inner.send(to, amount);
        },
      };
      ledger = create(slowVault);
      asset.credit(TOKEN, 1_000n);
      await ledger.queueDistribution();
      await ledger.settle(ALICE);
      env.mine(10n);

      const settling = ledger.settle(BOB);
      expect(ledger.state.inFlight).toBe(400n);
      expect(await ledger.distributableBalance()).toBe(0n);
      await expect(ledger.queueDistribution()).rejects.toMatchObject({ code: "NothingToDistribute" });

      await expect(settling).resolves.toBe(400n);
      expect(ledger.state.inFlight).toBe(0n);
      expect(asset.balanceOf(BOB)).toBe(400n);
      expect(asset.balanceOf(TOKEN)).toBe(0n);
    });

    it("should release the in-flight amount when the send fails", async () => {
      asset.credit(TOKEN, 1_000n);
      await ledger.queueDistribution();
      asset.rejectTransfersTo(BOB);

      await ledger.settle(BOB).catch(() => undefined);

      expect(ledger.state.inFlight).toBe(0n);
      expect(await ledger.distributableBalance()).toBe(0n);
    });
  });

  describe("re-entrant settle", () => {
    it("should see nothing pending from inside the send", async () => {
      const nested: unknown[] = [];
      const inner = asset.vaultFor(TOKEN);

      const reentrantVault: ExternalAssetVault = {
        balance: () => inner.balance(),
        send: async (to: Address, amount: bigint) => {
          nested.push(await ledger.settle(to).catch((error: unknown) => error));
          return inner.send(to, amount);
        },
      };

      ledger = create(reentrantVault);
      asset.credit(TOKEN, 1_000n);
      await ledger.queueDistribution();

      await expect(ledger.settle(ALICE)).resolves.toBe(600n);
      expect(nested[0]).toMatchObject({ code: "NothingPending" });
      expect(asset.balanceOf(ALICE)).toBe(600n);
    });
  });
});
