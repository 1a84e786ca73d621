/**
 * Anti-abuse Guard Tests
 *
 * Trading gate, launch-window modes, max transaction size and the
 * pair-to-pair cap and cooldown.
 */

import { describe, it, expect, beforeEach } from "vitest";
import type { Address } from "viem";
import { SimulatedEnvironment } from "../environment.js";
import { NotificationLog } from "../notifications.js";
import { AntiAbuseGuards, type AntiAbuseSettings, type GuardInput } from "../guards/index.js";
import {
  ADMIN,
  ALICE,
  BOB,
  BOT,
  CAROL,
  OTHER_PAIR,
  PAIR,
  ROUTER,
  TOKEN,
  thrown,
} from "./fixtures.js";

const SETTINGS: AntiAbuseSettings = {
  maxTxAmount: 1_000n,
  maxPairToPairAmount: 500n,
  cooldownSeconds: 60n,
  antiBotWindowBlocks: 3n,
  launchGuardMode: "contract-allowlist",
};

describe("AntiAbuseGuards", () => {
  let env: SimulatedEnvironment;
  let notifications: NotificationLog;
  let guards: AntiAbuseGuards;

  const exempt = new Set<Address>([TOKEN, ADMIN]);

  const input = (from: Address, to: Address, amount: bigint, sender: Address = from): GuardInput => ({
    from,
    to,
    amount,
    sender,
    owner: ADMIN,
    self: TOKEN,
    router: ROUTER,
    isPair: (account) => account === PAIR || account === OTHER_PAIR,
    isExempt: (account) => exempt.has(account),
  });

  const create = (settings: AntiAbuseSettings = SETTINGS): AntiAbuseGuards =>
    new AntiAbuseGuards(settings, [CAROL], env, notifications);

  beforeEach(() => {
    env = new SimulatedEnvironment();
    notifications = new NotificationLog(env);
    guards = create();
  });

  describe("trading gate", () => {
    it("should reject ordinary transfers before trading is enabled", () => {
      const error = thrown(() => guards.check(input(ALICE, BOB, 10n)));
      expect(error).toMatchObject({ code: "TradingNotEnabled" });
    });

    it("should allow transfers touching the admin or the token account", () => {
      expect(() => guards.check(input(ADMIN, ALICE, 10n))).not.toThrow();
      expect(() => guards.check(input(ALICE, TOKEN, 10n))).not.toThrow();
    });

    it("should enable trading once and record the launch block", () => {
      expect(guards.enableTrading()).toBe(1_000n);
      expect(guards.state.launchBlock).toBe(1_000n);
      expect(notifications.ofType("TradingEnabled")[0].payload).toEqual({ launchBlock: 1_000n });

      expect(thrown(() => guards.enableTrading())).toMatchObject({ code: "TradingAlreadyEnabled" });
    });
  });

  describe("launch window (contract-allowlist)", () => {
    beforeEach(() => {
      guards.enableTrading();
      env.markContract(BOT);
      env.markContract(CAROL);
    });

    it("should reject unlisted contract callers inside the window", () => {
      const error = thrown(() => guards.check(input(BOT, ALICE, 10n)));
      expect(error).toMatchObject({ code: "LaunchGuardRejected" });
    });

    it("should still reject on the last block of the window", () => {
      env.mine(3n);
      expect(thrown(() => guards.check(input(BOT, ALICE, 10n)))).toMatchObject({
        code: "LaunchGuardRejected",
      });
    });

    it("should let contract callers through once the window closes", () => {
      env.mine(4n);
      expect(() => guards.check(input(BOT, ALICE, 10n))).not.toThrow();
    });

    it("should pass allow-listed contracts, the router and plain accounts", () => {
      expect(() => guards.check(input(CAROL, ALICE, 10n))).not.toThrow();
      expect(() => guards.check(input(PAIR, ALICE, 10n, ROUTER))).not.toThrow();
      expect(() => guards.check(input(ALICE, BOB, 10n))).not.toThrow();
    });

    it("should skip the window when an endpoint is exempt", () => {
      expect(() => guards.check(input(BOT, ADMIN, 10n))).not.toThrow();
    });

    it("should follow allow-list updates", () => {
      guards.setLaunchAllowed(BOT, true);
      expect(() => guards.check(input(BOT, ALICE, 10n))).not.toThrow();

      guards.setLaunchAllowed(BOT, false);
      expect(thrown(() => guards.check(input(BOT, ALICE, 10n)))).toMatchObject({
        code: "LaunchGuardRejected",
      });
    });
  });

  describe("launch window (origin-only)", () => {
    beforeEach(() => {
      guards = create({ ...SETTINGS, launchGuardMode: "origin-only" });
      guards.enableTrading();
    });

    it("should reject a caller that is not the transaction origin", () => {
      const error = thrown(() => guards.check(input(ALICE, BOB, 10n)));
      expect(error).toMatchObject({ code: "LaunchGuardRejected" });
    });

    it("should accept the originating account itself", () => {
      env.setOrigin(ALICE);
      expect(() => guards.check(input(ALICE, BOB, 10n))).not.toThrow();
    });
  });

  describe("max transaction", () => {
    beforeEach(() => {
      guards.enableTrading();
      env.mine(4n);
    });

    it("should cap wallet transfers", () => {
      expect(() => guards.check(input(ALICE, BOB, 1_000n))).not.toThrow();
      expect(thrown(() => guards.check(input(ALICE, BOB, 1_001n)))).toMatchObject({
        code: "ExceedsMaxTx",
      });
    });

    it("should not cap transfers with an exempt or pair endpoint", () => {
      expect(() => guards.check(input(ADMIN, BOB, 5_000n))).not.toThrow();
      expect(() => guards.check(input(PAIR, BOB, 5_000n))).not.toThrow();
      expect(() => guards.check(input(ALICE, PAIR, 5_000n))).not.toThrow();
    });
  });

  describe("pair-to-pair", () => {
    beforeEach(() => {
      guards.enableTrading();
      env.mine(4n);
    });

    it("should cap the amount", () => {
      expect(thrown(() => guards.check(input(PAIR, OTHER_PAIR, 501n)))).toMatchObject({
        code: "ExceedsPairLimit",
      });
    });

    it("should enforce the per-sender cooldown after a recorded transfer", () => {
      expect(guards.check(input(PAIR, OTHER_PAIR, 500n))).toEqual({ pairToPair: true });
      guards.recordPairTransfer(PAIR);

      env.advanceTime(59n);
      expect(thrown(() => guards.check(input(PAIR, OTHER_PAIR, 500n)))).toMatchObject({
        code: "CooldownActive",
      });

      env.advanceTime(1n);
      expect(() => guards.check(input(PAIR, OTHER_PAIR, 500n))).not.toThrow();
    });

    it("should track cooldowns per sending pair", () => {
      guards.recordPairTransfer(PAIR);
      expect(() => guards.check(input(OTHER_PAIR, PAIR, 500n))).not.toThrow();
    });

    it("should publish parameter changes with before and after", () => {
      guards.setMaxPairToPairAmount(800n);
      guards.setCooldownSeconds(5n);

      expect(notifications.ofType("AntiAbuseUpdated").map((entry) => entry.payload)).toEqual([
        { field: "maxPairToPairAmount", before: 500n, after: 800n },
        { field: "cooldownSeconds", before: 60n, after: 5n },
      ]);
    });
  });
});
