import { describe, it, expect, vi } from "vitest";
import {
  DEFAULT_REWARD_CLAIM_INTERVAL,
  InvalidArgumentError,
  MemoryHost,
  PermissionDeniedError,
  StakingPool,
  TokenIssuer,
  canClaimRewards,
  splitRewards,
} from "@stakewell/core";

// -----------------------------------------------------------------------
// Constants
// -----------------------------------------------------------------------

const TOKEN = 1_000_000n;
const START = 1_700_000_000;
const INTERVAL = DEFAULT_REWARD_CLAIM_INTERVAL;

const ADMIN = "admin";
const ALICE = "alice";
const VALIDATOR = "validator-1";
const REWARDS = "pool-rewards";

// -----------------------------------------------------------------------
// Helpers
// -----------------------------------------------------------------------

function setup(treasury?: string) {
  const host = new MemoryHost(START);
  const issuer = new TokenIssuer(host.ledger);
  issuer.initialize();
  const pool = new StakingPool({ host, issuer, rewardsAccount: REWARDS });
  pool.initialize(ADMIN, VALIDATOR, Uint8Array.from([1]), { treasury });

  const base = issuer.getMetadata("base");
  const fund = (account: string, amount: bigint) => host.ledger.deposit(account, issuer.mint("base", amount));
  const baseOf = (account: string) => host.ledger.balance(account, base);

  /** Alice stakes `amount`; the validator earns `reward`; time moves past the interval. */
  const stakeAndEarn = (amount: bigint, reward: bigint) => {
    fund(ALICE, amount);
    pool.stake(ALICE, amount);
    host.validator.accrueReward(VALIDATOR, reward);
    host.clock.advance(INTERVAL);
  };

  return { host, issuer, pool, fund, baseOf, stakeAndEarn };
}

// -----------------------------------------------------------------------

describe("reward-distributor", () => {
  // =====================================================================
  // split-rewards
  // =====================================================================
  describe("split-rewards", () => {
    it("splits 1,000,000 into 10 / 10 / 80 percent", () => {
      expect(splitRewards(1_000_000n)).toEqual({
        total: 1_000_000n,
        mev: 100_000n,
        protocol: 100_000n,
        lp: 800_000n,
        remainder: 0n,
      });
    });

    it("floors each share and reports the remainder", () => {
      // 1009 → 100.9 / 100.9 / 807.2
      expect(splitRewards(1_009n)).toEqual({
        total: 1_009n,
        mev: 100n,
        protocol: 100n,
        lp: 807n,
        remainder: 2n,
      });
    });

    it("rounding loss never exceeds 2 units", () => {
      for (let total = 0n; total <= 500n; total++) {
        const { mev, protocol, lp, remainder } = splitRewards(total);
        expect(mev + protocol + lp + remainder).toBe(total);
        expect(remainder).toBeLessThanOrEqual(2n);
      }
    });

    it("rejects a negative total", () => {
      expect(() => splitRewards(-1n)).toThrow(InvalidArgumentError);
    });
  });

  // =====================================================================
  // can-claim-rewards
  // =====================================================================
  describe("can-claim-rewards", () => {
    it("is true exactly when the interval has elapsed", () => {
      expect(canClaimRewards(100, 50, 149)).toBe(false);
      expect(canClaimRewards(100, 50, 150)).toBe(true);
    });

    it("is false right after initialize and true once the interval elapses", () => {
      const { pool, host } = setup();
      expect(pool.canClaimRewards()).toBe(false);
      host.clock.advance(INTERVAL - 1);
      expect(pool.canClaimRewards()).toBe(false);
      host.clock.advance(1);
      expect(pool.canClaimRewards()).toBe(true);
    });
  });

  // =====================================================================
  // try-claim-rewards
  // =====================================================================
  describe("try-claim-rewards", () => {
    it("rejects non-admin caller", () => {
      const { pool, host } = setup();
      host.clock.advance(INTERVAL);
      expect(() => pool.tryClaimRewards(ALICE)).toThrow(PermissionDeniedError);
    });

    it("is a no-op before the interval elapses", () => {
      const { pool, host } = setup();
      const claim = vi.spyOn(host.validator, "claimReward");
      expect(pool.tryClaimRewards(ADMIN)).toEqual({ claimed: false, nextClaimAt: START + INTERVAL });
      expect(claim).not.toHaveBeenCalled();
      expect(pool.getLastRewardClaim()).toBe(START);
    });

    it("happy path: splits between treasury and LP rewards account", () => {
      const { pool, host, baseOf, stakeAndEarn } = setup();
      stakeAndEarn(10n * TOKEN, 1_000_000n);

      const outcome = pool.tryClaimRewards(ADMIN);

      expect(outcome).toEqual({
        claimed: true,
        claimedAt: START + INTERVAL,
        split: { total: 1_000_000n, mev: 100_000n, protocol: 100_000n, lp: 800_000n, remainder: 0n },
      });
      expect(baseOf(ADMIN)).toBe(200_000n);
      expect(baseOf(REWARDS)).toBe(800_000n);
      expect(pool.getLastRewardClaim()).toBe(START + INTERVAL);
      expect(pool.getClaimableLpRewards(ALICE)).toBe(800_000n);
      expect(host.events.ofType("rewards-distributed")).toEqual([
        {
          type: "rewards-distributed",
          mevAmount: 100_000n,
          protocolAmount: 100_000n,
          lpAmount: 800_000n,
          totalAmount: 1_000_000n,
          timestamp: START + INTERVAL,
        },
      ]);
    });

    it("pays MEV and protocol shares to a separate treasury", () => {
      const { pool, baseOf, stakeAndEarn } = setup("treasury");
      stakeAndEarn(10n * TOKEN, 1_000_000n);
      pool.tryClaimRewards(ADMIN);
      expect(baseOf("treasury")).toBe(200_000n);
      expect(baseOf(ADMIN)).toBe(0n);
    });

    it("claims at most once per interval", () => {
      const { pool, host, stakeAndEarn } = setup();
      stakeAndEarn(10n * TOKEN, 1_000_000n);
      const claim = vi.spyOn(host.validator, "claimReward");

      expect(pool.tryClaimRewards(ADMIN).claimed).toBe(true);
      host.validator.accrueReward(VALIDATOR, 500_000n);
      host.clock.advance(60);
      expect(pool.tryClaimRewards(ADMIN)).toEqual({ claimed: false, nextClaimAt: START + 2 * INTERVAL });

      expect(claim).toHaveBeenCalledTimes(1);
      expect(pool.canClaimRewards()).toBe(false);
    });

    it("only distributes what the claim added to the admin balance", () => {
      const { pool, fund, baseOf, stakeAndEarn } = setup();
      fund(ADMIN, 5n * TOKEN);
      stakeAndEarn(10n * TOKEN, 1_000_000n);
      pool.tryClaimRewards(ADMIN);
      expect(baseOf(ADMIN)).toBe(5n * TOKEN + 200_000n);
      expect(baseOf(REWARDS)).toBe(800_000n);
    });

    it("fails when the validator pays nothing and keeps the timer", () => {
      const { pool, host } = setup();
      host.clock.advance(INTERVAL);
      expect(() => pool.tryClaimRewards(ADMIN)).toThrow(InvalidArgumentError);
      expect(pool.getLastRewardClaim()).toBe(START);
      expect(pool.canClaimRewards()).toBe(true);
    });

    it("a failing validator claim leaves everything untouched", () => {
      const { pool, host, baseOf, stakeAndEarn } = setup();
      stakeAndEarn(10n * TOKEN, 1_000_000n);
      vi.spyOn(host.validator, "claimReward").mockImplementation(() => {
        throw new Error("claim reverted");
      });

      expect(() => pool.tryClaimRewards(ADMIN)).toThrow("claim reverted");
      expect(baseOf(ADMIN)).toBe(0n);
      expect(pool.getLastRewardClaim()).toBe(START);
      expect(host.events.ofType("rewards-distributed")).toEqual([]);
    });

    it("with no stakers the LP share goes to the treasury", () => {
      const { pool, host, baseOf } = setup();
      host.validator.accrueReward(VALIDATOR, 1_000_000n);
      host.clock.advance(INTERVAL);

      pool.tryClaimRewards(ADMIN);
      expect(baseOf(ADMIN)).toBe(1_000_000n);
      expect(baseOf(REWARDS)).toBe(0n);
    });

    it("a 1-unit reward pays no share and keeps the remainder with the admin", () => {
      const { pool, host, baseOf, stakeAndEarn } = setup();
      stakeAndEarn(10n * TOKEN, 1n);

      const outcome = pool.tryClaimRewards(ADMIN);
      expect(outcome.claimed && outcome.split).toEqual({ total: 1n, mev: 0n, protocol: 0n, lp: 0n, remainder: 1n });
      expect(baseOf(ADMIN)).toBe(1n);
      expect(baseOf(REWARDS)).toBe(0n);
      expect(host.events.ofType("rewards-distributed")).toHaveLength(1);
    });
  });
});
