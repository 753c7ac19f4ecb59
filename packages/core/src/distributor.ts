/**
 * distributor.ts
 *
 * Routes a claimed reward batch:
 *   MEV share       → treasury
 *   protocol share  → treasury
 *   LP share        → pool rewards account, credited to stakers pro rata
 *
 * The caller (StakingPool) owns the claim timer and the transaction; this
 * class only moves value and updates the LP ledger.
 */

import type { ILogger, RewardSplit, TokenMetadata } from "@stakewell/types";
import { destroyZero, type AssetScope, type FungibleAsset } from "./asset";
import type { ExchangeRateLedger } from "./exchange-rate";
import type { Host } from "./host";
import type { LpRewardLedger } from "./lp-rewards";
import { splitRewards } from "./rewards";

export interface RewardDistributorDeps {
  host: Host;
  rates: ExchangeRateLedger;
  lpRewards: LpRewardLedger;
  rewardsAccount: string;
  logger: ILogger;
}

export interface DistributionRequest {
  scope: AssetScope;
  baseToken: TokenMetadata;
  from: string;      // account holding the freshly claimed rewards
  treasury: string;
  total: bigint;
  timestamp: number;
}

/** `now >= lastClaim + interval` */
export function canClaimRewards(lastClaim: number, interval: number, now: number): boolean {
  return now >= lastClaim + interval;
}

export class RewardDistributor {
  constructor(private readonly deps: RewardDistributorDeps) {}

  distribute(request: DistributionRequest): RewardSplit {
    const { scope, baseToken, from, treasury, total, timestamp } = request;
    const { ledger, events } = this.deps.host;
    const split = splitRewards(total);

    if (split.mev > 0n) {
      ledger.deposit(treasury, scope.track(ledger.withdraw(from, baseToken, split.mev)));
    }
    if (split.protocol > 0n) {
      ledger.deposit(treasury, scope.track(ledger.withdraw(from, baseToken, split.protocol)));
    }
    if (split.lp > 0n) {
      this.distributeToLps(scope.track(ledger.withdraw(from, baseToken, split.lp)), treasury);
    }

    events.emit({
      type: "rewards-distributed",
      mevAmount: split.mev,
      protocolAmount: split.protocol,
      lpAmount: split.lp,
      totalAmount: split.total,
      timestamp,
    });
    this.deps.logger.info(
      { mev: split.mev.toString(), protocol: split.protocol.toString(), lp: split.lp.toString(), remainder: split.remainder.toString() },
      "Rewards distributed"
    );
    return split;
  }

  /**
   * With nobody staked there is no one to credit: a zero value is destroyed
   * and anything else goes to the treasury.
   */
  distributeToLps(value: FungibleAsset, treasury: string): void {
    const { host, rates, lpRewards, rewardsAccount, logger } = this.deps;

    if (rates.totalStaked === 0n) {
      if (value.amount === 0n) {
        destroyZero(value);
      } else {
        logger.warn({ amount: value.amount.toString() }, "No stakers; LP share sent to treasury");
        host.ledger.deposit(treasury, value);
      }
      return;
    }

    const amount = value.amount;
    host.ledger.deposit(rewardsAccount, value);
    if (!lpRewards.credit(amount)) {
      logger.warn({ amount: amount.toString() }, "No LP shares recorded; reward held in rewards account");
    }
  }
}
