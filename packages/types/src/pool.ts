// Types for the liquid-staking pool state and its reward policy.

/**
 * Read-only view of the pool, as returned by StakingPool.snapshot().
 */
export interface PoolSnapshot {
  admin: string;
  treasury: string;
  validator: string;
  validatorOperator: string; // hex-encoded operator key
  totalStaked: bigint;       // base units backing outstanding derivative tokens
  totalDelegation: bigint;   // base units currently delegated to the validator
  exchangeRate: bigint;      // scaled by EXCHANGE_RATE_SCALE; 1:1 = 1_000_000
  lastRewardClaim: number;   // unix seconds
  rewardClaimInterval: number; // seconds
}

/**
 * One reward batch split by the fixed MEV / protocol / LP ratios.
 * `remainder` is the floor-division loss, never paid out (at most 2 units).
 */
export interface RewardSplit {
  total: bigint;
  mev: bigint;
  protocol: bigint;
  lp: bigint;
  remainder: bigint;
}

export type ClaimOutcome =
  | { claimed: false; nextClaimAt: number }
  | { claimed: true; split: RewardSplit; claimedAt: number };

export interface InitializeOptions {
  /** Receives MEV and protocol shares. Defaults to the admin. */
  treasury?: string;
}
