// Fixed parameters of the staking pool. Amounts are in base-token units
// (6 decimals: 1 token = 1_000_000), durations in seconds.

export const EXCHANGE_RATE_SCALE = 1_000_000n;

export const MINIMUM_STAKE = 1_000_000n;                 // 1 token
export const MAXIMUM_STAKE = 1_000_000_000_000_000n;     // 1e9 tokens; also caps total_staked

export const MIN_REWARD_CLAIM_INTERVAL = 60 * 60;        // 1 h
export const DEFAULT_REWARD_CLAIM_INTERVAL = 24 * 60 * 60;
export const UNSTAKING_PERIOD = 7 * 24 * 60 * 60;

// Reward split, in percent of each claimed batch.
export const MEV_RATIO = 10n;
export const PROTOCOL_FEE_RATIO = 10n;
export const LP_RATIO = 80n;
export const RATIO_DENOMINATOR = 100n;

// 1e12, same precision as a per-share yield index.
export const REWARD_INDEX_PRECISION = 1_000_000_000_000n;
