// Events emitted by the staking pool on every committed state change.

export interface PoolInitializedEvent {
  type: "pool-initialized";
  admin: string;
  validator: string;
  validatorOperator: string;
}

export interface StakeEvent {
  type: "stake";
  staker: string;
  amount: bigint;
  validator: string;
}

export interface UnstakeEvent {
  type: "unstake";
  staker: string;
  amount: bigint; // base units returned, after exchange-rate conversion
  validator: string;
}

export interface ValidatorUpdatedEvent {
  type: "validator-updated";
  oldValidator: string;
  newValidator: string;
  oldOperator: string;
  newOperator: string;
}

export interface RewardClaimIntervalUpdatedEvent {
  type: "reward-claim-interval-updated";
  oldInterval: number;
  newInterval: number;
}

export interface TreasuryUpdatedEvent {
  type: "treasury-updated";
  oldTreasury: string;
  newTreasury: string;
}

export interface RewardsDistributedEvent {
  type: "rewards-distributed";
  mevAmount: bigint;
  protocolAmount: bigint;
  lpAmount: bigint;
  totalAmount: bigint;
  timestamp: number;
}

export interface LpRewardsClaimedEvent {
  type: "lp-rewards-claimed";
  staker: string;
  amount: bigint;
}

export type PoolEvent =
  | PoolInitializedEvent
  | StakeEvent
  | UnstakeEvent
  | ValidatorUpdatedEvent
  | RewardClaimIntervalUpdatedEvent
  | TreasuryUpdatedEvent
  | RewardsDistributedEvent
  | LpRewardsClaimedEvent;
