export type { TokenKind, TokenMetadata } from "./token";
export type {
  PoolSnapshot,
  RewardSplit,
  ClaimOutcome,
  InitializeOptions,
} from "./pool";
export type {
  PoolEvent,
  PoolInitializedEvent,
  StakeEvent,
  UnstakeEvent,
  ValidatorUpdatedEvent,
  RewardClaimIntervalUpdatedEvent,
  TreasuryUpdatedEvent,
  RewardsDistributedEvent,
  LpRewardsClaimedEvent,
} from "./events";
export type { ILogger } from "./logging";
