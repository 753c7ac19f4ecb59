export * from "./constants";
export * from "./errors";
export { FungibleAsset, destroyZero, AssetScope } from "./asset";
export type { Ledger, ValidatorService, BlockClock, EventSink, Host } from "./host";
export {
  TokenIssuer,
  MintCapability,
  BurnCapability,
  FreezeCapability,
  DEFAULT_TOKEN_METADATA,
} from "./issuer";
export { ExchangeRateLedger, type ExchangeRateState } from "./exchange-rate";
export { LpRewardLedger, type LpPosition, type LpLedgerState } from "./lp-rewards";
export { splitRewards } from "./rewards";
export { RewardDistributor, canClaimRewards, type DistributionRequest, type RewardDistributorDeps } from "./distributor";
export { StakingPool, type StakingPoolOptions } from "./pool";
export { MemoryHost, MemoryClock, MemoryEventLog } from "./memory/host";
export { MemoryLedger, type MemoryLedgerState } from "./memory/ledger";
export { MemoryValidator, type MemoryValidatorState } from "./memory/validator";
