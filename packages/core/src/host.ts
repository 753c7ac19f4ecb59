// Contracts the pool consumes from its host: account storage, the validator
// delegation service, block time and event emission.

import type { PoolEvent, TokenMetadata } from "@stakewell/types";
import type { FungibleAsset } from "./asset";
import type { FreezeCapability } from "./issuer";

export interface Ledger {
  /** Take `amount` units out of `owner`'s balance. Throws on insufficient or frozen balance. */
  withdraw(owner: string, metadata: TokenMetadata, amount: bigint): FungibleAsset;
  /** Credit `account` and settle the asset. */
  deposit(account: string, asset: FungibleAsset): void;
  balance(account: string, metadata: TokenMetadata): bigint;
  setFrozen(capability: FreezeCapability, account: string, frozen: boolean): void;
}

/**
 * Validator delegation service. Calls are synchronous within the enclosing
 * operation; a throw aborts it.
 */
export interface ValidatorService {
  delegate(staker: string, metadata: TokenMetadata, validator: string, amount: bigint): void;
  undelegate(staker: string, metadata: TokenMetadata, validator: string, amount: bigint): void;
  /** Pay the validator's pending rewards into `admin`'s balance. */
  claimReward(admin: string, metadata: TokenMetadata, validator: string): void;
}

export interface BlockClock {
  /** Current block time, unix seconds. */
  now(): number;
}

export interface EventSink {
  emit(event: PoolEvent): void;
}

export interface Host {
  ledger: Ledger;
  validator: ValidatorService;
  clock: BlockClock;
  events: EventSink;

  /**
   * Run `operation` all-or-nothing: if it throws, every ledger, delegation
   * and event change it made is undone before the error propagates.
   */
  atomically<T>(operation: () => T): T;
}
