import type { TokenMetadata } from "@stakewell/types";
import { createAsset, type FungibleAsset } from "../asset";
import { InsufficientBalanceError, InvalidArgumentError, PermissionDeniedError } from "../errors";
import type { Ledger } from "../host";
import type { FreezeCapability } from "../issuer";

export interface MemoryLedgerState {
  balances: Map<string, bigint>;
  frozen: Set<string>;
}

function key(account: string, metadata: TokenMetadata): string {
  return `${metadata.kind}:${account}`;
}

/** Balance table keyed by token kind and account. */
export class MemoryLedger implements Ledger {
  private balances = new Map<string, bigint>();
  private frozen = new Set<string>();

  withdraw(owner: string, metadata: TokenMetadata, amount: bigint): FungibleAsset {
    this.debit(owner, metadata, amount);
    return createAsset(metadata, amount);
  }

  /** Zero-value assets are rejected; they must go through destroyZero. */
  deposit(account: string, asset: FungibleAsset): void {
    if (asset.amount === 0n) {
      throw new InvalidArgumentError(`Refusing to deposit a zero-value ${asset.kind} asset to ${account}`);
    }
    this.credit(account, asset.metadata, asset.release());
  }

  balance(account: string, metadata: TokenMetadata): bigint {
    return this.balances.get(key(account, metadata)) ?? 0n;
  }

  setFrozen(capability: FreezeCapability, account: string, frozen: boolean): void {
    const k = key(account, capability.metadata);
    if (frozen) this.frozen.add(k);
    else this.frozen.delete(k);
  }

  isFrozen(account: string, metadata: TokenMetadata): boolean {
    return this.frozen.has(key(account, metadata));
  }

  /** Host-side debit, used by withdraw and by the in-memory validator. */
  debit(account: string, metadata: TokenMetadata, amount: bigint): void {
    if (amount < 0n) throw new InvalidArgumentError(`Negative withdrawal ${amount}`);
    const k = key(account, metadata);
    if (this.frozen.has(k)) throw new PermissionDeniedError(`${metadata.symbol} account ${account} is frozen`);
    const current = this.balances.get(k) ?? 0n;
    if (current < amount) {
      throw new InsufficientBalanceError(`${account} holds ${current} ${metadata.symbol}, needs ${amount}`);
    }
    this.balances.set(k, current - amount);
  }

  credit(account: string, metadata: TokenMetadata, amount: bigint): void {
    if (amount < 0n) throw new InvalidArgumentError(`Negative credit ${amount}`);
    const k = key(account, metadata);
    this.balances.set(k, (this.balances.get(k) ?? 0n) + amount);
  }

  snapshot(): MemoryLedgerState {
    return { balances: new Map(this.balances), frozen: new Set(this.frozen) };
  }

  restore(state: MemoryLedgerState): void {
    this.balances = new Map(state.balances);
    this.frozen = new Set(state.frozen);
  }
}
