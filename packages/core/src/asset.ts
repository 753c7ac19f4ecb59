/**
 * asset.ts
 *
 * Bearer token values. A FungibleAsset is the only way value moves between
 * the ledger, the issuer and the pool. It must end in exactly one terminal
 * operation:
 *   - Ledger.deposit(account, asset)
 *   - TokenIssuer.burn(asset)
 *   - destroyZero(asset)            (zero-value assets only)
 *
 * Only the issuer and the host ledger can create assets.
 */

import type { TokenMetadata } from "@stakewell/types";
import {
  InsufficientBalanceError,
  InvalidArgumentError,
  InvariantViolationError,
} from "./errors";

const ASSET_KEY = Symbol("FungibleAsset");

export class FungibleAsset {
  private value: bigint;
  private consumed = false;

  constructor(key: symbol, readonly metadata: TokenMetadata, amount: bigint) {
    if (key !== ASSET_KEY) {
      throw new InvariantViolationError("FungibleAsset can only be created by the issuer or ledger");
    }
    if (amount < 0n) throw new InvalidArgumentError(`Negative asset amount: ${amount}`);
    this.value = amount;
  }

  get amount(): bigint {
    return this.value;
  }

  get kind() {
    return this.metadata.kind;
  }

  /** True once the asset has been deposited, burned or destroyed. */
  get settled(): boolean {
    return this.consumed;
  }

  /** Split `amount` units off into a new asset. */
  extract(amount: bigint): FungibleAsset {
    this.assertLive();
    if (amount < 0n) throw new InvalidArgumentError(`Negative extract amount: ${amount}`);
    if (amount > this.value) {
      throw new InsufficientBalanceError(`Cannot extract ${amount} from asset holding ${this.value}`);
    }
    this.value -= amount;
    return new FungibleAsset(ASSET_KEY, this.metadata, amount);
  }

  /** Absorb `other` into this asset. `other` is settled afterwards. */
  merge(other: FungibleAsset): void {
    this.assertLive();
    if (other.kind !== this.kind) {
      throw new InvalidArgumentError(`Cannot merge ${other.kind} into ${this.kind}`);
    }
    this.value += other.release();
  }

  /**
   * Terminal step used by deposit, burn and destroyZero. Returns the amount
   * the caller now accounts for.
   */
  release(): bigint {
    this.assertLive();
    this.consumed = true;
    const amount = this.value;
    this.value = 0n;
    return amount;
  }

  private assertLive(): void {
    if (this.consumed) throw new InvariantViolationError(`${this.kind} asset already settled`);
  }
}

export function createAsset(metadata: TokenMetadata, amount: bigint): FungibleAsset {
  return new FungibleAsset(ASSET_KEY, metadata, amount);
}

export function destroyZero(asset: FungibleAsset): void {
  if (asset.amount !== 0n) {
    throw new InvalidArgumentError(`Cannot destroy non-zero ${asset.kind} asset (${asset.amount})`);
  }
  asset.release();
}

/**
 * Tracks every asset produced during one pool operation. close() fails if any
 * of them is still live, so no code path can drop value on the floor.
 */
export class AssetScope {
  private readonly assets: FungibleAsset[] = [];

  track(asset: FungibleAsset): FungibleAsset {
    this.assets.push(asset);
    return asset;
  }

  close(operation: string): void {
    const live = this.assets.filter((a) => !a.settled);
    if (live.length > 0) {
      throw new InvariantViolationError(`${operation} left ${live.length} unsettled asset(s)`, {
        assets: live.map((a) => ({ kind: a.kind, amount: a.amount })),
      });
    }
  }
}
