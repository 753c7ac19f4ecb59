/**
 * lp-rewards.ts
 *
 * Per-staker reward ledger for the LP share of each reward batch.
 *
 * A global index accumulates reward-per-share (scaled by 1e12). Each position
 * remembers the index it was last settled at, so a staker only earns on
 * batches credited while they held shares:
 *
 *   claimable = accrued + shares * (index - snapshot) / PRECISION
 *
 * Shares follow the pool's own stake and unstake calls only. Derivative moved
 * between accounts on the ledger carries no shares: the account that staked
 * keeps earning on it until it unstakes, and the recipient earns nothing.
 */

import { REWARD_INDEX_PRECISION } from "./constants";
import { InvalidArgumentError } from "./errors";

export interface LpPosition {
  shares: bigint;
  indexSnapshot: bigint;
  accrued: bigint;
}

export interface LpLedgerState {
  rewardIndex: bigint;
  totalShares: bigint;
  positions: Map<string, LpPosition>;
}

export class LpRewardLedger {
  private rewardIndex = 0n;
  private totalShares = 0n;
  private positions = new Map<string, LpPosition>();

  get index(): bigint {
    return this.rewardIndex;
  }

  get shares(): bigint {
    return this.totalShares;
  }

  sharesOf(staker: string): bigint {
    return this.positions.get(staker)?.shares ?? 0n;
  }

  claimable(staker: string): bigint {
    const position = this.positions.get(staker);
    if (!position) return 0n;
    return position.accrued + pending(position, this.rewardIndex);
  }

  onStake(staker: string, amount: bigint): void {
    const position = this.settle(staker);
    position.shares += amount;
    this.totalShares += amount;
  }

  /** Removes at most the staker's own shares; derivative received by transfer carries none. */
  onUnstake(staker: string, amount: bigint): void {
    const position = this.settle(staker);
    const removed = amount < position.shares ? amount : position.shares;
    position.shares -= removed;
    this.totalShares -= removed;
    if (position.shares === 0n && position.accrued === 0n) this.positions.delete(staker);
  }

  /**
   * Spread `amount` over all current shares. Returns false (and credits
   * nothing) when there are no shares.
   */
  credit(amount: bigint): boolean {
    if (amount < 0n) throw new InvalidArgumentError(`Cannot credit negative reward ${amount}`);
    if (this.totalShares === 0n) return false;
    this.rewardIndex += (amount * REWARD_INDEX_PRECISION) / this.totalShares;
    return true;
  }

  /** Zero the staker's claimable balance and return it. */
  take(staker: string): bigint {
    const position = this.settle(staker);
    const amount = position.accrued;
    position.accrued = 0n;
    if (position.shares === 0n) this.positions.delete(staker);
    return amount;
  }

  snapshot(): LpLedgerState {
    const positions = new Map<string, LpPosition>();
    for (const [staker, position] of this.positions) positions.set(staker, { ...position });
    return { rewardIndex: this.rewardIndex, totalShares: this.totalShares, positions };
  }

  restore(state: LpLedgerState): void {
    this.rewardIndex = state.rewardIndex;
    this.totalShares = state.totalShares;
    this.positions = new Map();
    for (const [staker, position] of state.positions) this.positions.set(staker, { ...position });
  }

  private settle(staker: string): LpPosition {
    let position = this.positions.get(staker);
    if (!position) {
      position = { shares: 0n, indexSnapshot: this.rewardIndex, accrued: 0n };
      this.positions.set(staker, position);
      return position;
    }
    position.accrued += pending(position, this.rewardIndex);
    position.indexSnapshot = this.rewardIndex;
    return position;
  }
}

function pending(position: LpPosition, index: bigint): bigint {
  return (position.shares * (index - position.indexSnapshot)) / REWARD_INDEX_PRECISION;
}
