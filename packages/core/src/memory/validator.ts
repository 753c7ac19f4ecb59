import type { TokenMetadata } from "@stakewell/types";
import { UNSTAKING_PERIOD } from "../constants";
import { InsufficientBalanceError, InvalidArgumentError } from "../errors";
import type { BlockClock, ValidatorService } from "../host";
import type { MemoryLedger } from "./ledger";

interface Unbonding {
  staker: string;
  metadata: TokenMetadata;
  amount: bigint;
  releaseAt: number;
}

export interface MemoryValidatorState {
  delegations: Map<string, bigint>;
  pendingRewards: Map<string, bigint>;
  unbonding: Unbonding[];
}

/**
 * Delegation service stand-in. Delegated value leaves the staker's ledger
 * balance; undelegated value comes back after UNSTAKING_PERIOD via
 * withdrawUnlocked(). Rewards are injected with accrueReward().
 */
export class MemoryValidator implements ValidatorService {
  private delegations = new Map<string, bigint>(); // `${validator}|${staker}`
  private pendingRewards = new Map<string, bigint>();
  private unbonding: Unbonding[] = [];

  constructor(private readonly ledger: MemoryLedger, private readonly clock: BlockClock) {}

  delegate(staker: string, metadata: TokenMetadata, validator: string, amount: bigint): void {
    if (amount <= 0n) throw new InvalidArgumentError(`Delegation must be positive, got ${amount}`);
    this.ledger.debit(staker, metadata, amount);
    const k = `${validator}|${staker}`;
    this.delegations.set(k, (this.delegations.get(k) ?? 0n) + amount);
  }

  undelegate(staker: string, metadata: TokenMetadata, validator: string, amount: bigint): void {
    const k = `${validator}|${staker}`;
    const delegated = this.delegations.get(k) ?? 0n;
    if (amount > delegated) {
      throw new InsufficientBalanceError(`${staker} has ${delegated} delegated to ${validator}, cannot undelegate ${amount}`);
    }
    this.delegations.set(k, delegated - amount);
    this.unbonding.push({ staker, metadata, amount, releaseAt: this.clock.now() + UNSTAKING_PERIOD });
  }

  claimReward(admin: string, metadata: TokenMetadata, validator: string): void {
    const pending = this.pendingRewards.get(validator) ?? 0n;
    if (pending === 0n) return;
    this.pendingRewards.set(validator, 0n);
    this.ledger.credit(admin, metadata, pending);
  }

  accrueReward(validator: string, amount: bigint): void {
    this.pendingRewards.set(validator, (this.pendingRewards.get(validator) ?? 0n) + amount);
  }

  delegatedBy(validator: string, staker: string): bigint {
    return this.delegations.get(`${validator}|${staker}`) ?? 0n;
  }

  delegatedTo(validator: string): bigint {
    let total = 0n;
    for (const [k, amount] of this.delegations) {
      if (k.startsWith(`${validator}|`)) total += amount;
    }
    return total;
  }

  unbondingOf(staker: string): bigint {
    return this.unbonding.filter((u) => u.staker === staker).reduce((sum, u) => sum + u.amount, 0n);
  }

  /** Credit the staker with every unbonding entry whose period has elapsed. */
  withdrawUnlocked(staker: string): bigint {
    const now = this.clock.now();
    let released = 0n;
    this.unbonding = this.unbonding.filter((u) => {
      if (u.staker !== staker || u.releaseAt > now) return true;
      this.ledger.credit(staker, u.metadata, u.amount);
      released += u.amount;
      return false;
    });
    return released;
  }

  snapshot(): MemoryValidatorState {
    return {
      delegations: new Map(this.delegations),
      pendingRewards: new Map(this.pendingRewards),
      unbonding: this.unbonding.map((u) => ({ ...u })),
    };
  }

  restore(state: MemoryValidatorState): void {
    this.delegations = new Map(state.delegations);
    this.pendingRewards = new Map(state.pendingRewards);
    this.unbonding = state.unbonding.map((u) => ({ ...u }));
  }
}
