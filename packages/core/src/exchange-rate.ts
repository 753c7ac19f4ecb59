/**
 * exchange-rate.ts
 *
 * Bookkeeping for staked value, delegated value, the derivative supply the
 * pool has issued, and the base:derivative exchange rate.
 *
 * Rate format: scaled by EXCHANGE_RATE_SCALE (1:1 = 1_000_000).
 *   derivative → base:  derivative * SCALE / rate
 *   base → derivative:  base * rate / SCALE
 */

import { EXCHANGE_RATE_SCALE, MAXIMUM_STAKE } from "./constants";
import { ArithmeticOverflowError, InsufficientBalanceError, InvariantViolationError } from "./errors";

export interface ExchangeRateState {
  totalStaked: bigint;
  totalDelegation: bigint;
  derivativeSupply: bigint;
  exchangeRate: bigint;
}

export class ExchangeRateLedger {
  private state: ExchangeRateState = {
    totalStaked: 0n,
    totalDelegation: 0n,
    derivativeSupply: 0n,
    exchangeRate: EXCHANGE_RATE_SCALE,
  };

  get totalStaked(): bigint {
    return this.state.totalStaked;
  }

  get totalDelegation(): bigint {
    return this.state.totalDelegation;
  }

  get derivativeSupply(): bigint {
    return this.state.derivativeSupply;
  }

  get exchangeRate(): bigint {
    return this.state.exchangeRate;
  }

  toBase(derivative: bigint): bigint {
    return (derivative * EXCHANGE_RATE_SCALE) / this.state.exchangeRate;
  }

  toDerivative(base: bigint): bigint {
    return (base * this.state.exchangeRate) / EXCHANGE_RATE_SCALE;
  }

  /** Throws ArithmeticOverflowError if `base` more would push total_staked past MAXIMUM_STAKE. */
  assertCanStake(base: bigint): void {
    if (base > MAXIMUM_STAKE - this.state.totalStaked) {
      throw new ArithmeticOverflowError(
        `Staking ${base} would exceed the pool ceiling (staked ${this.state.totalStaked}, max ${MAXIMUM_STAKE})`
      );
    }
  }

  recordStake(base: bigint, derivative: bigint): void {
    this.assertCanStake(base);
    this.state.totalStaked += base;
    this.state.totalDelegation += base;
    this.state.derivativeSupply += derivative;
    this.syncRate();
  }

  recordUnstake(base: bigint, derivative: bigint): void {
    if (base > this.state.totalStaked) {
      throw new InsufficientBalanceError(`Unstake of ${base} exceeds total staked ${this.state.totalStaked}`);
    }
    if (base > this.state.totalDelegation) {
      throw new InsufficientBalanceError(
        `Unstake of ${base} exceeds total delegation ${this.state.totalDelegation}`
      );
    }
    if (derivative > this.state.derivativeSupply) {
      throw new InsufficientBalanceError(
        `Burn of ${derivative} exceeds pool-issued supply ${this.state.derivativeSupply}`
      );
    }
    this.state.totalStaked -= base;
    this.state.totalDelegation -= base;
    this.state.derivativeSupply -= derivative;
    this.syncRate();
  }

  /**
   * The one place the rate changes. Rewards are paid out rather than
   * restaked, so supply tracks total_staked and the rate holds at 1:1.
   */
  private syncRate(): void {
    const { totalStaked, derivativeSupply } = this.state;
    const next = totalStaked === 0n ? EXCHANGE_RATE_SCALE : (derivativeSupply * EXCHANGE_RATE_SCALE) / totalStaked;
    if (next <= 0n) {
      throw new InvariantViolationError(`Exchange rate would become ${next}`, { totalStaked, derivativeSupply });
    }
    this.state.exchangeRate = next;
  }

  snapshot(): ExchangeRateState {
    return { ...this.state };
  }

  restore(state: ExchangeRateState): void {
    this.state = { ...state };
  }
}
