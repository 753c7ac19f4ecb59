import { describe, it, expect, beforeEach } from "vitest";
import {
  ArithmeticOverflowError,
  EXCHANGE_RATE_SCALE,
  ExchangeRateLedger,
  InsufficientBalanceError,
  MAXIMUM_STAKE,
} from "@stakewell/core";

const TOKEN = 1_000_000n;

let rates: ExchangeRateLedger;

describe("exchange-rate-ledger", () => {
  beforeEach(() => {
    rates = new ExchangeRateLedger();
  });

  it("starts at 1:1 with nothing staked", () => {
    expect(rates.exchangeRate).toBe(EXCHANGE_RATE_SCALE);
    expect(rates.totalStaked).toBe(0n);
    expect(rates.totalDelegation).toBe(0n);
    expect(rates.toBase(5n * TOKEN)).toBe(5n * TOKEN);
    expect(rates.toDerivative(5n * TOKEN)).toBe(5n * TOKEN);
  });

  it("stake and unstake keep the 1:1 peg", () => {
    rates.recordStake(10n * TOKEN, 10n * TOKEN);
    rates.recordStake(3n * TOKEN, 3n * TOKEN);
    rates.recordUnstake(4n * TOKEN, 4n * TOKEN);

    expect(rates.totalStaked).toBe(9n * TOKEN);
    expect(rates.totalDelegation).toBe(9n * TOKEN);
    expect(rates.derivativeSupply).toBe(9n * TOKEN);
    expect(rates.exchangeRate).toBe(EXCHANGE_RATE_SCALE);
  });

  it("returns to scale once everything is unstaked", () => {
    rates.recordStake(2n * TOKEN, 2n * TOKEN);
    rates.recordUnstake(2n * TOKEN, 2n * TOKEN);
    expect(rates.exchangeRate).toBe(EXCHANGE_RATE_SCALE);
  });

  it("accepts a stake exactly up to the ceiling and rejects one unit more", () => {
    rates.recordStake(MAXIMUM_STAKE, MAXIMUM_STAKE);
    expect(() => rates.recordStake(1n, 1n)).toThrow(ArithmeticOverflowError);
    expect(rates.totalStaked).toBe(MAXIMUM_STAKE);
  });

  it("rejects unstake above total staked without mutating", () => {
    rates.recordStake(2n * TOKEN, 2n * TOKEN);
    expect(() => rates.recordUnstake(3n * TOKEN, 3n * TOKEN)).toThrow(InsufficientBalanceError);
    expect(rates.totalStaked).toBe(2n * TOKEN);
    expect(rates.derivativeSupply).toBe(2n * TOKEN);
  });

  it("converts with floor division away from the peg", () => {
    rates.restore({
      totalStaked: 10n,
      totalDelegation: 10n,
      derivativeSupply: 20n,
      exchangeRate: 2n * EXCHANGE_RATE_SCALE,
    });
    expect(rates.toBase(5n)).toBe(2n);
    expect(rates.toBase(1n)).toBe(0n);
    expect(rates.toDerivative(5n)).toBe(10n);
  });

  it("restore discards later changes", () => {
    rates.recordStake(TOKEN, TOKEN);
    const saved = rates.snapshot();
    rates.recordStake(TOKEN, TOKEN);
    rates.restore(saved);
    expect(rates.totalStaked).toBe(TOKEN);
    expect(rates.derivativeSupply).toBe(TOKEN);
  });
});
