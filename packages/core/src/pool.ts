/**
 * pool.ts
 *
 * StakingPool — the liquid-staking state machine.
 *
 *   stake(amount):    delegate base → mint derivative → deposit to staker
 *   unstake(amount):  withdraw derivative → burn → undelegate base
 *   tryClaimRewards:  Idle → (interval elapsed) → Claiming → Distributing → Idle
 *
 * Every mutating call is one transaction: it either commits completely or
 * throws with pool state, balances, delegations and events untouched.
 */

import pino from "pino";
import type {
  ClaimOutcome,
  ILogger,
  InitializeOptions,
  PoolSnapshot,
  TokenMetadata,
} from "@stakewell/types";
import { AssetScope } from "./asset";
import {
  MAXIMUM_STAKE,
  MINIMUM_STAKE,
  MIN_REWARD_CLAIM_INTERVAL,
  DEFAULT_REWARD_CLAIM_INTERVAL,
  UNSTAKING_PERIOD,
} from "./constants";
import { RewardDistributor, canClaimRewards } from "./distributor";
import {
  AlreadyExistsError,
  InsufficientBalanceError,
  InvalidArgumentError,
  NotFoundError,
  PermissionDeniedError,
} from "./errors";
import { ExchangeRateLedger, type ExchangeRateState } from "./exchange-rate";
import type { Host } from "./host";
import type { TokenIssuer } from "./issuer";
import { LpRewardLedger, type LpLedgerState } from "./lp-rewards";

interface PoolRecord {
  admin: string;
  treasury: string;
  validator: string;
  validatorOperator: Uint8Array;
  lastRewardClaim: number;
  rewardClaimInterval: number;
}

interface Checkpoint {
  record: PoolRecord | null;
  rates: ExchangeRateState;
  lpRewards: LpLedgerState;
}

export interface StakingPoolOptions {
  host: Host;
  issuer: TokenIssuer;
  /** Pool-owned account holding LP rewards until stakers claim them. */
  rewardsAccount: string;
  logger?: ILogger;
}

export class StakingPool {
  private record: PoolRecord | null = null;
  private readonly rates = new ExchangeRateLedger();
  private readonly lpRewards = new LpRewardLedger();
  private readonly distributor: RewardDistributor;
  private readonly host: Host;
  private readonly issuer: TokenIssuer;
  private readonly rewardsAccount: string;
  private readonly logger: ILogger;

  constructor(options: StakingPoolOptions) {
    this.host = options.host;
    this.issuer = options.issuer;
    this.rewardsAccount = options.rewardsAccount;
    const baseLogger: ILogger = options.logger ?? pino({ level: "silent" });
    this.logger = baseLogger.child({ component: "staking-pool" });
    this.distributor = new RewardDistributor({
      host: this.host,
      rates: this.rates,
      lpRewards: this.lpRewards,
      rewardsAccount: this.rewardsAccount,
      logger: this.logger,
    });
  }

  // -----------------------------------------------------------------------
  // Setup and admin
  // -----------------------------------------------------------------------

  initialize(admin: string, validator: string, operator: Uint8Array, options: InitializeOptions = {}): void {
    this.transact("initialize", () => {
      if (this.record) throw new AlreadyExistsError("Pool already initialized");
      requireAddress(validator, "validator");
      this.record = {
        admin,
        treasury: options.treasury ?? admin,
        validator,
        validatorOperator: Uint8Array.from(operator),
        lastRewardClaim: this.host.clock.now(),
        rewardClaimInterval: DEFAULT_REWARD_CLAIM_INTERVAL,
      };
      this.host.events.emit({
        type: "pool-initialized",
        admin,
        validator,
        validatorOperator: toHex(operator),
      });
    });
    this.logger.info({ admin, validator }, "Pool initialized");
  }

  /** Delegated funds stay with the old validator; redelegation happens out of band. */
  updateValidator(caller: string, newValidator: string, newOperator: Uint8Array): void {
    this.transact("updateValidator", () => {
      const record = this.requireAdmin(caller);
      requireAddress(newValidator, "validator");
      const oldValidator = record.validator;
      const oldOperator = record.validatorOperator;
      record.validator = newValidator;
      record.validatorOperator = Uint8Array.from(newOperator);
      this.host.events.emit({
        type: "validator-updated",
        oldValidator,
        newValidator,
        oldOperator: toHex(oldOperator),
        newOperator: toHex(newOperator),
      });
    });
  }

  updateRewardClaimInterval(caller: string, newInterval: number): void {
    this.transact("updateRewardClaimInterval", () => {
      const record = this.requireAdmin(caller);
      if (!Number.isSafeInteger(newInterval) || newInterval < MIN_REWARD_CLAIM_INTERVAL) {
        throw new InvalidArgumentError(
          `Reward claim interval must be an integer >= ${MIN_REWARD_CLAIM_INTERVAL}s, got ${newInterval}`
        );
      }
      const oldInterval = record.rewardClaimInterval;
      record.rewardClaimInterval = newInterval;
      this.host.events.emit({ type: "reward-claim-interval-updated", oldInterval, newInterval });
    });
  }

  updateTreasury(caller: string, treasury: string): void {
    this.transact("updateTreasury", () => {
      const record = this.requireAdmin(caller);
      requireAddress(treasury, "treasury");
      const oldTreasury = record.treasury;
      record.treasury = treasury;
      this.host.events.emit({ type: "treasury-updated", oldTreasury, newTreasury: treasury });
    });
  }

  // -----------------------------------------------------------------------
  // Stake / unstake
  // -----------------------------------------------------------------------

  stake(staker: string, amount: bigint): void {
    this.transact("stake", (scope) => {
      const record = this.requirePool();
      if (amount < MINIMUM_STAKE) {
        throw new InvalidArgumentError(`Stake ${amount} is below the minimum ${MINIMUM_STAKE}`);
      }
      if (amount > MAXIMUM_STAKE) {
        throw new InvalidArgumentError(`Stake ${amount} is above the maximum ${MAXIMUM_STAKE}`);
      }
      this.rates.assertCanStake(amount);

      const { ledger, validator, events } = this.host;
      validator.delegate(staker, this.baseToken(), record.validator, amount);

      // At the 1:1 peg this is face value.
      const minted = scope.track(this.issuer.mint("staked", this.rates.toDerivative(amount)));
      const derivative = minted.amount;
      ledger.deposit(staker, minted);

      this.rates.recordStake(amount, derivative);
      this.lpRewards.onStake(staker, derivative);
      events.emit({ type: "stake", staker, amount, validator: record.validator });
    });
    this.logger.debug({ staker, amount: amount.toString() }, "Stake committed");
  }

  /**
   * Burn `amount` derivative units and undelegate their base value,
   * floor(amount * SCALE / rate). Returns the base amount undelegated.
   */
  unstake(staker: string, amount: bigint): bigint {
    const unstakeAmount = this.transact("unstake", (scope) => {
      const record = this.requirePool();
      if (amount <= 0n) throw new InvalidArgumentError(`Unstake amount must be positive, got ${amount}`);

      const base = this.rates.toBase(amount);
      if (base === 0n) throw new InvalidArgumentError(`Unstake of ${amount} yields no base tokens`);
      if (base > this.rates.totalStaked) {
        throw new InsufficientBalanceError(`Unstake of ${base} exceeds total staked ${this.rates.totalStaked}`);
      }

      const { ledger, validator, events } = this.host;
      const derivative = scope.track(ledger.withdraw(staker, this.stakedToken(), amount));
      this.issuer.burn(derivative);
      validator.undelegate(staker, this.baseToken(), record.validator, base);

      this.rates.recordUnstake(base, amount);
      this.lpRewards.onUnstake(staker, amount);
      events.emit({ type: "unstake", staker, amount: base, validator: record.validator });
      return base;
    });
    this.logger.debug({ staker, burned: amount.toString(), returned: unstakeAmount.toString() }, "Unstake committed");
    return unstakeAmount;
  }

  // -----------------------------------------------------------------------
  // Rewards
  // -----------------------------------------------------------------------

  /**
   * Claim and distribute validator rewards if the claim interval has
   * elapsed. An early call is a no-op so a scheduler can poll freely.
   */
  tryClaimRewards(caller: string): ClaimOutcome {
    return this.transact<ClaimOutcome>("tryClaimRewards", (scope) => {
      const record = this.requireAdmin(caller);
      const now = this.host.clock.now();
      if (!canClaimRewards(record.lastRewardClaim, record.rewardClaimInterval, now)) {
        const nextClaimAt = record.lastRewardClaim + record.rewardClaimInterval;
        this.logger.info({ nextClaimAt }, "Reward claim interval not elapsed; skipping");
        return { claimed: false, nextClaimAt };
      }

      const { ledger, validator } = this.host;
      const baseToken = this.baseToken();
      const before = ledger.balance(record.admin, baseToken);
      validator.claimReward(record.admin, baseToken, record.validator);
      const rewardAmount = ledger.balance(record.admin, baseToken) - before;
      if (rewardAmount <= 0n) throw new InvalidArgumentError("Validator returned no rewards");

      const split = this.distributor.distribute({
        scope,
        baseToken,
        from: record.admin,
        treasury: record.treasury,
        total: rewardAmount,
        timestamp: now,
      });
      record.lastRewardClaim = now;
      return { claimed: true, split, claimedAt: now };
    });
  }

  /** Pay out the staker's accrued LP rewards from the rewards account. */
  claimLpRewards(staker: string): bigint {
    return this.transact("claimLpRewards", (scope) => {
      this.requirePool();
      const amount = this.lpRewards.take(staker);
      if (amount === 0n) throw new InvalidArgumentError(`No LP rewards to claim for ${staker}`);
      const { ledger, events } = this.host;
      ledger.deposit(staker, scope.track(ledger.withdraw(this.rewardsAccount, this.baseToken(), amount)));
      events.emit({ type: "lp-rewards-claimed", staker, amount });
      return amount;
    });
  }

  // -----------------------------------------------------------------------
  // Queries
  // -----------------------------------------------------------------------

  isInitialized(): boolean {
    return this.record !== null;
  }

  getExchangeRate(): bigint {
    this.requirePool();
    return this.rates.exchangeRate;
  }

  getTotalStaked(): bigint {
    this.requirePool();
    return this.rates.totalStaked;
  }

  getTotalDelegation(): bigint {
    this.requirePool();
    return this.rates.totalDelegation;
  }

  getValidator(): string {
    return this.requirePool().validator;
  }

  getValidatorOperator(): Uint8Array {
    return Uint8Array.from(this.requirePool().validatorOperator);
  }

  getUnstakingPeriod(): number {
    return UNSTAKING_PERIOD;
  }

  getAdmin(): string {
    return this.requirePool().admin;
  }

  getTreasury(): string {
    return this.requirePool().treasury;
  }

  getRewardClaimInterval(): number {
    return this.requirePool().rewardClaimInterval;
  }

  getLastRewardClaim(): number {
    return this.requirePool().lastRewardClaim;
  }

  canClaimRewards(): boolean {
    const record = this.requirePool();
    return canClaimRewards(record.lastRewardClaim, record.rewardClaimInterval, this.host.clock.now());
  }

  getClaimableLpRewards(staker: string): bigint {
    this.requirePool();
    return this.lpRewards.claimable(staker);
  }

  snapshot(): PoolSnapshot {
    const record = this.requirePool();
    return {
      admin: record.admin,
      treasury: record.treasury,
      validator: record.validator,
      validatorOperator: toHex(record.validatorOperator),
      totalStaked: this.rates.totalStaked,
      totalDelegation: this.rates.totalDelegation,
      exchangeRate: this.rates.exchangeRate,
      lastRewardClaim: record.lastRewardClaim,
      rewardClaimInterval: record.rewardClaimInterval,
    };
  }

  // -----------------------------------------------------------------------
  // Internal helpers
  // -----------------------------------------------------------------------

  private transact<T>(operation: string, body: (scope: AssetScope) => T): T {
    return this.host.atomically(() => {
      const checkpoint = this.checkpoint();
      try {
        const scope = new AssetScope();
        const result = body(scope);
        scope.close(operation);
        return result;
      } catch (err) {
        this.restore(checkpoint);
        this.logger.debug({ operation, err }, "Operation aborted");
        throw err;
      }
    });
  }

  private checkpoint(): Checkpoint {
    return {
      record: this.record ? { ...this.record, validatorOperator: Uint8Array.from(this.record.validatorOperator) } : null,
      rates: this.rates.snapshot(),
      lpRewards: this.lpRewards.snapshot(),
    };
  }

  private restore(checkpoint: Checkpoint): void {
    this.record = checkpoint.record;
    this.rates.restore(checkpoint.rates);
    this.lpRewards.restore(checkpoint.lpRewards);
  }

  private requirePool(): PoolRecord {
    if (!this.record) throw new NotFoundError("Pool not initialized");
    return this.record;
  }

  private requireAdmin(caller: string): PoolRecord {
    const record = this.requirePool();
    if (caller !== record.admin) throw new PermissionDeniedError(`${caller} is not the pool admin`);
    return record;
  }

  private baseToken(): TokenMetadata {
    return this.issuer.getMetadata("base");
  }

  private stakedToken(): TokenMetadata {
    return this.issuer.getMetadata("staked");
  }
}

function requireAddress(value: string, field: string): void {
  if (value.trim() === "") throw new InvalidArgumentError(`${field} must not be empty`);
}

function toHex(bytes: Uint8Array): string {
  return Buffer.from(bytes).toString("hex");
}
