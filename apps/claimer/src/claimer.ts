/**
 * claimer.ts
 *
 * Polls the staking pool on a cron schedule and submits try-claim-rewards
 * whenever can-claim-rewards is true. The contract itself gates claims by
 * interval, so this is only a trigger: every error is logged and the next
 * tick tries again.
 */

import cron, { type ScheduledTask } from "node-cron";
import type { ILogger } from "@stakewell/types";
import type { PoolGateway } from "./pool-gateway";
import { BroadcastRejectedError } from "./stacks";

export type TickResult = "claimed" | "not-eligible" | "failed" | "skipped";

export interface RewardClaimerOptions {
  gateway: PoolGateway;
  logger: ILogger;
  schedule: string;
  timezone?: string;
}

export class RewardClaimer {
  private task: ScheduledTask | null = null;
  private running = false;
  private readonly logger: ILogger;

  constructor(private readonly options: RewardClaimerOptions) {
    this.logger = options.logger.child({ component: "reward-claimer" });
  }

  // -----------------------------------------------------------------------
  // Lifecycle
  // -----------------------------------------------------------------------

  start(): void {
    const { schedule, timezone = "UTC" } = this.options;
    if (!cron.validate(schedule)) {
      throw new Error(`Invalid cron schedule: "${schedule}"`);
    }
    if (this.task) return;

    this.logger.info({ schedule, timezone }, "Starting reward claim automation");
    this.task = cron.schedule(
      schedule,
      async () => {
        await this.tick();
      },
      { timezone }
    );
  }

  stop(): void {
    if (this.task) {
      this.task.stop();
      this.task = null;
    }
    this.logger.info("Reward claimer stopped");
  }

  // -----------------------------------------------------------------------
  // Tick
  // -----------------------------------------------------------------------

  /** One poll. Never rejects; a tick still in flight makes the next one skip. */
  async tick(): Promise<TickResult> {
    if (this.running) {
      this.logger.warn("Previous claim tick still running; skipping");
      return "skipped";
    }
    this.running = true;

    try {
      let canClaim: boolean;
      try {
        canClaim = await this.options.gateway.canClaimRewards();
      } catch (err) {
        this.logger.error({ err }, "Error checking reward claim availability");
        return "failed";
      }

      if (!canClaim) {
        this.logger.info("Cannot claim rewards yet - waiting for next interval");
        return "not-eligible";
      }

      const txid = await this.options.gateway.tryClaimRewards();
      this.logger.info({ txid }, "Reward claim submitted");
      return "claimed";
    } catch (err) {
      if (err instanceof BroadcastRejectedError) {
        const { reason, reasonData, txid } = err;
        this.logger.error({ reason, reasonData, txid }, "Reward claim rejected by node");
        return "failed";
      }
      this.logger.error({ err }, "Error during reward claim");
      return "failed";
    } finally {
      this.running = false;
    }
  }

  /** Log the pool's current stake; used once at startup. */
  async logPoolStatus(): Promise<void> {
    try {
      const totalStaked = await this.options.gateway.getTotalStaked();
      this.logger.info({ totalStaked: totalStaked.toString() }, "Pool status");
    } catch (err) {
      this.logger.warn({ err }, "Could not read pool status");
    }
  }
}
