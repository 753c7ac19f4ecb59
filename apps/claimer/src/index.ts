/**
 * Stakewell reward claimer
 *
 * Polls the liquid-staking pool and submits try-claim-rewards once the
 * pool's claim interval has elapsed.
 *
 * Usage:
 *   npm start            — run on CLAIM_CRON_SCHEDULE until SIGINT / SIGTERM
 *   npm start -- --once  — run a single tick and exit
 *
 * Environment variables (see .env.example):
 *   BOT_PRIVATE_KEY, STACKS_NETWORK, STACKS_API_URL, STAKING_POOL_ADDRESS,
 *   CLAIM_CRON_SCHEDULE, FEE_MICRO_STX, LOG_LEVEL, LOG_FILE
 */

import "dotenv/config";
import { loadConfig } from "./config";
import { createLogger } from "./logger";
import { RewardClaimer } from "./claimer";
import { StacksPoolClient } from "./stacks";

const config = loadConfig();
const logger = createLogger(config.logging);

async function main() {
  logger.info(`Network: ${config.network} | API: ${config.apiUrl}`);

  if (!config.botPrivateKey) {
    logger.error("BOT_PRIVATE_KEY is not set. Exiting.");
    process.exit(1);
  }
  if (!config.contracts.stakingPool) {
    logger.error("STAKING_POOL_ADDRESS is not set. Exiting.");
    process.exit(1);
  }

  const pool = new StacksPoolClient({
    network: config.network,
    apiUrl: config.apiUrl,
    contractId: config.contracts.stakingPool,
    senderKey: config.botPrivateKey,
    feeMicroStx: config.claimer.feeMicroStx,
  });
  logger.info(`Admin: ${pool.senderAddress} | Pool: ${config.contracts.stakingPool}`);

  const claimer = new RewardClaimer({
    gateway: pool,
    logger,
    schedule: config.claimer.cronSchedule,
    timezone: config.claimer.timezone,
  });
  await claimer.logPoolStatus();

  if (process.argv.includes("--once")) {
    const result = await claimer.tick();
    logger.info(`Single tick finished: ${result}`);
    logger.flush();
    process.exit(result === "failed" ? 1 : 0);
  }

  claimer.start();

  const shutdown = () => {
    claimer.stop();
    logger.flush();
    process.exit(0);
  };
  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);
}

main().catch((err) => {
  logger.error({ err }, "Fatal");
  process.exit(1);
});
