import cron from "node-cron";
import { z } from "zod";

const envSchema = z.object({
  STACKS_NETWORK: z.enum(["mainnet", "testnet", "devnet"]).default("devnet"),
  STACKS_API_URL: z.string().url().default("http://localhost:3999"),

  // Hex-encoded Stacks private key of the pool admin. try-claim-rewards is
  // admin-only, so this must be the key that called initialize.
  BOT_PRIVATE_KEY: z.string().default(""),

  // "ADDRESS.contract-name" of the deployed liquid-staking contract.
  STAKING_POOL_ADDRESS: z
    .string()
    .regex(/^[A-Z0-9]+\.[a-zA-Z][a-zA-Z0-9-]*$/, "Expected ADDRESS.contract-name")
    .or(z.literal(""))
    .default(""),

  // Poll schedule. The contract enforces its own claim interval, so polling
  // more often than that only produces "not eligible" ticks.
  CLAIM_CRON_SCHEDULE: z
    .string()
    .refine((value) => cron.validate(value), "Invalid cron expression")
    .default("0 * * * *"),

  FEE_MICRO_STX: z.coerce.number().int().positive().default(2000),

  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
  LOG_FILE: z.string().min(1).default("reward-claimer.log"),
});

export type ClaimerEnv = z.infer<typeof envSchema>;

export interface ClaimerConfig {
  network: ClaimerEnv["STACKS_NETWORK"];
  apiUrl: string;
  botPrivateKey: string;
  contracts: {
    stakingPool: string;
  };
  claimer: {
    cronSchedule: string;
    timezone: string;
    feeMicroStx: number;
  };
  logging: {
    level: ClaimerEnv["LOG_LEVEL"];
    file: string;
  };
}

/**
 * Parse claimer settings from `env`. Reading the environment is left to the
 * caller so importing this module has no side effects.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ClaimerConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const fields = parsed.error.flatten().fieldErrors;
    throw new Error(`Invalid claimer configuration: ${JSON.stringify(fields)}`);
  }
  const e = parsed.data;
  return {
    network: e.STACKS_NETWORK,
    apiUrl: e.STACKS_API_URL,
    botPrivateKey: e.BOT_PRIVATE_KEY,
    contracts: {
      stakingPool: e.STAKING_POOL_ADDRESS,
    },
    claimer: {
      cronSchedule: e.CLAIM_CRON_SCHEDULE,
      timezone: "UTC",
      feeMicroStx: e.FEE_MICRO_STX,
    },
    logging: {
      level: e.LOG_LEVEL,
      file: e.LOG_FILE,
    },
  };
}
