import type { RewardSplit } from "@stakewell/types";
import { LP_RATIO, MEV_RATIO, PROTOCOL_FEE_RATIO, RATIO_DENOMINATOR } from "./constants";
import { InvalidArgumentError } from "./errors";

/**
 * Split a reward batch by the fixed ratios. Each share is floored; the
 * remainder (at most 2 units for three shares) is not paid to anyone.
 */
export function splitRewards(total: bigint): RewardSplit {
  if (total < 0n) throw new InvalidArgumentError(`Cannot split negative reward ${total}`);
  const mev = (total * MEV_RATIO) / RATIO_DENOMINATOR;
  const protocol = (total * PROTOCOL_FEE_RATIO) / RATIO_DENOMINATOR;
  const lp = (total * LP_RATIO) / RATIO_DENOMINATOR;
  return { total, mev, protocol, lp, remainder: total - mev - protocol - lp };
}
