/** What the claimer needs from the deployed staking pool. */
export interface PoolGateway {
  canClaimRewards(): Promise<boolean>;
  /** Submit try-claim-rewards; resolves with the txid. */
  tryClaimRewards(): Promise<string>;
  getTotalStaked(): Promise<bigint>;
}
