// Types for the two token kinds issued by the staking pool.

export type TokenKind = "base" | "staked";

/**
 * Descriptive handle for one token kind.
 *
 * The issuer creates exactly one handle per kind; ledgers and assets compare
 * handles by `kind`.
 */
export interface TokenMetadata {
  kind: TokenKind;
  name: string;
  symbol: string;
  decimals: number;
}
