/**
 * issuer.ts
 *
 * Mints and burns the base and staked token kinds. Authority is held as
 * capability objects created once by initialize(); they live in private
 * fields and cannot be constructed anywhere else.
 */

import type { TokenKind, TokenMetadata } from "@stakewell/types";
import { createAsset, type FungibleAsset } from "./asset";
import { AlreadyExistsError, InvalidArgumentError, NotFoundError } from "./errors";
import type { Ledger } from "./host";

const CAPABILITY_KEY = Symbol("capability");

abstract class Capability {
  constructor(key: symbol, readonly metadata: TokenMetadata) {
    if (key !== CAPABILITY_KEY) throw new InvalidArgumentError("Capabilities are issued by TokenIssuer only");
  }
}

export class MintCapability extends Capability {
  readonly scope = "mint";
}

export class BurnCapability extends Capability {
  readonly scope = "burn";
}

export class FreezeCapability extends Capability {
  readonly scope = "freeze";
}

interface CapabilitySet {
  mint: MintCapability;
  burn: BurnCapability;
  freeze: FreezeCapability;
}

export const DEFAULT_TOKEN_METADATA: Record<TokenKind, TokenMetadata> = {
  base:   { kind: "base",   name: "Stakewell Base",   symbol: "SWB",   decimals: 6 },
  staked: { kind: "staked", name: "Stakewell Staked", symbol: "stSWB", decimals: 6 },
};

export class TokenIssuer {
  private capabilities: Record<TokenKind, CapabilitySet> | null = null;

  constructor(private readonly ledger: Ledger) {}

  initialize(metadata: Record<TokenKind, TokenMetadata> = DEFAULT_TOKEN_METADATA): void {
    if (this.capabilities) throw new AlreadyExistsError("Token issuer already initialized");
    for (const kind of ["base", "staked"] as const) {
      if (metadata[kind].kind !== kind) {
        throw new InvalidArgumentError(`Metadata for ${kind} declares kind ${metadata[kind].kind}`);
      }
    }
    this.capabilities = {
      base: issueCapabilities(Object.freeze({ ...metadata.base })),
      staked: issueCapabilities(Object.freeze({ ...metadata.staked })),
    };
  }

  isInitialized(): boolean {
    return this.capabilities !== null;
  }

  getMetadata(kind: TokenKind): TokenMetadata {
    return this.capabilitiesFor(kind).mint.metadata;
  }

  /** A zero-amount mint is legal; the result must be destroyed, not deposited. */
  mint(kind: TokenKind, amount: bigint): FungibleAsset {
    if (amount < 0n) throw new InvalidArgumentError(`Cannot mint negative amount ${amount}`);
    const { mint } = this.capabilitiesFor(kind);
    return createAsset(mint.metadata, amount);
  }

  burn(asset: FungibleAsset): void {
    const { burn } = this.capabilitiesFor(asset.kind);
    if (asset.metadata !== burn.metadata) {
      throw new InvalidArgumentError(`Asset metadata does not match the ${asset.kind} burn capability`);
    }
    asset.release();
  }

  freeze(kind: TokenKind, account: string, frozen: boolean): void {
    this.ledger.setFrozen(this.capabilitiesFor(kind).freeze, account, frozen);
  }

  private capabilitiesFor(kind: TokenKind): CapabilitySet {
    if (!this.capabilities) throw new NotFoundError("Token issuer not initialized");
    return this.capabilities[kind];
  }
}

function issueCapabilities(metadata: TokenMetadata): CapabilitySet {
  return {
    mint: new MintCapability(CAPABILITY_KEY, metadata),
    burn: new BurnCapability(CAPABILITY_KEY, metadata),
    freeze: new FreezeCapability(CAPABILITY_KEY, metadata),
  };
}
