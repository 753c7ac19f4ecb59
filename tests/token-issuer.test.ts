import { describe, it, expect, beforeEach } from "vitest";
import {
  AssetScope,
  FungibleAsset,
  InvalidArgumentError,
  InvariantViolationError,
  MemoryLedger,
  MintCapability,
  NotFoundError,
  AlreadyExistsError,
  PermissionDeniedError,
  TokenIssuer,
  destroyZero,
} from "@stakewell/core";

let ledger: MemoryLedger;
let issuer: TokenIssuer;

// -----------------------------------------------------------------------

describe("token-issuer", () => {
  beforeEach(() => {
    ledger = new MemoryLedger();
    issuer = new TokenIssuer(ledger);
  });

  // =====================================================================
  // initialize
  // =====================================================================
  describe("initialize", () => {
    it("rejects mint before initialize", () => {
      expect(() => issuer.mint("base", 1n)).toThrow(NotFoundError);
      expect(issuer.isInitialized()).toBe(false);
    });

    it("rejects double-initialize", () => {
      issuer.initialize();
      expect(() => issuer.initialize()).toThrow(AlreadyExistsError);
    });

    it("exposes one metadata handle per kind", () => {
      issuer.initialize();
      expect(issuer.getMetadata("base").symbol).toBe("SWB");
      expect(issuer.getMetadata("staked").symbol).toBe("stSWB");
      expect(issuer.getMetadata("staked")).toBe(issuer.getMetadata("staked"));
    });

    it("rejects metadata declaring the wrong kind", () => {
      const base = { kind: "base" as const, name: "B", symbol: "B", decimals: 6 };
      expect(() => issuer.initialize({ base, staked: base })).toThrow(InvalidArgumentError);
      expect(issuer.isInitialized()).toBe(false);
    });
  });

  // =====================================================================
  // mint / burn
  // =====================================================================
  describe("mint and burn", () => {
    beforeEach(() => issuer.initialize());

    it("mints exactly the requested amount", () => {
      const asset = issuer.mint("staked", 42n);
      expect(asset.amount).toBe(42n);
      expect(asset.kind).toBe("staked");
      expect(asset.settled).toBe(false);
    });

    it("zero mint must be destroyed, not deposited", () => {
      const asset = issuer.mint("base", 0n);
      expect(() => ledger.deposit("alice", asset)).toThrow(InvalidArgumentError);
      destroyZero(asset);
      expect(asset.settled).toBe(true);
    });

    it("destroyZero rejects a non-zero asset", () => {
      const asset = issuer.mint("base", 5n);
      expect(() => destroyZero(asset)).toThrow(InvalidArgumentError);
      expect(asset.settled).toBe(false);
    });

    it("burn settles the asset and a second burn fails", () => {
      const asset = issuer.mint("staked", 7n);
      issuer.burn(asset);
      expect(asset.settled).toBe(true);
      expect(() => issuer.burn(asset)).toThrow(InvariantViolationError);
    });

    it("burn rejects an asset minted by another issuer", () => {
      const other = new TokenIssuer(ledger);
      other.initialize();
      const foreign = other.mint("staked", 3n);
      expect(() => issuer.burn(foreign)).toThrow(InvalidArgumentError);
      expect(foreign.settled).toBe(false);
    });

    it("capabilities and assets cannot be forged", () => {
      const metadata = issuer.getMetadata("base");
      expect(() => new MintCapability(Symbol("capability"), metadata)).toThrow(InvalidArgumentError);
      expect(() => new FungibleAsset(Symbol("FungibleAsset"), metadata, 1n)).toThrow(InvariantViolationError);
    });
  });

  // =====================================================================
  // bearer asset operations
  // =====================================================================
  describe("FungibleAsset", () => {
    beforeEach(() => issuer.initialize());

    it("extract splits and merge recombines", () => {
      const asset = issuer.mint("base", 10n);
      const part = asset.extract(4n);
      expect(asset.amount).toBe(6n);
      expect(part.amount).toBe(4n);

      asset.merge(part);
      expect(asset.amount).toBe(10n);
      expect(part.settled).toBe(true);
    });

    it("extract more than held fails", () => {
      const asset = issuer.mint("base", 10n);
      expect(() => asset.extract(11n)).toThrow("Cannot extract 11 from asset holding 10");
    });

    it("merge rejects a different kind", () => {
      const base = issuer.mint("base", 1n);
      const staked = issuer.mint("staked", 1n);
      expect(() => base.merge(staked)).toThrow(InvalidArgumentError);
    });

    it("deposit credits the ledger and settles the asset", () => {
      const asset = issuer.mint("base", 9n);
      ledger.deposit("alice", asset);
      expect(ledger.balance("alice", issuer.getMetadata("base"))).toBe(9n);
      expect(asset.settled).toBe(true);
    });
  });

  // =====================================================================
  // AssetScope
  // =====================================================================
  describe("AssetScope", () => {
    beforeEach(() => issuer.initialize());

    it("fails when a tracked asset is still live", () => {
      const scope = new AssetScope();
      scope.track(issuer.mint("base", 3n));
      expect(() => scope.close("test-op")).toThrow("test-op left 1 unsettled asset(s)");
    });

    it("passes once every tracked asset is settled", () => {
      const scope = new AssetScope();
      const asset = scope.track(issuer.mint("base", 3n));
      ledger.deposit("alice", asset);
      expect(() => scope.close("test-op")).not.toThrow();
    });
  });

  // =====================================================================
  // freeze
  // =====================================================================
  describe("freeze", () => {
    beforeEach(() => issuer.initialize());

    it("frozen account cannot be withdrawn from until unfrozen", () => {
      const base = issuer.getMetadata("base");
      ledger.deposit("alice", issuer.mint("base", 5n));

      issuer.freeze("base", "alice", true);
      expect(ledger.isFrozen("alice", base)).toBe(true);
      expect(() => ledger.withdraw("alice", base, 1n)).toThrow(PermissionDeniedError);

      issuer.freeze("base", "alice", false);
      const asset = ledger.withdraw("alice", base, 1n);
      expect(asset.amount).toBe(1n);
      ledger.deposit("bob", asset);
      expect(ledger.balance("alice", base)).toBe(4n);
    });

    it("freezing one kind leaves the other usable", () => {
      ledger.deposit("alice", issuer.mint("staked", 5n));
      issuer.freeze("base", "alice", true);
      const asset = ledger.withdraw("alice", issuer.getMetadata("staked"), 5n);
      issuer.burn(asset);
      expect(ledger.balance("alice", issuer.getMetadata("staked"))).toBe(0n);
    });
  });
});
