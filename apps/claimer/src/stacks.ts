/**
 * stacks.ts
 *
 * Stacks client for one deployed liquid-staking pool contract. The contract
 * id, network and sender are resolved once; each pool function the claimer
 * uses gets its own typed method.
 */

import {
  makeContractCall,
  broadcastTransaction,
  callReadOnlyFunction,
  AnchorMode,
  PostConditionMode,
  ClarityType,
  cvToString,
  getAddressFromPrivateKey,
  TransactionVersion,
  type ClarityValue,
} from "@stacks/transactions";
import { StacksMainnet, StacksTestnet, StacksDevnet, type StacksNetwork } from "@stacks/network";
import type { ClaimerConfig } from "./config";
import type { PoolGateway } from "./pool-gateway";

export interface StacksPoolClientOptions {
  network: ClaimerConfig["network"];
  apiUrl: string;
  contractId: string;
  /** Admin key; try-claim-rewards is admin-only. */
  senderKey: string;
  feeMicroStx: number;
}

/** Shape shared by both arms of the node's broadcast response. */
export interface BroadcastResponse {
  txid: string;
  error?: string;
  reason?: string;
  reason_data?: unknown;
}

/** The node refused the transaction before it reached the mempool. */
export class BroadcastRejectedError extends Error {
  constructor(
    readonly functionName: string,
    readonly reason: string,
    readonly reasonData: unknown,
    readonly txid: string
  ) {
    super(`${functionName} rejected by node: ${reason}`);
    this.name = "BroadcastRejectedError";
  }
}

/** The contract answered with (err …) or a value of the wrong type. */
export class ContractResponseError extends Error {
  constructor(
    readonly functionName: string,
    readonly response: string
  ) {
    super(`${functionName} returned ${response}`);
    this.name = "ContractResponseError";
  }
}

/** Split "ST1ABC…XYZ.contract-name" into [contractAddress, contractName]. */
export function parseContractId(id: string): [string, string] {
  const dot = id.lastIndexOf(".");
  if (dot <= 0 || dot === id.length - 1) throw new Error(`Invalid contract id: "${id}"`);
  return [id.slice(0, dot), id.slice(dot + 1)];
}

export function createNetwork(name: ClaimerConfig["network"], url: string): StacksNetwork {
  switch (name) {
    case "mainnet":
      return new StacksMainnet({ url });
    case "testnet":
      return new StacksTestnet({ url });
    case "devnet":
      return new StacksDevnet({ url });
  }
}

export function senderAddressOf(key: string, network: ClaimerConfig["network"]): string {
  const version = network === "mainnet" ? TransactionVersion.Mainnet : TransactionVersion.Testnet;
  return getAddressFromPrivateKey(key, version);
}

/** Txid of an accepted broadcast; a rejection throws with the node's reason attached. */
export function acceptedTxid(functionName: string, response: BroadcastResponse): string {
  if (response.error === undefined) return response.txid;
  throw new BroadcastRejectedError(
    functionName,
    response.reason ?? response.error,
    response.reason_data,
    response.txid
  );
}

/** Strip a top-level (ok …); (err …) throws. */
export function unwrapResponse(functionName: string, value: ClarityValue): ClarityValue {
  if (value.type === ClarityType.ResponseErr) {
    throw new ContractResponseError(functionName, cvToString(value));
  }
  return value.type === ClarityType.ResponseOk ? value.value : value;
}

export function expectBool(functionName: string, value: ClarityValue): boolean {
  const inner = unwrapResponse(functionName, value);
  if (inner.type === ClarityType.BoolTrue) return true;
  if (inner.type === ClarityType.BoolFalse) return false;
  throw new ContractResponseError(functionName, `${cvToString(inner)}, expected bool`);
}

export function expectUint(functionName: string, value: ClarityValue): bigint {
  const inner = unwrapResponse(functionName, value);
  if (inner.type === ClarityType.UInt) return BigInt(inner.value);
  throw new ContractResponseError(functionName, `${cvToString(inner)}, expected uint`);
}

export class StacksPoolClient implements PoolGateway {
  readonly contractAddress: string;
  readonly contractName: string;
  readonly senderAddress: string;
  private readonly network: StacksNetwork;

  constructor(private readonly options: StacksPoolClientOptions) {
    const [contractAddress, contractName] = parseContractId(options.contractId);
    this.contractAddress = contractAddress;
    this.contractName = contractName;
    this.network = createNetwork(options.network, options.apiUrl);
    this.senderAddress = senderAddressOf(options.senderKey, options.network);
  }

  async canClaimRewards(): Promise<boolean> {
    return expectBool("can-claim-rewards", await this.read("can-claim-rewards"));
  }

  async getTotalStaked(): Promise<bigint> {
    return expectUint("get-total-staked", await this.read("get-total-staked"));
  }

  /** Sign and broadcast try-claim-rewards; resolves with the txid once the node accepts it. */
  async tryClaimRewards(): Promise<string> {
    const tx = await makeContractCall({
      network: this.network,
      contractAddress: this.contractAddress,
      contractName: this.contractName,
      functionName: "try-claim-rewards",
      functionArgs: [],
      senderKey: this.options.senderKey,
      anchorMode: AnchorMode.Any,
      // The claim moves the reward batch between pool-owned accounts.
      postConditionMode: PostConditionMode.Allow,
      fee: this.options.feeMicroStx,
    });
    return acceptedTxid("try-claim-rewards", await broadcastTransaction(tx, this.network));
  }

  private read(functionName: string): Promise<ClarityValue> {
    return callReadOnlyFunction({
      network: this.network,
      contractAddress: this.contractAddress,
      contractName: this.contractName,
      functionName,
      functionArgs: [],
      senderAddress: this.senderAddress,
    });
  }
}
