import {
  type Account,
  type Address,
  type Chain,
  encodeFunctionData,
  type Hex,
  type PublicClient,
  type Transport,
  type WalletClient,
  zeroAddress,
} from "viem";

import type { VaultAdapterConfig } from "./config";
import { GatewayCallError, type GatewayMethod } from "./errors";
import type { DelegationGateway } from "./gateway";
import { AssetKind, type DelegatedAsset, type OperatorId } from "./types";

export const DELEGATION_PRECOMPILE_ADDRESS: Address = "0x0000000000000000000000000000000000000822";

const assetInputs = [
  { name: "assetKind", type: "uint8" },
  { name: "token", type: "address" },
] as const;

export const delegationPrecompileAbi = [
  {
    type: "function",
    name: "delegate",
    stateMutability: "nonpayable",
    inputs: [
      { name: "operator", type: "bytes32" },
      ...assetInputs,
      { name: "amount", type: "uint256" },
      { name: "blueprintSelection", type: "uint64[]" },
    ],
    outputs: [],
  },
  {
    type: "function",
    name: "scheduleDelegatorUnstake",
    stateMutability: "nonpayable",
    inputs: [{ name: "operator", type: "bytes32" }, ...assetInputs, { name: "amount", type: "uint256" }],
    outputs: [],
  },
  {
    type: "function",
    name: "cancelDelegatorUnstake",
    stateMutability: "nonpayable",
    inputs: [{ name: "operator", type: "bytes32" }, ...assetInputs, { name: "amount", type: "uint256" }],
    outputs: [],
  },
  {
    type: "function",
    name: "scheduleWithdraw",
    stateMutability: "nonpayable",
    inputs: [...assetInputs, { name: "amount", type: "uint256" }],
    outputs: [],
  },
  {
    type: "function",
    name: "executeWithdraw",
    stateMutability: "nonpayable",
    inputs: [],
    outputs: [],
  },
  {
    type: "function",
    name: "cancelWithdraw",
    stateMutability: "nonpayable",
    inputs: [...assetInputs, { name: "amount", type: "uint256" }],
    outputs: [],
  },
] as const;

/**
 * Submits calldata to the precompile and resolves with the transaction hash
 * once the transaction is included successfully. Rejects otherwise.
 */
export type TransactionSender = (to: Address, data: Hex) => Promise<Hex>;

/**
 * A sender backed by viem clients: sends with the wallet client's account and
 * waits for the receipt, treating a reverted receipt as a failure.
 */
export function viemTransactionSender(clients: {
  wallet: WalletClient<Transport, Chain, Account>;
  public: PublicClient;
}): TransactionSender {
  return async (to, data) => {
    const hash = await clients.wallet.sendTransaction({ to, data });
    const receipt = await clients.public.waitForTransactionReceipt({ hash });
    if (receipt.status !== "success") {
      throw new Error(`Transaction ${hash} reverted`);
    }
    return hash;
  };
}

function encodeAsset(asset: DelegatedAsset): readonly [number, Address] {
  return asset.kind === AssetKind.Erc20 ? [AssetKind.Erc20, asset.token] : [AssetKind.Native, zeroAddress];
}

/*
 * PrecompileDelegationGateway is the on-chain gateway to the delegation
 * authority. It ABI-encodes each call against the fixed precompile and hands
 * the calldata to a TransactionSender.
 */
export class PrecompileDelegationGateway implements DelegationGateway {
  private readonly address: Address;
  private readonly send: TransactionSender;

  constructor(config: { send: TransactionSender; address?: Address }) {
    this.send = config.send;
    this.address = config.address ?? DELEGATION_PRECOMPILE_ADDRESS;
  }

  /**
   * Builds the gateway for the precompile address the adapter is configured with.
   */
  static fromConfig(config: Pick<VaultAdapterConfig, "gateway">, send: TransactionSender): PrecompileDelegationGateway {
    return new PrecompileDelegationGateway({ send, address: config.gateway });
  }

  get Address(): Address {
    return this.address;
  }

  async delegate(
    operator: OperatorId,
    asset: DelegatedAsset,
    amount: bigint,
    blueprintSelection: readonly bigint[],
  ): Promise<void> {
    const [assetKind, token] = encodeAsset(asset);
    const data = encodeFunctionData({
      abi: delegationPrecompileAbi,
      functionName: "delegate",
      args: [operator, assetKind, token, amount, blueprintSelection],
    });
    await this.submit("delegate", data);
  }

  async scheduleUnstake(operator: OperatorId, asset: DelegatedAsset, amount: bigint): Promise<void> {
    const [assetKind, token] = encodeAsset(asset);
    const data = encodeFunctionData({
      abi: delegationPrecompileAbi,
      functionName: "scheduleDelegatorUnstake",
      args: [operator, assetKind, token, amount],
    });
    await this.submit("scheduleUnstake", data);
  }

  async cancelUnstake(operator: OperatorId, asset: DelegatedAsset, amount: bigint): Promise<void> {
    const [assetKind, token] = encodeAsset(asset);
    const data = encodeFunctionData({
      abi: delegationPrecompileAbi,
      functionName: "cancelDelegatorUnstake",
      args: [operator, assetKind, token, amount],
    });
    await this.submit("cancelUnstake", data);
  }

  async scheduleWithdraw(asset: DelegatedAsset, amount: bigint): Promise<void> {
    const [assetKind, token] = encodeAsset(asset);
    const data = encodeFunctionData({
      abi: delegationPrecompileAbi,
      functionName: "scheduleWithdraw",
      args: [assetKind, token, amount],
    });
    await this.submit("scheduleWithdraw", data);
  }

  async executeWithdraw(): Promise<void> {
    const data = encodeFunctionData({
      abi: delegationPrecompileAbi,
      functionName: "executeWithdraw",
    });
    await this.submit("executeWithdraw", data);
  }

  async cancelWithdraw(asset: DelegatedAsset, amount: bigint): Promise<void> {
    const [assetKind, token] = encodeAsset(asset);
    const data = encodeFunctionData({
      abi: delegationPrecompileAbi,
      functionName: "cancelWithdraw",
      args: [assetKind, token, amount],
    });
    await this.submit("cancelWithdraw", data);
  }

  private async submit(method: GatewayMethod, data: Hex): Promise<Hex> {
    try {
      return await this.send(this.address, data);
    } catch (err) {
      throw new GatewayCallError(method, err);
    }
  }
}
