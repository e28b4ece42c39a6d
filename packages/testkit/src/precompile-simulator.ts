import {
  AssetKind,
  DELEGATION_PRECOMPILE_ADDRESS,
  delegationPrecompileAbi,
  PrecompileDelegationGateway,
  type TransactionSender,
} from "@liquid-delegation/vault-adapter";
import { type Address, decodeFunctionData, type Hex, isAddressEqual, pad, toHex, zeroAddress } from "viem";

/** Precompile function names as they appear on the wire. */
export type PrecompileFunction = (typeof delegationPrecompileAbi)[number]["name"];

export type SimulatedCall = {
  functionName: PrecompileFunction;
  txHash: Hex;
};

type Position = {
  delegated: bigint;
  unstaking: bigint;
};

/*
 * DelegationPrecompileSimulator is an in-process stand-in for the delegation
 * precompile. It receives calldata through `send`, decodes it with the
 * precompile ABI and applies it to its own bookkeeping for the single
 * delegator (the vault) calling it.
 *
 * Like the real authority, it reverts calls that break the protocol ordering,
 * and it can be told to revert any function to exercise failure paths.
 */
export class DelegationPrecompileSimulator {
  public readonly address: Address;

  // delegation positions per operator and asset
  private readonly positions: Map<string, Position> = new Map();
  // unstaked and not yet scheduled for withdrawal, per asset
  private readonly unstaked: Map<string, bigint> = new Map();
  // scheduled for withdrawal, per asset
  private readonly withdrawing: Map<string, bigint> = new Map();
  // released by executeWithdraw, per asset
  private readonly released: Map<string, bigint> = new Map();

  private readonly failOnce: Map<PrecompileFunction, string> = new Map();
  private readonly failAlways: Map<PrecompileFunction, string> = new Map();

  private readonly log: SimulatedCall[] = [];
  private nonce = 0;

  constructor(address: Address = DELEGATION_PRECOMPILE_ADDRESS) {
    this.address = address;
  }

  /**
   * A TransactionSender bound to this simulator.
   */
  public readonly send: TransactionSender = async (to, data) => {
    if (!isAddressEqual(to, this.address)) {
      throw new Error(`No contract at ${to}`);
    }
    const call = decodeFunctionData({ abi: delegationPrecompileAbi, data });

    const reason = this.failOnce.get(call.functionName) ?? this.failAlways.get(call.functionName);
    this.failOnce.delete(call.functionName);
    if (reason !== undefined) {
      throw new Error(`execution reverted: ${reason}`);
    }

    switch (call.functionName) {
      case "delegate": {
        const [operator, assetKind, token, amount, blueprintSelection] = call.args;
        if (blueprintSelection.length === 0) {
          throw new Error("execution reverted: EmptyBlueprintSelection");
        }
        const position = this.position(operator, assetKind, token);
        position.delegated += amount;
        break;
      }
      case "scheduleDelegatorUnstake": {
        const [operator, assetKind, token, amount] = call.args;
        const position = this.position(operator, assetKind, token);
        if (amount > position.delegated - position.unstaking) {
          throw new Error("execution reverted: InsufficientBalanceForUnstake");
        }
        position.unstaking += amount;
        break;
      }
      case "cancelDelegatorUnstake": {
        const [operator, assetKind, token, amount] = call.args;
        const position = this.position(operator, assetKind, token);
        if (amount > position.unstaking) {
          throw new Error("execution reverted: NoMatchingUnstakeRequest");
        }
        position.unstaking -= amount;
        break;
      }
      case "scheduleWithdraw": {
        const [assetKind, token, amount] = call.args;
        const key = assetKey(assetKind, token);
        const available = this.unstaked.get(key) ?? 0n;
        if (amount > available) {
          throw new Error("execution reverted: InsufficientBalanceForWithdraw");
        }
        this.unstaked.set(key, available - amount);
        this.withdrawing.set(key, (this.withdrawing.get(key) ?? 0n) + amount);
        break;
      }
      case "executeWithdraw": {
        for (const [key, amount] of this.withdrawing) {
          this.released.set(key, (this.released.get(key) ?? 0n) + amount);
        }
        this.withdrawing.clear();
        break;
      }
      case "cancelWithdraw": {
        const [assetKind, token, amount] = call.args;
        const key = assetKey(assetKind, token);
        const pending = this.withdrawing.get(key) ?? 0n;
        if (amount > pending) {
          throw new Error("execution reverted: NoMatchingWithdrawRequest");
        }
        this.withdrawing.set(key, pending - amount);
        break;
      }
    }

    this.nonce += 1;
    const txHash = pad(toHex(this.nonce), { size: 32 });
    this.log.push({ functionName: call.functionName, txHash });
    return txHash;
  };

  /**
   * Creates a gateway that talks to this simulator.
   */
  public gateway(): PrecompileDelegationGateway {
    return new PrecompileDelegationGateway({ send: this.send, address: this.address });
  }

  /**
   * Completes every scheduled unstake, the way the authority does once the
   * unbonding delay passed. Returns the total amount moved.
   */
  public executeDelegatorUnstakes(): bigint {
    let total = 0n;
    for (const [key, position] of this.positions) {
      if (position.unstaking === 0n) continue;
      const asset = key.slice(key.indexOf("/") + 1);
      position.delegated -= position.unstaking;
      this.unstaked.set(asset, (this.unstaked.get(asset) ?? 0n) + position.unstaking);
      total += position.unstaking;
      position.unstaking = 0n;
    }
    return total;
  }

  /** Reverts the next call of `functionName` only. */
  public revertNext(functionName: PrecompileFunction, reason = "SimulatedRevert"): void {
    this.failOnce.set(functionName, reason);
  }

  /** Reverts every call of `functionName` until `recover` is called. */
  public revertAlways(functionName: PrecompileFunction, reason = "SimulatedRevert"): void {
    this.failAlways.set(functionName, reason);
  }

  public recover(functionName: PrecompileFunction): void {
    this.failOnce.delete(functionName);
    this.failAlways.delete(functionName);
  }

  public getPosition(operator: Hex, asset: { kind: AssetKind; token?: Address }): Position {
    return { ...this.position(operator, asset.kind, asset.token ?? zeroAddress) };
  }

  public getUnstaked(asset: { kind: AssetKind; token?: Address }): bigint {
    return this.unstaked.get(assetKey(asset.kind, asset.token ?? zeroAddress)) ?? 0n;
  }

  public getWithdrawing(asset: { kind: AssetKind; token?: Address }): bigint {
    return this.withdrawing.get(assetKey(asset.kind, asset.token ?? zeroAddress)) ?? 0n;
  }

  public getReleased(asset: { kind: AssetKind; token?: Address }): bigint {
    return this.released.get(assetKey(asset.kind, asset.token ?? zeroAddress)) ?? 0n;
  }

  /** Names of the successfully applied calls, oldest first. */
  public get calls(): PrecompileFunction[] {
    return this.log.map((call) => call.functionName);
  }

  public get transactions(): readonly SimulatedCall[] {
    return this.log;
  }

  private position(operator: Hex, assetKind: number, token: Address): Position {
    const key = `${operator.toLowerCase()}/${assetKey(assetKind, token)}`;
    let position = this.positions.get(key);
    if (!position) {
      position = { delegated: 0n, unstaking: 0n };
      this.positions.set(key, position);
    }
    return position;
  }
}

function assetKey(assetKind: number, token: Address): string {
  return `${assetKind}:${token.toLowerCase()}`;
}
