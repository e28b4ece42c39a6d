import type { Address, Hex } from "viem";

/** Depositor identity, an EVM address. */
export type Depositor = Address;

/** 32-byte opaque handle of the staking operator. */
export type OperatorId = Hex;

export enum UnstakeState {
  None = 0,
  Scheduled = 1,
  Executed = 2,
}

export enum WithdrawState {
  None = 0,
  Scheduled = 1,
  // Declared for interface compatibility, nothing transitions into it.
  Ready = 2,
}

/** Wire discriminator of the delegated asset, as the precompile encodes it. */
export enum AssetKind {
  Native = 0,
  Erc20 = 1,
}

export type DelegatedAsset = { kind: AssetKind.Native } | { kind: AssetKind.Erc20; token: Address };

export interface UnstakeRequest {
  // amount of the underlying asset subject to the unstake, always > 0 while stored
  amount: bigint;
  // ms timestamp of the latest schedule, informational only
  timestamp: number;
  state: UnstakeState.Scheduled | UnstakeState.Executed;
}

export interface WithdrawRequest {
  // amount scheduled for withdrawal, always > 0 while stored
  amount: bigint;
  // ms timestamp of the latest schedule, informational only
  timestamp: number;
  state: WithdrawState.Scheduled | WithdrawState.Ready;
}

/**
 * What the read accessors return. An absent request reads as zero amount,
 * zero timestamp and the `None` state.
 */
export interface RequestView<S> {
  amount: bigint;
  timestamp: number;
  state: S;
}

/**
 * The read-only part of the external share vault the adapter consults.
 */
export interface ShareVault {
  /** Assets the depositor could withdraw right now, from share accounting. */
  maxWithdraw(depositor: Depositor): Promise<bigint>;
}
