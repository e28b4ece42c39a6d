import { getAddress, isAddress } from "viem";

import { VaultAdapterError } from "./errors";
import {
  type Depositor,
  type RequestView,
  type UnstakeRequest,
  UnstakeState,
  type WithdrawRequest,
  WithdrawState,
} from "./types";

interface DepositorEntry {
  unstake?: UnstakeRequest;
  withdraw?: WithdrawRequest;
}

/*
 * RequestLedger stores, per depositor, at most one unstake request and at most
 * one withdraw request. An absent request is the `None` state; a stored request
 * always has a strictly positive amount.
 */
export class RequestLedger {
  // stores the map of normalized depositor address to its requests
  private readonly entries: Map<Depositor, DepositorEntry> = new Map();

  static key(depositor: string): Depositor {
    if (!isAddress(depositor, { strict: false })) {
      throw new VaultAdapterError("InvalidDepositor", `Depositor ${depositor} is not an address`);
    }
    return getAddress(depositor);
  }

  getUnstake(depositor: Depositor): UnstakeRequest | undefined {
    return this.entries.get(RequestLedger.key(depositor))?.unstake;
  }

  getWithdraw(depositor: Depositor): WithdrawRequest | undefined {
    return this.entries.get(RequestLedger.key(depositor))?.withdraw;
  }

  viewUnstake(depositor: Depositor): RequestView<UnstakeState> {
    const request = this.getUnstake(depositor);
    return request ? { ...request } : { amount: 0n, timestamp: 0, state: UnstakeState.None };
  }

  viewWithdraw(depositor: Depositor): RequestView<WithdrawState> {
    const request = this.getWithdraw(depositor);
    return request ? { ...request } : { amount: 0n, timestamp: 0, state: WithdrawState.None };
  }

  /**
   * Replaces the depositor's unstake request. A zero amount deletes it.
   */
  putUnstake(depositor: Depositor, request: UnstakeRequest): void {
    this.update(depositor, (entry) => {
      entry.unstake = request.amount > 0n ? { ...request } : undefined;
    });
  }

  /**
   * Replaces the depositor's withdraw request. A zero amount deletes it.
   */
  putWithdraw(depositor: Depositor, request: WithdrawRequest): void {
    this.update(depositor, (entry) => {
      entry.withdraw = request.amount > 0n ? { ...request } : undefined;
    });
  }

  deleteUnstake(depositor: Depositor): void {
    this.update(depositor, (entry) => {
      entry.unstake = undefined;
    });
  }

  deleteWithdraw(depositor: Depositor): void {
    this.update(depositor, (entry) => {
      entry.withdraw = undefined;
    });
  }

  private update(depositor: Depositor, mutate: (entry: DepositorEntry) => void): void {
    const key = RequestLedger.key(depositor);
    const entry: DepositorEntry = { ...this.entries.get(key) };
    mutate(entry);
    if (entry.unstake === undefined && entry.withdraw === undefined) {
      this.entries.delete(key);
    } else {
      this.entries.set(key, entry);
    }
  }
}
