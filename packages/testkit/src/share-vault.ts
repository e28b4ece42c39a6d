import type { Depositor, ShareVault } from "@liquid-delegation/vault-adapter";
import { type Address, getAddress } from "viem";

/** The hooks the vault calls around its own accounting. */
export interface VaultHooks {
  afterDeposit(depositor: string, amount: bigint): Promise<void>;
  beforeWithdraw(owner: string, amount: bigint): Promise<void>;
}

/**
 * Where the vault takes assets from and sends them to.
 */
export interface AssetCustody {
  pull(from: Address, amount: bigint): void;
  push(to: Address, amount: bigint): void;
  balanceOf(account: Address): bigint;
}

/*
 * Native balances: a deposit pulls from the depositor's balance as if the
 * assets were sent along with the call.
 */
export class NativeCustody implements AssetCustody {
  private readonly balances: Map<Address, bigint> = new Map();

  constructor(private readonly vault: Address) {}

  fund(account: Address, amount: bigint): void {
    const key = getAddress(account);
    this.balances.set(key, this.balanceOf(key) + amount);
  }

  pull(from: Address, amount: bigint): void {
    this.move(from, this.vault, amount);
  }

  push(to: Address, amount: bigint): void {
    this.move(this.vault, to, amount);
  }

  balanceOf(account: Address): bigint {
    return this.balances.get(getAddress(account)) ?? 0n;
  }

  private move(from: Address, to: Address, amount: bigint): void {
    const balance = this.balanceOf(from);
    if (balance < amount) {
      throw new Error(`Insufficient native balance of ${from}: ${balance} < ${amount}`);
    }
    this.balances.set(getAddress(from), balance - amount);
    this.balances.set(getAddress(to), this.balanceOf(to) + amount);
  }
}

/*
 * A minimal fungible token with approve/transferFrom semantics.
 */
export class MockErc20 {
  private readonly balances: Map<Address, bigint> = new Map();
  private readonly allowances: Map<string, bigint> = new Map();

  constructor(
    public readonly address: Address,
    public readonly symbol: string,
  ) {}

  mint(to: Address, amount: bigint): void {
    const key = getAddress(to);
    this.balances.set(key, this.balanceOf(key) + amount);
  }

  approve(owner: Address, spender: Address, amount: bigint): void {
    this.allowances.set(allowanceKey(owner, spender), amount);
  }

  allowance(owner: Address, spender: Address): bigint {
    return this.allowances.get(allowanceKey(owner, spender)) ?? 0n;
  }

  balanceOf(account: Address): bigint {
    return this.balances.get(getAddress(account)) ?? 0n;
  }

  transfer(from: Address, to: Address, amount: bigint): void {
    const balance = this.balanceOf(from);
    if (balance < amount) {
      throw new Error(`ERC20InsufficientBalance: ${from} has ${balance}, needs ${amount}`);
    }
    this.balances.set(getAddress(from), balance - amount);
    this.balances.set(getAddress(to), this.balanceOf(to) + amount);
  }

  transferFrom(spender: Address, from: Address, to: Address, amount: bigint): void {
    const allowed = this.allowance(from, spender);
    if (allowed < amount) {
      throw new Error(`ERC20InsufficientAllowance: ${spender} may spend ${allowed} of ${from}, needs ${amount}`);
    }
    this.transfer(from, to, amount);
    this.allowances.set(allowanceKey(from, spender), allowed - amount);
  }
}

/*
 * Token custody: the vault spends the depositor's allowance on deposit and
 * transfers out of its own balance on withdraw.
 */
export class TokenCustody implements AssetCustody {
  constructor(
    public readonly token: MockErc20,
    private readonly vault: Address,
  ) {}

  pull(from: Address, amount: bigint): void {
    this.token.transferFrom(this.vault, from, this.vault, amount);
  }

  push(to: Address, amount: bigint): void {
    this.token.transfer(this.vault, to, amount);
  }

  balanceOf(account: Address): bigint {
    return this.token.balanceOf(account);
  }
}

/*
 * InMemoryShareVault is a stand-in for the external share vault. Shares are
 * minted 1:1 against assets. It calls the adapter's deposit hook after the
 * mint and its withdraw hook before releasing assets, and undoes its own
 * changes when a hook rejects.
 */
export class InMemoryShareVault implements ShareVault {
  private readonly shares: Map<Depositor, bigint> = new Map();
  private totalShares = 0n;
  private hooks: VaultHooks | undefined;

  constructor(
    public readonly address: Address,
    public readonly custody: AssetCustody,
  ) {}

  /**
   * Wires the adapter hooks. Deposits and withdrawals reject until connected.
   */
  connect(hooks: VaultHooks): void {
    this.hooks = hooks;
  }

  async maxWithdraw(depositor: Depositor): Promise<bigint> {
    return this.balanceOf(depositor);
  }

  balanceOf(depositor: Address): bigint {
    return this.shares.get(getAddress(depositor)) ?? 0n;
  }

  get TotalShares(): bigint {
    return this.totalShares;
  }

  async deposit(depositor: Address, assets: bigint): Promise<bigint> {
    const hooks = this.connected();
    if (assets <= 0n) {
      throw new Error("Deposit amount must be greater than zero");
    }

    this.custody.pull(depositor, assets);
    this.mint(depositor, assets);
    try {
      await hooks.afterDeposit(depositor, assets);
    } catch (err) {
      this.burn(depositor, assets);
      this.custody.push(depositor, assets);
      throw err;
    }
    return assets;
  }

  async withdraw(assets: bigint, receiver: Address, owner: Address): Promise<bigint> {
    const hooks = this.connected();
    const max = await this.maxWithdraw(getAddress(owner));
    if (assets > max) {
      throw new Error(`ERC4626ExceededMaxWithdraw: ${owner} may withdraw ${max}, requested ${assets}`);
    }

    await hooks.beforeWithdraw(owner, assets);

    this.burn(owner, assets);
    this.custody.push(receiver, assets);
    return assets;
  }

  private connected(): VaultHooks {
    if (!this.hooks) {
      throw new Error("Vault is not connected to an adapter");
    }
    return this.hooks;
  }

  private mint(to: Address, shares: bigint): void {
    const key = getAddress(to);
    this.shares.set(key, this.balanceOf(key) + shares);
    this.totalShares += shares;
  }

  private burn(from: Address, shares: bigint): void {
    const key = getAddress(from);
    this.shares.set(key, this.balanceOf(key) - shares);
    this.totalShares -= shares;
  }
}

function allowanceKey(owner: Address, spender: Address): string {
  return `${getAddress(owner)}/${getAddress(spender)}`;
}
