import { describe, expect, test, vi } from "vitest";

import { generateAccount } from "./bootstrap";
import { InMemoryShareVault, MockErc20, NativeCustody, TokenCustody, type VaultHooks } from "./share-vault";

const vaultAddress = generateAccount("vault").address;
const alice = generateAccount("alice").address;

function hooks() {
  return {
    afterDeposit: vi.fn<VaultHooks["afterDeposit"]>(async () => {}),
    beforeWithdraw: vi.fn<VaultHooks["beforeWithdraw"]>(async () => {}),
  } satisfies VaultHooks;
}

function nativeVault() {
  const custody = new NativeCustody(vaultAddress);
  const vault = new InMemoryShareVault(vaultAddress, custody);
  const vaultHooks = hooks();
  vault.connect(vaultHooks);
  return { custody, vault, hooks: vaultHooks };
}

describe("InMemoryShareVault", () => {
  test("mints shares one to one and calls the deposit hook after the mint", async () => {
    const { custody, vault, hooks } = nativeVault();
    custody.fund(alice, 1000n);
    hooks.afterDeposit.mockImplementationOnce(async () => {
      expect(vault.balanceOf(alice)).toBe(1000n);
    });

    await expect(vault.deposit(alice, 1000n)).resolves.toBe(1000n);

    expect(hooks.afterDeposit).toHaveBeenCalledWith(alice, 1000n);
    expect(vault.TotalShares).toBe(1000n);
    expect(custody.balanceOf(vaultAddress)).toBe(1000n);
    expect(await vault.maxWithdraw(alice)).toBe(1000n);
  });

  test("undoes the deposit when the hook rejects", async () => {
    const { custody, vault, hooks } = nativeVault();
    custody.fund(alice, 1000n);
    hooks.afterDeposit.mockRejectedValueOnce(new Error("hook"));

    await expect(vault.deposit(alice, 1000n)).rejects.toThrow("hook");

    expect(vault.TotalShares).toBe(0n);
    expect(custody.balanceOf(alice)).toBe(1000n);
    expect(custody.balanceOf(vaultAddress)).toBe(0n);
  });

  test("calls the withdraw hook before transferring", async () => {
    const { custody, vault, hooks } = nativeVault();
    custody.fund(alice, 1000n);
    await vault.deposit(alice, 1000n);
    const receiver = generateAccount("receiver").address;
    hooks.beforeWithdraw.mockImplementationOnce(async () => {
      expect(custody.balanceOf(receiver)).toBe(0n);
    });

    await vault.withdraw(300n, receiver, alice);

    expect(hooks.beforeWithdraw).toHaveBeenCalledWith(alice, 300n);
    expect(custody.balanceOf(receiver)).toBe(300n);
    expect(vault.balanceOf(alice)).toBe(700n);
  });

  test("does not transfer when the withdraw hook rejects", async () => {
    const { custody, vault, hooks } = nativeVault();
    custody.fund(alice, 1000n);
    await vault.deposit(alice, 1000n);
    hooks.beforeWithdraw.mockRejectedValueOnce(new Error("blocked"));

    await expect(vault.withdraw(300n, alice, alice)).rejects.toThrow("blocked");

    expect(vault.balanceOf(alice)).toBe(1000n);
    expect(custody.balanceOf(alice)).toBe(0n);
  });

  test("refuses to withdraw more than the owner's shares", async () => {
    const { custody, vault, hooks } = nativeVault();
    custody.fund(alice, 100n);
    await vault.deposit(alice, 100n);

    await expect(vault.withdraw(101n, alice, alice)).rejects.toThrow("ERC4626ExceededMaxWithdraw");
    expect(hooks.beforeWithdraw).not.toHaveBeenCalled();
  });

  test("rejects deposits until connected", async () => {
    const vault = new InMemoryShareVault(vaultAddress, new NativeCustody(vaultAddress));

    await expect(vault.deposit(alice, 1n)).rejects.toThrow("Vault is not connected to an adapter");
  });

  test("rejects a zero deposit", async () => {
    const { vault } = nativeVault();

    await expect(vault.deposit(alice, 0n)).rejects.toThrow("Deposit amount must be greater than zero");
  });
});

describe("MockErc20", () => {
  test("spends allowance on transferFrom", () => {
    const token = new MockErc20(generateAccount("token").address, "WBTC");
    token.mint(alice, 100n);
    token.approve(alice, vaultAddress, 60n);

    token.transferFrom(vaultAddress, alice, vaultAddress, 40n);

    expect(token.balanceOf(alice)).toBe(60n);
    expect(token.balanceOf(vaultAddress)).toBe(40n);
    expect(token.allowance(alice, vaultAddress)).toBe(20n);
    expect(() => token.transferFrom(vaultAddress, alice, vaultAddress, 21n)).toThrow("ERC20InsufficientAllowance");
  });

  test("refuses to overdraw a balance", () => {
    const token = new MockErc20(generateAccount("token").address, "WBTC");
    token.mint(alice, 5n);

    expect(() => token.transfer(alice, vaultAddress, 6n)).toThrow("ERC20InsufficientBalance");
  });

  test("backs a token vault through its custody", async () => {
    const token = new MockErc20(generateAccount("token").address, "WBTC");
    const vault = new InMemoryShareVault(vaultAddress, new TokenCustody(token, vaultAddress));
    vault.connect(hooks());
    token.mint(alice, 100n);
    token.approve(alice, vaultAddress, 100n);

    await vault.deposit(alice, 100n);
    await vault.withdraw(30n, alice, alice);

    expect(token.balanceOf(alice)).toBe(30n);
    expect(token.balanceOf(vaultAddress)).toBe(70n);
  });
});
