import {
  AssetKind,
  type Logger,
  parseVaultAdapterConfig,
  PrecompileDelegationGateway,
  type VaultAdapterConfigInput,
  WithdrawalOrchestrator,
} from "@liquid-delegation/vault-adapter";
import { type Account, type Address, keccak256, toHex } from "viem";
import { privateKeyToAccount } from "viem/accounts";

import { DelegationPrecompileSimulator } from "./precompile-simulator";
import { InMemoryShareVault, MockErc20, NativeCustody, TokenCustody } from "./share-vault";

export const TEST_OPERATOR = keccak256(toHex("operator"));

/**
 * Deterministic account for a label, the same label always gives the same account.
 */
export function generateAccount(salt: string): Account {
  return privateKeyToAccount(keccak256(toHex(salt)));
}

/**
 * A logger that drops everything, for tests that do not assert on output.
 */
export const silentLogger: Logger = {
  log: () => {},
  warn: () => {},
};

type Common = {
  precompile: DelegationPrecompileSimulator;
  vault: InMemoryShareVault;
  orchestrator: WithdrawalOrchestrator;
};

export type NativeAdapterSetup = Common & { kind: AssetKind.Native; custody: NativeCustody };
export type TokenAdapterSetup = Common & { kind: AssetKind.Erc20; custody: TokenCustody; token: MockErc20 };

export interface BootstrapOptions {
  config?: Partial<VaultAdapterConfigInput>;
  logger?: Logger;
  now?: () => number;
}

function build(custody: NativeCustody | TokenCustody, vaultAddress: Address, options: BootstrapOptions): Common {
  const config = parseVaultAdapterConfig({
    operator: TEST_OPERATOR,
    blueprintSelection: [1n],
    ...options.config,
    asset: custody instanceof TokenCustody ? { kind: "erc20", token: custody.token.address } : { kind: "native" },
  });
  const precompile = new DelegationPrecompileSimulator(config.gateway);
  const vault = new InMemoryShareVault(vaultAddress, custody);
  const orchestrator = new WithdrawalOrchestrator({
    config,
    gateway: PrecompileDelegationGateway.fromConfig(config, precompile.send),
    vault,
    logger: options.logger ?? silentLogger,
    now: options.now,
  });
  vault.connect(orchestrator);
  return { precompile, vault, orchestrator };
}

/**
 * Stands up a native-asset vault wired to an adapter over a simulated precompile.
 */
export function bootstrapNativeAdapter(options: BootstrapOptions = {}): NativeAdapterSetup {
  const vaultAddress = generateAccount("vault").address;
  const custody = new NativeCustody(vaultAddress);
  return { kind: AssetKind.Native, custody, ...build(custody, vaultAddress, options) };
}

/**
 * Stands up a token vault wired to an adapter over a simulated precompile.
 */
export function bootstrapTokenAdapter(options: BootstrapOptions & { symbol?: string } = {}): TokenAdapterSetup {
  const vaultAddress = generateAccount("vault").address;
  const token = new MockErc20(generateAccount("token").address, options.symbol ?? "WBTC");
  const custody = new TokenCustody(token, vaultAddress);
  return { kind: AssetKind.Erc20, custody, token, ...build(custody, vaultAddress, options) };
}
