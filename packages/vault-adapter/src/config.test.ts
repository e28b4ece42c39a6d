import { describe, expect, test } from "vitest";

import { configFromEnv, parseVaultAdapterConfig, toDelegatedAsset } from "./config";
import { ConfigError } from "./errors";
import { DELEGATION_PRECOMPILE_ADDRESS } from "./precompile";
import { AssetKind } from "./types";

const operator = `0x${"ab".repeat(32)}`;

describe("parseVaultAdapterConfig", () => {
  test("applies defaults", () => {
    const config = parseVaultAdapterConfig({ operator, blueprintSelection: [1, "2", 3n] });

    expect(config).toStrictEqual({
      operator,
      blueprintSelection: [1n, 2n, 3n],
      gateway: DELEGATION_PRECOMPILE_ADDRESS,
      asset: { kind: "native" },
      label: "VaultAdapter",
    });
  });

  test("lowercases the operator and checksums the token address", () => {
    const config = parseVaultAdapterConfig({
      operator: `0x${"AB".repeat(32)}`,
      blueprintSelection: [7],
      asset: { kind: "erc20", token: "0x5aaeb6053f3e94c9b9a09f33669435e7ef1beaed" },
    });

    expect(config.operator).toBe(operator);
    expect(config.asset).toStrictEqual({ kind: "erc20", token: "0x5aAeb6053F3E94C9b9A09f33669435E7Ef1BeAed" });
  });

  test("rejects an empty blueprint selection", () => {
    expect(() => parseVaultAdapterConfig({ operator, blueprintSelection: [] })).toThrow(ConfigError);
  });

  test("rejects an operator that is not 32 bytes", () => {
    expect(() => parseVaultAdapterConfig({ operator: "0xabcd", blueprintSelection: [1] })).toThrow(
      "operator: must be a 32-byte hex string",
    );
  });

  test("rejects blueprint ids outside uint64", () => {
    expect(() => parseVaultAdapterConfig({ operator, blueprintSelection: [2n ** 64n] })).toThrow(
      "blueprintSelection.0: must fit in uint64",
    );
  });

  test("collects every issue", () => {
    try {
      parseVaultAdapterConfig({ blueprintSelection: [], asset: { kind: "erc20", token: "0x1234" } });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigError);
      if (err instanceof ConfigError) {
        expect(err.issues.map((issue) => issue.path.join("."))).toStrictEqual([
          "operator",
          "blueprintSelection",
          "asset.token",
        ]);
      }
    }
  });
});

describe("configFromEnv", () => {
  test("reads a token vault", () => {
    const config = configFromEnv({
      VAULT_OPERATOR: operator,
      VAULT_BLUEPRINTS: "1, 2,3",
      VAULT_ASSET_TOKEN: "0x5aAeb6053F3E94C9b9A09f33669435E7Ef1BeAed",
      VAULT_LABEL: "TokenVault",
    });

    expect(config.blueprintSelection).toStrictEqual([1n, 2n, 3n]);
    expect(config.asset).toStrictEqual({ kind: "erc20", token: "0x5aAeb6053F3E94C9b9A09f33669435E7Ef1BeAed" });
    expect(config.label).toBe("TokenVault");
    expect(config.gateway).toBe(DELEGATION_PRECOMPILE_ADDRESS);
  });

  test("defaults to the native asset", () => {
    const config = configFromEnv({ VAULT_OPERATOR: operator, VAULT_BLUEPRINTS: "5" });

    expect(config.asset).toStrictEqual({ kind: "native" });
  });

  test("fails without blueprints", () => {
    expect(() => configFromEnv({ VAULT_OPERATOR: operator })).toThrow(ConfigError);
  });
});

describe("toDelegatedAsset", () => {
  test("maps config assets onto the wire discriminator", () => {
    expect(toDelegatedAsset({ kind: "native" })).toStrictEqual({ kind: AssetKind.Native });
    expect(toDelegatedAsset({ kind: "erc20", token: "0x5aAeb6053F3E94C9b9A09f33669435E7Ef1BeAed" })).toStrictEqual({
      kind: AssetKind.Erc20,
      token: "0x5aAeb6053F3E94C9b9A09f33669435E7Ef1BeAed",
    });
  });
});
