import { decodeFunctionData, type Hex, zeroAddress } from "viem";
import { describe, expect, test, vi } from "vitest";

import { parseVaultAdapterConfig } from "./config";
import { GatewayCallError } from "./errors";
import {
  DELEGATION_PRECOMPILE_ADDRESS,
  delegationPrecompileAbi,
  PrecompileDelegationGateway,
  type TransactionSender,
} from "./precompile";
import { AssetKind } from "./types";

const operator = `0x${"0a".repeat(32)}` as const;
const token = "0x5aAeb6053F3E94C9b9A09f33669435E7Ef1BeAed";
const txHash: Hex = `0x${"ff".repeat(32)}`;

function recordingGateway() {
  const send = vi.fn<TransactionSender>(async () => txHash);
  const gateway = new PrecompileDelegationGateway({ send });
  const decodeLast = () => {
    const [to, data] = send.mock.calls[send.mock.calls.length - 1];
    return { to, ...decodeFunctionData({ abi: delegationPrecompileAbi, data }) };
  };
  return { send, gateway, decodeLast };
}

describe("PrecompileDelegationGateway", () => {
  test("delegates native assets with the zero token address", async () => {
    const { gateway, decodeLast } = recordingGateway();

    await gateway.delegate(operator, { kind: AssetKind.Native }, 1000n, [1n, 4n]);

    expect(decodeLast()).toStrictEqual({
      to: DELEGATION_PRECOMPILE_ADDRESS,
      functionName: "delegate",
      args: [operator, 0, zeroAddress, 1000n, [1n, 4n]],
    });
  });

  test("encodes the token for erc20 assets", async () => {
    const { gateway, decodeLast } = recordingGateway();

    await gateway.scheduleUnstake(operator, { kind: AssetKind.Erc20, token }, 250n);

    expect(decodeLast()).toStrictEqual({
      to: DELEGATION_PRECOMPILE_ADDRESS,
      functionName: "scheduleDelegatorUnstake",
      args: [operator, 1, token, 250n],
    });
  });

  test("maps every gateway call onto its precompile function", async () => {
    const { gateway, decodeLast } = recordingGateway();
    const asset = { kind: AssetKind.Native } as const;

    await gateway.cancelUnstake(operator, asset, 5n);
    expect(decodeLast().functionName).toBe("cancelDelegatorUnstake");

    await gateway.scheduleWithdraw(asset, 6n);
    expect(decodeLast()).toMatchObject({ functionName: "scheduleWithdraw", args: [0, zeroAddress, 6n] });

    await gateway.executeWithdraw();
    expect(decodeLast().functionName).toBe("executeWithdraw");

    await gateway.cancelWithdraw(asset, 7n);
    expect(decodeLast()).toMatchObject({ functionName: "cancelWithdraw", args: [0, zeroAddress, 7n] });
  });

  test("sends to a configured address", async () => {
    const send = vi.fn<TransactionSender>(async () => txHash);
    const address = "0x0000000000000000000000000000000000000900";
    const gateway = new PrecompileDelegationGateway({ send, address });

    await gateway.executeWithdraw();

    expect(gateway.Address).toBe(address);
    expect(send.mock.calls[0][0]).toBe(address);
  });

  test("sends to the configured gateway address", async () => {
    const send = vi.fn<TransactionSender>(async () => txHash);
    const config = parseVaultAdapterConfig({
      operator,
      blueprintSelection: [1],
      gateway: "0x0000000000000000000000000000000000000900",
    });
    const gateway = PrecompileDelegationGateway.fromConfig(config, send);

    await gateway.delegate(operator, { kind: AssetKind.Native }, 1n, [1n]);

    expect(send.mock.calls[0][0]).toBe("0x0000000000000000000000000000000000000900");
  });

  test("wraps a failed submission into a GatewayCallError", async () => {
    const send = vi.fn<TransactionSender>(async () => {
      throw new Error("execution reverted");
    });
    const gateway = new PrecompileDelegationGateway({ send });

    const err = await gateway.cancelWithdraw({ kind: AssetKind.Native }, 1n).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(GatewayCallError);
    if (err instanceof GatewayCallError) {
      expect(err.method).toBe("cancelWithdraw");
      expect(err.message).toBe("Gateway call cancelWithdraw failed: execution reverted");
    }
  });
});
