import { getAddress, type Hex, isAddress, isHex } from "viem";
import * as z from "zod";

import { ConfigError } from "./errors";
import { DELEGATION_PRECOMPILE_ADDRESS } from "./precompile";
import { AssetKind, type DelegatedAsset } from "./types";

const MAX_UINT64 = 2n ** 64n - 1n;

const AddressSchema = z
  .string()
  .refine((value) => isAddress(value, { strict: false }), { message: "must be a 20-byte hex address" })
  .transform((value) => getAddress(value));

const OperatorSchema = z
  .string()
  .transform((value) => value.toLowerCase())
  .refine((value): value is Hex => isHex(value, { strict: true }) && value.length === 66, {
    message: "must be a 32-byte hex string",
  });

const BlueprintIdSchema = z
  .union([z.bigint(), z.number().int(), z.string().regex(/^\d+$/, "must be a decimal integer")])
  .transform((value) => BigInt(value))
  .refine((value) => value >= 0n && value <= MAX_UINT64, { message: "must fit in uint64" });

const AssetSchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("native") }),
  z.object({ kind: z.literal("erc20"), token: AddressSchema }),
]);

export const VaultAdapterConfigSchema = z.object({
  operator: OperatorSchema,
  blueprintSelection: z.array(BlueprintIdSchema).nonempty("must select at least one blueprint"),
  gateway: AddressSchema.default(DELEGATION_PRECOMPILE_ADDRESS),
  asset: AssetSchema.default({ kind: "native" }),
  label: z.string().min(1).default("VaultAdapter"),
});
export type VaultAdapterConfigInput = z.input<typeof VaultAdapterConfigSchema>;
export type VaultAdapterConfig = z.output<typeof VaultAdapterConfigSchema>;

/**
 * Validates adapter configuration. Throws a ConfigError listing every issue.
 */
export function parseVaultAdapterConfig(input: unknown): VaultAdapterConfig {
  const result = VaultAdapterConfigSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigError(result.error.issues);
  }
  return result.data;
}

/**
 * Reads the adapter configuration from environment variables:
 * VAULT_OPERATOR, VAULT_BLUEPRINTS (comma separated), VAULT_GATEWAY,
 * VAULT_ASSET_TOKEN (unset for the native asset) and VAULT_LABEL.
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): VaultAdapterConfig {
  const blueprints = (env.VAULT_BLUEPRINTS ?? "")
    .split(",")
    .map((id) => id.trim())
    .filter((id) => id.length > 0);

  return parseVaultAdapterConfig({
    operator: env.VAULT_OPERATOR,
    blueprintSelection: blueprints,
    gateway: env.VAULT_GATEWAY || undefined,
    asset: env.VAULT_ASSET_TOKEN ? { kind: "erc20", token: env.VAULT_ASSET_TOKEN } : { kind: "native" },
    label: env.VAULT_LABEL || undefined,
  });
}

/** Maps the configured asset onto the gateway's wire discriminator. */
export function toDelegatedAsset(asset: VaultAdapterConfig["asset"]): DelegatedAsset {
  return asset.kind === "erc20" ? { kind: AssetKind.Erc20, token: asset.token } : { kind: AssetKind.Native };
}
