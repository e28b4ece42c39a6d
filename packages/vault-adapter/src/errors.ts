import type { ZodIssue } from "zod";

export type FailureReason =
  | "ZeroAmount"
  | "ExceedsClaimable"
  | "ExceedsUnstaked"
  | "ExceedsScheduled"
  | "NothingToCancel"
  | "InvalidState"
  | "DelegationFailed"
  | "DelegationNotPossible"
  | "InvalidDepositor";

/**
 * A rejected adapter operation. `reason` names why, so callers can branch on it
 * without parsing the message.
 */
export class VaultAdapterError extends Error {
  constructor(
    public readonly reason: FailureReason,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "VaultAdapterError";
  }
}

export type GatewayMethod =
  | "delegate"
  | "scheduleUnstake"
  | "cancelUnstake"
  | "scheduleWithdraw"
  | "executeWithdraw"
  | "cancelWithdraw";

/**
 * Raw failure of a call into the delegation gateway. The call had no effect.
 */
export class GatewayCallError extends Error {
  constructor(
    public readonly method: GatewayMethod,
    cause: unknown,
  ) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`Gateway call ${method} failed: ${detail}`, { cause });
    this.name = "GatewayCallError";
  }
}

export class ConfigError extends Error {
  constructor(public readonly issues: ZodIssue[]) {
    super(`Invalid vault adapter config: ${issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`).join("; ")}`);
    this.name = "ConfigError";
  }
}
