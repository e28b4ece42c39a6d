import type { DelegatedAsset, OperatorId } from "./types";

/*
 * DelegationGateway is the boundary to the external delegation authority.
 *
 * Every call is atomic: it either fully applies at the authority or rejects
 * with a GatewayCallError and changes nothing. The adapter does not retry.
 */
export interface DelegationGateway {
  delegate(operator: OperatorId, asset: DelegatedAsset, amount: bigint, blueprintSelection: readonly bigint[]): Promise<void>;

  scheduleUnstake(operator: OperatorId, asset: DelegatedAsset, amount: bigint): Promise<void>;

  cancelUnstake(operator: OperatorId, asset: DelegatedAsset, amount: bigint): Promise<void>;

  scheduleWithdraw(asset: DelegatedAsset, amount: bigint): Promise<void>;

  executeWithdraw(): Promise<void>;

  cancelWithdraw(asset: DelegatedAsset, amount: bigint): Promise<void>;
}
