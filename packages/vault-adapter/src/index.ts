export {
  configFromEnv,
  parseVaultAdapterConfig,
  toDelegatedAsset,
  type VaultAdapterConfig,
  type VaultAdapterConfigInput,
  VaultAdapterConfigSchema,
} from "./config";
export { ConfigError, type FailureReason, GatewayCallError, type GatewayMethod, VaultAdapterError } from "./errors";
export type { DelegationGateway } from "./gateway";
export { RequestLedger } from "./ledger";
export type { Notification, NotificationListener } from "./notifications";
export { type Logger, WithdrawalOrchestrator, type WithdrawalOrchestratorOptions } from "./orchestrator";
export {
  DELEGATION_PRECOMPILE_ADDRESS,
  delegationPrecompileAbi,
  PrecompileDelegationGateway,
  type TransactionSender,
  viemTransactionSender,
} from "./precompile";
export { KeyedQueue } from "./queue";
export {
  AssetKind,
  type DelegatedAsset,
  type Depositor,
  type OperatorId,
  type RequestView,
  type ShareVault,
  type UnstakeRequest,
  UnstakeState,
  type WithdrawRequest,
  WithdrawState,
} from "./types";
