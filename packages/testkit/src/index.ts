export {
  bootstrapNativeAdapter,
  type BootstrapOptions,
  bootstrapTokenAdapter,
  generateAccount,
  type NativeAdapterSetup,
  silentLogger,
  TEST_OPERATOR,
  type TokenAdapterSetup,
} from "./bootstrap";
export { DelegationPrecompileSimulator, type PrecompileFunction, type SimulatedCall } from "./precompile-simulator";
export {
  type AssetCustody,
  InMemoryShareVault,
  MockErc20,
  NativeCustody,
  TokenCustody,
  type VaultHooks,
} from "./share-vault";
