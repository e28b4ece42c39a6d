import { toDelegatedAsset, type VaultAdapterConfig } from "./config";
import { GatewayCallError, VaultAdapterError } from "./errors";
import type { DelegationGateway } from "./gateway";
import { RequestLedger } from "./ledger";
import { type Notification, NotificationBus, type NotificationListener } from "./notifications";
import { KeyedQueue } from "./queue";
import {
  type DelegatedAsset,
  type Depositor,
  type OperatorId,
  type RequestView,
  type ShareVault,
  UnstakeState,
  WithdrawState,
} from "./types";

export type Logger = Pick<Console, "log" | "warn">;

export interface WithdrawalOrchestratorOptions {
  config: VaultAdapterConfig;
  gateway: DelegationGateway;
  vault: ShareVault;
  logger?: Logger;
  // clock for request timestamps, in ms
  now?: () => number;
}

type DelegationResult = { ok: true } | { ok: false; error: GatewayCallError };

/*
 * WithdrawalOrchestrator drives the per-depositor unwind of a delegated vault
 * position and keeps the RequestLedger in step with the delegation gateway.
 *
 * Lifecycle of a depositor's funds:
 *  - afterDeposit: the freshly deposited assets are delegated to the operator
 *  - scheduleUnstake: part of the claimable balance starts unbonding
 *  - markUnstakeExecuted: the authority reports the unstake as executed
 *  - scheduleWithdraw: executed unstake amount moves into the withdraw queue
 *  - beforeWithdraw: the vault releases assets out of the withdraw queue
 * cancelUnstake and cancelWithdrawAndRedelegate rewind the first and the
 * second phase respectively.
 *
 * Gateway calls come before any ledger write, so a failed call leaves the
 * ledger untouched. Operations of one depositor are serialized; operations
 * of different depositors are not.
 */
export class WithdrawalOrchestrator {
  private readonly ledger: RequestLedger = new RequestLedger();
  private readonly queue: KeyedQueue<Depositor> = new KeyedQueue();
  private readonly bus: NotificationBus;

  private readonly gateway: DelegationGateway;
  private readonly vault: ShareVault;
  private readonly operator: OperatorId;
  private readonly asset: DelegatedAsset;
  private readonly blueprintSelection: readonly bigint[];
  private readonly label: string;
  private readonly logger: Logger;
  private readonly now: () => number;

  constructor(options: WithdrawalOrchestratorOptions) {
    this.gateway = options.gateway;
    this.vault = options.vault;
    this.operator = options.config.operator;
    this.asset = toDelegatedAsset(options.config.asset);
    this.blueprintSelection = options.config.blueprintSelection;
    this.label = options.config.label;
    this.logger = options.logger ?? console;
    this.now = options.now ?? Date.now;
    this.bus = new NotificationBus((err) => {
      this.logger.warn(`[${this.label}] Notification listener failed: ${String(err)}`);
    });
  }

  get Asset(): DelegatedAsset {
    return this.asset;
  }

  get Operator(): OperatorId {
    return this.operator;
  }

  /**
   * Registers an observer of committed transitions.
   * @returns the function that unsubscribes it
   */
  public subscribe(listener: NotificationListener): () => void {
    return this.bus.subscribe(listener);
  }

  public getUnstakeRequest(depositor: string): RequestView<UnstakeState> {
    return this.ledger.viewUnstake(RequestLedger.key(depositor));
  }

  public getWithdrawRequest(depositor: string): RequestView<WithdrawState> {
    return this.ledger.viewWithdraw(RequestLedger.key(depositor));
  }

  /**
   * Deposit hook, called by the vault after it minted the depositor's shares.
   * Delegates the deposited assets to the operator.
   *
   * A failed delegation is rejected with `DelegationFailed`; the vault must
   * then revert the whole deposit, share mint included.
   */
  public async afterDeposit(depositor: string, amount: bigint): Promise<void> {
    const key = RequestLedger.key(depositor);
    assertPositive(amount);

    return this.queue.run(key, async () => {
      const result = await this.tryDelegate(amount);
      if (!result.ok) {
        this.logger.warn(`[${this.label}] Delegation of ${amount} for ${key} failed: ${result.error.message}`);
        throw new VaultAdapterError("DelegationFailed", `Delegation of ${amount} failed`, { cause: result.error });
      }

      this.logger.log(`[${this.label}] Delegated ${amount} for ${key}`);
      this.notify({ type: "AssetsDelegated", depositor: key, amount });
    });
  }

  /**
   * Starts unbonding `amount` of the depositor's claimable balance.
   * Replaces any unstake request the depositor already has.
   */
  public async scheduleUnstake(depositor: string, amount: bigint): Promise<void> {
    const key = RequestLedger.key(depositor);
    assertPositive(amount);

    return this.queue.run(key, async () => {
      const claimable = await this.vault.maxWithdraw(key);
      if (amount > claimable) {
        throw new VaultAdapterError("ExceedsClaimable", `Unstake amount ${amount} exceeds claimable balance ${claimable}`);
      }

      await this.gateway.scheduleUnstake(this.operator, this.asset, amount);

      const timestamp = this.now();
      this.ledger.putUnstake(key, { amount, timestamp, state: UnstakeState.Scheduled });

      this.logger.log(`[${this.label}] Unstake of ${amount} scheduled for ${key}`);
      this.notify({ type: "UnstakeScheduled", depositor: key, amount, timestamp });
    });
  }

  /**
   * Cancels the depositor's scheduled unstake in full.
   */
  public async cancelUnstake(depositor: string): Promise<void> {
    const key = RequestLedger.key(depositor);

    return this.queue.run(key, async () => {
      const request = this.ledger.getUnstake(key);
      if (request?.state !== UnstakeState.Scheduled) {
        throw new VaultAdapterError("NothingToCancel", `No scheduled unstake to cancel for ${key}`);
      }

      await this.gateway.cancelUnstake(this.operator, this.asset, request.amount);

      this.ledger.deleteUnstake(key);

      this.logger.log(`[${this.label}] Unstake of ${request.amount} cancelled for ${key}`);
      this.notify({ type: "UnstakeCancelled", depositor: key, amount: request.amount });
    });
  }

  /**
   * Keeper transition: marks the depositor's scheduled unstake as executed once
   * the delegation authority has completed it. Makes no gateway call.
   */
  public async markUnstakeExecuted(depositor: string): Promise<void> {
    const key = RequestLedger.key(depositor);

    return this.queue.run(key, async () => {
      const request = this.ledger.getUnstake(key);
      if (request?.state !== UnstakeState.Scheduled) {
        throw new VaultAdapterError("InvalidState", `No scheduled unstake to execute for ${key}`);
      }

      this.ledger.putUnstake(key, { ...request, state: UnstakeState.Executed });

      this.logger.log(`[${this.label}] Unstake of ${request.amount} executed for ${key}`);
      this.notify({ type: "UnstakeExecuted", depositor: key, amount: request.amount });
    });
  }

  /**
   * Moves `amount` of an executed unstake into the withdraw queue.
   * Replaces any withdraw request the depositor already has.
   */
  public async scheduleWithdraw(depositor: string, amount: bigint): Promise<void> {
    const key = RequestLedger.key(depositor);

    return this.queue.run(key, async () => {
      const unstake = this.ledger.getUnstake(key);
      if (unstake?.state !== UnstakeState.Executed) {
        throw new VaultAdapterError("InvalidState", `Unstake for ${key} is not executed`);
      }
      assertPositive(amount);
      if (amount > unstake.amount) {
        throw new VaultAdapterError("ExceedsUnstaked", `Withdraw amount ${amount} exceeds unstaked amount ${unstake.amount}`);
      }

      await this.gateway.scheduleWithdraw(this.asset, amount);

      const timestamp = this.now();
      this.ledger.putWithdraw(key, { amount, timestamp, state: WithdrawState.Scheduled });
      // a zero remainder deletes the unstake request
      this.ledger.putUnstake(key, { ...unstake, amount: unstake.amount - amount });

      this.logger.log(`[${this.label}] Withdraw of ${amount} scheduled for ${key}`);
      this.notify({ type: "WithdrawScheduled", depositor: key, amount, timestamp });
    });
  }

  /**
   * Cancels the depositor's scheduled withdraw and delegates the amount again.
   *
   * If the cancel succeeds but the redelegation fails, the cancel cannot be
   * undone: the operation rejects with `DelegationNotPossible` and the withdraw
   * request is left as it was.
   */
  public async cancelWithdrawAndRedelegate(depositor: string): Promise<void> {
    const key = RequestLedger.key(depositor);

    return this.queue.run(key, async () => {
      const request = this.ledger.getWithdraw(key);
      if (request?.state !== WithdrawState.Scheduled) {
        throw new VaultAdapterError("NothingToCancel", `No scheduled withdraw to cancel for ${key}`);
      }

      await this.gateway.cancelWithdraw(this.asset, request.amount);

      const result = await this.tryDelegate(request.amount);
      if (!result.ok) {
        this.logger.warn(
          `[${this.label}] Withdraw of ${request.amount} for ${key} cancelled at the gateway but not redelegated: ${result.error.message}`,
        );
        throw new VaultAdapterError("DelegationNotPossible", `Redelegation of ${request.amount} failed`, {
          cause: result.error,
        });
      }

      this.ledger.deleteWithdraw(key);

      this.logger.log(`[${this.label}] Withdraw of ${request.amount} cancelled and redelegated for ${key}`);
      this.notify({ type: "WithdrawCancelled", depositor: key, amount: request.amount });
      this.notify({ type: "AssetsDelegated", depositor: key, amount: request.amount });
    });
  }

  /**
   * Withdraw hook, called by the vault before it releases `amount` of assets
   * owned by `owner`. The vault must not transfer if this rejects.
   */
  public async beforeWithdraw(owner: string, amount: bigint): Promise<void> {
    const key = RequestLedger.key(owner);

    return this.queue.run(key, async () => {
      const request = this.ledger.getWithdraw(key);
      if (request?.state !== WithdrawState.Scheduled) {
        throw new VaultAdapterError("InvalidState", `No scheduled withdraw for ${key}`);
      }
      assertPositive(amount);
      if (amount > request.amount) {
        throw new VaultAdapterError(
          "ExceedsScheduled",
          `Withdraw amount ${amount} exceeds scheduled amount ${request.amount}`,
        );
      }

      await this.gateway.executeWithdraw();

      const remaining = request.amount - amount;
      this.ledger.putWithdraw(key, { ...request, amount: remaining });

      this.logger.log(`[${this.label}] Withdraw of ${amount} executed for ${key}, ${remaining} remaining`);
      this.notify({ type: "WithdrawExecuted", depositor: key, amount, remaining });
    });
  }

  /**
   * Any rejection of `delegate` is a failed delegation outcome. Rejections that
   * are not already a GatewayCallError are wrapped into one.
   */
  private async tryDelegate(amount: bigint): Promise<DelegationResult> {
    try {
      await this.gateway.delegate(this.operator, this.asset, amount, this.blueprintSelection);
      return { ok: true };
    } catch (err) {
      return { ok: false, error: err instanceof GatewayCallError ? err : new GatewayCallError("delegate", err) };
    }
  }

  private notify(notification: Notification): void {
    this.bus.emit(notification);
  }
}

function assertPositive(amount: bigint): void {
  if (amount <= 0n) {
    throw new VaultAdapterError("ZeroAmount", "Amount must be greater than zero");
  }
}
