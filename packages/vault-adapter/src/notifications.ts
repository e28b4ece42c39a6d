import type { Depositor } from "./types";

export type Notification =
  | { type: "UnstakeScheduled"; depositor: Depositor; amount: bigint; timestamp: number }
  | { type: "UnstakeCancelled"; depositor: Depositor; amount: bigint }
  | { type: "UnstakeExecuted"; depositor: Depositor; amount: bigint }
  | { type: "WithdrawScheduled"; depositor: Depositor; amount: bigint; timestamp: number }
  | { type: "WithdrawCancelled"; depositor: Depositor; amount: bigint }
  | { type: "WithdrawExecuted"; depositor: Depositor; amount: bigint; remaining: bigint }
  | { type: "AssetsDelegated"; depositor: Depositor; amount: bigint };

export type NotificationListener = (notification: Notification) => void;

/*
 * Fan-out of committed transitions to off-band observers.
 * A throwing listener does not affect the transition or the other listeners.
 */
export class NotificationBus {
  private readonly listeners: Set<NotificationListener> = new Set();

  constructor(private readonly onListenerError: (err: unknown) => void) {}

  /**
   * Registers a listener and returns the function that removes it again.
   */
  subscribe(listener: NotificationListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  emit(notification: Notification): void {
    for (const listener of this.listeners) {
      try {
        listener(notification);
      } catch (err) {
        this.onListenerError(err);
      }
    }
  }
}
