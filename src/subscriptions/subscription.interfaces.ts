import type { ITransactionSummary } from '../core/ports/chain/chain-data.interfaces';

export enum SubscriptionKind {
  BLOCKS = 'blocks',
  ADDRESS = 'address',
}

export enum SubscriptionMode {
  PUSH = 'push',
  POLL = 'poll',
}

export enum SubscriptionEventType {
  NEW_BLOCK = 'new_block',
  NEW_ADDRESS_TRANSACTION = 'new_address_transaction',
  PENDING_TRANSACTION = 'pending_transaction',
  SUBSCRIPTION_ERROR = 'subscription_error',
}

export interface INewBlockEvent {
  readonly type: SubscriptionEventType.NEW_BLOCK;
  readonly subscriptionId: string;
  readonly number: number;
  readonly hash: string;
}

export interface INewAddressTransactionEvent {
  readonly type: SubscriptionEventType.NEW_ADDRESS_TRANSACTION;
  readonly subscriptionId: string;
  readonly address: string;
  readonly transaction: ITransactionSummary;
  readonly blockNumber: number;
}

// Reserved for mempool-capable backends; no subscription kind produces it yet.
export interface IPendingTransactionEvent {
  readonly type: SubscriptionEventType.PENDING_TRANSACTION;
  readonly subscriptionId: string;
  readonly transaction: ITransactionSummary;
}

/** Terminal event: the subscription is already gone when consumers see it. */
export interface ISubscriptionErrorEvent {
  readonly type: SubscriptionEventType.SUBSCRIPTION_ERROR;
  readonly subscriptionId: string;
  readonly message: string;
}

export type SubscriptionEvent =
  | INewBlockEvent
  | INewAddressTransactionEvent
  | IPendingTransactionEvent
  | ISubscriptionErrorEvent;

export interface IActiveSubscription {
  readonly id: string;
  readonly kind: SubscriptionKind;
  readonly mode: SubscriptionMode;
  readonly address: string | null;
}

export interface ISubscriptionTask extends IActiveSubscription {
  readonly controller: AbortController;
}
