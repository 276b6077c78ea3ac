/**
 * Order and order request data models
 */

/** `modified` is still queued: it marks a queued order whose price or quantity was replaced */
export type OrderStatus = 'new' | 'queued' | 'sent' | 'modified' | 'cancelled' | 'rejected';
export type OrderSide = 'buy' | 'sell';
export type ExchangeVerdict = 'accept' | 'reject';

export interface Order {
  orderId: number;
  symbol: string;
  side: OrderSide;
  price: number;
  quantity: number;
  status: OrderStatus;
  submittedAt: Date;
  sentAt?: Date;
}

export interface NewOrderInput {
  orderId?: number;
  symbol: string;
  side: OrderSide;
  price: number;
  quantity: number;
}

/**
 * Upstream request envelope routed by OrderManager.onData
 */
export type OrderRequest =
  | ({ type: 'new' } & NewOrderInput)
  | { type: 'modify'; orderId: number; price: number; quantity: number }
  | { type: 'cancel'; orderId: number };

export type RequestOutcome = 'sent' | 'queued' | 'rejected' | 'modified' | 'cancelled' | 'ignored';

export interface RequestResult {
  orderId: number;
  outcome: RequestOutcome;
  message: string;
  reason?: string;
  order?: Order;
}
