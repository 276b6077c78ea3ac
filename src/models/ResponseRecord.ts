/**
 * Exchange response record written once per order that reaches the sender
 */

import type { ExchangeVerdict } from './Order';

export interface ResponseRecord {
  orderId: number;
  verdict: ExchangeVerdict;
  latencyMs: number;
  timestamp: Date;
}
