import type { TradingMode } from '../config';

export type RejectionReason =
  | 'exceeds maximum'
  | 'insufficient balance'
  | 'must be positive'
  | 'below minimum';

export type GuardDecision =
  | { approved: true }
  | { approved: false; reason: RejectionReason; detail: string };

export interface OrderCheck {
  requestedAmount: number;
  maxOrder: number;
  mode: TradingMode;
  /** Quote-currency balance available to spend; only consulted in live mode. */
  availableBalance: number;
}

/** Coinbase rejects BTC-USD market buys below roughly one dollar of quote. */
export const MIN_ORDER_USD = 1;

export class GuardRejection extends Error {
  public readonly reason: RejectionReason;

  constructor(reason: RejectionReason, detail: string) {
    super(`Order rejected (${reason}): ${detail}`);
    this.name = 'GuardRejection';
    this.reason = reason;
  }
}

function fmt(amount: number) {
  return `$${amount.toFixed(2)}`;
}

export function evaluateOrder(check: OrderCheck): GuardDecision {
  const { requestedAmount, maxOrder, mode, availableBalance } = check;

  if (requestedAmount > maxOrder) {
    return {
      approved: false,
      reason: 'exceeds maximum',
      detail: `${fmt(requestedAmount)} exceeds maximum allowed ${fmt(maxOrder)}; raise MAX_ORDER_USD if intentional`,
    };
  }

  if (mode === 'live' && availableBalance < requestedAmount) {
    return {
      approved: false,
      reason: 'insufficient balance',
      detail: `available ${fmt(availableBalance)} < requested ${fmt(requestedAmount)}`,
    };
  }

  return { approved: true };
}

export function validateQuoteAmount(amount: number, minOrder: number = MIN_ORDER_USD): GuardDecision {
  if (!Number.isFinite(amount) || amount <= 0) {
    return { approved: false, reason: 'must be positive', detail: `order amount must be positive, got ${amount}` };
  }
  if (amount < minOrder) {
    return { approved: false, reason: 'below minimum', detail: `order amount must be at least ${fmt(minOrder)}` };
  }
  return { approved: true };
}

export function assertApproved(decision: GuardDecision): void {
  if (!decision.approved) {
    throw new GuardRejection(decision.reason, decision.detail);
  }
}
