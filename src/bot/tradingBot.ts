import { randomUUID } from 'crypto';
import type { TradingConfig } from '../config';
import type { CoinbaseClient } from '../exchanges/coinbaseClient';
import { splitPair } from '../exchanges/pairs';
import { assertApproved, evaluateOrder, MIN_ORDER_USD, validateQuoteAmount } from '../guard/orderGuard';
import { logger } from '../utils/logger';
import { errorMessage } from '../utils/formatError';

export type ExchangeClient = Pick<
  CoinbaseClient,
  'validateCredentials' | 'getPrice' | 'getOrderBook' | 'getBalance' | 'placeMarketBuy'
>;

export interface OrderResult {
  orderId: string;
  clientOrderId: string;
  productId: string;
  side: 'BUY';
  type: 'MARKET';
  status: 'SIMULATED' | 'PLACED';
  quoteSize: string;
  estimatedFillPrice?: string;
  estimatedQuantity?: string;
  exchangeStatus?: string | null;
  timestamp: string;
}

export interface TradingBotOptions {
  now?: () => Date;
  generateId?: () => string;
  minOrderUsd?: number;
}

export class TradingBot {
  private readonly now: () => Date;
  private readonly generateId: () => string;
  private readonly minOrderUsd: number;

  constructor(
    public readonly config: TradingConfig,
    private readonly client: ExchangeClient,
    options: TradingBotOptions = {}
  ) {
    this.now = options.now ?? (() => new Date());
    this.generateId = options.generateId ?? randomUUID;
    this.minOrderUsd = options.minOrderUsd ?? MIN_ORDER_USD;
  }

  get quoteCurrency() {
    return splitPair(this.config.tradingPair).quote;
  }

  get baseCurrency() {
    return splitPair(this.config.tradingPair).base;
  }

  /**
   * Runs the amount sanity check and the order guard, then either simulates the
   * fill (dry run) or submits a market buy sized in the quote currency.
   * Throws GuardRejection before any write call when the order is not allowed.
   */
  async placeMarketBuy(quoteAmount: number): Promise<OrderResult> {
    const { tradingMode, maxOrderUsd, tradingPair } = this.config;
    logger.info('market_buy_requested', {
      event: 'market_buy_requested',
      pair: tradingPair,
      quoteAmount,
      mode: tradingMode,
    });

    assertApproved(validateQuoteAmount(quoteAmount, this.minOrderUsd));

    let availableBalance = 0;
    if (tradingMode === 'live' && quoteAmount <= maxOrderUsd) {
      availableBalance = (await this.client.getBalance(this.quoteCurrency)) ?? 0;
    }

    const decision = evaluateOrder({
      requestedAmount: quoteAmount,
      maxOrder: maxOrderUsd,
      mode: tradingMode,
      availableBalance,
    });
    if (!decision.approved) {
      logger.error('market_buy_rejected', {
        event: 'market_buy_rejected',
        reason: decision.reason,
        detail: decision.detail,
      });
    }
    assertApproved(decision);

    return this.config.isDryRun ? this.simulateMarketBuy(quoteAmount) : this.executeMarketBuy(quoteAmount);
  }

  private async simulateMarketBuy(quoteAmount: number): Promise<OrderResult> {
    const { tradingPair } = this.config;
    let price = 0;
    try {
      price = (await this.client.getPrice(tradingPair)).price;
    } catch (err) {
      logger.warn('dry_run_price_unavailable', { event: 'dry_run_price_unavailable', error: errorMessage(err) });
    }
    const quantity = price > 0 ? quoteAmount / price : 0;
    const orderId = `DRY-RUN-${this.generateId().replace(/-/g, '').slice(0, 8).toUpperCase()}`;

    const result: OrderResult = {
      orderId,
      clientOrderId: orderId,
      productId: tradingPair,
      side: 'BUY',
      type: 'MARKET',
      status: 'SIMULATED',
      quoteSize: quoteAmount.toFixed(2),
      estimatedFillPrice: price.toFixed(2),
      estimatedQuantity: quantity.toFixed(8),
      timestamp: this.now().toISOString(),
    };
    logger.info('dry_run_order_simulated', { event: 'dry_run_order_simulated', order: result, base: this.baseCurrency });
    return result;
  }

  private async executeMarketBuy(quoteAmount: number): Promise<OrderResult> {
    const { tradingPair } = this.config;
    const clientOrderId = this.generateId();
    const placed = await this.client.placeMarketBuy(tradingPair, quoteAmount, clientOrderId);

    const result: OrderResult = {
      orderId: placed.orderId,
      clientOrderId: placed.clientOrderId,
      productId: tradingPair,
      side: 'BUY',
      type: 'MARKET',
      status: 'PLACED',
      quoteSize: String(quoteAmount),
      exchangeStatus: placed.status,
      timestamp: this.now().toISOString(),
    };
    logger.info('live_order_placed', { event: 'live_order_placed', order: result });
    return result;
  }
}
