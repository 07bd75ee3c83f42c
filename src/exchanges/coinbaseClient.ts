import { AuthenticationError, coinbase, NetworkError, PermissionDenied } from 'ccxt';
import { logger } from '../utils/logger';
import { errorMessage } from '../utils/formatError';
import { toExchangeSymbol } from './pairs';

export type ApiErrorKind = 'network' | 'authentication' | 'exchange';

export class ApiError extends Error {
  public readonly kind: ApiErrorKind;
  public readonly operation: string;

  constructor(operation: string, kind: ApiErrorKind, message: string, options?: { cause?: unknown }) {
    super(`${operation} failed (${kind}): ${message}`, options);
    this.name = 'ApiError';
    this.kind = kind;
    this.operation = operation;
  }
}

export interface CoinbaseCredentials {
  apiKey: string;
  apiSecret: string;
}

export interface AccountSummary {
  currency: string;
  /** Spendable amount reported by the account, or null when the exchange omits it. */
  available: number | null;
}

export interface CredentialCheck {
  accountCount: number;
  accounts: AccountSummary[];
}

export interface PriceQuote {
  pair: string;
  price: number;
  timestamp: number;
}

export interface BookLevel {
  price: number;
  size: number;
}

export interface OrderBookSnapshot {
  pair: string;
  bids: BookLevel[];
  asks: BookLevel[];
}

export interface PlacedOrder {
  orderId: string;
  clientOrderId: string;
  status: string | null;
}

function classify(error: unknown): ApiErrorKind {
  if (error instanceof AuthenticationError || error instanceof PermissionDenied) return 'authentication';
  if (error instanceof NetworkError) return 'network';
  return 'exchange';
}

function readAvailable(info: unknown): number | null {
  if (typeof info !== 'object' || info === null || !('available_balance' in info)) return null;
  const balance = info.available_balance;
  if (typeof balance !== 'object' || balance === null || !('value' in balance)) return null;
  const value = Number(balance.value);
  return typeof balance.value === 'string' && Number.isFinite(value) ? value : null;
}

function toLevels(raw: ReadonlyArray<ReadonlyArray<unknown>>, limit: number): BookLevel[] {
  const levels: BookLevel[] = [];
  for (const [price, size] of raw) {
    if (typeof price !== 'number' || typeof size !== 'number') continue;
    levels.push({ price, size });
    if (levels.length >= limit) break;
  }
  return levels;
}

/**
 * Thin wrapper over ccxt's Coinbase Advanced Trade exchange. Every public method
 * maps to one authenticated REST call and throws {@link ApiError} on failure.
 */
export class CoinbaseClient {
  private readonly exchange: coinbase;

  constructor(credentials: CoinbaseCredentials) {
    this.exchange = new coinbase({
      apiKey: credentials.apiKey,
      secret: credentials.apiSecret,
      enableRateLimit: true,
    });
  }

  private async call<T>(operation: string, request: () => Promise<T>): Promise<T> {
    logger.debug('coinbase_request', { event: 'coinbase_request', operation });
    try {
      return await request();
    } catch (err) {
      const kind = classify(err);
      logger.error('coinbase_request_failed', {
        event: 'coinbase_request_failed',
        operation,
        kind,
        error: errorMessage(err),
      });
      throw new ApiError(operation, kind, errorMessage(err), { cause: err });
    }
  }

  async validateCredentials(): Promise<CredentialCheck> {
    const accounts = await this.call('validateCredentials', () => this.exchange.fetchAccounts());
    const summaries: AccountSummary[] = accounts.map((account) => ({
      currency: account.code ?? 'unknown',
      available: readAvailable(account.info),
    }));
    logger.info('credentials_valid', { event: 'credentials_valid', accountCount: summaries.length });
    for (const summary of summaries.slice(0, 5)) {
      logger.debug('account_found', { event: 'account_found', ...summary });
    }
    return { accountCount: summaries.length, accounts: summaries };
  }

  async getPrice(pair: string): Promise<PriceQuote> {
    const symbol = toExchangeSymbol(pair);
    const ticker = await this.call('getPrice', () => this.exchange.fetchTicker(symbol));
    const price = ticker.last;
    if (typeof price !== 'number' || !Number.isFinite(price)) {
      throw new ApiError('getPrice', 'exchange', `no last price returned for ${pair}`);
    }
    const quote = { pair, price, timestamp: ticker.timestamp ?? Date.now() };
    logger.info('price_fetched', { event: 'price_fetched', pair, price });
    return quote;
  }

  async getOrderBook(pair: string, limit = 10): Promise<OrderBookSnapshot> {
    const symbol = toExchangeSymbol(pair);
    const book = await this.call('getOrderBook', () => this.exchange.fetchOrderBook(symbol, limit));
    const snapshot: OrderBookSnapshot = {
      pair,
      bids: toLevels(book.bids, limit),
      asks: toLevels(book.asks, limit),
    };

    const [bestBid] = snapshot.bids;
    const [bestAsk] = snapshot.asks;
    if (bestBid && bestAsk) {
      const spread = bestAsk.price - bestBid.price;
      logger.info('order_book_fetched', {
        event: 'order_book_fetched',
        pair,
        bestBid: bestBid.price,
        bestAsk: bestAsk.price,
        spread,
        spreadPct: (spread / bestAsk.price) * 100,
      });
    } else {
      logger.warn('order_book_one_sided', {
        event: 'order_book_one_sided',
        pair,
        bids: snapshot.bids.length,
        asks: snapshot.asks.length,
      });
    }
    return snapshot;
  }

  /** Available balance for `currency`, or null when the account holds no such wallet. */
  async getBalance(currency: string): Promise<number | null> {
    const code = currency.toUpperCase();
    const balances = await this.call('getBalance', () => this.exchange.fetchBalance());
    const entry = Object.prototype.hasOwnProperty.call(balances, code) ? balances[code] : undefined;
    const free = entry?.free;
    if (typeof free !== 'number') {
      logger.warn('balance_not_found', { event: 'balance_not_found', currency: code });
      return null;
    }
    logger.info('balance_fetched', { event: 'balance_fetched', currency: code, available: free });
    return free;
  }

  async placeMarketBuy(pair: string, quoteAmount: number, clientOrderId: string): Promise<PlacedOrder> {
    const symbol = toExchangeSymbol(pair);
    logger.warn('live_order_submitting', {
      event: 'live_order_submitting',
      pair,
      quoteAmount,
      clientOrderId,
    });
    const order = await this.call('placeMarketBuy', () =>
      this.exchange.createMarketBuyOrderWithCost(symbol, quoteAmount, { clientOrderId })
    );
    return {
      orderId: order.id,
      clientOrderId: order.clientOrderId ?? clientOrderId,
      status: order.status ?? null,
    };
  }
}
