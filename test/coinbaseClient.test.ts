import { beforeEach, describe, expect, it, vi } from 'vitest';
import { AuthenticationError, ExchangeError, NetworkError } from 'ccxt';
import { ApiError, CoinbaseClient } from '../src/exchanges/coinbaseClient';
import { setConsoleLogLevel } from '../src/utils/logger';

const exchange = vi.hoisted(() => ({
  options: [] as unknown[],
  fetchAccounts: vi.fn(),
  fetchTicker: vi.fn(),
  fetchOrderBook: vi.fn(),
  fetchBalance: vi.fn(),
  createMarketBuyOrderWithCost: vi.fn(),
}));

vi.mock('ccxt', () => {
  class BaseError extends Error {}
  class ExchangeError extends BaseError {}
  class AuthenticationError extends ExchangeError {}
  class PermissionDenied extends AuthenticationError {}
  class NetworkError extends BaseError {}

  class MockCoinbase {
    constructor(options: unknown) {
      exchange.options.push(options);
    }
    fetchAccounts(...args: unknown[]) {
      return exchange.fetchAccounts(...args);
    }
    fetchTicker(...args: unknown[]) {
      return exchange.fetchTicker(...args);
    }
    fetchOrderBook(...args: unknown[]) {
      return exchange.fetchOrderBook(...args);
    }
    fetchBalance(...args: unknown[]) {
      return exchange.fetchBalance(...args);
    }
    createMarketBuyOrderWithCost(...args: unknown[]) {
      return exchange.createMarketBuyOrderWithCost(...args);
    }
  }

  return {
    coinbase: MockCoinbase,
    ExchangeError,
    AuthenticationError,
    PermissionDenied,
    NetworkError,
  };
});

describe('CoinbaseClient', () => {
  let client: CoinbaseClient;

  beforeEach(() => {
    exchange.options.length = 0;
    exchange.fetchAccounts.mockReset();
    exchange.fetchTicker.mockReset();
    exchange.fetchOrderBook.mockReset();
    exchange.fetchBalance.mockReset();
    exchange.createMarketBuyOrderWithCost.mockReset();
    client = new CoinbaseClient({ apiKey: 'test-key', apiSecret: 'test-secret' });
  });

  it('passes credentials to the ccxt coinbase exchange', () => {
    expect(exchange.options).toEqual([{ apiKey: 'test-key', secret: 'test-secret', enableRateLimit: true }]);
  });

  it('validates credentials by listing accounts', async () => {
    exchange.fetchAccounts.mockResolvedValue([
      { id: 'a-1', type: 'fiat', code: 'USD', info: { available_balance: { value: '12.5', currency: 'USD' } } },
      { id: 'a-2', type: 'wallet', code: 'BTC', info: { available_balance: { value: '0.00250000', currency: 'BTC' } } },
      { id: 'a-3', type: 'wallet', code: 'ETH', info: {} },
    ]);
    await expect(client.validateCredentials()).resolves.toEqual({
      accountCount: 3,
      accounts: [
        { currency: 'USD', available: 12.5 },
        { currency: 'BTC', available: 0.0025 },
        { currency: 'ETH', available: null },
      ],
    });
  });

  it('logs each account with its available amount', async () => {
    setConsoleLogLevel('debug');
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => undefined);
    exchange.fetchAccounts.mockResolvedValue([
      { id: 'a-1', type: 'fiat', code: 'USD', info: { available_balance: { value: '12.5', currency: 'USD' } } },
    ]);

    await client.validateCredentials();

    const entries = debug.mock.calls.map((call) => JSON.parse(String(call[0])));
    expect(entries.find((entry) => entry.msg === 'account_found')).toMatchObject({ currency: 'USD', available: 12.5 });
    debug.mockRestore();
  });

  it('reads the last trade price using the unified symbol', async () => {
    exchange.fetchTicker.mockResolvedValue({ symbol: 'BTC/USD', last: 43210.5, timestamp: 1_700_000_000_000 });
    await expect(client.getPrice('BTC-USD')).resolves.toEqual({
      pair: 'BTC-USD',
      price: 43210.5,
      timestamp: 1_700_000_000_000,
    });
    expect(exchange.fetchTicker).toHaveBeenCalledWith('BTC/USD');
  });

  it('reports a ticker without a last price as an exchange error', async () => {
    exchange.fetchTicker.mockResolvedValue({ symbol: 'BTC/USD', last: undefined, timestamp: 1 });
    await expect(client.getPrice('BTC-USD')).rejects.toMatchObject({
      name: 'ApiError',
      kind: 'exchange',
      operation: 'getPrice',
      message: 'getPrice failed (exchange): no last price returned for BTC-USD',
    });
  });

  it('parses and truncates both sides of the order book', async () => {
    exchange.fetchOrderBook.mockResolvedValue({
      symbol: 'BTC/USD',
      bids: [
        [100, 1],
        [99, 2],
        [98, 3],
      ],
      asks: [
        [101, 0.5],
        [undefined, 1],
        [102, 0.25],
      ],
    });
    const book = await client.getOrderBook('BTC-USD', 2);
    expect(exchange.fetchOrderBook).toHaveBeenCalledWith('BTC/USD', 2);
    expect(book).toEqual({
      pair: 'BTC-USD',
      bids: [
        { price: 100, size: 1 },
        { price: 99, size: 2 },
      ],
      asks: [
        { price: 101, size: 0.5 },
        { price: 102, size: 0.25 },
      ],
    });
  });

  it('returns the free balance of a currency, or null when there is no wallet', async () => {
    exchange.fetchBalance.mockResolvedValue({
      info: {},
      USD: { free: 120.5, used: 10, total: 130.5 },
      BTC: { free: 0.002, used: 0, total: 0.002 },
    });
    await expect(client.getBalance('usd')).resolves.toBe(120.5);
    await expect(client.getBalance('ETH')).resolves.toBeNull();
  });

  it('submits a market buy sized by quote cost with the client order id', async () => {
    exchange.createMarketBuyOrderWithCost.mockResolvedValue({
      id: 'cb-123',
      clientOrderId: 'client-1',
      status: 'open',
    });
    await expect(client.placeMarketBuy('BTC-USD', 10, 'client-1')).resolves.toEqual({
      orderId: 'cb-123',
      clientOrderId: 'client-1',
      status: 'open',
    });
    expect(exchange.createMarketBuyOrderWithCost).toHaveBeenCalledWith('BTC/USD', 10, { clientOrderId: 'client-1' });
  });

  it('classifies ccxt failures', async () => {
    exchange.fetchAccounts.mockRejectedValue(new AuthenticationError('invalid signature'));
    exchange.fetchTicker.mockRejectedValue(new NetworkError('socket hang up'));
    exchange.fetchBalance.mockRejectedValue(new ExchangeError('INVALID_ARGUMENT'));

    await expect(client.validateCredentials()).rejects.toMatchObject({
      kind: 'authentication',
      message: 'validateCredentials failed (authentication): invalid signature',
    });
    await expect(client.getPrice('BTC-USD')).rejects.toMatchObject({ kind: 'network' });
    await expect(client.getBalance('USD')).rejects.toMatchObject({ kind: 'exchange' });
  });

  it('keeps the original error as the cause', async () => {
    const cause = new NetworkError('timed out');
    exchange.fetchOrderBook.mockRejectedValue(cause);
    const error = await client.getOrderBook('BTC-USD').catch((err: unknown) => err);
    expect(error).toBeInstanceOf(ApiError);
    expect(error).toMatchObject({ cause });
  });
});
