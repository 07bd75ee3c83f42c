import { afterEach, describe, expect, it, vi } from 'vitest';
import { ConfigError, loadConfig, maskApiKey, withTradingMode } from '../src/config';
import { setConsoleLogLevel } from '../src/utils/logger';

const credentials = {
  COINBASE_API_KEY: 'organizations/test-org/apiKeys/test-key',
  COINBASE_API_SECRET: 'test-secret',
};

describe('loadConfig', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('applies safe defaults when only credentials are set', () => {
    const config = loadConfig({ ...credentials });
    expect(config).toEqual({
      apiKey: 'organizations/test-org/apiKeys/test-key',
      apiSecret: 'test-secret',
      tradingMode: 'dry_run',
      isDryRun: true,
      tradingPair: 'BTC-USD',
      maxOrderUsd: 50,
      logDir: 'logs',
      logLevel: 'info',
    });
    expect(Object.isFrozen(config)).toBe(true);
  });

  it('reads mode, pair, ceiling and logging settings', () => {
    const config = loadConfig({
      ...credentials,
      TRADING_MODE: 'LIVE',
      TRADING_PAIR: 'eth-usd',
      MAX_ORDER_USD: '25.5',
      LOG_DIR: 'var/log',
      LOG_LEVEL: 'debug',
    });
    expect(config.tradingMode).toBe('live');
    expect(config.isDryRun).toBe(false);
    expect(config.tradingPair).toBe('ETH-USD');
    expect(config.maxOrderUsd).toBe(25.5);
    expect(config.logDir).toBe('var/log');
    expect(config.logLevel).toBe('debug');
  });

  it('fails with ConfigError when a credential is missing', () => {
    expect(() => loadConfig({ COINBASE_API_SECRET: 'test-secret' })).toThrow(ConfigError);
    expect(() => loadConfig({ COINBASE_API_KEY: 'test-key', COINBASE_API_SECRET: '  ' })).toThrow(
      /COINBASE_API_SECRET not set/
    );
  });

  it('treats the .env.example placeholders as missing', () => {
    expect(() =>
      loadConfig({ COINBASE_API_KEY: 'your_api_key_here', COINBASE_API_SECRET: 'test-secret' })
    ).toThrow(/COINBASE_API_KEY not set or still has placeholder value/);
  });

  it('rejects a non-positive or non-numeric ceiling', () => {
    expect(() => loadConfig({ ...credentials, MAX_ORDER_USD: 'fifty' })).toThrow(ConfigError);
    expect(() => loadConfig({ ...credentials, MAX_ORDER_USD: '0' })).toThrow(
      'MAX_ORDER_USD must be a positive number, got "0"'
    );
  });

  it('rejects malformed trading pairs and log levels', () => {
    expect(() => loadConfig({ ...credentials, TRADING_PAIR: 'BTCUSD' })).toThrow(/TRADING_PAIR must look like/);
    expect(() => loadConfig({ ...credentials, LOG_LEVEL: 'verbose' })).toThrow(ConfigError);
  });

  it('falls back to dry run for an unknown mode and warns', () => {
    setConsoleLogLevel('warn');
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const config = loadConfig({ ...credentials, TRADING_MODE: 'paper' });
    expect(config.tradingMode).toBe('dry_run');
    expect(warn).toHaveBeenCalledTimes(1);
    expect(JSON.parse(String(warn.mock.calls[0][0]))).toMatchObject({
      level: 'warn',
      msg: 'unknown_trading_mode',
      value: 'paper',
    });
  });

  it('warns when the ceiling is above the recommended amount', () => {
    setConsoleLogLevel('warn');
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    expect(loadConfig({ ...credentials, MAX_ORDER_USD: '250' }).maxOrderUsd).toBe(250);
    expect(JSON.parse(String(warn.mock.calls[0][0]))).toMatchObject({
      msg: 'max_order_above_recommended',
      maxOrderUsd: 250,
      recommended: 100,
    });
  });
});

describe('withTradingMode', () => {
  it('returns a new frozen snapshot and leaves the original untouched', () => {
    const original = loadConfig({ ...credentials });
    const live = withTradingMode(original, 'live');
    expect(live).not.toBe(original);
    expect(live.tradingMode).toBe('live');
    expect(live.isDryRun).toBe(false);
    expect(Object.isFrozen(live)).toBe(true);
    expect(original.tradingMode).toBe('dry_run');
    expect(withTradingMode(original, 'dry_run')).toBe(original);
  });
});

describe('maskApiKey', () => {
  it('keeps only the first and last four characters', () => {
    expect(maskApiKey('abcd1234efgh5678')).toBe('abcd...5678');
  });

  it('fully masks short keys', () => {
    expect(maskApiKey('abcdefgh')).toBe('****');
  });
});
