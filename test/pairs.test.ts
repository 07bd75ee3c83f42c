import { describe, expect, it } from 'vitest';
import { parsePair, splitPair, toExchangeSymbol } from '../src/exchanges/pairs';

describe('trading pairs', () => {
  it('normalises product ids', () => {
    expect(parsePair(' btc-usd ')).toEqual({ base: 'BTC', quote: 'USD' });
    expect(parsePair('BTC/USD')).toBeNull();
  });

  it('converts product ids to unified symbols', () => {
    expect(toExchangeSymbol('ETH-EUR')).toBe('ETH/EUR');
  });

  it('throws on malformed pairs', () => {
    expect(() => splitPair('BTCUSD')).toThrow('invalid_trading_pair:BTCUSD');
  });
});
