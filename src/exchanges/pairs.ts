export interface PairParts {
  base: string;
  quote: string;
}

const PRODUCT_ID = /^([A-Z0-9]+)-([A-Z0-9]+)$/;

export function parsePair(pair: string): PairParts | null {
  const match = PRODUCT_ID.exec(pair.trim().toUpperCase());
  if (!match) return null;
  return { base: match[1], quote: match[2] };
}

export function splitPair(pair: string): PairParts {
  const parts = parsePair(pair);
  if (!parts) {
    throw new Error(`invalid_trading_pair:${pair}`);
  }
  return parts;
}

/** `BTC-USD` (Coinbase product id) -> `BTC/USD` (ccxt unified symbol). */
export function toExchangeSymbol(pair: string): string {
  const { base, quote } = splitPair(pair);
  return `${base}/${quote}`;
}
