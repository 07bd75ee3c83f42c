import { maskApiKey, TradingConfig } from '../config';
import type { DiagnosticReport } from '../bot/diagnostics';
import type { OrderResult } from '../bot/tradingBot';
import type { OrderBookSnapshot } from '../exchanges/coinbaseClient';

const RULE = '='.repeat(50);

export function money(value: number): string {
  return `$${value.toLocaleString('en-US', { minimumFractionDigits: 2, maximumFractionDigits: 2 })}`;
}

export function modeLabel(config: TradingConfig): string {
  return config.isDryRun ? 'DRY RUN' : 'LIVE';
}

export function renderBanner(): string[] {
  return [
    '╔═══════════════════════════════════════════════════════════╗',
    '║       COINBASE ADVANCED TRADE CLI                         ║',
    '║       Price, order book, balances and guarded buys        ║',
    '╚═══════════════════════════════════════════════════════════╝',
  ];
}

export function renderConfigSummary(config: TradingConfig): string[] {
  return [
    RULE,
    'CONFIGURATION SUMMARY',
    RULE,
    `API Key:        ${maskApiKey(config.apiKey)}`,
    `Trading Mode:   ${config.tradingMode.toUpperCase()}`,
    `Trading Pair:   ${config.tradingPair}`,
    `Max Order:      ${money(config.maxOrderUsd)}`,
    '',
    config.isDryRun ? '[DRY RUN MODE] No real trades will be executed' : '[LIVE MODE] Real trades WILL be executed!',
    RULE,
  ];
}

export function renderOrderBook(book: OrderBookSnapshot, base: string): string[] {
  const level = (index: number, price: number, size: number) =>
    `  ${index}. ${money(price)} - ${size.toFixed(8)} ${base}`;
  return [
    `--- TOP ${book.bids.length} BIDS (Buy Orders) ---`,
    ...book.bids.map((bid, i) => level(i + 1, bid.price, bid.size)),
    '',
    `--- TOP ${book.asks.length} ASKS (Sell Orders) ---`,
    ...book.asks.map((ask, i) => level(i + 1, ask.price, ask.size)),
  ];
}

export function renderDiagnostics(report: DiagnosticReport): string[] {
  const lines = report.steps.map(
    (step, i) => `[${i + 1}/${report.steps.length}] ${step.status.toUpperCase().padEnd(4)} ${step.name}: ${step.detail}`
  );
  lines.push(RULE);
  lines.push(report.passed ? 'ALL DIAGNOSTICS PASSED' : 'SOME DIAGNOSTICS FAILED - fix the issues above before trading');
  return lines;
}

export function renderOrderResult(order: OrderResult, base: string): string[] {
  const lines = [
    RULE,
    order.status === 'SIMULATED' ? '[DRY RUN] SIMULATED ORDER DETAILS' : 'ORDER PLACED SUCCESSFULLY',
    RULE,
    `Order ID:       ${order.orderId}`,
    `Product:        ${order.productId}`,
    `Side:           ${order.side}`,
    `Amount:         ${money(Number(order.quoteSize))}`,
  ];
  if (order.estimatedFillPrice !== undefined) {
    lines.push(`Est. Price:     ${money(Number(order.estimatedFillPrice))}`);
  }
  if (order.estimatedQuantity !== undefined) {
    lines.push(`Est. Quantity:  ${order.estimatedQuantity} ${base}`);
  }
  lines.push(RULE);
  if (order.status === 'SIMULATED') {
    lines.push('[DRY RUN] No real order was placed');
  }
  return lines;
}
