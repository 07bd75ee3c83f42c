import type { TradingConfig } from '../config';
import { runDiagnostics } from '../bot/diagnostics';
import type { ExchangeClient, OrderResult, TradingBot } from '../bot/tradingBot';
import { confirm, Prompter } from './prompt';
import { modeLabel, money, renderDiagnostics, renderOrderBook, renderOrderResult } from './render';

export interface CliContext {
  config: TradingConfig;
  client: ExchangeClient;
  bot: TradingBot;
  prompter: Prompter;
  print: (...lines: string[]) => void;
}

export async function diagnoseCommand(ctx: CliContext): Promise<boolean> {
  ctx.print('', 'Running diagnostics...');
  const report = await runDiagnostics(ctx.config, ctx.client);
  ctx.print(...renderDiagnostics(report));
  return report.passed;
}

export async function priceCommand(ctx: CliContext): Promise<void> {
  const { price } = await ctx.client.getPrice(ctx.config.tradingPair);
  ctx.print('', `Current ${ctx.config.tradingPair} price: ${money(price)}`);
}

export async function orderBookCommand(ctx: CliContext, depth = 10): Promise<void> {
  ctx.print('', 'Fetching order book...');
  const book = await ctx.client.getOrderBook(ctx.config.tradingPair, depth);
  ctx.print('', ...renderOrderBook(book, ctx.bot.baseCurrency));
}

export async function balancesCommand(ctx: CliContext): Promise<void> {
  ctx.print('', 'Fetching balances...');
  const { quoteCurrency, baseCurrency } = ctx.bot;
  const quote = await ctx.client.getBalance(quoteCurrency);
  const base = await ctx.client.getBalance(baseCurrency);
  ctx.print(
    '',
    `  ${quoteCurrency}: ${quote === null ? 'Not available' : money(quote)}`,
    `  ${baseCurrency}: ${base === null ? 'Not available' : base.toFixed(8)}`
  );
}

/**
 * Asks for an explicit "yes" before handing the amount to the bot. Returns null
 * when the user backs out.
 */
export async function buyCommand(ctx: CliContext, amount: number): Promise<OrderResult | null> {
  ctx.print('', `You are about to place a ${money(amount)} buy order (${modeLabel(ctx.config)})`);
  if (!ctx.config.isDryRun) {
    ctx.print('', 'WARNING: This is a LIVE order with REAL money!');
  }
  if (!(await confirm(ctx.prompter, "Type 'yes' to confirm: "))) {
    ctx.print('Order cancelled.');
    return null;
  }
  const result = await ctx.bot.placeMarketBuy(amount);
  ctx.print('', ...renderOrderResult(result, ctx.bot.baseCurrency));
  return result;
}
