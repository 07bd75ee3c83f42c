import type { TradingConfig } from '../config';
import { splitPair } from '../exchanges/pairs';
import { logger } from '../utils/logger';
import { errorMessage } from '../utils/formatError';
import type { ExchangeClient } from './tradingBot';

export type StepStatus = 'pass' | 'fail' | 'warn';

export interface DiagnosticStep {
  name: string;
  status: StepStatus;
  detail: string;
}

export interface DiagnosticReport {
  steps: DiagnosticStep[];
  passed: boolean;
}

type Check = {
  name: string;
  run: () => Promise<{ status: StepStatus; detail: string }>;
};

/**
 * Credentials, price, order book and balance checks. Each step runs even when an
 * earlier one failed; a missing quote-currency wallet only warns.
 */
export async function runDiagnostics(config: TradingConfig, client: ExchangeClient): Promise<DiagnosticReport> {
  const pair = config.tradingPair;
  const { quote } = splitPair(pair);

  const checks: Check[] = [
    {
      name: 'credentials',
      run: async () => {
        const result = await client.validateCredentials();
        return { status: 'pass', detail: `credentials valid, ${result.accountCount} account(s)` };
      },
    },
    {
      name: 'price',
      run: async () => {
        const { price } = await client.getPrice(pair);
        return { status: 'pass', detail: `${pair} last price ${price.toFixed(2)}` };
      },
    },
    {
      name: 'orderbook',
      run: async () => {
        const book = await client.getOrderBook(pair, 5);
        return { status: 'pass', detail: `${book.bids.length} bid / ${book.asks.length} ask levels` };
      },
    },
    {
      name: 'balance',
      run: async () => {
        const balance = await client.getBalance(quote);
        if (balance === null) {
          return { status: 'warn', detail: `no ${quote} account found` };
        }
        return { status: 'pass', detail: `${quote} available ${balance.toFixed(2)}` };
      },
    },
  ];

  logger.info('diagnostics_started', { event: 'diagnostics_started', pair, steps: checks.length });
  const steps: DiagnosticStep[] = [];
  for (const [index, check] of checks.entries()) {
    let step: DiagnosticStep;
    try {
      step = { name: check.name, ...(await check.run()) };
    } catch (err) {
      step = { name: check.name, status: 'fail', detail: errorMessage(err) };
    }
    const log = step.status === 'fail' ? logger.error : step.status === 'warn' ? logger.warn : logger.info;
    log('diagnostic_step', { event: 'diagnostic_step', step: `${index + 1}/${checks.length}`, ...step });
    steps.push(step);
  }

  const passed = steps.every((step) => step.status !== 'fail');
  (passed ? logger.info : logger.error)('diagnostics_finished', { event: 'diagnostics_finished', passed });
  return { steps, passed };
}
