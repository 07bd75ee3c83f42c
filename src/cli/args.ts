import type { TradingMode } from '../config';

export type CliCommand = 'diagnose' | 'price' | 'orderbook' | 'buy' | 'menu' | 'help';

export interface CliOptions {
  command: CliCommand;
  buyAmount?: number;
  modeOverride?: TradingMode;
  /** Set when both --dry-run and --live were passed; dry run wins. */
  conflictingModes: boolean;
}

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

const ALIASES: Record<string, string> = {
  '-d': '--diagnose',
  '-p': '--price',
  '-o': '--orderbook',
  '-b': '--buy',
  '-h': '--help',
};

const BOOLEAN_FLAGS = new Set(['--diagnose', '--price', '--orderbook', '--dry-run', '--live', '--help']);

function parseAmount(raw: string | undefined): number {
  if (raw === undefined || raw.startsWith('-')) {
    throw new CliUsageError('--buy requires an AMOUNT in quote currency, e.g. --buy 10');
  }
  const value = Number(raw);
  if (raw.trim() === '' || !Number.isFinite(value)) {
    throw new CliUsageError(`--buy AMOUNT must be a number, got "${raw}"`);
  }
  return value;
}

export function parseArgs(argv: string[]): CliOptions {
  const flags = new Set<string>();
  let buyAmount: number | undefined;

  for (let i = 0; i < argv.length; i += 1) {
    const token = argv[i];
    const eqIndex = token.indexOf('=');
    const name = ALIASES[token] ?? (eqIndex > 0 ? token.slice(0, eqIndex) : token);

    if (name === '--buy') {
      if (eqIndex > 0) {
        buyAmount = parseAmount(token.slice(eqIndex + 1));
      } else {
        buyAmount = parseAmount(argv[i + 1]);
        i += 1;
      }
      continue;
    }
    if (!BOOLEAN_FLAGS.has(name) || eqIndex > 0) {
      throw new CliUsageError(`Unknown argument: ${token}`);
    }
    flags.add(name);
  }

  const dryRun = flags.has('--dry-run');
  const live = flags.has('--live');
  const modeOverride: TradingMode | undefined = dryRun ? 'dry_run' : live ? 'live' : undefined;
  const base = { modeOverride, conflictingModes: dryRun && live };

  if (flags.has('--help')) return { ...base, command: 'help' };
  if (flags.has('--diagnose')) return { ...base, command: 'diagnose' };
  if (flags.has('--price')) return { ...base, command: 'price' };
  if (flags.has('--orderbook')) return { ...base, command: 'orderbook' };
  if (buyAmount !== undefined) return { ...base, command: 'buy', buyAmount };
  return { ...base, command: 'menu' };
}

export const USAGE = `Coinbase Advanced Trade CLI

Usage: npm start -- [options]

Options:
  -d, --diagnose        Run diagnostics and exit
  -p, --price           Show the current price of TRADING_PAIR and exit
  -o, --orderbook       Show the order book and exit
  -b, --buy <AMOUNT>    Place a market buy for AMOUNT of quote currency
      --dry-run         Force dry run mode (overrides TRADING_MODE)
      --live            Force live mode (overrides TRADING_MODE) - real funds!
  -h, --help            Show this help

Without a command the interactive menu starts.

Examples:
  npm start -- --diagnose
  npm start -- --buy 10
  npm start -- --dry-run --buy 10
`;
