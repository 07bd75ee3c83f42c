import { ConfigError, loadConfig, TradingConfig, withTradingMode } from '../config';
import { TradingBot, ExchangeClient } from '../bot/tradingBot';
import { ApiError } from '../exchanges/coinbaseClient';
import { GuardRejection } from '../guard/orderGuard';
import { logger, setLogContext } from '../utils/logger';
import { errorMessage, formatError } from '../utils/formatError';
import { CliUsageError, parseArgs, USAGE } from './args';
import { buyCommand, CliContext, diagnoseCommand, orderBookCommand, priceCommand } from './commands';
import { interactiveMenu } from './menu';
import type { Prompter } from './prompt';
import { renderBanner, renderConfigSummary } from './render';

export interface CliDeps {
  prompter: Prompter;
  print: (...lines: string[]) => void;
  createClient: (config: TradingConfig) => ExchangeClient;
  loadConfig?: () => TradingConfig;
  /** Called once the configuration is known, before any exchange call. */
  setupLogging?: (config: TradingConfig) => void;
}

function describeFailure(err: unknown): string {
  if (err instanceof ConfigError) return `Configuration error: ${err.message}`;
  if (err instanceof GuardRejection) return err.message;
  if (err instanceof ApiError) return `Exchange error: ${err.message}`;
  if (err instanceof CliUsageError) return `${err.message}\n\n${USAGE}`;
  return `Unexpected error: ${errorMessage(err)}`;
}

/** Runs one CLI invocation and resolves with the process exit code. */
export async function runCli(argv: string[], deps: CliDeps): Promise<number> {
  const { print } = deps;
  try {
    const options = parseArgs(argv);
    if (options.command === 'help') {
      print(USAGE);
      return 0;
    }

    print(...renderBanner());

    let config = (deps.loadConfig ?? loadConfig)();
    deps.setupLogging?.(config);

    if (options.conflictingModes) {
      logger.warn('conflicting_mode_flags', { event: 'conflicting_mode_flags', using: 'dry_run' });
    }
    if (options.modeOverride) {
      config = withTradingMode(config, options.modeOverride);
      print(
        options.modeOverride === 'live'
          ? '[OVERRIDE] Forcing LIVE mode - Real trades will execute!'
          : '[OVERRIDE] Forcing DRY RUN mode'
      );
    }
    setLogContext({ pair: config.tradingPair, mode: config.tradingMode });
    print(...renderConfigSummary(config));

    const client = deps.createClient(config);
    const ctx: CliContext = {
      config,
      client,
      bot: new TradingBot(config, client),
      prompter: deps.prompter,
      print,
    };

    switch (options.command) {
      case 'diagnose':
        return (await diagnoseCommand(ctx)) ? 0 : 1;
      case 'price':
        await priceCommand(ctx);
        return 0;
      case 'orderbook':
        await orderBookCommand(ctx);
        return 0;
      case 'buy':
        await buyCommand(ctx, options.buyAmount ?? Number.NaN);
        return 0;
      default:
        await interactiveMenu(ctx);
        return 0;
    }
  } catch (err) {
    logger.error('cli_failed', { event: 'cli_failed', error: formatError(err) });
    print('', describeFailure(err));
    return 1;
  }
}
