import { logger } from '../utils/logger';
import { errorMessage } from '../utils/formatError';
import {
  balancesCommand,
  buyCommand,
  CliContext,
  diagnoseCommand,
  orderBookCommand,
  priceCommand,
} from './commands';
import { money } from './render';

const TEST_ORDER_USD = 10;

function renderMenu(ctx: CliContext): string[] {
  const rule = '='.repeat(40);
  return [
    '',
    rule,
    'MAIN MENU',
    rule,
    '1. Run diagnostics',
    `2. Get current ${ctx.config.tradingPair} price`,
    '3. View order book',
    '4. Check account balances',
    `5. Place test buy order ($${TEST_ORDER_USD})`,
    '6. Place custom buy order',
    '0. Exit',
    rule,
  ];
}

async function handleChoice(ctx: CliContext, choice: string): Promise<void> {
  switch (choice) {
    case '1':
      await diagnoseCommand(ctx);
      return;
    case '2':
      await priceCommand(ctx);
      return;
    case '3':
      await orderBookCommand(ctx, 10);
      return;
    case '4':
      await balancesCommand(ctx);
      return;
    case '5':
      await buyCommand(ctx, TEST_ORDER_USD);
      return;
    case '6': {
      const raw = await ctx.prompter.ask('\nEnter amount: $');
      const amount = Number((raw ?? '').trim());
      if (raw === null || raw.trim() === '' || !Number.isFinite(amount)) {
        ctx.print('', 'Invalid amount. Please enter a number.');
        return;
      }
      if (amount > ctx.config.maxOrderUsd) {
        ctx.print(
          '',
          `Amount exceeds maximum of ${money(ctx.config.maxOrderUsd)}. Raise MAX_ORDER_USD in .env if intentional.`
        );
        return;
      }
      await buyCommand(ctx, amount);
      return;
    }
    default:
      ctx.print('', 'Invalid choice. Please try again.');
  }
}

/** Loops until the user picks 0 or input ends; failed actions are reported and the loop continues. */
export async function interactiveMenu(ctx: CliContext): Promise<void> {
  for (;;) {
    ctx.print(...renderMenu(ctx));
    const answer = await ctx.prompter.ask('\nEnter your choice: ');
    const choice = answer?.trim() ?? '0';
    if (choice === '0') {
      ctx.print('', 'Goodbye!');
      return;
    }
    try {
      await handleChoice(ctx, choice);
    } catch (err) {
      logger.debug('menu_action_failed', { event: 'menu_action_failed', choice, error: err });
      ctx.print('', `Error: ${errorMessage(err)}`);
    }
  }
}
