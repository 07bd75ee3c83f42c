#!/usr/bin/env node
// src/index.ts (CLI entry: flags, config, exchange client, exit code)
import { runCli } from './cli/app';
import { createConsolePrompter } from './cli/prompt';
import { CoinbaseClient } from './exchanges/coinbaseClient';
import { configureLogFile, setConsoleLogLevel } from './utils/logger';

async function main() {
  const prompter = createConsolePrompter();
  try {
    process.exitCode = await runCli(process.argv.slice(2), {
      prompter,
      // eslint-disable-next-line no-console
      print: (...lines) => lines.forEach((line) => console.log(line)),
      createClient: (config) => new CoinbaseClient({ apiKey: config.apiKey, apiSecret: config.apiSecret }),
      setupLogging: (config) => {
        setConsoleLogLevel(config.logLevel);
        configureLogFile(config.logDir);
      },
    });
  } finally {
    prompter.close();
  }
}

main().catch((err) => {
  // eslint-disable-next-line no-console
  console.error('Fatal', err);
  process.exitCode = 1;
});
