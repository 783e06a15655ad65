#!/usr/bin/env node
import { initConfig } from './config.js';
import { logger, errorMessage } from './logger.js';
import { createNearClient } from './clients.js';
import { parseAccountId } from './utils/account.js';
import { parseCliArgs, type CliCommand } from './cli/parser.js';
import { AccountMonitor } from './cli/monitor.js';
import { runBot } from './bot/telegram.js';
import {
  printBalance,
  printBalanceChange,
  printBanner,
  printError,
  printInfo,
  printTransactions,
} from './cli/formatter.js';

const shutdownController = new AbortController();

/**
 * Abort long-running modes on the first signal; a second one forces exit
 */
function shutdown(signal: string): void {
  if (shutdownController.signal.aborted) {
    logger.warn({ signal }, 'Second shutdown signal received, exiting immediately');
    process.exit(1);
  }
  logger.info({ signal }, 'Shutdown signal received, cleaning up...');
  shutdownController.abort();
}

async function runCommand(command: CliCommand): Promise<void> {
  logger.info({ command: command.kind }, 'Executing command');

  const config = initConfig({
    pollIntervalSeconds: command.kind === 'bot' ? command.intervalSeconds : undefined,
  });
  const near = createNearClient(config);

  switch (command.kind) {
    case 'balance': {
      const accountId = parseAccountId(command.accountId);
      const balance = await near.fetchBalance(accountId);
      printBalance(accountId, balance);
      break;
    }
    case 'txs': {
      const accountId = parseAccountId(command.accountId);
      const txs = await near.fetchTransactions(accountId);
      printTransactions(accountId, txs);
      break;
    }
    case 'monitor': {
      const accountId = parseAccountId(command.accountId);
      printBanner({ mode: 'monitor', target: accountId, intervalSeconds: command.intervalSeconds });

      const monitor = new AccountMonitor(accountId, near, {
        intervalMs: command.intervalSeconds * 1000,
        onChange: printBalanceChange,
        onError: (_account, error) => printError('Failed to fetch balance', error instanceof Error ? error : undefined),
      });
      await monitor.run(shutdownController.signal);
      break;
    }
    case 'bot': {
      printBanner({ mode: 'telegram bot', target: 'all subscribers', intervalSeconds: config.pollIntervalMs / 1000 });
      await runBot(config, near, shutdownController.signal);
      break;
    }
  }

  logger.info({ command: command.kind }, 'Command completed successfully');
}

/**
 * Main entry point
 */
async function main(): Promise<void> {
  try {
    const command = parseCliArgs();

    process.on('SIGINT', () => shutdown('SIGINT'));
    process.on('SIGTERM', () => shutdown('SIGTERM'));

    process.on('uncaughtException', (error) => {
      logger.error({ error: error.message, stack: error.stack }, 'Uncaught exception');
      printError('Uncaught exception', error);
      process.exit(1);
    });

    process.on('unhandledRejection', (reason: unknown) => {
      logger.error({ reason: errorMessage(reason) }, 'Unhandled promise rejection');
      if (reason instanceof Error) {
        printError('Unhandled promise rejection', reason);
      }
    });

    await runCommand(command);

    if (shutdownController.signal.aborted) {
      printInfo('Stopped.');
    }
  } catch (error) {
    logger.error({ error: errorMessage(error) }, 'Fatal error in main');
    printError('Fatal error', error instanceof Error ? error : undefined);
    process.exit(1);
  }
}

void main();
