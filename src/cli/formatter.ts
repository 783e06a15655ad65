import chalk from 'chalk';
import type { AccountTransaction } from '../types.js';
import { formatNear, formatTimestamp, nowTimestamp, shortenHash } from '../utils/formatting.js';

/**
 * One-line balance reading prefixed with the given timestamp
 */
export function formatBalanceLine(accountId: string, balance: bigint, timestamp: string = nowTimestamp()): string {
  return `[${timestamp}] ${accountId} — ${formatNear(balance)}`;
}

export function printBalance(accountId: string, balance: bigint): void {
  console.log(chalk.cyan(formatBalanceLine(accountId, balance)));
}

/**
 * Print a detected balance change
 */
export function printBalanceChange(accountId: string, oldBalance: bigint | null, newBalance: bigint): void {
  const old = oldBalance === null ? 'Unknown' : formatNear(oldBalance);
  const arrow = oldBalance !== null && newBalance < oldBalance ? chalk.red('▼') : chalk.green('▲');

  console.log(
    `${chalk.gray(`[${nowTimestamp()}]`)} ${arrow} ${chalk.bold(accountId)} ` +
      `${chalk.gray(old)} → ${chalk.bold.white(formatNear(newBalance))}`
  );
}

/**
 * Print the recent transactions of an account
 */
export function printTransactions(accountId: string, txs: AccountTransaction[]): void {
  if (txs.length === 0) {
    printInfo(`No transactions found for ${accountId}.`);
    return;
  }

  console.log();
  console.log(chalk.bold.cyan(`Last ${txs.length} transactions for ${accountId}`));
  console.log(chalk.cyan('─────────────────────────────────────────────────────────'));

  for (const tx of txs) {
    console.log(`${chalk.cyan('Time:   ')} ${chalk.gray(formatTimestamp(tx.timestamp))}`);
    console.log(`${chalk.cyan('Hash:   ')} ${chalk.white(shortenHash(tx.hash))}`);
    console.log(`${chalk.cyan('From:   ')} ${chalk.gray(tx.from)}`);
    console.log(`${chalk.cyan('To:     ')} ${chalk.gray(tx.to)}`);
    console.log(`${chalk.cyan('Amount: ')} ${chalk.bold.white(formatNear(tx.amount))}`);
    console.log(chalk.cyan('─────────────────────────────────────────────────────────'));
  }
  console.log();
}

/**
 * Print startup banner with configuration
 */
export function printBanner(options: { mode: string; target: string; intervalSeconds: number }): void {
  console.log('\n');
  console.log(chalk.bold.cyan('╔═══════════════════════════════════════════════╗'));
  console.log(
    chalk.bold.cyan('║') +
      chalk.bold.white('          NEAR ACCOUNT BALANCE MONITOR         ') +
      chalk.bold.cyan('║')
  );
  console.log(chalk.bold.cyan('╚═══════════════════════════════════════════════╝'));
  console.log();
  console.log(`${chalk.gray('Mode:')}            ${chalk.white(options.mode)}`);
  console.log(`${chalk.gray('Target:')}          ${chalk.white(options.target)}`);
  console.log(`${chalk.gray('Poll Interval:')}   ${chalk.white(`${options.intervalSeconds}s`)}`);
  console.log();
  console.log(chalk.green('✓') + ' Monitoring active...');
  console.log();
}

/**
 * Print error message
 */
export function printError(message: string, error?: Error): void {
  console.log();
  console.log(chalk.red.bold('✗ ERROR: ') + chalk.red(message));
  if (error) {
    console.log(chalk.gray(error.message));
  }
  console.log();
}

export function printInfo(message: string): void {
  console.log(chalk.blue('ℹ') + ' ' + chalk.white(message));
}
