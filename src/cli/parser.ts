import { Command, InvalidArgumentError } from 'commander';

export const DEFAULT_MONITOR_INTERVAL_SECONDS = 10;

export type CliCommand =
  | { kind: 'balance'; accountId: string }
  | { kind: 'txs'; accountId: string }
  | { kind: 'monitor'; accountId: string; intervalSeconds: number }
  | { kind: 'bot'; intervalSeconds?: number };

export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!/^\d+$/.test(value.trim()) || !Number.isSafeInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Must be a positive whole number of seconds.');
  }
  return parsed;
}

/**
 * Build the CLI program; the selected subcommand is reported through `onCommand`
 */
export function buildProgram(onCommand: (command: CliCommand) => void): Command {
  const program = new Command();

  program
    .name('near-monitor')
    .description('NEAR account balance monitor and Telegram bot')
    .version('1.0.0');

  program
    .command('balance')
    .description('Print the current balance of an account')
    .argument('<accountId>', 'NEAR account id')
    .action((accountId: string) => onCommand({ kind: 'balance', accountId }));

  program
    .command('txs')
    .description('Print the most recent transactions of an account')
    .argument('<accountId>', 'NEAR account id')
    .action((accountId: string) => onCommand({ kind: 'txs', accountId }));

  program
    .command('monitor')
    .description('Poll an account and print every balance change')
    .argument('<accountId>', 'NEAR account id')
    .option('-i, --interval <seconds>', 'Polling interval in seconds', parsePositiveInt, DEFAULT_MONITOR_INTERVAL_SECONDS)
    .action((accountId: string, options: { interval: number }) =>
      onCommand({ kind: 'monitor', accountId, intervalSeconds: options.interval })
    );

  program
    .command('bot')
    .description('Run the Telegram bot with background balance monitoring')
    .option('-i, --interval <seconds>', 'Override POLL_INTERVAL_SECONDS', parsePositiveInt)
    .action((options: { interval?: number }) => onCommand({ kind: 'bot', intervalSeconds: options.interval }));

  return program;
}

/**
 * Parse command line arguments into the subcommand to run
 */
export function parseCliArgs(argv: string[] = process.argv): CliCommand {
  const result: { command?: CliCommand } = {};
  const program = buildProgram((command) => {
    result.command = command;
  });

  program.parse(argv);

  if (!result.command) {
    return program.help({ error: true });
  }
  return result.command;
}
