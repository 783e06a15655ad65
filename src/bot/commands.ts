import type { AccountTransaction, NearDataSource, SubscriberId } from '../types.js';
import type { WatchlistStore } from '../store/watchlistStore.js';
import type { SubscriberRegistry } from '../store/subscriberRegistry.js';
import { DuplicateEntryError, NotFoundError, ValidationError } from '../errors.js';
import { logger, errorMessage } from '../logger.js';
import { normalizeAccountId, parseAccountId } from '../utils/account.js';
import { formatNear, formatTimestamp, shortenHash } from '../utils/formatting.js';
import { MAX_TRANSACTIONS } from '../near/nearblocks.js';

export type BotCommand = 'help' | 'start' | 'balance' | 'add' | 'remove' | 'delete' | 'edit' | 'list' | 'trxs';

export const BOT_COMMANDS: ReadonlyArray<{ command: BotCommand; description: string }> = [
  { command: 'help', description: 'display this text.' },
  { command: 'start', description: 'start the bot.' },
  { command: 'balance', description: 'fetch balance of an account. Usage: /balance <account_id>' },
  { command: 'add', description: 'add an account to monitor.' },
  { command: 'remove', description: 'remove an account from monitoring.' },
  { command: 'delete', description: 'remove an account from monitoring.' },
  { command: 'edit', description: 'edit an account ID. Usage: /edit <old_id> <new_id>' },
  { command: 'list', description: 'list monitored accounts.' },
  { command: 'trxs', description: `list last ${MAX_TRANSACTIONS} transactions. Usage: /trxs <account_id>` },
];

export const WELCOME_MESSAGE =
  'Welcome to the NEAR Balance Monitor Bot! Use /help to see available commands.';

export function helpText(): string {
  const lines = BOT_COMMANDS.map(({ command, description }) => `/${command} — ${description}`);
  return ['These commands are supported:', ...lines].join('\n');
}

function usage(command: BotCommand): string {
  return `Please provide an account ID. Usage: /${command} <account_id>`;
}

/**
 * Turns one chat command into exactly one reply. Every command is scoped to
 * the invoking subscriber's own watchlist entries.
 */
export class CommandHandler {
  constructor(
    private readonly store: WatchlistStore,
    private readonly registry: SubscriberRegistry,
    private readonly source: NearDataSource
  ) {}

  async execute(subscriberId: SubscriberId, command: BotCommand, args: string): Promise<string> {
    logger.debug({ chatId: subscriberId, command, args }, 'Received command');

    if (await this.registry.register(subscriberId)) {
      logger.info({ chatId: subscriberId }, 'New user registered');
    }

    const input = args.trim();

    try {
      switch (command) {
        case 'help':
          return helpText();
        case 'start':
          return WELCOME_MESSAGE;
        case 'balance':
          return await this.balance(subscriberId, input);
        case 'add':
          return await this.add(subscriberId, input);
        case 'remove':
        case 'delete':
          return await this.remove(subscriberId, command, input);
        case 'edit':
          return await this.edit(subscriberId, input);
        case 'list':
          return await this.list(subscriberId);
        case 'trxs':
          return await this.transactions(subscriberId, input);
      }
    } catch (error) {
      if (error instanceof ValidationError) {
        logger.warn({ chatId: subscriberId, command, error: error.message }, 'Rejected command input');
        return error.message;
      }
      throw error;
    }
  }

  private async balance(subscriberId: SubscriberId, input: string): Promise<string> {
    if (!input) return usage('balance');
    const accountId = parseAccountId(input);

    try {
      const balance = await this.source.fetchBalance(accountId);
      logger.info({ chatId: subscriberId, account: accountId }, 'Balance command completed');
      return `Balance for ${accountId}: ${formatNear(balance)}`;
    } catch (error) {
      logger.error({ chatId: subscriberId, account: accountId, error: errorMessage(error) }, 'Balance command failed');
      return `Error fetching balance: ${errorMessage(error)}`;
    }
  }

  private async add(subscriberId: SubscriberId, input: string): Promise<string> {
    if (!input) return usage('add');
    const accountId = parseAccountId(input);

    if (await this.store.add(accountId, subscriberId)) {
      return `Added ${accountId} to monitoring list.`;
    }
    return `${accountId} is already being monitored.`;
  }

  private async remove(subscriberId: SubscriberId, command: BotCommand, input: string): Promise<string> {
    if (!input) return usage(command);
    const accountId = normalizeAccountId(input);

    if (await this.store.remove(accountId, subscriberId)) {
      return `Removed ${accountId} from monitoring list.`;
    }
    return `Account ${accountId} was not found.`;
  }

  private async edit(subscriberId: SubscriberId, input: string): Promise<string> {
    const parts = input.split(/\s+/).filter((part) => part.length > 0);
    if (parts.length !== 2) {
      return 'Usage: /edit <old_id> <new_id>';
    }

    const oldId = normalizeAccountId(parts[0]);
    const newId = parseAccountId(parts[1]);

    try {
      await this.store.rename(oldId, subscriberId, newId);
      return `Updated ${oldId} to ${newId}.`;
    } catch (error) {
      if (error instanceof NotFoundError) {
        return `Account ${oldId} was not found.`;
      }
      if (error instanceof DuplicateEntryError) {
        return `${newId} is already being monitored.`;
      }
      throw error;
    }
  }

  private async list(subscriberId: SubscriberId): Promise<string> {
    const entries = await this.store.listFor(subscriberId);
    logger.info({ chatId: subscriberId, accountCount: entries.length }, 'List command');

    if (entries.length === 0) {
      return 'You are not monitoring any accounts.';
    }
    return `Monitoring:\n${entries.map((entry) => entry.accountId).join('\n')}`;
  }

  private async transactions(subscriberId: SubscriberId, input: string): Promise<string> {
    if (!input) return usage('trxs');
    const accountId = parseAccountId(input);

    let txs: AccountTransaction[];
    try {
      txs = await this.source.fetchTransactions(accountId);
    } catch (error) {
      logger.error({ chatId: subscriberId, account: accountId, error: errorMessage(error) }, 'Trxs command failed');
      return `Error fetching transactions: ${errorMessage(error)}`;
    }

    if (txs.length === 0) {
      return `No transactions found for ${accountId}.`;
    }

    let response = `Last ${MAX_TRANSACTIONS} transactions for ${accountId}:\n`;
    for (const tx of txs) {
      response +=
        `\nTime: ${formatTimestamp(tx.timestamp)}` +
        `\nHash: ${shortenHash(tx.hash)}` +
        `\nFrom: ${tx.from}` +
        `\nTo: ${tx.to}` +
        `\nAmount: ${formatNear(tx.amount)}\n`;
    }
    return response;
  }
}
