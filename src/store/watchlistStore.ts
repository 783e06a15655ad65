import { Mutex } from 'async-mutex';
import { z } from 'zod';
import type { MonitorEntry, SubscriberId } from '../types.js';
import { DuplicateEntryError, NotFoundError } from '../errors.js';
import { logger } from '../logger.js';
import { readSnapshot, writeSnapshot, subscriberIdSchema } from './persistence.js';

// On-disk shape: snake_case fields, balances as bare decimal integers
const persistedEntrySchema = z
  .object({
    account_id: z.string().min(1),
    last_balance: z
      .union([z.number().int().nonnegative(), z.bigint().nonnegative()])
      .nullable()
      .default(null),
    chat_id: subscriberIdSchema,
  })
  .transform(
    (raw): MonitorEntry => ({
      accountId: raw.account_id,
      subscriberId: raw.chat_id,
      lastBalance: raw.last_balance === null ? null : BigInt(raw.last_balance),
    })
  );

const watchlistFileSchema = z.array(persistedEntrySchema);

function toPersisted(entry: MonitorEntry) {
  return {
    account_id: entry.accountId,
    last_balance: entry.lastBalance,
    chat_id: entry.subscriberId,
  };
}

function sameKey(entry: MonitorEntry, accountId: string, subscriberId: SubscriberId): boolean {
  return entry.accountId === accountId && entry.subscriberId === subscriberId;
}

/**
 * Durable collection of (account, subscriber) monitoring entries.
 *
 * Every operation runs inside one exclusive section, and every mutation is
 * written through to disk before its promise resolves. Callers only ever see
 * copies of the entries.
 */
export class WatchlistStore {
  private readonly lock = new Mutex();

  private constructor(
    private readonly filePath: string,
    private entries: MonitorEntry[]
  ) {}

  /**
   * Load the watchlist from disk, starting empty if the file is missing or corrupt
   */
  static async load(filePath: string): Promise<WatchlistStore> {
    const loaded = await readSnapshot<MonitorEntry[]>(filePath, watchlistFileSchema, () => []);

    const entries: MonitorEntry[] = [];
    for (const entry of loaded) {
      if (entries.some((e) => sameKey(e, entry.accountId, entry.subscriberId))) {
        logger.warn(
          { file: filePath, account: entry.accountId, chatId: entry.subscriberId },
          'Dropping duplicate watchlist entry from snapshot'
        );
        continue;
      }
      entries.push(entry);
    }

    logger.info({ file: filePath, count: entries.length }, 'Loaded monitored accounts');
    return new WatchlistStore(filePath, entries);
  }

  get size(): number {
    return this.entries.length;
  }

  /**
   * Start monitoring `accountId` for `subscriberId`.
   * Resolves false when the pair is already present.
   */
  async add(accountId: string, subscriberId: SubscriberId): Promise<boolean> {
    return this.lock.runExclusive(async () => {
      if (this.entries.some((e) => sameKey(e, accountId, subscriberId))) {
        logger.debug({ account: accountId, chatId: subscriberId }, 'Account already exists');
        return false;
      }

      this.entries.push({ accountId, subscriberId, lastBalance: null });
      logger.info({ account: accountId, chatId: subscriberId }, 'Account added');
      await this.persist();
      return true;
    });
  }

  async remove(accountId: string, subscriberId: SubscriberId): Promise<boolean> {
    return this.lock.runExclusive(async () => {
      const lengthBefore = this.entries.length;
      this.entries = this.entries.filter((e) => !sameKey(e, accountId, subscriberId));

      if (this.entries.length === lengthBefore) {
        logger.debug({ account: accountId, chatId: subscriberId }, 'Account not found for removal');
        return false;
      }

      logger.info({ account: accountId, chatId: subscriberId }, 'Account removed');
      await this.persist();
      return true;
    });
  }

  /**
   * Point an entry at a different account. The last balance is cleared so the
   * next poll cycle samples the new account afresh.
   *
   * @throws NotFoundError when the subscriber has no entry for `oldAccountId`
   * @throws DuplicateEntryError when the subscriber already monitors `newAccountId`
   */
  async rename(oldAccountId: string, subscriberId: SubscriberId, newAccountId: string): Promise<void> {
    return this.lock.runExclusive(async () => {
      const entry = this.entries.find((e) => sameKey(e, oldAccountId, subscriberId));
      if (!entry) {
        logger.debug({ account: oldAccountId, chatId: subscriberId }, 'Account not found for update');
        throw new NotFoundError(oldAccountId);
      }

      if (
        newAccountId !== oldAccountId &&
        this.entries.some((e) => sameKey(e, newAccountId, subscriberId))
      ) {
        throw new DuplicateEntryError(newAccountId);
      }

      entry.accountId = newAccountId;
      entry.lastBalance = null;
      logger.info(
        { chatId: subscriberId, old: oldAccountId, new: newAccountId },
        'Account updated'
      );
      await this.persist();
    });
  }

  /**
   * Record the latest observed balance. Resolves whether the entry exists;
   * the snapshot is only rewritten when the value actually changed.
   */
  async updateBalance(accountId: string, subscriberId: SubscriberId, balance: bigint): Promise<boolean> {
    return this.lock.runExclusive(async () => {
      const entry = this.entries.find((e) => sameKey(e, accountId, subscriberId));
      if (!entry) {
        logger.warn({ account: accountId, chatId: subscriberId }, 'Account not found for balance update');
        return false;
      }

      if (entry.lastBalance !== balance) {
        entry.lastBalance = balance;
        logger.debug(
          { account: accountId, chatId: subscriberId, balance: balance.toString() },
          'Balance updated'
        );
        await this.persist();
      }
      return true;
    });
  }

  async listFor(subscriberId: SubscriberId): Promise<MonitorEntry[]> {
    return this.lock.runExclusive(() =>
      this.entries.filter((e) => e.subscriberId === subscriberId).map((e) => ({ ...e }))
    );
  }

  /**
   * Point-in-time copy of every entry, taken so that slow network calls
   * happen outside the lock
   */
  async snapshotAll(): Promise<MonitorEntry[]> {
    return this.lock.runExclusive(() => this.entries.map((e) => ({ ...e })));
  }

  private async persist(): Promise<void> {
    const saved = await writeSnapshot(this.filePath, this.entries.map(toPersisted));
    if (saved) {
      logger.debug({ file: this.filePath, count: this.entries.length }, 'Saved monitored accounts');
    }
  }
}
