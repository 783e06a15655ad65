import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { WatchlistStore } from './watchlistStore.js';
import { DuplicateEntryError, NotFoundError } from '../errors.js';

describe('WatchlistStore', () => {
  let dir: string;
  let file: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'near-monitor-watchlist-'));
    file = join(dir, 'monitored_accounts.json');
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  describe('load', () => {
    it('should start empty when the file is missing', async () => {
      const store = await WatchlistStore.load(file);
      expect(store.size).toBe(0);
    });

    it('should start empty when the file is corrupt', async () => {
      await writeFile(file, 'not json');
      const store = await WatchlistStore.load(file);
      expect(store.size).toBe(0);
    });

    it('should read entries with large and missing balances', async () => {
      await writeFile(
        file,
        JSON.stringify([
          { account_id: 'a.near', last_balance: null, chat_id: 1 },
          { account_id: 'b.near', chat_id: 2 },
        ]).replace(']', ',{"account_id":"c.near","last_balance":340282366920938463463374607431768211455,"chat_id":3}]')
      );

      const store = await WatchlistStore.load(file);

      expect(await store.snapshotAll()).toEqual([
        { accountId: 'a.near', subscriberId: 1, lastBalance: null },
        { accountId: 'b.near', subscriberId: 2, lastBalance: null },
        { accountId: 'c.near', subscriberId: 3, lastBalance: 340282366920938463463374607431768211455n },
      ]);
    });

    it('should drop duplicate entries, keeping the first', async () => {
      await writeFile(
        file,
        JSON.stringify([
          { account_id: 'a.near', last_balance: 5, chat_id: 1 },
          { account_id: 'a.near', last_balance: 9, chat_id: 1 },
          { account_id: 'a.near', last_balance: 9, chat_id: 2 },
        ])
      );

      const store = await WatchlistStore.load(file);

      expect(await store.snapshotAll()).toEqual([
        { accountId: 'a.near', subscriberId: 1, lastBalance: 5n },
        { accountId: 'a.near', subscriberId: 2, lastBalance: 9n },
      ]);
    });
  });

  describe('add', () => {
    it('should add a new entry with no balance and persist it', async () => {
      const store = await WatchlistStore.load(file);

      expect(await store.add('alice.test', 7)).toBe(true);

      expect(await store.listFor(7)).toEqual([{ accountId: 'alice.test', subscriberId: 7, lastBalance: null }]);
      expect(JSON.parse(await readFile(file, 'utf-8'))).toEqual([
        { account_id: 'alice.test', last_balance: null, chat_id: 7 },
      ]);
    });

    it('should reject a duplicate pair without touching the file', async () => {
      const store = await WatchlistStore.load(file);
      await store.add('alice.test', 7);
      await rm(file);

      expect(await store.add('alice.test', 7)).toBe(false);

      expect(store.size).toBe(1);
      await expect(readFile(file, 'utf-8')).rejects.toThrow();
    });

    it('should let different subscribers watch the same account', async () => {
      const store = await WatchlistStore.load(file);

      expect(await store.add('alice.test', 7)).toBe(true);
      expect(await store.add('alice.test', 8)).toBe(true);

      expect(store.size).toBe(2);
    });

    it('should keep every concurrent add', async () => {
      const store = await WatchlistStore.load(file);

      const results = await Promise.all(
        Array.from({ length: 20 }, (_, i) => store.add(`acct${i}.near`, 1))
      );

      expect(results.every((r) => r)).toBe(true);
      const reloaded = await WatchlistStore.load(file);
      expect(reloaded.size).toBe(20);
    });

    it('should accept only one of two concurrent identical adds', async () => {
      const store = await WatchlistStore.load(file);

      const results = await Promise.all([store.add('alice.test', 7), store.add('alice.test', 7)]);

      expect(results.filter((r) => r)).toHaveLength(1);
      expect(store.size).toBe(1);
    });
  });

  describe('remove', () => {
    it('should remove only the matching entry', async () => {
      const store = await WatchlistStore.load(file);
      await store.add('alice.test', 7);
      await store.add('alice.test', 8);

      expect(await store.remove('alice.test', 7)).toBe(true);

      expect(await store.snapshotAll()).toEqual([{ accountId: 'alice.test', subscriberId: 8, lastBalance: null }]);
      expect(JSON.parse(await readFile(file, 'utf-8'))).toEqual([
        { account_id: 'alice.test', last_balance: null, chat_id: 8 },
      ]);
    });

    it('should return false for an unknown entry', async () => {
      const store = await WatchlistStore.load(file);
      await store.add('alice.test', 7);

      expect(await store.remove('alice.test', 8)).toBe(false);
      expect(store.size).toBe(1);
    });
  });

  describe('rename', () => {
    it('should move the entry and reset its balance', async () => {
      const store = await WatchlistStore.load(file);
      await store.add('alice.test', 7);
      await store.updateBalance('alice.test', 7, 500n);

      await store.rename('alice.test', 7, 'alice2.test');

      expect(await store.listFor(7)).toEqual([{ accountId: 'alice2.test', subscriberId: 7, lastBalance: null }]);
      expect(JSON.parse(await readFile(file, 'utf-8'))).toEqual([
        { account_id: 'alice2.test', last_balance: null, chat_id: 7 },
      ]);
    });

    it('should throw NotFoundError for another subscriber', async () => {
      const store = await WatchlistStore.load(file);
      await store.add('alice.test', 7);
      await rm(file);

      await expect(store.rename('alice.test', 8, 'bob.test')).rejects.toBeInstanceOf(NotFoundError);
      expect(await store.listFor(7)).toEqual([{ accountId: 'alice.test', subscriberId: 7, lastBalance: null }]);
      await expect(readFile(file, 'utf-8')).rejects.toThrow();
    });

    it('should throw DuplicateEntryError when the new pair already exists', async () => {
      const store = await WatchlistStore.load(file);
      await store.add('alice.test', 7);
      await store.add('bob.test', 7);

      await expect(store.rename('alice.test', 7, 'bob.test')).rejects.toBeInstanceOf(DuplicateEntryError);
      expect(store.size).toBe(2);
    });
  });

  describe('updateBalance', () => {
    it('should store the balance and persist it', async () => {
      const store = await WatchlistStore.load(file);
      await store.add('alice.test', 7);

      expect(await store.updateBalance('alice.test', 7, 500n)).toBe(true);

      const reloaded = await WatchlistStore.load(file);
      expect(await reloaded.listFor(7)).toEqual([{ accountId: 'alice.test', subscriberId: 7, lastBalance: 500n }]);
    });

    it('should not rewrite the file when the balance is unchanged', async () => {
      const store = await WatchlistStore.load(file);
      await store.add('alice.test', 7);
      await store.updateBalance('alice.test', 7, 500n);
      await rm(file);

      expect(await store.updateBalance('alice.test', 7, 500n)).toBe(true);

      await expect(readFile(file, 'utf-8')).rejects.toThrow();
    });

    it('should return false for a removed entry', async () => {
      const store = await WatchlistStore.load(file);

      expect(await store.updateBalance('ghost.test', 7, 1n)).toBe(false);
      expect(store.size).toBe(0);
    });
  });

  it('should hand out copies of entries', async () => {
    const store = await WatchlistStore.load(file);
    await store.add('alice.test', 7);

    const [entry] = await store.snapshotAll();
    entry.lastBalance = 1n;

    expect(await store.listFor(7)).toEqual([{ accountId: 'alice.test', subscriberId: 7, lastBalance: null }]);
  });
});
