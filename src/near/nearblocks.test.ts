import { describe, it, expect, vi, beforeEach } from 'vitest';
import type { AxiosInstance } from 'axios';
import { NearBlocksClient, FETCH_LIMIT, MAX_TRANSACTIONS } from './nearblocks.js';
import { NetworkError } from '../errors.js';

function txn(hash: string, timestamp: string, deposit: string | number = '0') {
  return {
    transaction_hash: hash,
    predecessor_account_id: 'alice.near',
    receiver_account_id: 'bob.near',
    block_timestamp: timestamp,
    actions_agg: { deposit },
  };
}

describe('NearBlocksClient', () => {
  let get: ReturnType<typeof vi.fn>;
  let client: NearBlocksClient;

  beforeEach(() => {
    get = vi.fn();
    client = new NearBlocksClient({ get } as unknown as AxiosInstance);
  });

  it('should request the account transaction list', async () => {
    get.mockResolvedValue({ data: { txns: [] } });

    await client.fetchTransactions('alice.near');

    expect(get).toHaveBeenCalledWith('/v1/account/alice.near/txns', { params: { limit: FETCH_LIMIT } });
  });

  it('should map, deduplicate and sort newest first', async () => {
    get.mockResolvedValue({
      data: {
        txns: [
          txn('h1', '1700000000000000000', '1000'),
          txn('h2', '1700000002000000000', 1.5e3),
          txn('h1', '1700000000000000000', '1000'),
          txn('h3', '1700000001000000000'),
        ],
      },
    });

    const txs = await client.fetchTransactions('alice.near');

    expect(txs).toEqual([
      { hash: 'h2', from: 'alice.near', to: 'bob.near', amount: 1500n, timestamp: '1700000002000000000' },
      { hash: 'h3', from: 'alice.near', to: 'bob.near', amount: 0n, timestamp: '1700000001000000000' },
      { hash: 'h1', from: 'alice.near', to: 'bob.near', amount: 1000n, timestamp: '1700000000000000000' },
    ]);
  });

  it('should compare timestamps numerically', async () => {
    get.mockResolvedValue({ data: { txns: [txn('short', '999'), txn('long', '1000')] } });

    const txs = await client.fetchTransactions('alice.near');

    expect(txs.map((t) => t.hash)).toEqual(['long', 'short']);
  });

  it('should return at most the newest ten', async () => {
    const txns = Array.from({ length: 15 }, (_, i) => txn(`h${i}`, String(1000 + i)));
    get.mockResolvedValue({ data: { txns } });

    const txs = await client.fetchTransactions('alice.near');

    expect(txs).toHaveLength(MAX_TRANSACTIONS);
    expect(txs[0].hash).toBe('h14');
    expect(txs[9].hash).toBe('h5');
  });

  it('should report the HTTP status of a failed request', async () => {
    get.mockRejectedValue(
      Object.assign(new Error('Request failed with status code 429'), {
        isAxiosError: true,
        response: { status: 429 },
      })
    );

    await expect(client.fetchTransactions('alice.near')).rejects.toThrow('HTTP request failed: status 429');
  });

  it('should report network failures', async () => {
    get.mockRejectedValue(new Error('socket hang up'));

    const error = await client.fetchTransactions('alice.near').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(NetworkError);
    expect(error).toHaveProperty('message', 'HTTP request failed: socket hang up');
  });

  it('should reject an unexpected payload', async () => {
    get.mockResolvedValue({ data: { transactions: [] } });

    await expect(client.fetchTransactions('alice.near')).rejects.toThrow(
      'Failed to parse response: unexpected transaction list shape'
    );
  });
});
