import axios, { type AxiosInstance } from 'axios';
import { z } from 'zod';
import type { AccountTransaction, TransactionSource } from '../types.js';
import { NetworkError } from '../errors.js';
import { logger, errorMessage } from '../logger.js';

/** Transactions requested per call, before deduplication */
export const FETCH_LIMIT = 25;

/** Transactions returned to callers */
export const MAX_TRANSACTIONS = 10;

const nearBlocksTxnSchema = z.object({
  transaction_hash: z.string().min(1),
  predecessor_account_id: z.string(),
  receiver_account_id: z.string(),
  block_timestamp: z.string().regex(/^\d+$/),
  actions_agg: z.object({
    // Reported in yoctoNEAR, sometimes in float notation
    deposit: z.coerce.number().nonnegative(),
  }),
});

const nearBlocksResponseSchema = z.object({
  txns: z.array(nearBlocksTxnSchema),
});

export interface NearBlocksClientOptions {
  baseUrl: string;
  timeout: number;
}

/**
 * Recent transaction history from the NearBlocks indexer API
 */
export class NearBlocksClient implements TransactionSource {
  constructor(private readonly http: AxiosInstance) {}

  static fromOptions(options: NearBlocksClientOptions): NearBlocksClient {
    return new NearBlocksClient(
      axios.create({
        baseURL: options.baseUrl,
        timeout: options.timeout,
        headers: { Accept: 'application/json' },
      })
    );
  }

  /**
   * Up to MAX_TRANSACTIONS unique transactions of `accountId`, newest first
   */
  async fetchTransactions(accountId: string): Promise<AccountTransaction[]> {
    logger.debug({ account: accountId, limit: FETCH_LIMIT }, 'Fetching transactions');
    const start = Date.now();

    let data: unknown;
    try {
      const response = await this.http.get<unknown>(
        `/v1/account/${encodeURIComponent(accountId)}/txns`,
        { params: { limit: FETCH_LIMIT } }
      );
      data = response.data;
    } catch (error) {
      const status = axios.isAxiosError(error) ? error.response?.status : undefined;
      logger.error({ account: accountId, status, error: errorMessage(error) }, 'NearBlocks API request failed');
      throw new NetworkError(
        `HTTP request failed: ${status ? `status ${status}` : errorMessage(error)}`,
        error instanceof Error ? error : undefined
      );
    }

    logger.debug({ account: accountId, durationMs: Date.now() - start }, 'NearBlocks API responded');

    const parsed = nearBlocksResponseSchema.safeParse(data);
    if (!parsed.success) {
      logger.error({ account: accountId, error: parsed.error.message }, 'Failed to parse NearBlocks response');
      throw new NetworkError('Failed to parse response: unexpected transaction list shape');
    }

    const seenHashes = new Set<string>();
    const txs: AccountTransaction[] = [];

    for (const txn of parsed.data.txns) {
      if (seenHashes.has(txn.transaction_hash)) {
        continue;
      }
      seenHashes.add(txn.transaction_hash);
      txs.push({
        hash: txn.transaction_hash,
        from: txn.predecessor_account_id,
        to: txn.receiver_account_id,
        amount: BigInt(Math.trunc(txn.actions_agg.deposit)),
        timestamp: txn.block_timestamp,
      });
    }

    txs.sort((a, b) => {
      const diff = BigInt(b.timestamp) - BigInt(a.timestamp);
      return diff > 0n ? 1 : diff < 0n ? -1 : 0;
    });

    const result = txs.slice(0, MAX_TRANSACTIONS);
    logger.info({ account: accountId, count: result.length }, 'Fetched transactions');
    return result;
  }
}
