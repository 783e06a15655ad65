import { BaseError, createClient, fallback, http, rpcSchema, type Client, type Transport } from 'viem';
import { z } from 'zod';
import type { BalanceSource } from '../types.js';
import { NetworkError } from '../errors.js';
import { logger, errorMessage } from '../logger.js';

export interface NearRpcClientOptions {
  urls: string[];
  /** Per-request timeout (ms) */
  timeout: number;
  retryCount?: number;
}

/** JSON-RPC methods this client calls */
export type NearRpcSchema = [
  {
    Method: 'query';
    Parameters: { request_type: 'view_account'; finality: 'final'; account_id: string };
    ReturnType: unknown;
  },
];

export type NearViemClient = Client<Transport, undefined, undefined, NearRpcSchema>;

const accountViewSchema = z.object({
  amount: z.string().regex(/^\d+$/, 'amount must be a decimal integer string'),
});

/**
 * Build a JSON-RPC transport over the given endpoints, failing over in order
 * when more than one is configured
 */
export function createNearTransport(options: NearRpcClientOptions): Transport {
  if (options.urls.length === 0) {
    throw new Error('At least one NEAR RPC endpoint is required');
  }

  const transports = options.urls.map((url) =>
    http(url, { timeout: options.timeout, retryCount: options.retryCount ?? 1 })
  );

  return transports.length === 1 ? transports[0] : fallback(transports);
}

/**
 * Balance lookups against the NEAR JSON-RPC `view_account` query
 */
export class NearRpcClient implements BalanceSource {
  constructor(private readonly client: NearViemClient) {}

  static fromOptions(options: NearRpcClientOptions): NearRpcClient {
    logger.info({ endpoints: options.urls }, 'NEAR RPC client initialized');
    return new NearRpcClient(
      createClient({ transport: createNearTransport(options), rpcSchema: rpcSchema<NearRpcSchema>() })
    );
  }

  /**
   * Current balance of `accountId` in yoctoNEAR, at final finality
   */
  async fetchBalance(accountId: string): Promise<bigint> {
    logger.debug({ account: accountId }, 'Fetching balance');
    const start = Date.now();

    let result: unknown;
    try {
      result = await this.client.request({
        method: 'query',
        params: {
          request_type: 'view_account',
          finality: 'final',
          account_id: accountId,
        },
      });
    } catch (error) {
      const message = error instanceof BaseError ? error.shortMessage : errorMessage(error);
      logger.error({ account: accountId, error: message }, 'NEAR RPC request failed');
      throw new NetworkError(`RPC error: ${message}`, error instanceof Error ? error : undefined);
    }

    logger.debug({ account: accountId, durationMs: Date.now() - start }, 'RPC request completed');

    const parsed = accountViewSchema.safeParse(result);
    if (!parsed.success) {
      logger.error({ account: accountId, error: parsed.error.message }, 'Failed to parse RPC response');
      throw new NetworkError('Failed to parse response: no account balance in result');
    }

    const balance = BigInt(parsed.data.amount);
    logger.debug({ account: accountId, balanceYocto: balance.toString() }, 'Fetched balance');
    return balance;
  }
}
