import type { AppConfig, AccountTransaction, NearDataSource } from './types.js';
import { NearRpcClient } from './near/rpcClient.js';
import { NearBlocksClient } from './near/nearblocks.js';

/**
 * Balance reads go to NEAR RPC, history reads to the NearBlocks indexer
 */
export class NearClient implements NearDataSource {
  constructor(
    private readonly rpc: NearRpcClient,
    private readonly indexer: NearBlocksClient
  ) {}

  fetchBalance(accountId: string): Promise<bigint> {
    return this.rpc.fetchBalance(accountId);
  }

  fetchTransactions(accountId: string): Promise<AccountTransaction[]> {
    return this.indexer.fetchTransactions(accountId);
  }
}

/**
 * Build the NEAR data source from config, with the primary RPC endpoint first
 */
export function createNearClient(config: AppConfig): NearClient {
  const rpcUrls = [config.rpcUrl, ...config.rpcFallbackUrls].filter(
    (url, index, self) => self.indexOf(url) === index
  );

  return new NearClient(
    NearRpcClient.fromOptions({ urls: rpcUrls, timeout: config.requestTimeoutMs }),
    NearBlocksClient.fromOptions({ baseUrl: config.nearBlocksApiUrl, timeout: config.requestTimeoutMs })
  );
}
