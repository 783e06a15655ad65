/** Telegram chat id of the user receiving notifications */
export type SubscriberId = number;

export interface MonitorEntry {
  accountId: string;
  subscriberId: SubscriberId;
  /** Last observed balance in yoctoNEAR, null until the first sample */
  lastBalance: bigint | null;
}

export interface AccountTransaction {
  hash: string;
  from: string;
  to: string;
  /** Attached deposit in yoctoNEAR */
  amount: bigint;
  /** Block timestamp in nanoseconds, as returned by the indexer */
  timestamp: string;
}

export interface BalanceSource {
  fetchBalance(accountId: string): Promise<bigint>;
}

export interface TransactionSource {
  fetchTransactions(accountId: string): Promise<AccountTransaction[]>;
}

export type NearDataSource = BalanceSource & TransactionSource;

export interface MessageTransport {
  sendMessage(subscriberId: SubscriberId, text: string): Promise<void>;
}

export interface AppConfig {
  rpcUrl: string;
  rpcFallbackUrls: string[];
  nearBlocksApiUrl: string;
  telegramBotToken?: string;
  pollIntervalMs: number;
  requestTimeoutMs: number;
  watchlistFile: string;
  subscribersFile: string;
  logLevel: string;
  logPretty: boolean;
}
