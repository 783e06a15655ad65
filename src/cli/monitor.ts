import { setTimeout as sleep } from 'timers/promises';
import type { BalanceSource } from '../types.js';
import { logger, errorMessage } from '../logger.js';

export interface MonitorStats {
  polls: number;
  successes: number;
  errors: number;
}

export interface AccountMonitorOptions {
  intervalMs: number;
  heartbeatEvery?: number;
  onChange: (accountId: string, oldBalance: bigint | null, newBalance: bigint) => void;
  onError?: (accountId: string, error: unknown) => void;
}

export type PollOutcome = 'changed' | 'unchanged' | 'error';

/**
 * Console monitor for a single account. Keeps the last balance in memory only;
 * nothing is persisted.
 */
export class AccountMonitor {
  private lastBalance: bigint | null = null;
  private readonly stats: MonitorStats = { polls: 0, successes: 0, errors: 0 };
  private readonly startedAt = Date.now();
  private readonly heartbeatEvery: number;

  constructor(
    private readonly accountId: string,
    private readonly source: BalanceSource,
    private readonly options: AccountMonitorOptions
  ) {
    if (!Number.isFinite(options.intervalMs) || options.intervalMs <= 0) {
      throw new Error(`Monitor interval must be positive, got ${options.intervalMs}`);
    }
    this.heartbeatEvery = options.heartbeatEvery ?? 10;
  }

  getStats(): MonitorStats {
    return { ...this.stats };
  }

  getLastBalance(): bigint | null {
    return this.lastBalance;
  }

  async poll(): Promise<PollOutcome> {
    this.stats.polls++;
    logger.debug({ account: this.accountId, pollCount: this.stats.polls }, 'Monitor poll');

    let outcome: PollOutcome;
    try {
      const balance = await this.source.fetchBalance(this.accountId);
      this.stats.successes++;

      if (balance !== this.lastBalance) {
        logger.info(
          { account: this.accountId, old: this.lastBalance?.toString() ?? null, new: balance.toString() },
          'Balance changed'
        );
        this.options.onChange(this.accountId, this.lastBalance, balance);
        this.lastBalance = balance;
        outcome = 'changed';
      } else {
        outcome = 'unchanged';
      }
    } catch (error) {
      this.stats.errors++;
      logger.error({ account: this.accountId, error: errorMessage(error) }, 'Monitor fetch failed');
      this.options.onError?.(this.accountId, error);
      outcome = 'error';
    }

    if (this.stats.polls % this.heartbeatEvery === 0) {
      logger.info(
        {
          account: this.accountId,
          uptimeSecs: Math.floor((Date.now() - this.startedAt) / 1000),
          ...this.stats,
        },
        'Monitor heartbeat'
      );
    }

    return outcome;
  }

  /**
   * Poll immediately, then once per interval until `signal` aborts
   */
  async run(signal: AbortSignal): Promise<void> {
    logger.info({ account: this.accountId, intervalMs: this.options.intervalMs }, 'Monitor started');

    while (!signal.aborted) {
      const tickStart = Date.now();
      await this.poll();

      const delay = Math.max(0, this.options.intervalMs - (Date.now() - tickStart));
      try {
        await sleep(delay, undefined, { signal });
      } catch (error) {
        if (signal.aborted) {
          break;
        }
        throw error;
      }
    }

    logger.info({ account: this.accountId, ...this.stats }, 'Monitor stopped');
  }
}
