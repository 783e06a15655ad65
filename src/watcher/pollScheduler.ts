import type { BalanceSource, MonitorEntry } from '../types.js';
import type { WatchlistStore } from '../store/watchlistStore.js';
import type { NotificationDispatcher } from '../notifications/dispatcher.js';
import { logger, errorMessage } from '../logger.js';

export interface PollSchedulerConfig {
  intervalMs: number;
  heartbeatEvery?: number;
}

export interface CycleReport {
  cycle: number;
  /** Entries whose account balance was fetched */
  checked: number;
  /** Entries whose balance differed from the last sample */
  changed: number;
  /** Entries skipped because their account could not be fetched */
  failed: number;
  /** Change notifications delivered */
  notified: number;
}

const DEFAULT_HEARTBEAT_EVERY = 10;

function groupByAccount(entries: MonitorEntry[]): Map<string, MonitorEntry[]> {
  const groups = new Map<string, MonitorEntry[]>();
  for (const entry of entries) {
    const group = groups.get(entry.accountId);
    if (group) {
      group.push(entry);
    } else {
      groups.set(entry.accountId, [entry]);
    }
  }
  return groups;
}

/**
 * Background balance poller for the whole watchlist.
 *
 * - Runs one cycle immediately on start, then one per interval (fixed rate)
 * - Never overlaps cycles; an overrunning cycle is followed straight away by the
 *   next one and the cadence restarts from there
 * - Fetches each distinct account once per cycle but notifies and updates every
 *   subscribing entry independently
 * - Holds no store lock while talking to the network
 */
export class PollScheduler {
  private readonly config: Required<PollSchedulerConfig>;
  private timer: NodeJS.Timeout | null = null;
  private inFlight: Promise<void> | null = null;
  private running = false;
  private cycleCount = 0;
  private startedAt = 0;
  private nextTickAt = 0;
  /** Bumped on every start so ticks left over from an earlier run exit */
  private generation = 0;

  constructor(
    private readonly store: WatchlistStore,
    private readonly source: BalanceSource,
    private readonly dispatcher: NotificationDispatcher,
    config: PollSchedulerConfig
  ) {
    if (!Number.isFinite(config.intervalMs) || config.intervalMs <= 0) {
      throw new Error(`Poll interval must be positive, got ${config.intervalMs}`);
    }
    this.config = {
      intervalMs: config.intervalMs,
      heartbeatEvery: config.heartbeatEvery ?? DEFAULT_HEARTBEAT_EVERY,
    };
  }

  /**
   * Start polling. Aborting `signal` stops the loop like stop().
   */
  start(signal?: AbortSignal): void {
    if (this.running || signal?.aborted) {
      return;
    }

    this.running = true;
    const generation = ++this.generation;
    this.startedAt = Date.now();
    this.nextTickAt = this.startedAt;
    signal?.addEventListener('abort', () => void this.stop(), { once: true });

    logger.info({ intervalMs: this.config.intervalMs }, 'Background monitoring task started');
    this.scheduleNext(generation);
  }

  /**
   * Cancel the pending tick and wait for an in-flight cycle to finish
   */
  async stop(): Promise<void> {
    if (this.running) {
      logger.info({ cycles: this.cycleCount }, 'Background monitoring task stopping');
    }
    this.running = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    await this.inFlight;
  }

  isRunning(): boolean {
    return this.running;
  }

  getCycleCount(): number {
    return this.cycleCount;
  }

  private scheduleNext(generation: number): void {
    if (!this.running || generation !== this.generation) {
      return;
    }
    const delay = Math.max(0, this.nextTickAt - Date.now());
    this.timer = setTimeout(() => void this.tick(generation), delay);
  }

  private async tick(generation: number): Promise<void> {
    this.timer = null;

    // A restart while the previous run's cycle is still going waits for it
    while (this.inFlight) {
      await this.inFlight;
    }
    if (!this.running || generation !== this.generation) {
      return;
    }

    const scheduledAt = this.nextTickAt;
    const cycle = this.runCycle().then(
      () => undefined,
      (error: unknown) => {
        logger.error({ error: errorMessage(error) }, 'Poll cycle failed');
      }
    );
    this.inFlight = cycle;
    await cycle;
    if (this.inFlight === cycle) {
      this.inFlight = null;
    }
    if (generation !== this.generation) {
      return;
    }

    this.nextTickAt = Math.max(scheduledAt + this.config.intervalMs, Date.now());
    this.scheduleNext(generation);
  }

  /**
   * Poll every watchlist entry once
   */
  async runCycle(): Promise<CycleReport> {
    const cycle = ++this.cycleCount;
    const entries = await this.store.snapshotAll();
    const accounts = groupByAccount(entries);

    logger.debug(
      { cycle, entryCount: entries.length, accountCount: accounts.size },
      'Background poll cycle'
    );

    const report: CycleReport = { cycle, checked: 0, changed: 0, failed: 0, notified: 0 };

    for (const [accountId, accountEntries] of accounts) {
      let balance: bigint;
      try {
        balance = await this.source.fetchBalance(accountId);
      } catch (error) {
        report.failed += accountEntries.length;
        logger.error({ account: accountId, error: errorMessage(error) }, 'Error fetching balance');
        continue;
      }

      report.checked += accountEntries.length;

      for (const entry of accountEntries) {
        if (entry.lastBalance === balance) {
          continue;
        }

        report.changed++;
        logger.info(
          {
            account: accountId,
            chatId: entry.subscriberId,
            old: entry.lastBalance?.toString() ?? null,
            new: balance.toString(),
          },
          'Balance change detected'
        );

        if (await this.dispatcher.notifyBalanceChange(entry, balance)) {
          report.notified++;
        }
        await this.store.updateBalance(entry.accountId, entry.subscriberId, balance);
      }
    }

    if (cycle % this.config.heartbeatEvery === 0) {
      logger.info(
        {
          cycle,
          uptimeMins: Math.floor((Date.now() - this.startedAt) / 60_000),
          activeAccounts: entries.length,
        },
        'Background monitor heartbeat'
      );
    }

    return report;
  }
}
