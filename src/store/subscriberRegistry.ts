import { Mutex } from 'async-mutex';
import { z } from 'zod';
import type { SubscriberId } from '../types.js';
import { logger } from '../logger.js';
import { readSnapshot, writeSnapshot, subscriberIdSchema } from './persistence.js';

const subscribersFileSchema = z.array(subscriberIdSchema);

/**
 * Append-only set of every chat that has talked to the bot, used for
 * broadcast notices such as the restart announcement
 */
export class SubscriberRegistry {
  private readonly lock = new Mutex();

  private constructor(
    private readonly filePath: string,
    private readonly subscribers: Set<SubscriberId>
  ) {}

  static async load(filePath: string): Promise<SubscriberRegistry> {
    const ids = await readSnapshot<SubscriberId[]>(filePath, subscribersFileSchema, () => []);
    const registry = new SubscriberRegistry(filePath, new Set(ids));
    logger.info({ file: filePath, userCount: registry.size }, 'User registry loaded');
    return registry;
  }

  get size(): number {
    return this.subscribers.size;
  }

  /**
   * Remember a subscriber. Resolves true (after persisting) only for a new id.
   */
  async register(id: SubscriberId): Promise<boolean> {
    return this.lock.runExclusive(async () => {
      if (this.subscribers.has(id)) {
        return false;
      }

      this.subscribers.add(id);
      logger.info({ chatId: id }, 'User added');
      const saved = await writeSnapshot(this.filePath, [...this.subscribers]);
      if (saved) {
        logger.debug({ file: this.filePath, userCount: this.subscribers.size }, 'User list saved');
      }
      return true;
    });
  }

  all(): SubscriberId[] {
    return [...this.subscribers];
  }
}
