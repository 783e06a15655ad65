import type { MessageTransport, MonitorEntry, SubscriberId } from '../types.js';
import { logger, errorMessage } from '../logger.js';
import { formatNear } from '../utils/formatting.js';

export interface BroadcastResult {
  sent: number;
  failed: number;
}

/**
 * Alert text for a detected balance change; an unsampled old balance is shown as "Unknown"
 */
export function formatBalanceChange(accountId: string, oldBalance: bigint | null, newBalance: bigint): string {
  const old = oldBalance === null ? 'Unknown' : formatNear(oldBalance);
  return `🚨 Balance Update for ${accountId}!\n\nOld: ${old}\nNew: ${formatNear(newBalance)}`;
}

/**
 * Sends messages to subscribers. A failed delivery is logged and reported,
 * never thrown, so one unreachable chat cannot stall the caller.
 */
export class NotificationDispatcher {
  constructor(private readonly transport: MessageTransport) {}

  async deliver(subscriberId: SubscriberId, text: string): Promise<boolean> {
    try {
      await this.transport.sendMessage(subscriberId, text);
      return true;
    } catch (error) {
      logger.error({ chatId: subscriberId, error: errorMessage(error) }, 'Failed to deliver message');
      return false;
    }
  }

  notifyBalanceChange(entry: MonitorEntry, newBalance: bigint): Promise<boolean> {
    return this.deliver(entry.subscriberId, formatBalanceChange(entry.accountId, entry.lastBalance, newBalance));
  }

  async broadcast(subscriberIds: SubscriberId[], text: string): Promise<BroadcastResult> {
    logger.info({ userCount: subscriberIds.length }, 'Broadcasting notification');

    const result: BroadcastResult = { sent: 0, failed: 0 };
    for (const id of subscriberIds) {
      if (await this.deliver(id, text)) {
        result.sent++;
      } else {
        result.failed++;
      }
    }

    logger.info({ successful: result.sent, failed: result.failed }, 'Broadcast finished');
    return result;
  }
}
