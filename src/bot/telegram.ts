import { Bot, type Api } from 'grammy';
import type { AppConfig, MessageTransport, NearDataSource, SubscriberId } from '../types.js';
import { ConfigError } from '../errors.js';
import { logger, errorMessage } from '../logger.js';
import { WatchlistStore } from '../store/watchlistStore.js';
import { SubscriberRegistry } from '../store/subscriberRegistry.js';
import { NotificationDispatcher } from '../notifications/dispatcher.js';
import { PollScheduler } from '../watcher/pollScheduler.js';
import { BOT_COMMANDS, CommandHandler } from './commands.js';

export const RESTART_NOTICE = '🚀 New version deployed and bot restarted!';

/**
 * Delivers plain-text messages to Telegram chats
 */
export class TelegramTransport implements MessageTransport {
  constructor(private readonly api: Pick<Api, 'sendMessage'>) {}

  async sendMessage(subscriberId: SubscriberId, text: string): Promise<void> {
    await this.api.sendMessage(subscriberId, text);
  }
}

/**
 * Route every bot command through `handler` and reply with its text
 */
export function registerCommands(bot: Pick<Bot, 'command' | 'catch'>, handler: CommandHandler): void {
  for (const { command } of BOT_COMMANDS) {
    bot.command(command, async (ctx) => {
      const chatId = ctx.chat?.id;
      if (chatId === undefined) {
        return;
      }
      const reply = await handler.execute(chatId, command, ctx.match);
      await ctx.reply(reply);
    });
  }

  bot.catch((err) => {
    logger.error(
      { chatId: err.ctx.chat?.id, error: errorMessage(err.error) },
      'Error while handling update'
    );
  });
}

/**
 * Run the Telegram bot and the background poller until `signal` aborts
 */
export async function runBot(config: AppConfig, source: NearDataSource, signal?: AbortSignal): Promise<void> {
  if (!config.telegramBotToken) {
    throw new ConfigError('TELEGRAM_BOT_TOKEN is required to run the bot');
  }

  logger.info('Starting NEAR Balance Monitor Bot');

  const [store, registry] = await Promise.all([
    WatchlistStore.load(config.watchlistFile),
    SubscriberRegistry.load(config.subscribersFile),
  ]);

  const bot = new Bot(config.telegramBotToken);
  const dispatcher = new NotificationDispatcher(new TelegramTransport(bot.api));
  registerCommands(bot, new CommandHandler(store, registry, source));

  const { sent, failed } = await dispatcher.broadcast(registry.all(), RESTART_NOTICE);
  logger.info({ successful: sent, failed }, 'Restart notification sent');

  try {
    await bot.api.setMyCommands(
      BOT_COMMANDS.map(({ command, description }) => ({ command, description }))
    );
  } catch (error) {
    logger.warn({ error: errorMessage(error) }, 'Failed to register bot command menu');
  }

  if (signal?.aborted) {
    return;
  }

  const scheduler = new PollScheduler(store, source, dispatcher, { intervalMs: config.pollIntervalMs });
  scheduler.start(signal);

  signal?.addEventListener(
    'abort',
    () => {
      bot.stop().catch((error: unknown) => {
        logger.error({ error: errorMessage(error) }, 'Failed to stop bot');
      });
    },
    { once: true }
  );

  try {
    await bot.start({
      onStart: (info) => logger.info({ username: info.username }, 'Bot is polling for updates'),
    });
  } finally {
    await scheduler.stop();
    logger.info('Bot stopped');
  }
}
