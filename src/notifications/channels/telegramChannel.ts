import TelegramBot from 'node-telegram-bot-api';
import type { Logger } from 'pino';

import type { ChatBotChannel } from './types';

export class TelegramChannel implements ChatBotChannel {
  readonly enabled: boolean;

  constructor(
    private readonly bot: Pick<TelegramBot, 'sendMessage'> | null,
    private readonly logger: Logger
  ) {
    this.enabled = bot !== null;
  }

  async sendMessage(chatId: string, text: string): Promise<void> {
    if (!this.bot) {
      this.logger.debug({ chatId }, 'Telegram bot not configured; skipping message');
      return;
    }
    await this.bot.sendMessage(chatId, text);
  }
}

export function createTelegramChannel(token: string | undefined, logger: Logger): TelegramChannel {
  if (!token) {
    logger.warn('TELEGRAM_BOT_TOKEN is not set. Telegram notifications are disabled.');
    return new TelegramChannel(null, logger);
  }

  try {
    return new TelegramChannel(new TelegramBot(token, { polling: false }), logger);
  } catch (error) {
    logger.error({ err: error }, 'Failed to initialise Telegram bot; notifications disabled');
    return new TelegramChannel(null, logger);
  }
}
