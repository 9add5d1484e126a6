import { logger } from '../../utils/logger.js';
import { NoopSink } from './noop-sink.js';
import { TelegramSink } from './telegram-sink.js';
import type { AppConfig } from '../../types/index.js';
import type { NotificationSink } from './types.js';

export type { NotificationSink } from './types.js';
export { NoopSink } from './noop-sink.js';
export { TelegramSink, escapeMarkdown, formatNewToken, formatStatusChange, formatBlacklist } from './telegram-sink.js';

export function createNotificationSink(config: AppConfig): NotificationSink {
  if (!config.telegramBotToken || !config.telegramChatId) {
    logger.warn('Telegram bot token not configured - alerts disabled');
    return new NoopSink();
  }
  return TelegramSink.fromToken(config.telegramBotToken, {
    chatId: config.telegramChatId,
    minInvestScore: config.scoring.investableThreshold,
  });
}
