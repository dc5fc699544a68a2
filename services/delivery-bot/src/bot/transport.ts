import type TelegramBot from 'node-telegram-bot-api';
import { DeliveryError, errorMessage } from '../lib/errors.js';
import type { NotificationSink } from '../cron/reminders.js';
import type { ChatId } from '../types.js';

/**
 * Та часть TelegramBot, которой пользуется бот.
 * TelegramBot подходит под интерфейс как есть; в тестах подделка.
 */
export interface ChatTransport {
  sendMessage(chatId: ChatId, text: string, options?: TelegramBot.SendMessageOptions): Promise<TelegramBot.Message>;
  editMessageText(text: string, options?: TelegramBot.EditMessageTextOptions): Promise<TelegramBot.Message | boolean>;
  answerCallbackQuery(callbackQueryId: string, options?: Partial<TelegramBot.AnswerCallbackQueryOptions>): Promise<boolean>;
}

export function createTelegramSink(transport: ChatTransport): NotificationSink {
  return {
    async send(recipient, text) {
      try {
        await transport.sendMessage(recipient, text);
      } catch (err) {
        throw new DeliveryError(String(recipient), `Telegram send failed: ${errorMessage(err)}`, { cause: err });
      }
    },
  };
}
