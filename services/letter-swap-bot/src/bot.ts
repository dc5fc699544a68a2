import type TelegramBot from 'node-telegram-bot-api';
import { createLogger } from './lib/logger.js';
import { processText, type RandomSource } from './lib/letterSwap.js';

const logger = createLogger({ module: 'bot' });

export const WELCOME_TEXT = 'Отправьте текст, я заменю буквы а,е,с,о,р,х,у на латинские с шансом 50%';
export const EMPTY_TEXT_REPLY = 'Отправьте текст';
export const PROCESSING_PLACEHOLDER = '⏳';

/** Методы TelegramBot, которыми пользуется бот */
export interface ReplyTransport {
  sendMessage(chatId: TelegramBot.ChatId, text: string): Promise<TelegramBot.Message>;
  deleteMessage(chatId: TelegramBot.ChatId, messageId: number): Promise<boolean>;
}

export interface LetterSwapBotOptions {
  maxTextLength: number;
  random?: RandomSource;
}

export class LetterSwapBot {
  private readonly transport: ReplyTransport;
  private readonly maxTextLength: number;
  private readonly random: RandomSource;

  constructor(transport: ReplyTransport, options: LetterSwapBotOptions) {
    this.transport = transport;
    this.maxTextLength = options.maxTextLength;
    this.random = options.random ?? Math.random;
  }

  register(bot: TelegramBot): void {
    bot.on('message', (msg) => {
      this.handleMessage(msg).catch(err => {
        logger.error({ chatId: msg.chat.id, error: err instanceof Error ? err.message : String(err) }, 'Error handling message');
      });
    });
    bot.on('polling_error', (err) => {
      logger.error({ error: err.message }, 'Polling error');
    });
  }

  async handleMessage(msg: TelegramBot.Message): Promise<void> {
    const chatId = msg.chat.id;
    const text = msg.text;
    if (text === undefined) return;

    if (/^\/start(?:@\w+)?(?:\s|$)/.test(text)) {
      await this.transport.sendMessage(chatId, WELCOME_TEXT);
      return;
    }
    // прочие команды не обрабатываем
    if (text.startsWith('/')) return;

    if (!text.trim()) {
      await this.transport.sendMessage(chatId, EMPTY_TEXT_REPLY);
      return;
    }

    const placeholder = await this.transport.sendMessage(chatId, PROCESSING_PLACEHOLDER);
    const result = processText(text, this.maxTextLength, this.random);

    try {
      await this.transport.deleteMessage(chatId, placeholder.message_id);
    } catch (err) {
      logger.warn({ chatId, error: err instanceof Error ? err.message : String(err) }, 'Failed to delete placeholder');
    }

    await this.transport.sendMessage(chatId, result);
    logger.debug({ chatId, length: text.length }, 'Text processed');
  }
}
