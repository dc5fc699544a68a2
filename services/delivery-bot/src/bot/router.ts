import type TelegramBot from 'node-telegram-bot-api';
import { createLogger } from '../lib/logger.js';
import { NotFoundError, ValidationError, errorMessage } from '../lib/errors.js';
import { systemClock, type Clock } from '../lib/dates.js';
import { isCategoryPaid } from '../lib/payments.js';
import type { RecordStore } from '../store/recordStore.js';
import type { IntakeInput, IntakeOutcome, IntakeWorkflow } from '../workflow/intake.js';
import { parseTimeOfDay } from '../workflow/validation.js';
import type { ReminderScheduler } from '../cron/reminders.js';
import type { BotSettings } from '../settings.js';
import type { BotVariant, ChatId } from '../types.js';
import { decodeAction, type BotAction } from './actions.js';
import type { ChatTransport } from './transport.js';
import {
  cancelledView,
  customerAddedView,
  customerDetailView,
  customerListView,
  helpView,
  intakePromptView,
  mainMenuView,
  rejectionText,
  reminderTimePromptView,
  reminderTimeSavedView,
  settingsView,
  welcomeView,
  type View,
} from './views.js';

const logger = createLogger({ module: 'router' });

const GENERIC_ERROR_TEXT = 'Произошла ошибка. Попробуйте позже.';
const NOT_FOUND_TEXT = 'Покупатель не найден!';

export interface RouterDeps {
  transport: ChatTransport;
  store: RecordStore;
  workflow: IntakeWorkflow;
  settings: BotSettings;
  scheduler: ReminderScheduler;
  variant: BotVariant;
  clock?: Clock;
}

/** Куда выводить ответ: новым сообщением или правкой сообщения с кнопкой */
type Target =
  | { kind: 'chat'; chatId: ChatId }
  | { kind: 'callback'; chatId: ChatId; messageId: number | undefined };

export function parseCommand(text: string): string | null {
  const match = /^\/([a-z_]+)(?:@\w+)?(?:\s|$)/i.exec(text.trim());
  return match ? match[1].toLowerCase() : null;
}

export class DeliveryBotRouter {
  private readonly transport: ChatTransport;
  private readonly store: RecordStore;
  private readonly workflow: IntakeWorkflow;
  private readonly settings: BotSettings;
  private readonly scheduler: ReminderScheduler;
  private readonly variant: BotVariant;
  private readonly clock: Clock;
  // диалоги, где следующий текст — время напоминаний
  private readonly awaitingReminderTime = new Set<string>();

  constructor(deps: RouterDeps) {
    this.transport = deps.transport;
    this.store = deps.store;
    this.workflow = deps.workflow;
    this.settings = deps.settings;
    this.scheduler = deps.scheduler;
    this.variant = deps.variant;
    this.clock = deps.clock ?? systemClock;
  }

  register(bot: TelegramBot): void {
    bot.on('message', (msg) => {
      this.handleMessage(msg).catch(err => {
        logger.error({ error: errorMessage(err) }, 'Unhandled message error');
      });
    });
    bot.on('callback_query', (query) => {
      this.handleCallback(query).catch(err => {
        logger.error({ error: errorMessage(err) }, 'Unhandled callback error');
      });
    });
    bot.on('polling_error', (err) => {
      logger.error({ error: err.message }, 'Polling error');
    });
    logger.info('Telegram handlers registered');
  }

  async handleMessage(msg: TelegramBot.Message): Promise<void> {
    const text = msg.text;
    if (text === undefined) return;

    const target: Target = { kind: 'chat', chatId: msg.chat.id };
    const command = parseCommand(text);

    await this.safely(target, command ? `/${command}` : 'text', async () => {
      if (command) {
        await this.handleCommand(command, target);
      } else {
        await this.handleText(text, target);
      }
    });
  }

  async handleCallback(query: TelegramBot.CallbackQuery): Promise<void> {
    const chatId = query.message?.chat.id ?? query.from.id;
    const target: Target = { kind: 'callback', chatId, messageId: query.message?.message_id };
    const action = decodeAction(query.data);

    if (!action) {
      logger.warn({ chatId, data: query.data }, 'Unknown callback data');
      await this.transport.answerCallbackQuery(query.id);
      return;
    }

    await this.safely(target, action.type, () => this.handleAction(action, query.id, target));
  }

  private async handleCommand(command: string, target: Target): Promise<void> {
    const conversationId = String(target.chatId);

    switch (command) {
      case 'start':
        if (this.scheduler.addRecipient(target.chatId)) {
          logger.info({ chatId: target.chatId }, 'Chat subscribed to reminders');
        }
        await this.render(target, welcomeView());
        return;
      case 'add':
        this.awaitingReminderTime.delete(conversationId);
        await this.render(target, intakePromptView(this.workflow.start(conversationId, this.settings.snapshot())));
        return;
      case 'list':
        await this.render(target, customerListView(this.store.list(), this.clock()));
        return;
      case 'help':
        await this.render(target, helpView(this.variant));
        return;
      case 'cancel':
        this.workflow.cancel(conversationId);
        this.awaitingReminderTime.delete(conversationId);
        await this.render(target, cancelledView());
        return;
      default:
        await this.render(target, mainMenuView('Неизвестная команда. Выберите действие:'));
    }
  }

  private async handleText(text: string, target: Target): Promise<void> {
    const conversationId = String(target.chatId);

    if (this.awaitingReminderTime.has(conversationId)) {
      await this.applyReminderTime(text, target);
      return;
    }

    if (this.workflow.hasSession(conversationId)) {
      await this.advanceIntake(target, { kind: 'text', text });
      return;
    }

    await this.render(target, mainMenuView('Выберите действие:'));
  }

  private async handleAction(action: BotAction, queryId: string, target: Target): Promise<void> {
    const conversationId = String(target.chatId);

    switch (action.type) {
      case 'add': {
        await this.transport.answerCallbackQuery(queryId);
        this.awaitingReminderTime.delete(conversationId);
        const outcome = this.workflow.start(conversationId, this.settings.snapshot());
        await this.render(target, intakePromptView(outcome));
        return;
      }

      case 'pick_date':
      case 'custom_date':
      case 'split':
        await this.transport.answerCallbackQuery(queryId);
        await this.advanceIntake(target, { kind: 'action', action });
        return;

      case 'cancel':
        await this.transport.answerCallbackQuery(queryId);
        this.workflow.cancel(conversationId);
        this.awaitingReminderTime.delete(conversationId);
        await this.render(target, cancelledView());
        return;

      case 'menu':
        await this.transport.answerCallbackQuery(queryId);
        this.workflow.cancel(conversationId);
        this.awaitingReminderTime.delete(conversationId);
        await this.render(target, mainMenuView());
        return;

      case 'list':
        await this.transport.answerCallbackQuery(queryId);
        await this.render(target, customerListView(this.store.list(), this.clock()));
        return;

      case 'settings':
        await this.transport.answerCallbackQuery(queryId);
        await this.render(target, settingsView(this.settings.snapshot(), this.variant));
        return;

      case 'help':
        await this.transport.answerCallbackQuery(queryId);
        await this.render(target, helpView(this.variant));
        return;

      case 'detail': {
        const record = this.store.get(action.key);
        if (!record) {
          await this.transport.answerCallbackQuery(queryId, { text: NOT_FOUND_TEXT });
          await this.render(target, customerListView(this.store.list(), this.clock()));
          return;
        }
        await this.transport.answerCallbackQuery(queryId);
        await this.render(target, customerDetailView(record, this.clock()));
        return;
      }

      case 'delete': {
        const result = await this.store.delete(action.key);
        await this.transport.answerCallbackQuery(queryId, {
          text: result === 'deleted' ? 'Покупатель удален!' : NOT_FOUND_TEXT,
        });
        if (result === 'deleted') {
          logger.info({ key: action.key }, 'Customer deleted');
        }
        await this.render(target, customerListView(this.store.list(), this.clock()));
        return;
      }

      case 'toggle_setting': {
        const enabled = this.settings.toggle(action.setting);
        logger.info({ setting: action.setting, enabled }, 'Setting toggled');
        await this.transport.answerCallbackQuery(queryId);
        await this.render(target, settingsView(this.settings.snapshot(), this.variant));
        return;
      }

      case 'set_reminder_time':
        await this.transport.answerCallbackQuery(queryId);
        this.awaitingReminderTime.add(conversationId);
        await this.render(target, reminderTimePromptView());
        return;

      case 'toggle_paid':
        await this.togglePaid(action.key, action.category, queryId, target);
        return;

      default: {
        const unreachable: never = action;
        throw new Error(`Unhandled action ${JSON.stringify(unreachable)}`);
      }
    }
  }

  private async togglePaid(
    key: string,
    category: Extract<BotAction, { type: 'toggle_paid' }>['category'],
    queryId: string,
    target: Target,
  ): Promise<void> {
    try {
      const current = this.store.get(key);
      if (!current) throw new NotFoundError(key);

      const updated = await this.store.setPaymentFlag(key, category, !isCategoryPaid(current, category));
      await this.transport.answerCallbackQuery(queryId);
      await this.render(target, customerDetailView(updated, this.clock()));
    } catch (err) {
      if (err instanceof NotFoundError) {
        await this.transport.answerCallbackQuery(queryId, { text: NOT_FOUND_TEXT });
        await this.render(target, customerListView(this.store.list(), this.clock()));
        return;
      }
      if (err instanceof ValidationError) {
        await this.transport.answerCallbackQuery(queryId, { text: rejectionText(err.reason) });
        return;
      }
      throw err;
    }
  }

  private async advanceIntake(target: Target, input: IntakeInput): Promise<void> {
    const conversationId = String(target.chatId);
    const outcome = await this.workflow.handle(conversationId, input);

    if (!outcome) {
      await this.render(target, mainMenuView('Сессия добавления не найдена. Выберите действие:'));
      return;
    }
    await this.renderOutcome(target, outcome);
  }

  private async renderOutcome(target: Target, outcome: IntakeOutcome): Promise<void> {
    switch (outcome.type) {
      case 'prompt':
        await this.render(target, intakePromptView(outcome));
        return;
      case 'cancelled':
        await this.render(target, cancelledView());
        return;
      case 'completed':
        this.scheduler.track(outcome.record);
        await this.render(target, customerAddedView(outcome.record));
        await this.render({ kind: 'chat', chatId: target.chatId }, mainMenuView('Выберите следующее действие:'));
        return;
    }
  }

  private async applyReminderTime(text: string, target: Target): Promise<void> {
    try {
      const time = parseTimeOfDay(text);
      this.awaitingReminderTime.delete(String(target.chatId));
      this.settings.setReminderTime(time);
      const applied = this.scheduler.reschedule(time);
      await this.render(target, reminderTimeSavedView(time, applied));
    } catch (err) {
      if (err instanceof ValidationError) {
        await this.render(target, { text: rejectionText(err.reason) });
        return;
      }
      throw err;
    }
  }

  private async render(target: Target, view: View): Promise<void> {
    if (target.kind === 'callback' && target.messageId !== undefined) {
      try {
        await this.transport.editMessageText(view.text, {
          chat_id: target.chatId,
          message_id: target.messageId,
          reply_markup: view.keyboard,
        });
        return;
      } catch (err) {
        // Telegram отвечает 400, если текст и клавиатура не изменились
        if (errorMessage(err).includes('message is not modified')) return;
        throw err;
      }
    }

    await this.transport.sendMessage(target.chatId, view.text, view.keyboard ? { reply_markup: view.keyboard } : undefined);
  }

  private async safely(target: Target, label: string, fn: () => Promise<void>): Promise<void> {
    try {
      await fn();
    } catch (err) {
      logger.error({ chatId: target.chatId, error: errorMessage(err) }, `Error in ${label}`);
      await this.transport.sendMessage(target.chatId, GENERIC_ERROR_TEXT).catch(sendErr => {
        logger.error({ chatId: target.chatId, error: errorMessage(sendErr) }, 'Failed to send error message');
      });
    }
  }
}
