import type TelegramBot from 'node-telegram-bot-api';
import { describe, it, expect } from 'vitest';
import { DeliveryBotRouter, parseCommand } from './router.js';
import { IntakeWorkflow } from '../workflow/intake.js';
import { ReminderScheduler } from '../cron/reminders.js';
import { BotSettings } from '../settings.js';
import { formatReminder } from './views.js';
import { FakeTransport, MemoryStore, RecordingSink } from '../test/fakes.js';
import type { BotVariant, CustomerRecord } from '../types.js';

const NOW = new Date(2026, 9, 18, 12, 0);
const clock = () => NOW;
const CHAT_ID = 1;

function message(text: string): TelegramBot.Message {
  return { message_id: 1, date: 0, chat: { id: CHAT_ID, type: 'private' }, text };
}

function callback(data: string): TelegramBot.CallbackQuery {
  return {
    id: 'query-1',
    from: { id: CHAT_ID, is_bot: false, first_name: 'Test' },
    chat_instance: 'test-instance',
    data,
    message: { message_id: 50, date: 0, chat: { id: CHAT_ID, type: 'private' } },
  };
}

function setup(records: CustomerRecord[] = [], variant: BotVariant = 'delivery') {
  const transport = new FakeTransport();
  const store = new MemoryStore(records);
  const settings = new BotSettings({ orderAmountEnabled: false, splitPaymentEnabled: false, reminderTime: '09:00' });
  const workflow = new IntakeWorkflow(store, { variant, clock });
  const scheduler = new ReminderScheduler(store, new RecordingSink(), {
    schedule: { mode: 'daily', time: '09:00', cronEnabled: false },
    formatReminder,
    clock,
  });
  const router = new DeliveryBotRouter({ transport, store, workflow, settings, scheduler, variant, clock });
  return { transport, store, settings, workflow, scheduler, router };
}

const bob: CustomerRecord = { key: '@bob', targetDate: '2026-10-19', orderAmount: null, splitPayment: null, notified: false };

describe('parseCommand', () => {
  it('extracts the command name', () => {
    expect(parseCommand('/start')).toBe('start');
    expect(parseCommand('/ADD@delivery_bot')).toBe('add');
    expect(parseCommand('/list now')).toBe('list');
    expect(parseCommand('@alice')).toBeNull();
  });
});

describe('DeliveryBotRouter', () => {
  it('subscribes the chat on /start', async () => {
    const { transport, scheduler, router } = setup();
    await router.handleMessage(message('/start'));

    expect(transport.lastText()).toBe('👋 Добро пожаловать в бот для управления доставками!\n\nВыберите действие:');
    expect(scheduler.recipientList()).toEqual([CHAT_ID]);
  });

  it('adds a customer end to end', async () => {
    const { transport, store, router } = setup();

    await router.handleMessage(message('/add'));
    expect(transport.lastText()).toBe('Введите тег покупателя (например: @username или номер телефона):');

    await router.handleMessage(message('@alice'));
    expect(transport.lastText()).toBe('Покупатель: @alice\n\nВыберите дату доставки:');

    await router.handleCallback(callback('date:2026-10-21'));
    expect(store.get('@alice')).toEqual({
      key: '@alice',
      targetDate: '2026-10-21',
      orderAmount: null,
      splitPayment: null,
      notified: false,
    });
    expect(transport.texts().slice(-2)).toEqual([
      '✅ Покупатель @alice успешно добавлен!\n📅 Дата доставки: 21.10.2026',
      'Выберите следующее действие:',
    ]);
  });

  it('re-prompts on invalid input', async () => {
    const { transport, router } = setup();
    await router.handleMessage(message('/add'));
    await router.handleMessage(message('   '));

    expect(transport.lastText()).toBe('Тег не может быть пустым.\n\nВведите тег покупателя (например: @username или номер телефона):');
  });

  it('cancels an intake in progress', async () => {
    const { transport, workflow, router } = setup();
    await router.handleMessage(message('/add'));
    await router.handleMessage(message('/cancel'));

    expect(workflow.hasSession(String(CHAT_ID))).toBe(false);
    expect(transport.lastText()).toBe('Действие отменено.\n\nВыберите следующее действие:');
  });

  it('answers plain text outside of a dialog with the menu', async () => {
    const { transport, router } = setup();
    await router.handleMessage(message('привет'));
    expect(transport.lastText()).toBe('Выберите действие:');
  });

  it('lists customers', async () => {
    const { transport, router } = setup([bob]);
    await router.handleMessage(message('/list'));
    expect(transport.lastText()).toBe('👥 Список покупателей:\n\n1. 🟢 @bob\n   📅 19.10.2026 (через 1 день)');
  });

  it('deletes a customer from the detail view', async () => {
    const { transport, store, router } = setup([bob]);
    await router.handleCallback(callback('delete:@bob'));

    expect(store.get('@bob')).toBeUndefined();
    expect(transport.calls[0]).toEqual({ method: 'answerCallbackQuery', id: 'query-1', text: 'Покупатель удален!' });
    expect(transport.lastText()).toBe('Список покупателей пуст.');
  });

  it('reports a missing customer', async () => {
    const { transport, router } = setup();
    await router.handleCallback(callback('detail:@ghost'));
    expect(transport.calls[0]).toEqual({ method: 'answerCallbackQuery', id: 'query-1', text: 'Покупатель не найден!' });
  });

  it('toggles a payment flag', async () => {
    const client: CustomerRecord = {
      ...bob,
      key: 'RU1',
      orderAmount: 6000,
      payment: {
        productCount: 1,
        createdAt: NOW.toISOString(),
        dutyPaid: false,
        deliveryPaid: false,
        insurancePaid: false,
        depositPaid: false,
      },
    };
    const { transport, store, router } = setup([client], 'payments');

    await router.handleCallback(callback('paid:duty:RU1'));
    expect(store.get('RU1')?.payment?.dutyPaid).toBe(true);
    expect(transport.lastText()).toContain('Осталось оплатить: 11000 руб.');

    await router.handleCallback(callback('paid:duty:RU1'));
    expect(store.get('RU1')?.payment?.dutyPaid).toBe(false);
  });

  it('toggles settings', async () => {
    const { settings, router } = setup();
    await router.handleCallback(callback('toggle:split_payment'));
    expect(settings.snapshot().splitPaymentEnabled).toBe(true);
  });

  it('changes the reminder time', async () => {
    const { transport, settings, router } = setup();
    await router.handleCallback(callback('set_reminder_time'));
    expect(transport.lastText()).toBe('Введите время напоминания в формате ЧЧ:ММ (например, 10:00):');

    await router.handleMessage(message('99:99'));
    expect(transport.lastText()).toBe('Неверный формат времени. Введите время в формате ЧЧ:ММ:');

    await router.handleMessage(message('7:15'));
    expect(transport.lastText()).toBe('✅ Время напоминаний установлено: 07:15\n\nВыберите следующее действие:');
    expect(settings.snapshot().reminderTime).toBe('07:15');
  });

  it('only acknowledges unknown callback data', async () => {
    const { transport, router } = setup();
    await router.handleCallback(callback('legacy_button'));
    expect(transport.calls).toEqual([{ method: 'answerCallbackQuery', id: 'query-1', text: undefined }]);
  });

  it('ignores edits that change nothing', async () => {
    const { transport, router } = setup();
    transport.editError = new Error('ETELEGRAM: 400 Bad Request: message is not modified');
    await router.handleCallback(callback('menu'));
    expect(transport.texts()).toEqual([]);
  });

  it('tells the user when a handler fails', async () => {
    const { transport, router } = setup();
    transport.editError = new Error('ETELEGRAM: 502 Bad Gateway');
    await router.handleCallback(callback('help'));
    expect(transport.lastText()).toBe('Произошла ошибка. Попробуйте позже.');
  });
});
