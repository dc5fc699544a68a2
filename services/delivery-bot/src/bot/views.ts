import type TelegramBot from 'node-telegram-bot-api';
import { format } from 'date-fns';
import { ru } from 'date-fns/locale';
import { daysUntil, formatDisplayDate, fromIsoDate } from '../lib/dates.js';
import type { ValidationReason } from '../lib/errors.js';
import { calculatePayments, isCategoryPaid, outstandingPayments, totalOf, PAYMENT_CATEGORIES } from '../lib/payments.js';
import type { PromptOutcome } from '../workflow/intake.js';
import type { BotSettingsSnapshot, BotVariant, CustomerRecord, PaymentCategory } from '../types.js';
import { encodeAction, type BotAction } from './actions.js';

export interface View {
  text: string;
  keyboard?: TelegramBot.InlineKeyboardMarkup;
}

/** Сколько покупателей получают кнопку детализации в списке */
export const LIST_DETAIL_LIMIT = 10;

/** Лимит Telegram на длину текста сообщения */
export const MESSAGE_TEXT_LIMIT = 4096;

const CATEGORY_LABELS: Record<PaymentCategory, string> = {
  duty: 'Пошлина',
  delivery: 'Доставка',
  insurance: 'Страховка',
  deposit: 'Залог',
};

function button(text: string, action: BotAction): TelegramBot.InlineKeyboardButton {
  return { text, callback_data: encodeAction(action) };
}

function backToMenuRow(): TelegramBot.InlineKeyboardButton[] {
  return [button('⬅️ Назад', { type: 'menu' })];
}

export function formatAmount(amount: number): string {
  return Number.isInteger(amount) ? String(amount) : amount.toFixed(2);
}

export function pluralDays(n: number): string {
  const abs = Math.abs(n) % 100;
  const last = abs % 10;
  if (abs > 10 && abs < 20) return 'дней';
  if (last === 1) return 'день';
  if (last >= 2 && last <= 4) return 'дня';
  return 'дней';
}

function splitLabel(split: boolean | null): string {
  if (split === null) return 'Не указано';
  return split ? 'Да' : 'Нет';
}

// =====================================================
// MENUS
// =====================================================

export function buildMainMenuKeyboard(): TelegramBot.InlineKeyboardMarkup {
  return {
    inline_keyboard: [
      [button('📝 Добавить покупателя', { type: 'add' })],
      [button('👥 Список покупателей', { type: 'list' })],
      [button('⚙️ Настройки', { type: 'settings' })],
      [button('ℹ️ Помощь', { type: 'help' })],
    ],
  };
}

export function welcomeView(): View {
  return {
    text: '👋 Добро пожаловать в бот для управления доставками!\n\nВыберите действие:',
    keyboard: buildMainMenuKeyboard(),
  };
}

export function mainMenuView(text = 'Главное меню. Выберите действие:'): View {
  return { text, keyboard: buildMainMenuKeyboard() };
}

export function helpView(variant: BotVariant): View {
  const lines = [
    'ℹ️ Помощь по использованию бота:',
    '',
    '📝 Добавить покупателя - добавление нового покупателя с указанием даты доставки',
    '👥 Список покупателей - просмотр всех покупателей и их деталей',
    '⚙️ Настройки - включение/выключение дополнительных функций',
    '',
    'Функции в настройках:',
    '• Ввод суммы заказа - запрашивать сумму заказа при добавлении',
    '• Сплит-оплата - спрашивать о раздельной оплате',
    '• Настройка времени - установить время отправки напоминаний',
    '',
    variant === 'payments'
      ? 'Бот напомнит о клиенте через заданное число дней после добавления!'
      : 'Бот автоматически напоминает о доставке в день доставки!',
    '',
    'Команды: /add, /list, /cancel',
  ];
  return { text: lines.join('\n'), keyboard: { inline_keyboard: [backToMenuRow()] } };
}

export function settingsView(settings: BotSettingsSnapshot, variant: BotVariant): View {
  const status = (enabled: boolean) => (enabled ? '✅ ВКЛ' : '❌ ВЫКЛ');
  const rows: TelegramBot.InlineKeyboardButton[][] = [];

  // в варианте payments сумма заказа обязательна, переключать нечего
  if (variant !== 'payments') {
    rows.push([button(`💰 Ввод суммы заказа: ${status(settings.orderAmountEnabled)}`, { type: 'toggle_setting', setting: 'order_amount' })]);
  }
  rows.push([button(`💳 Сплит-оплата: ${status(settings.splitPaymentEnabled)}`, { type: 'toggle_setting', setting: 'split_payment' })]);
  rows.push([button(`⏰ Время напоминаний: ${settings.reminderTime}`, { type: 'set_reminder_time' })]);
  rows.push(backToMenuRow());

  return {
    text: '⚙️ Настройки бота:\n\nЗдесь вы можете включить/выключить дополнительные функции:',
    keyboard: { inline_keyboard: rows },
  };
}

export function reminderTimePromptView(): View {
  return { text: 'Введите время напоминания в формате ЧЧ:ММ (например, 10:00):' };
}

export function reminderTimeSavedView(time: string, applied: boolean): View {
  const text = applied
    ? `✅ Время напоминаний установлено: ${time}`
    : `✅ Время сохранено: ${time}\nВ этом режиме напоминания приходят через заданное число дней после добавления.`;
  return mainMenuView(`${text}\n\nВыберите следующее действие:`);
}

// =====================================================
// INTAKE
// =====================================================

export function rejectionText(reason: ValidationReason): string {
  switch (reason) {
    case 'empty_key':
      return 'Тег не может быть пустым.';
    case 'key_too_long':
      return 'Слишком длинный тег, сократите его.';
    case 'bad_date_format':
      return 'Неверный формат даты. Введите дату в формате ДД.ММ.ГГГГ:';
    case 'date_in_past':
      return 'Дата не может быть в прошлом. Введите корректную дату:';
    case 'not_a_number':
      return 'Пожалуйста, введите корректное число (например: 1500.50):';
    case 'not_positive':
      return 'Значение должно быть больше нуля.';
    case 'not_an_integer':
      return 'Количество должно быть целым числом.';
    case 'bad_time_format':
      return 'Неверный формат времени. Введите время в формате ЧЧ:ММ:';
    case 'unexpected_input':
      return 'Пожалуйста, воспользуйтесь кнопками ниже.';
    case 'not_a_payment_record':
      return 'У этого покупателя нет данных об оплате.';
  }
}

function draftHeader(outcome: PromptOutcome): string {
  const lines: string[] = [];
  if (outcome.draft.key) lines.push(`Покупатель: ${outcome.draft.key}`);
  if (outcome.draft.targetDate) lines.push(`Дата доставки: ${formatDisplayDate(outcome.draft.targetDate)}`);
  if (outcome.draft.orderAmount !== undefined) lines.push(`Сумма заказа: ${formatAmount(outcome.draft.orderAmount)} руб.`);
  if (outcome.draft.productCount !== undefined) lines.push(`Количество товаров: ${outcome.draft.productCount}`);
  return lines.length > 0 ? `${lines.join('\n')}\n\n` : '';
}

function datePickerKeyboard(outcome: PromptOutcome): TelegramBot.InlineKeyboardMarkup {
  const rows = outcome.dateOptions.map(date => [
    button(`${formatDisplayDate(date)} (${format(fromIsoDate(date), 'EEEE', { locale: ru })})`, { type: 'pick_date', date }),
  ]);
  rows.push([button('📅 Ввести другую дату', { type: 'custom_date' })]);
  rows.push([button('❌ Отмена', { type: 'cancel' })]);
  return { inline_keyboard: rows };
}

const cancelKeyboard: TelegramBot.InlineKeyboardMarkup = {
  inline_keyboard: [[button('❌ Отмена', { type: 'cancel' })]],
};

export function intakePromptView(outcome: PromptOutcome): View {
  const rejection = outcome.rejection ? `${rejectionText(outcome.rejection)}\n\n` : '';
  const header = draftHeader(outcome);

  switch (outcome.step) {
    case 'key':
      return {
        text: `${rejection}Введите тег покупателя (например: @username или номер телефона):`,
        keyboard: cancelKeyboard,
      };
    case 'target_date':
      if (outcome.dateEntry === 'free_form') {
        return { text: `${rejection}${header}Введите дату доставки в формате ДД.ММ.ГГГГ:`, keyboard: cancelKeyboard };
      }
      return { text: `${rejection}${header}Выберите дату доставки:`, keyboard: datePickerKeyboard(outcome) };
    case 'order_amount':
      return { text: `${rejection}${header}Введите сумму заказа:`, keyboard: cancelKeyboard };
    case 'product_count':
      return { text: `${rejection}${header}Введите количество товаров:`, keyboard: cancelKeyboard };
    case 'split_payment':
      return {
        text: `${rejection}${header}Оплата сплитом (раздельная оплата)?`,
        keyboard: {
          inline_keyboard: [
            [button('✅ Да', { type: 'split', value: true }), button('❌ Нет', { type: 'split', value: false })],
            [button('❌ Отмена', { type: 'cancel' })],
          ],
        },
      };
  }
}

export function customerAddedView(record: CustomerRecord): View {
  const lines = [
    `✅ Покупатель ${record.key} успешно добавлен!`,
    `📅 Дата доставки: ${formatDisplayDate(record.targetDate)}`,
  ];
  if (record.orderAmount !== null) lines.push(`💰 Сумма заказа: ${formatAmount(record.orderAmount)} руб.`);
  if (record.payment) lines.push(`📦 Количество товаров: ${record.payment.productCount}`);
  if (record.splitPayment !== null) lines.push(`💳 Сплит-оплата: ${splitLabel(record.splitPayment)}`);
  return { text: lines.join('\n') };
}

export function cancelledView(): View {
  return mainMenuView('Действие отменено.\n\nВыберите следующее действие:');
}

// =====================================================
// CUSTOMERS
// =====================================================

function statusMarker(daysLeft: number): string {
  if (daysLeft > 0) return '🟢';
  if (daysLeft === 0) return '🟡';
  return '🔴';
}

export function customerListView(records: CustomerRecord[], now: Date): View {
  if (records.length === 0) {
    return { text: 'Список покупателей пуст.', keyboard: { inline_keyboard: [backToMenuRow()] } };
  }

  const header = '👥 Список покупателей:';
  // запас под строку "…и ещё N"
  const budget = MESSAGE_TEXT_LIMIT - 64;
  let text = header;
  let shown = 0;

  for (const [i, record] of records.entries()) {
    const daysLeft = daysUntil(record.targetDate, now);
    const lines = [
      `${i + 1}. ${statusMarker(daysLeft)} ${record.key}`,
      `   📅 ${formatDisplayDate(record.targetDate)} (через ${daysLeft} ${pluralDays(daysLeft)})`,
    ];
    if (record.orderAmount !== null) lines.push(`   💰 ${formatAmount(record.orderAmount)} руб.`);
    if (record.splitPayment !== null) lines.push(`   💳 Сплит: ${splitLabel(record.splitPayment)}`);

    const block = `\n\n${lines.join('\n')}`;
    if (text.length + block.length > budget) break;
    text += block;
    shown++;
  }

  if (shown < records.length) {
    text += `\n\n…и ещё ${records.length - shown} (всего ${records.length})`;
  }

  const rows = records
    .slice(0, LIST_DETAIL_LIMIT)
    .map(record => [button(`🔍 ${record.key}`, { type: 'detail', key: record.key })]);
  rows.push(backToMenuRow());

  return {
    text,
    keyboard: { inline_keyboard: rows },
  };
}

export function customerDetailView(record: CustomerRecord, now: Date): View {
  const lines = [
    '🔍 Детали покупателя:',
    '',
    `🏷️ Тег: ${record.key}`,
    `📅 Дата доставки: ${formatDisplayDate(record.targetDate)}`,
    `⏱️ Осталось дней: ${daysUntil(record.targetDate, now)}`,
  ];
  if (record.orderAmount !== null) lines.push(`💰 Сумма заказа: ${formatAmount(record.orderAmount)} руб.`);
  if (record.splitPayment !== null) lines.push(`💳 Сплит-оплата: ${splitLabel(record.splitPayment)}`);

  const rows: TelegramBot.InlineKeyboardButton[][] = [];

  if (record.payment) {
    const full = calculatePayments(record.orderAmount ?? 0);
    lines.push(`📦 Количество товаров: ${record.payment.productCount}`, '', '💵 Платежи:');
    for (const category of PAYMENT_CATEGORIES) {
      const paid = isCategoryPaid(record, category);
      lines.push(`${paid ? '✅' : '⬜'} ${CATEGORY_LABELS[category]}: ${full[category]} руб.`);
      rows.push([button(
        `${paid ? '↩️ Отменить оплату' : '✅ Оплачено'}: ${CATEGORY_LABELS[category]}`,
        { type: 'toggle_paid', category, key: record.key },
      )]);
    }
    lines.push(`Осталось оплатить: ${totalOf(outstandingPayments(record))} руб.`);
  }

  rows.push([button('🗑️ Удалить', { type: 'delete', key: record.key })]);
  rows.push([button('⬅️ Назад к списку', { type: 'list' })]);

  return { text: lines.join('\n'), keyboard: { inline_keyboard: rows } };
}

// =====================================================
// REMINDERS
// =====================================================

export function formatReminder(record: CustomerRecord): string {
  if (record.payment) {
    return [
      '🔔 Напоминание о клиенте!',
      '',
      `Клиент: ${record.key}`,
      `Дата доставки: ${formatDisplayDate(record.targetDate)}`,
      `Сумма заказа: ${formatAmount(record.orderAmount ?? 0)} руб.`,
      `К оплате: ${totalOf(outstandingPayments(record))} руб.`,
    ].join('\n');
  }

  const lines = [
    '🔔 Напоминание о доставке!',
    '',
    `Сегодня доставка для покупателя: ${record.key}`,
    `Дата: ${formatDisplayDate(record.targetDate)}`,
  ];
  if (record.orderAmount !== null) {
    lines.push(`Сумма заказа: ${formatAmount(record.orderAmount)} руб.`);
  }
  return lines.join('\n');
}
