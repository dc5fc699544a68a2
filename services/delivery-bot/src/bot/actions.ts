/**
 * Действия inline-кнопок.
 *
 * callback_data разбирается один раз на входе в BotAction,
 * дальше обработчики работают только с типизированным вариантом.
 */

import { isIsoDate } from '../lib/dates.js';
import type { IsoDate, PaymentCategory } from '../types.js';

export type SettingToggle = 'order_amount' | 'split_payment';

export type BotAction =
  | { type: 'menu' }
  | { type: 'add' }
  | { type: 'list' }
  | { type: 'settings' }
  | { type: 'help' }
  | { type: 'cancel' }
  | { type: 'detail'; key: string }
  | { type: 'delete'; key: string }
  | { type: 'pick_date'; date: IsoDate }
  | { type: 'custom_date' }
  | { type: 'split'; value: boolean }
  | { type: 'toggle_setting'; setting: SettingToggle }
  | { type: 'set_reminder_time' }
  | { type: 'toggle_paid'; category: PaymentCategory; key: string };

/** Лимит Telegram на callback_data */
export const CALLBACK_DATA_MAX_BYTES = 64;

const PAYMENT_CATEGORIES = new Set<string>(['duty', 'delivery', 'insurance', 'deposit']);

function isPaymentCategory(value: string): value is PaymentCategory {
  return PAYMENT_CATEGORIES.has(value);
}

export function encodeAction(action: BotAction): string {
  switch (action.type) {
    case 'menu':
    case 'add':
    case 'list':
    case 'settings':
    case 'help':
    case 'cancel':
    case 'custom_date':
    case 'set_reminder_time':
      return action.type;
    case 'detail':
      return `detail:${action.key}`;
    case 'delete':
      return `delete:${action.key}`;
    case 'pick_date':
      return `date:${action.date}`;
    case 'split':
      return `split:${action.value ? 'yes' : 'no'}`;
    case 'toggle_setting':
      return `toggle:${action.setting}`;
    case 'toggle_paid':
      return `paid:${action.category}:${action.key}`;
    default: {
      const unreachable: never = action;
      throw new Error(`Unknown action: ${JSON.stringify(unreachable)}`);
    }
  }
}

export function decodeAction(data: string | undefined): BotAction | null {
  if (!data) return null;

  switch (data) {
    case 'menu':
    case 'add':
    case 'list':
    case 'settings':
    case 'help':
    case 'cancel':
    case 'custom_date':
    case 'set_reminder_time':
      return { type: data };
  }

  const separator = data.indexOf(':');
  if (separator <= 0) return null;
  const prefix = data.slice(0, separator);
  const rest = data.slice(separator + 1);

  switch (prefix) {
    case 'detail':
      return rest ? { type: 'detail', key: rest } : null;
    case 'delete':
      return rest ? { type: 'delete', key: rest } : null;
    case 'date':
      return isIsoDate(rest) ? { type: 'pick_date', date: rest } : null;
    case 'split':
      if (rest === 'yes') return { type: 'split', value: true };
      if (rest === 'no') return { type: 'split', value: false };
      return null;
    case 'toggle':
      if (rest === 'order_amount' || rest === 'split_payment') {
        return { type: 'toggle_setting', setting: rest };
      }
      return null;
    case 'paid': {
      const keySeparator = rest.indexOf(':');
      if (keySeparator <= 0) return null;
      const category = rest.slice(0, keySeparator);
      const key = rest.slice(keySeparator + 1);
      return isPaymentCategory(category) && key ? { type: 'toggle_paid', category, key } : null;
    }
    default:
      return null;
  }
}
