import { describe, it, expect } from 'vitest';
import { MESSAGE_TEXT_LIMIT, customerListView, formatAmount, pluralDays } from './views.js';
import type { CustomerRecord } from '../types.js';

const NOW = new Date(2026, 9, 18, 12, 0);

function customers(count: number): CustomerRecord[] {
  return Array.from({ length: count }, (_, i) => ({
    key: `@customer_with_long_name_${i}`,
    targetDate: '2026-10-25',
    orderAmount: 12345.67,
    splitPayment: i % 2 === 0,
    notified: false,
  }));
}

describe('customerListView', () => {
  it('shows every customer of a short list', () => {
    const view = customerListView(customers(3), NOW);
    expect(view.text.match(/^\d+\. /gm)).toHaveLength(3);
    expect(view.text).not.toContain('…и ещё');
  });

  it('stays within the message limit and counts the rest', () => {
    const view = customerListView(customers(60), NOW);

    expect(view.text.length).toBeLessThanOrEqual(MESSAGE_TEXT_LIMIT);
    const shown = view.text.match(/^\d+\. /gm)?.length ?? 0;
    const tail = /\n\n…и ещё (\d+) \(всего 60\)$/.exec(view.text);
    expect(tail).not.toBeNull();
    expect(shown).toBeGreaterThan(0);
    expect(shown + Number(tail?.[1])).toBe(60);
  });

  it('keeps detail buttons for the first customers and the back button', () => {
    const view = customerListView(customers(60), NOW);
    expect(view.keyboard?.inline_keyboard).toHaveLength(11);
    expect(view.keyboard?.inline_keyboard[0]?.[0]?.callback_data).toBe('detail:@customer_with_long_name_0');
  });
});

describe('formatting helpers', () => {
  it('prints whole amounts without decimals', () => {
    expect(formatAmount(1500)).toBe('1500');
    expect(formatAmount(1500.5)).toBe('1500.50');
  });

  it('declines "день"', () => {
    expect([1, 2, 5, 11, 21, 22, 25].map(pluralDays)).toEqual(['день', 'дня', 'дней', 'дней', 'день', 'дня', 'дней']);
  });
});
