import { describe, it, expect } from 'vitest';
import { CALLBACK_DATA_MAX_BYTES, decodeAction, encodeAction, type BotAction } from './actions.js';
import { MAX_KEY_BYTES } from '../workflow/validation.js';

describe('encodeAction / decodeAction', () => {
  const actions: BotAction[] = [
    { type: 'menu' },
    { type: 'custom_date' },
    { type: 'detail', key: '@alice' },
    { type: 'delete', key: '+7 900 000-00-00' },
    { type: 'pick_date', date: '2026-10-21' },
    { type: 'split', value: false },
    { type: 'toggle_setting', setting: 'split_payment' },
    { type: 'toggle_paid', category: 'insurance', key: 'order:42' },
  ];

  it('decodes what it encodes', () => {
    for (const action of actions) {
      expect(decodeAction(encodeAction(action))).toEqual(action);
    }
  });

  it('produces the expected tokens', () => {
    expect(encodeAction({ type: 'pick_date', date: '2026-10-21' })).toBe('date:2026-10-21');
    expect(encodeAction({ type: 'split', value: true })).toBe('split:yes');
    expect(encodeAction({ type: 'toggle_paid', category: 'duty', key: '@bob' })).toBe('paid:duty:@bob');
  });

  it('keeps the longest token within the callback data limit', () => {
    const key = 'ж'.repeat(MAX_KEY_BYTES / 2);
    const data = encodeAction({ type: 'toggle_paid', category: 'insurance', key });
    expect(Buffer.byteLength(data, 'utf8')).toBeLessThanOrEqual(CALLBACK_DATA_MAX_BYTES);
  });

  it('returns null for unknown or malformed data', () => {
    expect(decodeAction(undefined)).toBeNull();
    expect(decodeAction('')).toBeNull();
    expect(decodeAction('unknown')).toBeNull();
    expect(decodeAction('detail:')).toBeNull();
    expect(decodeAction('date:21.10.2026')).toBeNull();
    expect(decodeAction('split:maybe')).toBeNull();
    expect(decodeAction('toggle:cron')).toBeNull();
    expect(decodeAction('paid:tips:@bob')).toBeNull();
    expect(decodeAction('paid:duty:')).toBeNull();
  });
});
