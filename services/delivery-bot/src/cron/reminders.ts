/**
 * Напоминания о доставке.
 *
 * daily    — раз в день в заданное время (node-cron) проверяются записи
 *            с targetDate == сегодня.
 * one_shot — для каждой записи один таймер на createdAt + N дней.
 *
 * Каждая запись уведомляется один раз: после успешной отправки хотя бы
 * одному получателю вызывается markNotified. При ошибке отправки запись
 * остаётся неуведомлённой; daily повторит на следующем запуске, one_shot
 * больше не сработает.
 *
 * @module cron/reminders
 */

import cron, { type ScheduledTask } from 'node-cron';
import { addDays, parseISO } from 'date-fns';
import { createLogger } from '../lib/logger.js';
import { errorMessage } from '../lib/errors.js';
import { fromIsoDate, systemClock, todayIso, type Clock } from '../lib/dates.js';
import type { RecordStore } from '../store/recordStore.js';
import type { ChatId, CustomerRecord } from '../types.js';

const logger = createLogger({ module: 'cron-reminders' });

// setTimeout не принимает задержку больше 2^31-1 мс (~24.8 дня)
export const MAX_TIMER_DELAY_MS = 2_147_483_647;

export interface NotificationSink {
  /** Бросает DeliveryError, если отправить не удалось */
  send(recipient: ChatId, text: string): Promise<void>;
}

export type ReminderSchedule =
  | { mode: 'daily'; time: string; timezone?: string; cronEnabled: boolean }
  | { mode: 'one_shot'; delayDays: number };

export interface ReminderSchedulerOptions {
  schedule: ReminderSchedule;
  formatReminder: (record: CustomerRecord) => string;
  recipients?: ChatId[];
  clock?: Clock;
  /** Пауза между отправками (лимиты Telegram) */
  throttleMs?: number;
}

export interface ScanReport {
  due: number;
  notified: number;
  failed: number;
  skipped: boolean;
}

export type OneShotResult = 'notified' | 'missing' | 'already_notified' | 'not_due' | 'failed';

type NotifyResult = 'sent' | 'failed' | 'gone';

export function dailyCronExpression(time: string): string {
  const [hours, minutes] = time.split(':').map(Number);
  return `${minutes} ${hours} * * *`;
}

function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

export class ReminderScheduler {
  private readonly store: RecordStore;
  private readonly sink: NotificationSink;
  private readonly schedule: ReminderSchedule;
  private readonly formatReminder: (record: CustomerRecord) => string;
  private readonly clock: Clock;
  private readonly throttleMs: number;
  private readonly recipients = new Map<string, ChatId>();
  private readonly timers = new Map<string, NodeJS.Timeout>();
  private task: ScheduledTask | null = null;
  private scanning = false;

  constructor(store: RecordStore, sink: NotificationSink, options: ReminderSchedulerOptions) {
    this.store = store;
    this.sink = sink;
    this.schedule = { ...options.schedule };
    this.formatReminder = options.formatReminder;
    this.clock = options.clock ?? systemClock;
    this.throttleMs = options.throttleMs ?? 0;
    for (const chatId of options.recipients ?? []) {
      this.addRecipient(chatId);
    }
  }

  get mode(): ReminderSchedule['mode'] {
    return this.schedule.mode;
  }

  start(): void {
    if (this.schedule.mode !== 'daily') {
      logger.info({ delayDays: this.schedule.delayDays }, 'One-shot reminders enabled');
      return;
    }
    if (!this.schedule.cronEnabled) {
      logger.info('Cron disabled');
      return;
    }

    const expression = dailyCronExpression(this.schedule.time);
    this.task = cron.schedule(expression, () => {
      this.scanDue().catch(err => {
        logger.error({ error: errorMessage(err) }, 'Reminder scan failed');
      });
    }, this.schedule.timezone ? { timezone: this.schedule.timezone } : undefined);

    logger.info({ schedule: expression, timezone: this.schedule.timezone }, 'Daily reminder cron scheduled');
  }

  stop(): void {
    this.task?.stop();
    this.task = null;
    for (const timer of this.timers.values()) {
      clearTimeout(timer);
    }
    this.timers.clear();
  }

  /** Меняет время ежедневной проверки; для one_shot ничего не делает */
  reschedule(time: string): boolean {
    if (this.schedule.mode !== 'daily') return false;
    this.schedule.time = time;
    if (this.task) {
      this.task.stop();
      this.task = null;
      this.start();
    }
    logger.info({ time }, 'Reminder time changed');
    return true;
  }

  addRecipient(chatId: ChatId): boolean {
    const id = String(chatId);
    if (this.recipients.has(id)) return false;
    this.recipients.set(id, chatId);
    return true;
  }

  recipientList(): ChatId[] {
    return [...this.recipients.values()];
  }

  /** Проверка записей, с датой доставки сегодня */
  async scanDue(): Promise<ScanReport> {
    if (this.scanning) {
      logger.warn('Previous reminder scan still running, skipping');
      return { due: 0, notified: 0, failed: 0, skipped: true };
    }

    this.scanning = true;
    try {
      // день считается в той же зоне, в которой срабатывает cron
      const timeZone = this.schedule.mode === 'daily' ? this.schedule.timezone : undefined;
      const today = todayIso(this.clock, timeZone);
      const due = this.store.list().filter(record => record.targetDate === today && !record.notified);
      if (due.length === 0) {
        logger.info({ today }, 'No deliveries due today');
        return { due: 0, notified: 0, failed: 0, skipped: false };
      }

      let notified = 0;
      let failed = 0;
      for (const record of due) {
        const result = await this.notify(record.key);
        if (result === 'sent') notified++;
        if (result === 'failed') failed++;
        if (this.throttleMs > 0) await sleep(this.throttleMs);
      }

      logger.info({ today, due: due.length, notified, failed }, 'Reminder scan completed');
      return { due: due.length, notified, failed, skipped: false };
    } finally {
      this.scanning = false;
    }
  }

  /** Момент разового напоминания: createdAt + delayDays */
  dueInstant(record: CustomerRecord, delayDays: number): Date {
    const base = record.payment ? parseISO(record.payment.createdAt) : fromIsoDate(record.targetDate);
    return addDays(base, delayDays);
  }

  /** Ставит разовый таймер для записи (только в режиме one_shot) */
  track(record: CustomerRecord): void {
    if (this.schedule.mode !== 'one_shot' || record.notified) return;
    const instant = this.dueInstant(record, this.schedule.delayDays);
    this.arm(record.key, instant);
    logger.info({ key: record.key, at: instant.toISOString() }, 'One-shot reminder scheduled');
  }

  async fireOneShot(key: string): Promise<OneShotResult> {
    if (this.schedule.mode !== 'one_shot') return 'not_due';

    const record = this.store.get(key);
    if (!record) {
      logger.debug({ key }, 'Reminder target was deleted');
      return 'missing';
    }
    if (record.notified) return 'already_notified';

    const instant = this.dueInstant(record, this.schedule.delayDays);
    if (this.clock().getTime() < instant.getTime()) {
      this.arm(key, instant);
      return 'not_due';
    }

    const result = await this.notify(key);
    if (result === 'gone') return 'missing';
    return result === 'sent' ? 'notified' : 'failed';
  }

  private arm(key: string, instant: Date): void {
    const existing = this.timers.get(key);
    if (existing) clearTimeout(existing);

    const delay = instant.getTime() - this.clock().getTime();
    const wait = Math.min(Math.max(delay, 0), MAX_TIMER_DELAY_MS);
    const timer = setTimeout(() => {
      this.timers.delete(key);
      this.fireOneShot(key).catch(err => {
        logger.error({ key, error: errorMessage(err) }, 'One-shot reminder failed');
      });
    }, wait);
    this.timers.set(key, timer);
  }

  private async notify(key: string): Promise<NotifyResult> {
    // запись могли удалить или уже отметить, пока шла рассылка
    const record = this.store.get(key);
    if (!record || record.notified) return 'gone';

    const recipients = this.recipientList();
    if (recipients.length === 0) {
      logger.warn({ key }, 'No reminder recipients, reminder postponed');
      return 'failed';
    }

    const text = this.formatReminder(record);
    let delivered = 0;
    for (const chatId of recipients) {
      try {
        await this.sink.send(chatId, text);
        delivered++;
      } catch (err) {
        logger.error({ key, chatId, error: errorMessage(err) }, 'Failed to send reminder');
      }
    }

    if (delivered === 0) return 'failed';

    await this.store.markNotified(key);
    logger.info({ key, delivered }, 'Reminder sent');
    return 'sent';
  }
}
