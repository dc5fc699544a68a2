import { createLogger, type AppLogger } from '../lib/logger.js';
import { NotFoundError, ValidationError, errorMessage } from '../lib/errors.js';
import type { CustomerRecord, PaymentCategory } from '../types.js';

export type DeleteOutcome = 'deleted' | 'not_found';

export interface RecordStore {
  /** Перечитывает хранилище; при любой ошибке пустой набор и запись в лог */
  load(): Promise<Map<string, CustomerRecord>>;
  get(key: string): CustomerRecord | undefined;
  /** По targetDate, при равенстве в порядке добавления */
  list(): CustomerRecord[];
  upsert(record: CustomerRecord): Promise<void>;
  delete(key: string): Promise<DeleteOutcome>;
  /** Идемпотентно; false если записи нет */
  markNotified(key: string): Promise<boolean>;
  setPaymentFlag(key: string, category: PaymentCategory, paid: boolean): Promise<CustomerRecord>;
}

export function cloneRecord(record: CustomerRecord): CustomerRecord {
  return {
    ...record,
    ...(record.payment ? { payment: { ...record.payment } } : {}),
  };
}

/**
 * Общая часть хранилищ: карта записей в памяти.
 *
 * Память — источник истины на время жизни процесса. Ошибка записи
 * логируется и не откатывает изменение.
 */
export abstract class MemoryBackedStore implements RecordStore {
  protected records = new Map<string, CustomerRecord>();
  protected readonly log: AppLogger;

  protected constructor(module: string) {
    this.log = createLogger({ module });
  }

  protected abstract readAll(): Promise<CustomerRecord[]>;
  protected abstract writeRecord(record: CustomerRecord): Promise<void>;
  protected abstract removeRecord(key: string): Promise<void>;

  async load(): Promise<Map<string, CustomerRecord>> {
    try {
      const loaded = await this.readAll();
      this.records = new Map(loaded.map((record) => [record.key, record]));
      this.log.info({ count: this.records.size }, 'Records loaded');
    } catch (err) {
      this.log.error({ error: errorMessage(err) }, 'Failed to load records, starting empty');
      this.records = new Map();
    }
    return new Map([...this.records].map(([key, record]) => [key, cloneRecord(record)]));
  }

  get(key: string): CustomerRecord | undefined {
    const record = this.records.get(key);
    return record ? cloneRecord(record) : undefined;
  }

  list(): CustomerRecord[] {
    return [...this.records.values()]
      .map(cloneRecord)
      .sort((a, b) => a.targetDate.localeCompare(b.targetDate));
  }

  async upsert(record: CustomerRecord): Promise<void> {
    const stored = cloneRecord(record);
    this.records.set(stored.key, stored);
    await this.persist('upsert', stored.key, () => this.writeRecord(cloneRecord(stored)));
  }

  async delete(key: string): Promise<DeleteOutcome> {
    if (!this.records.delete(key)) {
      return 'not_found';
    }
    await this.persist('delete', key, () => this.removeRecord(key));
    return 'deleted';
  }

  async markNotified(key: string): Promise<boolean> {
    const record = this.records.get(key);
    if (!record) return false;
    if (record.notified) return true;

    record.notified = true;
    await this.persist('markNotified', key, () => this.writeRecord(cloneRecord(record)));
    return true;
  }

  async setPaymentFlag(key: string, category: PaymentCategory, paid: boolean): Promise<CustomerRecord> {
    const record = this.records.get(key);
    if (!record) {
      throw new NotFoundError(key);
    }
    const payment = record.payment;
    if (!payment) {
      throw new ValidationError('not_a_payment_record', `Record ${key} has no payment details`);
    }

    switch (category) {
      case 'duty':
        payment.dutyPaid = paid;
        break;
      case 'delivery':
        payment.deliveryPaid = paid;
        break;
      case 'insurance':
        payment.insurancePaid = paid;
        break;
      case 'deposit':
        payment.depositPaid = paid;
        break;
    }

    await this.persist('setPaymentFlag', key, () => this.writeRecord(cloneRecord(record)));
    return cloneRecord(record);
  }

  private async persist(operation: string, key: string, write: () => Promise<void>): Promise<void> {
    try {
      await write();
    } catch (err) {
      this.log.error({ operation, key, error: errorMessage(err) }, 'Failed to persist record');
    }
  }
}
