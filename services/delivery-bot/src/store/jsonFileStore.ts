import { promises as fs } from 'fs';
import path from 'path';
import { z } from 'zod';
import { PersistenceError, errorMessage } from '../lib/errors.js';
import { isIsoDate } from '../lib/dates.js';
import type { CustomerRecord } from '../types.js';
import { MemoryBackedStore } from './recordStore.js';

// Формат файла: { [tag]: { tag, seq, delivery_date, order_amount, ... } }
// seq хранит порядок добавления: ключи вида "12345" объект перечисляет первыми
const StoredCustomerSchema = z.object({
  tag: z.string().min(1),
  seq: z.number().int().nonnegative().optional(),
  delivery_date: z.string().refine(isIsoDate, 'delivery_date must be YYYY-MM-DD'),
  order_amount: z.number().nullable().default(null),
  split_payment: z.boolean().nullable().default(null),
  notified: z.boolean().default(false),
  product_count: z.number().int().positive().optional(),
  created_at: z.string().datetime({ offset: true }).optional(),
  duty_paid: z.boolean().default(false),
  delivery_paid: z.boolean().default(false),
  insurance_paid: z.boolean().default(false),
  deposit_paid: z.boolean().default(false),
});

type StoredCustomer = z.input<typeof StoredCustomerSchema>;

export function serializeCustomer(record: CustomerRecord): StoredCustomer {
  const base: StoredCustomer = {
    tag: record.key,
    delivery_date: record.targetDate,
    order_amount: record.orderAmount,
    split_payment: record.splitPayment,
    notified: record.notified,
  };
  if (!record.payment) return base;

  return {
    ...base,
    product_count: record.payment.productCount,
    created_at: record.payment.createdAt,
    duty_paid: record.payment.dutyPaid,
    delivery_paid: record.payment.deliveryPaid,
    insurance_paid: record.payment.insurancePaid,
    deposit_paid: record.payment.depositPaid,
  };
}

function deserializeCustomer(stored: z.output<typeof StoredCustomerSchema>): CustomerRecord {
  const record: CustomerRecord = {
    key: stored.tag,
    targetDate: stored.delivery_date,
    orderAmount: stored.order_amount,
    splitPayment: stored.split_payment,
    notified: stored.notified,
  };
  if (stored.product_count === undefined || stored.created_at === undefined) {
    return record;
  }
  return {
    ...record,
    payment: {
      productCount: stored.product_count,
      createdAt: stored.created_at,
      dutyPaid: stored.duty_paid,
      deliveryPaid: stored.delivery_paid,
      insurancePaid: stored.insurance_paid,
      depositPaid: stored.deposit_paid,
    },
  };
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

/**
 * Хранилище в одном JSON-файле. Файл перезаписывается целиком
 * при каждом изменении.
 */
export class JsonFileStore extends MemoryBackedStore {
  private readonly filePath: string;
  private writeChain: Promise<void> = Promise.resolve();

  constructor(filePath: string) {
    super('json-store');
    this.filePath = path.resolve(filePath);
  }

  protected async readAll(): Promise<CustomerRecord[]> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, 'utf-8');
    } catch (err) {
      if (isMissingFile(err)) {
        this.log.info({ file: this.filePath }, 'Data file not found, starting empty');
        return [];
      }
      throw new PersistenceError('load', `Cannot read ${this.filePath}: ${errorMessage(err)}`, { cause: err });
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (err) {
      throw new PersistenceError('load', `Malformed JSON in ${this.filePath}`, { cause: err });
    }

    if (typeof json !== 'object' || json === null || Array.isArray(json)) {
      throw new PersistenceError('load', `Unexpected data in ${this.filePath}: expected an object`);
    }

    // Object.entries, а не z.record: тот теряет ключ "__proto__"
    const stored: z.output<typeof StoredCustomerSchema>[] = [];
    for (const [tag, value] of Object.entries(json)) {
      const parsed = StoredCustomerSchema.safeParse(value);
      if (!parsed.success) {
        throw new PersistenceError('load', `Unexpected data for ${tag} in ${this.filePath}: ${parsed.error.issues[0]?.message ?? 'invalid'}`);
      }
      stored.push(parsed.data);
    }

    stored.sort((a, b) => (a.seq ?? Infinity) - (b.seq ?? Infinity));
    return stored.map(deserializeCustomer);
  }

  protected writeRecord(): Promise<void> {
    return this.writeSnapshot();
  }

  protected removeRecord(): Promise<void> {
    return this.writeSnapshot();
  }

  private writeSnapshot(): Promise<void> {
    // Снимок берётся в момент вызова, записи идут строго по очереди
    const snapshot = Object.fromEntries(
      [...this.records.values()].map((record, seq): [string, StoredCustomer] => [record.key, { ...serializeCustomer(record), seq }]),
    );
    const contents = JSON.stringify(snapshot, null, 2);

    const next = this.writeChain.then(async () => {
      const tmpPath = `${this.filePath}.tmp`;
      try {
        await fs.mkdir(path.dirname(this.filePath), { recursive: true });
        await fs.writeFile(tmpPath, contents, 'utf-8');
        await fs.rename(tmpPath, this.filePath);
      } catch (err) {
        throw new PersistenceError('save', `Cannot write ${this.filePath}: ${errorMessage(err)}`, { cause: err });
      }
    });
    this.writeChain = next.catch(() => undefined);
    return next;
  }
}
