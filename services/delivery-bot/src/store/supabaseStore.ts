/**
 * Хранилище клиентов в таблице Postgres через Supabase.
 *
 * Одна строка на клиента: tracking_code уникален, id — автоинкремент.
 * Схема таблицы: migrations/001_clients.sql
 */

import { createClient, type SupabaseClient } from '@supabase/supabase-js';
import { z } from 'zod';
import { PersistenceError } from '../lib/errors.js';
import { isIsoDate } from '../lib/dates.js';
import type { SupabaseSettings } from '../config.js';
import type { CustomerRecord } from '../types.js';
import { MemoryBackedStore } from './recordStore.js';

const ClientRowSchema = z.object({
  tracking_code: z.string().min(1),
  target_date: z.string().refine(isIsoDate, 'target_date must be YYYY-MM-DD'),
  order_amount: z.number().nullable(),
  split_payment: z.boolean().nullable(),
  product_count: z.number().int().nullable(),
  created_at: z.string(),
  duty_paid: z.boolean(),
  delivery_paid: z.boolean(),
  insurance_paid: z.boolean(),
  deposit_paid: z.boolean(),
  notified: z.boolean(),
});

export type ClientRow = z.infer<typeof ClientRowSchema>;

/** Доступ к таблице клиентов; в тестах подменяется */
export interface ClientsTable {
  selectAll(): Promise<unknown[]>;
  upsert(row: ClientRow): Promise<void>;
  deleteByTrackingCode(trackingCode: string): Promise<void>;
}

export function createSupabaseClientsTable(client: SupabaseClient, table: string): ClientsTable {
  return {
    async selectAll() {
      const { data, error } = await client
        .from(table)
        .select('*')
        .order('id', { ascending: true });
      if (error) {
        throw new PersistenceError('load', `Failed to select ${table}: ${error.message}`);
      }
      return data ?? [];
    },

    async upsert(row) {
      const { error } = await client
        .from(table)
        .upsert(row, { onConflict: 'tracking_code' });
      if (error) {
        throw new PersistenceError('save', `Failed to upsert ${row.tracking_code}: ${error.message}`);
      }
    },

    async deleteByTrackingCode(trackingCode) {
      const { error } = await client
        .from(table)
        .delete()
        .eq('tracking_code', trackingCode);
      if (error) {
        throw new PersistenceError('delete', `Failed to delete ${trackingCode}: ${error.message}`);
      }
    },
  };
}

export function createSupabaseClient(settings: SupabaseSettings): SupabaseClient {
  return createClient(settings.url, settings.serviceRole, {
    auth: { persistSession: false, autoRefreshToken: false },
  });
}

export function toClientRow(record: CustomerRecord, now: Date): ClientRow {
  return {
    tracking_code: record.key,
    target_date: record.targetDate,
    order_amount: record.orderAmount,
    split_payment: record.splitPayment,
    product_count: record.payment?.productCount ?? null,
    created_at: record.payment?.createdAt ?? now.toISOString(),
    duty_paid: record.payment?.dutyPaid ?? false,
    delivery_paid: record.payment?.deliveryPaid ?? false,
    insurance_paid: record.payment?.insurancePaid ?? false,
    deposit_paid: record.payment?.depositPaid ?? false,
    notified: record.notified,
  };
}

export function fromClientRow(row: ClientRow): CustomerRecord {
  const record: CustomerRecord = {
    key: row.tracking_code,
    targetDate: row.target_date,
    orderAmount: row.order_amount,
    splitPayment: row.split_payment,
    notified: row.notified,
  };
  if (row.product_count === null) return record;

  return {
    ...record,
    payment: {
      productCount: row.product_count,
      createdAt: row.created_at,
      dutyPaid: row.duty_paid,
      deliveryPaid: row.delivery_paid,
      insurancePaid: row.insurance_paid,
      depositPaid: row.deposit_paid,
    },
  };
}

export class SupabaseRecordStore extends MemoryBackedStore {
  private readonly table: ClientsTable;
  private readonly clock: () => Date;

  constructor(table: ClientsTable, clock: () => Date = () => new Date()) {
    super('supabase-store');
    this.table = table;
    this.clock = clock;
  }

  protected async readAll(): Promise<CustomerRecord[]> {
    const rows = await this.table.selectAll();
    const records: CustomerRecord[] = [];
    for (const raw of rows) {
      const parsed = ClientRowSchema.safeParse(raw);
      if (!parsed.success) {
        throw new PersistenceError('load', `Invalid client row: ${parsed.error.issues[0]?.message ?? 'invalid'}`);
      }
      records.push(fromClientRow(parsed.data));
    }
    return records;
  }

  protected writeRecord(record: CustomerRecord): Promise<void> {
    return this.table.upsert(toClientRow(record, this.clock()));
  }

  protected removeRecord(key: string): Promise<void> {
    return this.table.deleteByTrackingCode(key);
  }
}
