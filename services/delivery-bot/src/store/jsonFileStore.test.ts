import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { JsonFileStore, serializeCustomer } from './jsonFileStore.js';
import { NotFoundError, ValidationError } from '../lib/errors.js';
import type { CustomerRecord } from '../types.js';

const alice: CustomerRecord = {
  key: '@alice',
  targetDate: '2026-10-21',
  orderAmount: 1500.5,
  splitPayment: true,
  notified: false,
};

const bob: CustomerRecord = {
  key: '@bob',
  targetDate: '2026-10-19',
  orderAmount: 6000,
  splitPayment: null,
  notified: false,
  payment: {
    productCount: 2,
    createdAt: '2026-10-18T09:00:00.000Z',
    dutyPaid: false,
    deliveryPaid: false,
    insurancePaid: false,
    depositPaid: false,
  },
};

describe('JsonFileStore', () => {
  let dir: string;
  let file: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'delivery-bot-'));
    file = path.join(dir, 'customers_data.json');
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('starts empty when the file does not exist', async () => {
    const store = new JsonFileStore(file);
    expect((await store.load()).size).toBe(0);
    expect(store.list()).toEqual([]);
  });

  it('persists records and reloads them', async () => {
    const store = new JsonFileStore(file);
    await store.load();
    await store.upsert(alice);
    await store.upsert(bob);

    const reopened = new JsonFileStore(file);
    const loaded = await reopened.load();
    expect(loaded.get('@alice')).toEqual(alice);
    expect(loaded.get('@bob')).toEqual(bob);
  });

  it('writes the snake_case file format keyed by tag', async () => {
    const store = new JsonFileStore(file);
    await store.load();
    await store.upsert(alice);

    const contents: unknown = JSON.parse(await fs.readFile(file, 'utf-8'));
    expect(contents).toEqual({
      '@alice': {
        tag: '@alice',
        seq: 0,
        delivery_date: '2026-10-21',
        order_amount: 1500.5,
        split_payment: true,
        notified: false,
      },
    });
  });

  it('reads older files without optional fields', async () => {
    await fs.writeFile(file, JSON.stringify({ '@carol': { tag: '@carol', delivery_date: '2026-11-01', split_payment: null } }));
    const store = new JsonFileStore(file);
    await store.load();
    expect(store.get('@carol')).toEqual({
      key: '@carol',
      targetDate: '2026-11-01',
      orderAmount: null,
      splitPayment: null,
      notified: false,
    });
  });

  it('starts empty when the file is corrupted', async () => {
    await fs.writeFile(file, '{ not json');
    const store = new JsonFileStore(file);
    expect((await store.load()).size).toBe(0);
  });

  it('starts empty when the file has an unexpected shape', async () => {
    await fs.writeFile(file, JSON.stringify({ '@x': { tag: '@x', delivery_date: 'tomorrow' } }));
    const store = new JsonFileStore(file);
    expect((await store.load()).size).toBe(0);
  });

  it('lists records ordered by target date', async () => {
    const store = new JsonFileStore(file);
    await store.load();
    await store.upsert(alice);
    await store.upsert(bob);
    expect(store.list().map((r) => r.key)).toEqual(['@bob', '@alice']);
  });

  it('keeps insertion order for records on the same date, also after a reload', async () => {
    const store = new JsonFileStore(file);
    await store.load();
    await store.upsert({ ...alice, key: '@zed' });
    await store.upsert({ ...alice, key: '12345' });
    await store.upsert({ ...alice, key: '@amy' });
    await store.upsert(bob);
    expect(store.list().map((r) => r.key)).toEqual(['@bob', '@zed', '12345', '@amy']);

    const reopened = new JsonFileStore(file);
    await reopened.load();
    expect(reopened.list().map((r) => r.key)).toEqual(['@bob', '@zed', '12345', '@amy']);
  });

  it('keeps file order for records saved without seq', async () => {
    await fs.writeFile(file, JSON.stringify({
      '@b': { tag: '@b', delivery_date: '2026-11-01', split_payment: null },
      '@a': { tag: '@a', delivery_date: '2026-11-01', split_payment: null },
    }));
    const store = new JsonFileStore(file);
    await store.load();
    expect(store.list().map((r) => r.key)).toEqual(['@b', '@a']);
  });

  it('round-trips a record keyed "__proto__"', async () => {
    const store = new JsonFileStore(file);
    await store.load();
    const odd: CustomerRecord = { ...alice, key: '__proto__' };
    await store.upsert(odd);

    const contents: Record<string, unknown> = JSON.parse(await fs.readFile(file, 'utf-8'));
    expect(Object.keys(contents)).toEqual(['__proto__']);

    const reopened = new JsonFileStore(file);
    const loaded = await reopened.load();
    expect(loaded.size).toBe(1);
    expect(reopened.get('__proto__')).toEqual(odd);
  });

  it('replaces a record with the same key', async () => {
    const store = new JsonFileStore(file);
    await store.load();
    await store.upsert(alice);
    await store.upsert({ ...alice, targetDate: '2026-10-30' });
    expect(store.list()).toHaveLength(1);
    expect(store.get('@alice')?.targetDate).toBe('2026-10-30');
  });

  it('reports deletes of missing keys', async () => {
    const store = new JsonFileStore(file);
    await store.load();
    await store.upsert(alice);
    expect(await store.delete('@alice')).toBe('deleted');
    expect(await store.delete('@alice')).toBe('not_found');

    const reopened = new JsonFileStore(file);
    expect((await reopened.load()).size).toBe(0);
  });

  it('marks a record notified once', async () => {
    const store = new JsonFileStore(file);
    await store.load();
    await store.upsert(alice);
    expect(await store.markNotified('@alice')).toBe(true);
    expect(await store.markNotified('@alice')).toBe(true);
    expect(await store.markNotified('@nobody')).toBe(false);

    const reopened = new JsonFileStore(file);
    await reopened.load();
    expect(reopened.get('@alice')?.notified).toBe(true);
  });

  it('returns copies that do not leak into the store', async () => {
    const store = new JsonFileStore(file);
    await store.load();
    await store.upsert(bob);
    const copy = store.get('@bob');
    if (copy?.payment) copy.payment.dutyPaid = true;
    expect(store.get('@bob')?.payment?.dutyPaid).toBe(false);
  });

  it('toggles payment flags', async () => {
    const store = new JsonFileStore(file);
    await store.load();
    await store.upsert(bob);
    const updated = await store.setPaymentFlag('@bob', 'insurance', true);
    expect(updated.payment?.insurancePaid).toBe(true);
    expect(serializeCustomer(updated).insurance_paid).toBe(true);
  });

  it('rejects payment flags for unknown or plain records', async () => {
    const store = new JsonFileStore(file);
    await store.load();
    await store.upsert(alice);
    await expect(store.setPaymentFlag('@nobody', 'duty', true)).rejects.toBeInstanceOf(NotFoundError);
    await expect(store.setPaymentFlag('@alice', 'duty', true)).rejects.toBeInstanceOf(ValidationError);
  });

  it('keeps the in-memory change when the file cannot be written', async () => {
    // каталог на месте файла: rename упадёт
    await fs.mkdir(file);
    const store = new JsonFileStore(file);
    await store.upsert(alice);
    expect(store.get('@alice')).toEqual(alice);
  });
});
