/**
 * Расчёт платежей по сумме заказа.
 *
 * Каждая категория: ступенчатая функция по полуинтервалам [low, high).
 * Сумма вне всех интервалов даёт 0.
 */

import type { CustomerRecord, PaymentBreakdown, PaymentCategory } from '../types.js';

export interface Bracket {
  low: number;
  high: number;
  value: number;
}

export const DUTY_BRACKETS: readonly Bracket[] = [
  { low: 5000, high: 7000, value: 1620 },
  { low: 7000, high: 9000, value: 2140 },
  { low: 9000, high: 11000, value: 2780 },
  { low: 11000, high: 13500, value: 3986 },
  { low: 13500, high: 15000, value: 4520 },
  { low: 15000, high: 16500, value: 5140 },
  { low: 16500, high: 18000, value: 5760 },
  { low: 18000, high: 20000, value: 6380 },
  { low: 20000, high: Infinity, value: 7200 },
];

// От 5000 доставка не начисляется (0)
export const DELIVERY_BRACKETS: readonly Bracket[] = [
  { low: 0, high: 1000, value: 349 },
  { low: 1000, high: 2000, value: 489 },
  { low: 2000, high: 3000, value: 629 },
  { low: 3000, high: 4000, value: 769 },
  { low: 4000, high: 5000, value: 909 },
];

export const INSURANCE_BRACKETS: readonly Bracket[] = [
  { low: 0, high: 5000, value: 2750 },
  { low: 5000, high: 10000, value: 3500 },
  { low: 10000, high: 20000, value: 4900 },
  { low: 20000, high: Infinity, value: 6500 },
];

export const DEPOSIT_BRACKETS: readonly Bracket[] = [
  { low: 0, high: 5000, value: 4750 },
  { low: 5000, high: 15000, value: 7500 },
  { low: 15000, high: Infinity, value: 12000 },
];

export function lookupBracket(brackets: readonly Bracket[], amount: number): number {
  if (!Number.isFinite(amount)) return 0;
  const bracket = brackets.find((b) => amount >= b.low && amount < b.high);
  return bracket ? bracket.value : 0;
}

export const dutyFor = (amount: number): number => lookupBracket(DUTY_BRACKETS, amount);
export const deliveryFor = (amount: number): number => lookupBracket(DELIVERY_BRACKETS, amount);
export const insuranceFor = (amount: number): number => lookupBracket(INSURANCE_BRACKETS, amount);
export const depositFor = (amount: number): number => lookupBracket(DEPOSIT_BRACKETS, amount);

export function calculatePayments(amount: number): PaymentBreakdown {
  return {
    duty: dutyFor(amount),
    delivery: deliveryFor(amount),
    insurance: insuranceFor(amount),
    deposit: depositFor(amount),
  };
}

export const PAYMENT_CATEGORIES: readonly PaymentCategory[] = ['duty', 'delivery', 'insurance', 'deposit'];

export function isCategoryPaid(record: CustomerRecord, category: PaymentCategory): boolean {
  const payment = record.payment;
  if (!payment) return false;
  switch (category) {
    case 'duty':
      return payment.dutyPaid;
    case 'delivery':
      return payment.deliveryPaid;
    case 'insurance':
      return payment.insurancePaid;
    case 'deposit':
      return payment.depositPaid;
  }
}

/** Неоплаченные категории с суммами; оплаченные обнуляются */
export function outstandingPayments(record: CustomerRecord): PaymentBreakdown {
  const full = calculatePayments(record.orderAmount ?? 0);
  return {
    duty: isCategoryPaid(record, 'duty') ? 0 : full.duty,
    delivery: isCategoryPaid(record, 'delivery') ? 0 : full.delivery,
    insurance: isCategoryPaid(record, 'insurance') ? 0 : full.insurance,
    deposit: isCategoryPaid(record, 'deposit') ? 0 : full.deposit,
  };
}

export function totalOf(breakdown: PaymentBreakdown): number {
  return breakdown.duty + breakdown.delivery + breakdown.insurance + breakdown.deposit;
}
