/**
 * Пошаговый ввод нового покупателя.
 *
 * Сессия на каждый диалог: key → target_date → [order_amount] →
 * [product_count] → [split_payment]. Набор шагов фиксируется при старте
 * по снимку настроек. По завершении запись уходит в RecordStore.upsert,
 * сессия удаляется.
 */

import { createLogger } from '../lib/logger.js';
import { ValidationError, type ValidationReason } from '../lib/errors.js';
import { systemClock, upcomingDates, type Clock } from '../lib/dates.js';
import type { RecordStore } from '../store/recordStore.js';
import type { BotAction } from '../bot/actions.js';
import type { BotSettingsSnapshot, BotVariant, CustomerRecord, IsoDate } from '../types.js';
import { parseAmount, parseFreeFormDate, parseKey, parseProductCount } from './validation.js';

const logger = createLogger({ module: 'intake' });

export type IntakeStep = 'key' | 'target_date' | 'order_amount' | 'product_count' | 'split_payment';

export type DateEntry = 'quick_pick' | 'free_form';

export type IntakeInput =
  | { kind: 'text'; text: string }
  | { kind: 'action'; action: BotAction };

export interface IntakeDraft {
  key?: string;
  targetDate?: IsoDate;
  orderAmount?: number;
  productCount?: number;
  splitPayment?: boolean;
}

export interface IntakeSession {
  conversationId: string;
  steps: readonly IntakeStep[];
  stepIndex: number;
  draft: IntakeDraft;
  dateOptions: IsoDate[];
  dateEntry: DateEntry;
  startedAt: number;
  lastActivity: number;
}

export interface PromptOutcome {
  type: 'prompt';
  step: IntakeStep;
  draft: Readonly<IntakeDraft>;
  dateOptions: readonly IsoDate[];
  dateEntry: DateEntry;
  /** Есть, если ввод отклонён и шаг спрашивается повторно */
  rejection?: ValidationReason;
}

export type IntakeOutcome =
  | PromptOutcome
  | { type: 'completed'; record: CustomerRecord }
  | { type: 'cancelled' };

export interface IntakeWorkflowOptions {
  variant: BotVariant;
  clock?: Clock;
  sessionTtlMs?: number;
}

export function planSteps(settings: BotSettingsSnapshot, variant: BotVariant): IntakeStep[] {
  const steps: IntakeStep[] = ['key', 'target_date'];
  if (settings.orderAmountEnabled || variant === 'payments') steps.push('order_amount');
  if (variant === 'payments') steps.push('product_count');
  if (settings.splitPaymentEnabled) steps.push('split_payment');
  return steps;
}

export class IntakeWorkflow {
  private readonly sessions = new Map<string, IntakeSession>();
  private readonly store: RecordStore;
  private readonly variant: BotVariant;
  private readonly clock: Clock;
  private readonly sessionTtlMs: number;

  constructor(store: RecordStore, options: IntakeWorkflowOptions) {
    this.store = store;
    this.variant = options.variant;
    this.clock = options.clock ?? systemClock;
    this.sessionTtlMs = options.sessionTtlMs ?? 30 * 60 * 1000;
  }

  /** Новая сессия; начатая ранее в этом диалоге молча заменяется */
  start(conversationId: string, settings: BotSettingsSnapshot): PromptOutcome {
    const now = this.clock().getTime();
    const session: IntakeSession = {
      conversationId,
      steps: planSteps(settings, this.variant),
      stepIndex: 0,
      draft: {},
      dateOptions: [],
      dateEntry: 'quick_pick',
      startedAt: now,
      lastActivity: now,
    };
    if (this.sessions.has(conversationId)) {
      logger.debug({ conversationId }, 'Restarting intake session');
    }
    this.sessions.set(conversationId, session);
    return this.prompt(session);
  }

  hasSession(conversationId: string): boolean {
    return this.sessions.has(conversationId);
  }

  getSession(conversationId: string): Readonly<IntakeSession> | undefined {
    return this.sessions.get(conversationId);
  }

  /** Отмена без сохранения; false если сессии не было */
  cancel(conversationId: string): boolean {
    return this.sessions.delete(conversationId);
  }

  /** null — для этого диалога нет активной сессии */
  async handle(conversationId: string, input: IntakeInput): Promise<IntakeOutcome | null> {
    const session = this.sessions.get(conversationId);
    if (!session) return null;

    if (input.kind === 'action' && input.action.type === 'cancel') {
      this.sessions.delete(conversationId);
      return { type: 'cancelled' };
    }

    session.lastActivity = this.clock().getTime();

    try {
      const advanced = this.apply(session, input);
      if (!advanced) return this.prompt(session);
    } catch (err) {
      if (err instanceof ValidationError) {
        return this.prompt(session, err.reason);
      }
      throw err;
    }

    session.stepIndex += 1;
    if (session.stepIndex < session.steps.length) {
      return this.prompt(session);
    }
    return this.complete(session);
  }

  /** Удаляет брошенные сессии; возвращает число удалённых */
  pruneIdle(now: number = this.clock().getTime()): number {
    let removed = 0;
    for (const [id, session] of this.sessions) {
      if (now - session.lastActivity > this.sessionTtlMs) {
        this.sessions.delete(id);
        removed++;
      }
    }
    if (removed > 0) {
      logger.debug({ removed, remaining: this.sessions.size }, 'Idle intake sessions discarded');
    }
    return removed;
  }

  /**
   * Применяет ввод к текущему шагу. true — шаг пройден,
   * false — остаёмся на шаге без ошибки (например, переход к ручному вводу даты).
   */
  private apply(session: IntakeSession, input: IntakeInput): boolean {
    const step = this.currentStep(session);
    const { draft } = session;

    switch (step) {
      case 'key':
        draft.key = parseKey(this.expectText(input));
        return true;

      case 'target_date':
        if (input.kind === 'action') {
          if (input.action.type === 'custom_date') {
            session.dateEntry = 'free_form';
            return false;
          }
          if (input.action.type === 'pick_date' && session.dateOptions.includes(input.action.date)) {
            draft.targetDate = input.action.date;
            return true;
          }
          throw new ValidationError('unexpected_input');
        }
        draft.targetDate = parseFreeFormDate(input.text, this.clock());
        return true;

      case 'order_amount':
        draft.orderAmount = parseAmount(this.expectText(input));
        return true;

      case 'product_count':
        draft.productCount = parseProductCount(this.expectText(input));
        return true;

      case 'split_payment':
        if (input.kind === 'action' && input.action.type === 'split') {
          draft.splitPayment = input.action.value;
          return true;
        }
        throw new ValidationError('unexpected_input');
    }
  }

  private expectText(input: IntakeInput): string {
    if (input.kind !== 'text') {
      throw new ValidationError('unexpected_input');
    }
    return input.text;
  }

  private currentStep(session: IntakeSession): IntakeStep {
    const step = session.steps[session.stepIndex];
    if (!step) {
      throw new Error(`Intake session ${session.conversationId} has no step ${session.stepIndex}`);
    }
    return step;
  }

  private prompt(session: IntakeSession, rejection?: ValidationReason): PromptOutcome {
    const step = this.currentStep(session);
    if (step === 'target_date' && session.dateOptions.length === 0) {
      session.dateOptions = upcomingDates(this.clock());
    }
    return {
      type: 'prompt',
      step,
      draft: { ...session.draft },
      dateOptions: [...session.dateOptions],
      dateEntry: session.dateEntry,
      ...(rejection ? { rejection } : {}),
    };
  }

  private async complete(session: IntakeSession): Promise<IntakeOutcome> {
    this.sessions.delete(session.conversationId);

    const { key, targetDate, orderAmount, productCount, splitPayment } = session.draft;
    if (key === undefined || targetDate === undefined) {
      throw new Error(`Intake session ${session.conversationId} finished without key or date`);
    }

    const record: CustomerRecord = {
      key,
      targetDate,
      orderAmount: orderAmount ?? null,
      splitPayment: splitPayment ?? null,
      notified: false,
    };
    if (this.variant === 'payments') {
      record.payment = {
        productCount: productCount ?? 1,
        createdAt: this.clock().toISOString(),
        dutyPaid: false,
        deliveryPaid: false,
        insurancePaid: false,
        depositPaid: false,
      };
    }

    await this.store.upsert(record);
    logger.info({ key, targetDate }, 'Customer added');
    return { type: 'completed', record };
  }
}
