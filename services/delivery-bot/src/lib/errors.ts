/**
 * Классификация ошибок бота.
 *
 * Ни одна из них не роняет процесс: validation — повторный вопрос,
 * not_found — сообщение пользователю, persistence и delivery — только в лог.
 */

export type ErrorKind = 'validation' | 'not_found' | 'persistence' | 'delivery';

export type ValidationReason =
  | 'empty_key'
  | 'key_too_long'
  | 'bad_date_format'
  | 'date_in_past'
  | 'not_a_number'
  | 'not_positive'
  | 'not_an_integer'
  | 'bad_time_format'
  | 'unexpected_input'
  | 'not_a_payment_record';

export class BotError extends Error {
  readonly kind: ErrorKind;

  constructor(kind: ErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.kind = kind;
  }
}

export class ValidationError extends BotError {
  readonly reason: ValidationReason;

  constructor(reason: ValidationReason, message: string = reason) {
    super('validation', message);
    this.reason = reason;
  }
}

export class NotFoundError extends BotError {
  readonly key: string;

  constructor(key: string) {
    super('not_found', `Record not found: ${key}`);
    this.key = key;
  }
}

export class PersistenceError extends BotError {
  readonly operation: string;

  constructor(operation: string, message: string, options?: { cause?: unknown }) {
    super('persistence', message, options);
    this.operation = operation;
  }
}

export class DeliveryError extends BotError {
  readonly recipient: string;

  constructor(recipient: string, message: string, options?: { cause?: unknown }) {
    super('delivery', message, options);
    this.recipient = recipient;
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  if (typeof err === 'string') return err;
  return String(err);
}
