import dotenv from 'dotenv';
import { z } from 'zod';
import { isValidTimeZone } from './lib/dates.js';
import type { BotVariant, ChatId, ReminderMode, StoreBackend } from './types.js';

dotenv.config();

export const TIME_OF_DAY_PATTERN = /^([01]\d|2[0-3]):([0-5]\d)$/;

const booleanFlag = z
  .string()
  .trim()
  .toLowerCase()
  .optional()
  .transform((value) => ['1', 'true', 'yes', 'on'].includes(value ?? ''));

const EnvSchema = z
  .object({
    TELEGRAM_BOT_TOKEN: z.string().trim().min(1, 'TELEGRAM_BOT_TOKEN is required'),
    BOT_VARIANT: z.enum(['delivery', 'payments']).default('delivery'),
    STORE_BACKEND: z.enum(['json', 'supabase']).optional(),
    DATA_FILE: z.string().trim().min(1).default('customers_data.json'),
    SUPABASE_URL: z.string().trim().url().optional(),
    SUPABASE_SERVICE_ROLE: z.string().trim().min(1).optional(),
    CLIENTS_TABLE: z.string().trim().min(1).default('clients'),
    ORDER_AMOUNT_ENABLED: booleanFlag,
    SPLIT_PAYMENT_ENABLED: booleanFlag,
    REMINDER_MODE: z.enum(['daily', 'one_shot']).optional(),
    REMINDER_TIME: z.string().trim().regex(TIME_OF_DAY_PATTERN, 'REMINDER_TIME must be HH:MM').default('09:00'),
    REMINDER_DELAY_DAYS: z.coerce.number().int().positive().default(14),
    REMINDER_CHAT_IDS: z.string().default(''),
    TIMEZONE: z.string().trim().min(1).refine(isValidTimeZone, 'TIMEZONE must be an IANA time zone').optional(),
    INTAKE_SESSION_TTL_MINUTES: z.coerce.number().int().positive().default(30),
    CRON_ENABLED: z.string().trim().toLowerCase().optional().transform((value) => value !== 'false'),
    // читается logger.ts напрямую, здесь только проверка
    LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  })
  .superRefine((env, ctx) => {
    const backend = env.STORE_BACKEND ?? defaultBackend(env.BOT_VARIANT);
    if (backend !== 'supabase') return;
    if (!env.SUPABASE_URL) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['SUPABASE_URL'], message: 'required for the supabase store' });
    }
    if (!env.SUPABASE_SERVICE_ROLE) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['SUPABASE_SERVICE_ROLE'], message: 'required for the supabase store' });
    }
  });

export interface SupabaseSettings {
  url: string;
  serviceRole: string;
  table: string;
}

export interface AppConfig {
  telegramBotToken: string;
  variant: BotVariant;
  storeBackend: StoreBackend;
  dataFile: string;
  supabase: SupabaseSettings | null;
  orderAmountEnabled: boolean;
  splitPaymentEnabled: boolean;
  reminderMode: ReminderMode;
  reminderTime: string;
  reminderDelayDays: number;
  reminderChatIds: ChatId[];
  timezone: string | undefined;
  intakeSessionTtlMs: number;
  cronEnabled: boolean;
}

function defaultBackend(variant: BotVariant): StoreBackend {
  return variant === 'payments' ? 'supabase' : 'json';
}

function defaultReminderMode(variant: BotVariant): ReminderMode {
  return variant === 'payments' ? 'one_shot' : 'daily';
}

export function parseChatIds(raw: string): ChatId[] {
  return raw
    .split(',')
    .map((id) => id.trim())
    .filter((id) => id.length > 0)
    .map((id) => (/^-?\d+$/.test(id) ? Number(id) : id));
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || 'env'}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid configuration: ${details}`);
  }

  const e = parsed.data;
  const storeBackend = e.STORE_BACKEND ?? defaultBackend(e.BOT_VARIANT);

  return {
    telegramBotToken: e.TELEGRAM_BOT_TOKEN,
    variant: e.BOT_VARIANT,
    storeBackend,
    dataFile: e.DATA_FILE,
    supabase: storeBackend === 'supabase' && e.SUPABASE_URL && e.SUPABASE_SERVICE_ROLE
      ? { url: e.SUPABASE_URL, serviceRole: e.SUPABASE_SERVICE_ROLE, table: e.CLIENTS_TABLE }
      : null,
    // в варианте payments сумма нужна для расчёта платежей
    orderAmountEnabled: e.BOT_VARIANT === 'payments' || e.ORDER_AMOUNT_ENABLED,
    splitPaymentEnabled: e.SPLIT_PAYMENT_ENABLED,
    reminderMode: e.REMINDER_MODE ?? defaultReminderMode(e.BOT_VARIANT),
    reminderTime: e.REMINDER_TIME,
    reminderDelayDays: e.REMINDER_DELAY_DAYS,
    reminderChatIds: parseChatIds(e.REMINDER_CHAT_IDS),
    timezone: e.TIMEZONE,
    intakeSessionTtlMs: e.INTAKE_SESSION_TTL_MINUTES * 60 * 1000,
    cronEnabled: e.CRON_ENABLED,
  };
}
