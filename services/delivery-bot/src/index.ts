import TelegramBot from 'node-telegram-bot-api';
import { loadConfig, type AppConfig } from './config.js';
import { createLogger } from './lib/logger.js';
import { errorMessage } from './lib/errors.js';
import type { RecordStore } from './store/recordStore.js';
import { JsonFileStore } from './store/jsonFileStore.js';
import { SupabaseRecordStore, createSupabaseClient, createSupabaseClientsTable } from './store/supabaseStore.js';
import { IntakeWorkflow } from './workflow/intake.js';
import { ReminderScheduler, type ReminderSchedule } from './cron/reminders.js';
import { BotSettings } from './settings.js';
import { DeliveryBotRouter } from './bot/router.js';
import { createTelegramSink } from './bot/transport.js';
import { formatReminder } from './bot/views.js';

const logger = createLogger({ module: 'main' });

const SESSION_SWEEP_INTERVAL_MS = 5 * 60 * 1000;

function createStore(config: AppConfig): RecordStore {
  if (config.storeBackend === 'supabase') {
    if (!config.supabase) {
      throw new Error('Supabase store selected without credentials');
    }
    const client = createSupabaseClient(config.supabase);
    return new SupabaseRecordStore(createSupabaseClientsTable(client, config.supabase.table));
  }
  return new JsonFileStore(config.dataFile);
}

function reminderSchedule(config: AppConfig): ReminderSchedule {
  return config.reminderMode === 'daily'
    ? { mode: 'daily', time: config.reminderTime, timezone: config.timezone, cronEnabled: config.cronEnabled }
    : { mode: 'one_shot', delayDays: config.reminderDelayDays };
}

async function main() {
  const config = loadConfig();
  logger.info({ variant: config.variant, store: config.storeBackend, reminders: config.reminderMode }, 'Starting delivery-bot...');

  // 1. Records
  const store = createStore(config);
  await store.load();

  // 2. Telegram bot (polling)
  const bot = new TelegramBot(config.telegramBotToken, { polling: true });
  const me = await bot.getMe();
  logger.info({ username: me.username, id: me.id }, 'Bot connected');

  // 3. Workflow, reminders, handlers
  const settings = new BotSettings({
    orderAmountEnabled: config.orderAmountEnabled,
    splitPaymentEnabled: config.splitPaymentEnabled,
    reminderTime: config.reminderTime,
  });
  const workflow = new IntakeWorkflow(store, {
    variant: config.variant,
    sessionTtlMs: config.intakeSessionTtlMs,
  });
  const scheduler = new ReminderScheduler(store, createTelegramSink(bot), {
    schedule: reminderSchedule(config),
    recipients: config.reminderChatIds,
    formatReminder,
    throttleMs: 200,
  });

  const router = new DeliveryBotRouter({
    transport: bot,
    store,
    workflow,
    settings,
    scheduler,
    variant: config.variant,
  });
  router.register(bot);
  scheduler.start();

  const sweeper = setInterval(() => workflow.pruneIdle(), SESSION_SWEEP_INTERVAL_MS);

  // Graceful shutdown
  const shutdown = async () => {
    logger.info('Shutting down...');
    clearInterval(sweeper);
    scheduler.stop();
    await bot.stopPolling();
    process.exit(0);
  };

  process.on('SIGINT', () => {
    shutdown().catch(err => {
      logger.error({ error: errorMessage(err) }, 'Shutdown failed');
      process.exit(1);
    });
  });
  process.on('SIGTERM', () => {
    shutdown().catch(err => {
      logger.error({ error: errorMessage(err) }, 'Shutdown failed');
      process.exit(1);
    });
  });

  logger.info('delivery-bot is ready');
}

main().catch(err => {
  logger.fatal({ error: errorMessage(err), stack: err instanceof Error ? err.stack : undefined }, 'Failed to start');
  process.exit(1);
});
