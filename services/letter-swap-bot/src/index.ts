import TelegramBot from 'node-telegram-bot-api';
import { loadConfig } from './config.js';
import { createLogger } from './lib/logger.js';
import { LetterSwapBot } from './bot.js';

const logger = createLogger({ module: 'main' });

async function main() {
  const config = loadConfig();
  logger.info({ maxTextLength: config.maxTextLength }, 'Starting letter-swap-bot...');

  const bot = new TelegramBot(config.telegramBotToken, { polling: true });
  const me = await bot.getMe();
  logger.info({ username: me.username }, 'Bot connected');

  new LetterSwapBot(bot, { maxTextLength: config.maxTextLength }).register(bot);

  const shutdown = () => {
    logger.info('Shutting down...');
    bot.stopPolling()
      .then(() => process.exit(0))
      .catch(err => {
        logger.error({ error: err instanceof Error ? err.message : String(err) }, 'Shutdown failed');
        process.exit(1);
      });
  };
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);

  logger.info('letter-swap-bot is ready');
}

main().catch(err => {
  logger.fatal({ error: err instanceof Error ? err.message : String(err) }, 'Failed to start');
  process.exit(1);
});
