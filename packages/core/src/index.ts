import * as dotenv from 'dotenv';
import { Telegraf } from 'telegraf';
import { createLogger } from '@menu-editor/shared';
import { registerHandlers } from './bot/telegram-transport';
import { loadConfig } from './config';
import { createEngine } from './engine';

/**
 * Menu editor bot: long polling, JSON files under DATA_DIR.
 */

dotenv.config();
const logger = createLogger('core');

async function main(): Promise<void> {
  const config = loadConfig(process.env, logger);
  logger.level = config.logLevel;
  if (!config.botToken) {
    logger.fatal('TELEGRAM_BOT_TOKEN is not set');
    process.exit(1);
  }

  const engine = await createEngine({ config, logger });
  const bot = new Telegraf(config.botToken);
  registerHandlers(bot, engine.dispatcher, logger);

  let stopping = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (stopping) {
      return;
    }
    stopping = true;
    logger.info({ signal }, 'Shutting down gracefully...');
    bot.stop(signal);
    await engine.shutdown();
    process.exit(0);
  };

  process.once('SIGINT', () => {
    shutdown('SIGINT').catch((error) => {
      logger.error({ error }, 'Graceful shutdown failed');
      process.exit(1);
    });
  });
  process.once('SIGTERM', () => {
    shutdown('SIGTERM').catch((error) => {
      logger.error({ error }, 'Graceful shutdown failed');
      process.exit(1);
    });
  });

  logger.info('Starting long polling');
  await bot.launch(() => {
    logger.info('✅ Bot started');
  });
}

process.on('unhandledRejection', (reason) => {
  logger.error({ reason }, 'Unhandled Promise Rejection');
});

main().catch((error) => {
  logger.fatal({ error }, 'Failed to start bot');
  process.exit(1);
});
