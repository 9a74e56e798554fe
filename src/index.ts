/**
 * Entry point
 */

import { getConfig } from './config';
import { BotFactory } from './bot-factory';
import { extractErrorMessage } from './utils/error-helper';

async function main(): Promise<void> {
  const config = getConfig();
  const bot = BotFactory.create({ config });

  const shutdown = (signal: string): void => {
    console.log(`\n${signal} received, shutting down...`);
    bot.stop();
    process.exit(0);
  };
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));

  await bot.start();
}

main().catch((error: unknown) => {
  console.error('❌ Fatal error:', extractErrorMessage(error));
  process.exit(1);
});
