/**
 * BotFactory - Factory Pattern for LiquiditySweepBot creation
 *
 * Single point of bot creation:
 * - Service initialization via BotServices
 * - Bot instantiation with all dependencies
 */

import { Config } from './types';
import { LiquiditySweepBot } from './bot';
import { BotServiceOverrides, BotServices } from './services/bot-services';

export interface BotFactoryConfig {
  config: Config;
}

export class BotFactory {
  /**
   * @example
   * const bot = BotFactory.create({ config: getConfig() });
   * await bot.start();
   */
  static create(factoryConfig: BotFactoryConfig): LiquiditySweepBot {
    const { config } = factoryConfig;

    const services = new BotServices(config);
    const bot = new LiquiditySweepBot(services, config);

    services.logger.info('🤖 Bot created successfully via BotFactory');

    return bot;
  }

  /**
   * Create a bot with fake collaborators (feed, notifier, clock) for tests
   */
  static createForTesting(
    config: Config,
    serviceOverrides: BotServiceOverrides,
  ): { bot: LiquiditySweepBot; services: BotServices } {
    const services = new BotServices(config, serviceOverrides);
    return { bot: new LiquiditySweepBot(services, config), services };
  }
}
