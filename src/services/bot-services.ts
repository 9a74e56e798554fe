/**
 * BotServices - dependency container
 *
 * Builds every service the bot needs from the config, in dependency order.
 * Collaborators that reach the outside world (feed, notifier, clock) can be overridden.
 */

import { CandleFeed, Config, LogLevel, LoggerService, Notifier } from '../types';
import { SessionWindow } from '../utils/session-window';
import { TwelveDataFeedService } from './candle-feed.service';
import { TelegramService } from './telegram.service';
import { LiquidityMonitorService, MonitorContext, createMonitorContext } from './liquidity-monitor.service';
import { SchedulerService } from './scheduler.service';

export interface BotServiceOverrides {
  logger?: LoggerService;
  feed?: CandleFeed;
  notifier?: Notifier;
  now?: () => number;
}

export class BotServices {
  readonly logger: LoggerService;
  readonly session: SessionWindow;
  readonly feed: CandleFeed;
  readonly notifier: Notifier;
  readonly monitor: LiquidityMonitorService;
  readonly context: MonitorContext;
  readonly scheduler: SchedulerService;
  readonly now: () => number;

  constructor(config: Config, overrides: BotServiceOverrides = {}) {
    // 1. Core
    this.logger = overrides.logger ?? new LoggerService(
      LogLevel[config.logging.level],
      config.logging.logDir,
      config.logging.writeToFile,
    );
    this.now = overrides.now ?? Date.now;
    this.session = new SessionWindow(config.session);

    // 2. Outside world
    this.feed = overrides.feed ?? new TwelveDataFeedService(config.feed, this.logger);
    this.notifier = overrides.notifier ?? new TelegramService(config.telegram, this.logger);

    // 3. Strategy and state
    this.monitor = new LiquidityMonitorService({
      config,
      feed: this.feed,
      notifier: this.notifier,
      session: this.session,
      logger: this.logger,
    });
    this.context = createMonitorContext(config, this.logger);

    // 4. Timers
    this.scheduler = new SchedulerService(this.session, this.logger, this.now);

    this.logger.debug('✅ Bot services initialized');
  }
}
