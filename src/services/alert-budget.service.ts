/**
 * Alert Budget Service
 *
 * Caps the number of plan alerts per local calendar day.
 * The counter resets the first time a new date is seen.
 */

import { DailyAlertBudget, LoggerService } from '../types';

export class AlertBudgetService {
  private state: DailyAlertBudget = { count: 0, date: null };

  constructor(
    private readonly maxAlertsPerDay: number,
    private readonly logger: LoggerService,
  ) {}

  /**
   * Reserve one alert for the given date
   * @returns false once the cap for that date is reached
   */
  tryConsume(date: string): boolean {
    this.rollover(date);

    if (this.state.count >= this.maxAlertsPerDay) {
      this.logger.info('🚫 Daily alert budget exhausted', {
        date,
        count: this.state.count,
        max: this.maxAlertsPerDay,
      });
      return false;
    }

    this.state.count++;
    return true;
  }

  remaining(date: string): number {
    this.rollover(date);
    return Math.max(this.maxAlertsPerDay - this.state.count, 0);
  }

  snapshot(): DailyAlertBudget {
    return { ...this.state };
  }

  private rollover(date: string): void {
    if (this.state.date === date) {
      return;
    }

    if (this.state.date !== null) {
      this.logger.debug('📅 Alert budget reset for new day', {
        previousDate: this.state.date,
        previousCount: this.state.count,
        date,
      });
    }
    this.state = { count: 0, date };
  }
}
