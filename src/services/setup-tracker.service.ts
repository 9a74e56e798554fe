/**
 * Setup Tracker Service
 *
 * Holds at most one pending plan per instrument and moves it through
 * EMPTY -> ARMED -> TRIGGERED -> EMPTY. TRIGGERED lasts until the caller
 * has handed the alert to the notifier (completeTrigger).
 *
 * Re-arm policy:
 * - Same direction while ARMED: new plan is rejected, the armed plan stays
 * - Opposite direction while ARMED: armed plan expires, new plan is armed
 * - Plan from a sweep that already triggered or expired: ignored as a duplicate
 *
 * Expiry: a plan armed on an earlier session date expires on the next in-session check.
 * Triggering consumes the daily alert budget; an exhausted budget keeps the plan armed
 * and suppresses the alert.
 */

import {
  ArmOutcome,
  LoggerService,
  PriceCheckOutcome,
  Setup,
  SetupState,
  TradePlan,
} from '../types';
import { AlertBudgetService } from './alert-budget.service';

export type ArmResult =
  | { outcome: ArmOutcome.ARMED; plan: TradePlan }
  | { outcome: ArmOutcome.REPLACED; plan: TradePlan; expired: TradePlan }
  | { outcome: ArmOutcome.REJECTED; plan: TradePlan; existing: TradePlan }
  | { outcome: ArmOutcome.DUPLICATE; plan: TradePlan };

export type PriceCheckResult =
  | { outcome: PriceCheckOutcome.IDLE }
  | { outcome: PriceCheckOutcome.WAITING; plan: TradePlan; distance: number }
  | { outcome: PriceCheckOutcome.TRIGGERED; plan: TradePlan; price: number }
  | { outcome: PriceCheckOutcome.SUPPRESSED; plan: TradePlan; price: number };

export interface SetupTrackerConfig {
  triggerTolerance: number; // Relative distance to entry, 0.001 = 0.1%
}

const DEFAULT_CONFIG: SetupTrackerConfig = {
  triggerTolerance: 0.001,
};

export class SetupTrackerService {
  private readonly setups = new Map<string, Setup>();
  private readonly consumedSweeps = new Map<string, number>();
  private config: SetupTrackerConfig;

  constructor(
    private readonly budget: AlertBudgetService,
    private readonly logger: LoggerService,
    config?: Partial<SetupTrackerConfig>,
  ) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  getSetup(symbol: string): Setup {
    const setup = this.setups.get(symbol);
    return setup ? { ...setup } : emptySetup(symbol);
  }

  getArmedPlan(symbol: string): TradePlan | null {
    const setup = this.setups.get(symbol);
    return setup?.state === SetupState.ARMED ? setup.plan : null;
  }

  getArmedSymbols(): string[] {
    return [...this.setups.values()]
      .filter(s => s.state === SetupState.ARMED)
      .map(s => s.symbol);
  }

  /**
   * EMPTY -> ARMED, or replace an opposite-direction plan
   */
  arm(plan: TradePlan, sessionDate: string): ArmResult {
    if (this.consumedSweeps.get(plan.symbol) === plan.sweepTimestamp) {
      return { outcome: ArmOutcome.DUPLICATE, plan };
    }

    const existing = this.getArmedPlan(plan.symbol);

    if (existing && existing.side === plan.side) {
      this.logger.debug('⏸️ Setup already armed in same direction, new plan rejected', {
        symbol: plan.symbol,
        side: plan.side,
        armedEntry: existing.entry,
        rejectedEntry: plan.entry,
      });
      return { outcome: ArmOutcome.REJECTED, plan, existing };
    }

    this.setups.set(plan.symbol, {
      symbol: plan.symbol,
      state: SetupState.ARMED,
      plan,
      sessionDate,
    });

    if (existing) {
      this.consumedSweeps.set(existing.symbol, existing.sweepTimestamp);
      this.logger.info('🔄 Opposite setup replaced armed plan', {
        symbol: plan.symbol,
        expiredSide: existing.side,
        newSide: plan.side,
      });
      return { outcome: ArmOutcome.REPLACED, plan, expired: existing };
    }

    this.logger.info('🟡 Setup ARMED', {
      symbol: plan.symbol,
      side: plan.side,
      entry: plan.entry,
    });
    return { outcome: ArmOutcome.ARMED, plan };
  }

  /**
   * ARMED -> EMPTY for plans armed on an earlier session date
   * @returns expired plans
   */
  expireStale(sessionDate: string): TradePlan[] {
    const expired: TradePlan[] = [];

    for (const setup of this.setups.values()) {
      if (setup.state === SetupState.ARMED && setup.plan && setup.sessionDate !== sessionDate) {
        expired.push(setup.plan);
        this.consumedSweeps.set(setup.symbol, setup.plan.sweepTimestamp);
        this.logger.info('⌛ Setup expired at session boundary', {
          symbol: setup.symbol,
          armedOn: setup.sessionDate,
          sessionDate,
        });
        this.setups.set(setup.symbol, emptySetup(setup.symbol));
      }
    }

    return expired;
  }

  /**
   * Compare live price with the armed entry
   */
  evaluatePrice(symbol: string, price: number, date: string): PriceCheckResult {
    const plan = this.getArmedPlan(symbol);
    if (!plan) {
      return { outcome: PriceCheckOutcome.IDLE };
    }

    const distance = Math.abs(price - plan.entry) / plan.entry;
    if (distance > this.config.triggerTolerance) {
      return { outcome: PriceCheckOutcome.WAITING, plan, distance };
    }

    if (!this.budget.tryConsume(date)) {
      return { outcome: PriceCheckOutcome.SUPPRESSED, plan, price };
    }

    this.setups.set(symbol, { ...this.getSetup(symbol), state: SetupState.TRIGGERED });
    this.consumedSweeps.set(symbol, plan.sweepTimestamp);
    this.logger.info('🔔 Setup TRIGGERED', { symbol, price, entry: plan.entry });

    return { outcome: PriceCheckOutcome.TRIGGERED, plan, price };
  }

  /**
   * TRIGGERED -> EMPTY once the alert was handed to the notifier (delivered or not)
   */
  completeTrigger(symbol: string): void {
    if (this.setups.get(symbol)?.state === SetupState.TRIGGERED) {
      this.setups.set(symbol, emptySetup(symbol));
    }
  }
}

function emptySetup(symbol: string): Setup {
  return { symbol, state: SetupState.EMPTY, plan: null, sessionDate: null };
}
