/**
 * Telegram Notification Service
 * Sends liquidity snapshots and setup alerts to Telegram
 */

import {
  LiquidityZone,
  LoggerService,
  Notifier,
  PlanSide,
  TelegramConfig,
  TradePlan,
} from '../types';
import { PERCENT_MULTIPLIER } from '../constants';
import { extractErrorMessage } from '../utils/error-helper';

export class TelegramService implements Notifier {
  private readonly botToken: string | null;
  private readonly chatId: string | null;
  private readonly enabled: boolean;

  constructor(
    private readonly config: TelegramConfig,
    private readonly logger: LoggerService,
  ) {
    this.botToken = config.botToken || null;
    this.chatId = config.chatId || null;
    this.enabled = config.enabled && !!this.botToken && !!this.chatId;

    if (this.enabled) {
      this.logger.info('✅ Telegram notifications ENABLED', {
        chatId: this.chatId,
      });
    } else {
      this.logger.info(
        '⚠️ Telegram notifications DISABLED (set TELEGRAM_TOKEN and TELEGRAM_CHAT_ID)',
      );
    }
  }

  /**
   * Send message to Telegram
   * @returns false on any delivery failure (logged, never thrown)
   */
  async send(message: string): Promise<boolean> {
    if (!this.enabled || !this.botToken || !this.chatId) {
      this.logger.debug('📭 Telegram disabled, message dropped', { messageLength: message.length });
      return false;
    }

    try {
      const url = `https://api.telegram.org/bot${this.botToken}/sendMessage`;
      const response = await fetch(url, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
        },
        body: JSON.stringify({
          chat_id: this.chatId,
          text: message,
          parse_mode: 'HTML',
        }),
        signal: AbortSignal.timeout(this.config.timeoutMs),
      });

      if (!response.ok) {
        const errorText = await response.text();
        throw new Error(`Telegram API error: ${response.status} ${errorText}`);
      }

      this.logger.debug('📤 Telegram notification sent', {
        messageLength: message.length,
      });
      return true;
    } catch (error) {
      this.logger.error('❌ Failed to send Telegram notification', {
        error: extractErrorMessage(error),
      });
      return false;
    }
  }
}

// ============================================================================
// MESSAGE FORMATTERS
// ============================================================================

export function formatPreSession(localClock: string): string {
  return `🕒 <b>Pre-NY Session</b>\nTime (local): ${localClock}`;
}

export function formatLiquiditySnapshot(symbol: string, zone: LiquidityZone): string {
  return `
📊 <b>${symbol} Liquidity</b>
Low: ${zone.recentLow}
High: ${zone.recentHigh}
Last: ${zone.lastClose}
`.trim();
}

export function formatErrorAlert(context: string, details: string): string {
  return `⚠️ <b>${context} error</b>\n${escapeHtml(details)}`;
}

export function formatEntryAlert(plan: TradePlan, price: number): string {
  const sideEmoji = plan.side === PlanSide.LONG ? '🟢' : '🔴';

  return `
${sideEmoji} <b>${plan.symbol} ${plan.side} - ENTRY ZONE HIT</b>

💰 Price: ${price}
📍 Entry: ${plan.entry}
🛡️ Stop Loss: ${plan.stopLoss}
🎯 TP1: ${plan.takeProfit1}
🎯 TP: ${plan.takeProfit}
📊 Confidence: ${formatConfidence(plan.confidence)}
📝 Logic: ${plan.logic}

ℹ️ Advisory only - no order placed.
`.trim();
}

export function escapeHtml(text: string): string {
  return text.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');
}

function formatConfidence(confidence: number): string {
  return `${Math.round(confidence * PERCENT_MULTIPLIER)}%`;
}
