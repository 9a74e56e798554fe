/**
 * Session Window Utility
 *
 * Evaluates wall-clock times in a fixed local zone given as a UTC offset
 * (e.g. +300 minutes for Pakistan time, where the NY session is 17:00-22:00).
 *
 * Windows whose end is before their start cross midnight.
 */

import { SessionConfig } from '../types';
import { MINUTES_PER_DAY, TIME_UNITS } from '../constants';

const CLOCK_PATTERN = /^([01]\d|2[0-3]):([0-5]\d)$/;

/**
 * "HH:MM" -> minutes after midnight
 */
export function parseClock(value: string): number {
  const match = CLOCK_PATTERN.exec(value);
  if (!match) {
    throw new Error(`Invalid clock time "${value}" (expected HH:MM)`);
  }
  return Number(match[1]) * 60 + Number(match[2]);
}

export function formatClock(minutes: number): string {
  const whole = Math.floor(minutes);
  const hh = Math.floor(whole / 60).toString().padStart(2, '0');
  const mm = (whole % 60).toString().padStart(2, '0');
  return `${hh}:${mm}`;
}

export class SessionWindow {
  private readonly startMinutes: number;
  private readonly endMinutes: number;

  constructor(private readonly config: Pick<SessionConfig, 'utcOffsetMinutes' | 'start' | 'end'>) {
    this.startMinutes = parseClock(config.start);
    this.endMinutes = parseClock(config.end);
  }

  /**
   * Minutes after local midnight, with seconds as a fraction
   */
  localMinutes(now: number): number {
    const local = new Date(this.toLocalMs(now));
    return local.getUTCHours() * 60 + local.getUTCMinutes() + local.getUTCSeconds() / 60;
  }

  /**
   * Local calendar date, YYYY-MM-DD
   */
  localDateKey(now: number): string {
    return new Date(this.toLocalMs(now)).toISOString().split('T')[0];
  }

  /**
   * Local "HH:MM"
   */
  localClock(now: number): string {
    return formatClock(this.localMinutes(now));
  }

  /**
   * Inclusive on both ends
   */
  isInSession(now: number): boolean {
    const minutes = this.localMinutes(now);

    if (this.startMinutes <= this.endMinutes) {
      return minutes >= this.startMinutes && minutes <= this.endMinutes;
    }
    return minutes >= this.startMinutes || minutes <= this.endMinutes;
  }

  /**
   * Date the current session opened on. For a window crossing midnight,
   * the hours after midnight belong to the previous local date.
   */
  sessionDateKey(now: number): string {
    const crossesMidnight = this.startMinutes > this.endMinutes;
    if (crossesMidnight && this.localMinutes(now) <= this.endMinutes) {
      return this.localDateKey(now - TIME_UNITS.DAY);
    }
    return this.localDateKey(now);
  }

  describe(): string {
    return `${this.config.start}-${this.config.end} (UTC${formatOffset(this.config.utcOffsetMinutes)})`;
  }

  private toLocalMs(now: number): number {
    return now + this.config.utcOffsetMinutes * TIME_UNITS.MINUTE;
  }
}

function formatOffset(offsetMinutes: number): string {
  const sign = offsetMinutes < 0 ? '-' : '+';
  return `${sign}${formatClock(Math.abs(offsetMinutes) % MINUTES_PER_DAY)}`;
}
