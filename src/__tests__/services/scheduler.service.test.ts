import { SchedulerService } from '../../services/scheduler.service';
import { SessionWindow } from '../../utils/session-window';
import { createMockLogger } from '../helpers/test-data.helper';

// 16:55 local (UTC+5) on 2024-01-15
const PRE_SESSION_TIME = Date.UTC(2024, 0, 15, 11, 55);
const DAY_MS = 24 * 60 * 60 * 1000;

describe('SchedulerService', () => {
  const session = new SessionWindow({ utcOffsetMinutes: 300, start: '17:00', end: '22:00' });
  let now: number;
  let scheduler: SchedulerService;

  beforeEach(() => {
    now = PRE_SESSION_TIME;
    scheduler = new SchedulerService(session, createMockLogger(), () => now);
  });

  describe('runJob', () => {
    it('should run the handler', async () => {
      const handler = jest.fn().mockResolvedValue(undefined);

      expect(await scheduler.runJob('job', handler)).toBe(true);
      expect(handler).toHaveBeenCalledTimes(1);
    });

    it('should skip a run while the previous one is still in flight', async () => {
      let finish: () => void = () => undefined;
      const slow = jest.fn(() => new Promise<void>(resolve => {
        finish = resolve;
      }));

      const first = scheduler.runJob('job', slow);
      expect(await scheduler.runJob('job', slow)).toBe(false);

      finish();
      expect(await first).toBe(true);
      expect(slow).toHaveBeenCalledTimes(1);
      expect(await scheduler.runJob('job', jest.fn().mockResolvedValue(undefined))).toBe(true);
    });

    it('should log and swallow handler errors', async () => {
      const failing = jest.fn().mockRejectedValue(new Error('boom'));

      await expect(scheduler.runJob('job', failing)).resolves.toBe(true);
      expect(await scheduler.runJob('job', failing)).toBe(true);
    });
  });

  describe('daily jobs', () => {
    it('should fire once per local date at the configured clock time', async () => {
      const handler = jest.fn().mockResolvedValue(undefined);
      scheduler.dailyAt('pre-session', '16:55', handler);

      await scheduler.checkDailyJobs();
      now += 30 * 1000;
      await scheduler.checkDailyJobs();
      expect(handler).toHaveBeenCalledTimes(1);

      now = PRE_SESSION_TIME + DAY_MS;
      await scheduler.checkDailyJobs();
      expect(handler).toHaveBeenCalledTimes(2);
    });

    it('should not fire at other times', async () => {
      const handler = jest.fn().mockResolvedValue(undefined);
      scheduler.dailyAt('pre-session', '16:55', handler);
      now = PRE_SESSION_TIME + 60 * 1000;

      await scheduler.checkDailyJobs();

      expect(handler).not.toHaveBeenCalled();
    });

    it('should reject an invalid clock time', () => {
      expect(() => scheduler.dailyAt('bad', '4:55pm', jest.fn())).toThrow('Invalid clock time');
    });
  });

  describe('timers', () => {
    beforeEach(() => {
      jest.useFakeTimers();
    });

    afterEach(() => {
      scheduler.stop();
      jest.useRealTimers();
    });

    it('should run interval jobs until stopped', async () => {
      const handler = jest.fn().mockResolvedValue(undefined);
      scheduler.every('monitor', 1000, handler);

      scheduler.start();
      await jest.advanceTimersByTimeAsync(1000);
      await jest.advanceTimersByTimeAsync(1000);
      await jest.advanceTimersByTimeAsync(1000);
      expect(handler).toHaveBeenCalledTimes(3);

      scheduler.stop();
      await jest.advanceTimersByTimeAsync(5000);
      expect(handler).toHaveBeenCalledTimes(3);
    });

    it('should check daily jobs on a timer', async () => {
      const handler = jest.fn().mockResolvedValue(undefined);
      scheduler.dailyAt('pre-session', '16:55', handler);

      scheduler.start();
      await jest.advanceTimersByTimeAsync(30 * 1000);

      expect(handler).toHaveBeenCalledTimes(1);
    });
  });
});
