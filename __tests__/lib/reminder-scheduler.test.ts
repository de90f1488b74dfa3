/**
 * Unit Tests for lib/reminder-scheduler.ts
 * Testing: one job per title, replace / cancel / rename, startup re-arming
 * Uses Jest fake timers; the scheduler reads the faked Date as its clock
 */

import pino from 'pino';
import { ReminderScheduler } from '@/lib/reminder-scheduler';
import { ListStore } from '@/lib/list-store';
import { formatLocalDateTime } from '@/lib/local-datetime';
import { MAX_TIMER_DELAY_MS } from '@/lib/constants';
import { ReminderFired } from '@/lib/types';

const NOW = new Date(2030, 0, 5, 9, 0, 0);
const inMs = (ms: number): Date => new Date(NOW.getTime() + ms);

describe('ReminderScheduler', () => {
  let scheduler: ReminderScheduler;
  let fired: ReminderFired[];

  beforeEach(() => {
    jest.useFakeTimers();
    jest.setSystemTime(NOW);
    scheduler = new ReminderScheduler();
    fired = [];
    scheduler.start((message) => {
      fired.push(message);
    });
  });

  afterEach(() => {
    scheduler.stop();
    jest.useRealTimers();
  });

  describe('schedule', () => {
    it('should register a job under the derived id', () => {
      const result = scheduler.schedule('Weekly plan', inMs(60_000));

      expect(result).toEqual({
        ok: true,
        replaced: false,
        job: { id: 'reminder__Weekly_plan', title: 'Weekly plan', fireAt: inMs(60_000) },
      });
      expect(scheduler.listJobs()).toHaveLength(1);
    });

    it('should refuse the current instant and the past', () => {
      expect(scheduler.schedule('Work', inMs(0))).toEqual({ ok: false, reason: 'past' });
      expect(scheduler.schedule('Work', inMs(-1000))).toEqual({ ok: false, reason: 'past' });
      expect(scheduler.getJob('Work')).toBeUndefined();
    });

    it('should refuse an invalid date', () => {
      expect(scheduler.schedule('Work', new Date('nope'))).toEqual({ ok: false, reason: 'invalid-date' });
    });

    it('should refuse to arm before start', () => {
      const idle = new ReminderScheduler();

      expect(idle.schedule('Work', inMs(1000))).toEqual({ ok: false, reason: 'not-running' });
    });

    it('should not hold on to the caller Date', () => {
      const fireAt = inMs(5000);
      scheduler.schedule('Work', fireAt);
      fireAt.setTime(0);

      expect(scheduler.getJob('Work')?.fireAt).toEqual(inMs(5000));
    });
  });

  describe('firing', () => {
    it('should fire once at the scheduled instant and drop the job', () => {
      scheduler.schedule('Work', inMs(2000));

      jest.advanceTimersByTime(1999);
      expect(fired).toHaveLength(0);

      jest.advanceTimersByTime(1);
      expect(fired).toEqual([{ jobId: 'reminder__Work', title: 'Work', fireAt: inMs(2000) }]);
      expect(scheduler.getJob('Work')).toBeUndefined();

      jest.advanceTimersByTime(60_000);
      expect(fired).toHaveLength(1);
    });

    it('should chain timers for delays beyond the setTimeout limit', () => {
      const thirtyDays = 30 * 24 * 60 * 60 * 1000;
      scheduler.schedule('Work', inMs(thirtyDays));

      jest.advanceTimersByTime(MAX_TIMER_DELAY_MS);
      expect(fired).toHaveLength(0);
      expect(scheduler.getJob('Work')).toBeDefined();

      jest.advanceTimersByTime(thirtyDays - MAX_TIMER_DELAY_MS);
      expect(fired).toHaveLength(1);
    });

    it('should survive a throwing fire handler', () => {
      const throwing = new ReminderScheduler({ logger: pino({ level: 'silent' }) });
      throwing.start(() => {
        throw new Error('handler failed');
      });
      throwing.schedule('Work', inMs(1000));

      expect(() => jest.advanceTimersByTime(1000)).not.toThrow();
      expect(throwing.listJobs()).toEqual([]);
      throwing.stop();
    });
  });

  describe('cancel', () => {
    it('should remove a pending job so it never fires', () => {
      scheduler.schedule('Work', inMs(2000));

      expect(scheduler.cancel('Work')).toEqual({ found: true });
      jest.advanceTimersByTime(5000);

      expect(fired).toHaveLength(0);
      expect(scheduler.listJobs()).toEqual([]);
    });

    it('should treat a missing job as a no-op', () => {
      expect(scheduler.cancel('Nothing here')).toEqual({ found: false });
    });
  });

  describe('replace', () => {
    it('should fire only at the latest fire time', () => {
      scheduler.schedule('Work', inMs(1000));
      const second = scheduler.schedule('Work', inMs(3000));

      expect(second.ok && second.replaced).toBe(true);
      expect(scheduler.listJobs()).toHaveLength(1);

      jest.advanceTimersByTime(1000);
      expect(fired).toHaveLength(0);

      jest.advanceTimersByTime(2000);
      expect(fired).toEqual([{ jobId: 'reminder__Work', title: 'Work', fireAt: inMs(3000) }]);
    });

    it('should also replace with an earlier time', () => {
      scheduler.schedule('Work', inMs(5000));
      scheduler.schedule('Work', inMs(1000));

      jest.advanceTimersByTime(10_000);

      expect(fired.map((message) => message.fireAt)).toEqual([inMs(1000)]);
    });

    it('should never hold two jobs for one title', () => {
      scheduler.schedule('Work', inMs(1000));
      scheduler.schedule('Work', inMs(2000));
      scheduler.schedule('Work', inMs(3000));
      scheduler.schedule('Home', inMs(3000));

      expect(scheduler.listJobs().map((job) => job.id)).toEqual(['reminder__Work', 'reminder__Home']);
    });
  });

  describe('rescheduleForRename', () => {
    it('should move the job to the new title keeping its fire time', () => {
      scheduler.schedule('Groceries', inMs(60_000));

      const result = scheduler.rescheduleForRename('Groceries', 'Shopping');

      expect(result.moved).toBe(true);
      expect(scheduler.getJob('Groceries')).toBeUndefined();
      expect(scheduler.listJobs()).toEqual([
        { id: 'reminder__Shopping', title: 'Shopping', fireAt: inMs(60_000) },
      ]);

      jest.advanceTimersByTime(60_000);
      expect(fired.map((message) => message.title)).toEqual(['Shopping']);
    });

    it('should do nothing when the old title has no job', () => {
      expect(scheduler.rescheduleForRename('Groceries', 'Shopping')).toEqual({ moved: false });
      expect(scheduler.listJobs()).toEqual([]);
    });
  });

  describe('rearmAll', () => {
    it('should arm future reminders and clear missed or invalid ones', () => {
      const store = new ListStore({
        Past: { tasks: ['a'], reminder: formatLocalDateTime(inMs(-1000)) },
        Future: { tasks: ['b'], reminder: formatLocalDateTime(inMs(60 * 60 * 1000)) },
        Broken: { tasks: [], reminder: 'tomorrow-ish' },
        None: { tasks: [], reminder: '' },
      });

      const summary = scheduler.rearmAll(store);

      expect(summary).toEqual({ armed: ['Future'], cleared: ['Past', 'Broken'] });
      expect(store.get('Past')?.reminder).toBe('');
      expect(store.get('Broken')?.reminder).toBe('');
      expect(store.get('Future')?.reminder).toBe('2030-01-05T10:00:00');
      expect(scheduler.listJobs()).toEqual([
        { id: 'reminder__Future', title: 'Future', fireAt: inMs(60 * 60 * 1000) },
      ]);
    });

    it('should not fire a catch-up notification for missed reminders', () => {
      const store = new ListStore({ Past: { tasks: [], reminder: formatLocalDateTime(inMs(-1000)) } });

      scheduler.rearmAll(store);
      jest.advanceTimersByTime(60_000);

      expect(fired).toEqual([]);
    });
  });

  describe('lifecycle', () => {
    it('should cancel outstanding timers on stop', () => {
      scheduler.schedule('Work', inMs(1000));
      scheduler.schedule('Home', inMs(2000));

      scheduler.stop();
      jest.advanceTimersByTime(5000);

      expect(fired).toEqual([]);
      expect(scheduler.isRunning()).toBe(false);
      expect(jest.getTimerCount()).toBe(0);
      expect(scheduler.schedule('Work', inMs(10_000))).toEqual({ ok: false, reason: 'not-running' });
    });

    it('should ignore a second start', () => {
      const other = jest.fn();
      scheduler.start(other);
      scheduler.schedule('Work', inMs(1000));

      jest.advanceTimersByTime(1000);

      expect(other).not.toHaveBeenCalled();
      expect(fired).toHaveLength(1);
    });
  });
});
