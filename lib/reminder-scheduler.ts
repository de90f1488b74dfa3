import type pino from 'pino';
import {
    CancelResult,
    JobId,
    RearmSummary,
    ReminderFired,
    ReminderJob,
    RescheduleResult,
    ScheduleResult,
} from './types';
import { MAX_TIMER_DELAY_MS } from './constants';
import { jobIdFor } from './job-id';
import { parseLocalDateTime } from './local-datetime';
import { ListStore } from './list-store';
import { schedulerLogger } from './logger';

export type FireHandler = (message: ReminderFired) => void;

export interface ReminderSchedulerOptions {
    /** Clock used for the "strictly in the future" check and timer delays */
    now?: () => Date;
    logger?: pino.Logger;
}

interface PendingJob extends ReminderJob {
    timer: ReturnType<typeof setTimeout> | null;
}

type AddOutcome = 'added' | 'already-exists';

const toPublicJob = (job: PendingJob): ReminderJob => ({
    id: job.id,
    title: job.title,
    fireAt: new Date(job.fireAt.getTime()),
});

/**
 * Holds at most one pending one-shot timer per list title.
 *
 * Per title the slot moves NONE -> SCHEDULED -> (FIRED | CANCELLED | REPLACED);
 * FIRED and CANCELLED return to NONE, REPLACED is a cancel followed by a fresh
 * SCHEDULED. Firing removes the job and posts a ReminderFired message to the
 * handler given to start(); the handler owns every side effect.
 */
export class ReminderScheduler {
    private readonly jobs = new Map<JobId, PendingJob>();
    private readonly now: () => Date;
    private readonly log: pino.Logger;
    private onFire: FireHandler | null = null;

    constructor(options: ReminderSchedulerOptions = {}) {
        this.now = options.now ?? (() => new Date());
        this.log = options.logger ?? schedulerLogger;
    }

    /**
     * Starts the timeline. Fired jobs are delivered to `onFire`.
     */
    start(onFire: FireHandler): void {
        if (this.onFire) {
            this.log.warn('Scheduler already running, start ignored');
            return;
        }
        this.onFire = onFire;
        this.log.debug('Scheduler started');
    }

    /**
     * Cancels every outstanding timer. Safe to call more than once.
     */
    stop(): void {
        const pending = this.jobs.size;
        this.jobs.forEach((job) => this.clearTimer(job));
        this.jobs.clear();
        this.onFire = null;
        this.log.debug({ pending }, 'Scheduler stopped');
    }

    isRunning(): boolean {
        return this.onFire !== null;
    }

    /**
     * Arms a one-shot job for `title`, replacing any job already held for it
     */
    schedule(title: string, fireAt: Date): ScheduleResult {
        if (!this.isRunning()) {
            return { ok: false, reason: 'not-running' };
        }
        if (isNaN(fireAt.getTime())) {
            return { ok: false, reason: 'invalid-date' };
        }
        if (fireAt.getTime() <= this.now().getTime()) {
            this.log.debug({ title, fireAt: fireAt.toISOString() }, 'Refusing to arm a past reminder');
            return { ok: false, reason: 'past' };
        }

        const id = jobIdFor(title);
        const replaced = this.removeJob(id);
        const job: PendingJob = { id, title, fireAt: new Date(fireAt.getTime()), timer: null };

        // Unreachable after removeJob above; kept so add never overwrites a live timer
        if (this.addJob(job) === 'already-exists') {
            this.log.warn({ jobId: id }, 'Job id still registered, removing and retrying once');
            this.removeJob(id);
            if (this.addJob(job) === 'already-exists') {
                return { ok: false, reason: 'conflict' };
            }
        }

        this.log.info({ jobId: id, fireAt: job.fireAt.toISOString(), replaced }, 'Reminder scheduled');
        return { ok: true, job: toPublicJob(job), replaced };
    }

    cancel(title: string): CancelResult {
        const id = jobIdFor(title);
        const found = this.removeJob(id);
        if (found) {
            this.log.info({ jobId: id }, 'Reminder cancelled');
        }
        return { found };
    }

    /**
     * Moves a pending job to the id of `newTitle`, keeping its fire time
     */
    rescheduleForRename(oldTitle: string, newTitle: string): RescheduleResult {
        const existing = this.jobs.get(jobIdFor(oldTitle));
        if (!existing) {
            return { moved: false };
        }
        const fireAt = existing.fireAt;
        this.removeJob(existing.id);
        return { moved: true, result: this.schedule(newTitle, fireAt) };
    }

    /**
     * Startup pass restoring one job per future persisted reminder.
     * Past or unparseable reminders are cleared in the store, without a catch-up notification.
     */
    rearmAll(store: ListStore, now: Date = this.now()): RearmSummary {
        const summary: RearmSummary = { armed: [], cleared: [] };

        for (const title of store.titlesWithReminder()) {
            const list = store.get(title);
            const fireAt = parseLocalDateTime(list?.reminder);

            if (fireAt && fireAt.getTime() > now.getTime()) {
                const result = this.schedule(title, fireAt);
                if (result.ok) {
                    summary.armed.push(title);
                    continue;
                }
                this.log.warn({ title, reason: result.reason }, 'Could not re-arm reminder, clearing it');
            } else {
                this.log.info({ title, reminder: list?.reminder }, 'Dropping missed or invalid reminder');
            }

            store.clearReminder(title);
            summary.cleared.push(title);
        }

        return summary;
    }

    getJob(title: string): ReminderJob | undefined {
        const job = this.jobs.get(jobIdFor(title));
        return job ? toPublicJob(job) : undefined;
    }

    listJobs(): ReminderJob[] {
        return Array.from(this.jobs.values(), toPublicJob);
    }

    private addJob(job: PendingJob): AddOutcome {
        if (this.jobs.has(job.id)) {
            return 'already-exists';
        }
        this.jobs.set(job.id, job);
        this.armTimer(job);
        return 'added';
    }

    private removeJob(id: JobId): boolean {
        const job = this.jobs.get(id);
        if (!job) {
            return false;
        }
        this.clearTimer(job);
        this.jobs.delete(id);
        return true;
    }

    private armTimer(job: PendingJob): void {
        const remaining = job.fireAt.getTime() - this.now().getTime();
        const delay = Math.min(Math.max(remaining, 0), MAX_TIMER_DELAY_MS);

        job.timer = setTimeout(() => {
            job.timer = null;
            // Delays past the setTimeout limit are reached in several hops
            if (job.fireAt.getTime() > this.now().getTime()) {
                this.armTimer(job);
                return;
            }
            this.fire(job);
        }, delay);
    }

    private clearTimer(job: PendingJob): void {
        if (job.timer) {
            clearTimeout(job.timer);
            job.timer = null;
        }
    }

    private fire(job: PendingJob): void {
        // A replaced job may share the id; only the registered one fires
        if (this.jobs.get(job.id) !== job) {
            return;
        }
        this.jobs.delete(job.id);

        const handler = this.onFire;
        if (!handler) {
            return;
        }

        this.log.info({ jobId: job.id, title: job.title }, 'Reminder fired');
        try {
            handler({ jobId: job.id, title: job.title, fireAt: new Date(job.fireAt.getTime()) });
        } catch (error) {
            this.log.error({ jobId: job.id, err: error }, 'Fire handler threw');
        }
    }
}
