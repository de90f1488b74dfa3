/**
 * One named to-do list. `reminder` is a local ISO date-time or '' when none is set.
 */
export interface TaskList {
    tasks: string[];
    reminder: string;
}

/**
 * Whole persisted mapping: title -> list
 */
export type StoreData = Record<string, TaskList>;

/** Scheduler namespace key derived from a list title, e.g. reminder__Weekly_plan */
export type JobId = string;

export interface ReminderJob {
    id: JobId;
    title: string;
    fireAt: Date;
}

/**
 * Message posted by the scheduler when a job's time arrives
 */
export interface ReminderFired {
    jobId: JobId;
    title: string;
    fireAt: Date;
}

export type ScheduleFailureReason = 'past' | 'invalid-date' | 'not-running' | 'conflict';

export type ScheduleResult =
    | { ok: true; job: ReminderJob; replaced: boolean }
    | { ok: false; reason: ScheduleFailureReason };

export interface CancelResult {
    found: boolean;
}

export type RescheduleResult =
    | { moved: false }
    | { moved: true; result: ScheduleResult };

export interface RearmSummary {
    armed: string[];
    cleared: string[];
}

export type OperationResult<T = void> =
    | { ok: true; value: T }
    | { ok: false; error: string };

export interface ValidationResult {
    valid: boolean;
    error?: string;
}

export interface NotificationPayload {
    title: string;
    message: string;
}
