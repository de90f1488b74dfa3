import {
    NotificationPayload,
    OperationResult,
    RearmSummary,
    ReminderFired,
    ScheduleFailureReason,
    TaskList,
} from './types';
import { INVALID_REMINDER_LABEL, NO_REMINDER_LABEL, NOTIFICATION_PREVIEW_LIMIT } from './constants';
import { ListStore } from './list-store';
import { readStoreFile, writeStoreFile } from './store-file';
import { ReminderScheduler } from './reminder-scheduler';
import {
    DesktopNotificationSink,
    LogNotificationSink,
    NotificationSink,
    buildReminderNotification,
    deliverSafely,
} from './notifier';
import { Mutex } from './lock';
import { formatLocalDateTime, formatShortDateTime, parseLocalDateTime } from './local-datetime';
import {
    validateListTitle,
    validateReminderTime,
    validateTaskIndex,
    validateTaskText,
} from './validation';
import { logError, serviceLogger } from './logger';
import { AppConfig, getConfig } from './config';

/**
 * What the service needs from the window: which list is on screen, and a way
 * to refresh its reminder indicator.
 */
export interface ListView {
    displayedTitle(): string | null;
    showReminderLabel(label: string): void;
}

export interface TodoServiceOptions {
    dataFile: string;
    fileEncoding?: BufferEncoding;
    scheduler: ReminderScheduler;
    sink: NotificationSink;
    view?: ListView;
    now?: () => Date;
    maxTitleLength?: number;
    maxTaskLength?: number;
    notificationPreviewLimit?: number;
}

/**
 * A fired reminder waiting for the lock. Its title follows renames made meanwhile.
 */
interface QueuedFire {
    title: string;
    readonly jobId: string;
    readonly fireAt: Date;
}

const ok = <T>(value: T): OperationResult<T> => ({ ok: true, value });
const fail = <T = never>(error: string): OperationResult<T> => ({ ok: false, error });

const SCHEDULE_ERRORS: Record<ScheduleFailureReason, string> = {
    'past': 'Please select a future date/time.',
    'invalid-date': 'Invalid date',
    'not-running': 'Reminders are not running',
    'conflict': 'Could not register the reminder, please try again',
};

/**
 * Controller-facing API over the list store and the reminder scheduler.
 *
 * Every operation touching both runs inside one mutex, and so does the
 * consumer of fired reminders: a fire can never interleave with a rename,
 * delete or reschedule of the same list. Notifications are sent after the
 * lock is released.
 */
export class TodoService {
    private readonly store = new ListStore();
    private readonly mutex = new Mutex();
    private readonly scheduler: ReminderScheduler;
    private readonly sink: NotificationSink;
    private readonly view?: ListView;
    private readonly now: () => Date;
    private readonly deliveries = new Set<Promise<void>>();
    private readonly queuedFires = new Set<QueuedFire>();
    private started = false;

    constructor(private readonly options: TodoServiceOptions) {
        this.scheduler = options.scheduler;
        this.sink = options.sink;
        this.view = options.view;
        this.now = options.now ?? (() => new Date());
    }

    // ---------------------------------------------------------------------
    // Lifecycle
    // ---------------------------------------------------------------------

    /**
     * Starts the scheduler, loads the data file and re-arms pending reminders.
     * Operations issued meanwhile queue behind it.
     */
    async start(): Promise<OperationResult<RearmSummary>> {
        if (this.started) {
            return fail('Already started');
        }
        this.started = true;
        this.scheduler.start((message) => this.enqueueFired(message));
        return this.load();
    }

    /**
     * Cancels every pending timer once in-flight operations have finished
     */
    async stop(): Promise<void> {
        await this.mutex.runExclusive(() => {
            this.scheduler.stop();
            this.started = false;
        });
        await this.whenIdle();
    }

    /**
     * Resolves once queued operations and notification deliveries have settled
     */
    async whenIdle(): Promise<void> {
        await this.mutex.runExclusive(() => undefined);
        await Promise.all(Array.from(this.deliveries));
    }

    // ---------------------------------------------------------------------
    // Persistence
    // ---------------------------------------------------------------------

    /**
     * Replaces the in-memory lists with the data file and rebuilds the jobs from it.
     * A missing file is an empty store. An unreadable one leaves the store empty
     * and is reported as a failure; the file itself is not touched.
     */
    load(): Promise<OperationResult<RearmSummary>> {
        return this.mutex.runExclusive(async () => {
            this.scheduler.listJobs().forEach((job) => this.scheduler.cancel(job.title));
            try {
                this.store.replaceAll(await readStoreFile(this.options.dataFile, this.options.fileEncoding));
            } catch (error) {
                const message = error instanceof Error ? error.message : String(error);
                serviceLogger.warn({ dataFile: this.options.dataFile, error: message }, 'Load failed, starting empty');
                this.store.replaceAll({});
                return fail(message);
            }

            const summary = this.scheduler.rearmAll(this.store, this.now());
            serviceLogger.info(
                { lists: this.store.size, armed: summary.armed.length, cleared: summary.cleared.length },
                'Lists loaded'
            );

            if (summary.cleared.length > 0) {
                await this.persist('rearm');
            }

            return ok(summary);
        });
    }

    /**
     * Writes the whole mapping. On failure the in-memory state is left as it is.
     */
    save(): Promise<OperationResult> {
        return this.mutex.runExclusive(async () => {
            const error = await this.persist('save');
            return error ? fail(error) : ok(undefined);
        });
    }

    // ---------------------------------------------------------------------
    // Lists and tasks
    // ---------------------------------------------------------------------

    listTitles(): string[] {
        return this.store.titles();
    }

    getList(title: string): TaskList | undefined {
        return this.store.get(title);
    }

    createList(title: string): Promise<OperationResult<string>> {
        return this.mutex.runExclusive(() => {
            const validation = validateListTitle(title, this.store.titles(), this.options.maxTitleLength);
            if (!validation.valid) {
                return fail(validation.error ?? 'Invalid title');
            }
            const trimmed = title.trim();
            this.store.create(trimmed);
            serviceLogger.debug({ title: trimmed }, 'List created');
            return ok(trimmed);
        });
    }

    deleteList(title: string): Promise<OperationResult> {
        return this.mutex.runExclusive(() => {
            if (!this.store.has(title)) {
                return fail('List not found');
            }
            this.scheduler.cancel(title);
            this.store.delete(title);
            this.refreshView(title);
            serviceLogger.debug({ title }, 'List deleted');
            return ok(undefined);
        });
    }

    /**
     * Renames a list; a pending reminder follows it under the new title with the same fire time
     */
    renameList(oldTitle: string, newTitle: string): Promise<OperationResult<string>> {
        return this.mutex.runExclusive(() => {
            if (!this.store.has(oldTitle)) {
                return fail('List not found');
            }
            const trimmed = typeof newTitle === 'string' ? newTitle.trim() : '';
            if (trimmed === oldTitle) {
                return ok(oldTitle);
            }
            const validation = validateListTitle(
                newTitle,
                this.store.titles(),
                this.options.maxTitleLength,
                oldTitle
            );
            if (!validation.valid) {
                return fail(validation.error ?? 'Invalid title');
            }

            this.store.rename(oldTitle, trimmed);
            const retargeted = this.retargetQueuedFires(oldTitle, trimmed);
            const reminder = this.store.get(trimmed)?.reminder ?? '';
            if (reminder && !retargeted) {
                this.moveReminder(oldTitle, trimmed, reminder);
            }
            serviceLogger.debug({ oldTitle, newTitle: trimmed }, 'List renamed');
            return ok(trimmed);
        });
    }

    /**
     * @returns the position of the new task
     */
    addTask(title: string, text: string): Promise<OperationResult<number>> {
        return this.mutex.runExclusive(() => {
            const list = this.store.get(title);
            if (!list) {
                return fail('Please select a list first.');
            }
            const validation = validateTaskText(text, this.options.maxTaskLength);
            if (!validation.valid) {
                return fail(validation.error ?? 'Invalid task');
            }
            this.store.addTask(title, text.trim());
            return ok(list.tasks.length);
        });
    }

    /**
     * @returns the removed task text
     */
    removeTask(title: string, index: number): Promise<OperationResult<string>> {
        return this.mutex.runExclusive(() => {
            const list = this.store.get(title);
            if (!list) {
                return fail('Please select a list first.');
            }
            const validation = validateTaskIndex(index, list.tasks.length);
            if (!validation.valid) {
                return fail(validation.error ?? 'Invalid position');
            }
            const removed = this.store.removeTask(title, index);
            return removed === undefined ? fail('No task at that position') : ok(removed);
        });
    }

    /**
     * Prefixes every task with the done marker and drops the list's reminder
     */
    markDone(title: string): Promise<OperationResult> {
        return this.mutex.runExclusive(() => {
            if (!this.store.has(title)) {
                return fail('List not found');
            }
            this.scheduler.cancel(title);
            this.store.markDone(title);
            this.refreshView(title);
            return ok(undefined);
        });
    }

    // ---------------------------------------------------------------------
    // Reminders
    // ---------------------------------------------------------------------

    /**
     * Schedules the list's reminder. The persisted timestamp is only written
     * once the scheduler accepted the job.
     * @returns the indicator label, e.g. "Reminder: 2030-01-05 09:30"
     */
    setReminder(title: string, at: Date): Promise<OperationResult<string>> {
        return this.mutex.runExclusive(() => {
            if (!this.store.has(title)) {
                return fail('Select a list to schedule a reminder.');
            }
            const validation = validateReminderTime(at, this.now());
            if (!validation.valid) {
                return fail(validation.error ?? 'Invalid date');
            }

            const result = this.scheduler.schedule(title, at);
            if (!result.ok) {
                return fail(SCHEDULE_ERRORS[result.reason]);
            }

            this.store.setReminder(title, formatLocalDateTime(result.job.fireAt));
            return ok(this.reminderLabel(title));
        });
    }

    clearReminder(title: string): Promise<OperationResult> {
        return this.mutex.runExclusive(() => {
            const list = this.store.get(title);
            if (!list) {
                return fail('List not found');
            }
            if (!list.reminder) {
                return fail('This list has no reminder.');
            }
            this.scheduler.cancel(title);
            this.store.clearReminder(title);
            this.refreshView(title);
            return ok(undefined);
        });
    }

    /**
     * Text for the reminder indicator of a list
     */
    reminderLabel(title: string): string {
        const reminder = this.store.get(title)?.reminder;
        if (!reminder) {
            return NO_REMINDER_LABEL;
        }
        const at = parseLocalDateTime(reminder);
        return at ? `Reminder: ${formatShortDateTime(at)}` : INVALID_REMINDER_LABEL;
    }

    // ---------------------------------------------------------------------
    // Internals
    // ---------------------------------------------------------------------

    private moveReminder(oldTitle: string, newTitle: string, reminder: string): void {
        const moved = this.scheduler.rescheduleForRename(oldTitle, newTitle);
        if (moved.moved && moved.result.ok) {
            return;
        }

        // No job and no queued fire under the old title: the reminder was never armed
        const at = parseLocalDateTime(reminder);
        if (!moved.moved && at && this.scheduler.schedule(newTitle, at).ok) {
            return;
        }
        serviceLogger.info({ title: newTitle, reminder }, 'Reminder could not follow rename, clearing it');
        this.store.clearReminder(newTitle);
    }

    /**
     * @returns whether a fire for `oldTitle` was waiting for the lock
     */
    private retargetQueuedFires(oldTitle: string, newTitle: string): boolean {
        let found = false;
        this.queuedFires.forEach((queued) => {
            if (queued.title === oldTitle) {
                queued.title = newTitle;
                found = true;
            }
        });
        return found;
    }

    private enqueueFired(message: ReminderFired): void {
        const queued: QueuedFire = { title: message.title, jobId: message.jobId, fireAt: message.fireAt };
        this.queuedFires.add(queued);
        const delivery = this.mutex
            .runExclusive(() => {
                this.queuedFires.delete(queued);
                return this.applyFired(queued);
            })
            .then(async (payload) => {
                if (payload) {
                    await deliverSafely(this.sink, payload);
                }
            })
            .catch((error: unknown) => {
                logError(error, { operation: 'reminder-fired', title: message.title }, serviceLogger);
            })
            .finally(() => {
                this.deliveries.delete(delivery);
            });
        this.deliveries.add(delivery);
    }

    /**
     * Single consumer of fired reminders, run under the lock
     * @returns the notification to send, or null when the fire is stale
     */
    private async applyFired(message: QueuedFire): Promise<NotificationPayload | null> {
        const list = this.store.get(message.title);
        const current = parseLocalDateTime(list?.reminder);

        // Cleared, rescheduled or deleted after the timer went off
        if (!list || !current || current.getTime() !== message.fireAt.getTime()) {
            serviceLogger.debug({ jobId: message.jobId }, 'Discarding stale reminder fire');
            return null;
        }

        this.store.clearReminder(message.title);
        await this.persist('reminder-fired');
        this.refreshView(message.title);

        return buildReminderNotification(
            message.title,
            list.tasks,
            this.options.notificationPreviewLimit ?? NOTIFICATION_PREVIEW_LIMIT
        );
    }

    private refreshView(title: string): void {
        if (this.view && this.view.displayedTitle() === title) {
            this.view.showReminderLabel(this.reminderLabel(title));
        }
    }

    /**
     * @returns an error message, or null on success
     */
    private async persist(operation: string): Promise<string | null> {
        try {
            await writeStoreFile(this.options.dataFile, this.store.toJSON(), this.options.fileEncoding);
            return null;
        } catch (error) {
            logError(error, { operation, filePath: this.options.dataFile }, serviceLogger);
            return error instanceof Error ? error.message : String(error);
        }
    }
}

/**
 * Wires a service from the environment configuration
 */
export function createTodoService(config: AppConfig = getConfig(), view?: ListView): TodoService {
    return new TodoService({
        dataFile: config.dataFile,
        fileEncoding: config.fileEncoding,
        scheduler: new ReminderScheduler(),
        sink: config.notificationsEnabled ? new DesktopNotificationSink() : new LogNotificationSink(),
        view,
        maxTitleLength: config.maxTitleLength,
        maxTaskLength: config.maxTaskLength,
        notificationPreviewLimit: config.notificationPreviewLimit,
    });
}
