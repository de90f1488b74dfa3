import notifier from 'node-notifier';
import { NotificationPayload } from './types';
import { NOTIFICATION_PREVIEW_LIMIT } from './constants';
import { notifyLogger } from './logger';

/**
 * Fire-and-forget notification target. Callers never inspect the outcome
 * beyond catching failures (see deliverSafely).
 */
export interface NotificationSink {
    notify(payload: NotificationPayload): void | Promise<void>;
}

/**
 * Builds the reminder notification for a list from its current tasks
 */
export function buildReminderNotification(
    listTitle: string,
    tasks: readonly string[],
    previewLimit: number = NOTIFICATION_PREVIEW_LIMIT
): NotificationPayload {
    const lines = tasks.slice(0, previewLimit).map((task) => `- ${task}`);
    return {
        title: `Reminder — ${listTitle}`,
        message: `You scheduled a reminder for '${listTitle}'.\nTasks:\n${lines.join('\n')}`,
    };
}

/**
 * The part of node-notifier the desktop sink relies on
 */
export interface NotifierClient {
    notify(
        notification: { title: string; message: string; wait?: boolean },
        callback: (err: Error | null) => void
    ): unknown;
}

/**
 * Shows a system notification through node-notifier
 */
export class DesktopNotificationSink implements NotificationSink {
    constructor(private readonly client: NotifierClient = notifier) {}

    notify(payload: NotificationPayload): Promise<void> {
        return new Promise((resolve, reject) => {
            this.client.notify({ title: payload.title, message: payload.message, wait: false }, (err) => {
                if (err) {
                    reject(err);
                    return;
                }
                resolve();
            });
        });
    }
}

/**
 * Used when notifications are switched off: the reminder only reaches the log
 */
export class LogNotificationSink implements NotificationSink {
    notify(payload: NotificationPayload): void {
        notifyLogger.info({ title: payload.title }, payload.message);
    }
}

/**
 * Delivers a notification, swallowing every failure (permission denied, no
 * notification daemon, ...). Reminders are one-shot, so nothing is retried.
 * @returns whether the sink reported success
 */
export async function deliverSafely(sink: NotificationSink, payload: NotificationPayload): Promise<boolean> {
    try {
        await sink.notify(payload);
        return true;
    } catch (error) {
        notifyLogger.warn(
            { title: payload.title, error: error instanceof Error ? error.message : String(error) },
            'Notification delivery failed'
        );
        return false;
    }
}
