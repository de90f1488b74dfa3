/**
 * Constants used across the application
 */

/**
 * Prefix of every reminder job identifier
 * Format: reminder__<title with whitespace replaced>
 */
export const JOB_ID_PREFIX = 'reminder__';

/**
 * Any single whitespace character in a list title; each one becomes JOB_ID_FILLER
 */
export const TITLE_WHITESPACE_PATTERN = /\s/g;
export const JOB_ID_FILLER = '_';

/**
 * Persisted reminder format: local wall-clock time without offset
 * Captures: (year)(month)(day)(hour)(minute)(second?)(fraction?)
 */
export const LOCAL_DATETIME_PATTERN = /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2})(?::(\d{2})(?:\.(\d{1,6}))?)?$/;

/**
 * Number of tasks listed in a reminder notification
 */
export const NOTIFICATION_PREVIEW_LIMIT = 10;

/**
 * Marker prepended to every task when a list is marked done
 */
export const DONE_MARKER = '✔ ';

/**
 * Reminder indicator texts
 */
export const NO_REMINDER_LABEL = 'No reminder set';
export const INVALID_REMINDER_LABEL = 'Reminder: (invalid)';

/**
 * Largest delay setTimeout accepts (~24.8 days); longer waits are chained
 */
export const MAX_TIMER_DELAY_MS = 2_147_483_647;

/**
 * Default limits, overridable through config
 */
export const DEFAULT_DATA_FILE_NAME = 'todo_data.json';
export const DEFAULT_MAX_TITLE_LENGTH = 100;
export const DEFAULT_MAX_TASK_LENGTH = 500;
