import { LOCAL_DATETIME_PATTERN } from './constants';

// Helpers for the persisted "YYYY-MM-DDTHH:mm:ss" local wall-clock format

const pad = (value: number, width = 2): string => String(value).padStart(width, '0');

/**
 * Parses a local ISO date-time (no offset). Returns null for anything
 * malformed or out of range, e.g. '2025-02-30T10:00'.
 */
export function parseLocalDateTime(value: string | null | undefined): Date | null {
    if (!value) return null;

    const match = LOCAL_DATETIME_PATTERN.exec(value.trim());
    if (!match) return null;

    const [, y, mo, d, h, mi, s = '0', fraction = ''] = match;
    const year = Number(y);
    const month = Number(mo);
    const day = Number(d);
    const hour = Number(h);
    const minute = Number(mi);
    const second = Number(s);
    const millis = fraction ? Math.floor(Number(fraction.padEnd(6, '0')) / 1000) : 0;

    const date = new Date(year, month - 1, day, hour, minute, second, millis);

    // Date silently rolls over out-of-range parts; reject those instead
    if (
        date.getFullYear() !== year ||
        date.getMonth() !== month - 1 ||
        date.getDate() !== day ||
        date.getHours() !== hour ||
        date.getMinutes() !== minute ||
        date.getSeconds() !== second
    ) {
        return null;
    }

    return date;
}

/**
 * Formats a Date as local "YYYY-MM-DDTHH:mm:ss", with ".mmm" only when milliseconds are set
 */
export function formatLocalDateTime(date: Date): string {
    const base =
        `${pad(date.getFullYear(), 4)}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}` +
        `T${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
    const millis = date.getMilliseconds();
    return millis === 0 ? base : `${base}.${pad(millis, 3)}`;
}

/**
 * Short form used by the reminder indicator: "YYYY-MM-DD HH:mm"
 */
export function formatShortDateTime(date: Date): string {
    return `${pad(date.getFullYear(), 4)}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
        `${pad(date.getHours())}:${pad(date.getMinutes())}`;
}
