/**
 * Input validation for user-triggered operations
 * Every validator reports instead of throwing; no state is touched here.
 */

import { ValidationResult } from './types';
import { DEFAULT_MAX_TASK_LENGTH, DEFAULT_MAX_TITLE_LENGTH } from './constants';
import { titlesCollide } from './job-id';

/**
 * Helper: Validates basic string requirements (type, length)
 * @returns Validation result with the trimmed text on success
 */
function validateBasicStringRequirements(
    text: string,
    fieldName: string,
    maxLength: number
): ValidationResult & { trimmed?: string } {
    if (!text || typeof text !== 'string') {
        return { valid: false, error: `${fieldName} is required` };
    }

    const trimmed = text.trim();
    if (trimmed.length === 0) {
        return { valid: false, error: `${fieldName} cannot be empty` };
    }

    if (trimmed.length > maxLength) {
        return {
            valid: false,
            error: `${fieldName} is too long (max ${maxLength} characters)`,
        };
    }

    return { valid: true, trimmed };
}

/**
 * Validates a new or renamed list title against the current titles.
 * Titles that differ only in whitespace would share a reminder job, so they are rejected.
 * @param ignoreTitle - the list being renamed, excluded from the checks
 */
export function validateListTitle(
    title: string,
    existingTitles: readonly string[],
    maxLength: number = DEFAULT_MAX_TITLE_LENGTH,
    ignoreTitle?: string
): ValidationResult {
    const basic = validateBasicStringRequirements(title, 'List title', maxLength);
    if (!basic.valid || basic.trimmed === undefined) {
        return { valid: basic.valid, error: basic.error };
    }
    const trimmed = basic.trimmed;

    const others = existingTitles.filter((existing) => existing !== ignoreTitle);
    if (others.includes(trimmed)) {
        return { valid: false, error: 'A list with that title already exists.' };
    }

    const clash = others.find((existing) => titlesCollide(existing, trimmed));
    if (clash !== undefined) {
        return {
            valid: false,
            error: `List title is too similar to "${clash}" (they differ only in whitespace)`,
        };
    }

    return { valid: true };
}

/**
 * Validates task text
 */
export function validateTaskText(text: string, maxLength: number = DEFAULT_MAX_TASK_LENGTH): ValidationResult {
    const basic = validateBasicStringRequirements(text, 'Task', maxLength);
    return { valid: basic.valid, error: basic.error };
}

/**
 * Validates a task position within a list of `length` tasks
 */
export function validateTaskIndex(index: number, length: number): ValidationResult {
    if (!Number.isInteger(index) || index < 0 || index >= length) {
        return { valid: false, error: 'No task at that position' };
    }
    return { valid: true };
}

/**
 * Reminders must be strictly in the future
 */
export function validateReminderTime(at: Date, now: Date): ValidationResult {
    if (isNaN(at.getTime())) {
        return { valid: false, error: 'Invalid date' };
    }

    if (at.getTime() <= now.getTime()) {
        return { valid: false, error: 'Please select a future date/time.' };
    }

    return { valid: true };
}
