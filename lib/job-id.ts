import { JobId } from './types';
import { JOB_ID_FILLER, JOB_ID_PREFIX, TITLE_WHITESPACE_PATTERN } from './constants';

/**
 * Normalizes a list title for use as a job key: every whitespace character becomes '_'
 */
export function normalizeTitle(title: string): string {
    return title.replace(TITLE_WHITESPACE_PATTERN, JOB_ID_FILLER);
}

/**
 * Derives the scheduler job id for a list title. Pure and total.
 * @example jobIdFor('Weekly plan') === 'reminder__Weekly_plan'
 */
export function jobIdFor(title: string): JobId {
    return `${JOB_ID_PREFIX}${normalizeTitle(title)}`;
}

/**
 * Two distinct titles collide when they map to the same job id ('a b' and 'a\tb')
 */
export function titlesCollide(a: string, b: string): boolean {
    return a !== b && jobIdFor(a) === jobIdFor(b);
}
