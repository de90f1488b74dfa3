/**
 * Unit Tests for lib/local-datetime.ts
 * Testing: persisted reminder format parsing and formatting
 */

import { formatLocalDateTime, formatShortDateTime, parseLocalDateTime } from '@/lib/local-datetime';

describe('parseLocalDateTime', () => {
  it('should parse date and minutes as local time', () => {
    expect(parseLocalDateTime('2030-01-05T09:30')).toEqual(new Date(2030, 0, 5, 9, 30, 0, 0));
  });

  it('should parse seconds', () => {
    expect(parseLocalDateTime('2030-01-05T09:30:15')).toEqual(new Date(2030, 0, 5, 9, 30, 15, 0));
  });

  it('should parse fractional seconds down to milliseconds', () => {
    expect(parseLocalDateTime('2030-01-05T09:30:15.250')).toEqual(new Date(2030, 0, 5, 9, 30, 15, 250));
    expect(parseLocalDateTime('2030-01-05T09:30:15.123456')).toEqual(new Date(2030, 0, 5, 9, 30, 15, 123));
  });

  it('should return null for empty input', () => {
    expect(parseLocalDateTime('')).toBeNull();
    expect(parseLocalDateTime(null)).toBeNull();
    expect(parseLocalDateTime(undefined)).toBeNull();
  });

  it('should return null for malformed input', () => {
    expect(parseLocalDateTime('not a date')).toBeNull();
    expect(parseLocalDateTime('2030/01/05 09:30')).toBeNull();
  });

  it('should reject values with a UTC offset', () => {
    expect(parseLocalDateTime('2030-01-05T09:30:00Z')).toBeNull();
  });

  it('should reject out-of-range parts instead of rolling them over', () => {
    expect(parseLocalDateTime('2025-02-30T10:00')).toBeNull();
    expect(parseLocalDateTime('2030-01-05T24:00')).toBeNull();
  });
});

describe('formatLocalDateTime', () => {
  it('should format with seconds and no offset', () => {
    expect(formatLocalDateTime(new Date(2030, 0, 5, 9, 5, 0))).toBe('2030-01-05T09:05:00');
  });

  it('should add milliseconds only when set', () => {
    expect(formatLocalDateTime(new Date(2030, 11, 31, 23, 59, 59, 7))).toBe('2030-12-31T23:59:59.007');
  });

  it('should be read back by parseLocalDateTime', () => {
    const date = new Date(2031, 6, 14, 18, 45, 30, 500);
    expect(parseLocalDateTime(formatLocalDateTime(date))).toEqual(date);
  });
});

describe('formatShortDateTime', () => {
  it('should format date and minutes', () => {
    expect(formatShortDateTime(new Date(2030, 0, 5, 9, 5, 42))).toBe('2030-01-05 09:05');
  });
});
