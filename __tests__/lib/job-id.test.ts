/**
 * Unit Tests for lib/job-id.ts
 */

import { jobIdFor, normalizeTitle, titlesCollide } from '@/lib/job-id';

describe('jobIdFor', () => {
  it('should prefix the title and replace spaces with underscores', () => {
    expect(jobIdFor('Weekly plan')).toBe('reminder__Weekly_plan');
  });

  it('should replace every whitespace character, one filler each', () => {
    expect(jobIdFor('a\tb\nc  d')).toBe('reminder__a_b_c__d');
  });

  it('should keep titles without whitespace verbatim', () => {
    expect(jobIdFor('Groceries')).toBe('reminder__Groceries');
  });

  it('should be deterministic', () => {
    expect(jobIdFor('Pay rent')).toBe(jobIdFor('Pay rent'));
  });

  it('should never fail, even for an empty title', () => {
    expect(jobIdFor('')).toBe('reminder__');
  });
});

describe('normalizeTitle', () => {
  it('should leave non-whitespace punctuation alone', () => {
    expect(normalizeTitle('To-do: home')).toBe('To-do:_home');
  });
});

describe('titlesCollide', () => {
  it('should detect titles differing only in whitespace style', () => {
    expect(titlesCollide('My list', 'My\tlist')).toBe(true);
  });

  it('should not treat a title as colliding with itself', () => {
    expect(titlesCollide('My list', 'My list')).toBe(false);
  });

  it('should not flag unrelated titles', () => {
    expect(titlesCollide('Work', 'Home')).toBe(false);
  });
});
