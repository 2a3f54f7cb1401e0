import { describe, it, expect } from 'vitest';
import { parseDate, parseDeadline, formatDate, addDays } from '../../src/parsers/date-parser.js';

// Saturday, 10 January 2026, mid-afternoon local time
const now = new Date(2026, 0, 10, 15, 30);

describe('parseDate', () => {
  it('parses keywords', () => {
    expect(parseDate('today', now)).toBe('2026-01-10');
    expect(parseDate('Tomorrow', now)).toBe('2026-01-11');
    expect(parseDate('yesterday', now)).toBe('2026-01-09');
  });

  it('parses relative offsets', () => {
    expect(parseDate('+3d', now)).toBe('2026-01-13');
    expect(parseDate('+2w', now)).toBe('2026-01-24');
    expect(parseDate('+1m', now)).toBe('2026-02-10');
  });

  it('parses day names as the next such day', () => {
    expect(parseDate('monday', now)).toBe('2026-01-12');
    expect(parseDate('sat', now)).toBe('2026-01-17');
    expect(parseDate('Saturday', now)).toBe('2026-01-17');
  });

  it('parses month and day, rolling past dates into next year', () => {
    expect(parseDate('feb14', now)).toBe('2026-02-14');
    expect(parseDate('jan5', now)).toBe('2027-01-05');
    expect(parseDate('jan10', now)).toBe('2026-01-10');
    expect(parseDate('foo10', now)).toBeNull();
    expect(parseDate('feb30', now)).toBeNull();
  });

  it('accepts ISO dates and rejects impossible ones', () => {
    expect(parseDate('2026-03-01', now)).toBe('2026-03-01');
    expect(parseDate('2026-02-30', now)).toBeNull();
    expect(parseDate('someday', now)).toBeNull();
    expect(parseDate('', now)).toBeNull();
  });

  it('does not modify the reference date', () => {
    parseDate('today', now);
    expect(now.getHours()).toBe(15);
  });
});

describe('parseDeadline', () => {
  const instant = new Date('2030-01-01T00:00:00.000Z');

  it('adds relative offsets to the current instant', () => {
    expect(parseDeadline('+30m', instant)).toBe('2030-01-01T00:30:00.000Z');
    expect(parseDeadline('+2h', instant)).toBe('2030-01-01T02:00:00.000Z');
    expect(parseDeadline('+3d', instant)).toBe('2030-01-04T00:00:00.000Z');
    expect(parseDeadline('+1w', instant)).toBe('2030-01-08T00:00:00.000Z');
  });

  it('normalises ISO timestamps to UTC', () => {
    expect(parseDeadline('2030-06-01T12:00:00', instant)).toBe('2030-06-01T12:00:00.000Z');
    expect(parseDeadline('2030-06-01T12:00:00-03:00', instant)).toBe('2030-06-01T15:00:00.000Z');
    expect(parseDeadline('2030-06-01', instant)).toBe('2030-06-01T00:00:00.000Z');
  });

  it('returns null for unreadable input', () => {
    expect(parseDeadline('whenever', instant)).toBeNull();
    expect(parseDeadline(undefined, instant)).toBeNull();
  });
});

describe('formatDate / addDays', () => {
  it('formats local dates and crosses month ends', () => {
    expect(formatDate(addDays(new Date(2026, 0, 31), 1))).toBe('2026-02-01');
  });
});
