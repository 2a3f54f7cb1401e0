/**
 * Reads the scheduled day of a task from what people type on the command line:
 * today, tomorrow, yesterday, +3d/+2w/+1m, a weekday (next occurrence, never
 * today), a month and day (jan15, rolling into next year once past) or
 * yyyy-MM-dd. Results are local calendar days in yyyy-MM-dd.
 *
 * Deadlines are instants rather than days: see parseDeadline.
 */

import { isCalendarDate, normalizeTimestamp } from '../validation/task-input.js';

/** Resolves one input form against local midnight of "today" */
type DayResolver = (input: string, today: Date) => Date | null;

const KEYWORD_OFFSETS: Record<string, number> = { today: 0, tomorrow: 1, yesterday: -1 };
const WEEKDAYS = ['sunday', 'monday', 'tuesday', 'wednesday', 'thursday', 'friday', 'saturday'];
const MONTHS = ['jan', 'feb', 'mar', 'apr', 'may', 'jun', 'jul', 'aug', 'sep', 'oct', 'nov', 'dec'];

const OFFSET_RE = /^\+(\d+)([dwm])$/;
const MONTH_DAY_RE = /^([a-z]{3})(\d{1,2})$/;

const two = (n: number) => String(n).padStart(2, '0');

/** Local calendar day of `d` as yyyy-MM-dd */
export function formatDate(d: Date): string {
  return [String(d.getFullYear()), two(d.getMonth() + 1), two(d.getDate())].join('-');
}

/** `d` moved by `n` calendar days; `d` itself is untouched */
export function addDays(d: Date, n: number): Date {
  return new Date(d.getFullYear(), d.getMonth(), d.getDate() + n,
    d.getHours(), d.getMinutes(), d.getSeconds(), d.getMilliseconds());
}

const byKeyword: DayResolver = (input, today) => {
  const offset = KEYWORD_OFFSETS[input];
  return offset === undefined ? null : addDays(today, offset);
};

const byOffset: DayResolver = (input, today) => {
  const m = OFFSET_RE.exec(input);
  if (!m) return null;

  const amount = Number(m[1]);
  if (m[2] === 'm') return new Date(today.getFullYear(), today.getMonth() + amount, today.getDate());
  return addDays(today, m[2] === 'w' ? amount * 7 : amount);
};

const byWeekday: DayResolver = (input, today) => {
  // Full names and their three-letter forms (mon, tue, ...)
  const target = WEEKDAYS.findIndex(name => name === input || name.slice(0, 3) === input);
  if (target < 0) return null;
  return addDays(today, ((target - today.getDay() + 6) % 7) + 1);
};

const byMonthDay: DayResolver = (input, today) => {
  const m = MONTH_DAY_RE.exec(input);
  if (!m) return null;

  const month = MONTHS.indexOf(m[1] ?? '');
  if (month < 0) return null;

  const day = Number(m[2]);
  for (const year of [today.getFullYear(), today.getFullYear() + 1]) {
    const candidate = new Date(year, month, day);
    // feb30 and friends overflow into the next month
    if (candidate.getMonth() !== month) return null;
    if (candidate >= today) return candidate;
  }
  return null;
};

const byIsoDate: DayResolver = (input) => {
  if (!isCalendarDate(input)) return null;
  const [y, m, d] = input.split('-').map(Number);
  return new Date(y ?? 0, (m ?? 1) - 1, d ?? 1);
};

const RESOLVERS: readonly DayResolver[] = [byKeyword, byOffset, byWeekday, byMonthDay, byIsoDate];

/**
 * Parse a human-friendly day into yyyy-MM-dd, or null if no form matches.
 * `now` (default: the current time) stands in for today and is not modified.
 */
export function parseDate(input: string | null | undefined, now?: Date): string | null {
  const normalized = input?.trim().toLowerCase();
  if (!normalized) return null;

  const base = now ?? new Date();
  const today = new Date(base.getFullYear(), base.getMonth(), base.getDate());

  for (const resolve of RESOLVERS) {
    const day = resolve(normalized, today);
    if (day) return formatDate(day);
  }
  return null;
}

const RELATIVE_INSTANT_RE = /^\+(\d+)([mhdw])$/;

const UNIT_MS: Record<string, number> = {
  m: 60_000,
  h: 3_600_000,
  d: 86_400_000,
  w: 604_800_000,
};

/**
 * Parse a deadline into a canonical UTC timestamp.
 * Accepts relative offsets from `now` (+30m, +2h, +3d, +1w), ISO timestamps
 * (no zone means UTC) and, as a last resort, any day parseDate understands,
 * which is taken as midnight UTC of that day. Returns null if unparseable.
 */
export function parseDeadline(input: string | null | undefined, now?: Date): string | null {
  if (!input?.trim()) return null;

  const trimmed = input.trim();
  const base = now ?? new Date();

  const m = RELATIVE_INSTANT_RE.exec(trimmed.toLowerCase());
  if (m) {
    const amount = parseInt(m[1]!, 10);
    return new Date(base.getTime() + amount * UNIT_MS[m[2]!]!).toISOString();
  }

  const iso = normalizeTimestamp(trimmed);
  if (iso !== null && /^\d{4}-\d{2}-\d{2}/.test(trimmed)) return iso;

  const day = parseDate(trimmed, base);
  return day ? normalizeTimestamp(day) : null;
}
