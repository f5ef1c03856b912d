import dayjs from 'dayjs';
import { ConfigError } from '../types/errors.js';
import type { DateWindow } from '../types/index.js';

const DAY_FORMAT = 'YYYY-MM-DD';

// Parse a strict YYYY-MM-DD string; returns null for anything else
export function parseDay(input: string): dayjs.Dayjs | null {
  const m = input.trim().match(/^(\d{4})-(\d{2})-(\d{2})$/);
  if (!m) return null;
  const d = dayjs(`${m[1]}-${m[2]}-${m[3]}`);
  // dayjs rolls 2024-02-31 over into March; reject that
  if (!d.isValid() || d.format(DAY_FORMAT) !== `${m[1]}-${m[2]}-${m[3]}`) return null;
  return d;
}

// Trailing window of `days` calendar days ending on `endDate` (default: yesterday).
export function lookbackWindow(days: number, endDate?: string, now: Date = new Date()): DateWindow {
  let end: dayjs.Dayjs;
  if (endDate) {
    const parsed = parseDay(endDate);
    if (!parsed) throw new ConfigError(`Invalid date "${endDate}"; expected YYYY-MM-DD.`);
    end = parsed;
  } else {
    end = dayjs(now).subtract(1, 'day').startOf('day');
  }
  const span = Math.max(1, Math.floor(days));
  const start = end.subtract(span - 1, 'day');
  return { start: start.format(DAY_FORMAT), end: end.format(DAY_FORMAT) };
}

export function daysInWindow(window: DateWindow): string[] {
  const start = parseDay(window.start);
  const end = parseDay(window.end);
  if (!start || !end) return [];
  const out: string[] = [];
  for (let d = start; !d.isAfter(end, 'day'); d = d.add(1, 'day')) {
    out.push(d.format(DAY_FORMAT));
  }
  return out;
}

// "2026-10-19 06:00 UTC"
export function formatUtcStamp(date: Date = new Date()): string {
  return `${date.toISOString().slice(0, 16).replace('T', ' ')} UTC`;
}
