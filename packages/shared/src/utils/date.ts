import { format, isValid, parse } from 'date-fns';
import { MONTH_NAMES } from '../constants';

const CALENDAR_DAY_PATTERN = /^\d{4}-\d{2}-\d{2}( \d{2}:\d{2}:\d{2})?$/;

// Date -> "2026-02-19"
export function formatDate(date: Date): string {
  return format(date, 'yyyy-MM-dd');
}

// Date -> "14:30"
export function formatTime(date: Date): string {
  return format(date, 'HH:mm');
}

export interface CalendarDay {
  date: string;
  year: number;
  month: number;
}

// Accepts YYYY-MM-DD (and the "YYYY-MM-DD HH:mm:ss" form spreadsheets write back).
export function parseCalendarDay(value: string): CalendarDay | null {
  const trimmed = value.trim();
  if (!CALENDAR_DAY_PATTERN.test(trimmed)) {
    return null;
  }

  const day = trimmed.slice(0, 10);
  const parsed = parse(day, 'yyyy-MM-dd', new Date());
  if (!isValid(parsed)) {
    return null;
  }

  return {
    date: day,
    year: parsed.getFullYear(),
    month: parsed.getMonth() + 1,
  };
}

export function monthName(month: number): string {
  return MONTH_NAMES[month - 1] ?? String(month);
}
