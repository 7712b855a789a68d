import { describe, expect, it } from 'vitest';
import { monthName, parseCalendarDay } from './date';
import { addAmounts, formatAmount } from './money';

describe('parseCalendarDay', () => {
  it('derives year and month', () => {
    expect(parseCalendarDay('2024-02-29')).toEqual({ date: '2024-02-29', year: 2024, month: 2 });
  });

  it('accepts the timestamp form spreadsheets write back', () => {
    expect(parseCalendarDay('2024-03-05 00:00:00')).toEqual({ date: '2024-03-05', year: 2024, month: 3 });
  });

  it('rejects other formats and impossible days', () => {
    expect(parseCalendarDay('05/03/2024')).toBeNull();
    expect(parseCalendarDay('2023-02-29')).toBeNull();
    expect(parseCalendarDay('')).toBeNull();
  });

  it('rejects trailing text after the day', () => {
    expect(parseCalendarDay('2024-03-05garbage')).toBeNull();
    expect(parseCalendarDay('2024-03-05T00:00:00')).toBeNull();
    expect(parseCalendarDay('2024-03-05 00:00')).toBeNull();
  });

  it('names months', () => {
    expect(monthName(1)).toBe('January');
    expect(monthName(13)).toBe('13');
  });
});

describe('money', () => {
  it('formats with grouping and two decimals', () => {
    expect(formatAmount(1234.5)).toBe('1,234.50');
    expect(formatAmount(-30)).toBe('-30.00');
  });

  it('adds in cents', () => {
    expect(addAmounts(0.1, 0.2)).toBe(0.3);
  });
});
