import { describe, expect, it } from 'vitest';
import { makeRecord } from '../../testing/fixtures';
import { filterRecords, hasActiveFilter } from './filter';

const records = [
  makeRecord({ id: 'a', date: '2024-01-10', name: 'Karim', group: 'Brother', category: 'Zakat' }),
  makeRecord({ id: 'b', date: '2024-02-03', name: 'Amina', group: 'Sister', category: 'Lillah' }),
  makeRecord({
    id: 'c',
    date: '2023-02-20',
    type: 'Outgoing',
    name: 'City Clinic',
    category: 'Zakat',
    reason: 'Heart surgery',
  }),
];

function ids(filtered: typeof records): string[] {
  return filtered.map((record) => record.id);
}

describe('filterRecords', () => {
  it('treats an empty filter and the All group as no filter', () => {
    expect(hasActiveFilter({})).toBe(false);
    expect(hasActiveFilter({ group: 'All' })).toBe(false);
    expect(hasActiveFilter({ month: 2 })).toBe(true);
  });

  it('combines criteria', () => {
    expect(ids(filterRecords(records, { month: 2 }))).toEqual(['b', 'c']);
    expect(ids(filterRecords(records, { month: 2, year: 2024 }))).toEqual(['b']);
    expect(ids(filterRecords(records, { type: 'Incoming', category: 'Zakat' }))).toEqual(['a']);
    expect(ids(filterRecords(records, { group: 'Sister' }))).toEqual(['b']);
  });

  it('searches free text case-insensitively', () => {
    expect(ids(filterRecords(records, { search: 'SURGERY' }))).toEqual(['c']);
  });
});
