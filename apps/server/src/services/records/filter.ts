import type { TransactionFilter, TransactionRecord } from '@charity-ledger/shared';

export function hasActiveFilter(filter: TransactionFilter): boolean {
  return Boolean(
    filter.type ||
      filter.year !== undefined ||
      filter.month !== undefined ||
      (filter.group && filter.group !== 'All') ||
      filter.category ||
      filter.name ||
      filter.search,
  );
}

function matchesSearch(record: TransactionRecord, search: string): boolean {
  const needle = search.toLowerCase();
  return [record.name, record.category, record.subCategory, record.medical, record.reason, record.address]
    .some((value) => value.toLowerCase().includes(needle));
}

export function filterRecords(records: TransactionRecord[], filter: TransactionFilter): TransactionRecord[] {
  return records.filter((record) => {
    if (filter.type && record.type !== filter.type) return false;
    if (filter.year !== undefined && record.year !== filter.year) return false;
    if (filter.month !== undefined && record.month !== filter.month) return false;
    if (filter.group && filter.group !== 'All' && record.group !== filter.group) return false;
    if (filter.category && record.category !== filter.category) return false;
    if (filter.name && record.name !== filter.name) return false;
    if (filter.search && !matchesSearch(record, filter.search)) return false;
    return true;
  });
}
