import type {
  BreakdownEntry,
  FundBalance,
  GroupFilter,
  LedgerSummary,
  MemberTotal,
  MonthlyTotal,
  PivotRow,
  PivotTable,
  TransactionRecord,
  TransactionType,
} from '@charity-ledger/shared';
import { MONTH_NAMES, addAmounts } from '@charity-ledger/shared';

const MONTHS = MONTH_NAMES.map((label, index) => ({ month: index + 1, label }));

function inGroup(record: TransactionRecord, group: GroupFilter): boolean {
  return group === 'All' || record.group === group;
}

function sumAmounts(records: TransactionRecord[]): number {
  return records.reduce((sum, record) => addAmounts(sum, record.amount), 0);
}

// ── Funds ──

export function fundBalance(records: TransactionRecord[], category: string, group: GroupFilter = 'All'): number {
  let balance = 0;
  for (const record of records) {
    if (record.category !== category || !inGroup(record, group)) continue;
    balance = addAmounts(balance, record.type === 'Incoming' ? record.amount : -record.amount);
  }
  return balance;
}

// One entry per category present, in first-seen order.
export function fundBalances(records: TransactionRecord[], group: GroupFilter = 'All'): FundBalance[] {
  const table = new Map<string, FundBalance>();
  for (const record of records) {
    if (!record.category || !inGroup(record, group)) continue;
    const current = table.get(record.category) ?? {
      category: record.category,
      incoming: 0,
      outgoing: 0,
      balance: 0,
    };
    if (record.type === 'Incoming') {
      current.incoming = addAmounts(current.incoming, record.amount);
    } else {
      current.outgoing = addAmounts(current.outgoing, record.amount);
    }
    current.balance = addAmounts(current.incoming, -current.outgoing);
    table.set(record.category, current);
  }
  return [...table.values()];
}

export function ledgerSummary(records: TransactionRecord[]): LedgerSummary {
  const incoming = sumAmounts(records.filter((record) => record.type === 'Incoming'));
  const outgoing = sumAmounts(records.filter((record) => record.type === 'Outgoing'));
  return { incoming, outgoing, net: addAmounts(incoming, -outgoing), count: records.length };
}

// ── Time ──

// Always 12 rows; months without records are 0.
export function monthlyTotals(records: TransactionRecord[], type?: TransactionType): MonthlyTotal[] {
  const sums = new Map<number, number>();
  for (const record of records) {
    if (type && record.type !== type) continue;
    sums.set(record.month, addAmounts(sums.get(record.month) ?? 0, record.amount));
  }
  return MONTHS.map(({ month, label }) => ({ month, label, amount: sums.get(month) ?? 0 }));
}

export function yearsPresent(records: TransactionRecord[]): number[] {
  return [...new Set(records.map((record) => record.year).filter((year) => year > 0))].sort((a, b) => b - a);
}

// ── Members ──

// Array.prototype.sort is stable, so equal sums keep first-seen order.
export function perMemberTotals(records: TransactionRecord[]): MemberTotal[] {
  const sums = new Map<string, number>();
  for (const record of records) {
    if (record.type !== 'Incoming') continue;
    sums.set(record.name, addAmounts(sums.get(record.name) ?? 0, record.amount));
  }
  return [...sums.entries()].map(([name, amount]) => ({ name, amount })).sort((a, b) => b.amount - a.amount);
}

function contributionsOf(records: TransactionRecord[], name: string): TransactionRecord[] {
  return records.filter((record) => record.type === 'Incoming' && record.name === name);
}

export function lifetimeTotal(records: TransactionRecord[], name: string): number {
  return sumAmounts(contributionsOf(records, name));
}

// Earliest contribution date, or null when the member never gave.
export function memberSince(records: TransactionRecord[], name: string): string | null {
  const dates = contributionsOf(records, name)
    .map((record) => record.date)
    .filter(Boolean)
    .sort();
  return dates[0] ?? null;
}

// ── Breakdowns & pivots ──

export type BreakdownField = 'category' | 'subCategory' | 'medical' | 'group' | 'name';

export function breakdownBy(records: TransactionRecord[], field: BreakdownField): BreakdownEntry[] {
  const sums = new Map<string, number>();
  for (const record of records) {
    const label = record[field];
    if (!label) continue;
    sums.set(label, addAmounts(sums.get(label) ?? 0, record.amount));
  }
  return [...sums.entries()].filter(([, amount]) => amount !== 0).map(([label, amount]) => ({ label, amount }));
}

function distinctCategories(records: TransactionRecord[]): string[] {
  return [...new Set(records.map((record) => record.category))].sort();
}

function buildPivot(
  records: TransactionRecord[],
  keys: string[],
  keyOf: (record: TransactionRecord) => string,
): PivotTable {
  const columns = distinctCategories(records);
  const rows = new Map<string, PivotRow>();
  for (const key of keys) {
    rows.set(key, {
      key,
      cells: Object.fromEntries(columns.map((column) => [column, 0])),
      total: 0,
    });
  }

  for (const record of records) {
    const row = rows.get(keyOf(record));
    if (!row) continue;
    row.cells[record.category] = addAmounts(row.cells[record.category] ?? 0, record.amount);
    row.total = addAmounts(row.total, record.amount);
  }

  return { columns, rows: [...rows.values()] };
}

// Rows per date (ascending); columns are whatever categories the input holds.
export function pivotByDateAndCategory(records: TransactionRecord[]): PivotTable {
  const dates = [...new Set(records.map((record) => record.date))].sort();
  return buildPivot(records, dates, (record) => record.date);
}

export function pivotByMonthAndCategory(records: TransactionRecord[]): PivotTable {
  return buildPivot(
    records,
    MONTHS.map(({ label }) => label),
    (record) => MONTH_NAMES[record.month - 1] ?? '',
  );
}

export function pivotToCsvRows(pivot: PivotTable, keyHeader: string, totalHeader: string): string[][] {
  const header = [keyHeader, ...pivot.columns, totalHeader];
  const rows = pivot.rows.map((row) => [
    row.key,
    ...pivot.columns.map((column) => String(row.cells[column] ?? 0)),
    String(row.total),
  ]);
  return [header, ...rows];
}
