// ══════════════════════════════════════════
// Ledger aggregates
// ══════════════════════════════════════════

export interface FundBalance {
  category: string;
  incoming: number;
  outgoing: number;
  balance: number;
}

export interface MonthlyTotal {
  month: number;                   // 1-12
  label: string;                   // month name
  amount: number;
}

export interface MemberTotal {
  name: string;
  amount: number;
}

export interface BreakdownEntry {
  label: string;
  amount: number;
}

export interface LedgerSummary {
  incoming: number;
  outgoing: number;
  net: number;
  count: number;
}

// Columns are derived from the categories present, so they vary per input.
export interface PivotRow {
  key: string;                     // date (YYYY-MM-DD) or month label
  cells: Record<string, number>;
  total: number;
}

export interface PivotTable {
  columns: string[];
  rows: PivotRow[];
}

export type ReportYear = number | 'All';

// ══════════════════════════════════════════
// Member contribution report
// ══════════════════════════════════════════

export interface ReportTable {
  title: string;
  head: [string, string];
  rows: [string, string][];        // 12 months, then TOTAL
  amounts: number[];               // the 12 monthly values behind rows
  total: number;
}

export interface PieSlice {
  label: string;
  amount: number;
  share: number;                   // 0-1
  startAngle: number;              // radians, clockwise from 12 o'clock
  endAngle: number;
  color: [number, number, number];
}

export interface ReportChart {
  title: string;
  slices: PieSlice[];
}

export interface ProfileLine {
  label: string;
  value: string;
}

export interface MemberReportDocument {
  title: string;
  memberName: string;
  year: ReportYear;
  profile: ProfileLine[];
  lifetimeHighlight: string;
  headerMessage?: string;
  memberTable: ReportTable;
  organizationTable: ReportTable;
  charts: ReportChart[];
  chartsHeading: string;
  footerMessage?: string;
  signature: string;
}
