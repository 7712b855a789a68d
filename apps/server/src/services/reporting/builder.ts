import type {
  BreakdownEntry,
  MemberProfile,
  MemberReportDocument,
  MonthlyTotal,
  PivotTable,
  ReportChart,
  ReportTable,
  ReportYear,
  TransactionRecord,
} from '@charity-ledger/shared';
import { addAmounts, formatAmount } from '@charity-ledger/shared';
import type { TenantContext } from '../context';
import {
  breakdownBy,
  lifetimeTotal,
  memberSince,
  monthlyTotals,
  pivotByMonthAndCategory,
} from '../ledger/aggregator';
import { computePieSlices } from './charts';

export interface ReportMessages {
  headerMessage?: string;
  footerMessage?: string;
}

export interface MemberReportInput extends ReportMessages {
  memberName: string;
  profile: MemberProfile;
  year: ReportYear;
  memberSince: string | null;
  lifetimeTotal: number;
  memberPivot: PivotTable;                       // month x category of the member's contributions
  organizationOutgoing: TransactionRecord[];     // every disbursement in the year
  medicalOutgoing: TransactionRecord[];          // medical-help subset of the above
  currency: string;
}

export const REPORT_TITLE = 'Member Contribution Report';
export const SIGNATURE_LABEL = 'Authorized Signature';

export function yearLabel(year: ReportYear): string {
  return year === 'All' ? 'All Years' : String(year);
}

function orDash(value: string): string {
  return value.trim() ? value.trim() : '-';
}

function optionalMessage(value: string | undefined): string | undefined {
  return value && value.trim() ? value.trim() : undefined;
}

function monthlyTable(title: string, valueHeader: string, months: MonthlyTotal[]): ReportTable {
  const total = months.reduce((sum, month) => addAmounts(sum, month.amount), 0);
  const rows = months.map((month): [string, string] => [month.label, formatAmount(month.amount)]);
  return {
    title,
    head: ['Month', valueHeader],
    rows: [...rows, ['TOTAL', formatAmount(total)]],
    amounts: months.map((month) => month.amount),
    total,
  };
}

function pivotMonths(pivot: PivotTable): MonthlyTotal[] {
  return pivot.rows.map((row, index) => ({ month: index + 1, label: row.key, amount: row.total }));
}

function chart(title: string, entries: BreakdownEntry[]): ReportChart | null {
  const slices = computePieSlices(entries);
  return slices.length ? { title, slices } : null;
}

export function buildMemberReport(input: MemberReportInput): MemberReportDocument {
  const label = yearLabel(input.year);

  const charts = [
    chart('By Fund Source', breakdownBy(input.organizationOutgoing, 'category')),
    chart('By Usage', breakdownBy(input.organizationOutgoing, 'subCategory')),
    chart('Medical Breakdown', breakdownBy(input.medicalOutgoing, 'medical')),
  ].filter((item): item is ReportChart => item !== null);

  return {
    title: REPORT_TITLE,
    memberName: input.memberName,
    year: input.year,
    profile: [
      { label: 'Name', value: input.memberName },
      { label: 'Member Since', value: input.memberSince ?? '-' },
      { label: 'Address', value: orDash(input.profile.address) },
      { label: 'Phone/Email', value: `${orDash(input.profile.phone)} / ${orDash(input.profile.email)}` },
      { label: 'Report Year', value: label },
    ],
    lifetimeHighlight: `LIFETIME CONTRIBUTIONS: ${input.currency}${formatAmount(input.lifetimeTotal)}`,
    headerMessage: optionalMessage(input.headerMessage),
    memberTable: monthlyTable(`1. Your Contributions in ${label}`, 'Amount', pivotMonths(input.memberPivot)),
    organizationTable: monthlyTable(
      `2. Charity Overall Donations in ${label} (Impact)`,
      'Total Distributed',
      monthlyTotals(input.organizationOutgoing, 'Outgoing'),
    ),
    chartsHeading: `3. Distribution Analysis (${label})`,
    charts,
    footerMessage: optionalMessage(input.footerMessage),
    signature: SIGNATURE_LABEL,
  };
}

// Gathers every input of a member report from one tenant's data.
export function assembleMemberReport(
  context: TenantContext,
  memberName: string,
  year: ReportYear,
  messages: ReportMessages = {},
): MemberReportDocument {
  const { records } = context.records.readAll();
  const inYear = year === 'All' ? records : records.filter((record) => record.year === year);
  const contributions = inYear.filter((record) => record.type === 'Incoming' && record.name === memberName);
  const organizationOutgoing = inYear.filter((record) => record.type === 'Outgoing');
  const medicalSubCategory = context.categories.medicalSubCategory;

  return buildMemberReport({
    memberName,
    profile: context.members.lookup(memberName),
    year,
    memberSince: memberSince(records, memberName),
    lifetimeTotal: lifetimeTotal(records, memberName),
    memberPivot: pivotByMonthAndCategory(contributions),
    organizationOutgoing,
    medicalOutgoing: organizationOutgoing.filter(
      (record) => record.subCategory === medicalSubCategory || Boolean(record.medical),
    ),
    currency: context.currency,
    ...messages,
  });
}
