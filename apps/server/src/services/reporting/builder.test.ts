import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { DEFAULT_CATEGORY_TABLE, type MemberProfile } from '@charity-ledger/shared';
import { makeRecord, makeTempDir, removeDir, silentLogger } from '../../testing/fixtures';
import { createTenantRegistry } from '../context';
import { pivotByMonthAndCategory } from '../ledger/aggregator';
import { EMPTY_PROFILE, loadMemberDirectory } from '../members/directory';
import { assembleMemberReport, buildMemberReport, type MemberReportInput } from './builder';

const profile: MemberProfile = { ...EMPTY_PROFILE, phone: '555-0100' };

const disbursement = makeRecord({
  date: '2024-02-05',
  type: 'Outgoing',
  name: 'City Clinic',
  category: 'Zakat',
  subCategory: 'Medical help',
  medical: 'Heart',
  amount: 30,
});

function reportInput(overrides: Partial<MemberReportInput> = {}): MemberReportInput {
  const contributions = [
    makeRecord({ date: '2024-01-10', category: 'Zakat', amount: 100 }),
    makeRecord({ date: '2024-03-15', category: 'Sadaka', amount: 25.5 }),
  ];
  return {
    memberName: 'Karim',
    profile,
    year: 2024,
    memberSince: '2023-05-02',
    lifetimeTotal: 1250,
    memberPivot: pivotByMonthAndCategory(contributions),
    organizationOutgoing: [disbursement],
    medicalOutgoing: [disbursement],
    currency: 'Tk ',
    ...overrides,
  };
}

describe('buildMemberReport', () => {
  it('lays out the profile and the lifetime highlight', () => {
    const report = buildMemberReport(reportInput());
    expect(report.title).toBe('Member Contribution Report');
    expect(report.profile).toEqual([
      { label: 'Name', value: 'Karim' },
      { label: 'Member Since', value: '2023-05-02' },
      { label: 'Address', value: '-' },
      { label: 'Phone/Email', value: '555-0100 / -' },
      { label: 'Report Year', value: '2024' },
    ]);
    expect(report.lifetimeHighlight).toBe('LIFETIME CONTRIBUTIONS: Tk 1,250.00');
    expect(report.signature).toBe('Authorized Signature');
  });

  it('tabulates twelve months and a total for the member', () => {
    const { memberTable } = buildMemberReport(reportInput());
    expect(memberTable.title).toBe('1. Your Contributions in 2024');
    expect(memberTable.rows).toHaveLength(13);
    expect(memberTable.rows[0]).toEqual(['January', '100.00']);
    expect(memberTable.rows[1]).toEqual(['February', '0.00']);
    expect(memberTable.rows[2]).toEqual(['March', '25.50']);
    expect(memberTable.rows[12]).toEqual(['TOTAL', '125.50']);
    expect(memberTable.total).toBe(125.5);
  });

  it('shows what the charity distributed in the same period', () => {
    const { organizationTable } = buildMemberReport(reportInput());
    expect(organizationTable.title).toBe('2. Charity Overall Donations in 2024 (Impact)');
    expect(organizationTable.head).toEqual(['Month', 'Total Distributed']);
    expect(organizationTable.rows[1]).toEqual(['February', '30.00']);
    expect(organizationTable.rows[12]).toEqual(['TOTAL', '30.00']);
  });

  it('draws the fund, usage and medical charts', () => {
    const report = buildMemberReport(reportInput());
    expect(report.chartsHeading).toBe('3. Distribution Analysis (2024)');
    expect(report.charts.map((chart) => chart.title)).toEqual(['By Fund Source', 'By Usage', 'Medical Breakdown']);
    expect(report.charts[2].slices.map((slice) => slice.label)).toEqual(['Heart']);
  });

  it('leaves out charts with nothing to show', () => {
    const report = buildMemberReport(reportInput({ organizationOutgoing: [], medicalOutgoing: [], year: 'All' }));
    expect(report.charts).toEqual([]);
    expect(report.organizationTable.total).toBe(0);
    expect(report.chartsHeading).toBe('3. Distribution Analysis (All Years)');
  });

  it('drops blank messages and trims the rest', () => {
    const report = buildMemberReport(reportInput({ headerMessage: '   ', footerMessage: ' Thank you ' }));
    expect(report.headerMessage).toBeUndefined();
    expect(report.footerMessage).toBe('Thank you');
  });
});

describe('assembleMemberReport', () => {
  let dataDir: string;

  beforeEach(() => {
    dataDir = makeTempDir();
  });

  afterEach(() => {
    removeDir(dataDir);
  });

  it('reports the chosen year against lifetime figures', () => {
    const members = loadMemberDirectory({ dataDir, logger: silentLogger() });
    members.register('Karim', { email: 'karim@example.org', address: '12 Lake Road' });
    const tenants = createTenantRegistry({ dataDir, currency: 'Tk ', categories: DEFAULT_CATEGORY_TABLE, members });
    const context = tenants.contextFor('alice');

    context.records.append({ type: 'Incoming', date: '2023-06-01', name: 'Karim', amount: 40, category: 'Zakat' });
    context.records.append({ type: 'Incoming', date: '2024-01-10', name: 'Karim', amount: 100, category: 'Zakat' });
    context.records.append({
      type: 'Outgoing',
      date: '2024-02-05',
      name: 'City Clinic',
      amount: 30,
      category: 'Zakat',
      subCategory: 'Medical help',
      medical: 'Heart',
    });

    const report = assembleMemberReport(context, 'Karim', 2024, { footerMessage: 'Thank you' });
    expect(report.memberTable.total).toBe(100);
    expect(report.lifetimeHighlight).toBe('LIFETIME CONTRIBUTIONS: Tk 140.00');
    expect(report.profile[1]).toEqual({ label: 'Member Since', value: '2023-06-01' });
    expect(report.profile[2]).toEqual({ label: 'Address', value: '12 Lake Road' });
    expect(report.organizationTable.total).toBe(30);
    expect(report.footerMessage).toBe('Thank you');
  });

  it('links new records to the registered member', () => {
    const members = loadMemberDirectory({ dataDir, logger: silentLogger() });
    const profile = members.register('Karim', { email: 'karim@example.org' });
    const tenants = createTenantRegistry({ dataDir, currency: 'Tk ', categories: DEFAULT_CATEGORY_TABLE, members });

    const record = tenants
      .contextFor('alice')
      .records.append({ type: 'Incoming', date: '2024-01-10', name: 'Karim', amount: 100 });
    expect(record.memberId).toBe(profile.id);
  });
});
