import { describe, expect, it } from 'vitest';
import { makeRecord } from '../../testing/fixtures';
import { pivotByMonthAndCategory } from '../ledger/aggregator';
import { EMPTY_PROFILE } from '../members/directory';
import { buildMemberReport } from './builder';
import { formatReport } from './formatter';

function report(memberName = 'Karim') {
  const disbursement = makeRecord({ date: '2024-02-05', type: 'Outgoing', category: 'Zakat', amount: 30 });
  return buildMemberReport({
    memberName,
    profile: EMPTY_PROFILE,
    year: 2024,
    memberSince: '2023-05-02',
    lifetimeTotal: 1250,
    memberPivot: pivotByMonthAndCategory([
      makeRecord({ date: '2024-01-10', amount: 100 }),
      makeRecord({ date: '2024-03-15', amount: 25.5 }),
    ]),
    organizationOutgoing: [disbursement],
    medicalOutgoing: [],
    currency: 'Tk ',
  });
}

describe('formatReport', () => {
  it('summarises the report for an email body', () => {
    const formatted = formatReport(report(), 'Hope Trust');

    expect(formatted.title).toBe('Hope Trust Member Contribution Report');
    expect(formatted.subtitle).toBe('Karim | 2024');
    expect(formatted.summary).toBe(
      'LIFETIME CONTRIBUTIONS: Tk 1,250.00 | Given in 2024: 125.50 | Distributed by the charity: 30.00',
    );
    expect(formatted.highlights).toEqual([
      'Your largest month: January (100.00)',
      'Most support distributed in February (30.00)',
      'By Fund Source: Zakat leads with 100.0%',
    ]);
    expect(formatted.text.split('\n').slice(0, 2)).toEqual(['Hope Trust Member Contribution Report', 'Karim | 2024']);
  });

  it('escapes names in the html body', () => {
    const formatted = formatReport(report('A&B <Trust>'), 'Hope Trust');
    expect(formatted.html).toContain('<p><strong>A&amp;B &lt;Trust&gt; | 2024</strong></p>');
  });

  it('says so when the member gave nothing', () => {
    const empty = buildMemberReport({
      memberName: 'Karim',
      profile: EMPTY_PROFILE,
      year: 'All',
      memberSince: null,
      lifetimeTotal: 0,
      memberPivot: pivotByMonthAndCategory([]),
      organizationOutgoing: [],
      medicalOutgoing: [],
      currency: 'Tk ',
    });
    expect(formatReport(empty, 'Hope Trust').highlights).toEqual(['No contributions recorded in this period.']);
  });
});
