import type { MemberReportDocument, ReportTable } from '@charity-ledger/shared';
import { formatAmount } from '@charity-ledger/shared';
import { formatShare } from './charts';
import { yearLabel } from './builder';

export interface FormattedReport {
  title: string;
  subtitle: string;
  summary: string;
  highlights: string[];
  text: string;
  html: string;
}

function busiestMonth(table: ReportTable): string | null {
  let bestIndex = -1;
  table.amounts.forEach((amount, index) => {
    if (amount > 0 && (bestIndex === -1 || amount > table.amounts[bestIndex])) {
      bestIndex = index;
    }
  });
  if (bestIndex === -1) return null;
  const [label, formatted] = table.rows[bestIndex];
  return `${label} (${formatted})`;
}

function buildHighlights(report: MemberReportDocument): string[] {
  const highlights: string[] = [];

  const memberPeak = busiestMonth(report.memberTable);
  highlights.push(
    memberPeak ? `Your largest month: ${memberPeak}` : 'No contributions recorded in this period.',
  );

  const organizationPeak = busiestMonth(report.organizationTable);
  if (organizationPeak) {
    highlights.push(`Most support distributed in ${organizationPeak}`);
  }

  for (const chart of report.charts) {
    const top = [...chart.slices].sort((a, b) => b.amount - a.amount)[0];
    if (top) {
      highlights.push(`${chart.title}: ${top.label} leads with ${formatShare(top.share)}`);
    }
  }
  return highlights;
}

function buildSummary(report: MemberReportDocument): string {
  return [
    report.lifetimeHighlight,
    `Given in ${yearLabel(report.year)}: ${formatAmount(report.memberTable.total)}`,
    `Distributed by the charity: ${formatAmount(report.organizationTable.total)}`,
  ].join(' | ');
}

function escapeHtml(value: string): string {
  return value
    .replaceAll('&', '&amp;')
    .replaceAll('<', '&lt;')
    .replaceAll('>', '&gt;')
    .replaceAll('"', '&quot;')
    .replaceAll("'", '&#39;');
}

function buildText(title: string, subtitle: string, summary: string, highlights: string[]): string {
  return [
    title,
    subtitle,
    '',
    summary,
    '',
    'Highlights',
    ...highlights.map((item) => `- ${item}`),
  ].join('\n');
}

function buildHtml(title: string, subtitle: string, summary: string, highlights: string[]): string {
  const safeTitle = escapeHtml(title);
  const safeSubtitle = escapeHtml(subtitle);
  const safeSummary = escapeHtml(summary);
  const highlightList = highlights.map((item) => `<li>${escapeHtml(item)}</li>`).join('');

  return `
<div style="font-family: Arial, sans-serif; line-height: 1.5; color: #222;">
  <h2>${safeTitle}</h2>
  <p><strong>${safeSubtitle}</strong></p>
  <p>${safeSummary}</p>
  <h3>Highlights</h3>
  <ul>${highlightList}</ul>
</div>
`.trim();
}

export function formatReport(report: MemberReportDocument, organizationName: string): FormattedReport {
  const title = `${organizationName} ${report.title}`;
  const subtitle = `${report.memberName} | ${yearLabel(report.year)}`;

  const summary = buildSummary(report);
  const highlights = buildHighlights(report);

  return {
    title,
    subtitle,
    summary,
    highlights,
    text: buildText(title, subtitle, summary, highlights),
    html: buildHtml(title, subtitle, summary, highlights),
  };
}
