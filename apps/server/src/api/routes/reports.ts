import { Router, type Request, type Response } from 'express';
import type { ReportYear } from '@charity-ledger/shared';
import type { AppServices } from '../../services';
import {
  fundBalance,
  fundBalances,
  ledgerSummary,
  monthlyTotals,
  perMemberTotals,
  pivotByDateAndCategory,
  pivotToCsvRows,
  yearsPresent,
} from '../../services/ledger/aggregator';
import { serializeRows } from '../../services/records/csv';
import { filterRecords } from '../../services/records/filter';
import { assembleMemberReport, type ReportMessages } from '../../services/reporting/builder';
import { asInteger, asString, isGroupFilter, isRecord } from '../../utils/values';
import { sessionOf } from '../middleware/auth';
import { parseFilter } from './transactions';

function parseYear(value: unknown): ReportYear | null {
  if (value === undefined || value === 'All') return 'All';
  return asInteger(value);
}

function parseMessages(body: unknown): ReportMessages {
  if (!isRecord(body)) return {};
  return {
    headerMessage: asString(body.headerMessage) ?? undefined,
    footerMessage: asString(body.footerMessage) ?? undefined,
  };
}

function reportFileName(name: string, year: ReportYear): string {
  return `${name}-${year}`.replace(/[^A-Za-z0-9_-]+/g, '_') + '-report.pdf';
}

export function createReportsRouter(services: AppServices): Router {
  const router = Router();

  router.get('/capabilities', async (_req: Request, res: Response) => {
    const pdf = await services.pdf.capability();
    res.status(200).json({ pdf, mail: { available: services.mailer.available } });
  });

  router.get('/summary', (req: Request, res: Response) => {
    const year = parseYear(req.query.year);
    if (year === null) {
      res.status(400).json({ message: 'year is invalid' });
      return;
    }

    const { records } = sessionOf(req).context.records.readAll();
    const inYear = year === 'All' ? records : records.filter((record) => record.year === year);
    res.status(200).json({
      year,
      years: yearsPresent(records),
      summary: ledgerSummary(inYear),
      funds: fundBalances(records),
      topMembers: perMemberTotals(inYear).slice(0, 10),
    });
  });

  router.get('/funds', (req: Request, res: Response) => {
    const group = asString(req.query.group) ?? 'All';
    if (!isGroupFilter(group)) {
      res.status(400).json({ message: 'group is invalid' });
      return;
    }

    const { records } = sessionOf(req).context.records.readAll();
    const category = asString(req.query.category);
    if (category) {
      res.status(200).json({ category, group, balance: fundBalance(records, category, group) });
      return;
    }
    res.status(200).json({ group, funds: fundBalances(records, group) });
  });

  router.get('/monthly', (req: Request, res: Response) => {
    const parsed = parseFilter(req.query);
    if ('error' in parsed) {
      res.status(400).json({ message: parsed.error });
      return;
    }

    const { type, ...rest } = parsed.filter;
    const records = filterRecords(sessionOf(req).context.records.readAll().records, rest);
    res.status(200).json({ type: type ?? null, months: monthlyTotals(records, type) });
  });

  router.get('/members', (req: Request, res: Response) => {
    const parsed = parseFilter(req.query);
    if ('error' in parsed) {
      res.status(400).json({ message: parsed.error });
      return;
    }

    const records = filterRecords(sessionOf(req).context.records.readAll().records, parsed.filter);
    res.status(200).json({ members: perMemberTotals(records) });
  });

  router.get('/pivot', (req: Request, res: Response) => {
    const parsed = parseFilter(req.query);
    if ('error' in parsed) {
      res.status(400).json({ message: parsed.error });
      return;
    }

    const records = filterRecords(sessionOf(req).context.records.readAll().records, parsed.filter);
    const pivot = pivotByDateAndCategory(records);
    if (req.query.format === 'csv') {
      res
        .status(200)
        .type('text/csv')
        .attachment('pivot.csv')
        .send(serializeRows(pivotToCsvRows(pivot, 'Date', 'Daily Total')));
      return;
    }
    res.status(200).json(pivot);
  });

  router.get('/members/:name', (req: Request, res: Response) => {
    const year = parseYear(req.query.year);
    if (year === null) {
      res.status(400).json({ message: 'year is invalid' });
      return;
    }

    const report = assembleMemberReport(sessionOf(req).context, String(req.params.name), year, parseMessages(req.query));
    res.status(200).json(report);
  });

  router.post('/members/:name/pdf', async (req: Request, res: Response) => {
    const body: unknown = req.body;
    const year = parseYear(isRecord(body) ? body.year : undefined);
    if (year === null) {
      res.status(400).json({ message: 'year is invalid' });
      return;
    }

    const name = String(req.params.name);
    const report = assembleMemberReport(sessionOf(req).context, name, year, parseMessages(body));
    const pdf = await services.pdf.render(report);
    res.status(200).type('application/pdf').attachment(reportFileName(name, year)).send(pdf);
  });

  router.post('/members/:name/email', async (req: Request, res: Response) => {
    const body: unknown = req.body;
    const year = parseYear(isRecord(body) ? body.year : undefined);
    if (year === null) {
      res.status(400).json({ message: 'year is invalid' });
      return;
    }

    const { context } = sessionOf(req);
    const name = String(req.params.name);
    const profile = context.members.find(name);
    if (!profile) {
      res.status(404).json({ message: 'Member not found' });
      return;
    }

    const report = assembleMemberReport(context, name, year, parseMessages(body));
    const pdf = await services.pdf.render(report);
    const delivery = await services.mailer.sendMemberReport({
      to: profile.email,
      report,
      pdf,
      organizationName: services.config.organizationName,
    });
    res.status(delivery.success ? 200 : 502).json(delivery);
  });

  return router;
}
