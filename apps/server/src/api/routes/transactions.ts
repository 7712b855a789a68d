import { Router, type Request, type Response } from 'express';
import type { TransactionFilter, TransactionInput, TransactionRecord } from '@charity-ledger/shared';
import { MEMBER_GROUPS, TRANSACTION_TYPES, formatAmount } from '@charity-ledger/shared';
import type { AppServices } from '../../services';
import { fundBalance, ledgerSummary } from '../../services/ledger/aggregator';
import { filterRecords, hasActiveFilter } from '../../services/records/filter';
import { coerceRecord, isEditableField } from '../../services/records/validation';
import {
  asInteger,
  asNumber,
  asString,
  isGroupFilter,
  isMemberGroup,
  isRecord,
  isTransactionType,
} from '../../utils/values';
import { sessionOf } from '../middleware/auth';

interface TransactionPayload {
  date?: unknown;
  type?: unknown;
  group?: unknown;
  category?: unknown;
  subCategory?: unknown;
  medical?: unknown;
  name?: unknown;
  address?: unknown;
  reason?: unknown;
  responsible?: unknown;
  amount?: unknown;
}

type ParsedFilter = { filter: TransactionFilter } | { error: string };

export function parseFilter(query: Request['query']): ParsedFilter {
  const filter: TransactionFilter = {};

  const type = asString(query.type);
  if (type) {
    if (!isTransactionType(type)) return { error: 'type is invalid' };
    filter.type = type;
  }

  if (query.year !== undefined) {
    const year = asInteger(query.year);
    if (year === null) return { error: 'year is invalid' };
    filter.year = year;
  }

  if (query.month !== undefined) {
    const month = asInteger(query.month);
    if (month === null || month < 1 || month > 12) return { error: 'month is invalid' };
    filter.month = month;
  }

  const group = asString(query.group);
  if (group) {
    if (!isGroupFilter(group)) return { error: 'group is invalid' };
    filter.group = group;
  }

  const category = asString(query.category);
  if (category) filter.category = category;
  const name = asString(query.name);
  if (name) filter.name = name;
  const search = asString(query.search);
  if (search) filter.search = search;

  return { filter };
}

function validateCreatePayload(payload: TransactionPayload): string | null {
  if (!isTransactionType(payload.type)) return `type must be one of ${TRANSACTION_TYPES.join(', ')}`;
  if (!asString(payload.name)) return 'name is required';
  if (!asString(payload.date)) return 'date is required';
  const amount = asNumber(payload.amount);
  if (amount === null || amount <= 0) return 'amount must be greater than 0';
  if (payload.group !== undefined && !isMemberGroup(payload.group)) {
    return `group must be one of ${MEMBER_GROUPS.join(', ')}`;
  }
  return null;
}

function optionalText(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

function toCreateInput(payload: TransactionPayload): TransactionInput | null {
  if (!isTransactionType(payload.type)) return null;
  return {
    type: payload.type,
    date: String(payload.date).trim(),
    name: String(payload.name).trim(),
    amount: asNumber(payload.amount) ?? 0,
    group: isMemberGroup(payload.group) ? payload.group : undefined,
    category: optionalText(payload.category),
    subCategory: optionalText(payload.subCategory),
    medical: optionalText(payload.medical),
    address: optionalText(payload.address),
    reason: optionalText(payload.reason),
    responsible: optionalText(payload.responsible),
  };
}

function balanceWarnings(records: TransactionRecord[], created: TransactionRecord, currency: string): string[] {
  if (created.type !== 'Outgoing') return [];
  const balance = fundBalance(records, created.category, 'All');
  return balance < 0 ? [`${created.category} balance is negative: ${currency}${formatAmount(balance)}`] : [];
}

function sendCsv(res: Response, filename: string, content: string): void {
  res.status(200).type('text/csv').attachment(filename).send(content);
}

export function createTransactionsRouter(services: AppServices): Router {
  const router = Router();

  router.get('/', (req: Request, res: Response) => {
    const parsed = parseFilter(req.query);
    if ('error' in parsed) {
      res.status(400).json({ message: parsed.error });
      return;
    }

    const { records, revision } = sessionOf(req).context.records.readAll();
    const filtered = hasActiveFilter(parsed.filter);
    const visible = filtered ? filterRecords(records, parsed.filter) : records;

    // A filtered view can never be written back, so it gets no revision.
    res.status(200).json({
      records: visible,
      revision: filtered ? null : revision,
      filtered,
      summary: ledgerSummary(visible),
    });
  });

  router.get('/options', (_req: Request, res: Response) => {
    res.status(200).json({
      types: TRANSACTION_TYPES,
      groups: MEMBER_GROUPS,
      categories: services.categories,
    });
  });

  router.get('/export', (req: Request, res: Response) => {
    const parsed = parseFilter(req.query);
    if ('error' in parsed) {
      res.status(400).json({ message: parsed.error });
      return;
    }

    const { context } = sessionOf(req);
    const records = filterRecords(context.records.readAll().records, parsed.filter);
    sendCsv(res, `transactions_${context.username}.csv`, context.records.exportCsv(records));
  });

  router.post('/', (req: Request, res: Response) => {
    const payload: TransactionPayload = isRecord(req.body) ? req.body : {};
    const validationError = validateCreatePayload(payload);
    const input = toCreateInput(payload);
    if (validationError || !input) {
      res.status(400).json({ message: validationError ?? 'type is invalid' });
      return;
    }

    const { context } = sessionOf(req);
    const record = context.records.append(input);
    const warnings = balanceWarnings(context.records.readAll().records, record, context.currency);
    res.status(201).json({ record, warnings });
  });

  router.put('/', (req: Request, res: Response) => {
    const body: Record<string, unknown> = isRecord(req.body) ? req.body : {};
    if (!Array.isArray(body.records)) {
      res.status(400).json({ message: 'records must be an array' });
      return;
    }
    if (!body.records.every(isRecord)) {
      res.status(400).json({ message: 'every record must be an object' });
      return;
    }

    const records = body.records.map((item: Record<string, unknown>) => coerceRecord(item).record);
    const snapshot = sessionOf(req).context.records.replaceAll(records, asString(body.revision));
    res.status(200).json(snapshot);
  });

  router.post('/import', (req: Request, res: Response) => {
    if (typeof req.body !== 'string' || !req.body.trim()) {
      res.status(400).json({ message: 'send the CSV file as a text/csv body' });
      return;
    }

    const snapshot = sessionOf(req).context.records.importCsv(req.body);
    res.status(200).json({ imported: snapshot.records.length, revision: snapshot.revision });
  });

  router.post('/reset', (req: Request, res: Response) => {
    const ticket = services.confirmations.request(sessionOf(req).info.username, 'reset-transactions');
    res.status(202).json({
      message: 'Confirm by posting this token to /reset/confirm. This deletes every transaction.',
      ...ticket,
    });
  });

  router.post('/reset/confirm', (req: Request, res: Response) => {
    const token = isRecord(req.body) ? asString(req.body.token) : null;
    const session = sessionOf(req);
    if (!token || !services.confirmations.consume(session.info.username, 'reset-transactions', token)) {
      res.status(400).json({ message: 'confirmation token is invalid or expired' });
      return;
    }

    session.context.records.clear();
    res.status(204).send();
  });

  router.patch('/:id', (req: Request, res: Response) => {
    const body: Record<string, unknown> = isRecord(req.body) ? req.body : {};
    if (!isEditableField(body.field)) {
      res.status(400).json({ message: 'field is not editable' });
      return;
    }

    const updated = sessionOf(req).context.records.updateField(String(req.params.id), body.field, body.value);
    if (!updated) {
      res.status(404).json({ message: 'Transaction not found' });
      return;
    }
    res.status(200).json(updated);
  });

  router.delete('/:id', (req: Request, res: Response) => {
    const removed = sessionOf(req).context.records.delete(String(req.params.id));
    if (!removed) {
      res.status(404).json({ message: 'Transaction not found' });
      return;
    }
    res.status(204).send();
  });

  return router;
}
