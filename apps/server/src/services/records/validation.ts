import { randomUUID } from 'node:crypto';
import type {
  CategoryTable,
  EditableTransactionField,
  MemberGroup,
  TransactionInput,
  TransactionRecord,
  TransactionType,
} from '@charity-ledger/shared';
import { DEFAULT_GROUP, addAmounts, categoryTagForType, parseCalendarDay } from '@charity-ledger/shared';
import { ValidationError } from '../../errors';
import { asInteger, asNumber, asText, isMemberGroup } from '../../utils/values';
import { categoryOptionsFor, isOffered } from './categories';

export const EDITABLE_FIELDS: EditableTransactionField[] = [
  'date',
  'group',
  'category',
  'subCategory',
  'medical',
  'name',
  'address',
  'reason',
  'responsible',
  'amount',
];

const OUTGOING_ONLY_FIELDS: EditableTransactionField[] = ['subCategory', 'medical', 'address', 'reason', 'responsible'];

export function isEditableField(value: unknown): value is EditableTransactionField {
  return typeof value === 'string' && EDITABLE_FIELDS.some((field) => field === value);
}

function roundAmount(amount: number): number {
  return addAmounts(amount, 0);
}

export type MemberIdResolver = (name: string) => string;

// ── Entry-time validation ──

export function validateTransactionInput(input: TransactionInput, table: CategoryTable): string | null {
  if (!input.name.trim()) return 'name is required';
  if (!Number.isFinite(input.amount) || input.amount <= 0) return 'amount must be greater than 0';
  if (!parseCalendarDay(input.date)) return 'date must be YYYY-MM-DD';

  const category = input.category?.trim();
  if (category && !isOffered(table, categoryTagForType(input.type), category)) {
    return `category "${category}" is not allowed for ${input.type}`;
  }

  if (input.type === 'Outgoing') {
    const subCategory = input.subCategory?.trim();
    if (subCategory && !isOffered(table, 'subCategory', subCategory)) {
      return `subCategory "${subCategory}" is not allowed`;
    }
    const medical = input.medical?.trim();
    if (medical && subCategory === table.medicalSubCategory && !isOffered(table, 'medical', medical)) {
      return `medical "${medical}" is not allowed`;
    }
  }
  return null;
}

export function buildRecord(
  input: TransactionInput,
  table: CategoryTable,
  resolveMemberId: MemberIdResolver,
): TransactionRecord {
  const validationError = validateTransactionInput(input, table);
  if (validationError) {
    throw new ValidationError(validationError);
  }

  const day = parseCalendarDay(input.date);
  if (!day) {
    throw new ValidationError('date must be YYYY-MM-DD');
  }

  const name = input.name.trim();
  const isOutgoing = input.type === 'Outgoing';
  const subCategory = isOutgoing ? input.subCategory?.trim() ?? '' : '';
  const medical = subCategory === table.medicalSubCategory ? input.medical?.trim() ?? '' : '';

  return {
    id: randomUUID(),
    date: day.date,
    year: day.year,
    month: day.month,
    type: input.type,
    group: input.group ?? DEFAULT_GROUP,
    category: input.category?.trim() || categoryOptionsFor(table, input.type).defaultValue,
    subCategory,
    medical,
    name,
    memberId: resolveMemberId(name),
    address: isOutgoing ? input.address?.trim() ?? '' : '',
    reason: isOutgoing ? input.reason?.trim() ?? '' : '',
    responsible: isOutgoing ? input.responsible?.trim() ?? '' : '',
    amount: roundAmount(input.amount),
  };
}

// ── Single-field edits ──

export function applyFieldEdit(
  record: TransactionRecord,
  field: EditableTransactionField,
  value: unknown,
  table: CategoryTable,
  resolveMemberId: MemberIdResolver,
): TransactionRecord {
  if (record.type === 'Incoming' && OUTGOING_ONLY_FIELDS.includes(field)) {
    throw new ValidationError(`${field} only applies to Outgoing transactions`);
  }

  switch (field) {
    case 'amount': {
      const amount = asNumber(value);
      if (amount === null || amount <= 0) throw new ValidationError('amount must be greater than 0');
      return { ...record, amount: roundAmount(amount) };
    }
    case 'date': {
      const day = parseCalendarDay(asText(value));
      if (!day) throw new ValidationError('date must be YYYY-MM-DD');
      return { ...record, date: day.date, year: day.year, month: day.month };
    }
    case 'group': {
      if (!isMemberGroup(value)) throw new ValidationError('group is invalid');
      return { ...record, group: value };
    }
    case 'name': {
      const name = asText(value);
      if (!name) throw new ValidationError('name is required');
      return { ...record, name, memberId: resolveMemberId(name) };
    }
    case 'category': {
      const category = asText(value);
      if (!isOffered(table, categoryTagForType(record.type), category)) {
        throw new ValidationError(`category "${category}" is not allowed for ${record.type}`);
      }
      return { ...record, category };
    }
    case 'subCategory': {
      const subCategory = asText(value);
      if (subCategory && !isOffered(table, 'subCategory', subCategory)) {
        throw new ValidationError(`subCategory "${subCategory}" is not allowed`);
      }
      const medical = subCategory === table.medicalSubCategory ? record.medical : '';
      return { ...record, subCategory, medical };
    }
    case 'medical': {
      const medical = asText(value);
      if (medical && record.subCategory !== table.medicalSubCategory) {
        throw new ValidationError(`medical requires subCategory "${table.medicalSubCategory}"`);
      }
      if (medical && !isOffered(table, 'medical', medical)) {
        throw new ValidationError(`medical "${medical}" is not allowed`);
      }
      return { ...record, medical };
    }
    case 'address':
      return { ...record, address: asText(value) };
    case 'reason':
      return { ...record, reason: asText(value) };
    case 'responsible':
      return { ...record, responsible: asText(value) };
  }
}

// ── Lenient coercion for stored, imported and bulk-edited rows ──

function normalizeType(value: string): TransactionType | null {
  const lowered = value.trim().toLowerCase();
  if (lowered === 'incoming') return 'Incoming';
  if (lowered === 'outgoing') return 'Outgoing';
  return null;
}

function normalizeGroup(value: string): MemberGroup | null {
  const lowered = value.trim().toLowerCase();
  if (lowered === 'brother') return 'Brother';
  if (lowered === 'sister') return 'Sister';
  if (lowered === 'n/a' || lowered === '') return 'N/A';
  return null;
}

export interface CoercedRecord {
  record: TransactionRecord;
  issues: string[];
  idAssigned: boolean;
}

// Never rejects: historical data may break the entry-time rules.
export function coerceRecord(raw: Record<string, unknown>): CoercedRecord {
  const issues: string[] = [];
  const existingId = asText(raw.id);
  const id = existingId || randomUUID();

  const date = asText(raw.date);
  const day = parseCalendarDay(date);

  const rawType = asText(raw.type);
  const type = normalizeType(rawType);
  if (!type) issues.push(`${id}: unknown type "${rawType}", read as Incoming`);

  const rawGroup = asText(raw.group);
  const group = normalizeGroup(rawGroup);
  if (!group) issues.push(`${id}: unknown group "${rawGroup}", read as N/A`);

  const amount = asNumber(raw.amount);
  if (amount === null && asText(raw.amount)) issues.push(`${id}: amount "${asText(raw.amount)}" read as 0`);

  return {
    record: {
      id,
      date: day?.date ?? date,
      year: day?.year ?? asInteger(raw.year) ?? 0,
      month: day?.month ?? asInteger(raw.month) ?? 0,
      type: type ?? 'Incoming',
      group: group ?? DEFAULT_GROUP,
      category: asText(raw.category),
      subCategory: asText(raw.subCategory),
      medical: asText(raw.medical),
      name: asText(raw.name),
      memberId: asText(raw.memberId),
      address: asText(raw.address),
      reason: asText(raw.reason),
      responsible: asText(raw.responsible),
      amount: amount ?? 0,
    },
    issues,
    idAssigned: !existingId,
  };
}
