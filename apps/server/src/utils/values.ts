import type { GroupFilter, MemberGroup, TransactionType } from '@charity-ledger/shared';
import { MEMBER_GROUPS, TRANSACTION_TYPES } from '@charity-ledger/shared';

export function asString(value: unknown): string | null {
  return typeof value === 'string' && value.trim() ? value.trim() : null;
}

// Optional free-text fields: anything that is not a string becomes ''.
export function asText(value: unknown): string {
  return typeof value === 'string' ? value.trim() : '';
}

export function asNumber(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === 'string' && value.trim()) {
    const parsed = Number(value.trim().replaceAll(',', ''));
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

export function asInteger(value: unknown): number | null {
  const parsed = asNumber(value);
  return parsed !== null && Number.isInteger(parsed) ? parsed : null;
}

export function isTransactionType(value: unknown): value is TransactionType {
  return typeof value === 'string' && TRANSACTION_TYPES.some((type) => type === value);
}

export function isMemberGroup(value: unknown): value is MemberGroup {
  return typeof value === 'string' && MEMBER_GROUPS.some((group) => group === value);
}

export function isGroupFilter(value: unknown): value is GroupFilter {
  return value === 'All' || isMemberGroup(value);
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function parseJsonObject(value: string): Record<string, unknown> | null {
  try {
    const parsed: unknown = JSON.parse(value);
    return isRecord(parsed) ? parsed : null;
  } catch {
    return null;
  }
}
