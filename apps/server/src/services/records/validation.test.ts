import { describe, expect, it } from 'vitest';
import { DEFAULT_CATEGORY_TABLE, type TransactionInput } from '@charity-ledger/shared';
import { ValidationError } from '../../errors';
import { makeRecord } from '../../testing/fixtures';
import { applyFieldEdit, buildRecord, coerceRecord, validateTransactionInput } from './validation';

const table = DEFAULT_CATEGORY_TABLE;
const noMember = () => '';

function input(overrides: Partial<TransactionInput> = {}): TransactionInput {
  return { type: 'Incoming', date: '2024-01-15', name: 'Karim', amount: 100, ...overrides };
}

describe('validateTransactionInput', () => {
  it('accepts a minimal entry', () => {
    expect(validateTransactionInput(input(), table)).toBeNull();
  });

  it('reports the first broken rule', () => {
    expect(validateTransactionInput(input({ name: ' ', amount: 0 }), table)).toBe('name is required');
    expect(validateTransactionInput(input({ amount: -5 }), table)).toBe('amount must be greater than 0');
    expect(validateTransactionInput(input({ date: '15/01/2024' }), table)).toBe('date must be YYYY-MM-DD');
  });

  it('only offers current categories for new entries', () => {
    expect(validateTransactionInput(input({ category: 'General' }), table)).toBe(
      'category "General" is not allowed for Incoming',
    );
    expect(validateTransactionInput(input({ type: 'Outgoing', subCategory: 'Help' }), table)).toBe(
      'subCategory "Help" is not allowed',
    );
  });
});

describe('buildRecord', () => {
  it('drops outgoing-only fields from incoming entries', () => {
    const record = buildRecord(
      input({ subCategory: 'Food help', reason: 'gift', address: 'Main St', medical: 'Heart' }),
      table,
      noMember,
    );
    expect(record).toMatchObject({ subCategory: '', medical: '', reason: '', address: '', category: 'Sadaka' });
  });

  it('keeps the medical condition only for medical help', () => {
    const medical = buildRecord(
      input({ type: 'Outgoing', subCategory: 'Medical help', medical: 'Kidney' }),
      table,
      noMember,
    );
    const food = buildRecord(input({ type: 'Outgoing', subCategory: 'Food help', medical: 'Kidney' }), table, noMember);
    expect(medical.medical).toBe('Kidney');
    expect(food.medical).toBe('');
  });

  it('links the record to a registered member by name', () => {
    const record = buildRecord(input(), table, (name) => (name === 'Karim' ? 'member-1' : ''));
    expect(record.memberId).toBe('member-1');
  });

  it('rounds amounts to cents', () => {
    expect(buildRecord(input({ amount: 10.006 }), table, noMember).amount).toBe(10.01);
  });
});

describe('applyFieldEdit', () => {
  it('rejects a medical condition without the medical-help usage', () => {
    const record = makeRecord({ type: 'Outgoing', subCategory: 'Food help' });
    expect(() => applyFieldEdit(record, 'medical', 'Heart', table, noMember)).toThrow(ValidationError);
  });

  it('re-resolves the member when the name changes', () => {
    const record = makeRecord({ name: 'Karim', memberId: 'member-1' });
    const edited = applyFieldEdit(record, 'name', 'Amina', table, (name) => (name === 'Amina' ? 'member-2' : ''));
    expect(edited).toMatchObject({ name: 'Amina', memberId: 'member-2' });
  });

  it('accepts amounts written with thousands separators', () => {
    expect(applyFieldEdit(makeRecord(), 'amount', '1,250.5', table, noMember).amount).toBe(1250.5);
  });
});

describe('coerceRecord', () => {
  it('reads an unparseable amount as 0 and reports it', () => {
    const { record, issues } = coerceRecord({ id: 't1', type: 'incoming', group: 'sister', amount: 'abc' });
    expect(record).toMatchObject({ type: 'Incoming', group: 'Sister', amount: 0 });
    expect(issues).toEqual(['t1: amount "abc" read as 0']);
  });
});
