import Papa from 'papaparse';
import type { TransactionRecord } from '@charity-ledger/shared';
import { ImportError } from '../../errors';

export const TRANSACTION_COLUMNS = [
  'ID',
  'Date',
  'Year',
  'Month',
  'Type',
  'Group',
  'Category',
  'SubCategory',
  'Medical',
  'Name',
  'MemberId',
  'Address',
  'Reason',
  'Responsible',
  'Amount',
] as const;

export type TransactionColumn = (typeof TRANSACTION_COLUMNS)[number];

export const COLUMN_FIELDS: Record<TransactionColumn, keyof TransactionRecord> = {
  ID: 'id',
  Date: 'date',
  Year: 'year',
  Month: 'month',
  Type: 'type',
  Group: 'group',
  Category: 'category',
  SubCategory: 'subCategory',
  Medical: 'medical',
  Name: 'name',
  MemberId: 'memberId',
  Address: 'address',
  Reason: 'reason',
  Responsible: 'responsible',
  Amount: 'amount',
};

export interface ParsedTransactionCsv {
  // Rows keyed by field name; columns the file lacks are ''.
  rows: Record<string, string>[];
  missingColumns: TransactionColumn[];
}

type CsvRow = Record<string, string | undefined>;

export function parseTransactionCsv(text: string): ParsedTransactionCsv {
  if (!text.trim()) {
    return { rows: [], missingColumns: [] };
  }

  const result = Papa.parse<CsvRow>(text, {
    header: true,
    delimiter: ',',
    skipEmptyLines: true,
    transformHeader: (header) => header.trim(),
  });

  const fatal = result.errors.find((error) => error.type === 'Quotes' || error.code === 'TooManyFields');
  if (fatal) {
    throw new ImportError(`malformed CSV at row ${fatal.row ?? '?'}: ${fatal.message}`);
  }

  const fields = result.meta.fields ?? [];
  const missingColumns = TRANSACTION_COLUMNS.filter((column) => !fields.includes(column));
  if (missingColumns.length === TRANSACTION_COLUMNS.length) {
    throw new ImportError('CSV has none of the transaction columns');
  }

  const rows = result.data.map((row) => {
    const mapped: Record<string, string> = {};
    for (const column of TRANSACTION_COLUMNS) {
      mapped[COLUMN_FIELDS[column]] = (row[column] ?? '').trim();
    }
    return mapped;
  });

  return { rows, missingColumns };
}

function toCell(record: TransactionRecord, column: TransactionColumn): string {
  const value = record[COLUMN_FIELDS[column]];
  return typeof value === 'number' ? String(value) : value;
}

export function serializeTransactions(records: TransactionRecord[]): string {
  return Papa.unparse(
    {
      fields: [...TRANSACTION_COLUMNS],
      data: records.map((record) => TRANSACTION_COLUMNS.map((column) => toCell(record, column))),
    },
    { newline: '\n' },
  );
}

export function serializeRows(rows: string[][]): string {
  return Papa.unparse(rows, { newline: '\n' });
}
