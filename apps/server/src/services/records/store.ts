import { createHash, randomUUID } from 'node:crypto';
import path from 'node:path';
import type {
  CategoryTable,
  EditableTransactionField,
  Logger,
  TransactionInput,
  TransactionRecord,
} from '@charity-ledger/shared';
import { createLogger, toErrorMessage } from '@charity-ledger/shared';
import { ImportError, PersistError, RevisionConflictError } from '../../errors';
import { readTextIfExists, toFileKey, writeTextSync } from '../../utils/files';
import { parseTransactionCsv, serializeTransactions } from './csv';
import { applyFieldEdit, buildRecord, coerceRecord, type MemberIdResolver } from './validation';

export interface StoreSnapshot {
  records: TransactionRecord[];
  // Only full reads carry one; replaceAll checks it.
  revision: string;
}

export interface RecordStore {
  readonly userKey: string;
  readonly file: string;
  readAll: () => StoreSnapshot;
  revision: () => string;
  append: (input: TransactionInput) => TransactionRecord;
  replaceAll: (records: TransactionRecord[], revision: string | null) => StoreSnapshot;
  updateField: (id: string, field: EditableTransactionField, value: unknown) => TransactionRecord | null;
  delete: (id: string) => boolean;
  importCsv: (text: string) => StoreSnapshot;
  exportCsv: (records?: TransactionRecord[]) => string;
  clear: () => void;
}

export interface RecordStoreOptions {
  dataDir: string;
  categories: CategoryTable;
  resolveMemberId?: MemberIdResolver;
  logger?: Logger;
}

export function transactionFileFor(dataDir: string, userKey: string): string {
  return path.join(dataDir, `transactions_${toFileKey(userKey)}.csv`);
}

function hashContent(content: string): string {
  return createHash('sha256').update(content).digest('hex').slice(0, 16);
}

// Later copies of an ID get a fresh one, so edits and deletes reach every row.
function withUniqueIds(input: TransactionRecord[], logger: Logger) {
  const seen = new Set<string>();
  let reassigned = 0;
  const records = input.map((record) => {
    if (!seen.has(record.id)) {
      seen.add(record.id);
      return { ...record };
    }
    const id = randomUUID();
    seen.add(id);
    reassigned += 1;
    logger.warn(`duplicate transaction id ${record.id}, assigned ${id}`);
    return { ...record, id };
  });
  return { records, reassigned };
}

function coerceRows(rows: Record<string, unknown>[], logger: Logger) {
  const coerced: TransactionRecord[] = [];
  let assignedIds = 0;
  for (const row of rows) {
    const result = coerceRecord(row);
    for (const issue of result.issues) {
      logger.warn(issue);
    }
    if (result.idAssigned) assignedIds += 1;
    coerced.push(result.record);
  }
  const unique = withUniqueIds(coerced, logger);
  return { records: unique.records, assignedIds: assignedIds + unique.reassigned };
}

export function loadForUser(userKey: string, options: RecordStoreOptions): RecordStore {
  const logger = options.logger ?? createLogger('records');
  const file = transactionFileFor(options.dataDir, userKey);
  const resolveMemberId: MemberIdResolver = options.resolveMemberId ?? (() => '');

  let records: TransactionRecord[] = [];
  let currentRevision = hashContent(serializeTransactions([]));

  const persist = (): void => {
    const content = serializeTransactions(records);
    currentRevision = hashContent(content);
    try {
      writeTextSync(file, content);
    } catch (error) {
      logger.error(`write failed for ${file}: ${toErrorMessage(error)}`);
      throw new PersistError(file, error);
    }
  };

  const snapshot = (): StoreSnapshot => ({ records: records.map((record) => ({ ...record })), revision: currentRevision });

  const load = (): void => {
    const text = readTextIfExists(file);
    if (text === null) {
      logger.debug(`no transaction file for ${userKey}, starting empty`);
      return;
    }

    let parsed: ReturnType<typeof parseTransactionCsv>;
    try {
      parsed = parseTransactionCsv(text);
    } catch (error) {
      // A damaged file reads as an empty ledger; the next write replaces it.
      logger.warn(`unreadable transaction file ${file}, loading empty: ${toErrorMessage(error)}`);
      return;
    }

    const coerced = coerceRows(parsed.rows, logger);
    records = coerced.records;
    currentRevision = hashContent(serializeTransactions(records));

    if (parsed.missingColumns.length || coerced.assignedIds) {
      logger.info(
        `repairing ${file}: added columns [${parsed.missingColumns.join(', ')}], assigned ${coerced.assignedIds} ids`,
      );
      persist();
    }
  };

  load();

  return {
    userKey,
    file,
    readAll: snapshot,
    revision: () => currentRevision,

    append: (input) => {
      const record = buildRecord(input, options.categories, resolveMemberId);
      records.push(record);
      persist();
      return { ...record };
    },

    replaceAll: (replacement, revision) => {
      if (revision !== currentRevision) {
        throw new RevisionConflictError(currentRevision, revision);
      }
      records = withUniqueIds(replacement, logger).records;
      persist();
      return snapshot();
    },

    updateField: (id, field, value) => {
      const index = records.findIndex((record) => record.id === id);
      if (index === -1) {
        return null;
      }
      const updated = applyFieldEdit(records[index], field, value, options.categories, resolveMemberId);
      records[index] = updated;
      persist();
      return { ...updated };
    },

    delete: (id) => {
      const index = records.findIndex((record) => record.id === id);
      if (index === -1) {
        return false;
      }
      records.splice(index, 1);
      persist();
      return true;
    },

    importCsv: (text) => {
      const parsed = parseTransactionCsv(text);
      if (!parsed.rows.length) {
        throw new ImportError('CSV contains no transactions');
      }
      records = coerceRows(parsed.rows, logger).records;
      persist();
      logger.info(`imported ${records.length} transactions for ${userKey}`);
      return snapshot();
    },

    exportCsv: (subset) => serializeTransactions(subset ?? records),

    clear: () => {
      records = [];
      persist();
      logger.warn(`all transactions cleared for ${userKey}`);
    },
  };
}
