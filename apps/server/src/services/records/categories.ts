import type { CategoryOptions, CategoryTable, CategoryTag, TransactionType } from '@charity-ledger/shared';
import { DEFAULT_CATEGORY_TABLE, categoryTagForType, createLogger, toErrorMessage } from '@charity-ledger/shared';
import { readTextIfExists } from '../../utils/files';
import { isRecord, parseJsonObject } from '../../utils/values';

const logger = createLogger('categories');

function parseStringList(value: unknown): string[] | null {
  if (!Array.isArray(value)) return null;
  const items = value.filter((item): item is string => typeof item === 'string' && item.trim().length > 0);
  return items.length === value.length ? items.map((item) => item.trim()) : null;
}

function parseOptions(value: unknown, fallback: CategoryOptions): CategoryOptions {
  if (!isRecord(value)) return fallback;

  const values = parseStringList(value.values);
  if (!values || !values.length) return fallback;

  const defaultValue =
    typeof value.defaultValue === 'string' && values.includes(value.defaultValue) ? value.defaultValue : values[0];
  const superseded = parseStringList(value.superseded) ?? [];

  return { values, defaultValue, superseded };
}

// Tags missing from the override keep their built-in list.
export function parseCategoryTable(document: Record<string, unknown>): CategoryTable {
  const source = isRecord(document.lists) ? document.lists : {};
  const defaults = DEFAULT_CATEGORY_TABLE.lists;
  const lists: Record<CategoryTag, CategoryOptions> = {
    incoming: parseOptions(source.incoming, defaults.incoming),
    outgoing: parseOptions(source.outgoing, defaults.outgoing),
    subCategory: parseOptions(source.subCategory, defaults.subCategory),
    medical: parseOptions(source.medical, defaults.medical),
  };

  const medicalSubCategory =
    typeof document.medicalSubCategory === 'string' && document.medicalSubCategory.trim()
      ? document.medicalSubCategory.trim()
      : DEFAULT_CATEGORY_TABLE.medicalSubCategory;

  return { lists, medicalSubCategory };
}

export function loadCategoryTable(file?: string): CategoryTable {
  if (!file) return DEFAULT_CATEGORY_TABLE;

  let text: string | null;
  try {
    text = readTextIfExists(file);
  } catch (error) {
    logger.warn(`cannot read ${file}, using built-in categories: ${toErrorMessage(error)}`);
    return DEFAULT_CATEGORY_TABLE;
  }
  if (text === null) {
    logger.warn(`${file} not found, using built-in categories`);
    return DEFAULT_CATEGORY_TABLE;
  }

  const document = parseJsonObject(text);
  if (!document) {
    logger.warn(`${file} is not a JSON object, using built-in categories`);
    return DEFAULT_CATEGORY_TABLE;
  }
  return parseCategoryTable(document);
}

export function isOffered(table: CategoryTable, tag: CategoryTag, value: string): boolean {
  return table.lists[tag].values.includes(value);
}

export function categoryOptionsFor(table: CategoryTable, type: TransactionType): CategoryOptions {
  return table.lists[categoryTagForType(type)];
}
