import type { MemberGroup, TransactionType } from '../types/transaction';

// ── Transaction classification ──

export const TRANSACTION_TYPES: TransactionType[] = ['Incoming', 'Outgoing'];

export const MEMBER_GROUPS: MemberGroup[] = ['Brother', 'Sister', 'N/A'];

export const DEFAULT_GROUP: MemberGroup = 'N/A';

export const MONTH_NAMES = [
  'January',
  'February',
  'March',
  'April',
  'May',
  'June',
  'July',
  'August',
  'September',
  'October',
  'November',
  'December',
] as const;

// ── Category configuration ──

export type CategoryTag =
  | 'incoming'        // fund an income is credited to
  | 'outgoing'        // fund a disbursement is paid from
  | 'subCategory'     // what a disbursement was used for
  | 'medical';        // condition for medical-help disbursements

export interface CategoryOptions {
  values: string[];                // offered for new entries, canonical order
  defaultValue: string;
  superseded: string[];            // accepted on read, never offered
}

export interface CategoryTable {
  lists: Record<CategoryTag, CategoryOptions>;
  medicalSubCategory: string;      // sub-category that unlocks the medical field
}

const FUNDS = ['Zakat', 'Sadaka', 'Lillah', 'Fitra', 'Donation', 'Monthly Fee'];

export const DEFAULT_CATEGORY_TABLE: CategoryTable = {
  lists: {
    incoming: {
      values: FUNDS,
      defaultValue: 'Sadaka',
      superseded: ['General', 'Membership'],
    },
    outgoing: {
      values: FUNDS,
      defaultValue: 'Sadaka',
      superseded: ['Medical', 'Education', 'Food'],
    },
    subCategory: {
      values: [
        'Medical help',
        'Education help',
        'Food help',
        'Housing help',
        'Marriage help',
        'Emergency relief',
        'Other',
      ],
      defaultValue: 'Other',
      superseded: ['Medical', 'Help'],
    },
    medical: {
      values: ['Heart', 'Cancer', 'Kidney', 'Liver', 'Surgery', 'Maternity', 'Eye', 'Other'],
      defaultValue: 'Other',
      superseded: [],
    },
  },
  medicalSubCategory: 'Medical help',
};

export function categoryTagForType(type: TransactionType): CategoryTag {
  return type === 'Incoming' ? 'incoming' : 'outgoing';
}

// ── Defaults ──

export const DEFAULT_CURRENCY = 'Tk ';
export const DEFAULT_SESSION_TTL_MINUTES = 12 * 60;
export const DEFAULT_CONFIRM_TTL_SECONDS = 120;
