// ── Transaction classification ──

export type TransactionType =
  | 'Incoming'       // money received into a fund
  | 'Outgoing';      // money disbursed from a fund

export type MemberGroup =
  | 'Brother'
  | 'Sister'
  | 'N/A';

export type GroupFilter = MemberGroup | 'All';

// One logged movement of money.
// year and month are always derived from date.
export interface TransactionRecord {
  id: string;
  date: string;                    // calendar day, YYYY-MM-DD
  year: number;
  month: number;                   // 1-12

  type: TransactionType;           // fixed at creation
  group: MemberGroup;
  category: string;                // fund label
  subCategory: string;             // outgoing usage, '' for incoming
  medical: string;                 // only with the medical-help sub-category

  name: string;                    // donor or beneficiary
  memberId: string;                // '' when the name is not a registered member
  address: string;
  reason: string;
  responsible: string;

  amount: number;
}

// Form submission before an id and the derived fields exist.
export interface TransactionInput {
  date: string;
  type: TransactionType;
  group?: MemberGroup;
  category?: string;
  subCategory?: string;
  medical?: string;
  name: string;
  address?: string;
  reason?: string;
  responsible?: string;
  amount: number;
}

export type EditableTransactionField =
  | 'date'
  | 'group'
  | 'category'
  | 'subCategory'
  | 'medical'
  | 'name'
  | 'address'
  | 'reason'
  | 'responsible'
  | 'amount';

export interface TransactionFilter {
  type?: TransactionType;
  year?: number;
  month?: number;
  group?: GroupFilter;
  category?: string;
  name?: string;
  search?: string;
}
