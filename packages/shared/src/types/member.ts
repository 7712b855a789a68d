import type { MemberGroup } from './transaction';

// A registered contributor. The directory is keyed by full name;
// id is generated once and survives re-registration under the same name.
export interface MemberProfile {
  id: string;
  shortId: string;                 // optional short reference, '' when unset
  group: MemberGroup;
  phone: string;
  email: string;
  address: string;
  registeredAt: string;            // ISO 8601
}

export type MemberAttributes = Partial<Omit<MemberProfile, 'id' | 'registeredAt'>>;

// Whole persisted document: name -> profile
export type MemberDocument = Record<string, MemberProfile>;
