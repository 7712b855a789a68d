import type { CategoryTable } from '@charity-ledger/shared';
import type { MemberDirectory } from './members/directory';
import { toFileKey } from '../utils/files';
import { loadForUser, type RecordStore } from './records/store';

// Everything a request needs about one tenant, passed explicitly.
export interface TenantContext {
  username: string;
  records: RecordStore;
  members: MemberDirectory;
  categories: CategoryTable;
  currency: string;
}

export interface TenantRegistryOptions {
  dataDir: string;
  currency: string;
  categories: CategoryTable;
  members: MemberDirectory;
}

export interface TenantRegistry {
  contextFor: (username: string) => TenantContext;
}

// One store per ledger file per process, keyed like the file name.
export function createTenantRegistry(options: TenantRegistryOptions): TenantRegistry {
  const stores = new Map<string, RecordStore>();
  const resolveMemberId = (name: string) => options.members.find(name)?.id ?? '';

  return {
    contextFor: (username) => {
      const key = toFileKey(username);
      let store = stores.get(key);
      if (!store) {
        store = loadForUser(username, {
          dataDir: options.dataDir,
          categories: options.categories,
          resolveMemberId,
        });
        stores.set(key, store);
      }
      return {
        username,
        records: store,
        members: options.members,
        categories: options.categories,
        currency: options.currency,
      };
    },
  };
}
