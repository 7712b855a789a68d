import { randomUUID } from 'node:crypto';
import path from 'node:path';
import type { GroupFilter, Logger, MemberAttributes, MemberDocument, MemberProfile } from '@charity-ledger/shared';
import { DEFAULT_GROUP, createLogger, toErrorMessage } from '@charity-ledger/shared';
import { ImportError, PersistError, ValidationError } from '../../errors';
import { readTextIfExists, writeTextSync } from '../../utils/files';
import { asText, isMemberGroup, isRecord, parseJsonObject } from '../../utils/values';

export interface MemberDirectory {
  readonly file: string;
  register: (name: string, attributes: MemberAttributes) => MemberProfile;
  lookup: (name: string) => MemberProfile;
  find: (name: string) => MemberProfile | null;
  listByGroup: (group: GroupFilter) => string[];
  importDocument: (text: string) => number;
  mergeDocument: (document: Record<string, unknown>) => number;
  toDocument: () => MemberDocument;
}

export interface MemberDirectoryOptions {
  dataDir: string;
  logger?: Logger;
}

export const EMPTY_PROFILE: MemberProfile = {
  id: '',
  shortId: '',
  group: DEFAULT_GROUP,
  phone: '',
  email: '',
  address: '',
  registeredAt: '',
};

export function validateRegistration(name: string, attributes: MemberAttributes): string | null {
  if (!name.trim()) return 'name is required';
  if (!attributes.email?.trim()) return 'email is required';
  if (attributes.group !== undefined && !isMemberGroup(attributes.group)) return 'group is invalid';
  return null;
}

function toProfile(value: Record<string, unknown>, existing: MemberProfile | undefined, now: string): MemberProfile {
  return {
    id: existing?.id || asText(value.id) || randomUUID(),
    shortId: asText(value.shortId),
    group: isMemberGroup(value.group) ? value.group : DEFAULT_GROUP,
    phone: asText(value.phone),
    email: asText(value.email),
    address: asText(value.address),
    registeredAt: existing?.registeredAt || asText(value.registeredAt) || now,
  };
}

function byCodePoint(a: string, b: string): number {
  if (a < b) return -1;
  return a > b ? 1 : 0;
}

export function loadMemberDirectory(options: MemberDirectoryOptions): MemberDirectory {
  const logger = options.logger ?? createLogger('members');
  const file = path.join(options.dataDir, 'members.json');
  const members = new Map<string, MemberProfile>();

  const persist = (): void => {
    const document: MemberDocument = Object.fromEntries(members);
    try {
      writeTextSync(file, `${JSON.stringify(document, null, 2)}\n`);
    } catch (error) {
      logger.error(`write failed for ${file}: ${toErrorMessage(error)}`);
      throw new PersistError(file, error);
    }
  };

  const merge = (document: Record<string, unknown>): number => {
    const now = new Date().toISOString();
    let count = 0;
    for (const [rawName, value] of Object.entries(document)) {
      const name = rawName.trim();
      if (!name || !isRecord(value)) continue;
      members.set(name, toProfile(value, members.get(name), now));
      count += 1;
    }
    return count;
  };

  const mergeAndPersist = (document: Record<string, unknown>): number => {
    const count = merge(document);
    persist();
    logger.info(`merged ${count} members from import`);
    return count;
  };

  const text = readTextIfExists(file);
  if (text !== null) {
    const document = parseJsonObject(text);
    if (document) {
      merge(document);
    } else {
      logger.warn(`unreadable member file ${file}, starting with an empty directory`);
    }
  }

  return {
    file,

    register: (rawName, attributes) => {
      const validationError = validateRegistration(rawName, attributes);
      if (validationError) {
        throw new ValidationError(validationError);
      }

      const name = rawName.trim();
      const existing = members.get(name);
      const profile: MemberProfile = {
        id: existing?.id ?? randomUUID(),
        shortId: attributes.shortId?.trim() ?? '',
        group: attributes.group ?? DEFAULT_GROUP,
        phone: attributes.phone?.trim() ?? '',
        email: attributes.email?.trim() ?? '',
        address: attributes.address?.trim() ?? '',
        registeredAt: existing?.registeredAt ?? new Date().toISOString(),
      };

      members.set(name, profile);
      persist();
      if (existing) {
        logger.info(`member "${name}" re-registered, previous attributes replaced`);
      }
      return { ...profile };
    },

    lookup: (name) => {
      const profile = members.get(name.trim());
      return profile ? { ...profile } : { ...EMPTY_PROFILE };
    },

    find: (name) => {
      const profile = members.get(name.trim());
      return profile ? { ...profile } : null;
    },

    listByGroup: (group) =>
      [...members.entries()]
        .filter(([, profile]) => group === 'All' || profile.group === group)
        .map(([name]) => name)
        .sort(byCodePoint),

    importDocument: (documentText) => {
      const document = parseJsonObject(documentText);
      if (!document) {
        throw new ImportError('member file must be a JSON object keyed by name');
      }
      return mergeAndPersist(document);
    },

    mergeDocument: (document) => mergeAndPersist(document),

    toDocument: () => Object.fromEntries([...members.entries()].map(([name, profile]) => [name, { ...profile }])),
  };
}
