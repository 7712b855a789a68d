import { randomBytes, scryptSync, timingSafeEqual } from 'node:crypto';
import path from 'node:path';
import type { Logger } from '@charity-ledger/shared';
import { createLogger, toErrorMessage } from '@charity-ledger/shared';
import { PersistError, ValidationError } from '../../errors';
import { readTextIfExists, toFileKey, writeTextSync } from '../../utils/files';
import { parseJsonObject } from '../../utils/values';

const HASH_PREFIX = 'scrypt';
const KEY_LENGTH = 32;

export interface CredentialStore {
  readonly file: string;
  readonly adminUsername: string;
  verify: (username: string, password: string) => boolean;
  isAdmin: (username: string) => boolean;
  listUsers: () => string[];
  createUser: (username: string, password: string) => void;
  changePassword: (username: string, password: string) => void;
}

export interface CredentialStoreOptions {
  dataDir: string;
  adminUsername: string;
  adminPassword: string;
  logger?: Logger;
}

export function hashPassword(password: string, salt = randomBytes(16).toString('hex')): string {
  const hash = scryptSync(password, salt, KEY_LENGTH).toString('hex');
  return `${HASH_PREFIX}$${salt}$${hash}`;
}

export function verifyPassword(password: string, stored: string): boolean {
  const [prefix, salt, hash] = stored.split('$');
  if (prefix !== HASH_PREFIX || !salt || !hash) {
    return false;
  }
  const expected = Buffer.from(hash, 'hex');
  const actual = scryptSync(password, salt, KEY_LENGTH);
  return expected.length === actual.length && timingSafeEqual(expected, actual);
}

export function validateCredentials(username: string, password: string): string | null {
  if (!username.trim()) return 'username is required';
  if (!/^[A-Za-z0-9_.-]+$/.test(username.trim())) return 'username may only contain letters, digits, _ . -';
  if (password.length < 6) return 'password must be at least 6 characters';
  return null;
}

export function loadCredentialStore(options: CredentialStoreOptions): CredentialStore {
  const logger = options.logger ?? createLogger('auth');
  const file = path.join(options.dataDir, 'users.json');
  const users = new Map<string, string>();

  const persist = (): void => {
    try {
      writeTextSync(file, `${JSON.stringify(Object.fromEntries(users), null, 2)}\n`);
    } catch (error) {
      logger.error(`write failed for ${file}: ${toErrorMessage(error)}`);
      throw new PersistError(file, error);
    }
  };

  const text = readTextIfExists(file);
  const document = text === null ? null : parseJsonObject(text);
  if (text !== null && !document) {
    logger.warn(`unreadable credential file ${file}, keeping only the default admin`);
  }
  for (const [username, hash] of Object.entries(document ?? {})) {
    if (typeof hash === 'string') {
      users.set(username, hash);
    }
  }

  // The default admin always exists, whatever state the file was in.
  if (!users.has(options.adminUsername)) {
    users.set(options.adminUsername, hashPassword(options.adminPassword));
    persist();
    logger.info(`default admin "${options.adminUsername}" created`);
  }

  return {
    file,
    adminUsername: options.adminUsername,

    verify: (username, password) => {
      const stored = users.get(username.trim());
      return stored ? verifyPassword(password, stored) : false;
    },

    isAdmin: (username) => username === options.adminUsername,

    listUsers: () => [...users.keys()].sort(),

    createUser: (rawUsername, password) => {
      const validationError = validateCredentials(rawUsername, password);
      if (validationError) {
        throw new ValidationError(validationError);
      }
      const username = rawUsername.trim();
      if (users.has(username)) {
        throw new ValidationError(`user "${username}" already exists`);
      }
      // Ledger files are named by file key, so two users may not share one.
      const fileKey = toFileKey(username);
      const clash = [...users.keys()].find((existing) => toFileKey(existing) === fileKey);
      if (clash) {
        throw new ValidationError(`user "${username}" collides with existing user "${clash}"`);
      }
      users.set(username, hashPassword(password));
      persist();
      logger.info(`user "${username}" created`);
    },

    changePassword: (username, password) => {
      if (!users.has(username)) {
        throw new ValidationError(`user "${username}" does not exist`);
      }
      const validationError = validateCredentials(username, password);
      if (validationError) {
        throw new ValidationError(validationError);
      }
      users.set(username, hashPassword(password));
      persist();
    },
  };
}
