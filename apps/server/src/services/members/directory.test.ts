import fs from 'node:fs';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ImportError, ValidationError } from '../../errors';
import { makeTempDir, removeDir, silentLogger } from '../../testing/fixtures';
import { EMPTY_PROFILE, loadMemberDirectory, validateRegistration } from './directory';

describe('member directory', () => {
  let dataDir: string;

  beforeEach(() => {
    dataDir = makeTempDir();
  });

  afterEach(() => {
    removeDir(dataDir);
  });

  function load() {
    return loadMemberDirectory({ dataDir, logger: silentLogger() });
  }

  it('requires a name and an email', () => {
    expect(validateRegistration(' ', { email: 'karim@example.org' })).toBe('name is required');
    expect(validateRegistration('Karim', { email: ' ' })).toBe('email is required');
    expect(() => load().register('Karim', { phone: '555-0100' })).toThrow(ValidationError);
  });

  it('persists registrations and reads them back', () => {
    const profile = load().register(' Karim ', { email: 'karim@example.org', group: 'Brother', phone: '555-0100' });
    expect(profile).toMatchObject({ group: 'Brother', email: 'karim@example.org', phone: '555-0100', shortId: '' });

    expect(load().find('Karim')).toEqual(profile);
  });

  it('replaces attributes on re-registration and keeps the id', () => {
    const directory = load();
    const first = directory.register('Karim', { email: 'karim@example.org', phone: '555-0100' });
    const second = directory.register('Karim', { email: 'karim@example.org' });

    expect(second.id).toBe(first.id);
    expect(second.registeredAt).toBe(first.registeredAt);
    expect(second.phone).toBe('');
  });

  it('answers unknown names with an empty profile', () => {
    expect(load().lookup('Nobody')).toEqual(EMPTY_PROFILE);
    expect(load().find('Nobody')).toBeNull();
  });

  it('lists names of a group in code point order', () => {
    const directory = load();
    directory.register('bob', { email: 'b@example.org', group: 'Brother' });
    directory.register('Zed', { email: 'z@example.org', group: 'Brother' });
    directory.register('Alice', { email: 'a@example.org', group: 'Sister' });

    expect(directory.listByGroup('All')).toEqual(['Alice', 'Zed', 'bob']);
    expect(directory.listByGroup('Brother')).toEqual(['Zed', 'bob']);
  });

  it('starts empty from an unreadable file', () => {
    fs.writeFileSync(path.join(dataDir, 'members.json'), '{ not json');
    expect(load().listByGroup('All')).toEqual([]);
  });

  it('merges an imported document', () => {
    const directory = load();
    const karim = directory.register('Karim', { email: 'karim@example.org' });

    const merged = directory.importDocument(
      JSON.stringify({
        Karim: { email: 'new@example.org', group: 'Brother' },
        Amina: { email: 'amina@example.org', group: 'Unknown' },
        Broken: 'not an object',
      }),
    );

    expect(merged).toBe(2);
    expect(directory.lookup('Karim')).toMatchObject({ id: karim.id, email: 'new@example.org', group: 'Brother' });
    expect(directory.lookup('Amina').group).toBe('N/A');
    expect(Object.keys(load().toDocument()).sort()).toEqual(['Amina', 'Karim']);
    expect(() => directory.importDocument('[]')).toThrow(ImportError);
  });
});
