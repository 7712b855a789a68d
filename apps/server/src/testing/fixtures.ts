import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import type { Logger, TransactionRecord } from '@charity-ledger/shared';
import { vi } from 'vitest';

export function makeTempDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), 'charity-ledger-'));
}

export function removeDir(directory: string): void {
  fs.rmSync(directory, { recursive: true, force: true });
}

export function silentLogger(): Logger {
  return { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() };
}

let sequence = 0;

export function makeRecord(overrides: Partial<TransactionRecord> = {}): TransactionRecord {
  sequence += 1;
  const date = overrides.date ?? '2024-01-10';
  return {
    id: `rec-${sequence}`,
    date,
    year: Number(date.slice(0, 4)),
    month: Number(date.slice(5, 7)),
    type: 'Incoming',
    group: 'N/A',
    category: 'Zakat',
    subCategory: '',
    medical: '',
    name: 'Karim',
    memberId: '',
    address: '',
    reason: '',
    responsible: '',
    amount: 0,
    ...overrides,
  };
}
