import fs from 'node:fs';
import path from 'node:path';

export function ensureDirectory(directory: string): void {
  fs.mkdirSync(directory, { recursive: true });
}

export function readTextIfExists(file: string): string | null {
  if (!fs.existsSync(file)) {
    return null;
  }
  return fs.readFileSync(file, 'utf8');
}

// The write is the commit point of a mutation.
export function writeTextSync(file: string, content: string): void {
  ensureDirectory(path.dirname(file));
  fs.writeFileSync(file, content, 'utf8');
}

// Tenant names end up in file names.
export function toFileKey(value: string): string {
  return value.trim().toLowerCase().replace(/[^a-z0-9_-]+/g, '_') || 'default';
}

export function readBase64IfExists(file: string): string | null {
  if (!fs.existsSync(file)) {
    return null;
  }
  return fs.readFileSync(file).toString('base64');
}
