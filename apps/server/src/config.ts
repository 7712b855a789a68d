import path from 'node:path';
import { config as loadEnv } from 'dotenv';
import {
  DEFAULT_CONFIRM_TTL_SECONDS,
  DEFAULT_CURRENCY,
  DEFAULT_SESSION_TTL_MINUTES,
} from '@charity-ledger/shared';

loadEnv();

export interface SmtpConfig {
  host: string;
  port: number;
  user: string;
  pass: string;
  from: string;
}

export interface AppConfig {
  port: number;
  host: string;
  dataDir: string;
  currency: string;
  organizationName: string;
  adminUsername: string;
  adminPassword: string;
  sessionTtlMinutes: number;
  confirmTtlSeconds: number;
  categoriesFile?: string;
  // TrueType font for report text beyond Latin-1.
  reportFontFile?: string;
  smtp?: SmtpConfig;
}

type Env = Record<string, string | undefined>;

function readString(env: Env, name: string): string | undefined {
  const value = env[name];
  return value && value.trim() ? value.trim() : undefined;
}

function readNumber(env: Env, name: string, fallback: number): number {
  const raw = readString(env, name);
  if (raw === undefined) return fallback;
  const parsed = Number(raw);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

// SMTP is all-or-nothing: a partial configuration disables mail.
function readSmtp(env: Env): SmtpConfig | undefined {
  const host = readString(env, 'SMTP_HOST');
  const user = readString(env, 'SMTP_USER');
  const pass = readString(env, 'SMTP_PASS');
  const from = readString(env, 'MAIL_FROM');
  if (!host || !user || !pass || !from) {
    return undefined;
  }
  return { host, port: readNumber(env, 'SMTP_PORT', 587), user, pass, from };
}

export function loadConfig(env: Env = process.env): AppConfig {
  const categoriesFile = readString(env, 'CATEGORIES_FILE');
  const reportFontFile = readString(env, 'REPORT_FONT_FILE');
  return {
    port: readNumber(env, 'PORT', 3000),
    host: readString(env, 'HOST') ?? '0.0.0.0',
    dataDir: path.resolve(process.cwd(), readString(env, 'DATA_DIR') ?? './data'),
    currency: env.CURRENCY ?? DEFAULT_CURRENCY,
    organizationName: readString(env, 'ORGANIZATION_NAME') ?? 'Charity Fund',
    adminUsername: readString(env, 'ADMIN_USERNAME') ?? 'admin',
    adminPassword: readString(env, 'ADMIN_PASSWORD') ?? 'admin123',
    sessionTtlMinutes: readNumber(env, 'SESSION_TTL_MINUTES', DEFAULT_SESSION_TTL_MINUTES),
    confirmTtlSeconds: readNumber(env, 'CONFIRM_TTL_SECONDS', DEFAULT_CONFIRM_TTL_SECONDS),
    categoriesFile: categoriesFile ? path.resolve(process.cwd(), categoriesFile) : undefined,
    reportFontFile: reportFontFile ? path.resolve(process.cwd(), reportFontFile) : undefined,
    smtp: readSmtp(env),
  };
}
