import type { CategoryTable } from '@charity-ledger/shared';
import type { AppConfig } from '../config';
import { loadCredentialStore, type CredentialStore } from './auth/credentials';
import {
  createConfirmationRegistry,
  createSessionRegistry,
  type ConfirmationRegistry,
  type SessionRegistry,
} from './auth/sessions';
import { createTenantRegistry, type TenantRegistry } from './context';
import { loadMemberDirectory, type MemberDirectory } from './members/directory';
import { createReportMailer, type MailTransport, type ReportMailer } from './members/mailer';
import { loadCategoryTable } from './records/categories';
import { createPdfService, type PdfEngineLoader, type PdfService } from './reporting/pdf';

export interface AppServices {
  config: AppConfig;
  categories: CategoryTable;
  members: MemberDirectory;
  tenants: TenantRegistry;
  credentials: CredentialStore;
  sessions: SessionRegistry;
  confirmations: ConfirmationRegistry;
  pdf: PdfService;
  mailer: ReportMailer;
}

export interface ServiceOverrides {
  pdfEngine?: PdfEngineLoader;
  mailTransport?: MailTransport;
  now?: () => number;
}

export function createServices(config: AppConfig, overrides: ServiceOverrides = {}): AppServices {
  const categories = loadCategoryTable(config.categoriesFile);
  const members = loadMemberDirectory({ dataDir: config.dataDir });
  const tenants = createTenantRegistry({
    dataDir: config.dataDir,
    currency: config.currency,
    categories,
    members,
  });

  return {
    config,
    categories,
    members,
    tenants,
    credentials: loadCredentialStore({
      dataDir: config.dataDir,
      adminUsername: config.adminUsername,
      adminPassword: config.adminPassword,
    }),
    sessions: createSessionRegistry({
      ttlMinutes: config.sessionTtlMinutes,
      contextFor: tenants.contextFor,
      now: overrides.now,
    }),
    confirmations: createConfirmationRegistry(config.confirmTtlSeconds, overrides.now),
    pdf: createPdfService({ loadEngine: overrides.pdfEngine, fontFile: config.reportFontFile }),
    mailer: createReportMailer(config.smtp, overrides.mailTransport),
  };
}
