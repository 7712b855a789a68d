import nodemailer, { type SendMailOptions } from 'nodemailer';
import type { MemberReportDocument } from '@charity-ledger/shared';
import { createLogger, toErrorMessage } from '@charity-ledger/shared';
import type { SmtpConfig } from '../../config';
import { CapabilityUnavailableError, ValidationError } from '../../errors';
import { formatReport } from '../reporting/formatter';

const logger = createLogger('mailer');

export interface MailTransport {
  sendMail: (options: SendMailOptions) => Promise<unknown>;
}

export interface MemberReportMailInput {
  to: string;
  report: MemberReportDocument;
  pdf: Buffer;
  organizationName: string;
}

export interface MailDeliveryResult {
  email: string;
  success: boolean;
  error?: string;
}

export interface ReportMailer {
  available: boolean;
  sendMemberReport: (input: MemberReportMailInput) => Promise<MailDeliveryResult>;
}

function toAttachmentName(input: MemberReportMailInput): string {
  const base = `${input.report.memberName}-${input.report.year}`.replace(/[^A-Za-z0-9_-]+/g, '_');
  return `${base}-report.pdf`;
}

export function createReportMailer(smtp: SmtpConfig | undefined, transport?: MailTransport): ReportMailer {
  const from = smtp?.from ?? 'reports@localhost';
  const resolved: MailTransport | null =
    transport ??
    (smtp
      ? nodemailer.createTransport({
          host: smtp.host,
          port: smtp.port,
          secure: smtp.port === 465,
          auth: {
            user: smtp.user,
            pass: smtp.pass,
          },
        })
      : null);

  return {
    available: resolved !== null,

    sendMemberReport: async (input) => {
      if (!resolved) {
        throw new CapabilityUnavailableError('mail', 'SMTP is not configured');
      }
      if (!input.to.trim()) {
        throw new ValidationError(`member "${input.report.memberName}" has no email`);
      }

      const formatted = formatReport(input.report, input.organizationName);
      try {
        await resolved.sendMail({
          from,
          to: input.to,
          subject: `[Report] ${formatted.title}`,
          text: formatted.text,
          html: formatted.html,
          attachments: [{ filename: toAttachmentName(input), content: input.pdf, contentType: 'application/pdf' }],
        });
        logger.info(`report for "${input.report.memberName}" sent to ${input.to}`);
        return { email: input.to, success: true };
      } catch (error) {
        logger.error(`report mail to ${input.to} failed: ${toErrorMessage(error)}`);
        return { email: input.to, success: false, error: toErrorMessage(error) };
      }
    },
  };
}
