import { randomBytes } from 'node:crypto';
import type { ConfirmationTicket, SessionInfo } from '@charity-ledger/shared';
import type { TenantContext } from '../context';

export interface Session {
  info: SessionInfo;
  context: TenantContext;
}

export interface SessionRegistry {
  open: (username: string, isAdmin: boolean) => Session;
  resolve: (token: string) => Session | null;
  close: (token: string) => boolean;
  size: () => number;
}

export interface SessionRegistryOptions {
  ttlMinutes: number;
  contextFor: (username: string) => TenantContext;
  now?: () => number;
}

function newToken(): string {
  return randomBytes(24).toString('hex');
}

export function createSessionRegistry(options: SessionRegistryOptions): SessionRegistry {
  const now = options.now ?? Date.now;
  const sessions = new Map<string, Session>();
  const ttlMs = options.ttlMinutes * 60_000;
  const isExpired = (session: Session) => Date.parse(session.info.expiresAt) <= now();

  return {
    open: (username, isAdmin) => {
      for (const [token, session] of sessions) {
        if (isExpired(session)) sessions.delete(token);
      }
      const token = newToken();
      const session: Session = {
        info: { token, username, isAdmin, expiresAt: new Date(now() + ttlMs).toISOString() },
        context: options.contextFor(username),
      };
      sessions.set(token, session);
      return session;
    },

    resolve: (token) => {
      const session = sessions.get(token);
      if (!session) {
        return null;
      }
      if (isExpired(session)) {
        sessions.delete(token);
        return null;
      }
      return session;
    },

    close: (token) => sessions.delete(token),

    size: () => sessions.size,
  };
}

// ── Two-step confirmation for irreversible actions ──

export interface ConfirmationRegistry {
  request: (username: string, action: ConfirmationTicket['action']) => ConfirmationTicket;
  consume: (username: string, action: ConfirmationTicket['action'], token: string) => boolean;
  size: () => number;
}

export function createConfirmationRegistry(ttlSeconds: number, now: () => number = Date.now): ConfirmationRegistry {
  const pending = new Map<string, ConfirmationTicket & { username: string }>();
  const isExpired = (ticket: ConfirmationTicket) => Date.parse(ticket.expiresAt) <= now();

  return {
    request: (username, action) => {
      // Tickets nobody came back for.
      for (const [token, ticket] of pending) {
        if (isExpired(ticket)) pending.delete(token);
      }
      const ticket: ConfirmationTicket = {
        token: newToken(),
        action,
        expiresAt: new Date(now() + ttlSeconds * 1000).toISOString(),
      };
      pending.set(ticket.token, { ...ticket, username });
      return ticket;
    },

    // One use only, by the user who asked, for the action asked.
    consume: (username, action, token) => {
      const ticket = pending.get(token);
      if (!ticket) {
        return false;
      }
      pending.delete(token);
      return ticket.username === username && ticket.action === action && !isExpired(ticket);
    },

    size: () => pending.size,
  };
}
