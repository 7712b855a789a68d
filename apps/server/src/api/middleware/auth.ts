import type { NextFunction, Request, RequestHandler, Response } from 'express';
import type { Session, SessionRegistry } from '../../services/auth/sessions';

const BEARER_PREFIX = 'Bearer ';

const attached = new WeakMap<Request, Session>();

export function readBearerToken(authorization?: string): string | null {
  if (!authorization || !authorization.startsWith(BEARER_PREFIX)) {
    return null;
  }
  return authorization.slice(BEARER_PREFIX.length).trim() || null;
}

export function requireSession(sessions: SessionRegistry): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    const token = readBearerToken(req.headers.authorization);
    const session = token ? sessions.resolve(token) : null;
    if (!session) {
      res.status(401).json({ message: 'Unauthorized' });
      return;
    }

    attached.set(req, session);
    next();
  };
}

export function requireAdmin(req: Request, res: Response, next: NextFunction): void {
  if (!attached.get(req)?.info.isAdmin) {
    res.status(403).json({ message: 'Admin only' });
    return;
  }
  next();
}

// Only valid behind requireSession.
export function sessionOf(req: Request): Session {
  const session = attached.get(req);
  if (!session) {
    throw new Error('sessionOf called on a route without requireSession');
  }
  return session;
}
