import { Router, type Request, type Response } from 'express';
import type { AppServices } from '../../services';
import { asString, isRecord } from '../../utils/values';
import { readBearerToken, requireAdmin, requireSession, sessionOf } from '../middleware/auth';

function readCredentials(body: unknown): { username: string; password: string } | null {
  if (!isRecord(body)) return null;
  const username = asString(body.username);
  const password = typeof body.password === 'string' ? body.password : null;
  return username && password ? { username, password } : null;
}

export function createAuthRouter(services: AppServices): Router {
  const router = Router();
  const { credentials, sessions } = services;

  router.post('/login', (req: Request, res: Response) => {
    const submitted = readCredentials(req.body);
    if (!submitted || !credentials.verify(submitted.username, submitted.password)) {
      res.status(401).json({ message: 'Invalid username or password' });
      return;
    }

    const session = sessions.open(submitted.username, credentials.isAdmin(submitted.username));
    res.status(200).json(session.info);
  });

  router.use(requireSession(sessions));

  router.post('/logout', (req: Request, res: Response) => {
    const token = readBearerToken(req.headers.authorization);
    if (token) sessions.close(token);
    res.status(204).send();
  });

  router.get('/me', (req: Request, res: Response) => {
    const { info } = sessionOf(req);
    res.status(200).json({ username: info.username, isAdmin: info.isAdmin, expiresAt: info.expiresAt });
  });

  router.post('/password', (req: Request, res: Response) => {
    const body: Record<string, unknown> = isRecord(req.body) ? req.body : {};
    const current = typeof body.currentPassword === 'string' ? body.currentPassword : '';
    const replacement = typeof body.newPassword === 'string' ? body.newPassword : '';
    const { username } = sessionOf(req).info;
    if (!credentials.verify(username, current)) {
      res.status(401).json({ message: 'Current password is wrong' });
      return;
    }

    credentials.changePassword(username, replacement);
    res.status(204).send();
  });

  router.get('/users', requireAdmin, (_req: Request, res: Response) => {
    res.status(200).json({ users: credentials.listUsers() });
  });

  router.post('/users', requireAdmin, (req: Request, res: Response) => {
    const body: Record<string, unknown> = isRecord(req.body) ? req.body : {};
    const username = typeof body.username === 'string' ? body.username : '';
    const password = typeof body.password === 'string' ? body.password : '';
    credentials.createUser(username, password);
    res.status(201).json({ username: username.trim() });
  });

  return router;
}
