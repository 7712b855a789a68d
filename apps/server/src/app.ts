import express from 'express';
import { requireSession } from './api/middleware/auth';
import { handleErrors } from './api/middleware/errors';
import { createAuthRouter } from './api/routes/auth';
import { createMembersRouter } from './api/routes/members';
import { createReportsRouter } from './api/routes/reports';
import { createTransactionsRouter } from './api/routes/transactions';
import type { AppServices } from './services';

export function createApp(services: AppServices): express.Express {
  const app = express();

  app.use(express.json({ limit: '5mb' }));
  app.use(express.text({ type: ['text/csv', 'text/plain'], limit: '5mb' }));

  app.get('/', (_req, res) => {
    res.json({
      service: 'charity-ledger-server',
      organization: services.config.organizationName,
      status: 'ok',
      timestamp: new Date().toISOString(),
    });
  });

  app.get('/health', async (_req, res) => {
    const pdf = await services.pdf.capability();
    res.status(200).json({
      status: 'ok',
      pdf: pdf.available,
      mail: services.mailer.available,
      sessions: services.sessions.size(),
    });
  });

  const authenticated = requireSession(services.sessions);

  app.use('/api/auth', createAuthRouter(services));
  app.use('/api/transactions', authenticated, createTransactionsRouter(services));
  app.use('/api/members', authenticated, createMembersRouter(services));
  app.use('/api/reports', authenticated, createReportsRouter(services));

  app.use(handleErrors);

  return app;
}
