import { createLogger, toErrorMessage } from '@charity-ledger/shared';
import { createApp } from './app';
import { loadConfig } from './config';
import { createServices } from './services';

const logger = createLogger('server');

async function startServer(): Promise<void> {
  const config = loadConfig();
  const services = createServices(config);
  const app = createApp(services);

  const pdf = await services.pdf.capability();
  if (!services.mailer.available) {
    logger.warn('SMTP is not configured, member reports cannot be emailed');
  }

  const server = app.listen(config.port, config.host, () => {
    logger.info(`listening on http://${config.host}:${config.port} (data: ${config.dataDir}, pdf: ${pdf.available})`);
  });

  const shutdown = (signal: string) => {
    logger.info(`${signal} received, shutting down`);
    server.close(() => {
      process.exit(0);
    });
  };

  process.on('SIGINT', () => {
    shutdown('SIGINT');
  });
  process.on('SIGTERM', () => {
    shutdown('SIGTERM');
  });
}

void startServer().catch((error: unknown) => {
  logger.error(`failed to start: ${toErrorMessage(error)}`);
  process.exit(1);
});
