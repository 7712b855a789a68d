import type { NextFunction, Request, Response } from 'express';
import { createLogger, toErrorMessage } from '@charity-ledger/shared';
import { RevisionConflictError, isLedgerError } from '../../errors';
import { isRecord } from '../../utils/values';

const logger = createLogger('http');

// body-parser failures carry a 4xx status of their own.
function clientStatusOf(error: unknown): number | null {
  if (!isRecord(error) || typeof error.status !== 'number') return null;
  return error.status >= 400 && error.status < 500 ? error.status : null;
}

export function handleErrors(error: unknown, req: Request, res: Response, next: NextFunction): void {
  if (res.headersSent) {
    next(error);
    return;
  }

  if (error instanceof RevisionConflictError) {
    res.status(error.status).json({ message: error.message, revision: error.expected });
    return;
  }

  if (isLedgerError(error)) {
    if (error.status >= 500) {
      logger.error(`${req.method} ${req.originalUrl}: ${error.message}`);
    }
    res.status(error.status).json({ message: error.message });
    return;
  }

  const clientStatus = clientStatusOf(error);
  if (clientStatus) {
    res.status(clientStatus).json({ message: toErrorMessage(error) });
    return;
  }

  logger.error(`${req.method} ${req.originalUrl} failed: ${toErrorMessage(error)}`);
  res.status(500).json({ message: 'Internal server error' });
}
