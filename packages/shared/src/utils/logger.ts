import { formatDate, formatTime } from './date';

export type LogLevel = 'info' | 'warn' | 'error' | 'debug';

function formatLog(level: LogLevel, source: string, message: string): string {
  const now = new Date();
  const timestamp = `${formatDate(now)} ${formatTime(now)}`;
  return `[${timestamp}] [${level.toUpperCase()}] [${source}] ${message}`;
}

export type Logger = ReturnType<typeof createLogger>;

// One logger per module, named by source
export function createLogger(source: string) {
  return {
    info: (message: string) => {
      console.log(formatLog('info', source, message));
    },
    warn: (message: string) => {
      console.warn(formatLog('warn', source, message));
    },
    error: (message: string) => {
      console.error(formatLog('error', source, message));
    },
    debug: (message: string) => {
      if (process.env.NODE_ENV !== 'production') {
        console.debug(formatLog('debug', source, message));
      }
    },
  };
}

export function toErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
