import pino, { type Logger } from 'pino';

export type { Logger };

const isTest = process.env.NODE_ENV === 'test';

export const logger: Logger = pino({
  name: 'library-index',
  level: process.env.LOG_LEVEL || (isTest ? 'error' : 'info'),
});

/** Logger bound to one component, e.g. `createLogger('LibraryIndexService')`. */
export function createLogger(component: string): Logger {
  return logger.child({ component });
}
