import { createLogger, type Logger } from '../../utils/logger';
import { ServiceError } from './ServiceError';

type LogContext = Record<string, unknown>;

/**
 * Common base for services: holds injected dependencies, a component-scoped
 * logger, and the `execute` wrapper every public operation runs through.
 */
export abstract class BaseService<TDeps extends object = Record<string, never>> {
  protected readonly logger: Logger;

  protected constructor(
    protected readonly serviceName: string,
    protected readonly deps: TDeps
  ) {
    this.logger = createLogger(serviceName);
  }

  /**
   * Run one public operation. Failures are logged with `context` and rethrown
   * unchanged; expected service errors (missing records, bad input) log at warn.
   */
  protected async execute<T>(operation: string, fn: () => Promise<T>, context: LogContext = {}): Promise<T> {
    const startedAt = Date.now();
    this.logDebug(`${operation} started`, context);
    try {
      const result = await fn();
      this.logDebug(`${operation} completed in ${Date.now() - startedAt}ms`, context);
      return result;
    } catch (error) {
      if (error instanceof ServiceError && error.code !== 'IO_ERROR') {
        this.logWarn(`${operation} rejected: ${error.message}`, { ...context, code: error.code });
      } else {
        this.logError(`${operation} failed`, error, context);
      }
      throw error;
    }
  }

  protected logDebug(message: string, context: LogContext = {}): void {
    this.logger.debug(context, message);
  }

  protected logInfo(message: string, context: LogContext = {}): void {
    this.logger.info(context, message);
  }

  protected logWarn(message: string, context: LogContext = {}): void {
    this.logger.warn(context, message);
  }

  protected logError(message: string, error?: unknown, context: LogContext = {}): void {
    this.logger.error({ ...context, err: error }, message);
  }
}
