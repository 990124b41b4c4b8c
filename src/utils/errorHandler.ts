import { Logger } from './logger.js';
import { AppError } from '../types/errors.js';

export class ErrorHandler {
  /** Logs the error and returns the process exit code it maps to. */
  static handle(error: unknown): number {
    if (error instanceof AppError) {
      Logger.error(error.message, {
        name: error.name,
        fatal: error.fatal,
        context: error.context,
      });
      Logger.debug('Stack trace', { stack: error.stack });
      return error.fatal ? error.exitCode || 1 : error.exitCode;
    }

    if (error instanceof Error) {
      Logger.error(`Unexpected error: ${error.message}`, {
        name: error.name,
        stack: error.stack,
      });
      return 1;
    }

    Logger.error('Unknown error occurred', { error });
    return 1;
  }

  static describe(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
  }

  static setupGlobalHandlers(): void {
    process.on('uncaughtException', (error) => {
      Logger.error('Uncaught Exception:', { error: error.message, stack: error.stack });
      process.exit(1);
    });

    process.on('unhandledRejection', (reason) => {
      Logger.error('Unhandled Rejection:', { reason: ErrorHandler.describe(reason) });
      process.exit(1);
    });

    process.on('SIGINT', () => {
      Logger.info('SIGINT received, aborting run');
      process.exit(130);
    });
  }
}
