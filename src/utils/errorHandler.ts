import { Logger } from './logger.js';
import { AppError } from '../types/errors.js';

export class ErrorHandler {
  static handle(error: unknown): void {
    if (error instanceof AppError) {
      Logger.error(error.message, {
        name: error.name,
        statusCode: error.statusCode,
        isOperational: error.isOperational,
        context: error.context,
        stack: error.stack,
      });

      // Exit for non-operational errors
      if (!error.isOperational) {
        process.exit(1);
      }
      process.exitCode = 1;
    } else if (error instanceof Error) {
      Logger.error(`Unexpected error: ${error.message}`, {
        name: error.name,
        stack: error.stack,
      });
      process.exit(1);
    } else {
      Logger.error('Unknown error occurred', { error });
      process.exit(1);
    }
  }

  /**
   * Installs process-level handlers. SIGINT/SIGTERM abort the given controller
   * so a running identification can finish with a partial tracklist; a second
   * signal exits immediately.
   */
  static setupGlobalHandlers(controller?: AbortController): void {
    process.on('uncaughtException', (error) => {
      Logger.error('Uncaught Exception:', { error: error.message, stack: error.stack });
      process.exit(1);
    });

    process.on('unhandledRejection', (reason) => {
      Logger.error('Unhandled Rejection:', { reason });
      process.exit(1);
    });

    const onSignal = (signal: NodeJS.Signals): void => {
      if (controller && !controller.signal.aborted) {
        Logger.info(`${signal} received, finishing in-flight segments`);
        controller.abort();
        return;
      }
      Logger.info(`${signal} received, shutting down`);
      process.exit(130);
    };

    process.on('SIGTERM', onSignal);
    process.on('SIGINT', onSignal);
  }
}
