import winston from 'winston';
import { AppError, ConfigurationError } from './errors';

export class ErrorHandler {
    public static handleError(error: unknown, logger: winston.Logger): void {
        if (error instanceof ConfigurationError) {
            logger.error(`[${error.code}] ${error.message}`);
            error.issues.forEach(issue => logger.error(`  • ${issue}`));
        } else if (error instanceof AppError) {
            logger.error(`[${error.code}] ${error.message}`, { context: error.context });
        } else if (error instanceof Error) {
            logger.error(`[System Error] Unexpected crash: ${error.message}`, { stack: error.stack });
        } else {
            logger.error(`[System Error] Unexpected crash: ${String(error)}`);
        }
    }

    public static handleFatalError(error: unknown, logger: winston.Logger): never {
        this.handleError(error, logger);
        process.exit(1);
    }

    public static install(logger: winston.Logger): void {
        process.on('uncaughtException', (error) => ErrorHandler.handleFatalError(error, logger));
        process.on('unhandledRejection', (reason) => ErrorHandler.handleFatalError(reason, logger));
    }
}
