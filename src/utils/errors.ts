/**
 * 🚨 ERROR CLASSES
 * Exceptions for conditions outside the lookup outcome model.
 * Lookup failures themselves are values (see ErrorOutcome), not exceptions.
 */

export class AppError extends Error {
    constructor(message: string, public code: string, public context?: Record<string, unknown>) {
        super(message);
        this.name = this.constructor.name;
        Error.captureStackTrace(this, this.constructor);
    }
}

export class ConfigurationError extends AppError {
    constructor(message: string, public issues: string[] = []) {
        super(message, 'CONFIG_ERROR', { fatal: true, issues });
    }
}

export type TransportFailure = 'TIMEOUT' | 'CONNECTION';

export class TransportError extends AppError {
    constructor(message: string, public failure: TransportFailure, public url: string) {
        super(message, 'TRANSPORT_ERROR', { failure, url });
    }
}

export class StoreError extends AppError {
    constructor(message: string, public filename?: string) {
        super(message, 'STORE_ERROR', { filename });
    }
}
