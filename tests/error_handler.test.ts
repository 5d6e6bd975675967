import { describe, expect, it, vi } from 'vitest';
import { ErrorHandler } from '../src/utils/error_handler';
import { ConfigurationError, StoreError } from '../src/utils/errors';
import { silentLogger } from './helpers';

describe('ErrorHandler', () => {
    it('logs each configuration issue', () => {
        const logger = silentLogger();
        const error = vi.spyOn(logger, 'error');

        ErrorHandler.handleError(new ConfigurationError('Invalid configuration in test.yaml', ['api.primary_url: Invalid url']), logger);

        expect(error.mock.calls.map(call => call[0])).toEqual([
            '[CONFIG_ERROR] Invalid configuration in test.yaml',
            '  • api.primary_url: Invalid url',
        ]);
    });

    it('logs application errors with their code and context', () => {
        const logger = silentLogger();
        const error = vi.spyOn(logger, 'error');

        ErrorHandler.handleError(new StoreError('Cannot read x.json', 'x.json'), logger);

        expect(error).toHaveBeenCalledWith('[STORE_ERROR] Cannot read x.json', { context: { filename: 'x.json' } });
    });

    it('logs anything else as a crash', () => {
        const logger = silentLogger();
        const error = vi.spyOn(logger, 'error');

        ErrorHandler.handleError('plain string', logger);

        expect(error).toHaveBeenCalledWith('[System Error] Unexpected crash: plain string');
    });

    it('exits with status 1 on fatal errors', () => {
        const logger = silentLogger();
        const exit = vi.spyOn(process, 'exit').mockImplementation(() => {
            throw new Error('process.exit called');
        });

        expect(() => ErrorHandler.handleFatalError(new Error('boom'), logger)).toThrow('process.exit called');
        expect(exit).toHaveBeenCalledWith(1);
        exit.mockRestore();
    });
});
