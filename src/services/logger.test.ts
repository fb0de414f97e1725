import { afterEach, describe, expect, it, vi } from 'vitest';
import { createConsoleLogger, isLogLevel, silentLogger } from './logger';

describe('createConsoleLogger', () => {
    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('prefixes messages and forwards extra arguments', () => {
        const warn = vi.spyOn(console, 'warn').mockImplementation(() => { });
        const logger = createConsoleLogger('[Test]');

        logger.warn('careful', 42);

        expect(warn).toHaveBeenCalledWith('[Test] careful', 42);
    });

    it('drops messages below the configured level', () => {
        const log = vi.spyOn(console, 'log').mockImplementation(() => { });
        const debug = vi.spyOn(console, 'debug').mockImplementation(() => { });
        const error = vi.spyOn(console, 'error').mockImplementation(() => { });
        const logger = createConsoleLogger('[Test]', 'warn');

        logger.debug('hidden');
        logger.info('hidden');
        logger.error('shown');

        expect(debug).not.toHaveBeenCalled();
        expect(log).not.toHaveBeenCalled();
        expect(error).toHaveBeenCalledWith('[Test] shown');
    });

    it('writes nothing at silent', () => {
        const error = vi.spyOn(console, 'error').mockImplementation(() => { });
        createConsoleLogger('[Test]', 'silent').error('nope');
        silentLogger.error('nope');
        expect(error).not.toHaveBeenCalled();
    });
});

describe('isLogLevel', () => {
    it('recognises known levels only', () => {
        expect(isLogLevel('warn')).toBe(true);
        expect(isLogLevel('trace')).toBe(false);
    });
});
