import { afterEach, describe, it, expect } from 'vitest';
import { ConfigError, loadConfig } from '../config';
import { configureLogger, logger, toLoggerLevel } from '../utils/logger';

describe('loadConfig', () => {
    it('applies defaults when nothing is set', () => {
        expect(loadConfig({})).toEqual({
            appName: 'kubernetes-platform-stack',
            appVersion: '1.0.0',
            environment: 'unknown',
            port: 8080,
            logLevel: 'INFO',
            corsOrigin: '*',
            maxBodySize: '10mb'
        });
    });

    it('reads values from the environment', () => {
        const config = loadConfig({
            PORT: '3000',
            LOG_LEVEL: 'warning',
            ENVIRONMENT: 'production',
            CORS_ORIGIN: 'https://dashboard.example.test'
        });

        expect(config.port).toBe(3000);
        expect(config.logLevel).toBe('warning');
        expect(config.environment).toBe('production');
        expect(config.corsOrigin).toBe('https://dashboard.example.test');
    });

    it('returns a frozen object', () => {
        expect(Object.isFrozen(loadConfig({}))).toBe(true);
    });

    it('treats blank values as unset', () => {
        const config = loadConfig({ PORT: '  ', ENVIRONMENT: '', LOG_LEVEL: ' ' });

        expect(config.port).toBe(8080);
        expect(config.environment).toBe('unknown');
        expect(config.logLevel).toBe('INFO');
    });

    it.each(['abc', '0', '70000', '80.5', '-1'])('rejects PORT=%s', port => {
        expect(() => loadConfig({ PORT: port })).toThrow(ConfigError);
    });

    it('reads the request body limit', () => {
        expect(loadConfig({ MAX_BODY_SIZE: '512kb' }).maxBodySize).toBe('512kb');
    });

    it.each(['lots', '10 parsecs', '-5mb'])('rejects MAX_BODY_SIZE=%s', size => {
        expect(() => loadConfig({ MAX_BODY_SIZE: size })).toThrow(ConfigError);
    });

    it('rejects an unknown log level', () => {
        expect(() => loadConfig({ LOG_LEVEL: 'verbose' })).toThrow(
            "Invalid LOG_LEVEL: 'verbose'. Expected one of DEBUG, INFO, WARN, WARNING, ERROR, CRITICAL."
        );
    });
});

describe('logger levels', () => {
    const initialLevel = logger.level;

    afterEach(() => {
        logger.level = initialLevel;
    });

    it.each([
        ['DEBUG', 'debug'],
        ['info', 'info'],
        ['WARNING', 'warn'],
        ['WARN', 'warn'],
        ['ERROR', 'error'],
        ['CRITICAL', 'error']
    ])('maps %s to %s', (configured, expected) => {
        expect(toLoggerLevel(configured)).toBe(expected);
    });

    it('configures the logger from the service config', () => {
        configureLogger(loadConfig({ LOG_LEVEL: 'DEBUG' }));

        expect(logger.level).toBe('debug');
    });
});
