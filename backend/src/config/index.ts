import type { LogLevelName, ServiceConfig } from '../types/service';

export const APP_NAME = 'kubernetes-platform-stack';
export const APP_VERSION = '1.0.0';

const DEFAULT_PORT = 8080;
const DEFAULT_LOG_LEVEL = 'INFO';
const DEFAULT_ENVIRONMENT = 'unknown';
const DEFAULT_CORS_ORIGIN = '*';
const DEFAULT_MAX_BODY_SIZE = '10mb';

const LOG_LEVELS: readonly LogLevelName[] = ['DEBUG', 'INFO', 'WARN', 'WARNING', 'ERROR', 'CRITICAL'];

export class ConfigError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ConfigError';
    }
}

function parsePort(value: string | undefined): number {
    if (!value?.trim()) {
        return DEFAULT_PORT;
    }
    const trimmed = value.trim();
    const parsed = Number(trimmed);
    if (!/^\d+$/.test(trimmed) || parsed < 1 || parsed > 65535) {
        throw new ConfigError(`Invalid PORT: '${value}'. Expected integer in range 1-65535.`);
    }
    return parsed;
}

function parseBodySize(value: string | undefined): string {
    const trimmed = value?.trim();
    if (!trimmed) {
        return DEFAULT_MAX_BODY_SIZE;
    }
    if (!/^\d+(\.\d+)?\s*(b|kb|mb|gb)?$/i.test(trimmed)) {
        throw new ConfigError(`Invalid MAX_BODY_SIZE: '${value}'. Expected a byte size such as 512kb or 10mb.`);
    }
    return trimmed;
}

export function parseLogLevel(value: string): LogLevelName {
    const normalized = value.trim().toUpperCase();
    const match = LOG_LEVELS.find(level => level === normalized);
    if (!match) {
        throw new ConfigError(
            `Invalid LOG_LEVEL: '${value}'. Expected one of ${LOG_LEVELS.join(', ')}.`
        );
    }
    return match;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServiceConfig {
    const logLevel = env.LOG_LEVEL?.trim() || DEFAULT_LOG_LEVEL;
    parseLogLevel(logLevel);

    return Object.freeze({
        appName: APP_NAME,
        appVersion: APP_VERSION,
        environment: env.ENVIRONMENT?.trim() || DEFAULT_ENVIRONMENT,
        port: parsePort(env.PORT),
        logLevel,
        corsOrigin: env.CORS_ORIGIN?.trim() || DEFAULT_CORS_ORIGIN,
        maxBodySize: parseBodySize(env.MAX_BODY_SIZE)
    });
}
