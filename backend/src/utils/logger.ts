import winston from 'winston';
import { APP_NAME, parseLogLevel } from '../config';
import type { ServiceConfig } from '../types/service';

const { combine, timestamp, errors, json } = winston.format;

export const logger = winston.createLogger({
    level: 'info',
    format: combine(
        timestamp(),
        errors({ stack: true }),
        json()
    ),
    defaultMeta: { service: APP_NAME },
    transports: [new winston.transports.Console()]
});

export function toLoggerLevel(logLevel: string): string {
    switch (parseLogLevel(logLevel)) {
        case 'DEBUG':
            return 'debug';
        case 'INFO':
            return 'info';
        case 'WARN':
        case 'WARNING':
            return 'warn';
        case 'ERROR':
        case 'CRITICAL':
            return 'error';
    }
}

export function configureLogger(config: ServiceConfig): void {
    logger.level = toLoggerLevel(config.logLevel);
}
