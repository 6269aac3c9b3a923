import type { Server } from 'node:http';
import type { Express } from 'express';
import type { ServiceConfig } from './types/service';
import { logger } from './utils/logger';

export type FatalHandler = (error: Error) => void;

function exitOnFatal(): void {
    process.exit(1);
}

export function startServer(
    app: Express,
    config: ServiceConfig,
    onFatal: FatalHandler = exitOnFatal
): Server {
    logger.info(`Starting ${config.appName} v${config.appVersion} on port ${config.port}`, {
        environment: config.environment,
        logLevel: config.logLevel
    });

    const server = app.listen(config.port, '0.0.0.0', () => {
        logger.info(`Listening on 0.0.0.0:${config.port}`);
    });

    // Bind failures such as EADDRINUSE arrive here, not as a thrown error
    server.on('error', err => {
        logger.error('Fatal startup error', { error: err.message });
        onFatal(err);
    });

    return server;
}
