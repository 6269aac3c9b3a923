import { createApp } from './app';
import { loadConfig } from './config';
import { startServer } from './server';
import { configureLogger, logger } from './utils/logger';

function main(): void {
    const config = loadConfig();
    configureLogger(config);

    const server = startServer(createApp(config), config);

    const shutdown = (signal: string) => {
        logger.info(`Received ${signal}, shutting down`);
        server.close(err => {
            if (err) {
                logger.error('Error while closing server', { error: err.message });
                process.exit(1);
            }
            process.exit(0);
        });
    };
    process.on('SIGINT', () => shutdown('SIGINT'));
    process.on('SIGTERM', () => shutdown('SIGTERM'));
}

try {
    main();
} catch (error) {
    logger.error('Fatal startup error', {
        error: error instanceof Error ? error.message : String(error)
    });
    process.exit(1);
}
