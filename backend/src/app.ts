import express, { type Express } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import { createHealthRouter } from './routes/healthRoutes';
import { createApiRouter } from './routes/apiRoutes';
import { createMetricsRouter } from './routes/metricsRoutes';
import { requestId, requestLogger } from './middleware/requestLogger';
import { errorHandler, notFoundHandler } from './middleware/errorHandler';
import type { Clock, ServiceConfig } from './types/service';

export interface AppOptions {
    clock?: Clock;
}

export function createApp(config: ServiceConfig, options: AppOptions = {}): Express {
    const clock = options.clock ?? (() => new Date());
    const app = express();

    // Middleware
    app.disable('x-powered-by');
    app.use(helmet());
    app.use(cors({
        origin: config.corsOrigin,
        credentials: true
    }));
    app.use(requestId);
    app.use(requestLogger);

    // Routes
    app.use(createHealthRouter(clock));
    app.use('/api/v1', createApiRouter(config, clock));
    app.use(createMetricsRouter());

    // Error handling
    app.use(notFoundHandler);
    app.use(errorHandler);

    return app;
}
