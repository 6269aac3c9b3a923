import { Router } from 'express';
import { getMetrics } from '../controllers/metricsController';

export function createMetricsRouter(): Router {
    const metricsRouter = Router();
    metricsRouter.get('/metrics', getMetrics);
    return metricsRouter;
}
