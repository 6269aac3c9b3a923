import { Router } from 'express';
import { ProbeController } from '../controllers/probeController';
import type { Clock } from '../types/service';

export function createHealthRouter(clock: Clock): Router {
    const healthRouter = Router();
    const controller = new ProbeController(clock);

    healthRouter.get('/health', controller.health);
    healthRouter.get('/ready', controller.ready);

    return healthRouter;
}
