import express, { Router } from 'express';
import { InfoController } from '../controllers/infoController';
import type { Clock, ServiceConfig } from '../types/service';

export function createApiRouter(config: ServiceConfig, clock: Clock): Router {
    const apiRouter = Router();
    const controller = new InfoController(config, clock);

    apiRouter.get('/status', controller.getStatus);
    apiRouter.get('/config', controller.getConfig);

    // Body is read as text whatever the content type; the controller parses it
    apiRouter.post(
        '/echo',
        express.text({ type: () => true, limit: config.maxBodySize }),
        controller.echo
    );

    return apiRouter;
}
