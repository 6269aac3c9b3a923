import type { Request, Response } from 'express';
import { STATIC_METRICS } from '../metrics/staticMetrics';

export function getMetrics(_req: Request, res: Response<string>) {
    res.type('text/plain').send(STATIC_METRICS);
}
