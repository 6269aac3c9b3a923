import type { Request, Response } from 'express';
import type { Clock, HealthStatus, ReadyStatus } from '../types/service';
import { formatTimestamp } from '../utils/timestamp';

export class ProbeController {
    constructor(private readonly clock: Clock) {}

    // Liveness probe
    health = (_req: Request, res: Response<HealthStatus>) => {
        res.json({ status: 'healthy', timestamp: formatTimestamp(this.clock()) });
    };

    // Readiness probe
    ready = (_req: Request, res: Response<ReadyStatus>) => {
        res.json({ ready: true, timestamp: formatTimestamp(this.clock()) });
    };
}
