import type { Request, Response, NextFunction } from 'express';
import { v4 as uuidv4 } from 'uuid';
import { logger } from '../utils/logger';

export const REQUEST_ID_HEADER = 'X-Request-Id';

export function requestId(req: Request, res: Response, next: NextFunction) {
    const id = req.get(REQUEST_ID_HEADER) || uuidv4();
    res.locals.requestId = id;
    res.setHeader(REQUEST_ID_HEADER, id);
    next();
}

export function requestLogger(req: Request, res: Response, next: NextFunction) {
    const id: unknown = res.locals.requestId;
    logger.debug(`${req.method} ${req.path}`, {
        requestId: id,
        ip: req.ip,
        userAgent: req.get('user-agent')
    });

    res.on('finish', () => {
        logger.debug(`Response: ${res.statusCode}`, { requestId: id });
    });

    next();
}
