import type { Request, Response } from 'express';
import { LosslessNumber, isLosslessNumber, isSafeNumber, parse, stringify } from 'lossless-json';
import type {
    Clock,
    ConfigInfo,
    EchoResponse,
    JsonValue,
    ServiceConfig,
    StatusInfo
} from '../types/service';
import { BadRequestError } from '../middleware/errorHandler';
import { formatTimestamp } from '../utils/timestamp';
import { logger } from '../utils/logger';

// Numbers a double cannot hold exactly keep their source digits
function parseNumber(value: string): number | LosslessNumber {
    return isSafeNumber(value) ? Number(value) : new LosslessNumber(value);
}

function isJsonValue(value: unknown): value is JsonValue {
    if (value === null || isLosslessNumber(value)) {
        return true;
    }
    switch (typeof value) {
        case 'boolean':
        case 'number':
        case 'string':
            return true;
        case 'object':
            if (value === null) {
                return false;
            }
            return Array.isArray(value)
                ? value.every(isJsonValue)
                : Object.values(value).every(isJsonValue);
        default:
            return false;
    }
}

function parseJsonBody(body: unknown): JsonValue {
    const raw = typeof body === 'string' ? body : '';
    let parsed: unknown;
    try {
        parsed = parse(raw, null, parseNumber);
    } catch (error) {
        throw new BadRequestError(error instanceof Error ? error.message : String(error));
    }
    if (!isJsonValue(parsed)) {
        throw new BadRequestError('Request body is not a JSON value');
    }
    return parsed;
}

export class InfoController {
    constructor(
        private readonly config: ServiceConfig,
        private readonly clock: Clock
    ) {}

    getStatus = (_req: Request, res: Response<StatusInfo>) => {
        res.json({
            app: this.config.appName,
            version: this.config.appVersion,
            environment: this.config.environment,
            timestamp: formatTimestamp(this.clock())
        });
    };

    getConfig = (_req: Request, res: Response<ConfigInfo>) => {
        res.json({
            app: this.config.appName,
            version: this.config.appVersion,
            environment: this.config.environment,
            port: this.config.port,
            log_level: this.config.logLevel,
            timestamp: formatTimestamp(this.clock())
        });
    };

    /**
     * Parses the raw body itself so any content type is accepted and a body
     * that is not JSON becomes a 400 carrying the parser's message. The reply
     * is serialised with the same library so large integers keep every digit.
     */
    echo = (req: Request, res: Response) => {
        const data = parseJsonBody(req.body);
        logger.info('Echo request received', { data: stringify(data) });

        const body: EchoResponse = {
            message: 'echo received',
            data,
            timestamp: formatTimestamp(this.clock())
        };
        res.type('application/json').send(stringify(body));
    };
}
