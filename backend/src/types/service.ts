import type { LosslessNumber } from 'lossless-json';

export type LogLevelName = 'DEBUG' | 'INFO' | 'WARN' | 'WARNING' | 'ERROR' | 'CRITICAL';

export interface ServiceConfig {
    readonly appName: string;
    readonly appVersion: string;
    readonly environment: string;
    readonly port: number;
    readonly logLevel: string;
    readonly corsOrigin: string;
    readonly maxBodySize: string;
}

export type JsonValue =
    | null
    | boolean
    | number
    | LosslessNumber
    | string
    | JsonValue[]
    | { [key: string]: JsonValue };

export type Clock = () => Date;

export interface HealthStatus {
    status: 'healthy';
    timestamp: string;
}

export interface ReadyStatus {
    ready: true;
    timestamp: string;
}

export interface StatusInfo {
    app: string;
    version: string;
    environment: string;
    timestamp: string;
}

export interface ConfigInfo extends StatusInfo {
    port: number;
    log_level: string;
}

export interface EchoResponse {
    message: 'echo received';
    data: JsonValue;
    timestamp: string;
}

export interface ErrorBody {
    error: string;
}
