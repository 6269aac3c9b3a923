export interface ResourceSummary {
    name: string;
    phase?: string;
    ready?: boolean;
}

export interface ArgoApplicationStatus {
    name: string;
    sync: string;
    health: string;
    revision: string;
}

export type CheckStatus = 'pass' | 'fail' | 'skip';

export interface CheckResult {
    name: string;
    status: CheckStatus;
    detail: string;
}

export interface VerificationReport {
    namespace: string;
    results: CheckResult[];
    passed: number;
    failed: number;
    skipped: number;
}

export interface VerificationOptions {
    namespace: string;
    appName: string;
    argoApplications: string[];
    labelSelector?: string;
}
