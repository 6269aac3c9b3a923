import type { CheckResult, VerificationOptions, VerificationReport } from '../types/cluster';
import type { ClusterInspector } from './k8sService';
import { logger } from '../utils/logger';

const STATUS_LABELS: Record<CheckResult['status'], string> = {
    pass: 'PASS',
    fail: 'FAIL',
    skip: 'SKIP'
};

export function loadVerificationOptions(env: NodeJS.ProcessEnv = process.env): VerificationOptions {
    return {
        namespace: env.VERIFY_NAMESPACE?.trim() || 'app',
        appName: env.VERIFY_APP_NAME?.trim() || 'my-app',
        argoApplications: (env.ARGOCD_APPS ?? '')
            .split(',')
            .map(name => name.trim())
            .filter(name => name.length > 0),
        labelSelector: env.VERIFY_LABEL_SELECTOR?.trim() || undefined
    };
}

export async function runDeploymentChecks(
    inspector: ClusterInspector,
    options: VerificationOptions
): Promise<VerificationReport> {
    const { namespace, appName, argoApplications, labelSelector } = options;
    logger.info(`Verifying deployment of ${appName} in namespace ${namespace}`);

    const results: CheckResult[] = [
        await inspector.checkDeploymentExists(namespace, appName),
        await inspector.checkPodsRunning(namespace, appName),
        await inspector.checkServiceExists(namespace, appName),
        await inspector.checkPodConnectivity(),
        await inspector.checkNetworkPolicies(namespace),
        await inspector.checkNodeHealth(),
        await inspector.checkArgoApplications()
    ];

    if (labelSelector) {
        results.push(await inspector.checkPodHealth(namespace, labelSelector));
    }

    for (const application of argoApplications) {
        results.push(await inspector.checkArgoApplication(application));
    }

    return {
        namespace,
        results,
        passed: results.filter(r => r.status === 'pass').length,
        failed: results.filter(r => r.status === 'fail').length,
        skipped: results.filter(r => r.status === 'skip').length
    };
}

export function formatReport(report: VerificationReport): string {
    const lines = report.results.map(r => `[${STATUS_LABELS[r.status]}] ${r.name}: ${r.detail}`);
    lines.push(`Passed: ${report.passed}, Failed: ${report.failed}, Skipped: ${report.skipped}`);
    return lines.join('\n');
}
