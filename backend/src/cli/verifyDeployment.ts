import { createClusterClient, ClusterInspector } from '../services/k8sService';
import {
    formatReport,
    loadVerificationOptions,
    runDeploymentChecks
} from '../services/verificationService';
import { logger } from '../utils/logger';

async function main(): Promise<void> {
    const options = loadVerificationOptions();
    const inspector = new ClusterInspector(createClusterClient());
    const report = await runDeploymentChecks(inspector, options);

    process.stdout.write(`${formatReport(report)}\n`);
    process.exitCode = report.failed > 0 ? 1 : 0;
}

main().catch(err => {
    logger.error('Deployment verification aborted', {
        error: err instanceof Error ? err.message : String(err)
    });
    process.exit(1);
});
