import * as k8s from '@kubernetes/client-node';
import { z } from 'zod';
import { logger } from '../utils/logger';
import type { ArgoApplicationStatus, CheckResult, ResourceSummary } from '../types/cluster';

const UNKNOWN = 'Unknown';

export interface ClusterClient {
    listDeployments(namespace: string): Promise<ResourceSummary[]>;
    listPods(namespace: string, labelSelector?: string): Promise<ResourceSummary[]>;
    listServices(namespace: string): Promise<ResourceSummary[]>;
    listNetworkPolicies(namespace: string): Promise<ResourceSummary[]>;
    listNodes(): Promise<ResourceSummary[]>;
    getArgoApplication(name: string, namespace?: string): Promise<ArgoApplicationStatus>;
    listArgoApplications(namespace?: string): Promise<ArgoApplicationStatus[]>;
}

const argoApplicationSchema = z.object({
    metadata: z.object({
        name: z.string().optional()
    }).optional(),
    status: z.object({
        sync: z.object({
            status: z.string().optional(),
            revision: z.string().optional()
        }).optional(),
        health: z.object({
            status: z.string().optional()
        }).optional()
    }).optional()
});

const argoApplicationListSchema = z.object({
    items: z.array(argoApplicationSchema)
});

type ArgoApplication = z.infer<typeof argoApplicationSchema>;

function toApplicationStatus(name: string, { status }: ArgoApplication): ArgoApplicationStatus {
    return {
        name,
        sync: status?.sync?.status ?? UNKNOWN,
        health: status?.health?.status ?? UNKNOWN,
        revision: (status?.sync?.revision ?? '').slice(0, 7)
    };
}

export function parseArgoApplication(name: string, raw: unknown): ArgoApplicationStatus {
    return toApplicationStatus(name, argoApplicationSchema.parse(raw));
}

export function parseArgoApplicationList(raw: unknown): ArgoApplicationStatus[] {
    return argoApplicationListSchema
        .parse(raw)
        .items.map(item => toApplicationStatus(item.metadata?.name ?? '', item));
}

const SYNC_STATES = ['Synced', 'OutOfSync', 'Unknown'];
const HEALTH_STATES = ['Healthy', 'Degraded', 'Progressing', 'Unhealthy'];

function countBy(states: string[], values: string[]): string {
    return states.map(state => `${state} ${values.filter(v => v === state).length}`).join(', ');
}

function summarize(metadata: k8s.V1ObjectMeta | undefined): ResourceSummary {
    return { name: metadata?.name ?? '' };
}

function isNodeReady(node: k8s.V1Node): boolean {
    return node.status?.conditions?.some(c => c.type === 'Ready' && c.status === 'True') ?? false;
}

export function createClusterClient(): ClusterClient {
    const kc = new k8s.KubeConfig();

    // Load config from in-cluster service account or default kubeconfig
    try {
        kc.loadFromCluster();
        logger.info('Loaded Kubernetes config from cluster');
    } catch {
        kc.loadFromDefault();
        logger.info('Loaded Kubernetes config from default location');
    }

    const coreApi = kc.makeApiClient(k8s.CoreV1Api);
    const appsApi = kc.makeApiClient(k8s.AppsV1Api);
    const networkingApi = kc.makeApiClient(k8s.NetworkingV1Api);
    const customObjectsApi = kc.makeApiClient(k8s.CustomObjectsApi);

    return {
        async listDeployments(namespace) {
            const list = await appsApi.listNamespacedDeployment({ namespace });
            return list.items.map(d => ({
                ...summarize(d.metadata),
                ready: (d.status?.readyReplicas ?? 0) >= (d.spec?.replicas ?? 1)
            }));
        },

        async listPods(namespace, labelSelector) {
            const list = await coreApi.listNamespacedPod({ namespace, labelSelector });
            return list.items.map(p => ({ ...summarize(p.metadata), phase: p.status?.phase }));
        },

        async listServices(namespace) {
            const list = await coreApi.listNamespacedService({ namespace });
            return list.items.map(s => summarize(s.metadata));
        },

        async listNetworkPolicies(namespace) {
            const list = await networkingApi.listNamespacedNetworkPolicy({ namespace });
            return list.items.map(np => summarize(np.metadata));
        },

        async listNodes() {
            const list = await coreApi.listNode();
            return list.items.map(n => ({ ...summarize(n.metadata), ready: isNodeReady(n) }));
        },

        async getArgoApplication(name, namespace = 'argocd') {
            const raw: unknown = await customObjectsApi.getNamespacedCustomObject({
                group: 'argoproj.io',
                version: 'v1alpha1',
                namespace,
                plural: 'applications',
                name
            });
            return parseArgoApplication(name, raw);
        },

        async listArgoApplications(namespace = 'argocd') {
            const raw: unknown = await customObjectsApi.listNamespacedCustomObject({
                group: 'argoproj.io',
                version: 'v1alpha1',
                namespace,
                plural: 'applications'
            });
            return parseArgoApplicationList(raw);
        }
    };
}

function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

function pass(name: string, detail: string): CheckResult {
    return { name, status: 'pass', detail };
}

function fail(name: string, detail: string): CheckResult {
    return { name, status: 'fail', detail };
}

function skip(name: string, detail: string): CheckResult {
    return { name, status: 'skip', detail };
}

/**
 * Read-only checks against cluster state. Each check turns API failures into
 * a failed result instead of throwing, so a report always covers every check.
 */
export class ClusterInspector {
    constructor(private readonly client: ClusterClient) {}

    async checkDeploymentExists(namespace: string, appName: string): Promise<CheckResult> {
        const name = 'deployment exists';
        try {
            const deployments = await this.client.listDeployments(namespace);
            const names = deployments.map(d => d.name);
            const unready = deployments.filter(d => d.ready === false).map(d => d.name);
            const suffix = unready.length > 0 ? `; not ready: ${unready.join(', ')}` : '';
            if (names.includes(appName)) {
                return pass(name, `Deployment ${appName} found in ${namespace}${suffix}`);
            }
            if (names.length > 0) {
                return pass(name, `${names.length} deployment(s) found in ${namespace}${suffix}`);
            }
            return fail(name, `No deployments in ${namespace}`);
        } catch (error) {
            return this.apiFailure(name, error);
        }
    }

    async checkPodsRunning(namespace: string, appName: string): Promise<CheckResult> {
        const name = 'pods running';
        try {
            const pods = await this.client.listPods(namespace);
            if (pods.length === 0) {
                return fail(name, `No pods in ${namespace}`);
            }
            const notRunning = pods.filter(p => p.name.includes(appName) && p.phase !== 'Running');
            if (notRunning.length > 0) {
                const listed = notRunning.map(p => `${p.name} (${p.phase ?? UNKNOWN})`).join(', ');
                return fail(name, `Pods not running: ${listed}`);
            }
            return pass(name, `${pods.length} pod(s) in ${namespace}`);
        } catch (error) {
            return this.apiFailure(name, error);
        }
    }

    async checkServiceExists(namespace: string, appName: string): Promise<CheckResult> {
        const name = 'service exists';
        try {
            const names = (await this.client.listServices(namespace)).map(s => s.name);
            if (names.includes(appName)) {
                return pass(name, `Service ${appName} found in ${namespace}`);
            }
            if (names.length > 0) {
                return pass(name, `${names.length} service(s) found in ${namespace}`);
            }
            return fail(name, `No services in ${namespace}`);
        } catch (error) {
            return this.apiFailure(name, error);
        }
    }

    async checkNetworkPolicies(namespace: string): Promise<CheckResult> {
        const name = 'network policies applied';
        try {
            const policies = await this.client.listNetworkPolicies(namespace);
            return pass(name, `${policies.length} network policy(ies) in ${namespace}`);
        } catch (error) {
            logger.warn('Network policy check not available', { error: errorMessage(error) });
            return skip(name, 'Network policy check not available');
        }
    }

    async checkPodConnectivity(): Promise<CheckResult> {
        return skip('pod-to-pod connectivity', 'Requires network access to cluster');
    }

    async checkNodeHealth(): Promise<CheckResult> {
        const name = 'nodes ready';
        try {
            const nodes = await this.client.listNodes();
            const ready = nodes.filter(n => n.ready).length;
            const detail = `${ready}/${nodes.length} node(s) ready`;
            return nodes.length > 0 && ready === nodes.length ? pass(name, detail) : fail(name, detail);
        } catch (error) {
            return this.apiFailure(name, error);
        }
    }

    async checkPodHealth(namespace: string, labelSelector: string): Promise<CheckResult> {
        const name = `pods healthy (${labelSelector})`;
        try {
            const pods = await this.client.listPods(namespace, labelSelector);
            const running = pods.filter(p => p.phase === 'Running').length;
            const detail = `${running}/${pods.length} pod(s) running in ${namespace}`;
            return pods.length > 0 && running === pods.length ? pass(name, detail) : fail(name, detail);
        } catch (error) {
            return this.apiFailure(name, error);
        }
    }

    async checkArgoApplication(appName: string): Promise<CheckResult> {
        const name = `argocd application ${appName}`;
        try {
            const app = await this.client.getArgoApplication(appName);
            const detail = `Sync: ${app.sync}, Health: ${app.health}, Rev: ${app.revision || UNKNOWN}`;
            return app.sync === 'Synced' && app.health === 'Healthy' ? pass(name, detail) : fail(name, detail);
        } catch (error) {
            return this.apiFailure(name, error);
        }
    }

    /**
     * Summarises every Argo CD application by sync and health state and fails
     * when any of them is not both Synced and Healthy.
     */
    async checkArgoApplications(namespace = 'argocd'): Promise<CheckResult> {
        const name = 'argocd applications';
        let apps: ArgoApplicationStatus[];
        try {
            apps = await this.client.listArgoApplications(namespace);
        } catch (error) {
            logger.warn('Argo CD applications not available', { error: errorMessage(error) });
            return skip(name, 'Argo CD applications not available');
        }

        if (apps.length === 0) {
            return skip(name, `No Argo CD applications in ${namespace}`);
        }

        const summary = `${apps.length} application(s); sync: ${countBy(SYNC_STATES, apps.map(a => a.sync))}; `
            + `health: ${countBy(HEALTH_STATES, apps.map(a => a.health))}`;
        const problems = apps.filter(a => a.sync !== 'Synced' || a.health !== 'Healthy');
        if (problems.length > 0) {
            const listed = problems.map(a => `${a.name} (${a.sync}/${a.health})`).join(', ');
            return fail(name, `${summary}; not synced/healthy: ${listed}`);
        }
        return pass(name, summary);
    }

    private apiFailure(name: string, error: unknown): CheckResult {
        const message = errorMessage(error);
        logger.error(`Check "${name}" failed`, { error: message });
        return fail(name, message);
    }
}
