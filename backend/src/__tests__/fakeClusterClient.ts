import type { ClusterClient } from '../services/k8sService';
import type { ArgoApplicationStatus, ResourceSummary } from '../types/cluster';

type Listing = ResourceSummary[] | Error;

function resolve<T>(value: T | Error): T {
    if (value instanceof Error) {
        throw value;
    }
    return value;
}

export class FakeClusterClient implements ClusterClient {
    deployments: Listing = [{ name: 'my-app', ready: true }];
    pods: Listing = [
        { name: 'my-app-7d9f8-abcde', phase: 'Running' },
        { name: 'my-app-7d9f8-fghij', phase: 'Running' }
    ];
    services: Listing = [{ name: 'my-app' }];
    networkPolicies: Listing = [{ name: 'default-deny' }];
    nodes: Listing = [{ name: 'node-1', ready: true }];
    applications = new Map<string, ArgoApplicationStatus>();
    applicationListError: Error | undefined;
    lastLabelSelector: string | undefined;

    async listDeployments(): Promise<ResourceSummary[]> {
        return resolve(this.deployments);
    }

    async listPods(_namespace: string, labelSelector?: string): Promise<ResourceSummary[]> {
        this.lastLabelSelector = labelSelector;
        return resolve(this.pods);
    }

    async listServices(): Promise<ResourceSummary[]> {
        return resolve(this.services);
    }

    async listNetworkPolicies(): Promise<ResourceSummary[]> {
        return resolve(this.networkPolicies);
    }

    async listNodes(): Promise<ResourceSummary[]> {
        return resolve(this.nodes);
    }

    async getArgoApplication(name: string): Promise<ArgoApplicationStatus> {
        const app = this.applications.get(name);
        if (!app) {
            throw new Error(`applications.argoproj.io "${name}" not found`);
        }
        return app;
    }

    async listArgoApplications(): Promise<ArgoApplicationStatus[]> {
        if (this.applicationListError) {
            throw this.applicationListError;
        }
        return Array.from(this.applications.values());
    }
}
