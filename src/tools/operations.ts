import { DropSummary, drainQueue, FlowFileSummary, JobSettings, listQueue, ProvenanceEvent, queryProvenance } from '../jobs/queue-jobs.js';
import { Logger, silentLogger } from '../logging/logger.js';
import type { ChildKind, MutationRequest, RemoteResourceClient } from '../nifi/remote.js';
import { RemediationController } from '../remediation/controller.js';
import type { MutationResult } from '../remediation/types.js';
import { HierarchyTraversalEngine, TraversalResult } from '../traversal/engine.js';

export interface TraversalDefaults {
    maxDepth: number;
    timeoutSeconds: number;
}

export interface FlowOperationsOptions {
    client: RemoteResourceClient;
    controller: RemediationController;
    engine: HierarchyTraversalEngine;
    jobs: Omit<JobSettings, 'logger'>;
    traversal: TraversalDefaults;
    logger?: Logger;
}

export interface ListHierarchyRequest {
    rootGroupId: string;
    kind: ChildKind;
    maxDepth?: number;
    timeoutSeconds?: number;
    continuationToken?: string | null;
}

/**
 * The operations exposed to the console and to tool calls. Every call gets
 * its settings from the options given here; nothing reads configuration.
 */
export class FlowOperations {
    private client: RemoteResourceClient;
    private controller: RemediationController;
    private engine: HierarchyTraversalEngine;
    private jobs: JobSettings;
    private traversal: TraversalDefaults;

    constructor(options: FlowOperationsOptions) {
        this.client = options.client;
        this.controller = options.controller;
        this.engine = options.engine;
        this.jobs = { ...options.jobs, logger: (options.logger ?? silentLogger).child({ component: 'jobs' }) };
        this.traversal = options.traversal;
    }

    mutateWithRemediation(request: MutationRequest): Promise<MutationResult> {
        return this.controller.mutate(request);
    }

    listHierarchy(request: ListHierarchyRequest): Promise<TraversalResult> {
        const maxDepth = request.maxDepth ?? this.traversal.maxDepth;
        const timeoutSeconds = request.timeoutSeconds ?? this.traversal.timeoutSeconds;
        if (!Number.isInteger(maxDepth) || maxDepth < 0) {
            throw new RangeError(`maxDepth must be a non-negative integer, got ${maxDepth}`);
        }
        if (!(timeoutSeconds > 0)) {
            throw new RangeError(`timeoutSeconds must be positive, got ${timeoutSeconds}`);
        }
        return this.engine.traverse({
            rootGroupId: request.rootGroupId,
            kind: request.kind,
            maxDepth,
            timeoutMs: timeoutSeconds * 1000,
            continuationToken: request.continuationToken,
        });
    }

    purgeQueue(connectionId: string): Promise<DropSummary> {
        return drainQueue(this.client, connectionId, this.jobs);
    }

    listQueue(connectionId: string): Promise<FlowFileSummary[]> {
        return listQueue(this.client, connectionId, this.jobs);
    }

    queryProvenance(componentId: string, maxResults: number): Promise<ProvenanceEvent[]> {
        return queryProvenance(this.client, componentId, maxResults, this.jobs);
    }
}
