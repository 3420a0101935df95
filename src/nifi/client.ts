import axios, { AxiosAdapter, AxiosInstance, AxiosResponse, Method } from 'axios';
import https from 'https';
import { RemoteApiError } from '../errors.js';
import { Logger, silentLogger } from '../logging/logger.js';
import {
    AsyncJob,
    AsyncJobHandle,
    AsyncJobKind,
    AsyncJobOptions,
    AsyncJobStatus,
    ChildKind,
    ComponentState,
    MutationRequest,
    MutationResponse,
    RemoteResourceClient,
    ResourceNode,
    ResourceSnapshot,
    ResourceType,
} from './remote.js';
import {
    ConnectionEntity,
    DropRequestEntity,
    ListingRequestEntity,
    PortEntity,
    ProcessGroupEntity,
    ProcessGroupFlowEntity,
    ProcessorEntity,
    ProvenanceEntity,
} from './types.js';

export interface NiFiClientOptions {
    baseUrl: string;
    username: string;
    password: string;
    tlsVerify?: boolean;
    logger?: Logger;
    /** Replaces the HTTP transport; used to run the client against an in-process stand-in. */
    adapter?: AxiosAdapter;
}

type PortPath = '/input-ports' | '/output-ports';

const defaultProvenanceResults = 100;

export class NiFiClient implements RemoteResourceClient {
    private client: AxiosInstance;
    private token: string | null = null;
    private clientId: string;
    private logger: Logger;
    private options: NiFiClientOptions;
    private portPaths = new Map<string, PortPath>();

    constructor(options: NiFiClientOptions) {
        this.options = options;
        this.clientId = `nifi-steward-${Date.now()}`;
        this.logger = (options.logger ?? silentLogger).child({ component: 'nifi-client' });
        this.client = axios.create({
            baseURL: options.baseUrl,
            httpsAgent: new https.Agent({ rejectUnauthorized: options.tlsVerify ?? false }),
            headers: {
                'Content-Type': 'application/json',
            },
            // Non-2xx statuses go back to the caller as data.
            validateStatus: () => true,
            adapter: options.adapter,
        });
    }

    async authenticate(): Promise<void> {
        const response = await this.client.post<string>(
            '/access/token',
            `username=${encodeURIComponent(this.options.username)}&password=${encodeURIComponent(this.options.password)}`,
            {
                headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
            }
        );
        this.expectOk(response, 'authenticate');
        this.token = response.data;
        this.client.defaults.headers.common['Authorization'] = `Bearer ${this.token}`;
        this.logger.info('Authenticated with NiFi');
    }

    async getAbout(): Promise<{ title: string; version: string }> {
        const response = await this.client.get<{ about: { title: string; version: string } }>('/flow/about');
        return this.expectOk(response, 'get about').about;
    }

    async getResource(type: ResourceType, id: string): Promise<ResourceSnapshot> {
        let resource: ResourceNode;
        switch (type) {
            case 'processor': {
                const response = await this.client.get<ProcessorEntity>(`/processors/${id}`);
                resource = toProcessorNode(this.expectOk(response, `get processor ${id}`));
                break;
            }
            case 'connection': {
                const response = await this.client.get<ConnectionEntity>(`/connections/${id}`);
                resource = toConnectionNode(this.expectOk(response, `get connection ${id}`));
                break;
            }
            case 'group': {
                const response = await this.client.get<ProcessGroupEntity>(`/process-groups/${id}`);
                resource = toGroupNode(this.expectOk(response, `get process group ${id}`));
                break;
            }
            case 'port': {
                const path = await this.resolvePortPath(id);
                const response = await this.client.get<PortEntity>(`${path}/${id}`);
                resource = toPortNode(this.expectOk(response, `get port ${id}`));
                break;
            }
        }
        return { resource, revision: resource.revision };
    }

    async mutateResource(request: MutationRequest): Promise<MutationResponse> {
        const { type, id, action } = request;
        const revision = { version: request.revision ?? 0, clientId: this.clientId };
        this.logger.debug('Calling NiFi API', { operation: `${action}_${type}`, id, version: request.revision });

        let response: AxiosResponse<unknown>;
        if (action === 'start' || action === 'stop') {
            const state = action === 'start' ? 'RUNNING' : 'STOPPED';
            if (type === 'connection') {
                return { ok: false, status: 400, body: `Connection ${id} has no run state to ${action}` };
            }
            if (type === 'group') {
                response = await this.send('PUT', `/flow/process-groups/${id}`, { id, state });
            } else {
                const path = await this.componentPath(type, id);
                response = await this.send('PUT', `${path}/${id}/run-status`, { revision, state });
            }
        } else if (action === 'update') {
            const path = await this.componentPath(type, id);
            response = await this.send('PUT', `${path}/${id}`, {
                revision,
                component: { ...request.payload, id },
            });
        } else {
            const path = await this.componentPath(type, id);
            response = await this.send('DELETE', `${path}/${id}`, undefined, {
                version: revision.version,
                clientId: this.clientId,
            });
        }

        if (isSuccess(response.status)) {
            return { ok: true, status: response.status, revision: readRevision(response.data), entity: response.data };
        }
        this.logger.debug('Received error from NiFi API', { status: response.status, id });
        return { ok: false, status: response.status, body: response.data };
    }

    async listChildren(groupId: string, kind: ChildKind): Promise<ResourceNode[]> {
        const response = await this.client.get<ProcessGroupFlowEntity>(`/flow/process-groups/${groupId}`);
        const flow = this.expectOk(response, `list process group ${groupId}`).processGroupFlow.flow;

        switch (kind) {
            case 'processors':
                return (flow.processors ?? []).map(toProcessorNode);
            case 'connections':
                return (flow.connections ?? []).map(toConnectionNode);
            case 'groups':
                return (flow.processGroups ?? []).map(toGroupNode);
            case 'ports': {
                const inputs = flow.inputPorts ?? [];
                const outputs = flow.outputPorts ?? [];
                inputs.forEach((port) => this.portPaths.set(port.id, '/input-ports'));
                outputs.forEach((port) => this.portPaths.set(port.id, '/output-ports'));
                return [...inputs, ...outputs].map(toPortNode);
            }
        }
    }

    async submitAsyncJob(kind: AsyncJobKind, target: string, options: AsyncJobOptions = {}): Promise<AsyncJob> {
        switch (kind) {
            case 'QUEUE_DRAIN': {
                const response = await this.client.post<DropRequestEntity>(`/flowfile-queues/${target}/drop-requests`);
                return toDropJob(target, this.expectOk(response, `create drop request for ${target}`));
            }
            case 'LISTING': {
                const response = await this.client.post<ListingRequestEntity>(`/flowfile-queues/${target}/listing-requests`);
                return toListingJob(target, this.expectOk(response, `create listing request for ${target}`));
            }
            case 'PROVENANCE': {
                const response = await this.client.post<ProvenanceEntity>('/provenance', {
                    provenance: {
                        request: {
                            maxResults: options.maxResults ?? defaultProvenanceResults,
                            searchTerms: { ProcessorID: { value: target, inverse: false } },
                        },
                    },
                });
                return toProvenanceJob(target, this.expectOk(response, `submit provenance query for ${target}`));
            }
        }
    }

    async pollAsyncJob(job: AsyncJobHandle): Promise<AsyncJob> {
        const operation = `poll ${job.kind} job ${job.jobId}`;
        switch (job.kind) {
            case 'QUEUE_DRAIN': {
                const response = await this.client.get<DropRequestEntity>(jobPath(job));
                return toDropJob(job.target, this.expectOk(response, operation));
            }
            case 'LISTING': {
                const response = await this.client.get<ListingRequestEntity>(jobPath(job));
                return toListingJob(job.target, this.expectOk(response, operation));
            }
            case 'PROVENANCE': {
                const response = await this.client.get<ProvenanceEntity>(jobPath(job));
                return toProvenanceJob(job.target, this.expectOk(response, operation));
            }
        }
    }

    async fetchAsyncJobResult(job: AsyncJobHandle): Promise<unknown> {
        const polled = await this.pollAsyncJob(job);
        return polled.resultPayload;
    }

    async deleteAsyncJob(job: AsyncJobHandle): Promise<void> {
        const response = await this.send('DELETE', jobPath(job));
        this.expectOk(response, `delete ${job.kind} job ${job.jobId}`);
    }

    private async send(
        method: Method,
        url: string,
        data?: unknown,
        params?: Record<string, unknown>
    ): Promise<AxiosResponse<unknown>> {
        return this.client.request<unknown>({ method, url, data, params });
    }

    private expectOk<T>(response: AxiosResponse<T>, operation: string): T {
        if (!isSuccess(response.status)) {
            throw new RemoteApiError(operation, response.status, response.data);
        }
        return response.data;
    }

    private async componentPath(type: ResourceType, id: string): Promise<string> {
        switch (type) {
            case 'processor':
                return '/processors';
            case 'connection':
                return '/connections';
            case 'group':
                return '/process-groups';
            case 'port':
                return this.resolvePortPath(id);
        }
    }

    /** Ports share an id space but not an endpoint; probe input first, then output. */
    private async resolvePortPath(id: string): Promise<PortPath> {
        const known = this.portPaths.get(id);
        if (known) {
            return known;
        }
        const probe = await this.client.get<PortEntity>(`/input-ports/${id}`);
        const path: PortPath = isSuccess(probe.status) ? '/input-ports' : '/output-ports';
        this.portPaths.set(id, path);
        return path;
    }
}

function isSuccess(status: number): boolean {
    return status >= 200 && status < 300;
}

function readRevision(data: unknown): number | undefined {
    if (data && typeof data === 'object' && 'revision' in data) {
        const revision = data.revision;
        if (revision && typeof revision === 'object' && 'version' in revision && typeof revision.version === 'number') {
            return revision.version;
        }
    }
    return undefined;
}

function toState(raw: string | undefined, validationStatus?: string): ComponentState {
    switch (raw) {
        case 'RUNNING':
        case 'STOPPED':
        case 'DISABLED':
            return raw;
        case 'INVALID':
            return 'INVALID';
        default:
            return validationStatus === 'INVALID' ? 'INVALID' : 'STOPPED';
    }
}

export function toProcessorNode(entity: ProcessorEntity): ResourceNode {
    return {
        id: entity.id,
        type: 'processor',
        name: entity.component.name,
        state: toState(entity.component.state, entity.component.validationStatus),
        validationStatus: entity.component.validationStatus,
        revision: entity.revision.version,
        parentGroupId: entity.component.parentGroupId,
    };
}

export function toConnectionNode(entity: ConnectionEntity): ResourceNode {
    const snapshot = entity.status?.aggregateSnapshot;
    const queued = snapshot?.flowFilesQueued ?? Number.parseInt(snapshot?.queuedCount ?? '0', 10);
    return {
        id: entity.id,
        type: 'connection',
        name: entity.component.name,
        state: 'STOPPED',
        revision: entity.revision.version,
        parentGroupId: entity.component.parentGroupId,
        source: {
            id: entity.component.source.id,
            groupId: entity.component.source.groupId,
            type: entity.component.source.type,
        },
        destination: {
            id: entity.component.destination.id,
            groupId: entity.component.destination.groupId,
            type: entity.component.destination.type,
        },
        queuedCount: Number.isFinite(queued) ? queued : 0,
    };
}

export function toPortNode(entity: PortEntity): ResourceNode {
    return {
        id: entity.id,
        type: 'port',
        name: entity.component.name,
        state: toState(entity.component.state),
        revision: entity.revision.version,
        parentGroupId: entity.component.parentGroupId,
    };
}

export function toGroupNode(entity: ProcessGroupEntity): ResourceNode {
    const runningCount = entity.runningCount ?? 0;
    return {
        id: entity.id,
        type: 'group',
        name: entity.component.name,
        state: runningCount > 0 ? 'RUNNING' : 'STOPPED',
        revision: entity.revision.version,
        parentGroupId: entity.component.parentGroupId,
        runningCount,
    };
}

function jobPath(job: AsyncJobHandle): string {
    switch (job.kind) {
        case 'QUEUE_DRAIN':
            return `/flowfile-queues/${job.target}/drop-requests/${job.jobId}`;
        case 'LISTING':
            return `/flowfile-queues/${job.target}/listing-requests/${job.jobId}`;
        case 'PROVENANCE':
            return `/provenance/${job.jobId}`;
    }
}

function jobStatus(finished: boolean, failureReason: string | undefined, percent: number): AsyncJobStatus {
    if (failureReason) {
        return 'FAILED';
    }
    if (finished) {
        return 'FINISHED';
    }
    return percent > 0 ? 'RUNNING' : 'PENDING';
}

function toDropJob(target: string, entity: DropRequestEntity): AsyncJob {
    const request = entity.dropRequest;
    const percentCompleted = request.percentCompleted ?? 0;
    return {
        jobId: request.id,
        kind: 'QUEUE_DRAIN',
        target,
        status: jobStatus(request.finished, request.failureReason, percentCompleted),
        percentCompleted,
        failureReason: request.failureReason,
        resultPayload: {
            originalCount: request.originalCount ?? 0,
            droppedCount: request.droppedCount ?? 0,
            currentCount: request.currentCount ?? 0,
            state: request.state ?? 'UNKNOWN',
        },
        createdAt: new Date(),
    };
}

function toListingJob(target: string, entity: ListingRequestEntity): AsyncJob {
    const request = entity.listingRequest;
    const percentCompleted = request.percentCompleted ?? 0;
    return {
        jobId: request.id,
        kind: 'LISTING',
        target,
        status: jobStatus(request.finished, request.failureReason, percentCompleted),
        percentCompleted,
        failureReason: request.failureReason,
        resultPayload: request.flowFileSummaries ?? [],
        createdAt: new Date(),
    };
}

function toProvenanceJob(target: string, entity: ProvenanceEntity): AsyncJob {
    const query = entity.provenance;
    const percentCompleted = query.percentCompleted ?? 0;
    const errors = query.results?.errors ?? [];
    return {
        jobId: query.id,
        kind: 'PROVENANCE',
        target,
        status: jobStatus(query.finished, errors.length > 0 ? errors.join('; ') : undefined, percentCompleted),
        percentCompleted,
        failureReason: errors.length > 0 ? errors.join('; ') : undefined,
        resultPayload: query.results?.provenanceEvents ?? [],
        createdAt: new Date(),
    };
}
