// Contract between the core engines and whatever talks to the NiFi REST API.

export type ResourceType = 'group' | 'processor' | 'connection' | 'port';

export type ComponentState = 'RUNNING' | 'STOPPED' | 'DISABLED' | 'INVALID';

/** What a traversal can list inside a process group. */
export type ChildKind = 'processors' | 'connections' | 'ports' | 'groups';

export interface ConnectableRef {
    id: string;
    groupId: string;
    type: string;
}

/** A transient read copy of a component owned by NiFi. */
export interface ResourceNode {
    id: string;
    type: ResourceType;
    name?: string;
    state: ComponentState;
    validationStatus?: string;
    revision: number;
    parentGroupId?: string;
    source?: ConnectableRef;
    destination?: ConnectableRef;
    queuedCount?: number;
    runningCount?: number;
}

export interface ResourceSnapshot {
    resource: ResourceNode;
    revision: number;
}

export type MutationAction = 'update' | 'delete' | 'start' | 'stop';

export interface MutationRequest {
    type: ResourceType;
    id: string;
    action: MutationAction;
    /** Last observed revision; resolved from NiFi when omitted. */
    revision?: number;
    /** Component fields for `update`, passed through untouched. */
    payload?: Record<string, unknown>;
}

export type MutationResponse =
    | { ok: true; status: number; revision?: number; entity: unknown }
    | { ok: false; status: number; body: unknown };

export type AsyncJobKind = 'QUEUE_DRAIN' | 'LISTING' | 'PROVENANCE';

export type AsyncJobStatus = 'PENDING' | 'RUNNING' | 'FINISHED' | 'FAILED';

/** NiFi addresses drop and listing requests under their connection, so handles keep the target. */
export interface AsyncJobHandle {
    jobId: string;
    kind: AsyncJobKind;
    target: string;
}

export interface AsyncJob extends AsyncJobHandle {
    status: AsyncJobStatus;
    percentCompleted: number;
    failureReason?: string;
    resultPayload?: unknown;
    createdAt: Date;
}

export interface AsyncJobOptions {
    maxResults?: number;
}

export interface RemoteResourceClient {
    /** Throws `RemoteApiError` when NiFi answers with a non-2xx status. */
    getResource(type: ResourceType, id: string): Promise<ResourceSnapshot>;
    /** Never throws on an HTTP status; conflicts come back as `{ ok: false }`. */
    mutateResource(request: MutationRequest): Promise<MutationResponse>;
    listChildren(groupId: string, kind: ChildKind): Promise<ResourceNode[]>;
    submitAsyncJob(kind: AsyncJobKind, target: string, options?: AsyncJobOptions): Promise<AsyncJob>;
    pollAsyncJob(job: AsyncJobHandle): Promise<AsyncJob>;
    fetchAsyncJobResult(job: AsyncJobHandle): Promise<unknown>;
    deleteAsyncJob(job: AsyncJobHandle): Promise<void>;
}
