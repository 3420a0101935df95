// NiFi API Type Definitions

export interface RevisionDTO {
    version: number;
    clientId?: string;
}

export interface ConnectableDTO {
    id: string;
    type: 'PROCESSOR' | 'INPUT_PORT' | 'OUTPUT_PORT' | 'FUNNEL' | 'REMOTE_INPUT_PORT' | 'REMOTE_OUTPUT_PORT';
    groupId: string;
    name?: string;
}

export interface ProcessorDTO {
    id: string;
    parentGroupId?: string;
    name: string;
    type: string;
    state?: string;
    validationErrors?: string[];
    validationStatus?: string;
}

export interface ProcessorEntity {
    revision: RevisionDTO;
    id: string;
    component: ProcessorDTO;
}

export interface PortDTO {
    id: string;
    parentGroupId?: string;
    name: string;
    type?: 'INPUT_PORT' | 'OUTPUT_PORT';
    state?: string;
    validationErrors?: string[];
}

export interface PortEntity {
    revision: RevisionDTO;
    id: string;
    component: PortDTO;
    portType?: 'INPUT_PORT' | 'OUTPUT_PORT';
}

export interface ConnectionDTO {
    id: string;
    parentGroupId?: string;
    source: ConnectableDTO;
    destination: ConnectableDTO;
    name?: string;
    selectedRelationships?: string[];
}

export interface ConnectionStatusSnapshotDTO {
    queuedCount?: string;
    flowFilesQueued?: number;
}

export interface ConnectionEntity {
    revision: RevisionDTO;
    id: string;
    component: ConnectionDTO;
    status?: {
        aggregateSnapshot?: ConnectionStatusSnapshotDTO;
    };
}

export interface ProcessGroupDTO {
    id: string;
    parentGroupId?: string;
    name: string;
}

export interface ProcessGroupEntity {
    revision: RevisionDTO;
    id: string;
    component: ProcessGroupDTO;
    runningCount?: number;
    stoppedCount?: number;
    invalidCount?: number;
    disabledCount?: number;
}

export interface ProcessGroupFlowDTO {
    id: string;
    parentGroupId?: string;
    flow: {
        processGroups?: ProcessGroupEntity[];
        processors?: ProcessorEntity[];
        connections?: ConnectionEntity[];
        inputPorts?: PortEntity[];
        outputPorts?: PortEntity[];
    };
}

export interface ProcessGroupFlowEntity {
    processGroupFlow: ProcessGroupFlowDTO;
}

export interface QueueSizeDTO {
    byteCount: number;
    objectCount: number;
}

export interface DropRequestDTO {
    id: string;
    uri?: string;
    finished: boolean;
    failureReason?: string;
    percentCompleted?: number;
    state?: string;
    originalCount?: number;
    droppedCount?: number;
    currentCount?: number;
    dropped?: string;
    original?: string;
}

export interface DropRequestEntity {
    dropRequest: DropRequestDTO;
}

export interface FlowFileSummaryDTO {
    uuid: string;
    filename?: string;
    position?: number;
    size?: number;
    queuedDuration?: number;
    penalized?: boolean;
}

export interface ListingRequestDTO {
    id: string;
    finished: boolean;
    failureReason?: string;
    percentCompleted?: number;
    state?: string;
    queueSize?: QueueSizeDTO;
    flowFileSummaries?: FlowFileSummaryDTO[];
}

export interface ListingRequestEntity {
    listingRequest: ListingRequestDTO;
}

export interface ProvenanceEventDTO {
    id: string;
    eventId?: number;
    eventTime?: string;
    eventType?: string;
    componentId?: string;
    componentName?: string;
    flowFileUuid?: string;
    fileSize?: string;
}

export interface ProvenanceDTO {
    id: string;
    finished: boolean;
    percentCompleted?: number;
    results?: {
        provenanceEvents?: ProvenanceEventDTO[];
        totalCount?: number;
        errors?: string[];
    };
}

export interface ProvenanceEntity {
    provenance: ProvenanceDTO;
}
