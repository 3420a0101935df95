import { z } from 'zod';
import { Logger } from '../logging/logger.js';
import type { AsyncJobKind, RemoteResourceClient } from '../nifi/remote.js';
import { runAsyncJob } from './poller.js';

export interface JobSettings {
    pollIntervalMs: number;
    timeoutMs: number;
    logger?: Logger;
}

const dropSummarySchema = z.object({
    originalCount: z.number(),
    droppedCount: z.number(),
    currentCount: z.number(),
    state: z.string(),
});

export type DropSummary = z.infer<typeof dropSummarySchema>;

const flowFileSummarySchema = z
    .object({
        uuid: z.string(),
        filename: z.string().optional(),
        position: z.number().optional(),
        size: z.number().optional(),
        queuedDuration: z.number().optional(),
        penalized: z.boolean().optional(),
    })
    .passthrough();

export type FlowFileSummary = z.infer<typeof flowFileSummarySchema>;

const provenanceEventSchema = z
    .object({
        id: z.string(),
        eventType: z.string().optional(),
        eventTime: z.string().optional(),
        componentId: z.string().optional(),
        componentName: z.string().optional(),
        flowFileUuid: z.string().optional(),
    })
    .passthrough();

export type ProvenanceEvent = z.infer<typeof provenanceEventSchema>;

function runJob<S extends z.ZodTypeAny>(
    client: RemoteResourceClient,
    kind: AsyncJobKind,
    target: string,
    schema: S,
    settings: JobSettings,
    maxResults?: number
): Promise<z.infer<S>> {
    return runAsyncJob<z.infer<S>>({
        submit: () => client.submitAsyncJob(kind, target, { maxResults }),
        poll: (job) => client.pollAsyncJob(job),
        fetch: async (job) => schema.parse(await client.fetchAsyncJobResult(job)),
        cleanup: (job) => client.deleteAsyncJob(job),
        pollIntervalMs: settings.pollIntervalMs,
        timeoutMs: settings.timeoutMs,
        logger: settings.logger,
    });
}

/** Drops every FlowFile queued on a connection. */
export function drainQueue(client: RemoteResourceClient, connectionId: string, settings: JobSettings): Promise<DropSummary> {
    return runJob(client, 'QUEUE_DRAIN', connectionId, dropSummarySchema, settings);
}

export function listQueue(
    client: RemoteResourceClient,
    connectionId: string,
    settings: JobSettings
): Promise<FlowFileSummary[]> {
    return runJob(client, 'LISTING', connectionId, z.array(flowFileSummarySchema), settings);
}

export function queryProvenance(
    client: RemoteResourceClient,
    componentId: string,
    maxResults: number,
    settings: JobSettings
): Promise<ProvenanceEvent[]> {
    return runJob(client, 'PROVENANCE', componentId, z.array(provenanceEventSchema), settings, maxResults);
}
