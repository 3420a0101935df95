import { errorMessage, RemediationFailedError } from '../errors.js';
import { delay } from '../jobs/poller.js';
import { drainQueue } from '../jobs/queue-jobs.js';
import { Logger } from '../logging/logger.js';
import type {
    ConnectableRef,
    MutationRequest,
    RemoteResourceClient,
    ResourceNode,
    ResourceType,
} from '../nifi/remote.js';
import type { MutationResult, RemediationAction, RemediationActionName } from './types.js';

export type StopScope = 'component' | 'parent-group' | 'component-then-parent-group';

export interface RemediationSettings {
    autoStop: boolean;
    autoDelete: boolean;
    autoPurge: boolean;
    stopScope: StopScope;
    maxRemediationRounds: number;
    /** Total attempts allowed for a mutation that keeps hitting stale revisions. */
    revisionAttempts: number;
    stopWaitMs: number;
    stopPollIntervalMs: number;
    jobPollIntervalMs: number;
    jobTimeoutMs: number;
}

export const defaultRemediationSettings: RemediationSettings = {
    autoStop: true,
    autoDelete: true,
    autoPurge: true,
    stopScope: 'component',
    maxRemediationRounds: 1,
    revisionAttempts: 3,
    stopWaitMs: 15_000,
    stopPollIntervalMs: 1_000,
    jobPollIntervalMs: 500,
    jobTimeoutMs: 30_000,
};

/** Dependent-connection removal may recurse into `mutate` this many levels deep. */
export const MAX_NESTING_DEPTH = 1;

export interface StrategyContext {
    client: RemoteResourceClient;
    settings: RemediationSettings;
    logger: Logger;
    log: RemediationAction[];
    target: ResourceNode;
    depth: number;
    mutate: (request: MutationRequest) => Promise<MutationResult>;
}

function record(
    ctx: StrategyContext,
    action: RemediationActionName,
    targetId: string,
    outcome: RemediationAction['outcome'],
    detail?: string
): RemediationAction {
    const entry: RemediationAction = { action, targetId, outcome, ...(detail ? { detail } : {}) };
    ctx.log.push(entry);
    if (outcome === 'succeeded') {
        ctx.logger.info(`[Remediation] ${action} ${targetId}`, { detail });
    } else {
        ctx.logger.warn(`[Remediation] ${action} ${targetId} failed`, { detail });
    }
    return entry;
}

function fail(
    ctx: StrategyContext,
    action: RemediationActionName,
    targetId: string,
    detail: string
): RemediationFailedError {
    return new RemediationFailedError(record(ctx, action, targetId, 'failed', detail));
}

function endpointType(endpoint: ConnectableRef): ResourceType | null {
    switch (endpoint.type) {
        case 'PROCESSOR':
            return 'processor';
        case 'INPUT_PORT':
        case 'OUTPUT_PORT':
            return 'port';
        default:
            return null;
    }
}

async function waitUntilStopped(
    ctx: StrategyContext,
    type: ResourceType,
    id: string,
    action: RemediationActionName
): Promise<void> {
    const startedAt = Date.now();
    for (;;) {
        let state: string;
        try {
            state = (await ctx.client.getResource(type, id)).resource.state;
        } catch (error) {
            throw fail(ctx, action, id, `could not read state: ${errorMessage(error)}`);
        }
        if (state !== 'RUNNING') {
            return;
        }
        if (Date.now() - startedAt >= ctx.settings.stopWaitMs) {
            throw fail(ctx, action, id, `still RUNNING after ${ctx.settings.stopWaitMs}ms`);
        }
        ctx.logger.debug(`[Remediation] Waiting for ${type} ${id} to stop`);
        await delay(ctx.settings.stopPollIntervalMs);
    }
}

async function stopComponent(ctx: StrategyContext, type: ResourceType, id: string): Promise<void> {
    if (type === 'group') {
        return stopGroup(ctx, id);
    }
    let revision: number;
    try {
        revision = (await ctx.client.getResource(type, id)).revision;
    } catch (error) {
        throw fail(ctx, 'stop-component', id, errorMessage(error));
    }
    const response = await ctx.client.mutateResource({ type, id, action: 'stop', revision });
    if (!response.ok) {
        throw fail(ctx, 'stop-component', id, `stop rejected (${response.status})`);
    }
    await waitUntilStopped(ctx, type, id, 'stop-component');
    record(ctx, 'stop-component', id, 'succeeded');
}

async function stopGroup(ctx: StrategyContext, groupId: string): Promise<void> {
    const response = await ctx.client.mutateResource({ type: 'group', id: groupId, action: 'stop' });
    if (!response.ok) {
        throw fail(ctx, 'stop-group', groupId, `stop rejected (${response.status})`);
    }
    await waitUntilStopped(ctx, 'group', groupId, 'stop-group');
    record(ctx, 'stop-group', groupId, 'succeeded');
}

/** The components whose running state blocks the target. */
async function runningBlockers(ctx: StrategyContext): Promise<Array<{ type: ResourceType; id: string }>> {
    const { target } = ctx;
    if (target.type !== 'connection') {
        return [{ type: target.type, id: target.id }];
    }
    const blockers: Array<{ type: ResourceType; id: string }> = [];
    for (const endpoint of [target.source, target.destination]) {
        const type = endpoint ? endpointType(endpoint) : null;
        if (!endpoint || !type || blockers.some((blocker) => blocker.id === endpoint.id)) {
            continue;
        }
        try {
            const snapshot = await ctx.client.getResource(type, endpoint.id);
            if (snapshot.resource.state === 'RUNNING') {
                blockers.push({ type, id: endpoint.id });
            }
        } catch (error) {
            ctx.logger.warn(`[Remediation] Could not check ${type} ${endpoint.id} state`, { error: errorMessage(error) });
        }
    }
    return blockers;
}

async function stopParentGroup(ctx: StrategyContext): Promise<void> {
    const { target } = ctx;
    if (target.type === 'group') {
        return stopGroup(ctx, target.id);
    }
    if (!target.parentGroupId) {
        throw fail(ctx, 'stop-group', target.id, 'parent process group is unknown');
    }
    return stopGroup(ctx, target.parentGroupId);
}

export async function stopRunningComponent(ctx: StrategyContext): Promise<void> {
    if (ctx.settings.stopScope === 'parent-group') {
        return stopParentGroup(ctx);
    }
    try {
        const blockers = await runningBlockers(ctx);
        if (blockers.length === 0) {
            throw fail(ctx, 'stop-component', ctx.target.id, 'no running component found to stop');
        }
        for (const blocker of blockers) {
            await stopComponent(ctx, blocker.type, blocker.id);
        }
    } catch (error) {
        if (ctx.settings.stopScope === 'component-then-parent-group' && error instanceof RemediationFailedError) {
            ctx.logger.info('[Remediation] Component stop failed, stopping parent process group instead');
            return stopParentGroup(ctx);
        }
        throw error;
    }
}

function referencesTarget(connection: ResourceNode, target: ResourceNode): boolean {
    const ends = [connection.source, connection.destination];
    if (target.type === 'group') {
        return ends.some((end) => end?.groupId === target.id);
    }
    return ends.some((end) => end?.id === target.id);
}

// A port is also wired from the group enclosing its own group.
async function connectionScopes(ctx: StrategyContext, parentGroupId: string): Promise<string[]> {
    if (ctx.target.type !== 'port') {
        return [parentGroupId];
    }
    const { resource: parent } = await ctx.client.getResource('group', parentGroupId);
    return parent.parentGroupId ? [parentGroupId, parent.parentGroupId] : [parentGroupId];
}

export async function removeDependentConnections(ctx: StrategyContext): Promise<void> {
    const { target } = ctx;
    if (ctx.depth >= MAX_NESTING_DEPTH) {
        throw fail(ctx, 'delete-connection', target.id, `nested remediation limit (${MAX_NESTING_DEPTH}) reached`);
    }
    if (!target.parentGroupId) {
        throw fail(ctx, 'delete-connection', target.id, 'parent process group is unknown');
    }

    const connections: ResourceNode[] = [];
    try {
        for (const groupId of await connectionScopes(ctx, target.parentGroupId)) {
            const listed = await ctx.client.listChildren(groupId, 'connections');
            connections.push(...listed.filter((connection) => referencesTarget(connection, target)));
        }
    } catch (error) {
        throw fail(ctx, 'delete-connection', target.id, `could not list connections: ${errorMessage(error)}`);
    }
    if (connections.length === 0) {
        throw fail(ctx, 'delete-connection', target.id, 'no connections reference this component');
    }

    // Sequential: each deletion is remediated on its own and logged in order.
    for (const connection of connections) {
        const nested = await ctx.mutate({
            type: 'connection',
            id: connection.id,
            action: 'delete',
            revision: connection.revision,
        });
        ctx.log.push(...nested.remediationLog);
        if (nested.status !== 'SUCCEEDED') {
            throw fail(ctx, 'delete-connection', connection.id, nested.reason ?? nested.status);
        }
        record(ctx, 'delete-connection', connection.id, 'succeeded');
    }
}

export async function drainConnectionQueue(ctx: StrategyContext): Promise<void> {
    const { target } = ctx;
    if (target.type !== 'connection') {
        throw fail(ctx, 'drain-queue', target.id, `a ${target.type} has no queue to drain`);
    }
    try {
        const summary = await drainQueue(ctx.client, target.id, {
            pollIntervalMs: ctx.settings.jobPollIntervalMs,
            timeoutMs: ctx.settings.jobTimeoutMs,
            logger: ctx.logger,
        });
        record(ctx, 'drain-queue', target.id, 'succeeded', `dropped ${summary.droppedCount} of ${summary.originalCount} flowfiles`);
    } catch (error) {
        throw fail(ctx, 'drain-queue', target.id, errorMessage(error));
    }
}
