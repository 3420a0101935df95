import { errorMessage, InvalidTokenError, RemoteApiError } from '../errors.js';
import { Logger, silentLogger } from '../logging/logger.js';
import type { ChildKind, RemoteResourceClient, ResourceNode } from '../nifi/remote.js';
import { mapWithConcurrency } from './pool.js';
import { decodeToken, encodeToken, FrontierEntry, TraversalState } from './token-codec.js';

export type TraversalPhase = 'INITIALIZING' | 'EXPANDING' | 'TIMED_OUT' | 'DEPTH_EXHAUSTED' | 'INCOMPLETE' | 'COMPLETED';

export interface TraversalRequest {
    rootGroupId: string;
    kind: ChildKind;
    maxDepth: number;
    timeoutMs: number;
    continuationToken?: string | null;
}

export interface GroupListing {
    groupId: string;
    groupName?: string;
    depth: number;
    objects: ResourceNode[];
    /** Set when listing this group failed; it is retried by the next resumed call. */
    incomplete?: true;
    error?: string;
}

export interface TraversalResult {
    results: GroupListing[];
    completed: boolean;
    continuationToken: string | null;
    processedCount: number;
    timedOut: boolean;
    terminalState: Exclude<TraversalPhase, 'INITIALIZING' | 'EXPANDING'>;
    failedGroupIds: string[];
}

export interface HierarchyTraversalOptions {
    concurrency?: number;
    logger?: Logger;
    now?: () => number;
}

interface Expansion {
    listing: GroupListing;
    childGroups: ResourceNode[];
}

const defaultConcurrency = 5;

/**
 * Breadth-first listing of a process group tree that stops at a wall-clock
 * deadline and hands back a continuation token for the unexpanded frontier.
 *
 * Sibling groups of one level are listed concurrently and joined before the
 * next level starts, so concatenating the results of a call and its resumed
 * calls gives the same order as one unbounded call over an unchanged tree.
 */
export class HierarchyTraversalEngine {
    private client: RemoteResourceClient;
    private concurrency: number;
    private logger: Logger;
    private now: () => number;

    constructor(client: RemoteResourceClient, options: HierarchyTraversalOptions = {}) {
        this.client = client;
        this.concurrency = options.concurrency ?? defaultConcurrency;
        this.logger = (options.logger ?? silentLogger).child({ component: 'traversal' });
        this.now = options.now ?? Date.now;
    }

    async traverse(request: TraversalRequest): Promise<TraversalResult> {
        const logger = this.logger.child({ root: request.rootGroupId, kind: request.kind });
        const state: TraversalState = {
            anchorGroupId: request.rootGroupId,
            frontier: await this.initialFrontier(request),
            visitedCount: 0,
            deadline: this.now() + request.timeoutMs,
            maxDepth: request.maxDepth,
        };
        const results: GroupListing[] = [];
        const failedGroupIds: string[] = [];
        const groupNames = new Map<string, string>();
        const fromToken = new Set(request.continuationToken ? state.frontier.map((entry) => entry.groupId) : []);
        let timedOut = false;

        logger.debug('Starting traversal', { frontier: state.frontier.length, resumed: Boolean(request.continuationToken) });

        while (state.frontier.length > 0 && state.frontier[0].depth <= state.maxDepth) {
            const depth = state.frontier[0].depth;
            const levelSize = state.frontier.findIndex((entry) => entry.depth !== depth);
            const level = levelSize === -1 ? state.frontier : state.frontier.slice(0, levelSize);
            const rest = levelSize === -1 ? [] : state.frontier.slice(levelSize);

            const outcomes = await mapWithConcurrency(
                level,
                this.concurrency,
                (entry) => this.expand(entry, request.kind, groupNames),
                () => this.now() <= state.deadline
            );

            const leftover: FrontierEntry[] = [];
            const discovered: FrontierEntry[] = [];
            outcomes.forEach((outcome, index) => {
                const entry = level[index];
                if (outcome.status === 'fulfilled') {
                    state.visitedCount += 1;
                    results.push(outcome.value.listing);
                    for (const child of outcome.value.childGroups) {
                        discovered.push({ groupId: child.id, depth: depth + 1 });
                    }
                } else if (outcome.status === 'rejected') {
                    if (request.continuationToken && fromToken.has(entry.groupId) && isMissing(outcome.reason)) {
                        throw new InvalidTokenError(request.continuationToken, `group ${entry.groupId} no longer exists`);
                    }
                    const error = errorMessage(outcome.reason);
                    logger.warn(`Failed to list ${request.kind} in group ${entry.groupId}`, { error });
                    results.push({ groupId: entry.groupId, groupName: groupNames.get(entry.groupId), depth, objects: [], incomplete: true, error });
                    failedGroupIds.push(entry.groupId);
                    leftover.push(entry);
                } else {
                    timedOut = true;
                    leftover.push(entry);
                }
            });

            state.frontier = [...leftover, ...rest, ...discovered];
            if (leftover.length > 0) {
                break;
            }
        }

        const terminalState = this.terminalState(state, timedOut, failedGroupIds.length > 0);
        const continuationToken = state.frontier.length > 0 ? encodeToken(state) : null;
        logger.info(`Traversal ${terminalState}`, { processedCount: state.visitedCount, results: results.length });

        return {
            results,
            completed: terminalState === 'COMPLETED',
            continuationToken,
            processedCount: state.visitedCount,
            timedOut,
            terminalState,
            failedGroupIds,
        };
    }

    private async initialFrontier(request: TraversalRequest): Promise<FrontierEntry[]> {
        const token = request.continuationToken;
        if (!token) {
            return [{ groupId: request.rootGroupId, depth: 0 }];
        }
        const cursor = decodeToken(token);
        if (cursor.anchorGroupId !== request.rootGroupId) {
            throw new InvalidTokenError(token, `it belongs to a traversal of group ${cursor.anchorGroupId}`);
        }
        try {
            await this.client.getResource('group', cursor.anchorGroupId);
        } catch (error) {
            if (isMissing(error)) {
                throw new InvalidTokenError(token, `group ${cursor.anchorGroupId} no longer exists`);
            }
            throw error;
        }
        return cursor.frontier;
    }

    private async expand(entry: FrontierEntry, kind: ChildKind, groupNames: Map<string, string>): Promise<Expansion> {
        // Groups handed over by a token were named in an earlier call.
        if (!groupNames.has(entry.groupId)) {
            const { resource } = await this.client.getResource('group', entry.groupId);
            if (resource.name) {
                groupNames.set(entry.groupId, resource.name);
            }
        }
        const objects = await this.client.listChildren(entry.groupId, kind);
        const childGroups = kind === 'groups' ? objects : await this.client.listChildren(entry.groupId, 'groups');
        for (const child of childGroups) {
            if (child.name) {
                groupNames.set(child.id, child.name);
            }
        }
        return {
            listing: { groupId: entry.groupId, groupName: groupNames.get(entry.groupId), depth: entry.depth, objects },
            childGroups,
        };
    }

    private terminalState(state: TraversalState, timedOut: boolean, failed: boolean): TraversalResult['terminalState'] {
        if (timedOut) {
            return 'TIMED_OUT';
        }
        if (failed) {
            return 'INCOMPLETE';
        }
        if (state.frontier.length === 0) {
            return 'COMPLETED';
        }
        return 'DEPTH_EXHAUSTED';
    }
}

function isMissing(error: unknown): boolean {
    return error instanceof RemoteApiError && error.status === 404;
}
