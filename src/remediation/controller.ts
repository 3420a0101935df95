import { describeBody, errorMessage, RemediationFailedError, RemoteApiError } from '../errors.js';
import { Logger, silentLogger } from '../logging/logger.js';
import type { MutationRequest, RemoteResourceClient, ResourceNode } from '../nifi/remote.js';
import { classify } from './classifier.js';
import {
    defaultRemediationSettings,
    drainConnectionQueue,
    RemediationSettings,
    removeDependentConnections,
    StrategyContext,
    stopRunningComponent,
} from './strategies.js';
import {
    ConflictCategory,
    isRemediable,
    MutationError,
    MutationResult,
    MutationStatus,
    RemediableCategory,
    RemediationAction,
} from './types.js';

export interface RemediationControllerOptions {
    settings?: Partial<RemediationSettings>;
    logger?: Logger;
}

interface RunState {
    request: MutationRequest;
    log: RemediationAction[];
    attempts: number;
    category: ConflictCategory | null;
    remediated: boolean;
}

const strategyFlags: Record<Exclude<RemediableCategory, 'REVISION_CONFLICT'>, {
    flag: 'autoStop' | 'autoDelete' | 'autoPurge';
    label: string;
}> = {
    RUNNING_CONFLICT: { flag: 'autoStop', label: 'Auto-Stop' },
    DEPENDENT_EDGES_CONFLICT: { flag: 'autoDelete', label: 'Auto-Delete' },
    NON_EMPTY_QUEUE_CONFLICT: { flag: 'autoPurge', label: 'Auto-Purge' },
};

/** Group schedule changes go through /flow and take no revision. */
function carriesRevision(request: MutationRequest): boolean {
    return !(request.type === 'group' && (request.action === 'start' || request.action === 'stop'));
}

/**
 * Sends a mutation to NiFi and, when NiFi rejects it with a known conflict,
 * clears the conflict and retries.
 *
 * Each conflict category has its own round budget: `maxRemediationRounds`
 * for running/dependent-connection/queue conflicts and
 * `revisionAttempts - 1` refreshes for stale revisions. The returned log
 * lists every compensating action in the order it ran.
 */
export class RemediationController {
    private client: RemoteResourceClient;
    private settings: RemediationSettings;
    private logger: Logger;

    constructor(client: RemoteResourceClient, options: RemediationControllerOptions = {}) {
        this.client = client;
        this.settings = { ...defaultRemediationSettings, ...options.settings };
        this.logger = (options.logger ?? silentLogger).child({ component: 'remediation' });
    }

    mutate(request: MutationRequest, maxRemediationRounds = this.settings.maxRemediationRounds): Promise<MutationResult> {
        return this.run(request, maxRemediationRounds, 0);
    }

    private async run(request: MutationRequest, maxRounds: number, depth: number): Promise<MutationResult> {
        const logger = this.logger.child({ target: `${request.type}:${request.id}`, action: request.action, depth });
        const state: RunState = { request: { ...request }, log: [], attempts: 0, category: null, remediated: false };
        const rounds = new Map<RemediableCategory, number>();

        if (state.request.revision === undefined && carriesRevision(state.request)) {
            try {
                state.request.revision = (await this.client.getResource(request.type, request.id)).revision;
            } catch (error) {
                if (error instanceof RemoteApiError) {
                    return this.finish(state, 'FAILED', logger, this.toMutationError(error.status, error.body));
                }
                throw error;
            }
        }

        for (;;) {
            state.attempts += 1;
            const response = await this.client.mutateResource(state.request);
            if (response.ok) {
                return this.finish(state, 'SUCCEEDED', logger, undefined, response.entity);
            }

            const error = this.toMutationError(response.status, response.body);
            state.category = error.category;
            logger.info(`Mutation rejected (${response.status}) as ${error.category}`, { attempt: state.attempts });

            if (!isRemediable(error.category)) {
                return this.finish(state, state.remediated ? 'FAILED_AFTER_REMEDIATION' : 'FAILED', logger, error);
            }
            if (error.category !== 'REVISION_CONFLICT') {
                const { flag, label } = strategyFlags[error.category];
                if (!this.settings[flag]) {
                    const status = state.remediated ? 'FAILED_AFTER_REMEDIATION' : 'FAILED';
                    return this.finish(state, status, logger, error, undefined, `${label} is disabled`);
                }
            }

            const used = rounds.get(error.category) ?? 0;
            if (used >= this.roundLimit(error.category, maxRounds)) {
                return this.finish(
                    state,
                    state.remediated ? 'FAILED_AFTER_REMEDIATION' : 'FAILED',
                    logger,
                    error,
                    undefined,
                    `still ${error.category} after ${used} remediation round(s)`
                );
            }
            rounds.set(error.category, used + 1);

            try {
                await this.remediate(error.category, state, maxRounds, depth, logger);
            } catch (remediationError) {
                if (remediationError instanceof RemediationFailedError) {
                    return this.finish(state, 'REMEDIATION_FAILED', logger, error, undefined, remediationError.message);
                }
                throw remediationError;
            }
            state.remediated = true;
        }
    }

    private roundLimit(category: RemediableCategory, maxRounds: number): number {
        return category === 'REVISION_CONFLICT' ? Math.max(0, this.settings.revisionAttempts - 1) : maxRounds;
    }

    /** Runs the category's strategy, then re-reads the target so the retry carries its current revision. */
    private async remediate(
        category: RemediableCategory,
        state: RunState,
        maxRounds: number,
        depth: number,
        logger: Logger
    ): Promise<void> {
        const target = await this.readTarget(state);

        if (category === 'REVISION_CONFLICT') {
            state.request = { ...state.request, revision: target.revision };
            state.log.push({
                action: 'refresh-revision',
                targetId: target.id,
                outcome: 'succeeded',
                detail: `revision ${target.revision}`,
            });
            return;
        }

        const ctx: StrategyContext = {
            client: this.client,
            settings: this.settings,
            logger,
            log: state.log,
            target,
            depth,
            mutate: (nested) => this.run(nested, maxRounds, depth + 1),
        };
        switch (category) {
            case 'RUNNING_CONFLICT':
                await stopRunningComponent(ctx);
                break;
            case 'DEPENDENT_EDGES_CONFLICT':
                await removeDependentConnections(ctx);
                break;
            case 'NON_EMPTY_QUEUE_CONFLICT':
                await drainConnectionQueue(ctx);
                break;
        }

        if (carriesRevision(state.request)) {
            const refreshed = await this.readTarget(state);
            state.request = { ...state.request, revision: refreshed.revision };
        }
    }

    private async readTarget(state: RunState): Promise<ResourceNode> {
        const { type, id } = state.request;
        try {
            return (await this.client.getResource(type, id)).resource;
        } catch (error) {
            const failed: RemediationAction = {
                action: 'refresh-revision',
                targetId: id,
                outcome: 'failed',
                detail: errorMessage(error),
            };
            state.log.push(failed);
            throw new RemediationFailedError(failed);
        }
    }

    private toMutationError(status: number, body: unknown): MutationError {
        return { status, category: classify(status, body), body, message: describeBody(body) };
    }

    private finish(
        state: RunState,
        status: MutationStatus,
        logger: Logger,
        error?: MutationError,
        result?: unknown,
        reason?: string
    ): MutationResult {
        if (status === 'SUCCEEDED') {
            logger.info('Mutation succeeded', { attempts: state.attempts, actions: state.log.length });
        } else {
            logger.warn(`Mutation ${status}`, { reason: reason ?? error?.message, actions: state.log.length });
        }
        return {
            status,
            request: state.request,
            remediationLog: state.log,
            attempt: {
                targetId: state.request.id,
                category: state.category,
                actionsTaken: state.log,
                finalOutcome: status,
            },
            attempts: state.attempts,
            ...(result !== undefined ? { result } : {}),
            ...(error ? { error } : {}),
            ...(reason ? { reason } : {}),
        };
    }
}
