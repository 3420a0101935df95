import type { MutationRequest } from '../nifi/remote.js';

export type ConflictCategory =
    | 'RUNNING_CONFLICT'
    | 'DEPENDENT_EDGES_CONFLICT'
    | 'NON_EMPTY_QUEUE_CONFLICT'
    | 'REVISION_CONFLICT'
    | 'NOT_FOUND'
    | 'PERMISSION_DENIED'
    | 'UNCLASSIFIED';

export type RemediableCategory = Extract<
    ConflictCategory,
    'RUNNING_CONFLICT' | 'DEPENDENT_EDGES_CONFLICT' | 'NON_EMPTY_QUEUE_CONFLICT' | 'REVISION_CONFLICT'
>;

export type MutationStatus = 'SUCCEEDED' | 'FAILED' | 'FAILED_AFTER_REMEDIATION' | 'REMEDIATION_FAILED';

export type RemediationActionName =
    | 'stop-component'
    | 'stop-group'
    | 'delete-connection'
    | 'drain-queue'
    | 'refresh-revision';

export interface RemediationAction {
    action: RemediationActionName;
    targetId: string;
    outcome: 'succeeded' | 'failed';
    detail?: string;
}

export interface RemediationAttempt {
    targetId: string;
    /** Most recent conflict category seen for this mutation. */
    category: ConflictCategory | null;
    actionsTaken: RemediationAction[];
    finalOutcome: MutationStatus;
}

export interface MutationError {
    status: number;
    category: ConflictCategory;
    /** Response body exactly as NiFi returned it. */
    body: unknown;
    message: string;
}

export interface MutationResult {
    status: MutationStatus;
    request: MutationRequest;
    remediationLog: RemediationAction[];
    attempt: RemediationAttempt;
    /** Number of times the original request was sent. */
    attempts: number;
    result?: unknown;
    error?: MutationError;
    /** Why the mutation stopped short of success, for callers that only read one line. */
    reason?: string;
}

export function isRemediable(category: ConflictCategory): category is RemediableCategory {
    return (
        category === 'RUNNING_CONFLICT' ||
        category === 'DEPENDENT_EDGES_CONFLICT' ||
        category === 'NON_EMPTY_QUEUE_CONFLICT' ||
        category === 'REVISION_CONFLICT'
    );
}
