import type { AsyncJobKind } from './nifi/remote.js';
import type { RemediationAction } from './remediation/types.js';

/** A read or job call against the NiFi API that returned a non-2xx status. */
export class RemoteApiError extends Error {
    readonly status: number;
    readonly body: unknown;

    constructor(operation: string, status: number, body: unknown) {
        super(`${operation} failed (${status}): ${describeBody(body)}`);
        this.name = 'RemoteApiError';
        this.status = status;
        this.body = body;
    }
}

export class InvalidTokenError extends Error {
    readonly token: string;

    constructor(token: string, reason: string) {
        super(`Invalid continuation token "${token}": ${reason}. Restart the traversal from the root group.`);
        this.name = 'InvalidTokenError';
        this.token = token;
    }
}

export class JobFailedError extends Error {
    readonly jobId: string;
    readonly kind: AsyncJobKind;
    readonly failureReason: string;

    constructor(jobId: string, kind: AsyncJobKind, failureReason: string) {
        super(`${kind} job ${jobId} failed: ${failureReason}`);
        this.name = 'JobFailedError';
        this.jobId = jobId;
        this.kind = kind;
        this.failureReason = failureReason;
    }
}

export class JobTimeoutError extends Error {
    readonly jobId: string;
    readonly kind: AsyncJobKind;
    readonly timeoutMs: number;

    constructor(jobId: string, kind: AsyncJobKind, timeoutMs: number) {
        super(`${kind} job ${jobId} did not finish within ${timeoutMs}ms`);
        this.name = 'JobTimeoutError';
        this.jobId = jobId;
        this.kind = kind;
        this.timeoutMs = timeoutMs;
    }
}

/** Thrown by a remediation strategy whose own action did not succeed. */
export class RemediationFailedError extends Error {
    readonly action: RemediationAction;

    constructor(action: RemediationAction) {
        super(`${action.action} on ${action.targetId} failed${action.detail ? `: ${action.detail}` : ''}`);
        this.name = 'RemediationFailedError';
        this.action = action;
    }
}

export function describeBody(body: unknown): string {
    if (typeof body === 'string') {
        return body;
    }
    if (body && typeof body === 'object' && 'message' in body && typeof body.message === 'string') {
        return body.message;
    }
    if (body === undefined || body === null) {
        return '';
    }
    return JSON.stringify(body);
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
