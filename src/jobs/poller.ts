import { errorMessage, JobFailedError, JobTimeoutError } from '../errors.js';
import { Logger, silentLogger } from '../logging/logger.js';
import type { AsyncJob } from '../nifi/remote.js';

export interface AsyncJobRun<T> {
    submit: () => Promise<AsyncJob>;
    poll: (job: AsyncJob) => Promise<AsyncJob>;
    fetch: (job: AsyncJob) => Promise<T>;
    /** Frees the job server-side. Runs exactly once for every submitted job. */
    cleanup: (job: AsyncJob) => Promise<void>;
    pollIntervalMs: number;
    timeoutMs: number;
    logger?: Logger;
    now?: () => number;
    sleep?: (ms: number) => Promise<void>;
}

export function delay(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
}

function isTerminal(job: AsyncJob): boolean {
    return job.status === 'FINISHED' || job.status === 'FAILED';
}

/**
 * Drives NiFi's submit → poll → fetch → delete pattern.
 *
 * Throws `JobFailedError` when NiFi reports a failure and `JobTimeoutError`
 * when the job is still running after `timeoutMs`. A failing cleanup is
 * logged; it never replaces the result or the original error.
 */
export async function runAsyncJob<T>(run: AsyncJobRun<T>): Promise<T> {
    const logger = run.logger ?? silentLogger;
    const now = run.now ?? Date.now;
    const sleep = run.sleep ?? delay;

    const startedAt = now();
    let job = await run.submit();
    const jobLogger = logger.child({ jobId: job.jobId, kind: job.kind, target: job.target });
    jobLogger.debug('Submitted async job', { status: job.status });

    try {
        while (!isTerminal(job)) {
            const elapsed = now() - startedAt;
            if (elapsed >= run.timeoutMs) {
                throw new JobTimeoutError(job.jobId, job.kind, run.timeoutMs);
            }
            await sleep(Math.min(run.pollIntervalMs, run.timeoutMs - elapsed));
            job = await run.poll(job);
            jobLogger.debug('Polled async job', { status: job.status, percentCompleted: job.percentCompleted });
        }

        if (job.status === 'FAILED') {
            throw new JobFailedError(job.jobId, job.kind, job.failureReason ?? 'no reason given');
        }
        return await run.fetch(job);
    } finally {
        try {
            await run.cleanup(job);
            jobLogger.debug('Deleted async job');
        } catch (cleanupError) {
            jobLogger.warn('Failed to delete async job', { error: errorMessage(cleanupError) });
        }
    }
}
