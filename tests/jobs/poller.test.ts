import { describe, expect, it, vi } from 'vitest';
import { JobFailedError, JobTimeoutError } from '../../src/errors.js';
import type { AsyncJob, AsyncJobStatus } from '../../src/nifi/remote.js';
import { AsyncJobRun, runAsyncJob } from '../../src/jobs/poller.js';

function job(status: AsyncJobStatus, extra: Partial<AsyncJob> = {}): AsyncJob {
    return {
        jobId: 'req-1',
        kind: 'QUEUE_DRAIN',
        target: 'conn-1',
        status,
        percentCompleted: status === 'FINISHED' ? 100 : 0,
        createdAt: new Date(0),
        ...extra,
    };
}

function createRun(statuses: AsyncJob[], overrides: Partial<AsyncJobRun<string>> = {}) {
    let clock = 0;
    const sleeps: number[] = [];
    const queue = [...statuses];
    const run = {
        submit: vi.fn(async () => job('PENDING')),
        poll: vi.fn(async () => queue.shift() ?? job('RUNNING')),
        fetch: vi.fn(async () => 'payload'),
        cleanup: vi.fn(async () => undefined),
        pollIntervalMs: 30,
        timeoutMs: 100,
        now: () => clock,
        sleep: async (ms: number) => {
            sleeps.push(ms);
            clock += ms;
        },
        ...overrides,
    };
    return { run, sleeps };
}

describe('runAsyncJob', () => {
    it('polls until the job finishes, fetches the result and deletes the job', async () => {
        const { run, sleeps } = createRun([job('RUNNING'), job('FINISHED')]);

        await expect(runAsyncJob(run)).resolves.toBe('payload');

        expect(run.poll).toHaveBeenCalledTimes(2);
        expect(sleeps).toEqual([30, 30]);
        expect(run.fetch).toHaveBeenCalledTimes(1);
        expect(run.cleanup).toHaveBeenCalledTimes(1);
    });

    it('raises JobFailedError with the reported reason and still deletes the job', async () => {
        const { run } = createRun([job('FAILED', { failureReason: 'Repository unavailable' })]);

        const error = await runAsyncJob(run).catch((caught: unknown) => caught);

        expect(error).toBeInstanceOf(JobFailedError);
        expect(error).toMatchObject({ jobId: 'req-1', failureReason: 'Repository unavailable' });
        expect(run.fetch).not.toHaveBeenCalled();
        expect(run.cleanup).toHaveBeenCalledTimes(1);
    });

    it('gives up after the timeout without sleeping past it', async () => {
        const { run, sleeps } = createRun([]);

        await expect(runAsyncJob(run)).rejects.toBeInstanceOf(JobTimeoutError);

        expect(sleeps).toEqual([30, 30, 30, 10]);
        expect(run.cleanup).toHaveBeenCalledTimes(1);
    });

    it('keeps the result when the cleanup call fails', async () => {
        const { run } = createRun([job('FINISHED')], {
            cleanup: vi.fn(async () => {
                throw new Error('gone');
            }),
        });

        await expect(runAsyncJob(run)).resolves.toBe('payload');
        expect(run.cleanup).toHaveBeenCalledTimes(1);
    });

    it('propagates a fetch failure after deleting the job', async () => {
        const { run } = createRun([job('FINISHED')], {
            fetch: vi.fn(async () => {
                throw new Error('bad payload');
            }),
        });

        await expect(runAsyncJob(run)).rejects.toThrow('bad payload');
        expect(run.cleanup).toHaveBeenCalledTimes(1);
    });

    it('does not poll a job that is already finished on submit', async () => {
        const { run } = createRun([], { submit: vi.fn(async () => job('FINISHED')) });

        await expect(runAsyncJob(run)).resolves.toBe('payload');
        expect(run.poll).not.toHaveBeenCalled();
    });
});
