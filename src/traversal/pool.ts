export type PoolOutcome<R> =
    | { status: 'fulfilled'; value: R }
    | { status: 'rejected'; reason: unknown }
    | { status: 'skipped' };

/**
 * Runs `task` over `items` with at most `concurrency` in flight.
 *
 * Outcomes keep the position of their item. Before taking an item a worker
 * asks `shouldContinue`; once it answers false no further items start and
 * the rest are reported as skipped. Items already running finish.
 */
export async function mapWithConcurrency<T, R>(
    items: readonly T[],
    concurrency: number,
    task: (item: T, index: number) => Promise<R>,
    shouldContinue: () => boolean = () => true
): Promise<PoolOutcome<R>[]> {
    const outcomes: PoolOutcome<R>[] = items.map(() => ({ status: 'skipped' }));
    let nextIndex = 0;
    let stopped = false;

    const worker = async (): Promise<void> => {
        while (!stopped && nextIndex < items.length) {
            if (!shouldContinue()) {
                stopped = true;
                return;
            }
            const index = nextIndex++;
            try {
                outcomes[index] = { status: 'fulfilled', value: await task(items[index], index) };
            } catch (reason) {
                outcomes[index] = { status: 'rejected', reason };
            }
        }
    };

    const workerCount = Math.max(1, Math.min(concurrency, items.length));
    await Promise.all(Array.from({ length: workerCount }, () => worker()));
    return outcomes;
}
