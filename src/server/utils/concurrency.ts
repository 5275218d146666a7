/**
 * Limiter
 *
 * Runs async thunks with at most `concurrency` in flight; the rest wait in FIFO order.
 * A rejected thunk frees its slot like a resolved one.
 */
export interface Limiter {
    run<T>(fn: () => Promise<T>): Promise<T>;
    readonly activeCount: number;
    readonly pendingCount: number;
    /** Drop thunks that have not started; their promises never settle */
    clearQueue(): void;
}

/**
 * pLimit
 *
 * @param concurrency - Max number of concurrent operations (integer >= 1, or Infinity)
 */
export function pLimit(concurrency: number): Limiter {
    if (!((Number.isInteger(concurrency) || concurrency === Infinity) && concurrency > 0)) {
        throw new TypeError('Expected `concurrency` to be a number from 1 and up');
    }

    const queue: Array<() => void> = [];
    let activeCount = 0;

    const next = (): void => {
        activeCount--;
        queue.shift()?.();
    };

    const execute = async <T>(fn: () => Promise<T>): Promise<T> => {
        activeCount++;
        try {
            return await fn();
        } finally {
            next();
        }
    };

    const run = <T>(fn: () => Promise<T>): Promise<T> => {
        if (activeCount < concurrency) {
            return execute(fn);
        }
        return new Promise<T>((resolve, reject) => {
            queue.push(() => {
                execute(fn).then(resolve, reject);
            });
        });
    };

    return {
        run,
        get activeCount() {
            return activeCount;
        },
        get pendingCount() {
            return queue.length;
        },
        clearQueue: () => {
            queue.length = 0;
        },
    };
}

/**
 * Process items with at most `limit` running at once. Results keep the input order.
 */
export async function mapWithConcurrency<T, R>(
    items: readonly T[],
    limit: number,
    fn: (item: T, index: number) => Promise<R>
): Promise<R[]> {
    const limiter = pLimit(limit);
    return Promise.all(items.map((item, index) => limiter.run(() => fn(item, index))));
}
