/**
 * pLimit
 *
 * Limits the concurrency of async operations.
 * Similar to p-limit but lightweight and built-in.
 *
 * @param concurrency - Max number of concurrent operations
 * @returns A function that accepts a thunk and executes it within the concurrency limit
 */
export function pLimit(concurrency: number) {
    if (!((Number.isInteger(concurrency) || concurrency === Infinity) && concurrency > 0)) {
        throw new TypeError('Expected `concurrency` to be a number from 1 and up');
    }

    const queue: (() => void)[] = [];
    let activeCount = 0;

    const next = () => {
        activeCount--;
        const nextFn = queue.shift();
        if (nextFn) {
            nextFn();
        }
    };

    return async <T>(fn: () => Promise<T>): Promise<T> => {
        const execute = async () => {
            activeCount++;
            try {
                return await fn();
            } finally {
                next();
            }
        };

        if (activeCount < concurrency) {
            return execute();
        }
        return new Promise<T>((resolve, reject) => {
            queue.push(() => {
                execute().then(resolve, reject);
            });
        });
    };
}

/**
 * Map over items with at most `concurrency` mappers in flight; results keep input order
 */
export async function mapWithConcurrency<T, R>(
    items: readonly T[],
    concurrency: number,
    mapper: (item: T, index: number) => Promise<R>
): Promise<R[]> {
    const limit = pLimit(concurrency);
    return Promise.all(items.map((item, index) => limit(() => mapper(item, index))));
}
