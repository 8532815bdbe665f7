/**
 * Promise pool that executes functions with controlled concurrency.
 * Unlike Promise.all, this ensures only N promises run at once.
 *
 * Results keep input order regardless of completion order. A rejection
 * stops workers from picking up new items and is rethrown once in-flight
 * work settles; callers that need isolation should catch inside `fn`.
 *
 * @param items - Array of items to process
 * @param concurrency - Max parallel executions
 * @param fn - Async function to execute for each item
 */
export async function promisePool<T, R>(
    items: readonly T[],
    concurrency: number,
    fn: (item: T, index: number) => Promise<R>
): Promise<R[]> {
    const results = new Array<R>(items.length);
    let index = 0;
    const failures: unknown[] = [];

    // Worker function that pulls from the queue
    async function worker(): Promise<void> {
        while (index < items.length && failures.length === 0) {
            const currentIndex = index++;
            try {
                results[currentIndex] = await fn(items[currentIndex], currentIndex);
            } catch (error) {
                failures.push(error);
            }
        }
    }

    const workers = Array.from(
        { length: Math.max(1, Math.min(concurrency, items.length)) },
        () => worker()
    );
    await Promise.all(workers);

    if (failures.length > 0) {
        throw failures[0];
    }
    return results;
}
