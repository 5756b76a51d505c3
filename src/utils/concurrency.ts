export interface WorkerPoolOptions {
    concurrency: number;
    /**
     * Checked before each item is dispatched. Once it returns false no further
     * items are started; in-flight items still run to completion.
     */
    shouldContinue?: () => boolean;
}

export interface WorkerPoolResult<T> {
    started: T[];
    skipped: T[];
}

/**
 * Run `worker` over `items` with at most `concurrency` invocations in flight.
 *
 * Workers are expected to handle their own errors; a rejection from `worker`
 * is propagated after in-flight work has settled.
 */
export async function runWithConcurrency<T>(
    items: readonly T[],
    worker: (item: T) => Promise<void>,
    options: WorkerPoolOptions
): Promise<WorkerPoolResult<T>> {
    if (!Number.isInteger(options.concurrency) || options.concurrency < 1) {
        throw new TypeError('Expected `concurrency` to be an integer from 1 and up');
    }

    const started: T[] = [];
    const shouldContinue = options.shouldContinue ?? (() => true);
    const queue = items[Symbol.iterator]();
    let stopped = false;
    let firstError: unknown;
    let failed = false;

    const lane = async (): Promise<void> => {
        while (!stopped) {
            if (!shouldContinue()) {
                stopped = true;
                return;
            }

            const next = queue.next();
            if (next.done) {
                return;
            }
            const item = next.value;
            started.push(item);

            try {
                await worker(item);
            } catch (error) {
                if (!failed) {
                    failed = true;
                    firstError = error;
                }
                stopped = true;
            }
        }
    };

    const laneCount = Math.min(options.concurrency, items.length);
    await Promise.all(Array.from({ length: laneCount }, () => lane()));

    if (failed) {
        throw firstError;
    }

    return { started, skipped: Array.from(queue) };
}

/**
 * Serialises async critical sections: each call waits for the previous one.
 */
export class SerialQueue {
    private tail: Promise<void> = Promise.resolve();

    public run<T>(task: () => Promise<T> | T): Promise<T> {
        const result = this.tail.then(task);
        this.tail = result.then(
            () => undefined,
            () => undefined
        );
        return result;
    }
}
