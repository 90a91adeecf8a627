/**
 * Counting semaphore used to bound how many async operations are in flight.
 * Waiters are released in FIFO order.
 */
export interface Semaphore {
    readonly size: number;
    readonly active: number;
    readonly waiting: number;
    acquire(): Promise<() => void>;
    run<T>(task: () => Promise<T>): Promise<T>;
}

export const create = (size: number): Semaphore => {
    if (!Number.isInteger(size) || size < 1) {
        throw new Error(`Semaphore size must be a positive integer, got ${size}`);
    }

    let active = 0;
    const queue: Array<() => void> = [];

    const release = () => {
        const next = queue.shift();
        if (next) {
            // Slot passes straight to the next waiter.
            next();
        } else {
            active--;
        }
    };

    const acquire = (): Promise<() => void> => {
        let released = false;
        const releaseOnce = () => {
            if (released) return;
            released = true;
            release();
        };
        if (active < size) {
            active++;
            return Promise.resolve(releaseOnce);
        }
        return new Promise((resolve) => {
            queue.push(() => resolve(releaseOnce));
        });
    };

    const run = async <T>(task: () => Promise<T>): Promise<T> => {
        const releaseSlot = await acquire();
        try {
            return await task();
        } finally {
            releaseSlot();
        }
    };

    return {
        size,
        get active() {
            return active;
        },
        get waiting() {
            return queue.length;
        },
        acquire,
        run,
    };
};
