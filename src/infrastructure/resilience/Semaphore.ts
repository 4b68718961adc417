/**
 * Simple semaphore for limiting concurrent operations.
 */
export class Semaphore {
    private permits: number;
    private waiting: Array<() => void> = [];

    constructor(permits: number) {
        this.permits = Math.max(1, Math.floor(permits));
    }

    async acquire(): Promise<void> {
        if (this.permits > 0) {
            this.permits--;
            return;
        }
        return new Promise(resolve => {
            this.waiting.push(resolve);
        });
    }

    release(): void {
        const next = this.waiting.shift();
        if (next) {
            next();
        } else {
            this.permits++;
        }
    }
}

/**
 * Maps items through an async worker with at most `limit` in flight.
 * Results keep the input order.
 */
export async function mapWithConcurrency<T, R>(
    items: readonly T[],
    limit: number,
    worker: (item: T, index: number) => Promise<R>
): Promise<R[]> {
    const semaphore = new Semaphore(limit);
    return Promise.all(items.map(async (item, index) => {
        await semaphore.acquire();
        try {
            return await worker(item, index);
        } finally {
            semaphore.release();
        }
    }));
}
