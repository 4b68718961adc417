import { sleep } from './RetryUtils';

/**
 * Token bucket that spaces calls to at most `requestsPerMinute`.
 * The bucket starts full, so a short burst goes out immediately.
 * Callers are served in the order they asked.
 */
export class RateLimiter {
    private tokens: number;
    private lastRefill: number;
    private queue: Promise<void> = Promise.resolve();

    constructor(private readonly requestsPerMinute: number) {
        if (!(requestsPerMinute > 0)) {
            throw new Error(`Requests per minute must be positive, got: ${requestsPerMinute}`);
        }
        this.tokens = requestsPerMinute;
        this.lastRefill = Date.now();
    }

    acquire(): Promise<void> {
        const turn = this.queue.then(() => this.take());
        this.queue = turn;
        return turn;
    }

    private async take(): Promise<void> {
        this.refill();
        if (this.tokens < 1) {
            const waitMs = ((1 - this.tokens) * 60000) / this.requestsPerMinute;
            await sleep(waitMs);
            this.refill();
        }
        this.tokens = Math.max(0, this.tokens - 1);
    }

    private refill(): void {
        const now = Date.now();
        const earned = ((now - this.lastRefill) * this.requestsPerMinute) / 60000;
        this.tokens = Math.min(this.requestsPerMinute, this.tokens + earned);
        this.lastRefill = now;
    }
}
