/**
 * At most `capacity` callbacks in flight, the rest wait in arrival order.
 */
export class Throttle {
    private running = 0;
    private waiting: (() => void)[] = [];

    constructor(readonly capacity: number) {
        if (!Number.isInteger(capacity) || capacity < 1) {
            throw new RangeError(`Throttle capacity must be positive, got ${capacity}`);
        }
    }

    async withThrottle<T>(fn: () => Promise<T>): Promise<T> {
        await this.acquire();
        try {
            return await fn();
        } finally {
            this.release();
        }
    }

    private acquire(): Promise<void> {
        if (this.running < this.capacity) {
            ++this.running;
            return Promise.resolve();
        }
        return new Promise<void>((resolve) => this.waiting.push(resolve));
    }

    private release(): void {
        const next = this.waiting.shift();
        if (next !== undefined) {
            // the slot passes straight to the next caller
            next();
        } else {
            --this.running;
        }
    }
}
