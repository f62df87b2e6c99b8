import { setTimeout as sleep } from "timers/promises";

export interface RateLimiter {
    wait(signal?: AbortSignal): Promise<void>;
}

/**
 * Spaces calls at least `1000 / rps` ms apart. Callers queue in arrival
 * order; an aborted signal rejects the pending wait.
 */
export class TokenBucket implements RateLimiter {
    private readonly intervalMs: number;
    private nextSlotAt = 0;

    constructor(
        rps: number,
        private readonly now: () => number = Date.now
    ) {
        this.intervalMs = 1000 / Math.max(1, rps);
    }

    async wait(signal?: AbortSignal): Promise<void> {
        signal?.throwIfAborted();
        const current = this.now();
        const slot = Math.max(current, this.nextSlotAt);
        this.nextSlotAt = slot + this.intervalMs;

        const delay = slot - current;
        if (delay > 0) {
            await sleep(delay, undefined, { signal });
        }
    }
}
