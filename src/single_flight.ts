// single_flight.ts - non-blocking process-wide guard for "one utterance in flight"

/**
 * try-acquire only: a second caller is told no immediately instead of
 * queueing, so overlapping voice/text input is rejected at the source and
 * the rejection can be logged. Owner tags exist for diagnostics.
 */
export class SingleFlightLock {
    private owner: string | null = null;
    private acquiredAtMs = 0;

    tryAcquire(owner: string): boolean {
        if (this.owner !== null) return false;
        this.owner = owner;
        this.acquiredAtMs = Date.now();
        return true;
    }

    /** Releasing an unheld lock is a no-op. */
    release(): void {
        this.owner = null;
        this.acquiredAtMs = 0;
    }

    isLocked(): boolean {
        return this.owner !== null;
    }

    holder(): string | null {
        return this.owner;
    }

    heldForMs(nowMs: number = Date.now()): number {
        return this.owner === null ? 0 : nowMs - this.acquiredAtMs;
    }
}
