export interface Flight<T> {
    promise: Promise<T>;
    /** true when this caller joined a call another caller started */
    shared: boolean;
}

/**
 * Collapses concurrent calls for the same key into one.
 * The key is released as soon as the call settles.
 */
export class SingleFlight<T> {
    private readonly inFlight = new Map<string, Promise<T>>();

    run(key: string, fn: () => Promise<T>): Flight<T> {
        const existing = this.inFlight.get(key);
        if (existing) {
            return { promise: existing, shared: true };
        }

        const promise = fn().finally(() => {
            this.inFlight.delete(key);
        });
        this.inFlight.set(key, promise);
        return { promise, shared: false };
    }

    get size(): number {
        return this.inFlight.size;
    }
}
