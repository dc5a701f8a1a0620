import type { CacheEntry, ClassificationResult } from '@txnflow/shared';
import type { CachePutOptions, ClassificationCache } from './types.js';

export class InMemoryClassificationCache implements ClassificationCache {
    private readonly store = new Map<string, CacheEntry>();

    constructor(initial: readonly CacheEntry[] = []) {
        for (const entry of initial) {
            this.store.set(entry.fingerprint, structuredClone(entry));
        }
    }

    async get(fingerprint: string): Promise<ClassificationResult | undefined> {
        const entry = this.store.get(fingerprint);
        return entry ? structuredClone(entry.current) : undefined;
    }

    async put(fingerprint: string, result: ClassificationResult, options: CachePutOptions = {}): Promise<boolean> {
        const existing = this.store.get(fingerprint);

        if (!existing) {
            this.store.set(fingerprint, { fingerprint, current: structuredClone(result), history: [] });
            return true;
        }

        if (!options.force) {
            return false;
        }

        this.store.set(fingerprint, {
            fingerprint,
            current: structuredClone(result),
            history: [...existing.history, existing.current],
        });
        return true;
    }

    async history(fingerprint: string): Promise<ClassificationResult[]> {
        return structuredClone(this.store.get(fingerprint)?.history ?? []);
    }

    async entries(): Promise<CacheEntry[]> {
        return Array.from(this.store.values()).map((entry) => structuredClone(entry));
    }
}
