/**
 * Workspace state snapshot (state/state.json).
 *
 * The in-memory stores are loaded from the snapshot at startup and written
 * back after a command changes them.
 */

import { existsSync, mkdirSync, readFileSync, renameSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';
import { StateSnapshotSchema, type JobRecord, type StateSnapshot } from '@txnflow/shared';
import type { ClassificationCache, TransactionStore, VendorRepository } from './types.js';

/**
 * @returns undefined when no snapshot has been written yet
 * @throws Error naming the file if it is not valid JSON or fails the schema
 */
export function loadSnapshot(path: string): StateSnapshot | undefined {
    if (!existsSync(path)) {
        return undefined;
    }

    let data: unknown;
    try {
        data = JSON.parse(readFileSync(path, 'utf-8'));
    } catch (err) {
        throw new Error(`State file is not valid JSON: ${path}`, { cause: err });
    }

    const parsed = StateSnapshotSchema.safeParse(data);
    if (!parsed.success) {
        const issue = parsed.error.issues[0];
        const where = issue ? `${issue.path.join('.')}: ${issue.message}` : 'unknown issue';
        throw new Error(`State file is invalid (${where}): ${path}`);
    }
    return parsed.data;
}

/**
 * Write through a temporary file so a crash never leaves half a snapshot.
 */
export function saveSnapshot(path: string, snapshot: StateSnapshot): void {
    mkdirSync(dirname(path), { recursive: true });
    const tmp = `${path}.tmp`;
    writeFileSync(tmp, `${JSON.stringify(snapshot, null, 2)}\n`, 'utf-8');
    renameSync(tmp, path);
}

export interface SnapshotSources {
    store: TransactionStore;
    cache: ClassificationCache;
    vendors: VendorRepository;
    jobs: () => JobRecord[];
}

export async function captureSnapshot(sources: SnapshotSources, savedAt: Date): Promise<StateSnapshot> {
    const [records, vendors, cache] = await Promise.all([
        sources.store.list(),
        sources.vendors.list(),
        sources.cache.entries(),
    ]);

    return {
        version: 1,
        saved_at: savedAt.toISOString(),
        records,
        vendors,
        cache,
        jobs: sources.jobs(),
    };
}
