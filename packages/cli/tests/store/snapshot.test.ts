import { describe, it, expect, vi, beforeEach } from 'vitest';
import * as fs from 'node:fs';
import type { StateSnapshot } from '@txnflow/shared';
import { captureSnapshot, loadSnapshot, saveSnapshot } from '../../src/store/snapshot.js';
import { InMemoryClassificationCache } from '../../src/store/memory-cache.js';
import { InMemoryTransactionStore } from '../../src/store/memory-transaction-store.js';
import { InMemoryVendorRepository } from '../../src/store/memory-vendor-repository.js';
import { FIXED_NOW } from '../helpers.js';
import { FP_A, classification, storedRecord } from '../fixtures.js';

vi.mock('node:fs');

const PATH = '/work/state/state.json';

function snapshot(): StateSnapshot {
    return {
        version: 1,
        saved_at: FIXED_NOW.toISOString(),
        records: [storedRecord(FP_A)],
        vendors: [],
        cache: [{ fingerprint: FP_A, current: classification(), history: [] }],
        jobs: [
            {
                batch_id: 'b_test',
                status: 'completed',
                attempt: 1,
                total: 1,
                processed: 1,
                finished_at: FIXED_NOW.toISOString(),
            },
        ],
    };
}

describe('state snapshot', () => {
    beforeEach(() => {
        vi.resetAllMocks();
    });

    it('returns undefined when no state file exists', () => {
        vi.mocked(fs.existsSync).mockReturnValue(false);

        expect(loadSnapshot(PATH)).toBeUndefined();
    });

    it('loads and validates a state file', () => {
        vi.mocked(fs.existsSync).mockReturnValue(true);
        vi.mocked(fs.readFileSync).mockReturnValue(JSON.stringify(snapshot()));

        expect(loadSnapshot(PATH)).toEqual(snapshot());
    });

    it('names the first invalid field', () => {
        const broken = { ...snapshot(), records: [{ ...storedRecord(FP_A), fingerprint: 'short' }] };
        vi.mocked(fs.existsSync).mockReturnValue(true);
        vi.mocked(fs.readFileSync).mockReturnValue(JSON.stringify(broken));

        expect(() => loadSnapshot(PATH)).toThrow(
            `State file is invalid (records.0.fingerprint: Must be 32-char hex): ${PATH}`
        );
    });

    it('rejects a file that is not JSON', () => {
        vi.mocked(fs.existsSync).mockReturnValue(true);
        vi.mocked(fs.readFileSync).mockReturnValue('{not json');

        expect(() => loadSnapshot(PATH)).toThrow(`State file is not valid JSON: ${PATH}`);
    });

    it('writes through a temporary file', () => {
        saveSnapshot(PATH, snapshot());

        expect(fs.mkdirSync).toHaveBeenCalledWith('/work/state', { recursive: true });
        expect(fs.writeFileSync).toHaveBeenCalledWith(
            `${PATH}.tmp`,
            `${JSON.stringify(snapshot(), null, 2)}\n`,
            'utf-8'
        );
        expect(fs.renameSync).toHaveBeenCalledWith(`${PATH}.tmp`, PATH);
    });

    it('captures every store', async () => {
        const store = new InMemoryTransactionStore([storedRecord(FP_A)]);
        const cache = new InMemoryClassificationCache([{ fingerprint: FP_A, current: classification(), history: [] }]);
        const vendors = new InMemoryVendorRepository();

        const captured = await captureSnapshot({ store, cache, vendors, jobs: () => snapshot().jobs }, FIXED_NOW);

        expect(captured).toEqual(snapshot());
    });
});
