import type { Category, StoredRecord } from '@txnflow/shared';
import { StorageError } from '@txnflow/shared';
import type { RecordRevision, TransactionStore } from './types.js';

export class InMemoryTransactionStore implements TransactionStore {
    private readonly records = new Map<string, StoredRecord>();

    constructor(initial: readonly StoredRecord[] = []) {
        for (const record of initial) {
            this.records.set(record.fingerprint, structuredClone(record));
        }
    }

    async findByFingerprint(fingerprint: string): Promise<StoredRecord | undefined> {
        const record = this.records.get(fingerprint);
        return record ? structuredClone(record) : undefined;
    }

    async insertIfAbsent(fingerprint: string, record: StoredRecord): Promise<boolean> {
        if (this.records.has(fingerprint)) {
            return false;
        }
        this.records.set(fingerprint, structuredClone(record));
        return true;
    }

    async listByCategory(category: Category): Promise<StoredRecord[]> {
        return this.select((record) => record.classification.category === category);
    }

    async listByVendor(vendorId: string): Promise<StoredRecord[]> {
        return this.select((record) => record.vendor_id === vendorId);
    }

    async list(): Promise<StoredRecord[]> {
        return this.select(() => true);
    }

    async supersede(fingerprint: string, revision: RecordRevision): Promise<StoredRecord> {
        const existing = this.records.get(fingerprint);
        if (!existing) {
            throw new StorageError(`No record for fingerprint ${fingerprint}`);
        }

        const updated: StoredRecord = {
            ...existing,
            ...structuredClone(revision),
            superseded: [...existing.superseded, existing.classification],
        };
        this.records.set(fingerprint, updated);
        return structuredClone(updated);
    }

    /**
     * Records in insertion order.
     */
    private select(predicate: (record: StoredRecord) => boolean): StoredRecord[] {
        return Array.from(this.records.values())
            .filter(predicate)
            .map((record) => structuredClone(record));
    }
}
