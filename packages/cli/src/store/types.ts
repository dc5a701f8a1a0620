/**
 * Storage contracts. The pipeline and registry only ever see these
 * interfaces; the CLI backs them with in-memory stores plus a snapshot file.
 *
 * Implementations throw StorageError. `systemic: true` means the backend is
 * unavailable and the rest of the batch would fail the same way.
 */

import type { CacheEntry, Category, ClassificationResult, StoredRecord, Vendor } from '@txnflow/shared';

/**
 * Replacement values written when a record is re-classified.
 */
export type RecordRevision = Pick<
    StoredRecord,
    'classification' | 'vendor_id' | 'vendor_confidence' | 'confidence' | 'needs_review' | 'review_reasons'
>;

export interface TransactionStore {
    findByFingerprint(fingerprint: string): Promise<StoredRecord | undefined>;
    /**
     * Atomic. Returns false if a record with this fingerprint already exists.
     */
    insertIfAbsent(fingerprint: string, record: StoredRecord): Promise<boolean>;
    listByCategory(category: Category): Promise<StoredRecord[]>;
    listByVendor(vendorId: string): Promise<StoredRecord[]>;
    list(): Promise<StoredRecord[]>;
    /**
     * Replace the classification, keeping the old one in `superseded`.
     *
     * @throws StorageError if no record exists for the fingerprint
     */
    supersede(fingerprint: string, revision: RecordRevision): Promise<StoredRecord>;
}

export interface CachePutOptions {
    /** Replace an existing result, moving it to history */
    force?: boolean;
}

export interface ClassificationCache {
    get(fingerprint: string): Promise<ClassificationResult | undefined>;
    /**
     * Write-once. Returns true if stored, false if a result already existed
     * and `force` was not set.
     */
    put(fingerprint: string, result: ClassificationResult, options?: CachePutOptions): Promise<boolean>;
    /** Superseded results, oldest first */
    history(fingerprint: string): Promise<ClassificationResult[]>;
    entries(): Promise<CacheEntry[]>;
}

export interface VendorRepository {
    list(): Promise<Vendor[]>;
    get(vendorId: string): Promise<Vendor | undefined>;
    /**
     * Atomic. Returns false if a vendor with this id already exists.
     */
    insertIfAbsent(vendor: Vendor): Promise<boolean>;
    /**
     * Store `next` only if the stored version still equals `expectedVersion`.
     * The caller bumps `next.version`.
     */
    compareAndSwap(next: Vendor, expectedVersion: number): Promise<boolean>;
}
