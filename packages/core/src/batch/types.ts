import type { BatchStatus, BatchSummary, FailureReason, StoredRecord } from '../types/index.js';

interface OutcomeBase {
    /** Position of the row in the submitted batch */
    index: number;
}

export interface ClassifiedOutcome extends OutcomeBase {
    kind: 'classified' | 'classified_from_cache';
    fingerprint: string;
    record: StoredRecord;
}

export interface SkippedOutcome extends OutcomeBase {
    kind: 'skipped_duplicate';
    fingerprint: string;
}

export interface FailedOutcome extends OutcomeBase {
    kind: 'failed';
    /** null when the row never got as far as a fingerprint */
    fingerprint: string | null;
    reason: FailureReason;
    error: string;
}

/**
 * Terminal state of a single row. Every row ends in exactly one.
 */
export type RowOutcome = ClassifiedOutcome | SkippedOutcome | FailedOutcome;

export type RowOutcomeKind = RowOutcome['kind'];

export interface BatchResult {
    batch_id: string;
    status: BatchStatus;
    /** In input order, one per row */
    outcomes: RowOutcome[];
    summary: BatchSummary;
    started_at: string;
    finished_at: string;
    warnings: string[];
}
