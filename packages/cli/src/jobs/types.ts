import type { BatchSummary, JobStatus, TransactionRow } from '@txnflow/shared';

export type SubmitMode = 'inline' | 'queued';

export interface SubmitOptions {
    /** Derived from the rows when absent */
    batchId?: string;
    mode?: SubmitMode;
}

export interface JobHandle {
    batchId: string;
    /** 1 for the first run, +1 for every retry of a failed or cancelled batch */
    attempt: number;
    mode: SubmitMode | 'restored';
}

export interface JobReport {
    batchId: string;
    status: JobStatus;
    attempt: number;
    processedCount: number;
    totalCount: number;
    summary?: BatchSummary;
    error?: string;
}

/**
 * Payload carried through the task queue.
 */
export interface QueuedBatch {
    rows: readonly TransactionRow[];
}
