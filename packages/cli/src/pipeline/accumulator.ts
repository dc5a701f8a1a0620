import type { BatchSummary } from '@txnflow/shared';
import type { RowOutcome } from '@txnflow/core';
import { addOutcome, emptySummary } from '@txnflow/core';
import type { BatchProgress } from './types.js';

/**
 * Single owner of a batch's counts. Rows report here as they finish, in any
 * order; outcomes are kept by input index.
 */
export class BatchAccumulator {
    private summary: BatchSummary;
    private readonly outcomes: (RowOutcome | undefined)[];
    private finished = 0;

    constructor(
        private readonly total: number,
        private readonly onProgress?: (progress: BatchProgress) => void
    ) {
        this.summary = emptySummary(total);
        this.outcomes = new Array<RowOutcome | undefined>(total).fill(undefined);
    }

    record(outcome: RowOutcome): void {
        if (this.outcomes[outcome.index] !== undefined) {
            throw new Error(`Row ${outcome.index} already has an outcome`);
        }
        this.outcomes[outcome.index] = outcome;
        this.summary = addOutcome(this.summary, outcome);
        this.finished++;
        this.onProgress?.({ processed: this.finished, total: this.total, summary: this.snapshot() });
    }

    recordOracleCall(): void {
        this.summary = { ...this.summary, oracle_calls: this.summary.oracle_calls + 1 };
    }

    get processed(): number {
        return this.finished;
    }

    snapshot(): BatchSummary {
        return { ...this.summary, failures_by_reason: { ...this.summary.failures_by_reason } };
    }

    /**
     * @throws Error if any row is still without an outcome
     */
    results(): RowOutcome[] {
        return this.outcomes.map((outcome, index) => {
            if (!outcome) {
                throw new Error(`Row ${index} finished without an outcome`);
            }
            return outcome;
        });
    }
}
