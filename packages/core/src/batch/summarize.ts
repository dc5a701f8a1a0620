/**
 * Batch summary counting and status derivation.
 *
 * PURE FUNCTIONS: summaries are returned as new objects.
 */

import type { BatchStatus, BatchSummary } from '../types/index.js';
import type { RowOutcome } from './types.js';

export function emptySummary(total: number): BatchSummary {
    return {
        total,
        processed: 0,
        classified: 0,
        cache_hit: 0,
        skipped_duplicate: 0,
        failed: 0,
        failures_by_reason: {},
        oracle_calls: 0,
        needs_review: 0,
    };
}

/**
 * Count one finished row into a summary.
 */
export function addOutcome(summary: BatchSummary, outcome: RowOutcome): BatchSummary {
    const next: BatchSummary = {
        ...summary,
        failures_by_reason: { ...summary.failures_by_reason },
    };

    switch (outcome.kind) {
        case 'classified':
        case 'classified_from_cache':
            next.processed++;
            if (outcome.kind === 'classified') {
                next.classified++;
            } else {
                next.cache_hit++;
            }
            if (outcome.record.needs_review) {
                next.needs_review++;
            }
            break;
        case 'skipped_duplicate':
            next.skipped_duplicate++;
            break;
        case 'failed':
            next.failed++;
            next.failures_by_reason[outcome.reason] = (next.failures_by_reason[outcome.reason] ?? 0) + 1;
            break;
    }

    return next;
}

/**
 * Summary of a complete set of outcomes.
 *
 * @param oracleCalls - Oracle invocations made for the batch (not derivable from outcomes)
 */
export function summarizeOutcomes(outcomes: readonly RowOutcome[], oracleCalls = 0): BatchSummary {
    const summary = outcomes.reduce(addOutcome, emptySummary(outcomes.length));
    return { ...summary, oracle_calls: oracleCalls };
}

/**
 * Status from outcomes.
 *
 * - empty batch or no failures: completed
 * - every row failed: failed
 * - otherwise: partially_completed
 *
 * @param override - Set when the batch was cancelled or aborted
 */
export function deriveBatchStatus(
    outcomes: readonly RowOutcome[],
    override?: 'cancelled' | 'failed'
): BatchStatus {
    if (override) return override;
    if (outcomes.length === 0) return 'completed';

    const failed = outcomes.filter((o) => o.kind === 'failed').length;
    if (failed === 0) return 'completed';
    if (failed === outcomes.length) return 'failed';
    return 'partially_completed';
}
