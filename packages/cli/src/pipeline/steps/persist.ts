import type { StoredRecord } from '@txnflow/shared';
import type { RowStep } from '../types.js';

/**
 * Insert-if-absent. Losing the insert means a concurrent batch persisted the
 * same fingerprint first.
 */
export const persistRow: RowStep = async (state, ctx) => {
    const { classification, aggregated, source } = state;
    if (!classification || !aggregated || !source) {
        throw new Error(`Row ${state.index} reached persistence incomplete`);
    }

    const record: StoredRecord = {
        fingerprint: state.fingerprint,
        batch_id: state.batchId,
        row: state.row,
        raw_description: state.rawDescription,
        classification,
        vendor_id: state.vendor?.vendor.vendor_id ?? null,
        vendor_confidence: state.vendor?.matchConfidence ?? null,
        confidence: aggregated.confidence,
        needs_review: aggregated.needsReview,
        review_reasons: aggregated.reviewReasons,
        source,
        created_at: ctx.deps.now().toISOString(),
        superseded: [],
    };

    if (!(await ctx.deps.store.insertIfAbsent(state.fingerprint, record))) {
        return {
            ...state,
            outcome: { kind: 'skipped_duplicate', index: state.index, fingerprint: state.fingerprint },
        };
    }

    if (record.vendor_id) {
        await ctx.deps.registry.recordUsage(record.vendor_id);
    }

    return {
        ...state,
        outcome: {
            kind: source === 'cache' ? 'classified_from_cache' : 'classified',
            index: state.index,
            fingerprint: state.fingerprint,
            record,
        },
    };
};
