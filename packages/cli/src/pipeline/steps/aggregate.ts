import { aggregateConfidence } from '@txnflow/core';
import type { RowStep } from '../types.js';

export const aggregateRow: RowStep = async (state, ctx) => {
    if (!state.classification) {
        throw new Error(`Row ${state.index} reached aggregation without a classification`);
    }

    const vendorSignal = state.vendor
        ? { confidence: state.vendor.matchConfidence, decision: state.vendor.decision }
        : null;

    return {
        ...state,
        aggregated: aggregateConfidence(state.classification, vendorSignal, {
            reviewConfidenceThreshold: ctx.settings.reviewConfidenceThreshold,
        }),
    };
};
