import type { RowStep } from '../types.js';

/**
 * Skip rows already persisted by an earlier batch.
 */
export const skipPersisted: RowStep = async (state, ctx) => {
    const existing = await ctx.deps.store.findByFingerprint(state.fingerprint);
    if (!existing) {
        return state;
    }

    return {
        ...state,
        outcome: { kind: 'skipped_duplicate', index: state.index, fingerprint: state.fingerprint },
    };
};
