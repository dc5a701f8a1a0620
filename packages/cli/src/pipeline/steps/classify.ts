import type { ClassificationResult } from '@txnflow/shared';
import { OracleError } from '@txnflow/shared';
import type { RowContext, RowState, RowStep } from '../types.js';

/**
 * Cache first; on a miss, one oracle call per fingerprint no matter how many
 * rows are waiting for it.
 */
export const classifyRow: RowStep = async (state, ctx) => {
    const cached = await ctx.deps.cache.get(state.fingerprint);
    if (cached) {
        return { ...state, classification: cached, source: 'cache' };
    }

    // A shared call can fail for reasons that belong to the other caller
    // (its deadline, its cancellation). Then this row leads its own call.
    for (let attempt = 1; ; attempt++) {
        const flight = ctx.deps.inflight.run(state.fingerprint, () => callOracle(state, ctx));
        try {
            const classification = await flight.promise;
            return { ...state, classification, source: flight.shared ? 'cache' : 'oracle' };
        } catch (error) {
            const foreignFailure = flight.shared && !(error instanceof OracleError) && !ctx.signal?.aborted;
            if (!foreignFailure || attempt >= 2) {
                throw error;
            }
        }
    }
};

async function callOracle(state: RowState, ctx: RowContext): Promise<ClassificationResult> {
    ctx.recordOracleCall();
    const result = await ctx.deps.oracle.classify(
        {
            descriptionText: state.rawDescription,
            amount: state.row.amount,
            currency: state.row.currency,
        },
        { signal: ctx.signal }
    );
    ctx.recordOracleSuccess();

    if (await ctx.deps.cache.put(state.fingerprint, result)) {
        return result;
    }
    // Lost a write race: the stored result wins
    return (await ctx.deps.cache.get(state.fingerprint)) ?? result;
}
