import type { RowStep } from '../types.js';

/**
 * Resolve the counterparty for vendor-bearing categories.
 */
export const resolveVendor: RowStep = async (state, ctx) => {
    const { classification } = state;
    if (!classification || !ctx.settings.vendorCategories.includes(classification.category)) {
        return state;
    }

    const vendor = await ctx.deps.registry.resolve(state.rawDescription);
    return {
        ...state,
        vendor,
        classification: { ...classification, vendor_reference: vendor.vendor.vendor_id },
    };
};
