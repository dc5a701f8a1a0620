import { sha256 } from 'js-sha256';
import type { TransactionRow } from '../types/index.js';
import { BATCH_ID } from '../types/index.js';

/**
 * JSON with object keys sorted, so equal rows serialize identically
 * whatever order their keys were set in.
 */
export function canonicalJson(row: TransactionRow): string {
    const entries = Object.entries(row)
        .filter(([, value]) => value !== undefined)
        .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    return JSON.stringify(Object.fromEntries(entries));
}

/**
 * Derive a batch id from the input set.
 *
 * Order-independent: the per-row canonical JSON strings are sorted before
 * hashing. Raw rows are used so that rows failing validation still count
 * toward the identity of the batch.
 *
 * @returns "b_" followed by 32 hex chars
 */
export function deriveBatchId(rows: readonly TransactionRow[]): string {
    const lines = rows.map(canonicalJson).sort();
    return BATCH_ID.PREFIX + sha256(lines.join('\n')).slice(0, BATCH_ID.LENGTH);
}
