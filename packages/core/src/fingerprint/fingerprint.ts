/**
 * Fingerprint engine.
 *
 * A fingerprint is the stable identity of a transaction row, computed from
 * its normalized immutable fields. It is both the dedup key and the
 * classification cache key.
 *
 * Uses js-sha256 so core stays free of node: imports.
 */

import { sha256 } from 'js-sha256';
import type { NormalizedRow, TransactionRow } from '../types/index.js';
import { FINGERPRINT, ValidationError } from '../types/index.js';
import { normalizeDescription } from '../utils/normalize.js';
import { formatIsoDate, parseDateValue } from '../utils/date-parse.js';
import { formatAmount, parseAmount } from '../utils/money.js';

export interface NormalizeOptions {
    /** Per-currency minor unit overrides (e.g. { XAU: 4 }) */
    currencyMinorUnits?: Readonly<Record<string, number>>;
}

/**
 * Normalize a raw row.
 *
 * Fields are checked in order: date, amount, currency, description, account.
 * The first failing field is reported.
 *
 * @throws ValidationError naming the offending field
 */
export function normalizeRow(row: TransactionRow, options: NormalizeOptions = {}): NormalizedRow {
    const rawDate = row.date.trim();
    if (rawDate === '') {
        throw new ValidationError('date', 'missing');
    }
    const date = parseDateValue(rawDate);
    if (!date) {
        throw new ValidationError('date', `unrecognised date "${rawDate}"`);
    }

    if (typeof row.amount === 'string' && row.amount.trim() === '') {
        throw new ValidationError('amount', 'missing');
    }
    const amount = parseAmount(row.amount);
    if (!amount) {
        throw new ValidationError('amount', `not a number "${String(row.amount)}"`);
    }

    const currency = row.currency.trim().toUpperCase();
    if (!/^[A-Z]{3}$/.test(currency)) {
        throw new ValidationError('currency', `expected a three-letter code, got "${row.currency}"`);
    }

    const description = normalizeDescription(row.description);
    if (description === '') {
        throw new ValidationError('description', 'empty');
    }

    const account = row.account.trim().toLowerCase();
    if (account === '') {
        throw new ValidationError('account', 'empty');
    }

    const normalized: NormalizedRow = {
        date: formatIsoDate(date),
        amount: formatAmount(amount, currency, options.currencyMinorUnits),
        currency,
        description,
        account,
    };

    const ref = row.external_ref?.trim();
    if (ref) {
        normalized.external_ref = ref;
    }

    return normalized;
}

/**
 * Hash payload: the identity fields as a JSON array, so a separator inside
 * a description or account cannot shift a field boundary.
 * external_ref is not part of the identity.
 */
export function fingerprintPayload(row: NormalizedRow): string {
    return JSON.stringify([row.date, row.amount, row.currency, row.description, row.account]);
}

/**
 * Fingerprint an already-normalized row.
 */
export function fingerprintNormalized(row: NormalizedRow): string {
    return sha256(fingerprintPayload(row)).slice(0, FINGERPRINT.LENGTH);
}

/**
 * Fingerprint a raw row: normalize then hash.
 *
 * @returns 32-character hex fingerprint
 * @throws ValidationError if the row cannot be normalized
 */
export function fingerprint(row: TransactionRow, options: NormalizeOptions = {}): string {
    return fingerprintNormalized(normalizeRow(row, options));
}
