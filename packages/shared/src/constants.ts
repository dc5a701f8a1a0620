/**
 * Constants for txnflow.
 */

/**
 * The fixed category set. Every classified transaction lands in exactly one.
 * `not_categorized` is the fallback when the purpose cannot be determined.
 */
export const CATEGORIES = [
    'vendor_payment',
    'salary_payment',
    'customer_payment_received',
    'tax_payment',
    'bank_fee',
    'internal_transfer',
    'not_categorized',
] as const;

export type Category = (typeof CATEGORIES)[number];

/**
 * Categories whose transactions name a counterparty worth tracking as a vendor.
 */
export const DEFAULT_VENDOR_CATEGORIES: readonly Category[] = [
    'vendor_payment',
    'customer_payment_received',
];

/**
 * Fingerprint configuration.
 * 32 hex chars = 128 bits of SHA-256.
 */
export const FINGERPRINT = {
    LENGTH: 32,
} as const;

/**
 * Batch id derivation: prefix + hex digest over the input set.
 */
export const BATCH_ID = {
    PREFIX: 'b_',
    LENGTH: 32,
} as const;

/**
 * Vendor id derivation: prefix + hex digest of the normalized canonical name.
 */
export const VENDOR_ID = {
    PREFIX: 'v_',
    LENGTH: 12,
} as const;

/**
 * Minor-unit precision for currencies that differ from the default of 2.
 * Per ISO 4217.
 */
export const DEFAULT_MINOR_UNITS = 2;

export const CURRENCY_MINOR_UNITS: Readonly<Record<string, number>> = {
    JPY: 0,
    KRW: 0,
    ISK: 0,
    CLP: 0,
    VND: 0,
    UGX: 0,
    BHD: 3,
    IQD: 3,
    JOD: 3,
    KWD: 3,
    LYD: 3,
    OMR: 3,
    TND: 3,
};

/**
 * Vendor resolution thresholds.
 * score >= ACCEPT: auto-accept; REVIEW <= score < ACCEPT: flag for review;
 * below REVIEW: create a new vendor.
 */
export const VENDOR_MATCHING = {
    ACCEPT_THRESHOLD: 0.85,
    REVIEW_THRESHOLD: 0.6,
} as const;

/**
 * Oracle adapter defaults.
 */
export const ORACLE_DEFAULTS = {
    MODEL: 'gpt-4o-mini',
    MAX_ATTEMPTS: 4,
    TIMEOUT_MS: 20_000,
    MIN_BACKOFF_MS: 500,
    MAX_BACKOFF_MS: 8_000,
    BACKOFF_FACTOR: 2,
} as const;

/**
 * Pipeline defaults.
 */
export const PIPELINE_DEFAULTS = {
    MAX_CONCURRENCY: 4,
    BATCH_DEADLINE_MS: 600_000,
    REVIEW_CONFIDENCE_THRESHOLD: 0.6,
    ORACLE_FAILURE_LIMIT: 5,
} as const;

/**
 * Review reasons attached to persisted records.
 */
export const REVIEW_REASONS = {
    LOW_CONFIDENCE: 'low_confidence',
    VENDOR_MATCH_REVIEW: 'vendor_match_review',
    NOT_CATEGORIZED: 'not_categorized',
} as const;

/**
 * Default tabular column names for ingestion.
 */
export const DEFAULT_COLUMNS = {
    date: 'Date',
    amount: 'Amount',
    currency: 'Currency',
    description: 'Text',
    account: 'Account',
    externalRef: 'Reference',
} as const;
