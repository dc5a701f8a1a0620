/**
 * Zod schemas for txnflow data structures.
 *
 * IMPORTANT: Money is stored as a decimal string, never a native number.
 * Convert to Decimal at computation boundaries, back to string at output.
 */

import { z } from 'zod';
import {
    CATEGORIES,
    DEFAULT_COLUMNS,
    DEFAULT_VENDOR_CATEGORIES,
    FINGERPRINT,
    ORACLE_DEFAULTS,
    PIPELINE_DEFAULTS,
    VENDOR_ID,
    VENDOR_MATCHING,
} from './constants.js';

// ============================================================================
// Primitive Validators
// ============================================================================

/**
 * ISO date string format: YYYY-MM-DD
 */
const isoDateString = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'Must be YYYY-MM-DD format');

/**
 * Decimal amount as string (never native number for money).
 */
const decimalString = z.string().regex(/^-?\d+(\.\d+)?$/, 'Must be valid decimal string');

const unitInterval = z.number().min(0).max(1);

const fingerprint = z.string().regex(
    new RegExp(`^[0-9a-f]{${FINGERPRINT.LENGTH}}$`),
    `Must be ${FINGERPRINT.LENGTH}-char hex`
);

const vendorId = z.string().regex(
    new RegExp(`^${VENDOR_ID.PREFIX}[0-9a-f]{${VENDOR_ID.LENGTH}}$`),
    `Must be ${VENDOR_ID.PREFIX} followed by ${VENDOR_ID.LENGTH} hex chars`
);

export const CategorySchema = z.enum(CATEGORIES);

// ============================================================================
// Transaction Rows
// ============================================================================

/**
 * Raw input row as it arrived from ingestion. Fields are deliberately loose:
 * the fingerprint engine is the validator and names the offending field.
 */
export const TransactionRowSchema = z.object({
    date: z.string(),
    amount: z.union([z.string(), z.number()]),
    currency: z.string(),
    description: z.string(),
    account: z.string(),
    external_ref: z.string().optional(),
});

export type TransactionRow = z.infer<typeof TransactionRowSchema>;

/**
 * Row after normalization. This is the form fingerprints are computed from.
 */
export const NormalizedRowSchema = z.object({
    date: isoDateString,
    amount: decimalString,
    currency: z.string().regex(/^[A-Z]{3}$/, 'Must be 3-letter currency code'),
    description: z.string().min(1),
    account: z.string().min(1),
    external_ref: z.string().optional(),
});

export type NormalizedRow = z.infer<typeof NormalizedRowSchema>;

// ============================================================================
// Classification
// ============================================================================

/**
 * Classification result - immutable once produced for a fingerprint.
 */
export const ClassificationResultSchema = z.object({
    category: CategorySchema,
    confidence: unitInterval,
    vendor_reference: vendorId.nullable(),
    rationale: z.string(),
});

export type ClassificationResult = z.infer<typeof ClassificationResultSchema>;

/**
 * Oracle response as validated at the adapter boundary.
 * Unknown categories and out-of-range confidences fail to parse.
 * Numeric strings are coerced; null, booleans and blank strings are rejected.
 * `reasoning` is accepted in place of `rationale`.
 */
export const OracleResponseSchema = z
    .object({
        category: CategorySchema,
        confidence: z
            .union([z.number(), z.string().trim().min(1).pipe(z.coerce.number())])
            .pipe(z.number().min(0).max(1)),
        rationale: z.string().optional(),
        reasoning: z.string().optional(),
    })
    .transform((response) => ({
        category: response.category,
        confidence: response.confidence,
        rationale: response.rationale ?? response.reasoning ?? '',
    }));

export type OracleResponse = z.output<typeof OracleResponseSchema>;

/**
 * Cache entry: current result plus superseded versions, oldest first.
 */
export const CacheEntrySchema = z.object({
    fingerprint,
    current: ClassificationResultSchema,
    history: z.array(ClassificationResultSchema),
});

export type CacheEntry = z.infer<typeof CacheEntrySchema>;

// ============================================================================
// Vendors
// ============================================================================

export const VendorSchema = z.object({
    vendor_id: vendorId,
    canonical_name: z.string().min(1),
    aliases: z.array(z.string()),
    metadata: z.record(z.string(), z.string()),
    transaction_count: z.number().int().min(0),
    version: z.number().int().min(0),
    created_at: z.string(),
});

export type Vendor = z.infer<typeof VendorSchema>;

/**
 * Vendor catalogue entry as written by hand in config/vendors.yaml.
 */
export const VendorSeedSchema = z.object({
    name: z.string().min(1),
    aliases: z.array(z.string()).default([]),
    metadata: z.record(z.string(), z.string()).default({}),
});

export type VendorSeed = z.infer<typeof VendorSeedSchema>;

export const VendorCatalogSchema = z.object({
    vendors: z.array(VendorSeedSchema),
});

export type VendorCatalog = z.infer<typeof VendorCatalogSchema>;

// ============================================================================
// Persisted Records
// ============================================================================

export const StoredRecordSchema = z.object({
    fingerprint,
    batch_id: z.string().min(1),
    row: NormalizedRowSchema,
    /** Description as it arrived, before normalization */
    raw_description: z.string(),
    classification: ClassificationResultSchema,
    vendor_id: vendorId.nullable(),
    vendor_confidence: unitInterval.nullable(),
    confidence: unitInterval,
    needs_review: z.boolean(),
    review_reasons: z.array(z.string()),
    source: z.enum(['oracle', 'cache']),
    created_at: z.string(),
    superseded: z.array(ClassificationResultSchema).default([]),
});

export type StoredRecord = z.infer<typeof StoredRecordSchema>;

// ============================================================================
// Batches and Jobs
// ============================================================================

export const FailureReasonSchema = z.enum([
    'validation',
    'oracle_fatal',
    'oracle_exhausted',
    'storage',
    'cancelled',
    'deadline_exceeded',
    'aborted',
    'internal',
]);

export type FailureReason = z.infer<typeof FailureReasonSchema>;

export const BatchStatusSchema = z.enum(['completed', 'failed', 'partially_completed', 'cancelled']);

export type BatchStatus = z.infer<typeof BatchStatusSchema>;

export const JobStatusSchema = z.enum([
    'submitted',
    'running',
    'completed',
    'failed',
    'partially_completed',
    'cancelled',
]);

export type JobStatus = z.infer<typeof JobStatusSchema>;

export const BatchSummarySchema = z.object({
    total: z.number().int().min(0),
    processed: z.number().int().min(0),
    classified: z.number().int().min(0),
    cache_hit: z.number().int().min(0),
    skipped_duplicate: z.number().int().min(0),
    failed: z.number().int().min(0),
    failures_by_reason: z.record(FailureReasonSchema, z.number().int().min(0)),
    oracle_calls: z.number().int().min(0),
    needs_review: z.number().int().min(0),
});

export type BatchSummary = z.infer<typeof BatchSummarySchema>;

/**
 * Terminal job record kept across processes so a resubmitted batch id is
 * recognised before any row is touched.
 */
export const JobRecordSchema = z.object({
    batch_id: z.string().min(1),
    status: BatchStatusSchema,
    attempt: z.number().int().min(1),
    total: z.number().int().min(0),
    processed: z.number().int().min(0),
    summary: BatchSummarySchema.optional(),
    error: z.string().optional(),
    finished_at: z.string(),
});

export type JobRecord = z.infer<typeof JobRecordSchema>;

// ============================================================================
// Configuration
// ============================================================================

export const ColumnMappingSchema = z.object({
    date: z.string().default(DEFAULT_COLUMNS.date),
    amount: z.string().default(DEFAULT_COLUMNS.amount),
    currency: z.string().default(DEFAULT_COLUMNS.currency),
    description: z.string().default(DEFAULT_COLUMNS.description),
    account: z.string().default(DEFAULT_COLUMNS.account),
    externalRef: z.string().default(DEFAULT_COLUMNS.externalRef),
});

export type ColumnMapping = z.infer<typeof ColumnMappingSchema>;

export const EngineConfigSchema = z.object({
    vendor: z
        .object({
            acceptThreshold: unitInterval.default(VENDOR_MATCHING.ACCEPT_THRESHOLD),
            reviewThreshold: unitInterval.default(VENDOR_MATCHING.REVIEW_THRESHOLD),
            vendorCategories: z.array(CategorySchema).default([...DEFAULT_VENDOR_CATEGORIES]),
        })
        .refine((v) => v.reviewThreshold <= v.acceptThreshold, {
            message: 'reviewThreshold must not exceed acceptThreshold',
        })
        .default({}),
    oracle: z
        .object({
            model: z.string().min(1).default(ORACLE_DEFAULTS.MODEL),
            maxAttempts: z.number().int().min(1).default(ORACLE_DEFAULTS.MAX_ATTEMPTS),
            timeoutMs: z.number().int().positive().default(ORACLE_DEFAULTS.TIMEOUT_MS),
            backoff: z
                .object({
                    minTimeoutMs: z.number().int().min(0).default(ORACLE_DEFAULTS.MIN_BACKOFF_MS),
                    maxTimeoutMs: z.number().int().min(0).default(ORACLE_DEFAULTS.MAX_BACKOFF_MS),
                    factor: z.number().min(1).default(ORACLE_DEFAULTS.BACKOFF_FACTOR),
                })
                .default({}),
        })
        .default({}),
    pipeline: z
        .object({
            maxConcurrency: z.number().int().min(1).default(PIPELINE_DEFAULTS.MAX_CONCURRENCY),
            batchDeadlineMs: z.number().int().positive().default(PIPELINE_DEFAULTS.BATCH_DEADLINE_MS),
            reviewConfidenceThreshold: unitInterval.default(PIPELINE_DEFAULTS.REVIEW_CONFIDENCE_THRESHOLD),
            oracleFailureLimit: z.number().int().min(1).default(PIPELINE_DEFAULTS.ORACLE_FAILURE_LIMIT),
        })
        .default({}),
    queue: z
        .object({
            workerConcurrency: z.number().int().min(1).default(1),
        })
        .default({}),
    ingest: z
        .object({
            columns: ColumnMappingSchema.default({}),
            defaultCurrency: z.string().regex(/^[A-Za-z]{3}$/).optional(),
        })
        .default({}),
    currencyMinorUnits: z.record(z.string(), z.number().int().min(0).max(4)).default({}),
});

export type EngineConfig = z.infer<typeof EngineConfigSchema>;

// ============================================================================
// Workspace State Snapshot
// ============================================================================

export const StateSnapshotSchema = z.object({
    version: z.literal(1),
    saved_at: z.string(),
    records: z.array(StoredRecordSchema),
    vendors: z.array(VendorSchema),
    cache: z.array(CacheEntrySchema),
    jobs: z.array(JobRecordSchema),
});

export type StateSnapshot = z.infer<typeof StateSnapshotSchema>;
