/**
 * Re-export all types from shared package.
 * Core package uses these types but doesn't define them.
 */
export type {
    TransactionRow,
    NormalizedRow,
    ClassificationResult,
    Vendor,
    StoredRecord,
    FailureReason,
    BatchStatus,
    BatchSummary,
    ColumnMapping,
    Category,
    RowField,
} from '@txnflow/shared';

export {
    CATEGORIES,
    FINGERPRINT,
    BATCH_ID,
    VENDOR_ID,
    DEFAULT_MINOR_UNITS,
    CURRENCY_MINOR_UNITS,
    REVIEW_REASONS,
    ValidationError,
} from '@txnflow/shared';
