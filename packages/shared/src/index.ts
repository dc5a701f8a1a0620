// Schemas
export {
    CategorySchema,
    TransactionRowSchema,
    NormalizedRowSchema,
    ClassificationResultSchema,
    OracleResponseSchema,
    CacheEntrySchema,
    VendorSchema,
    VendorSeedSchema,
    VendorCatalogSchema,
    StoredRecordSchema,
    FailureReasonSchema,
    BatchStatusSchema,
    JobStatusSchema,
    BatchSummarySchema,
    JobRecordSchema,
    ColumnMappingSchema,
    EngineConfigSchema,
    StateSnapshotSchema,
} from './schemas.js';

// Types
export type {
    TransactionRow,
    NormalizedRow,
    ClassificationResult,
    OracleResponse,
    CacheEntry,
    Vendor,
    VendorSeed,
    VendorCatalog,
    StoredRecord,
    FailureReason,
    BatchStatus,
    JobStatus,
    BatchSummary,
    JobRecord,
    ColumnMapping,
    EngineConfig,
    StateSnapshot,
} from './schemas.js';

// Constants
export {
    CATEGORIES,
    DEFAULT_VENDOR_CATEGORIES,
    FINGERPRINT,
    BATCH_ID,
    VENDOR_ID,
    DEFAULT_MINOR_UNITS,
    CURRENCY_MINOR_UNITS,
    VENDOR_MATCHING,
    ORACLE_DEFAULTS,
    PIPELINE_DEFAULTS,
    REVIEW_REASONS,
    DEFAULT_COLUMNS,
} from './constants.js';
export type { Category } from './constants.js';

// Errors
export {
    ValidationError,
    OracleError,
    OracleTransientError,
    RegistryConflict,
    DuplicateSubmission,
    StorageError,
    BatchDeadlineExceeded,
    BatchAborted,
} from './errors.js';
export type { RowField, OracleErrorKind, TransientReason } from './errors.js';
