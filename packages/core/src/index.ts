// Types (re-exported from shared)
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
} from './types/index.js';

// Utils
export {
    normalizeDescription,
    normalizeVendorName,
    parseDateValue,
    formatIsoDate,
    parseAmount,
    formatAmount,
    minorUnitsFor,
} from './utils/index.js';

// Fingerprint engine
export { normalizeRow, fingerprint, fingerprintNormalized, fingerprintPayload, deriveBatchId } from './fingerprint/index.js';
export type { NormalizeOptions } from './fingerprint/index.js';

// Vendor matching
export {
    similarity,
    vendorKey,
    vendorIdFor,
    scoreVendor,
    findBestVendorMatch,
    decideMatch,
    isKnownName,
    assertThresholds,
} from './vendor/index.js';
export type { MatchThresholds, MatchDecision, VendorCandidate } from './vendor/index.js';

// Confidence
export { aggregateConfidence } from './confidence/index.js';
export type { VendorDecision, VendorSignal, AggregateOptions, AggregatedConfidence } from './confidence/index.js';

// Batches
export { emptySummary, addOutcome, summarizeOutcomes, deriveBatchStatus } from './batch/index.js';
export type {
    RowOutcome,
    RowOutcomeKind,
    ClassifiedOutcome,
    SkippedOutcome,
    FailedOutcome,
    BatchResult,
} from './batch/index.js';

// Ingestion
export { readTabularRows, recordToRow } from './ingest/index.js';
export type { IngestOptions, IngestResult } from './ingest/index.js';
