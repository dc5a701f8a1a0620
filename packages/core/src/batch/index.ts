export { emptySummary, addOutcome, summarizeOutcomes, deriveBatchStatus } from './summarize.js';
export type {
    RowOutcome,
    RowOutcomeKind,
    ClassifiedOutcome,
    SkippedOutcome,
    FailedOutcome,
    BatchResult,
} from './types.js';
