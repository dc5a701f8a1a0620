import type {
    BatchSummary,
    Category,
    ClassificationResult,
    NormalizedRow,
    TransactionRow,
} from '@txnflow/shared';
import type { AggregatedConfidence, RowOutcome } from '@txnflow/core';
import type { ClassifyOptions } from '../oracle/client.js';
import type { OracleRequest } from '../oracle/types.js';
import type { ClassificationCache, TransactionStore } from '../store/types.js';
import type { SingleFlight } from '../utils/single-flight.js';
import type { VendorRegistry, VendorResolution } from '../vendor/registry.js';

/**
 * The part of OracleClient the pipeline depends on.
 */
export interface Classifier {
    classify(request: OracleRequest, options?: ClassifyOptions): Promise<ClassificationResult>;
}

export interface PipelineDeps {
    store: TransactionStore;
    cache: ClassificationCache;
    registry: VendorRegistry;
    oracle: Classifier;
    /** Pending oracle calls per fingerprint; share one across pipelines in a process */
    inflight?: SingleFlight<ClassificationResult>;
    now?: () => Date;
}

export interface PipelineSettings {
    maxConcurrency: number;
    reviewConfidenceThreshold: number;
    /** Consecutive exhausted oracle failures that abort the batch */
    oracleFailureLimit: number;
    vendorCategories: readonly Category[];
    currencyMinorUnits?: Readonly<Record<string, number>>;
}

export interface BatchInput {
    batchId: string;
    rows: readonly TransactionRow[];
}

export interface BatchProgress {
    /** Rows with a final outcome; never decreases */
    processed: number;
    total: number;
    summary: BatchSummary;
}

export interface RunOptions {
    /** Aborting stops in-flight oracle calls; the reason decides the row outcome */
    signal?: AbortSignal;
    /** Checked at every row boundary */
    isCancelled?: () => boolean;
    onProgress?: (progress: BatchProgress) => void;
}

/**
 * Per-row state passed through the row steps. A step that decides the
 * row's fate sets `outcome`; later steps are skipped.
 */
export interface RowState {
    index: number;
    batchId: string;
    fingerprint: string;
    row: NormalizedRow;
    rawDescription: string;
    classification?: ClassificationResult;
    source?: 'oracle' | 'cache';
    vendor?: VendorResolution;
    aggregated?: AggregatedConfidence;
    outcome?: RowOutcome;
}

export interface RowContext {
    deps: Required<Pick<PipelineDeps, 'store' | 'cache' | 'registry' | 'oracle' | 'inflight' | 'now'>>;
    settings: PipelineSettings;
    signal?: AbortSignal;
    recordOracleCall: () => void;
    recordOracleSuccess: () => void;
}

export type RowStep = (state: RowState, ctx: RowContext) => Promise<RowState>;
