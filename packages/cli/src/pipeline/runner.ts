/**
 * Batch pipeline.
 *
 * A synchronous pre-pass fingerprints every row and settles validation
 * failures and in-batch duplicates. The remaining rows run through the row
 * steps on a bounded pool:
 *
 *   skipPersisted → classifyRow → resolveVendor → aggregateRow → persistRow
 *
 * Row errors end that row. Systemic errors (a systemic StorageError, or the
 * oracle failing `oracleFailureLimit` times in a row) stop every row that
 * has not started yet.
 */

import pLimit from 'p-limit';
import type { FailureReason, StoredRecord } from '@txnflow/shared';
import {
    BatchAborted,
    BatchDeadlineExceeded,
    OracleError,
    StorageError,
    ValidationError,
} from '@txnflow/shared';
import type { BatchResult, FailedOutcome, RowOutcome } from '@txnflow/core';
import { aggregateConfidence, deriveBatchStatus, fingerprintNormalized, normalizeRow } from '@txnflow/core';
import { SingleFlight } from '../utils/single-flight.js';
import { errorMessage, getLogger } from '../utils/logger.js';
import { BatchAccumulator } from './accumulator.js';
import { aggregateRow, classifyRow, persistRow, resolveVendor, skipPersisted } from './steps/index.js';
import type {
    BatchInput,
    PipelineDeps,
    PipelineSettings,
    RowContext,
    RowState,
    RowStep,
    RunOptions,
} from './types.js';

const logger = getLogger('Pipeline');

const ROW_STEPS: { name: string; fn: RowStep }[] = [
    { name: 'dedup', fn: skipPersisted },
    { name: 'classify', fn: classifyRow },
    { name: 'vendor', fn: resolveVendor },
    { name: 'aggregate', fn: aggregateRow },
    { name: 'persist', fn: persistRow },
];

export interface ReclassifyOptions {
    signal?: AbortSignal;
}

export class BatchPipeline {
    private readonly deps: RowContext['deps'];

    constructor(
        deps: PipelineDeps,
        private readonly settings: PipelineSettings
    ) {
        if (settings.maxConcurrency < 1) {
            throw new Error(`maxConcurrency must be at least 1, got ${settings.maxConcurrency}`);
        }
        this.deps = {
            store: deps.store,
            cache: deps.cache,
            registry: deps.registry,
            oracle: deps.oracle,
            inflight: deps.inflight ?? new SingleFlight(),
            now: deps.now ?? (() => new Date()),
        };
    }

    async run(batch: BatchInput, options: RunOptions = {}): Promise<BatchResult> {
        const startedAt = this.deps.now().toISOString();
        const accumulator = new BatchAccumulator(batch.rows.length, options.onProgress);
        const run = new RunControl(this.settings.oracleFailureLimit, options);

        logger.info({ batchId: batch.batchId, rows: batch.rows.length }, 'Batch started');

        const pending = this.prepare(batch, accumulator);

        const ctx: RowContext = {
            deps: this.deps,
            settings: this.settings,
            signal: options.signal,
            recordOracleCall: () => accumulator.recordOracleCall(),
            recordOracleSuccess: () => run.oracleSucceeded(),
        };

        const limit = pLimit(this.settings.maxConcurrency);
        await Promise.all(
            pending.map((state) =>
                limit(async () => {
                    accumulator.record(await this.processRow(state, ctx, run));
                })
            )
        );

        const outcomes = accumulator.results();
        const status = deriveBatchStatus(outcomes, run.statusOverride());
        const warnings = run.abortError ? [run.abortError.message] : [];

        logger.info({ batchId: batch.batchId, status, summary: accumulator.snapshot() }, 'Batch finished');

        return {
            batch_id: batch.batchId,
            status,
            outcomes,
            summary: accumulator.snapshot(),
            started_at: startedAt,
            finished_at: this.deps.now().toISOString(),
            warnings,
        };
    }

    /**
     * Explicit re-classification: a fresh oracle call replaces the cached
     * result and the record's classification. Old versions are kept.
     *
     * @throws Error if no record exists for the fingerprint
     * @throws OracleError when the oracle fails
     */
    async reclassify(fingerprint: string, options: ReclassifyOptions = {}): Promise<StoredRecord> {
        const record = await this.deps.store.findByFingerprint(fingerprint);
        if (!record) {
            throw new Error(`No record with fingerprint ${fingerprint}`);
        }

        const result = await this.deps.oracle.classify(
            {
                descriptionText: record.raw_description,
                amount: record.row.amount,
                currency: record.row.currency,
            },
            { signal: options.signal }
        );
        await this.deps.cache.put(fingerprint, result, { force: true });

        const vendor = this.settings.vendorCategories.includes(result.category)
            ? await this.deps.registry.resolve(record.raw_description)
            : undefined;

        const aggregated = aggregateConfidence(
            result,
            vendor ? { confidence: vendor.matchConfidence, decision: vendor.decision } : null,
            { reviewConfidenceThreshold: this.settings.reviewConfidenceThreshold }
        );

        const updated = await this.deps.store.supersede(fingerprint, {
            classification: { ...result, vendor_reference: vendor?.vendor.vendor_id ?? null },
            vendor_id: vendor?.vendor.vendor_id ?? null,
            vendor_confidence: vendor?.matchConfidence ?? null,
            confidence: aggregated.confidence,
            needs_review: aggregated.needsReview,
            review_reasons: aggregated.reviewReasons,
        });

        logger.info(
            { fingerprint, from: record.classification.category, to: result.category },
            'Record reclassified'
        );
        return updated;
    }

    /**
     * Fingerprint every row in input order. Invalid rows and repeats of an
     * earlier row are settled here; the first occurrence wins.
     */
    private prepare(batch: BatchInput, accumulator: BatchAccumulator): RowState[] {
        const seen = new Set<string>();
        const pending: RowState[] = [];

        batch.rows.forEach((raw, index) => {
            let state: RowState;
            try {
                const row = normalizeRow(raw, { currencyMinorUnits: this.settings.currencyMinorUnits });
                state = {
                    index,
                    batchId: batch.batchId,
                    fingerprint: fingerprintNormalized(row),
                    row,
                    rawDescription: raw.description.trim(),
                };
            } catch (error) {
                if (!(error instanceof ValidationError)) throw error;
                accumulator.record(failed(index, null, 'validation', error.message));
                return;
            }

            if (seen.has(state.fingerprint)) {
                accumulator.record({ kind: 'skipped_duplicate', index, fingerprint: state.fingerprint });
                return;
            }
            seen.add(state.fingerprint);
            pending.push(state);
        });

        return pending;
    }

    private async processRow(initial: RowState, ctx: RowContext, run: RunControl): Promise<RowOutcome> {
        const stop = run.stopReason(ctx.signal);
        if (stop) {
            return failed(initial.index, initial.fingerprint, stop.reason, stop.message);
        }

        let state = initial;
        try {
            for (const step of ROW_STEPS) {
                state = await step.fn(state, ctx);
                if (state.outcome) {
                    return state.outcome;
                }
            }
            throw new Error(`Row ${state.index} finished every step without an outcome`);
        } catch (error) {
            return this.rowFailure(state, error, ctx.signal, run);
        }
    }

    private rowFailure(
        state: RowState,
        error: unknown,
        signal: AbortSignal | undefined,
        run: RunControl
    ): FailedOutcome {
        if (signal?.aborted) {
            const reason: FailureReason =
                signal.reason instanceof BatchDeadlineExceeded ? 'deadline_exceeded' : 'aborted';
            return failed(state.index, state.fingerprint, reason, errorMessage(signal.reason));
        }

        if (error instanceof OracleError) {
            if (error.kind === 'exhausted') {
                run.oracleExhausted(error);
                return failed(state.index, state.fingerprint, 'oracle_exhausted', error.message);
            }
            return failed(state.index, state.fingerprint, 'oracle_fatal', error.message);
        }

        if (error instanceof StorageError) {
            if (error.systemic) {
                run.abort(new BatchAborted(`Storage unavailable: ${error.message}`, { cause: error }));
            }
            return failed(state.index, state.fingerprint, 'storage', error.message);
        }

        logger.error({ err: error, fingerprint: state.fingerprint, index: state.index }, 'Unexpected row failure');
        return failed(state.index, state.fingerprint, 'internal', errorMessage(error));
    }
}

/**
 * Stop conditions for one run: caller cancellation, the caller's signal,
 * and systemic aborts raised by rows.
 */
class RunControl {
    abortError: BatchAborted | undefined;
    private cancelled = false;
    private consecutiveExhausted = 0;

    constructor(
        private readonly oracleFailureLimit: number,
        private readonly options: RunOptions
    ) {}

    stopReason(signal: AbortSignal | undefined): { reason: FailureReason; message: string } | undefined {
        if (this.abortError) {
            return { reason: 'aborted', message: this.abortError.message };
        }
        if (signal?.aborted) {
            if (signal.reason instanceof BatchDeadlineExceeded) {
                return { reason: 'deadline_exceeded', message: signal.reason.message };
            }
            return { reason: 'aborted', message: errorMessage(signal.reason) };
        }
        if (this.options.isCancelled?.()) {
            this.cancelled = true;
            return { reason: 'cancelled', message: 'Batch cancelled' };
        }
        return undefined;
    }

    oracleSucceeded(): void {
        this.consecutiveExhausted = 0;
    }

    oracleExhausted(error: OracleError): void {
        this.consecutiveExhausted++;
        if (this.consecutiveExhausted >= this.oracleFailureLimit) {
            this.abort(
                new BatchAborted(`Oracle unreachable after ${this.consecutiveExhausted} consecutive failures`, {
                    cause: error,
                })
            );
        }
    }

    abort(error: BatchAborted): void {
        if (this.abortError) return;
        this.abortError = error;
        logger.error({ err: error }, error.message);
    }

    /**
     * Deadline and systemic aborts fail the batch; otherwise a cancellation
     * seen at any row boundary, or requested before the last row finished,
     * cancels it.
     */
    statusOverride(): 'failed' | 'cancelled' | undefined {
        if (this.abortError || this.options.signal?.aborted) {
            return 'failed';
        }
        if (this.cancelled || this.options.isCancelled?.()) {
            return 'cancelled';
        }
        return undefined;
    }
}

function failed(index: number, fingerprint: string | null, reason: FailureReason, error: string): FailedOutcome {
    return { kind: 'failed', index, fingerprint, reason, error };
}
