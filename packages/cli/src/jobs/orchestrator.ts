/**
 * Job orchestrator.
 *
 * One job per batch id:
 *
 *   submitted → running → completed | failed | partially_completed | cancelled
 *   submitted → cancelled   (queued job cancelled before a worker took it)
 *
 * Submitting a batch id that is live or finished returns the existing
 * handle. Only failed and cancelled batches run again, as a new attempt.
 * Inline and queued jobs are polled and cancelled the same way.
 */

import type { BatchStatus, BatchSummary, JobRecord, JobStatus, TransactionRow } from '@txnflow/shared';
import { BatchDeadlineExceeded, DuplicateSubmission } from '@txnflow/shared';
import type { BatchResult, RowOutcome } from '@txnflow/core';
import { deriveBatchId, summarizeOutcomes } from '@txnflow/core';
import type { BatchPipeline } from '../pipeline/runner.js';
import { errorMessage, getLogger } from '../utils/logger.js';
import type { TaskQueue } from './task-queue.js';
import type { JobHandle, JobReport, QueuedBatch, SubmitMode, SubmitOptions } from './types.js';

const logger = getLogger('JobOrchestrator');

const RETRYABLE: ReadonlySet<JobStatus> = new Set<JobStatus>(['failed', 'cancelled']);
const TERMINAL: ReadonlySet<JobStatus> = new Set<JobStatus>([
    'completed',
    'failed',
    'partially_completed',
    'cancelled',
]);

export interface OrchestratorOptions {
    batchDeadlineMs: number;
    now?: () => Date;
}

interface Job {
    batchId: string;
    attempt: number;
    mode: JobHandle['mode'];
    status: JobStatus;
    rows: readonly TransactionRow[];
    total: number;
    processed: number;
    summary?: BatchSummary;
    error?: string;
    result?: BatchResult;
    cancelRequested: boolean;
    finishedAt?: string;
    finished: Promise<void>;
    markFinished: () => void;
}

export class JobOrchestrator {
    private readonly jobs = new Map<string, Job>();
    private readonly now: () => Date;

    constructor(
        private readonly pipeline: Pick<BatchPipeline, 'run'>,
        private readonly queue: TaskQueue<QueuedBatch>,
        private readonly options: OrchestratorOptions
    ) {
        this.now = options.now ?? (() => new Date());
        queue.process((batchId, payload) => this.run(batchId, payload.rows));
    }

    async submit(rows: readonly TransactionRow[], options: SubmitOptions = {}): Promise<JobHandle> {
        const batchId = options.batchId ?? deriveBatchId(rows);
        const mode: SubmitMode = options.mode ?? 'inline';

        const existing = this.jobs.get(batchId);
        if (existing && !RETRYABLE.has(existing.status)) {
            const duplicate = new DuplicateSubmission(batchId);
            logger.debug({ batchId, status: existing.status, attempt: existing.attempt }, duplicate.message);
            return handleOf(existing);
        }

        const job = createJob(batchId, rows, (existing?.attempt ?? 0) + 1, mode);
        this.jobs.set(batchId, job);
        logger.info({ batchId, attempt: job.attempt, mode, rows: rows.length }, 'Job submitted');

        if (mode === 'inline') {
            void this.execute(job);
        } else {
            try {
                await this.queue.enqueue(batchId, { rows });
            } catch (error) {
                this.abandon(job, error, 'Enqueue failed');
                throw error;
            }
        }

        return handleOf(job);
    }

    /**
     * Worker entry point for queued jobs.
     */
    async run(batchId: string, rows: readonly TransactionRow[]): Promise<void> {
        let job = this.jobs.get(batchId);
        if (!job) {
            job = createJob(batchId, rows, 1, 'queued');
            this.jobs.set(batchId, job);
        }
        if (job.status !== 'submitted') {
            logger.debug({ batchId, status: job.status }, 'Skipping queued job that is no longer submitted');
            return;
        }
        await this.execute(job);
    }

    poll(batchId: string): JobReport | undefined {
        const job = this.jobs.get(batchId);
        return job ? reportOf(job) : undefined;
    }

    list(): JobReport[] {
        return Array.from(this.jobs.values()).map(reportOf);
    }

    /**
     * @returns true if the job was submitted or running; false if unknown or
     * already finished
     */
    cancel(batchId: string): boolean {
        const job = this.jobs.get(batchId);
        if (!job) return false;

        if (job.status === 'submitted') {
            const outcomes: RowOutcome[] = job.rows.map((_row, index) => ({
                kind: 'failed',
                index,
                fingerprint: null,
                reason: 'cancelled',
                error: 'Batch cancelled before it started',
            }));
            const at = this.now().toISOString();
            this.finish(job, {
                batch_id: job.batchId,
                status: 'cancelled',
                outcomes,
                summary: summarizeOutcomes(outcomes),
                started_at: at,
                finished_at: at,
                warnings: [],
            });
            return true;
        }

        if (job.status === 'running') {
            job.cancelRequested = true;
            logger.info({ batchId }, 'Cancellation requested');
            return true;
        }

        return false;
    }

    /**
     * Resolve when the job reaches a terminal state.
     *
     * @throws Error for unknown batch ids, and for jobs that ended without a
     * result (restored from a snapshot, or the run itself crashed)
     */
    async wait(batchId: string): Promise<BatchResult> {
        const job = this.jobs.get(batchId);
        if (!job) {
            throw new Error(`Unknown batch ${batchId}`);
        }
        await job.finished;
        if (job.result) {
            return job.result;
        }
        throw new Error(job.error ?? `No result recorded for batch ${batchId}`);
    }

    async runInline(rows: readonly TransactionRow[], options: { batchId?: string } = {}): Promise<BatchResult> {
        const handle = await this.submit(rows, { batchId: options.batchId, mode: 'inline' });
        return this.wait(handle.batchId);
    }

    /**
     * Seed terminal jobs from an earlier process so their batch ids are
     * recognised on resubmission. Live jobs are never overwritten.
     */
    restore(records: readonly JobRecord[]): void {
        for (const record of records) {
            const live = this.jobs.get(record.batch_id);
            if (live && !TERMINAL.has(live.status)) continue;

            const job = createJob(record.batch_id, [], record.attempt, 'restored');
            job.status = record.status;
            job.total = record.total;
            job.processed = record.processed;
            job.summary = record.summary;
            job.error = record.error;
            job.finishedAt = record.finished_at;
            job.markFinished();
            this.jobs.set(record.batch_id, job);
        }
    }

    /**
     * Terminal jobs in a form that can be persisted and restored.
     */
    records(): JobRecord[] {
        const records: JobRecord[] = [];
        for (const job of this.jobs.values()) {
            if (!isBatchStatus(job.status) || job.finishedAt === undefined) continue;
            records.push({
                batch_id: job.batchId,
                status: job.status,
                attempt: job.attempt,
                total: job.total,
                processed: job.processed,
                summary: job.summary,
                error: job.error,
                finished_at: job.finishedAt,
            });
        }
        return records;
    }

    async close(): Promise<void> {
        await this.queue.close();
    }

    private async execute(job: Job): Promise<void> {
        if (job.status !== 'submitted') return;

        this.transition(job, 'running');

        const controller = new AbortController();
        const timer = setTimeout(() => {
            controller.abort(new BatchDeadlineExceeded(this.options.batchDeadlineMs));
        }, this.options.batchDeadlineMs);

        try {
            const result = await this.pipeline.run(
                { batchId: job.batchId, rows: job.rows },
                {
                    signal: controller.signal,
                    isCancelled: () => job.cancelRequested,
                    onProgress: (progress) => {
                        job.processed = Math.max(job.processed, progress.processed);
                        job.summary = progress.summary;
                    },
                }
            );
            this.finish(job, result);
        } catch (error) {
            this.abandon(job, error, 'Batch run crashed');
        } finally {
            clearTimeout(timer);
        }
    }

    /**
     * End a job as failed without a result. A failed job is retryable, so the
     * batch id is free for the next submit.
     */
    private abandon(job: Job, error: unknown, message: string): void {
        logger.error({ batchId: job.batchId, err: error }, message);
        job.error = errorMessage(error);
        job.finishedAt = this.now().toISOString();
        this.transition(job, 'failed');
        job.markFinished();
    }

    private finish(job: Job, result: BatchResult): void {
        job.result = result;
        job.summary = result.summary;
        job.processed = Math.max(job.processed, result.outcomes.length);
        job.finishedAt = result.finished_at;
        if (result.warnings.length > 0) {
            job.error = result.warnings.join('; ');
        }
        this.transition(job, result.status);
        job.markFinished();
    }

    private transition(job: Job, status: JobStatus): void {
        logger.info({ batchId: job.batchId, from: job.status, to: status, attempt: job.attempt }, 'Job state changed');
        job.status = status;
    }
}

function createJob(batchId: string, rows: readonly TransactionRow[], attempt: number, mode: Job['mode']): Job {
    let markFinished: () => void = () => undefined;
    const finished = new Promise<void>((resolve) => {
        markFinished = resolve;
    });

    return {
        batchId,
        attempt,
        mode,
        status: 'submitted',
        rows,
        total: rows.length,
        processed: 0,
        cancelRequested: false,
        finished,
        markFinished,
    };
}

function handleOf(job: Job): JobHandle {
    return { batchId: job.batchId, attempt: job.attempt, mode: job.mode };
}

function reportOf(job: Job): JobReport {
    const report: JobReport = {
        batchId: job.batchId,
        status: job.status,
        attempt: job.attempt,
        processedCount: job.processed,
        totalCount: job.total,
    };
    if (job.summary) report.summary = job.summary;
    if (job.error !== undefined) report.error = job.error;
    return report;
}

function isBatchStatus(status: JobStatus): status is BatchStatus {
    return TERMINAL.has(status);
}
