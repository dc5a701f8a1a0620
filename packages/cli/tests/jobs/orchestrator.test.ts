import { describe, it, expect } from 'vitest';
import type { BatchStatus, JobRecord } from '@txnflow/shared';
import { BatchDeadlineExceeded } from '@txnflow/shared';
import { deriveBatchId, summarizeOutcomes } from '@txnflow/core';
import type { BatchResult, RowOutcome } from '@txnflow/core';
import { JobOrchestrator } from '../../src/jobs/orchestrator.js';
import { InProcessTaskQueue } from '../../src/jobs/task-queue.js';
import type { QueuedBatch } from '../../src/jobs/types.js';
import type { BatchPipeline } from '../../src/pipeline/runner.js';
import type { BatchInput, RunOptions } from '../../src/pipeline/types.js';
import { FIXED_NOW, byDescription, createHarness, now, row } from '../helpers.js';

type RunImpl = (batch: BatchInput, options: RunOptions) => Promise<BatchResult>;

class FakePipeline {
    readonly calls: BatchInput[] = [];

    constructor(private readonly impl: RunImpl) {}

    run(batch: BatchInput, options: RunOptions = {}): Promise<BatchResult> {
        this.calls.push(batch);
        return this.impl(batch, options);
    }
}

function gate(): { promise: Promise<void>; open: () => void } {
    let open: () => void = () => undefined;
    const promise = new Promise<void>((resolve) => {
        open = resolve;
    });
    return { promise, open };
}

function resultFor(batch: BatchInput, status: BatchStatus = 'completed'): BatchResult {
    const outcomes: RowOutcome[] = batch.rows.map((_row, index) => ({
        kind: 'skipped_duplicate',
        index,
        fingerprint: String(index).padStart(32, '0'),
    }));
    return {
        batch_id: batch.batchId,
        status,
        outcomes,
        summary: summarizeOutcomes(outcomes),
        started_at: FIXED_NOW.toISOString(),
        finished_at: FIXED_NOW.toISOString(),
        warnings: status === 'failed' ? ['Storage unavailable: db down'] : [],
    };
}

function orchestratorWith(pipeline: Pick<BatchPipeline, 'run'>, batchDeadlineMs = 60_000) {
    const queue = new InProcessTaskQueue<QueuedBatch>({ workerConcurrency: 1 });
    return new JobOrchestrator(pipeline, queue, { batchDeadlineMs, now });
}

const ROWS = [row('NETFLIX.COM'), row('SALARY JAN')];

describe('JobOrchestrator', () => {
    it('returns the same handle for a batch submitted twice before it finishes', async () => {
        const release = gate();
        const pipeline = new FakePipeline(async (batch) => {
            await release.promise;
            return resultFor(batch);
        });
        const orchestrator = orchestratorWith(pipeline);

        const first = await orchestrator.submit(ROWS);
        const second = await orchestrator.submit(ROWS);

        expect(first).toEqual({ batchId: deriveBatchId(ROWS), attempt: 1, mode: 'inline' });
        expect(second).toEqual(first);
        expect(orchestrator.poll(first.batchId)?.status).toBe('running');

        release.open();
        const result = await orchestrator.wait(first.batchId);

        expect(result.status).toBe('completed');
        expect(pipeline.calls).toHaveLength(1);
        expect(orchestrator.poll(first.batchId)).toMatchObject({
            status: 'completed',
            attempt: 1,
            processedCount: 2,
            totalCount: 2,
        });
    });

    it('does not run a completed batch again', async () => {
        const pipeline = new FakePipeline(async (batch) => resultFor(batch));
        const orchestrator = orchestratorWith(pipeline);

        await orchestrator.runInline(ROWS, { batchId: 'b_done' });
        const handle = await orchestrator.submit(ROWS, { batchId: 'b_done' });

        expect(handle.attempt).toBe(1);
        expect(pipeline.calls).toHaveLength(1);
    });

    it('runs a failed batch again as a new attempt', async () => {
        let calls = 0;
        const pipeline = new FakePipeline(async (batch) => resultFor(batch, ++calls === 1 ? 'failed' : 'completed'));
        const orchestrator = orchestratorWith(pipeline);

        const failed = await orchestrator.runInline(ROWS, { batchId: 'b_retry' });
        expect(failed.status).toBe('failed');
        expect(orchestrator.poll('b_retry')).toMatchObject({ status: 'failed', error: 'Storage unavailable: db down' });

        const handle = await orchestrator.submit(ROWS, { batchId: 'b_retry' });
        const retried = await orchestrator.wait('b_retry');

        expect(handle.attempt).toBe(2);
        expect(retried.status).toBe('completed');
        expect(pipeline.calls).toHaveLength(2);
    });

    it('keeps processedCount from going backwards', async () => {
        const pipeline = new FakePipeline(async (batch, options) => {
            const summary = summarizeOutcomes([]);
            options.onProgress?.({ processed: 1, total: 3, summary });
            options.onProgress?.({ processed: 2, total: 3, summary });
            options.onProgress?.({ processed: 1, total: 3, summary });
            await new Promise((resolve) => setTimeout(resolve, 0));
            return resultFor({ ...batch, rows: batch.rows.slice(0, 2) }, 'partially_completed');
        });
        const orchestrator = orchestratorWith(pipeline);

        const handle = await orchestrator.submit([...ROWS, row('THIRD')], { batchId: 'b_progress' });
        expect(orchestrator.poll(handle.batchId)?.processedCount).toBe(2);
    });

    it('marks a batch failed when the run itself crashes', async () => {
        const pipeline = new FakePipeline(async () => {
            throw new Error('pool exploded');
        });
        const orchestrator = orchestratorWith(pipeline);

        await orchestrator.submit(ROWS, { batchId: 'b_crash' });

        await expect(orchestrator.wait('b_crash')).rejects.toThrow('pool exploded');
        expect(orchestrator.poll('b_crash')).toMatchObject({ status: 'failed', error: 'pool exploded' });
    });

    it('fails a queued job whose enqueue is rejected and accepts the batch id again', async () => {
        const pipeline = new FakePipeline(async (batch) => resultFor(batch));
        const orchestrator = orchestratorWith(pipeline);
        await orchestrator.close();

        await expect(orchestrator.submit(ROWS, { batchId: 'b_closed', mode: 'queued' })).rejects.toThrow(
            'Task queue is closed'
        );
        expect(orchestrator.poll('b_closed')).toMatchObject({ status: 'failed', error: 'Task queue is closed' });
        await expect(orchestrator.wait('b_closed')).rejects.toThrow('Task queue is closed');

        const retry = await orchestrator.submit(ROWS, { batchId: 'b_closed' });
        expect(retry).toEqual({ batchId: 'b_closed', attempt: 2, mode: 'inline' });
        expect((await orchestrator.wait('b_closed')).status).toBe('completed');
        expect(pipeline.calls).toHaveLength(1);
    });

    it('aborts the run with BatchDeadlineExceeded at the deadline', async () => {
        let reason: unknown;
        const pipeline = new FakePipeline(
            (batch, options) =>
                new Promise((resolve) => {
                    options.signal?.addEventListener('abort', () => {
                        reason = options.signal?.reason;
                        resolve(resultFor(batch, 'failed'));
                    });
                })
        );
        const orchestrator = orchestratorWith(pipeline, 10);

        const result = await orchestrator.runInline(ROWS, { batchId: 'b_slow' });

        expect(result.status).toBe('failed');
        expect(reason).toBeInstanceOf(BatchDeadlineExceeded);
    });

    it('answers poll and cancel for unknown batches', () => {
        const orchestrator = orchestratorWith(new FakePipeline(async (batch) => resultFor(batch)));

        expect(orchestrator.poll('b_nope')).toBeUndefined();
        expect(orchestrator.cancel('b_nope')).toBe(false);
    });

    describe('with the real pipeline', () => {
        it('cancels a running batch at the next row boundary', async () => {
            const entered = gate();
            const release = gate();
            const answer = byDescription({});
            const h = createHarness(
                async (request, signal) => {
                    entered.open();
                    await release.promise;
                    return answer(request, signal);
                },
                { settings: { maxConcurrency: 1 } }
            );
            const orchestrator = orchestratorWith(h.pipeline);

            const handle = await orchestrator.submit([row('A1'), row('B2'), row('C3')]);
            await entered.promise;
            expect(orchestrator.cancel(handle.batchId)).toBe(true);
            release.open();
            const result = await orchestrator.wait(handle.batchId);

            expect(result.status).toBe('cancelled');
            expect(result.summary).toMatchObject({ classified: 1, failed: 2, failures_by_reason: { cancelled: 2 } });
            expect(orchestrator.poll(handle.batchId)).toMatchObject({ status: 'cancelled', processedCount: 3 });
            expect(orchestrator.cancel(handle.batchId)).toBe(false);
        });

        it('polls queued batches the same way as inline ones', async () => {
            const h = createHarness(byDescription({ 'salary jan': { category: 'salary_payment', confidence: 0.9 } }));
            const orchestrator = orchestratorWith(h.pipeline);

            const handle = await orchestrator.submit(ROWS, { mode: 'queued' });
            expect(handle.mode).toBe('queued');
            expect(orchestrator.poll(handle.batchId)?.totalCount).toBe(2);

            const result = await orchestrator.wait(handle.batchId);
            await orchestrator.close();

            expect(result.status).toBe('completed');
            expect(orchestrator.poll(handle.batchId)).toMatchObject({
                status: 'completed',
                processedCount: 2,
                summary: { classified: 2 },
            });
        });
    });

    it('cancels a queued batch before a worker picks it up', async () => {
        const release = gate();
        const pipeline = new FakePipeline(async (batch) => {
            await release.promise;
            return resultFor(batch);
        });
        const orchestrator = orchestratorWith(pipeline);

        await orchestrator.submit(ROWS, { batchId: 'b_busy', mode: 'queued' });
        await orchestrator.submit(ROWS, { batchId: 'b_waiting', mode: 'queued' });

        expect(orchestrator.cancel('b_waiting')).toBe(true);
        const cancelled = await orchestrator.wait('b_waiting');
        release.open();
        await orchestrator.close();

        expect(cancelled.status).toBe('cancelled');
        expect(cancelled.outcomes.map((o) => (o.kind === 'failed' ? o.reason : o.kind))).toEqual([
            'cancelled',
            'cancelled',
        ]);
        expect(pipeline.calls.map((b) => b.batchId)).toEqual(['b_busy']);
    });

    describe('restore', () => {
        const completed: JobRecord = {
            batch_id: 'b_old',
            status: 'completed',
            attempt: 1,
            total: 2,
            processed: 2,
            finished_at: FIXED_NOW.toISOString(),
        };

        it('recognises a finished batch from an earlier process', async () => {
            const pipeline = new FakePipeline(async (batch) => resultFor(batch));
            const orchestrator = orchestratorWith(pipeline);
            orchestrator.restore([completed]);

            const handle = await orchestrator.submit(ROWS, { batchId: 'b_old' });

            expect(handle).toEqual({ batchId: 'b_old', attempt: 1, mode: 'restored' });
            expect(pipeline.calls).toHaveLength(0);
            expect(orchestrator.poll('b_old')).toMatchObject({ status: 'completed', processedCount: 2 });
        });

        it('runs a restored failed batch as the next attempt', async () => {
            const pipeline = new FakePipeline(async (batch) => resultFor(batch));
            const orchestrator = orchestratorWith(pipeline);
            orchestrator.restore([{ ...completed, status: 'failed', error: 'Oracle unreachable' }]);

            const handle = await orchestrator.submit(ROWS, { batchId: 'b_old' });
            await orchestrator.wait('b_old');

            expect(handle.attempt).toBe(2);
            expect(pipeline.calls).toHaveLength(1);
        });

        it('exports terminal jobs only', async () => {
            const release = gate();
            const pipeline = new FakePipeline(async (batch) => {
                if (batch.batchId === 'b_live') await release.promise;
                return resultFor(batch);
            });
            const orchestrator = orchestratorWith(pipeline);

            await orchestrator.runInline(ROWS, { batchId: 'b_done' });
            await orchestrator.submit(ROWS, { batchId: 'b_live' });

            expect(orchestrator.records()).toEqual([
                {
                    batch_id: 'b_done',
                    status: 'completed',
                    attempt: 1,
                    total: 2,
                    processed: 2,
                    summary: resultFor({ batchId: 'b_done', rows: ROWS }).summary,
                    error: undefined,
                    finished_at: FIXED_NOW.toISOString(),
                },
            ]);
            release.open();
            await orchestrator.wait('b_live');
        });
    });
});
