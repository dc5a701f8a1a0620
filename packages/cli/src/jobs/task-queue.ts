/**
 * Task-queue contract plus the in-process implementation the CLI uses.
 * A broker-backed queue would implement the same interface.
 */

import pLimit from 'p-limit';
import type { LimitFunction } from 'p-limit';
import { errorMessage, getLogger } from '../utils/logger.js';

const logger = getLogger('TaskQueue');

export interface QueueHandle {
    taskId: string;
    batchId: string;
}

export type TaskHandler<P> = (batchId: string, payload: P) => Promise<void>;

export interface TaskQueue<P> {
    enqueue(batchId: string, payload: P): Promise<QueueHandle>;
    /** Register the worker callback. Tasks enqueued earlier are dispatched now. */
    process(handler: TaskHandler<P>): void;
    /** Stop accepting tasks and wait for dispatched ones to finish */
    close(): Promise<void>;
}

interface Task<P> extends QueueHandle {
    payload: P;
}

export class InProcessTaskQueue<P> implements TaskQueue<P> {
    private handler: TaskHandler<P> | undefined;
    private readonly backlog: Task<P>[] = [];
    private readonly running = new Set<Promise<void>>();
    private readonly limit: LimitFunction;
    private closed = false;
    private sequence = 0;

    constructor(options: { workerConcurrency: number }) {
        this.limit = pLimit(options.workerConcurrency);
    }

    async enqueue(batchId: string, payload: P): Promise<QueueHandle> {
        if (this.closed) {
            throw new Error('Task queue is closed');
        }

        this.sequence++;
        const task: Task<P> = { taskId: `task_${this.sequence}`, batchId, payload };

        if (this.handler) {
            this.dispatch(task, this.handler);
        } else {
            this.backlog.push(task);
        }

        logger.debug({ taskId: task.taskId, batchId }, 'Task enqueued');
        return { taskId: task.taskId, batchId };
    }

    process(handler: TaskHandler<P>): void {
        if (this.handler) {
            throw new Error('A worker is already registered');
        }
        this.handler = handler;

        for (const task of this.backlog.splice(0)) {
            this.dispatch(task, handler);
        }
    }

    async close(): Promise<void> {
        this.closed = true;
        await Promise.all(this.running);
    }

    /** Tasks not yet picked up by a worker */
    get pendingCount(): number {
        return this.backlog.length + this.limit.pendingCount;
    }

    private dispatch(task: Task<P>, handler: TaskHandler<P>): void {
        const execution = this.limit(() => handler(task.batchId, task.payload)).catch((error: unknown) => {
            logger.error({ taskId: task.taskId, batchId: task.batchId }, `Task failed: ${errorMessage(error)}`);
        });
        this.running.add(execution);
        void execution.finally(() => this.running.delete(execution));
    }
}
