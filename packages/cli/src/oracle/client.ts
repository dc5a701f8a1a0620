/**
 * Oracle client adapter.
 *
 * Wraps an OracleTransport with per-call timeouts, exponential backoff on
 * transient failures (p-retry), and zod validation of the response.
 *
 * Callers only ever see:
 * - a ClassificationResult (vendor_reference null)
 * - OracleError { kind: 'fatal' | 'exhausted' }
 * - their own signal's abort reason
 */

import pRetry, { AbortError } from 'p-retry';
import type { ClassificationResult } from '@txnflow/shared';
import { OracleError, OracleResponseSchema, OracleTransientError } from '@txnflow/shared';
import { errorMessage, getLogger } from '../utils/logger.js';
import type { OracleRequest, OracleRetryOptions, OracleTransport } from './types.js';

const logger = getLogger('Oracle');

export interface ClassifyOptions {
    signal?: AbortSignal;
}

export class OracleClient {
    constructor(
        private readonly transport: OracleTransport,
        private readonly options: OracleRetryOptions
    ) {
        if (options.maxAttempts < 1) {
            throw new Error(`maxAttempts must be at least 1, got ${options.maxAttempts}`);
        }
    }

    async classify(request: OracleRequest, options: ClassifyOptions = {}): Promise<ClassificationResult> {
        const { signal } = options;
        const { backoff } = this.options;
        let attempts = 0;

        if (signal?.aborted) {
            throw toError(signal.reason);
        }

        try {
            return await pRetry(
                async (attemptNumber) => {
                    attempts = attemptNumber;
                    return this.attempt(request, attemptNumber, signal);
                },
                {
                    retries: this.options.maxAttempts - 1,
                    factor: backoff.factor,
                    minTimeout: backoff.minTimeoutMs,
                    maxTimeout: backoff.maxTimeoutMs,
                    randomize: this.options.randomize ?? false,
                    signal,
                    onFailedAttempt: (error) => {
                        logger.warn(
                            {
                                attempt: error.attemptNumber,
                                retriesLeft: error.retriesLeft,
                                reason: error instanceof OracleTransientError ? error.reason : undefined,
                            },
                            `Oracle attempt failed: ${error.message}`
                        );
                    },
                }
            );
        } catch (error) {
            if (signal?.aborted) {
                throw toError(signal.reason);
            }
            if (error instanceof OracleError) {
                logger.error({ kind: error.kind, attempts: error.attempts }, error.message);
                throw error;
            }
            if (error instanceof OracleTransientError) {
                throw new OracleError(
                    'exhausted',
                    `Oracle unavailable after ${attempts} attempts: ${error.message}`,
                    attempts,
                    { cause: error, lastReason: error.reason }
                );
            }
            throw new OracleError('fatal', errorMessage(error), attempts, { cause: error });
        }
    }

    /**
     * One transport call. Transient errors are rethrown for p-retry; anything
     * else is wrapped in AbortError so p-retry stops immediately.
     */
    private async attempt(
        request: OracleRequest,
        attemptNumber: number,
        signal: AbortSignal | undefined
    ): Promise<ClassificationResult> {
        let raw: unknown;
        try {
            raw = await this.sendWithTimeout(request, signal);
        } catch (error) {
            if (signal?.aborted) {
                throw new AbortError(toError(signal.reason));
            }
            if (error instanceof OracleTransientError) {
                throw error;
            }
            throw new AbortError(
                new OracleError('fatal', `Oracle request failed: ${errorMessage(error)}`, attemptNumber, {
                    cause: error,
                })
            );
        }

        const parsed = OracleResponseSchema.safeParse(raw);
        if (!parsed.success) {
            const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
            throw new AbortError(
                new OracleError('fatal', `Invalid oracle response: ${issues.join('; ')}`, attemptNumber)
            );
        }

        return {
            category: parsed.data.category,
            confidence: parsed.data.confidence,
            vendor_reference: null,
            rationale: parsed.data.rationale,
        };
    }

    /**
     * Call the transport under a per-call timeout that also follows the
     * caller's signal. The race does not depend on the transport honouring
     * the signal.
     */
    private async sendWithTimeout(request: OracleRequest, callerSignal: AbortSignal | undefined): Promise<unknown> {
        const controller = new AbortController();
        const { timeoutMs } = this.options;

        const timer = setTimeout(() => {
            controller.abort(new OracleTransientError('timeout', `Oracle did not answer within ${timeoutMs}ms`));
        }, timeoutMs);
        const forwardAbort = (): void => controller.abort(callerSignal?.reason);
        callerSignal?.addEventListener('abort', forwardAbort, { once: true });

        try {
            return await raceAbort(this.transport.send(request, controller.signal), controller.signal);
        } finally {
            clearTimeout(timer);
            callerSignal?.removeEventListener('abort', forwardAbort);
        }
    }
}

function raceAbort<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
    return new Promise<T>((resolve, reject) => {
        const onAbort = (): void => reject(signal.reason);
        if (signal.aborted) {
            onAbort();
            return;
        }
        signal.addEventListener('abort', onAbort, { once: true });
        void promise.then(resolve, reject).finally(() => signal.removeEventListener('abort', onAbort));
    });
}

function toError(reason: unknown): Error {
    return reason instanceof Error ? reason : new Error(String(reason));
}
