import { describe, it, expect } from 'vitest';
import {
    APIConnectionError,
    APIConnectionTimeoutError,
    APIUserAbortError,
    BadRequestError,
    InternalServerError,
    RateLimitError,
} from 'openai';
import { OracleTransientError } from '@txnflow/shared';
import { toTransportError } from '../../src/oracle/openai-transport.js';
import { buildSystemPrompt, buildUserPrompt } from '../../src/oracle/prompt.js';

function reasonOf(error: unknown): string | undefined {
    return error instanceof OracleTransientError ? error.reason : undefined;
}

describe('toTransportError', () => {
    it('maps rate limits, server errors and connection problems to transient reasons', () => {
        expect(reasonOf(toTransportError(new RateLimitError(429, undefined, 'slow down', undefined)))).toBe(
            'rate_limit'
        );
        expect(reasonOf(toTransportError(new InternalServerError(503, undefined, 'unavailable', undefined)))).toBe(
            'server'
        );
        expect(reasonOf(toTransportError(new APIConnectionTimeoutError()))).toBe('timeout');
        expect(reasonOf(toTransportError(new APIConnectionError({ message: 'socket hang up' })))).toBe('network');
    });

    it('passes client errors and aborts through unchanged', () => {
        const badRequest = new BadRequestError(400, undefined, 'bad request', undefined);
        const aborted = new APIUserAbortError();

        expect(toTransportError(badRequest)).toBe(badRequest);
        expect(toTransportError(aborted)).toBe(aborted);
    });

    it('keeps the SDK error as the cause', () => {
        const original = new RateLimitError(429, undefined, 'slow down', undefined);
        const mapped = toTransportError(original);

        expect(mapped instanceof Error && mapped.cause).toBe(original);
    });
});

describe('prompts', () => {
    it('lists every category in the system prompt', () => {
        const prompt = buildSystemPrompt();

        for (const category of ['vendor_payment', 'salary_payment', 'not_categorized']) {
            expect(prompt).toContain(category);
        }
    });

    it('puts the description, amount and currency in the user prompt', () => {
        const prompt = buildUserPrompt({ descriptionText: 'SALARY JAN', amount: '50000.00', currency: 'DKK' });

        expect(prompt).toContain('SALARY JAN');
        expect(prompt).toContain('50000.00 DKK');
    });
});
