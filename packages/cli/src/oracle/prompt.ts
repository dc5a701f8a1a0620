import { CATEGORIES } from '@txnflow/shared';
import type { OracleRequest } from './types.js';

const CATEGORY_GUIDE: Record<(typeof CATEGORIES)[number], string> = {
    vendor_payment:
        'Any business payment to an outside party: software and subscriptions, rent, utilities, contractors, goods. Normally outgoing.',
    salary_payment: 'Wages, salaries, bonuses and other payroll to employees. Outgoing.',
    customer_payment_received: 'Money received from customers for products or services. Incoming.',
    tax_payment: 'VAT, income tax, corporate tax, and tax refunds.',
    bank_fee: 'Charges levied by the bank itself: transfer fees, account fees, FX fees. Not payments to vendors.',
    internal_transfer: 'Money moved between accounts owned by the same business.',
    not_categorized: 'Only when the purpose genuinely cannot be determined.',
};

/**
 * System prompt for single-transaction categorization.
 */
export function buildSystemPrompt(): string {
    const lines = CATEGORIES.map((category) => `- ${category}: ${CATEGORY_GUIDE[category]}`);

    return [
        'You classify bank statement transactions for a small business.',
        'Pick exactly one category from this list:',
        ...lines,
        '',
        'Rules:',
        '- Bank fees are never vendor_payment.',
        '- Use the sign of the amount: negative is money out, positive is money in.',
        '- Prefer not_categorized over guessing.',
        '',
        'Answer with a JSON object: {"category": string, "confidence": number between 0 and 1, "rationale": string}.',
    ].join('\n');
}

export function buildUserPrompt(request: OracleRequest): string {
    return [
        `Description: ${request.descriptionText}`,
        `Amount: ${request.amount} ${request.currency}`,
    ].join('\n');
}
