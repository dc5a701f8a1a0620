/**
 * Amount parsing and minor-unit rounding.
 *
 * Amounts are parsed into Decimal and rendered back as fixed-precision
 * strings. Native numbers are never used for money arithmetic.
 */

import { Decimal } from 'decimal.js';
import { CURRENCY_MINOR_UNITS, DEFAULT_MINOR_UNITS } from '../types/index.js';

/**
 * Number of decimals a currency is quoted in.
 *
 * @param overrides - Per-currency overrides from configuration
 */
export function minorUnitsFor(currency: string, overrides: Readonly<Record<string, number>> = {}): number {
    const code = currency.toUpperCase();
    return overrides[code] ?? CURRENCY_MINOR_UNITS[code] ?? DEFAULT_MINOR_UNITS;
}

/**
 * Parse an amount as it appears in a bank export.
 *
 * Handles both separator conventions:
 * - "1,200.00" (comma thousands, dot decimal)
 * - "1.200,00" and "1 200,00" (dot/space thousands, comma decimal)
 * - "-45,5" (comma decimal, no thousands)
 *
 * A lone separator followed by exactly three digits ("1.200", "1,200") is
 * read as a decimal point when it is a dot and as thousands when it is a
 * comma, matching how most exports print them.
 *
 * @returns Decimal, or null when the value is not a number
 */
export function parseAmount(value: string | number): Decimal | null {
    if (typeof value === 'number') {
        return Number.isFinite(value) ? new Decimal(value) : null;
    }

    let text = value.replace(/[\s ']/g, '');
    if (text.startsWith('+')) {
        text = text.slice(1);
    }

    const lastComma = text.lastIndexOf(',');
    const lastDot = text.lastIndexOf('.');

    if (lastComma >= 0 && lastDot >= 0) {
        // Whichever separator comes last is the decimal separator
        text = lastComma > lastDot
            ? text.replace(/\./g, '').replace(',', '.')
            : text.replace(/,/g, '');
    } else if (lastComma >= 0) {
        const commaCount = text.split(',').length - 1;
        text = commaCount === 1 && /,\d{1,2}$/.test(text)
            ? text.replace(',', '.')
            : text.replace(/,/g, '');
    } else if (lastDot >= 0 && text.split('.').length - 1 > 1) {
        text = text.replace(/\./g, '');
    }

    if (!/^-?\d+(\.\d+)?$/.test(text)) {
        return null;
    }

    return new Decimal(text);
}

/**
 * Round to the currency's minor units (half-up) and render with exactly that
 * many decimals.
 *
 * @example formatAmount(new Decimal('1200'), 'DKK') === '1200.00'
 * @example formatAmount(new Decimal('1200.5'), 'JPY') === '1201'
 */
export function formatAmount(
    amount: Decimal,
    currency: string,
    overrides: Readonly<Record<string, number>> = {}
): string {
    const places = minorUnitsFor(currency, overrides);
    const rounded = amount.toDecimalPlaces(places, Decimal.ROUND_HALF_UP);
    // "-0.00" and "0.00" must fingerprint the same
    return (rounded.isZero() ? rounded.abs() : rounded).toFixed(places);
}
