/**
 * Date parsing utilities for transaction rows.
 * All dates returned as UTC (00:00:00Z).
 */

/**
 * Parse a date string in any of the accepted input formats.
 *
 * Accepted:
 * - YYYY-MM-DD, optionally followed by a time part ("2024-01-05T10:00:00Z")
 * - DD.MM.YYYY and DD-MM-YYYY (Nordic bank exports)
 * - MM/DD/YYYY
 *
 * Returns null for unrecognised formats and impossible calendar dates.
 */
export function parseDateValue(value: string): Date | null {
    const trimmed = value.trim();

    const iso = trimmed.match(/^(\d{4})-(\d{2})-(\d{2})(?:[T ].*)?$/);
    if (iso) {
        return buildUtcDate(parseInt(iso[1], 10), parseInt(iso[2], 10), parseInt(iso[3], 10));
    }

    const dmy = trimmed.match(/^(\d{1,2})[.-](\d{1,2})[.-](\d{4})$/);
    if (dmy) {
        return buildUtcDate(parseInt(dmy[3], 10), parseInt(dmy[2], 10), parseInt(dmy[1], 10));
    }

    return parseMdyDate(trimmed);
}

/**
 * Parse MM/DD/YYYY date string to Date (UTC).
 */
export function parseMdyDate(value: string): Date | null {
    const match = value.match(/^(\d{1,2})\/(\d{1,2})\/(\d{4})$/);
    if (!match) return null;

    return buildUtcDate(parseInt(match[3], 10), parseInt(match[1], 10), parseInt(match[2], 10));
}

/**
 * Parse YYYY-MM-DD date string to Date (UTC).
 */
export function parseIsoDate(value: string): Date | null {
    const match = value.match(/^(\d{4})-(\d{2})-(\d{2})$/);
    if (!match) return null;

    return buildUtcDate(parseInt(match[1], 10), parseInt(match[2], 10), parseInt(match[3], 10));
}

/**
 * Convert Excel serial date to JavaScript Date (UTC).
 */
export function excelSerialToDate(serial: number): Date {
    // Excel serial: days since 1899-12-30.
    // Round to the nearest day: bank exports carry no meaningful time of day.
    const days = Math.round(serial);
    const utcDays = days - 25569; // Adjust to Unix epoch
    const utcMs = utcDays * 86400 * 1000;
    return new Date(utcMs);
}

/**
 * Format Date as ISO YYYY-MM-DD string (UTC).
 */
export function formatIsoDate(date: Date): string {
    const year = date.getUTCFullYear();
    const month = String(date.getUTCMonth() + 1).padStart(2, '0');
    const day = String(date.getUTCDate()).padStart(2, '0');
    return `${year}-${month}-${day}`;
}

/**
 * Check if date is valid.
 */
export function isValidDate(date: Date): boolean {
    return !isNaN(date.getTime());
}

function buildUtcDate(year: number, month: number, day: number): Date | null {
    const date = new Date(Date.UTC(year, month - 1, day));
    if (!isValidDate(date)) return null;

    // Reject rollovers such as 2024-02-30 -> 2024-03-01
    if (date.getUTCFullYear() !== year ||
        date.getUTCMonth() !== month - 1 ||
        date.getUTCDate() !== day) {
        return null;
    }

    return date;
}
