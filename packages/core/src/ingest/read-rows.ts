/**
 * Tabular ingestion: a CSV or XLSX bank export into TransactionRow records.
 *
 * Rows are not validated here. A row with a missing or malformed field is
 * passed through as-is so the pipeline can fail it individually.
 *
 * ARCHITECTURAL NOTE: No console.* calls. Warnings returned in IngestResult.
 */

import * as XLSX from 'xlsx';
import type { ColumnMapping, TransactionRow } from '../types/index.js';
import { stripBom } from '../utils/csv.js';
import { excelSerialToDate, formatIsoDate, isValidDate } from '../utils/date-parse.js';

export interface IngestOptions {
    columns: ColumnMapping;
    /** Used when the export has no currency column or the cell is blank */
    defaultCurrency?: string;
}

export interface IngestResult {
    rows: TransactionRow[];
    warnings: string[];
}

type Cell = string | number | boolean | Date;

const REQUIRED_FIELDS = ['date', 'amount', 'currency', 'description', 'account'] as const;

/**
 * Read the first sheet of a CSV or XLSX file.
 *
 * @param data - File contents; a Node Buffer is a Uint8Array
 * @returns Rows in file order, plus warnings for missing columns
 */
export function readTabularRows(data: ArrayBuffer | Uint8Array, options: IngestOptions): IngestResult {
    const workbook = XLSX.read(data, { type: 'array', raw: true });
    const sheetName = workbook.SheetNames[0];
    const warnings: string[] = [];

    if (sheetName === undefined) {
        return { rows: [], warnings: ['File contains no sheets'] };
    }

    const records = XLSX.utils
        .sheet_to_json<Record<string, Cell>>(workbook.Sheets[sheetName], { raw: true, defval: '' })
        .map(cleanHeaders);

    if (records.length === 0) {
        return { rows: [], warnings };
    }

    const headers = new Set(Object.keys(records[0]));
    for (const field of REQUIRED_FIELDS) {
        const column = options.columns[field];
        if (headers.has(column)) continue;
        if (field === 'currency' && options.defaultCurrency) continue;
        warnings.push(`Missing column "${column}" (${field}); rows will fail validation`);
    }

    return {
        rows: records.map((record) => recordToRow(record, options)),
        warnings,
    };
}

/**
 * Map one sheet record onto a TransactionRow using the column mapping.
 */
export function recordToRow(record: Readonly<Record<string, Cell>>, options: IngestOptions): TransactionRow {
    const { columns } = options;

    const amountCell = record[columns.amount];
    const currency = cellText(record[columns.currency]) || options.defaultCurrency || '';

    const row: TransactionRow = {
        date: dateText(record[columns.date]),
        amount: typeof amountCell === 'number' ? amountCell : cellText(amountCell),
        currency,
        description: cellText(record[columns.description]),
        account: cellText(record[columns.account]),
    };

    const ref = cellText(record[columns.externalRef]);
    if (ref) {
        row.external_ref = ref;
    }

    return row;
}

function cleanHeaders(record: Record<string, Cell>): Record<string, Cell> {
    const cleaned: Record<string, Cell> = {};
    for (const [key, value] of Object.entries(record)) {
        cleaned[stripBom(key).trim()] = value;
    }
    return cleaned;
}

function cellText(value: Cell | undefined): string {
    if (value === undefined) return '';
    if (value instanceof Date) return isValidDate(value) ? formatIsoDate(value) : '';
    return String(value).trim();
}

/**
 * XLSX dates arrive as serial numbers; CSV dates as text.
 */
function dateText(value: Cell | undefined): string {
    if (typeof value === 'number') {
        return formatIsoDate(excelSerialToDate(value));
    }
    return cellText(value);
}
