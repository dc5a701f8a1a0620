import type { Workbook, Worksheet } from 'exceljs';
import type { StoredRecord, Vendor } from '@txnflow/shared';
import { autoFitColumns, createWorkbook, formatAmountColumn, formatHeaderRow, formatPercentColumn } from './utils.js';

const COLUMNS = [
    { header: 'fingerprint', key: 'fingerprint' },
    { header: 'date', key: 'date' },
    { header: 'account', key: 'account' },
    { header: 'raw_description', key: 'raw_description' },
    { header: 'amount', key: 'amount' },
    { header: 'currency', key: 'currency' },
    { header: 'category', key: 'category' },
    { header: 'vendor', key: 'vendor' },
    { header: 'confidence', key: 'confidence' },
    { header: 'review_reasons', key: 'review_reasons' },
    { header: 'rationale', key: 'rationale' },
    { header: 'batch_id', key: 'batch_id' },
];

/**
 * Workbook with every given record on "Records" and those needing review
 * on "Review", least confident first.
 */
export async function generateRecordsWorkbook(
    records: readonly StoredRecord[],
    vendors: readonly Vendor[],
    created?: Date
): Promise<Workbook> {
    const workbook = createWorkbook(created);
    const vendorNames = new Map(vendors.map((v) => [v.vendor_id, v.canonical_name]));

    const all = workbook.addWorksheet('Records');
    fillSheet(all, records, vendorNames);

    const review = workbook.addWorksheet('Review');
    fillSheet(
        review,
        records.filter((r) => r.needs_review).sort((a, b) => a.confidence - b.confidence),
        vendorNames
    );

    return workbook;
}

function fillSheet(sheet: Worksheet, records: readonly StoredRecord[], vendorNames: Map<string, string>): void {
    sheet.columns = COLUMNS;

    for (const record of records) {
        sheet.addRow({
            fingerprint: record.fingerprint,
            date: record.row.date,
            account: record.row.account,
            raw_description: record.raw_description,
            // Display only; the stored amount stays a decimal string
            amount: Number(record.row.amount),
            currency: record.row.currency,
            category: record.classification.category,
            vendor: record.vendor_id ? (vendorNames.get(record.vendor_id) ?? record.vendor_id) : '',
            confidence: record.confidence,
            review_reasons: record.review_reasons.join('; '),
            rationale: record.classification.rationale,
            batch_id: record.batch_id,
        });
    }

    formatHeaderRow(sheet, 2);
    formatAmountColumn(sheet, 'amount');
    formatPercentColumn(sheet, 'confidence');
    autoFitColumns(sheet);
}
