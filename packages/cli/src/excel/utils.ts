import exceljs from 'exceljs';
import type { Worksheet, Workbook } from 'exceljs';

export function createWorkbook(created: Date = new Date()): Workbook {
    const workbook = new exceljs.Workbook();
    workbook.creator = 'txnflow';
    workbook.created = created;
    return workbook;
}

/**
 * Bold white-on-blue header row, frozen.
 */
export function formatHeaderRow(worksheet: Worksheet, frozenColumns = 0): void {
    const headerRow = worksheet.getRow(1);

    headerRow.font = { bold: true, color: { argb: 'FFFFFFFF' }, size: 11 };
    headerRow.fill = { type: 'pattern', pattern: 'solid', fgColor: { argb: 'FF4472C4' } };
    headerRow.alignment = { vertical: 'middle', horizontal: 'center' };

    worksheet.views = [{ state: 'frozen', xSplit: frozenColumns, ySplit: 1 }];
}

/**
 * Column width from the longest cell, between 10 and 80 characters.
 */
export function autoFitColumns(worksheet: Worksheet): void {
    worksheet.columns.forEach((column) => {
        let maxLen = 10;
        column.eachCell?.({ includeEmpty: false }, (cell) => {
            const len = cell.text.length;
            if (len > maxLen) maxLen = len;
        });
        column.width = Math.min(maxLen + 2, 80);
    });
}

export function formatAmountColumn(worksheet: Worksheet, key: string): void {
    const column = worksheet.getColumn(key);
    column.numFmt = '#,##0.00;[Red]-#,##0.00';
    column.alignment = { horizontal: 'right' };
}

export function formatPercentColumn(worksheet: Worksheet, key: string): void {
    worksheet.getColumn(key).numFmt = '0.0%';
}
