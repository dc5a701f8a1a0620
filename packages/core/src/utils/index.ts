export { normalizeDescription, normalizeVendorName } from './normalize.js';
export { parseDateValue, parseIsoDate, parseMdyDate, excelSerialToDate, formatIsoDate, isValidDate } from './date-parse.js';
export { parseAmount, formatAmount, minorUnitsFor } from './money.js';
export { stripBom } from './csv.js';
