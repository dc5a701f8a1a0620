import { CategorySchema, type StoredRecord, type Vendor } from '@txnflow/shared';
import { generateRecordsWorkbook } from '../excel/records.js';
import type { ReportOptions } from '../types.js';
import { arrow, fail, log, success } from '../utils/console.js';
import { openWorkspace, type CommandDeps } from './context.js';

export async function report(options: ReportOptions, deps: CommandDeps = {}): Promise<void> {
    const { runtime } = await openWorkspace(options.workspace, deps);
    const { store, registry } = runtime;
    const vendors = await registry.list();

    let records: StoredRecord[];
    if (options.category !== undefined) {
        const category = CategorySchema.safeParse(options.category);
        if (!category.success) {
            fail(`Unknown category "${options.category}". Expected one of: ${CategorySchema.options.join(', ')}`);
            process.exit(1);
        }
        records = await store.listByCategory(category.data);
    } else {
        records = await store.list();
    }

    if (options.vendor !== undefined) {
        const vendor = findVendor(vendors, options.vendor);
        if (!vendor) {
            fail(`Unknown vendor "${options.vendor}".`);
            process.exit(1);
        }
        const ids = new Set((await store.listByVendor(vendor.vendor_id)).map((r) => r.fingerprint));
        records = records.filter((r) => ids.has(r.fingerprint));
    }

    records.sort((a, b) => a.row.date.localeCompare(b.row.date) || a.fingerprint.localeCompare(b.fingerprint));

    log('');
    for (const record of records) {
        log(formatRecordLine(record));
    }
    log('');

    const review = records.filter((r) => r.needs_review).length;
    success(`${records.length} records (${review} need review)`);

    if (options.output) {
        const workbook = await generateRecordsWorkbook(records, vendors);
        await workbook.xlsx.writeFile(options.output);
        arrow(`Workbook saved to: ${options.output}`);
    }

    await runtime.close();
}

/**
 * Vendor by id, or by canonical name ignoring case.
 */
export function findVendor(vendors: readonly Vendor[], query: string): Vendor | undefined {
    const lowered = query.trim().toLowerCase();
    return (
        vendors.find((v) => v.vendor_id === query) ?? vendors.find((v) => v.canonical_name.toLowerCase() === lowered)
    );
}

export function formatRecordLine(record: StoredRecord): string {
    const amount = `${record.row.amount} ${record.row.currency}`.padStart(16);
    const category = record.classification.category.padEnd(26);
    const flag = record.needs_review ? '?' : ' ';
    return `${record.row.date} | ${amount} | ${category} | ${flag} ${record.raw_description.slice(0, 40)}`;
}
