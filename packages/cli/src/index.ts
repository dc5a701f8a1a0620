#!/usr/bin/env node
/**
 * txnflow CLI
 *
 * The CLI owns file I/O and the runtime services; @txnflow/core stays
 * headless and returns warnings as data.
 */

import { Command } from 'commander';
import { processFile } from './commands/process.js';
import { reclassify } from './commands/reclassify.js';
import { report } from './commands/report.js';
import { listVendors } from './commands/vendors.js';
import { fail } from './utils/console.js';
import { errorMessage } from './utils/logger.js';

const program = new Command();

program.name('txnflow').description('Classify bank transactions with dedup, vendor resolution and job tracking').version('1.0.0');

program
    .command('process')
    .description('Ingest a CSV/XLSX export and classify its rows as one batch')
    .argument('<file>', 'bank export to process')
    .option('--batch-id <id>', 'explicit batch id (default: derived from the rows)')
    .option('--queued', 'run through the task queue instead of inline', false)
    .option('--dry-run', 'process without writing state or outputs', false)
    .option('-w, --workspace <path>', 'workspace root (default: detected from cwd)')
    .action(async (file: string, options: { batchId?: string; queued: boolean; dryRun: boolean; workspace?: string }) => {
        await processFile(file, options);
    });

program
    .command('report')
    .description('List persisted records, optionally as a workbook')
    .option('-c, --category <category>', 'only records in this category')
    .option('-v, --vendor <vendor>', 'only records for this vendor (id or name)')
    .option('-o, --output <file>', 'write an .xlsx workbook')
    .option('-w, --workspace <path>', 'workspace root (default: detected from cwd)')
    .action(async (options: { category?: string; vendor?: string; output?: string; workspace?: string }) => {
        await report(options);
    });

program
    .command('reclassify')
    .description('Re-run the oracle for one record, keeping the old classification in history')
    .argument('<fingerprint>', 'record fingerprint')
    .option('-y, --yes', 'skip the confirmation prompt', false)
    .option('-w, --workspace <path>', 'workspace root (default: detected from cwd)')
    .action(async (fingerprint: string, options: { yes: boolean; workspace?: string }) => {
        await reclassify(fingerprint, options);
    });

program
    .command('vendors')
    .description('List known vendors')
    .option('-w, --workspace <path>', 'workspace root (default: detected from cwd)')
    .action(async (options: { workspace?: string }) => {
        await listVendors(options);
    });

program.parseAsync(process.argv).catch((err: unknown) => {
    fail(`Unexpected error: ${errorMessage(err)}`);
    process.exit(1);
});
