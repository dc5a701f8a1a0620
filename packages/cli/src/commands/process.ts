import { existsSync, readFileSync } from 'node:fs';
import { mkdir, writeFile } from 'node:fs/promises';
import { basename, join } from 'node:path';
import { readTabularRows, type BatchResult } from '@txnflow/core';
import { generateRecordsWorkbook } from '../excel/records.js';
import type { JobReport } from '../jobs/types.js';
import type { Runtime } from '../runtime/bootstrap.js';
import type { ProcessOptions, Workspace } from '../types.js';
import { arrow, fail, log, success, warn } from '../utils/console.js';
import { getBatchOutputPath } from '../workspace/paths.js';
import { openWorkspace, type CommandDeps } from './context.js';

export async function processFile(file: string, options: ProcessOptions, deps: CommandDeps = {}): Promise<void> {
    log(`\ntxnflow - Processing ${basename(file)}`);

    const { workspace, runtime } = await openWorkspace(options.workspace, deps);
    const { config, orchestrator } = runtime;

    if (!existsSync(file)) {
        fail(`Input file not found: ${file}`);
        process.exit(1);
    }

    const ingest = readTabularRows(readFileSync(file), {
        columns: config.ingest.columns,
        defaultCurrency: config.ingest.defaultCurrency,
    });
    for (const w of ingest.warnings) {
        warn(w);
    }
    if (ingest.rows.length === 0) {
        fail(`No rows found in ${file}`);
        process.exit(1);
    }
    success(`Read ${ingest.rows.length} rows`);

    if (!runtime.oracleConfigured) {
        warn('OPENAI_API_KEY is not set; rows without a cached classification will fail.');
    }

    const handle = await orchestrator.submit(ingest.rows, {
        batchId: options.batchId,
        mode: options.queued ? 'queued' : 'inline',
    });

    if (handle.mode === 'restored') {
        const report = orchestrator.poll(handle.batchId);
        log(`\nBatch ${handle.batchId} was already processed.`);
        if (report) printReport(report);
        await runtime.close();
        return;
    }

    arrow(`Batch ${handle.batchId} (attempt ${handle.attempt}, ${handle.mode})`);

    let result: BatchResult;
    try {
        result = await orchestrator.wait(handle.batchId);
    } catch (err) {
        const report = orchestrator.poll(handle.batchId);
        fail(`Batch ${handle.batchId} did not finish. ${report?.error ?? String(err)}`);
        await runtime.close();
        process.exit(1);
    }
    await runtime.close();

    printResult(result);

    if (options.dryRun) {
        log('\n[DRY RUN] No state or output files were written.');
    } else {
        const outputDir = await writeOutputs(workspace, runtime, result);
        await runtime.save();
        arrow(`Outputs saved to: ${outputDir}`);
    }

    if (result.status === 'failed' || result.status === 'cancelled') {
        fail(`Batch ${result.batch_id} ${result.status}.`);
        process.exit(1);
    }
}

function printResult(result: BatchResult): void {
    const { summary } = result;

    log('\n--- Batch Summary ---');
    for (const w of result.warnings) {
        warn(w);
    }

    for (const outcome of result.outcomes) {
        if (outcome.kind === 'failed') {
            warn(`Row ${outcome.index + 1}: ${outcome.reason} - ${outcome.error}`);
        }
    }

    const line = `Status: ${result.status}`;
    if (result.status === 'completed') {
        success(line);
    } else {
        warn(line);
    }
    arrow(`Classified: ${summary.classified} (${summary.cache_hit} from cache)`);
    arrow(`Skipped duplicates: ${summary.skipped_duplicate}`);
    arrow(`Failed: ${summary.failed}`);
    arrow(`Needs review: ${summary.needs_review}`);
    arrow(`Oracle calls: ${summary.oracle_calls}`);
}

function printReport(report: JobReport): void {
    arrow(`Status: ${report.status} (attempt ${report.attempt})`);
    arrow(`Processed: ${report.processedCount}/${report.totalCount}`);
    if (report.error) {
        warn(report.error);
    }
}

async function writeOutputs(workspace: Workspace, runtime: Runtime, result: BatchResult): Promise<string> {
    const outputDir = getBatchOutputPath(workspace, result.batch_id);
    await mkdir(outputDir, { recursive: true });

    await writeFile(join(outputDir, 'result.json'), `${JSON.stringify(result, null, 2)}\n`, 'utf-8');

    const all = await runtime.store.list();
    const records = all.filter((r) => r.batch_id === result.batch_id);
    const workbook = await generateRecordsWorkbook(records, await runtime.registry.list(), new Date(result.finished_at));
    await workbook.xlsx.writeFile(join(outputDir, 'review.xlsx'));

    return outputDir;
}
