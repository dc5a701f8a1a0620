import type { ReclassifyOptions } from '../types.js';
import { arrow, fail, log, success } from '../utils/console.js';
import { errorMessage } from '../utils/logger.js';
import { confirm } from '../utils/prompt.js';
import { openWorkspace, type CommandDeps } from './context.js';

/**
 * Force a fresh oracle call for one persisted record. The previous
 * classification is kept in the record's and the cache's history.
 */
export async function reclassify(fingerprint: string, options: ReclassifyOptions, deps: CommandDeps = {}): Promise<void> {
    const { runtime } = await openWorkspace(options.workspace, deps);

    const record = await runtime.store.findByFingerprint(fingerprint);
    if (!record) {
        fail(`No record with fingerprint ${fingerprint}.`);
        process.exit(1);
    }
    if (!runtime.oracleConfigured) {
        fail('OPENAI_API_KEY is not set.');
        process.exit(1);
    }

    arrow(`${record.row.date} ${record.row.amount} ${record.row.currency} "${record.raw_description}"`);
    arrow(`Current: ${record.classification.category} (confidence ${record.confidence})`);

    const confirmed = await confirm('Call the oracle again and replace this classification?', { yes: options.yes });
    if (!confirmed) {
        log('Aborted.');
        await runtime.close();
        return;
    }

    try {
        const updated = await runtime.pipeline.reclassify(fingerprint);
        await runtime.save();
        success(
            `${record.classification.category} → ${updated.classification.category} (confidence ${updated.confidence})`
        );
        if (updated.needs_review) {
            arrow(`Needs review: ${updated.review_reasons.join(', ')}`);
        }
    } catch (err) {
        fail(`Reclassification failed. ${errorMessage(err)}`);
        process.exit(1);
    } finally {
        await runtime.close();
    }
}
