import type { Vendor } from '@txnflow/shared';
import type { VendorsOptions } from '../types.js';
import { log, success } from '../utils/console.js';
import { openWorkspace, type CommandDeps } from './context.js';

export async function listVendors(options: VendorsOptions, deps: CommandDeps = {}): Promise<void> {
    const { runtime } = await openWorkspace(options.workspace, deps);
    const vendors = sortVendors(await runtime.registry.list());

    log('');
    for (const vendor of vendors) {
        const aliases = vendor.aliases.length > 0 ? `  [${vendor.aliases.join(', ')}]` : '';
        log(`${vendor.vendor_id}  ${vendor.canonical_name.padEnd(30)} ${String(vendor.transaction_count).padStart(5)}${aliases}`);
    }
    log('');
    success(`${vendors.length} vendors`);

    await runtime.close();
}

/**
 * Most used first, then by name.
 */
export function sortVendors(vendors: readonly Vendor[]): Vendor[] {
    return [...vendors].sort(
        (a, b) => b.transaction_count - a.transaction_count || a.canonical_name.localeCompare(b.canonical_name)
    );
}
