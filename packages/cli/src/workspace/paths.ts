import { join } from 'node:path';
import type { Workspace } from '../types.js';

/**
 * Constructs a Workspace object from a root path.
 */
export function resolveWorkspace(root: string): Workspace {
    const state = join(root, 'state');
    return {
        root,
        outputs: join(root, 'outputs'),
        state,
        statePath: join(state, 'state.json'),
        config: {
            enginePath: join(root, 'config', 'engine.yaml'),
            vendorsPath: join(root, 'config', 'vendors.yaml'),
        },
    };
}

/**
 * outputs/<batchId>/ holds the result JSON and review workbook of one batch.
 */
export function getBatchOutputPath(workspace: Workspace, batchId: string): string {
    return join(workspace.outputs, batchId);
}
