import { existsSync } from 'node:fs';
import { dirname, join, resolve } from 'node:path';

/**
 * Searches for the workspace root by looking for 'config/engine.yaml'.
 * Starts at startPath and bubbles up to the root.
 */
export function detectWorkspaceRoot(startPath: string = process.cwd()): string | null {
    let current = resolve(startPath);
    while (true) {
        if (existsSync(join(current, 'config', 'engine.yaml'))) {
            return current;
        }
        const parent = dirname(current);
        if (parent === current) {
            return null;
        }
        current = parent;
    }
}
