import { createRuntime, type Runtime } from '../runtime/bootstrap.js';
import type { OracleTransport } from '../oracle/types.js';
import type { Workspace } from '../types.js';
import { validateEnv } from '../utils/env.js';
import { errorMessage } from '../utils/logger.js';
import { arrow, fail, success } from '../utils/console.js';
import { detectWorkspaceRoot } from '../workspace/detect.js';
import { resolveWorkspace } from '../workspace/paths.js';

/**
 * Injection points for tests and embedding.
 */
export interface CommandDeps {
    transport?: OracleTransport;
    now?: () => Date;
}

export interface CommandContext {
    workspace: Workspace;
    runtime: Runtime;
}

/**
 * Detect the workspace and build the runtime. Exits on failure.
 */
export async function openWorkspace(explicitRoot: string | undefined, deps: CommandDeps): Promise<CommandContext> {
    arrow('Detecting workspace...');
    const root = explicitRoot ?? detectWorkspaceRoot();
    if (!root) {
        fail('Workspace not found. Expected "config/engine.yaml" in the workspace root.');
        process.exit(1);
    }
    const workspace = resolveWorkspace(root);
    success(`Workspace: ${workspace.root}`);

    try {
        const env = validateEnv();
        const runtime = await createRuntime(workspace, { env, transport: deps.transport, now: deps.now });
        return { workspace, runtime };
    } catch (err) {
        fail(`Failed to load workspace. ${errorMessage(err)}`);
        process.exit(1);
    }
}
