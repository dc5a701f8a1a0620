/**
 * txnflow CLI - command options and workspace layout
 */

export interface ProcessOptions {
    batchId?: string;
    queued: boolean;
    dryRun: boolean;
    workspace?: string;
}

export interface ReportOptions {
    category?: string;
    vendor?: string;
    output?: string;
    workspace?: string;
}

export interface ReclassifyOptions {
    yes: boolean;
    workspace?: string;
}

export interface VendorsOptions {
    workspace?: string;
}

export interface WorkspaceConfig {
    enginePath: string;
    vendorsPath: string;
}

export interface Workspace {
    root: string;
    outputs: string;
    state: string;
    statePath: string;
    config: WorkspaceConfig;
}
