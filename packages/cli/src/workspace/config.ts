import { existsSync, readFileSync } from 'node:fs';
import { parse } from 'yaml';
import { EngineConfigSchema, VendorCatalogSchema, type EngineConfig, type VendorSeed } from '@txnflow/shared';
import type { Workspace } from '../types.js';

/**
 * Loads config/engine.yaml. An empty file yields all defaults.
 *
 * @throws Error if the file is missing; ZodError if a value is invalid
 */
export function loadEngineConfig(workspace: Workspace): EngineConfig {
    const path = workspace.config.enginePath;
    if (!existsSync(path)) {
        throw new Error(`Engine config not found: ${path}`);
    }
    const data: unknown = parse(readFileSync(path, 'utf-8'));
    return EngineConfigSchema.parse(data ?? {});
}

/**
 * Loads the optional vendor catalogue (config/vendors.yaml).
 */
export function loadVendorCatalog(workspace: Workspace): VendorSeed[] {
    const path = workspace.config.vendorsPath;
    if (!existsSync(path)) {
        return [];
    }
    const data: unknown = parse(readFileSync(path, 'utf-8'));
    if (!data) return [];

    // Either a bare list or { vendors: [...] }
    const wrapped = Array.isArray(data) ? { vendors: data } : data;
    return VendorCatalogSchema.parse(wrapped).vendors;
}
