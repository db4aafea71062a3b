import { join, resolve } from 'node:path';
import type { TallyConfig } from '@tally/shared';
import type { Workspace } from '../types.js';
import { CONFIG_FILENAME } from './detect.js';

/**
 * Constructs a Workspace object from a root path. The ledger path in the
 * config is relative to the root unless absolute.
 */
export function resolveWorkspace(root: string, config: Pick<TallyConfig, 'ledger'>): Workspace {
    return {
        root,
        configPath: getConfigPath(root),
        ledgerPath: resolve(root, config.ledger),
    };
}

export function getConfigPath(root: string): string {
    return join(root, CONFIG_FILENAME);
}

/**
 * Resolve a file named in a command against the workspace root.
 */
export function resolveInWorkspace(root: string, file: string): string {
    return resolve(root, file);
}
