import { existsSync } from 'node:fs';
import { dirname, join, resolve } from 'node:path';

export const CONFIG_FILENAME = 'tally.yaml';
export const DEFAULT_LEDGER_FILENAME = 'ledger.json';

/** Files whose presence marks a directory as a workspace. */
const MARKERS = [CONFIG_FILENAME, DEFAULT_LEDGER_FILENAME];

function isWorkspace(dir: string): boolean {
    return MARKERS.some(name => existsSync(join(dir, name)));
}

/**
 * Nearest directory at or above startPath holding a tally.yaml or a
 * ledger.json.
 */
export function detectWorkspaceRoot(startPath: string = process.cwd()): string | null {
    for (let current = resolve(startPath); ; current = dirname(current)) {
        if (isWorkspace(current)) {
            return current;
        }
        if (dirname(current) === current) {
            return null;
        }
    }
}
