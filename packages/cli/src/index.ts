#!/usr/bin/env node
/**
 * Tally CLI entry point.
 *
 * Everything printed before the loop starts or after it ends goes through
 * the console helpers; inside the loop the active screen owns the terminal.
 */

import { resolve } from 'node:path';
import { ReadlinePrompter, createPalette, createStreamTerminal } from '@tally/core';
import { createApp } from './app.js';
import { USAGE, parseCliArgs } from './args.js';
import { LedgerStore } from './store/ledger-store.js';
import { fail, info, log } from './utils/console.js';
import { loadConfig } from './workspace/config.js';
import { detectWorkspaceRoot } from './workspace/detect.js';
import { getConfigPath, resolveWorkspace } from './workspace/paths.js';

const VERSION = '1.0.0';

async function main(): Promise<void> {
    const options = parseCliArgs(process.argv.slice(2));

    if (options.help) {
        USAGE.forEach(line => log(line));
        return;
    }
    if (options.version) {
        log(`tally ${VERSION}`);
        return;
    }

    const root = options.workspace
        ? resolve(options.workspace)
        : detectWorkspaceRoot() ?? process.cwd();
    const config = loadConfig(getConfigPath(root));
    const workspace = resolveWorkspace(root, config);
    const store = LedgerStore.open(workspace.ledgerPath);

    const app = createApp({
        store,
        config,
        root: workspace.root,
        prompter: new ReadlinePrompter(),
        terminal: createStreamTerminal(),
        palette: createPalette(config.color && process.stdout.isTTY === true),
    });

    await app.loop.run();
    info(`Ledger saved to ${workspace.ledgerPath}`);
}

main().catch((err: unknown) => {
    fail(err instanceof Error ? err.message : String(err));
    process.exit(1);
});
