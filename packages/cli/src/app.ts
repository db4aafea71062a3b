/**
 * Wires the budget screens and commands onto the command framework.
 */

import type { TallyConfig } from '@tally/shared';
import {
    CommandController,
    RenderLoop,
    ScreenController,
    installBuiltins,
    type Palette,
    type Prompter,
    type Terminal,
} from '@tally/core';
import { addBudgetScreens } from './budget/screens.js';
import { createBudgetState, type BudgetState } from './budget/state.js';
import { budgetCommands } from './commands/index.js';
import type { LedgerStore } from './store/ledger-store.js';
import { LedgerShortcuts } from './store/shortcuts.js';

export interface AppOptions {
    store: LedgerStore;
    config: TallyConfig;
    /** Workspace root; import and export paths resolve against it. */
    root: string;
    prompter: Prompter;
    terminal: Terminal;
    palette?: Palette;
    today?: () => Date;
}

export interface App {
    state: BudgetState;
    screens: ScreenController;
    commands: CommandController<BudgetState>;
    loop: RenderLoop<BudgetState>;
}

export function createApp(options: AppOptions): App {
    const { config, terminal } = options;
    const state = createBudgetState(options.store, { root: options.root, today: options.today });

    const screens = new ScreenController({ size: () => terminal.size(), palette: options.palette });
    addBudgetScreens(screens, state, config.screens);

    const commands = new CommandController<BudgetState>({
        screens,
        shortcuts: new LedgerShortcuts(options.store),
    });
    installBuiltins(commands, screens);
    commands.register(...budgetCommands());

    const loop = new RenderLoop<BudgetState>({
        state,
        screens,
        commands,
        prompter: options.prompter,
        terminal,
        pollIntervalMs: config.poll_interval_ms,
        initCommand: config.init_command || undefined,
    });

    return { state, screens, commands, loop };
}

export { createBudgetState } from './budget/state.js';
export type { BudgetState } from './budget/state.js';
export { LedgerStore } from './store/ledger-store.js';
