import type { LedgerStore } from '../store/ledger-store.js';
import { timeframeOf, type TimeFrame } from './timeframe.js';

export type Category = 'income' | 'expense';

/**
 * What the entries and graph screens show. Target names are lower-case; an empty list
 * means every target.
 */
export interface EntryFilter {
    timeframe: TimeFrame;
    category?: Category;
    targets: string[];
}

export interface TargetFilter {
    timeframe: TimeFrame;
}

/**
 * Application state handed to every budget command through the session.
 */
export interface BudgetState {
    readonly store: LedgerStore;
    /** Directory relative file names (import, export) resolve against. */
    readonly root: string;
    readonly today: () => Date;
    entryFilter: EntryFilter;
    targetFilter: TargetFilter;
}

export interface BudgetStateOptions {
    root: string;
    today?: () => Date;
}

export function createBudgetState(store: LedgerStore, options: BudgetStateOptions): BudgetState {
    const today = options.today ?? (() => new Date());
    const timeframe = timeframeOf(today());
    return {
        store,
        root: options.root,
        today,
        entryFilter: { timeframe, targets: [] },
        targetFilter: { timeframe },
    };
}
