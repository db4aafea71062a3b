import type { SavedShortcut, ShortcutStore } from '@tally/core';
import type { LedgerStore } from './ledger-store.js';

/**
 * Shortcuts kept in the ledger's shortcuts table.
 */
export class LedgerShortcuts implements ShortcutStore {
    private readonly store: LedgerStore;

    constructor(store: LedgerStore) {
        this.store = store;
    }

    list(): SavedShortcut[] {
        return this.store.shortcuts
            .select()
            .map(({ name, command }) => ({ name, command }))
            .sort((a, b) => a.name.localeCompare(b.name));
    }

    get(name: string): string | undefined {
        return this.store.shortcuts.select(s => s.name === name)[0]?.command;
    }

    add(name: string, command: string, key?: number): number {
        return this.store.shortcuts.insert({ name, command }, key).id;
    }

    remove(name: string): number | undefined {
        return this.store.shortcuts.deleteWhere(s => s.name === name)[0]?.id;
    }
}
