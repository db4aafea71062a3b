import { COLUMNS, type Entry, type TargetInstance } from '@tally/shared';
import type { LedgerStore } from '../store/ledger-store.js';
import { shortDate } from './dates.js';
import { formatCents } from './money.js';
import type { Category, EntryFilter } from './state.js';
import { containsDate, timeframeOfIso } from './timeframe.js';

export type EntryValues = Omit<Entry, 'id'>;

export function categoryOf(entry: Pick<Entry, 'amount'>): Category {
    return entry.amount > 0 ? 'income' : 'expense';
}

/**
 * Entries matching the filter, newest first.
 */
export function selectEntries(store: LedgerStore, filter: EntryFilter): Entry[] {
    const targetIds = new Set(
        store.targets.select(t => filter.targets.includes(t.name)).map(t => t.id)
    );

    return store.entries
        .select(entry =>
            containsDate(filter.timeframe, entry.date) &&
            (filter.category === undefined || categoryOf(entry) === filter.category) &&
            (filter.targets.length === 0 || targetIds.has(entry.target))
        )
        .sort((a, b) => b.date.localeCompare(a.date) || b.id - a.id);
}

/**
 * Make sure the target has a goal for the month of the date. Returns the
 * instance it had to create, if any.
 */
export function ensureInstance(store: LedgerStore, targetId: number, isoDate: string): TargetInstance | undefined {
    const { year, month } = timeframeOfIso(isoDate);
    const existing = store.targetInstances.select(i => i.target === targetId && i.year === year && i.month === month);
    if (existing.length > 0) return undefined;

    const target = store.targets.get(targetId);
    if (!target) {
        throw new Error(`Target ${targetId} does not exist.`);
    }
    return store.targetInstances.insert({ target: targetId, amount: target.default_amount, year, month });
}

export interface InsertedEntry {
    entry: Entry;
    instance?: TargetInstance;
}

/**
 * Insert an entry. An explicit id puts back an entry that was deleted.
 */
export function insertEntry(store: LedgerStore, values: EntryValues, id?: number): InsertedEntry {
    const instance = ensureInstance(store, values.target, values.date);
    const entry = store.entries.insert(values, id);
    return { entry, instance };
}

/**
 * Undo an insertion, including the month goal it created.
 */
export function removeInserted(store: LedgerStore, inserted: InsertedEntry): void {
    store.entries.delete(inserted.entry.id);
    if (inserted.instance) {
        store.targetInstances.delete(inserted.instance.id);
    }
}

/**
 * Re-insert with the same ids.
 */
export function reinsert(store: LedgerStore, inserted: InsertedEntry): void {
    const { id, ...values } = inserted.entry;
    if (inserted.instance) {
        const { id: instanceId, ...instance } = inserted.instance;
        store.targetInstances.insert(instance, instanceId);
    }
    store.entries.insert(values, id);
}

export function targetNameOf(store: LedgerStore, entry: Pick<Entry, 'target'>): string {
    return store.targets.get(entry.target)?.name ?? '?';
}

export function entryHeader(): string {
    return '   ' +
        'DATE'.padEnd(COLUMNS.DATE) +
        'AMOUNT'.padEnd(COLUMNS.AMOUNT) +
        'TARGET'.padEnd(COLUMNS.TARGET) +
        'NOTE';
}

/**
 * One listing row, aligned with entryHeader().
 */
export function formatEntry(entry: Entry, targetName: string): string {
    return shortDate(entry.date).padEnd(COLUMNS.DATE) +
        formatCents(entry.amount).padEnd(COLUMNS.AMOUNT) +
        targetName.padEnd(COLUMNS.TARGET) +
        entry.note;
}
