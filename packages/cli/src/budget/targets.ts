import { COLUMNS, type Target, type TargetInstance } from '@tally/shared';
import type { LedgerStore } from '../store/ledger-store.js';
import { formatCents } from './money.js';
import { containsDate, isWholeYear, type TimeFrame } from './timeframe.js';

export function targetNames(store: LedgerStore): string[] {
    return store.targets.select().map(t => t.name);
}

export function findTarget(store: LedgerStore, name: string): Target | undefined {
    const lower = name.toLowerCase();
    return store.targets.select(t => t.name === lower)[0];
}

export function instancesIn(store: LedgerStore, targetId: number, timeframe: TimeFrame): TargetInstance[] {
    return store.targetInstances.select(i =>
        i.target === targetId &&
        i.year === timeframe.year &&
        (isWholeYear(timeframe) || i.month === timeframe.month)
    );
}

/**
 * Sum of the target's entries within the timeframe.
 */
export function currentTotal(store: LedgerStore, targetId: number, timeframe: TimeFrame): number {
    return store.entries
        .select(e => e.target === targetId && containsDate(timeframe, e.date))
        .reduce((sum, e) => sum + e.amount, 0);
}

/**
 * Months without their own goal count at the target's default.
 */
export function goalFor(store: LedgerStore, target: Target, timeframe: TimeFrame): number {
    const instances = instancesIn(store, target.id, timeframe);
    const expected = isWholeYear(timeframe) ? 12 : 1;
    const explicit = instances.reduce((sum, i) => sum + i.amount, 0);
    return explicit + (expected - instances.length) * target.default_amount;
}

export function isFailing(store: LedgerStore, target: Target, timeframe: TimeFrame): boolean {
    return currentTotal(store, target.id, timeframe) < goalFor(store, target, timeframe);
}

/**
 * Number of entries booked against the target.
 */
export function targetUses(store: LedgerStore, targetId: number): number {
    return store.entries.select(e => e.target === targetId).length;
}

export interface InstanceChange {
    before?: TargetInstance;
    after: TargetInstance;
}

/**
 * Set the goal of one month, creating the instance when needed.
 */
export function setInstance(store: LedgerStore, targetId: number, year: number, month: number, amount: number): InstanceChange {
    const before = store.targetInstances.select(i => i.target === targetId && i.year === year && i.month === month)[0];
    if (before) {
        return { before, after: store.targetInstances.update(before.id, { amount }) };
    }
    return { after: store.targetInstances.insert({ target: targetId, amount, year, month }) };
}

/**
 * Reverse setInstance().
 */
export function revertInstance(store: LedgerStore, change: InstanceChange): void {
    if (change.before) {
        store.targetInstances.update(change.before.id, { amount: change.before.amount });
    } else {
        store.targetInstances.delete(change.after.id);
    }
}

/**
 * Apply a reverted change again, putting a created instance back under its id.
 */
export function reapplyInstance(store: LedgerStore, change: InstanceChange): void {
    if (change.before) {
        store.targetInstances.update(change.before.id, { amount: change.after.amount });
    } else {
        const { id, ...values } = change.after;
        store.targetInstances.insert(values, id);
    }
}

export function targetHeader(): string {
    return '   ' + 'NAME'.padEnd(COLUMNS.NAME) + 'PROGRESS';
}

export function formatTarget(store: LedgerStore, target: Target, timeframe: TimeFrame): string {
    const goal = goalFor(store, target, timeframe);
    let line = target.name.padEnd(COLUMNS.NAME) +
        `${formatCents(currentTotal(store, target.id, timeframe))} / ${formatCents(goal)}`;
    if (!isWholeYear(timeframe) && goal !== target.default_amount) {
        line += ` (default: ${formatCents(target.default_amount)})`;
    }
    return line;
}
