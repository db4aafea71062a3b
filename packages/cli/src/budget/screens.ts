/**
 * The budget screens. Each one rebuilds its lines from the ledger on every
 * render, so commands only change state and never draw.
 */

import { SCREENS, type ScreenConfig, type Target, type TallyConfig } from '@tally/shared';
import type { Screen, ScreenController } from '@tally/core';
import { entryHeader, formatEntry, selectEntries, targetNameOf } from './entries.js';
import { formatCents } from './money.js';
import type { BudgetState, EntryFilter } from './state.js';
import { currentTotal, findTarget, formatTarget, goalFor, isFailing, targetHeader } from './targets.js';
import { describeTimeframe, type TimeFrame } from './timeframe.js';

/**
 * Targets named by a filter, or all of them when it names none.
 */
export function filteredTargets(state: BudgetState, names: readonly string[]): Target[] {
    const { store } = state;
    if (names.length === 0) {
        return store.targets.select();
    }
    return names.flatMap(name => findTarget(store, name) ?? []);
}

export function targetProgress(state: BudgetState, filter: EntryFilter): string {
    const targets = filteredTargets(state, filter.targets);
    const current = targets.reduce((sum, t) => sum + currentTotal(state.store, t.id, filter.timeframe), 0);
    const goal = targets.reduce((sum, t) => sum + goalFor(state.store, t, filter.timeframe), 0);
    return `Progress: ${formatCents(current)} / ${formatCents(goal)} (${targets.length})`;
}

export function entrySummary(count: number, filter: EntryFilter): string {
    const noun = count === 1 ? 'entry' : 'entries';
    const category = filter.category ? ` of type ${filter.category}` : '';
    const targets = filter.targets.length > 0
        ? ` for ${filter.targets.length > 1 ? 'targets' : 'target'} '${filter.targets.join(', ')}'`
        : '';
    return `${count} ${noun}${category} from ${describeTimeframe(filter.timeframe)}${targets}.`;
}

export function refreshEntries(state: BudgetState, screen: Screen): void {
    const filter = state.entryFilter;
    const entries = selectEntries(state.store, filter);

    screen.pushHeader(entryHeader());
    for (const entry of entries) {
        screen.push(formatEntry(entry, targetNameOf(state.store, entry)), entry);
    }
    screen.pushFooter('');
    screen.pushFooter(targetProgress(state, filter));
    screen.pushFooter(entrySummary(entries.length, filter));
}

export function refreshTargets(state: BudgetState, screen: Screen): void {
    const { timeframe } = state.targetFilter;

    screen.pushHeader(targetHeader());
    for (const target of state.store.targets.select()) {
        const line = formatTarget(state.store, target, timeframe);
        screen.push(line, target, isFailing(state.store, target, timeframe) ? 'failing' : undefined);
    }
    screen.pushFooter(`Showing targets for ${describeTimeframe(timeframe)}.`);
}

export interface GraphRow {
    target: Target;
    text: string;
}

/**
 * Horizontal bars around a centre line: income to the right, spending to
 * the left, scaled to the largest total.
 */
export function graphRows(state: BudgetState, targets: readonly Target[], timeframe: TimeFrame, columns: number): GraphRow[] {
    const half = Math.floor(Math.floor(columns * 0.75) / 2);
    const margin = ' '.repeat(Math.max(0, Math.floor((columns - half * 2) / 2)));
    const totals = targets.map(t => currentTotal(state.store, t.id, timeframe));
    const extreme = Math.max(1, ...totals.map(Math.abs));

    return targets.map((target, i) => {
        const total = totals[i];
        const label = `${target.name} (${formatCents(goalFor(state.store, target, timeframe))})`;
        const amount = formatCents(total);
        const length = total === 0 ? 0 : Math.max(1, Math.floor(half * Math.abs(total) / extreme));
        const bar = '#'.repeat(length);

        const text = total < 0
            ? `${`${amount} ${bar}`.padStart(half)} ${label}`
            : `${`${label} `.padStart(half)}${bar}${bar ? ' ' : ''}${amount}`;
        return { target, text: margin + text };
    });
}

export function refreshGraph(state: BudgetState, screen: Screen): void {
    const { timeframe, targets: names } = state.entryFilter;
    const targets = filteredTargets(state, names);

    screen.pushHeader(`Target totals for ${describeTimeframe(timeframe)}`);
    if (targets.length === 0) {
        screen.push('No targets to graph.');
        return;
    }
    for (const row of graphRows(state, targets, timeframe, screen.columns)) {
        screen.push(row.text, row.target, isFailing(state.store, row.target, timeframe) ? 'failing' : 'passing');
    }
}

function screenOptions(config: ScreenConfig): { minBodyHeight: number; numbered: boolean; truncate: boolean } {
    return {
        minBodyHeight: config.min_body_height,
        numbered: config.numbered,
        truncate: config.truncate,
    };
}

/**
 * Add the entries, targets and graph screens. Entries is added first and
 * so starts active.
 */
export function addBudgetScreens(screens: ScreenController, state: BudgetState, config: TallyConfig['screens']): void {
    screens.add({
        name: SCREENS.ENTRIES,
        ...screenOptions(config.entries),
        refresh: screen => refreshEntries(state, screen),
    });
    screens.add({
        name: SCREENS.TARGETS,
        ...screenOptions(config.targets),
        refresh: screen => refreshTargets(state, screen),
    });
    screens.add({
        name: SCREENS.GRAPH,
        ...screenOptions(config.graph),
        refresh: screen => refreshGraph(state, screen),
    });
}
