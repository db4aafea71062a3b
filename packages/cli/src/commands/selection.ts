import { EntrySchema, TargetSchema, type Entry, type Target } from '@tally/shared';
import { DisplayError, type Session } from '@tally/core';
import type { BudgetState } from '../budget/state.js';

/**
 * The entry shown on a line of the active screen, as stored.
 */
export function selectEntry(session: Session<BudgetState>, line: number): Entry {
    const parsed = EntrySchema.safeParse(session.screens.select(line));
    const entry = parsed.success ? session.state.store.entries.get(parsed.data.id) : undefined;
    if (!entry) {
        session.screens.deselect();
        throw new DisplayError('That line does not show an entry.');
    }
    return entry;
}

/**
 * The target shown on a line of the active screen, as stored.
 */
export function selectTarget(session: Session<BudgetState>, line: number): Target {
    const parsed = TargetSchema.safeParse(session.screens.select(line));
    const target = parsed.success ? session.state.store.targets.get(parsed.data.id) : undefined;
    if (!target) {
        session.screens.deselect();
        throw new DisplayError('That line does not show a target.');
    }
    return target;
}
