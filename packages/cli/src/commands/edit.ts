import { SCREENS, type Entry, type TargetInstance } from '@tally/shared';
import {
    CommandError,
    ReversibleCommand,
    defineCommand,
    type CommandDefinition,
} from '@tally/core';
import { ensureInstance, type EntryValues } from '../budget/entries.js';
import { askAmount, askDate, askNote, askTarget } from '../budget/prompts.js';
import type { BudgetState } from '../budget/state.js';
import { findTarget, targetNames } from '../budget/targets.js';
import { EditFieldValidator, LineNumberValidator, type EditField } from '../budget/validators.js';
import { selectEntry } from './selection.js';

class EditEntryCommand extends ReversibleCommand<BudgetState> {
    readonly line = this.param('line', new LineNumberValidator(), { required: true });
    readonly field = this.param('field', new EditFieldValidator(), { required: true });
    private before: Entry | undefined;
    private after: Entry | undefined;
    private instance: TargetInstance | undefined;

    async execute(): Promise<void> {
        const entry = selectEntry(this.session, this.line);
        this.session.io.redraw();
        const changes = await this.ask(this.field);
        this.session.screens.deselect();

        const { store } = this.state;
        this.before = entry;
        this.after = store.entries.update(entry.id, changes);
        this.instance = ensureInstance(store, this.after.target, this.after.date);
        this.session.screens.message(`Changed the ${this.field} of the entry.`);
    }

    private async ask(field: EditField): Promise<Partial<EntryValues>> {
        const { io } = this.session;
        switch (field) {
            case 'date':
                return { date: await askDate(io, this.state.today()) };
            case 'amount':
                return { amount: await askAmount(io) };
            case 'target': {
                const name = await askTarget(io, targetNames(this.state.store));
                const target = findTarget(this.state.store, name);
                if (!target) {
                    throw new CommandError(`Target not found: ${name}`);
                }
                return { target: target.id };
            }
            case 'note':
                return { note: await askNote(io) };
        }
    }

    undo(): void {
        if (!this.before) return;
        const { store } = this.state;
        const { id, ...values } = this.before;
        store.entries.update(id, values);
        if (this.instance) store.targetInstances.delete(this.instance.id);
    }

    redo(): void {
        if (!this.after) return;
        const { store } = this.state;
        const { id, ...values } = this.after;
        if (this.instance) {
            const { id: instanceId, ...instance } = this.instance;
            store.targetInstances.insert(instance, instanceId);
        }
        store.entries.update(id, values);
    }
}

export function editCommands(): CommandDefinition<BudgetState>[] {
    return [{
        kind: 'contextual',
        names: ['edit'],
        description: 'Edit one field of the entry on a line; a prompt asks for the new value.',
        usage: 'edit <line> <date|amount|target|note>',
        forks: {
            [SCREENS.ENTRIES]: defineCommand<BudgetState>(EditEntryCommand, {
                description: 'Edit an entry on a line.',
                usage: 'edit <line> <date|amount|target|note>',
            }),
        },
        examples: [
            { text: 'edit 3 amount', subtext: 'Edit the amount of the entry on line 3; a prompt will be given.' },
        ],
    }];
}
