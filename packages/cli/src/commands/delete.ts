import { SCREENS, type Entry, type Target, type TargetInstance } from '@tally/shared';
import {
    AbortError,
    CommandError,
    ReversibleCommand,
    confirm,
    defineCommand,
    type CommandDefinition,
} from '@tally/core';
import type { BudgetState } from '../budget/state.js';
import { targetUses } from '../budget/targets.js';
import { LineNumberValidator } from '../budget/validators.js';
import { selectEntry, selectTarget } from './selection.js';

abstract class DeleteLineCommand extends ReversibleCommand<BudgetState> {
    readonly line = this.param('line', new LineNumberValidator(), { required: true });

    /** Highlight the selected line and ask before deleting. */
    protected async confirmDelete(kind: string): Promise<void> {
        const { io, screens } = this.session;
        io.redraw();
        const yes = await confirm(io, `Are you sure you want to delete this ${kind}?`);
        screens.deselect();
        if (!yes) {
            throw new AbortError(`${kind[0].toUpperCase()}${kind.slice(1)} not deleted.`);
        }
    }
}

class DeleteEntryCommand extends DeleteLineCommand {
    private entry: Entry | undefined;

    async execute(): Promise<void> {
        const entry = selectEntry(this.session, this.line);
        await this.confirmDelete('entry');
        this.state.store.entries.delete(entry.id);
        this.entry = entry;
        this.session.screens.message('Entry deleted.');
    }

    undo(): void {
        if (!this.entry) return;
        const { id, ...values } = this.entry;
        this.state.store.entries.insert(values, id);
    }

    redo(): void {
        if (this.entry) this.state.store.entries.delete(this.entry.id);
    }
}

class DeleteTargetCommand extends DeleteLineCommand {
    private target: Target | undefined;
    private instances: TargetInstance[] = [];

    async execute(): Promise<void> {
        const target = selectTarget(this.session, this.line);
        const uses = targetUses(this.state.store, target.id);
        if (uses > 0) {
            this.session.screens.deselect();
            throw new CommandError(`Cannot delete ${target.name}; in use by ${uses} ${uses === 1 ? 'entry' : 'entries'}.`);
        }

        await this.confirmDelete('target');
        this.target = target;
        this.remove(target);
        this.session.screens.message(`Deleted target ${target.name}.`);
    }

    private remove(target: Target): void {
        const { store } = this.state;
        this.instances = store.targetInstances.deleteWhere(i => i.target === target.id);
        store.targets.delete(target.id);
    }

    undo(): void {
        if (!this.target) return;
        const { store } = this.state;
        const { id, ...values } = this.target;
        store.targets.insert(values, id);
        for (const { id: instanceId, ...instance } of this.instances) {
            store.targetInstances.insert(instance, instanceId);
        }
    }

    redo(): void {
        if (this.target) this.remove(this.target);
    }
}

export function deleteCommands(): CommandDefinition<BudgetState>[] {
    return [{
        kind: 'contextual',
        names: ['del', 'delete', 'remove'],
        description: 'Delete the entry or target on a line of the current screen.',
        usage: 'del <line>',
        forks: {
            [SCREENS.ENTRIES]: defineCommand<BudgetState>(DeleteEntryCommand, {
                description: 'Delete the entry on a line.',
                usage: 'del <line>',
            }),
            [SCREENS.TARGETS]: defineCommand<BudgetState>(DeleteTargetCommand, {
                description: 'Delete an unused target on a line.',
                usage: 'del <line>',
            }),
        },
        examples: [
            { text: 'delete 3', subtext: 'Remove the entry or target on line 3 of the current screen.' },
        ],
    }];
}
