import { SCREENS } from '@tally/shared';
import { CommandError, ReversibleCommand, defineCommand, type CommandDefinition } from '@tally/core';
import type { BudgetState } from '../budget/state.js';
import { findTarget, targetNames } from '../budget/targets.js';
import { TargetValidator } from '../budget/validators.js';

class RenameTargetCommand extends ReversibleCommand<BudgetState> {
    readonly current = this.param('current_name', new TargetValidator(() => targetNames(this.state.store)), { required: true });
    readonly replacement = this.param('new_name', new TargetValidator(() => targetNames(this.state.store), { invert: true }), { required: true });
    private targetId = 0;

    execute(): void {
        const target = findTarget(this.state.store, this.current);
        if (!target) {
            throw new CommandError(`Target not found: ${this.current}`);
        }
        this.targetId = target.id;
        this.rename(this.current, this.replacement);
        this.session.screens.message(`Renamed ${this.current} to ${this.replacement}.`);
    }

    /** Filters naming the target follow the rename. */
    private rename(from: string, to: string): void {
        this.state.store.targets.update(this.targetId, { name: to });
        const filter = this.state.entryFilter;
        filter.targets = filter.targets.map(name => (name === from ? to : name));
    }

    undo(): void {
        this.rename(this.replacement, this.current);
    }

    redo(): void {
        this.rename(this.current, this.replacement);
    }
}

export function renameCommands(): CommandDefinition<BudgetState>[] {
    return [
        defineCommand<BudgetState>(RenameTargetCommand, {
            names: ['rename'],
            description: 'Rename a target.',
            usage: 'rename <target> <new-name>',
            screen: SCREENS.TARGETS,
            examples: [{ text: 'rename groceries food', subtext: "Rename the 'groceries' target to 'food'." }],
        }),
    ];
}
