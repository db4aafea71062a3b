import { LIMITS, SCREENS, type Target } from '@tally/shared';
import {
    AnyValidator,
    CommandError,
    ReversibleCommand,
    defineCommand,
    type CommandDefinition,
} from '@tally/core';
import { localIsoDate, shortDate } from '../budget/dates.js';
import { insertEntry, reinsert, removeInserted, type EntryValues, type InsertedEntry } from '../budget/entries.js';
import { formatCents } from '../budget/money.js';
import { askAmount, askDate, askNote, askTarget } from '../budget/prompts.js';
import type { BudgetState } from '../budget/state.js';
import { findTarget, targetNames } from '../budget/targets.js';
import { AmountValidator, TargetValidator } from '../budget/validators.js';

const NO_TARGETS = "No targets to add entries to. Make a target with 'add target [name] [amount]'.";

/**
 * Shared insert/undo/redo for commands that add one entry.
 */
abstract class AddEntryBase extends ReversibleCommand<BudgetState> {
    private inserted: InsertedEntry | undefined;

    protected insert(values: EntryValues): void {
        this.inserted = insertEntry(this.state.store, values);
        this.session.screens.message(
            `Entry added: ${shortDate(values.date)}, ${formatCents(values.amount)}, ${values.note}`
        );
    }

    protected requireTarget(name: string): Target {
        const target = findTarget(this.state.store, name);
        if (!target) {
            throw new CommandError(`Target not found: ${name}`);
        }
        return target;
    }

    undo(): void {
        if (this.inserted) removeInserted(this.state.store, this.inserted);
    }

    redo(): void {
        if (this.inserted) reinsert(this.state.store, this.inserted);
    }
}

class AddEntryCommand extends AddEntryBase {
    async execute(): Promise<void> {
        const names = targetNames(this.state.store);
        if (names.length === 0) {
            throw new CommandError(NO_TARGETS);
        }

        const { io } = this.session;
        io.redraw();
        const date = await askDate(io, this.state.today());
        const amount = await askAmount(io);
        const target = this.requireTarget(await askTarget(io, names));
        const note = await askNote(io);

        this.insert({ date, amount, target: target.id, note });
    }
}

class AddEntryTodayCommand extends AddEntryBase {
    readonly amount = this.param('amount', new AmountValidator(), { required: true });
    readonly target = this.param('target', new TargetValidator(() => targetNames(this.state.store)), { required: true });
    readonly words = this.param('note', new AnyValidator(), { plural: true });

    execute(): void {
        const note = this.words.join(' ') || LIMITS.DEFAULT_NOTE;
        if (note.length > LIMITS.NOTE_MAX) {
            throw new CommandError(`Note must be ${LIMITS.NOTE_MAX} characters or less.`);
        }
        this.insert({
            date: localIsoDate(this.state.today()),
            amount: this.amount,
            target: this.requireTarget(this.target).id,
            note,
        });
    }
}

class AddTargetCommand extends ReversibleCommand<BudgetState> {
    readonly name = this.param('name', new TargetValidator(() => targetNames(this.state.store), { invert: true }), { required: true });
    readonly amount = this.param('amount', new AmountValidator(), { required: true });
    private target: Target | undefined;

    execute(): void {
        this.target = this.state.store.targets.insert({ name: this.name, default_amount: this.amount });
        this.session.screens.message(`Added target ${this.name} (${formatCents(this.amount)}).`);
    }

    undo(): void {
        if (this.target) this.state.store.targets.delete(this.target.id);
    }

    redo(): void {
        if (!this.target) return;
        const { id, ...values } = this.target;
        this.state.store.targets.insert(values, id);
    }
}

export function addCommands(): CommandDefinition<BudgetState>[] {
    return [{
        kind: 'fork',
        names: ['add'],
        description: 'Add an entry or target.',
        usage: 'add [entry|today|target] ...',
        default: 'entry',
        forks: {
            entry: defineCommand<BudgetState>(AddEntryCommand, {
                description: 'Add an entry through a series of prompts.',
                usage: 'add [entry]',
                screen: SCREENS.ENTRIES,
            }),
            today: defineCommand<BudgetState>(AddEntryTodayCommand, {
                description: 'Add an entry for today in one line.',
                usage: 'add today <amount> <target> [note...]',
                screen: SCREENS.ENTRIES,
            }),
            target: defineCommand<BudgetState>(AddTargetCommand, {
                description: 'Add a new target with a default monthly amount.',
                usage: 'add target <name> <amount>',
                screen: SCREENS.TARGETS,
            }),
        },
        examples: [
            { text: 'add [entry]', subtext: 'Add an entry through multiple prompts.' },
            { text: "add today -100 insurance 'Car insurance bill'", subtext: 'Add an entry for today in one line.' },
            { text: 'add target groceries -400', subtext: "Add a new target named 'groceries' with amount -400." },
        ],
    }];
}
