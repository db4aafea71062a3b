import { SCREENS, type Target } from '@tally/shared';
import {
    CommandError,
    LiteralValidator,
    ReversibleCommand,
    defineCommand,
    type CommandDefinition,
} from '@tally/core';
import { formatCents } from '../budget/money.js';
import type { BudgetState } from '../budget/state.js';
import { findTarget, reapplyInstance, revertInstance, setInstance, targetNames, type InstanceChange } from '../budget/targets.js';
import { describeTimeframe, timeframeOf } from '../budget/timeframe.js';
import { AmountValidator, MonthValidator, TargetValidator, YearValidator } from '../budget/validators.js';

abstract class SetTargetBase extends ReversibleCommand<BudgetState> {
    readonly name = this.param('name', new TargetValidator(() => targetNames(this.state.store)), { required: true });

    protected lookup(): Target {
        const target = findTarget(this.state.store, this.name);
        if (!target) {
            throw new CommandError(`Target not found: ${this.name}`);
        }
        return target;
    }
}

class SetTargetDefaultCommand extends SetTargetBase {
    readonly keyword = this.param('default', new LiteralValidator('default'), { required: true });
    readonly amount = this.param('amount', new AmountValidator({ allowZero: true }), { required: true });
    private previous = 0;
    private targetId = 0;

    execute(): void {
        const target = this.lookup();
        this.previous = target.default_amount;
        this.targetId = target.id;
        this.state.store.targets.update(target.id, { default_amount: this.amount });
        this.session.screens.message(`Set the default of ${target.name} to ${formatCents(this.amount)}.`);
    }

    undo(): void {
        this.state.store.targets.update(this.targetId, { default_amount: this.previous });
    }

    redo(): void {
        this.state.store.targets.update(this.targetId, { default_amount: this.amount });
    }
}

class SetTargetForMonthCommand extends SetTargetBase {
    readonly amount = this.param('amount', new AmountValidator({ allowZero: true }), { required: true });
    readonly year = this.param('year', new YearValidator(), { default: this.state.today().getFullYear() });
    readonly month = this.param('month', new MonthValidator({ allowAll: false }), { default: timeframeOf(this.state.today()).month });
    private change: InstanceChange | undefined;

    execute(): void {
        const target = this.lookup();
        this.change = setInstance(this.state.store, target.id, this.year, this.month, this.amount);
        const timeframe = describeTimeframe({ year: this.year, month: this.month });
        this.session.screens.message(`Set ${target.name} to ${formatCents(this.amount)} for ${timeframe}.`);
    }

    undo(): void {
        if (this.change) revertInstance(this.state.store, this.change);
    }

    redo(): void {
        if (this.change) reapplyInstance(this.state.store, this.change);
    }
}

export function setCommands(): CommandDefinition<BudgetState>[] {
    const forMonth = defineCommand<BudgetState>(SetTargetForMonthCommand, {
        description: 'Set the amount of a target for one month.',
        usage: 'set <target> <amount> [year] [month]',
        screen: SCREENS.TARGETS,
    });

    return [{
        kind: 'probe',
        names: ['set'],
        description: 'Set the amount for a target; either the default or for a specified month.',
        usage: 'set <target> [default] <amount> [year] [month]',
        branches: [{
            label: 'default',
            when: new LiteralValidator('default'),
            command: defineCommand<BudgetState>(SetTargetDefaultCommand, {
                description: 'Set the default monthly amount of a target.',
                usage: 'set <target> default <amount>',
                screen: SCREENS.TARGETS,
            }),
        }],
        default: forMonth,
        examples: [
            { text: 'set insurance default -200', subtext: "Set the default amount for the 'insurance' target to -200." },
            { text: 'set insurance july 2022 -400', subtext: "Set the 'insurance' target amount to -400 for July 2022." },
            { text: 'set insurance -400', subtext: "Set the 'insurance' target amount to -400 for the current month." },
        ],
    }];
}
