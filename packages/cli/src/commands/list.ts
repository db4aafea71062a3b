import { SCREENS } from '@tally/shared';
import { Command, defineCommand, type CommandDefinition, type Example } from '@tally/core';
import type { BudgetState } from '../budget/state.js';
import { targetNames } from '../budget/targets.js';
import { timeframeOf, type TimeFrame } from '../budget/timeframe.js';
import { CategoryValidator, MonthValidator, TargetValidator, YearValidator } from '../budget/validators.js';

abstract class TimeframeCommand extends Command<BudgetState> {
    readonly year = this.param('year', new YearValidator());
    readonly month = this.param('month', new MonthValidator());

    /** Missing parts default to the current month. */
    protected timeframe(): TimeFrame {
        const today = timeframeOf(this.state.today());
        return { year: this.year ?? today.year, month: this.month ?? today.month };
    }
}

class ListEntriesCommand extends TimeframeCommand {
    readonly category = this.param('category', new CategoryValidator());
    readonly targets = this.param('targets', new TargetValidator(() => targetNames(this.state.store)), { plural: true });

    execute(): void {
        const timeframe = this.timeframe();
        this.state.entryFilter = { timeframe, category: this.category, targets: this.targets };
        this.state.targetFilter = { timeframe };
        this.session.screens.changePage(1);
    }
}

class ListTargetsCommand extends TimeframeCommand {
    execute(): void {
        this.state.targetFilter = { timeframe: this.timeframe() };
        this.session.screens.changePage(1);
    }
}

class GraphTargetsCommand extends TimeframeCommand {
    readonly targets = this.param('targets', new TargetValidator(() => targetNames(this.state.store)), { plural: true });

    execute(): void {
        const timeframe = this.timeframe();
        this.state.entryFilter = { timeframe, targets: this.targets };
        this.state.targetFilter = { timeframe };
    }
}

const LIST_EXAMPLES: Example[] = [
    { text: 'list march 2022 food', subtext: "List the entries for March of 2022 at target 'food'." },
    { text: 'list all income', subtext: 'List all positive entries from the current year.' },
];

export function listCommands(): CommandDefinition<BudgetState>[] {
    return [
        defineCommand<BudgetState>(ListEntriesCommand, {
            names: ['list', 'ls', 'entries', 'entry'],
            description: 'List entries. Filter by time, type and target.',
            usage: 'list [year] [month|all] [income|expense] [targets...]',
            screen: SCREENS.ENTRIES,
            examples: LIST_EXAMPLES,
        }),
        defineCommand<BudgetState>(ListTargetsCommand, {
            names: ['targets', 'target'],
            description: 'List targets and their progress.',
            usage: 'targets [year] [month|all]',
            screen: SCREENS.TARGETS,
            examples: [
                { text: 'targets all', subtext: 'List all targets for the current year.' },
                { text: 'targets march 2021', subtext: 'List targets for March of 2021.' },
            ],
        }),
        defineCommand<BudgetState>(GraphTargetsCommand, {
            names: ['graph'],
            description: 'Graph earnings and spending grouped by target.',
            usage: 'graph [year] [month|all] [targets...]',
            screen: SCREENS.GRAPH,
        }),
    ];
}
