import { describe, it, expect } from 'vitest';
import { createPalette } from '@tally/core';
import { insertEntry } from '../../src/budget/entries.js';
import { LedgerStore } from '../../src/store/ledger-store.js';
import { createTestApp } from '../support/app.js';

const HINT = "Try 'help' if you're having trouble.";

/** food and pay targets with entries in February and March 2024, and one in 2023. */
function seededStore(): LedgerStore {
    const store = LedgerStore.inMemory();
    const food = store.targets.insert({ name: 'food', default_amount: -40000 });
    const pay = store.targets.insert({ name: 'pay', default_amount: 300000 });
    insertEntry(store, { date: '2024-03-02', amount: -2500, target: food.id, note: 'market' });
    insertEntry(store, { date: '2024-03-10', amount: 300000, target: pay.id, note: 'salary' });
    insertEntry(store, { date: '2024-02-20', amount: -1000, target: food.id, note: 'old' });
    insertEntry(store, { date: '2023-03-01', amount: -999, target: food.id, note: 'ancient' });
    return store;
}

describe('Budget commands', () => {
    it('should start on the entries screen', () => {
        const app = createTestApp();

        expect(app.screens.active.name).toBe('entries');
        expect(app.screens.names()).toEqual(['entries', 'targets', 'graph', 'help', 'shortcuts']);
    });

    describe('add', () => {
        it('should add a target and show it on the targets screen', async () => {
            const app = createTestApp();

            await app.run('add target food -400');

            expect(app.screens.active.name).toBe('targets');
            expect(app.message()).toBe('Added target food (-$400.00).');
            expect(app.body('targets')).toEqual([`${'food'.padEnd(13)}+$0.00 / -$400.00`]);
            expect(app.footer('targets')).toEqual(['Showing targets for March of 2024.']);
        });

        it('should add an entry for today in one line', async () => {
            const app = createTestApp();
            await app.run('add target food -400');

            await app.run("add today -12.50 food 'lunch out'");

            expect(app.screens.active.name).toBe('entries');
            expect(app.message()).toBe('Entry added: Mar 15, -$12.50, lunch out');
            expect(app.body('entries')).toEqual(['Mar 15  -$12.50     food         lunch out']);
            expect(app.footer('entries')).toEqual([
                '',
                'Progress: -$12.50 / -$400.00 (1)',
                '1 entry from March of 2024.',
            ]);
        });

        it('should undo and redo an added entry', async () => {
            const app = createTestApp();
            await app.run('add target food -400');
            await app.run('add today -5 food');

            await app.run('undo');
            expect(app.message()).toBe('Undid "add today -5 food".');
            expect(app.store.entries.size).toBe(0);
            expect(app.store.targetInstances.size).toBe(0);

            await app.run('redo');
            expect(app.message()).toBe('Redid "add today -5 food".');
            expect(app.store.entries.select()).toEqual([
                { id: 1, date: '2024-03-15', amount: -500, target: 1, note: '...' },
            ]);
        });

        it('should collect an entry through prompts', async () => {
            const app = createTestApp({ answers: ['march 3', '12', '+12', 'help', 'FOOD', ''] });
            await app.run('add target food -400');

            await app.run('add');

            expect(app.prompter.asked).toEqual([
                'Date (e.g. "march 5", empty for today): ',
                'Amount: ',
                'Amount: ',
                'Target: ',
                'Target: ',
                'Note: ',
            ]);
            expect(app.frames.map(f => f.at(-1)?.trimEnd())).toContain('The amount must start with + or -');
            expect(app.message()).toBe('Entry added: Mar 03, +$12.00, ...');
            expect(app.store.entries.select()).toEqual([
                { id: 1, date: '2024-03-03', amount: 1200, target: 1, note: '...' },
            ]);
        });

        it('should refuse to prompt without targets', async () => {
            const app = createTestApp();

            await app.run('add entry');

            expect(app.message()).toBe("No targets to add entries to. Make a target with 'add target [name] [amount]'.");
            expect(app.prompter.asked).toEqual([]);
        });

        it('should leave everything unchanged when a prompt is aborted', async () => {
            const app = createTestApp({ answers: ['', 'q'] });
            await app.run('add target food -400');

            await app.run('add');

            expect(app.message()).toBe('Input aborted.');
            expect(app.store.entries.size).toBe(0);
            expect(app.commands.undoDepth).toBe(1);
        });

        it('should name a missing field', async () => {
            const app = createTestApp();
            await app.run('add target food');

            expect(app.message()).toBe(`Missing required input: amount; ${HINT}`);
            expect(app.store.targets.size).toBe(0);
        });
    });

    describe('del', () => {
        async function withEntries(answers: string[]) {
            const app = createTestApp({ answers });
            await app.run('add target food -400');
            await app.run('add today -5 food first');
            await app.run('add today -7 food second');
            return app;
        }

        it('should delete the entry on a line after confirmation', async () => {
            const app = await withEntries(['y']);
            expect(app.body('entries').map(l => l.slice(-6))).toEqual(['second', ' first']);

            await app.run('del 2');

            expect(app.prompter.asked).toEqual(['Are you sure you want to delete this entry? [y/N] ']);
            expect(app.message()).toBe('Entry deleted.');
            expect(app.store.entries.select().map(e => e.note)).toEqual(['second']);
            expect(app.screens.selected()).toBeUndefined();
        });

        it('should put a deleted entry back on undo', async () => {
            const app = await withEntries(['yes']);
            await app.run('delete 2');

            await app.run('undo');

            expect(app.store.entries.get(1)?.note).toBe('first');
            await app.run('redo');
            expect(app.store.entries.get(1)).toBeUndefined();
        });

        it('should keep the entry when not confirmed', async () => {
            const app = await withEntries(['n']);

            await app.run('remove 1');

            expect(app.message()).toBe('Entry not deleted.');
            expect(app.store.entries.size).toBe(2);
            expect(app.commands.undoDepth).toBe(3);
        });

        it('should reject a line that is not shown', async () => {
            const app = await withEntries([]);

            await app.run('del 9');

            expect(app.message()).toBe('Invalid line selection.');
        });

        it('should refuse to delete a target in use', async () => {
            const app = await withEntries([]);
            await app.run('targets');

            await app.run('del 1');

            expect(app.message()).toBe('Cannot delete food; in use by 2 entries.');
            expect(app.store.targets.size).toBe(1);
        });

        it('should delete an unused target and restore it on undo', async () => {
            const app = createTestApp({ answers: ['y'] });
            await app.run('add target food -400');
            await app.run('set food -300 april');
            expect(app.store.targetInstances.size).toBe(1);

            await app.run('del 1');
            expect(app.message()).toBe('Deleted target food.');
            expect(app.store.targets.size).toBe(0);
            expect(app.store.targetInstances.size).toBe(0);

            await app.run('undo');
            expect(app.store.targets.get(1)?.name).toBe('food');
            expect(app.store.targetInstances.select()).toEqual([
                { id: 1, target: 1, amount: -30000, year: 2024, month: 4 },
            ]);
        });

        it('should not be available on other screens', async () => {
            const app = createTestApp();
            await app.run('graph');

            await app.run('del 1');

            expect(app.message()).toBe('That command is not available on this screen.');
        });
    });

    describe('edit', () => {
        it('should change one field and undo it', async () => {
            const app = createTestApp({ answers: ['fun'] });
            await app.run('add target food -400');
            await app.run('add target fun -50');
            await app.run('add today -5 food snack');

            await app.run('edit 1 target');

            expect(app.frames.map(f => f.at(-1)?.trimEnd())).toContain('(food, fun)');
            expect(app.message()).toBe('Changed the target of the entry.');
            expect(app.store.entries.get(1)?.target).toBe(2);
            expect(app.store.targetInstances.select(i => i.target === 2)).toHaveLength(1);

            await app.run('undo');
            expect(app.store.entries.get(1)?.target).toBe(1);
            expect(app.store.targetInstances.select(i => i.target === 2)).toHaveLength(0);
        });

        it('should change an amount', async () => {
            const app = createTestApp({ answers: ['+40'] });
            await app.run('add target food -400');
            await app.run('add today -5 food');

            await app.run('edit 1 amount');

            expect(app.store.entries.get(1)?.amount).toBe(4000);
        });

        it('should need a field', async () => {
            const app = createTestApp();
            await app.run('add target food -400');
            await app.run('add today -5 food');

            await app.run('edit 1');

            expect(app.message()).toBe(`Missing required input: field; ${HINT}`);
        });
    });

    describe('set and rename', () => {
        it('should set the default of a target', async () => {
            const app = createTestApp();
            await app.run('add target food -400');

            await app.run('set food default -500');

            expect(app.message()).toBe('Set the default of food to -$500.00.');
            expect(app.store.targets.get(1)?.default_amount).toBe(-50000);

            await app.run('undo');
            expect(app.store.targets.get(1)?.default_amount).toBe(-40000);
        });

        it('should set the goal of one month, defaulting to the current one', async () => {
            const app = createTestApp();
            await app.run('add target food -400');

            await app.run('set food july 2022 -350');
            expect(app.message()).toBe('Set food to -$350.00 for July of 2022.');

            await app.run('set food +0');
            expect(app.message()).toBe('Set food to +$0.00 for March of 2024.');
            expect(app.body('targets')).toEqual([`${'food'.padEnd(13)}+$0.00 / +$0.00 (default: -$400.00)`]);

            await app.run('undo');
            expect(app.store.targetInstances.select().map(i => [i.year, i.month, i.amount])).toEqual([[2022, 7, -35000]]);
        });

        it('should restore the same rows when a month goal is redone', async () => {
            const app = createTestApp();
            await app.run('add target food -400');

            await app.run('set food -5 2024 june');
            const created = app.store.toJSON();
            await app.run('undo');
            await app.run('redo');
            expect(app.store.toJSON()).toEqual(created);

            await app.run('set food -7 2024 june');
            const changed = app.store.toJSON();
            await app.run('undo');
            expect(app.store.targetInstances.get(1)?.amount).toBe(-500);
            await app.run('redo');
            expect(app.store.toJSON()).toEqual(changed);
        });

        it('should only take four-digit years from 1000 on', async () => {
            const app = createTestApp();
            await app.run('add target food -400');

            await app.run('set food -5 0999 march');

            expect(app.message()).toBe('Unrecognized input: 0999');
            expect(app.store.targetInstances.size).toBe(0);
            expect(() => LedgerStore.inMemory(app.store.toJSON())).not.toThrow();
        });

        it('should rename a target and follow it in the entry filter', async () => {
            const app = createTestApp();
            await app.run('add target food -400');
            await app.run('list food');

            await app.run('rename food groceries');

            expect(app.message()).toBe('Renamed food to groceries.');
            expect(app.store.targets.get(1)?.name).toBe('groceries');
            expect(app.state.entryFilter.targets).toEqual(['groceries']);

            await app.run('undo');
            expect(app.store.targets.get(1)?.name).toBe('food');
            expect(app.state.entryFilter.targets).toEqual(['food']);
        });

        it('should not rename to a reserved word', async () => {
            const app = createTestApp();
            await app.run('add target food -400');

            await app.run('rename food income');

            expect(app.message()).toBe(`Missing required input: new_name; ${HINT}`);
        });
    });

    describe('list', () => {
        it('should list the current month by default', async () => {
            const app = createTestApp({ store: seededStore() });

            await app.run('list');

            expect(app.body('entries').map(l => l.slice(-6))).toEqual(['salary', 'market']);
            expect(app.footer('entries')).toEqual([
                '',
                'Progress: +$2975.00 / +$2600.00 (2)',
                '2 entries from March of 2024.',
            ]);
        });

        it('should filter by category', async () => {
            const app = createTestApp({ store: seededStore() });

            await app.run('ls income');

            expect(app.footer('entries')[2]).toBe('1 entry of type income from March of 2024.');
        });

        it('should filter a whole year by target', async () => {
            const app = createTestApp({ store: seededStore() });

            await app.run('list all food');

            expect(app.body('entries')).toHaveLength(2);
            expect(app.footer('entries').slice(1)).toEqual([
                'Progress: -$35.00 / -$4800.00 (1)',
                "2 entries from all of 2024 for target 'food'.",
            ]);
        });

        it('should list another year and month', async () => {
            const app = createTestApp({ store: seededStore() });

            await app.run('entries 2023 mar');

            expect(app.body('entries').map(l => l.slice(-7))).toEqual(['ancient']);
            expect(app.state.targetFilter.timeframe).toEqual({ year: 2023, month: 3 });
        });

        it('should reject words it does not understand', async () => {
            const app = createTestApp({ store: seededStore() });

            await app.run('list food cars');

            expect(app.message()).toBe('Unrecognized input: cars');
        });
    });

    describe('targets and graph', () => {
        it('should list targets for a month', async () => {
            const app = createTestApp({ store: seededStore() });

            await app.run('targets feb');

            expect(app.body('targets')).toEqual([
                `${'food'.padEnd(13)}-$10.00 / -$400.00`,
                `${'pay'.padEnd(13)}+$0.00 / +$3000.00`,
            ]);
            expect(app.footer('targets')).toEqual(['Showing targets for February of 2024.']);
        });

        it('should colour failing targets without changing their layout', async () => {
            const app = createTestApp({ store: seededStore(), palette: createPalette(true) });

            await app.run('targets feb');

            const pay = `${'pay'.padEnd(13)}+$0.00 / +$3000.00`;
            expect(app.body('targets')[1]).toBe(pay);
            expect(app.screens.get('targets').body.lines()).toHaveLength(2);
            expect(app.frames.at(-1)?.[2]).toBe(`\u001b[2m02\u001b[22m \u001b[31m${pay}\u001b[39m`);
        });

        it('should graph totals around the centre', async () => {
            const app = createTestApp({ store: seededStore() });

            await app.run('graph');

            const margin = ' '.repeat(13);
            expect(app.screens.active.name).toBe('graph');
            expect(app.body('graph')).toEqual([
                `${margin}${'-$25.00 #'.padStart(37)} food (-$400.00)`,
                `${margin}${'pay (+$3000.00) '.padStart(37)}${'#'.repeat(37)} +$3000.00`,
            ]);
        });
    });

    describe('help and shortcuts', () => {
        it('should list budget commands in help', async () => {
            const app = createTestApp();

            await app.run('help');

            expect(app.body('help')).toContain(`${'add'.padEnd(22)} Add an entry or target.`);
            expect(app.body('help')).toContain(`${'del, delete, remove'.padEnd(22)} Delete the entry or target on a line of the current screen.`);
        });

        it('should explain the forms of set', async () => {
            const app = createTestApp();

            await app.run('help set');

            expect(app.body('help')).toContain('  default: set <target> default <amount>');
            expect(app.body('help')).toContain('  otherwise: set <target> <amount> [year] [month]');
        });

        it('should store shortcuts in the ledger and run them', async () => {
            const app = createTestApp();
            await app.run('add target food -400');

            await app.run('+/ food list food');
            await app.run('/food');

            expect(app.store.shortcuts.select()).toEqual([{ id: 1, name: 'food', command: 'list food' }]);
            expect(app.screens.active.name).toBe('entries');
            expect(app.state.entryFilter.targets).toEqual(['food']);
        });

        it('should keep shortcut rows identical through undo and redo', async () => {
            const app = createTestApp();
            await app.run('add target food -400');

            await app.run('+/ food list food');
            const added = app.store.toJSON();
            await app.run('undo');
            await app.run('redo');
            expect(app.store.toJSON()).toEqual(added);

            await app.run('-/ food');
            const removed = app.store.toJSON();
            await app.run('undo');
            expect(app.store.toJSON()).toEqual(added);
            await app.run('redo');
            expect(app.store.toJSON()).toEqual(removed);
        });
    });
});
