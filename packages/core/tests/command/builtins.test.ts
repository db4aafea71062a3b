import { describe, it, expect, beforeEach } from 'vitest';
import { installBuiltins } from '../../src/command/builtins.js';
import { QuitSignal } from '../../src/errors.js';
import { createHarness, type Harness } from '../support/session.js';

describe('built-in commands', () => {
    let harness: Harness<object>;

    const route = (input: string) => harness.commands.route(input, harness.loop.session);
    const bodyOf = (name: string) => harness.screens.get(name).body.lines().map(l => l.text);

    beforeEach(() => {
        harness = createHarness({}, { size: { columns: 120, rows: 40 } });
        installBuiltins(harness.commands, harness.screens);
    });

    it('should add the help and shortcuts screens', () => {
        expect(harness.screens.names()).toEqual(['main', 'help', 'shortcuts']);
    });

    it('should list every command on the help screen', async () => {
        await route('help');

        expect(harness.screens.active.name).toBe('help');
        expect(bodyOf('help')[0]).toBe(`${'undo'.padEnd(22)} Undo the last command that changed something.`);
        expect(bodyOf('help')).toHaveLength(8);
    });

    it('should explain a single command', async () => {
        await route('help PAGE');

        expect(harness.screens.get('help').header.render(120)).toEqual(['page']);
        expect(bodyOf('help')).toEqual([
            'Go to a page of the current screen.',
            'Usage: page <number>',
            '',
            'Examples:',
            '  page 2',
            '      Show the second page.',
        ]);
    });

    it('should change the page of the active screen', async () => {
        for (let i = 0; i < 100; i++) harness.screens.push(`line ${i}`);
        await route('page 2');

        expect(harness.screens.active.body.page).toBe(2);
    });

    it('should quit', async () => {
        await expect(route('quit')).rejects.toThrow(QuitSignal);
        await expect(route('q')).rejects.toThrow('User quit program.');
    });

    describe('shortcuts', () => {
        it('should add a shortcut reversibly', async () => {
            await route('+/ h help page');
            expect(harness.shortcuts.get('h')).toBe('help page');
            expect(harness.screens.active.message).toBe('Added shortcut /h.');

            await harness.commands.undo();
            expect(harness.shortcuts.get('h')).toBeUndefined();

            await harness.commands.redo();
            expect(harness.shortcuts.get('h')).toBe('help page');
            expect(harness.shortcuts.keyOf('h')).toBe(1);
        });

        it('should refuse a shortcut to an unknown command', async () => {
            await expect(route('+/ h launch')).rejects.toThrow('Command not found.');
        });

        it('should refuse to overwrite a shortcut', async () => {
            await route('+/ h help');
            await expect(route('+/ h undo')).rejects.toThrow('Shortcut already exists: h');
        });

        it('should remove a shortcut reversibly', async () => {
            harness.shortcuts.add('h', 'help');
            await route('-/ h');
            expect(harness.shortcuts.list()).toEqual([]);

            await harness.commands.undo();
            expect(harness.shortcuts.get('h')).toBe('help');
            expect(harness.shortcuts.keyOf('h')).toBe(1);

            await harness.commands.redo();
            expect(harness.shortcuts.list()).toEqual([]);
        });

        it('should list shortcuts on their own screen', async () => {
            harness.shortcuts.add('h', 'help page');
            await route('shortcuts');

            expect(harness.screens.active.name).toBe('shortcuts');
            expect(bodyOf('shortcuts')).toEqual([`${'/h'.padEnd(12)} help page`]);
        });
    });
});
