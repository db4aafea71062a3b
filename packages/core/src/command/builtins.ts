/**
 * Commands every application gets: history, paging, help, quitting and
 * shortcuts.
 */

import { SCREENS, SHORTCUT_PREFIX } from '@tally/shared';
import { CommandError, QuitSignal } from '../errors.js';
import type { ScreenController } from '../display/screen-controller.js';
import type { Screen } from '../display/screen.js';
import { AnyValidator, IntegerValidator, LiteralValidator, ShortcutNameValidator } from '../validator/builtin.js';
import { Command, ReversibleCommand, defineCommand, type CommandDefinition, type Session } from './command.js';
import type { CommandController, ShortcutStore } from './controller.js';

class UndoCommand<S> extends Command<S> {
    async execute(): Promise<void> {
        await this.session.commands.undo();
    }
}

class RedoCommand<S> extends Command<S> {
    async execute(): Promise<void> {
        await this.session.commands.redo();
    }
}

class QuitCommand<S> extends Command<S> {
    execute(): void {
        throw new QuitSignal();
    }
}

class PageCommand<S> extends Command<S> {
    readonly page = this.param('page', new IntegerValidator(), { required: true });

    execute(): void {
        this.session.screens.changePage(this.page);
    }
}

class HelpCommand<S> extends Command<S> {
    readonly topic = this.param(
        'command',
        new LiteralValidator(() => this.session.commands.triggers(), { lower: true })
    );

    execute(): void {
        const screen = this.session.screens.get(SCREENS.HELP);
        const { commands } = this.session;

        if (this.topic === undefined) {
            screen.pushHeader('Commands (type "help <command>" for details)');
            for (const definition of commands.definitions()) {
                screen.push(`${definition.names.join(', ').padEnd(22)} ${definition.description}`, definition);
            }
            return;
        }

        const definition = commands.find(this.topic);
        if (definition) {
            describe(screen, definition);
        }
    }
}

function describe<S>(screen: Screen, definition: CommandDefinition<S>): void {
    screen.pushHeader(definition.names.join(' | '));
    screen.push(definition.description);
    if (definition.usage) {
        screen.push(`Usage: ${definition.usage}`);
    }

    switch (definition.kind) {
        case 'fork':
        case 'contextual': {
            const label = definition.kind === 'fork' ? 'Forms' : 'By screen';
            screen.push('');
            screen.push(`${label}:`);
            for (const [key, fork] of Object.entries(definition.forks)) {
                const marker = key === definition.default ? ' (default)' : '';
                screen.push(`  ${key}${marker}: ${fork.usage ?? fork.description}`);
            }
            break;
        }
        case 'probe':
            screen.push('');
            screen.push('Forms:');
            for (const branch of definition.branches) {
                screen.push(`  ${branch.label}: ${branch.command.usage ?? branch.command.description}`);
            }
            if (definition.default) {
                screen.push(`  otherwise: ${definition.default.usage ?? definition.default.description}`);
            }
            break;
        case 'command':
            break;
    }

    if (definition.examples && definition.examples.length > 0) {
        screen.push('');
        screen.push('Examples:');
        for (const example of definition.examples) {
            screen.push(`  ${example.text}`);
            screen.push(`      ${example.subtext}`);
        }
    }
}

function shortcutStore<S>(session: Session<S>): ShortcutStore {
    const store = session.commands.shortcuts;
    if (!store) {
        throw new CommandError('Shortcuts are not available.');
    }
    return store;
}

class AddShortcutCommand<S> extends ReversibleCommand<S> {
    readonly name = this.param('name', new ShortcutNameValidator(), { required: true });
    readonly words = this.param('command', new AnyValidator(), { plural: true, required: true });
    private key: number | undefined;

    private get command(): string {
        return this.words.join(' ');
    }

    execute(): void {
        const store = shortcutStore(this.session);
        if (store.get(this.name) !== undefined) {
            throw new CommandError(`Shortcut already exists: ${this.name}`);
        }
        const trigger = this.words[0];
        if (trigger === undefined || this.session.commands.find(trigger) === undefined) {
            throw new CommandError('Command not found.');
        }
        this.key = store.add(this.name, this.command);
        this.session.screens.message(`Added shortcut ${SHORTCUT_PREFIX}${this.name}.`);
    }

    undo(): void {
        shortcutStore(this.session).remove(this.name);
    }

    redo(): void {
        shortcutStore(this.session).add(this.name, this.command, this.key);
    }
}

class RemoveShortcutCommand<S> extends ReversibleCommand<S> {
    readonly name = this.param(
        'name',
        new LiteralValidator(() => this.session.commands.shortcuts?.list().map(s => s.name) ?? [], { strict: true }),
        { required: true }
    );
    private command = '';
    private key: number | undefined;

    execute(): void {
        const store = shortcutStore(this.session);
        this.command = store.get(this.name) ?? '';
        this.key = store.remove(this.name);
        this.session.screens.message(`Removed shortcut ${SHORTCUT_PREFIX}${this.name}.`);
    }

    undo(): void {
        shortcutStore(this.session).add(this.name, this.command, this.key);
    }

    redo(): void {
        shortcutStore(this.session).remove(this.name);
    }
}

class ShortcutsCommand<S> extends Command<S> {
    execute(): void {
        const screen = this.session.screens.get(SCREENS.SHORTCUTS);
        screen.pushHeader('SHORTCUT     COMMAND');
        const shortcuts = shortcutStore(this.session).list();
        if (shortcuts.length === 0) {
            screen.push('No shortcuts yet. Add one with "+/ <name> <command>".');
        }
        for (const shortcut of shortcuts) {
            screen.push(`${(SHORTCUT_PREFIX + shortcut.name).padEnd(12)} ${shortcut.command}`, shortcut);
        }
    }
}

export function builtinCommands<S>(): CommandDefinition<S>[] {
    return [
        defineCommand<S>(UndoCommand, {
            names: ['undo'],
            description: 'Undo the last command that changed something.',
        }),
        defineCommand<S>(RedoCommand, {
            names: ['redo'],
            description: 'Redo the last undone command.',
        }),
        defineCommand<S>(QuitCommand, {
            names: ['q', 'quit'],
            description: 'Quit the program.',
        }),
        defineCommand<S>(PageCommand, {
            names: ['page'],
            description: 'Go to a page of the current screen.',
            usage: 'page <number>',
            examples: [{ text: 'page 2', subtext: 'Show the second page.' }],
        }),
        defineCommand<S>(HelpCommand, {
            names: ['help'],
            description: 'List commands, or explain one.',
            usage: 'help [command]',
            screen: SCREENS.HELP,
            examples: [{ text: 'help add', subtext: 'Explain the add command.' }],
        }),
        defineCommand<S>(AddShortcutCommand, {
            names: ['+/'],
            description: 'Save a command line under a short name.',
            usage: '+/ <name> <command...>',
            examples: [{ text: '+/ food list food', subtext: 'Typing /food now runs "list food".' }],
        }),
        defineCommand<S>(RemoveShortcutCommand, {
            names: ['-/'],
            description: 'Remove a shortcut.',
            usage: '-/ <name>',
        }),
        defineCommand<S>(ShortcutsCommand, {
            names: ['shortcuts'],
            description: 'List saved shortcuts.',
            screen: SCREENS.SHORTCUTS,
        }),
    ];
}

/**
 * Add the help and shortcuts screens (unless the application already has
 * them) and register the built-in commands.
 */
export function installBuiltins<S>(commands: CommandController<S>, screens: ScreenController): void {
    if (!screens.has(SCREENS.HELP)) {
        screens.add({ name: SCREENS.HELP });
    }
    if (!screens.has(SCREENS.SHORTCUTS)) {
        screens.add({ name: SCREENS.SHORTCUTS, numbered: true });
    }
    commands.register(...builtinCommands<S>());
}
