/**
 * Command registry, routing and the undo/redo stacks.
 */

import { SHORTCUT_PREFIX } from '@tally/shared';
import { CommandConfigError, RoutingError } from '../errors.js';
import type { ScreenController } from '../display/screen-controller.js';
import { splitArgs } from '../tokens/split.js';
import { TokenList } from '../tokens/token-list.js';
import {
    isReversible,
    type Command,
    type CommandDefinition,
    type LeafDefinition,
    type ReversibleCommand,
    type Session,
} from './command.js';

export interface SavedShortcut {
    name: string;
    command: string;
}

/**
 * Persistence for shortcuts, supplied by the application. Each stored
 * shortcut has a key; passing a removed shortcut's key back to `add`
 * restores it as it was.
 */
export interface ShortcutStore {
    list(): SavedShortcut[];
    get(name: string): string | undefined;
    add(name: string, command: string, key?: number): number;
    /** The key the shortcut was stored under, if it existed. */
    remove(name: string): number | undefined;
}

export interface UndoFrame<S> {
    command: ReversibleCommand<S>;
    input: string;
}

export interface CommandControllerOptions {
    screens: ScreenController;
    shortcuts?: ShortcutStore;
}

export class CommandController<S> {
    readonly shortcuts: ShortcutStore | undefined;
    private readonly screens: ScreenController;
    private readonly registry = new Map<string, CommandDefinition<S>>();
    private readonly registered: CommandDefinition<S>[] = [];
    private readonly undoStack: UndoFrame<S>[] = [];
    private readonly redoStack: UndoFrame<S>[] = [];

    constructor(options: CommandControllerOptions) {
        this.screens = options.screens;
        this.shortcuts = options.shortcuts;
    }

    /**
     * Add top-level definitions. Screens named by leaf commands must already
     * exist.
     */
    register(...definitions: CommandDefinition<S>[]): void {
        for (const definition of definitions) {
            if (definition.names.length === 0) {
                throw new CommandConfigError(`Command needs at least one name: ${definition.description}`);
            }
            this.check(definition);

            for (const name of definition.names) {
                const trigger = normalizeName(name);
                if (this.registry.has(trigger)) {
                    throw new CommandConfigError(`Command name already registered: ${trigger}`);
                }
                this.registry.set(trigger, definition);
            }
            this.registered.push(definition);
        }
    }

    private check(definition: CommandDefinition<S>): void {
        definition.names.forEach(normalizeName);

        switch (definition.kind) {
            case 'command':
                if (definition.screen !== undefined && !this.screens.has(definition.screen)) {
                    throw new CommandConfigError(`Unknown screen '${definition.screen}' for command: ${definition.description}`);
                }
                return;
            case 'fork':
            case 'contextual':
                if (definition.default !== undefined && !(definition.default in definition.forks)) {
                    throw new CommandConfigError(`Default fork '${definition.default}' is not one of the forks.`);
                }
                Object.values(definition.forks).forEach(fork => this.check(fork));
                return;
            case 'probe':
                definition.branches.forEach(branch => this.check(branch.command));
                if (definition.default) this.check(definition.default);
                return;
        }
    }

    /** Registered top-level definitions, in registration order. */
    definitions(): readonly CommandDefinition<S>[] {
        return this.registered;
    }

    triggers(): string[] {
        return [...this.registry.keys()];
    }

    find(trigger: string): CommandDefinition<S> | undefined {
        return this.registry.get(trigger.toLowerCase());
    }

    /**
     * Split a line and expand a leading /shortcut. Extra words after the
     * shortcut are appended to its stored command.
     */
    tokenize(input: string): string[] {
        const words = splitArgs(input);
        const first = words[0];
        if (first === undefined || !first.startsWith(SHORTCUT_PREFIX)) {
            return words;
        }

        const command = this.shortcuts?.get(first.slice(SHORTCUT_PREFIX.length));
        if (command === undefined) {
            throw new RoutingError('shortcut', "That shortcut doesn't exist.", words);
        }
        const expanded = splitArgs(command);
        if (expanded[0]?.startsWith(SHORTCUT_PREFIX)) {
            throw new RoutingError('shortcut', 'A shortcut cannot run another shortcut.', words);
        }
        return [...expanded, ...words.slice(1)];
    }

    /**
     * Resolve a definition down to a leaf, consuming fork names from the
     * token list as they are used.
     */
    resolve(definition: CommandDefinition<S>, tokens: TokenList): LeafDefinition<S> {
        let current = definition;

        for (;;) {
            switch (current.kind) {
                case 'command':
                    return current;

                case 'fork': {
                    const next = tokens.peek()?.toLowerCase();
                    if (next !== undefined && Object.hasOwn(current.forks, next)) {
                        tokens.shift();
                        current = current.forks[next];
                    } else if (current.default !== undefined) {
                        current = current.forks[current.default];
                    } else {
                        throw new RoutingError('unresolved-fork', 'No branches matched.', tokens.remaining());
                    }
                    break;
                }

                case 'contextual': {
                    const key = this.screens.active.name;
                    if (Object.hasOwn(current.forks, key)) {
                        current = current.forks[key];
                    } else if (current.default !== undefined) {
                        current = current.forks[current.default];
                    } else {
                        throw new RoutingError('unresolved-fork', 'That command is not available on this screen.', tokens.remaining());
                    }
                    break;
                }

                case 'probe': {
                    const branch = current.branches.find(b => b.when.test(tokens));
                    if (branch) {
                        current = branch.command;
                    } else if (current.default) {
                        current = current.default;
                    } else {
                        throw new RoutingError('unresolved-fork', 'No branches matched.', tokens.remaining());
                    }
                    break;
                }
            }
        }
    }

    /**
     * Route one input line: resolve, construct, check for leftovers, switch
     * screen, execute, and record reversible commands.
     */
    async route(input: string, session: Session<S>): Promise<Command<S>> {
        const words = this.tokenize(input);
        if (words.length === 0 || words[0] === '') {
            throw new RoutingError('empty', "Try 'help' if you're having trouble.");
        }

        const tokens = new TokenList(words);
        const trigger = tokens.shift() ?? '';
        const definition = this.find(trigger);
        if (!definition) {
            throw new RoutingError('not-found', 'Command not found.', [trigger]);
        }

        const leaf = this.resolve(definition, tokens);
        const command = leaf.create({ tokens, session });

        const leftover = tokens.remaining();
        if (leftover.length > 0) {
            throw new RoutingError('leftover', `Unrecognized input: ${leftover.join(', ')}`, leftover);
        }

        if (leaf.screen !== undefined) {
            this.screens.switchTo(leaf.screen);
        }
        await command.execute();

        if (isReversible(command)) {
            this.undoStack.push({ command, input: input.trim() });
            this.redoStack.length = 0;
        }
        return command;
    }

    async undo(): Promise<void> {
        const frame = this.undoStack.pop();
        if (!frame) {
            this.screens.message('Nothing to undo');
            return;
        }
        try {
            await frame.command.undo();
        } catch (err) {
            this.undoStack.push(frame);
            throw err;
        }
        this.redoStack.push(frame);
        this.screens.message(`Undid "${frame.input}".`);
    }

    async redo(): Promise<void> {
        const frame = this.redoStack.pop();
        if (!frame) {
            this.screens.message('Nothing to redo');
            return;
        }
        try {
            await frame.command.redo();
        } catch (err) {
            this.redoStack.push(frame);
            throw err;
        }
        this.undoStack.push(frame);
        this.screens.message(`Redid "${frame.input}".`);
    }

    get undoDepth(): number {
        return this.undoStack.length;
    }

    get redoDepth(): number {
        return this.redoStack.length;
    }
}

function normalizeName(name: string): string {
    if (name.trim() === '' || /\s/.test(name)) {
        throw new CommandConfigError('Invalid command name format.');
    }
    return name.toLowerCase();
}
