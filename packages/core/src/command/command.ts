/**
 * Commands and command definitions.
 *
 * A definition is what the registry stores: a tagged union describing how a
 * trigger word resolves to a concrete command. A command is one invocation,
 * constructed with its fields already validated.
 */

import type { TokenList } from '../tokens/token-list.js';
import type { ScreenController } from '../display/screen-controller.js';
import type { Validator, ParamOptions } from '../validator/validator.js';
import { bindParam } from '../validator/validator.js';
import { UnsupportedOperationError } from '../errors.js';
import type { CommandController } from './controller.js';

/**
 * Terminal interaction available to commands while they run.
 */
export interface Interaction {
    /** Read one line of input after showing the question. */
    ask(question: string): Promise<string>;
    /** Refresh and redraw the active screen. */
    redraw(): void;
    /** Show a message on the active screen and redraw it. */
    say(message: string): void;
}

/**
 * Everything a command may touch. Passed explicitly instead of living in
 * module-level singletons.
 */
export interface Session<S> {
    readonly state: S;
    readonly screens: ScreenController;
    readonly commands: CommandController<S>;
    readonly io: Interaction;
}

export interface CommandInput<S> {
    tokens: TokenList;
    session: Session<S>;
}

/**
 * An irreversible command. Fields are declared as property initializers
 * with this.param(), so they bind in declaration order while the command is
 * constructed; a failed bind aborts construction before anything executes.
 */
export abstract class Command<S> {
    readonly kind: 'irreversible' | 'reversible' = 'irreversible';
    protected readonly session: Session<S>;
    private readonly tokens: TokenList;

    constructor(input: CommandInput<S>) {
        this.session = input.session;
        this.tokens = input.tokens;
    }

    protected get state(): S {
        return this.session.state;
    }

    protected param<T>(name: string, validator: Validator<T>, options: { plural: true; required?: boolean; default?: T[] }): T[];
    protected param<T>(name: string, validator: Validator<T>, options: { required: true; plural?: false }): T;
    protected param<T, D>(name: string, validator: Validator<T>, options: { default: D; required?: false }): T | D;
    protected param<T>(name: string, validator: Validator<T>, options?: ParamOptions): T | undefined;
    protected param<T, D>(name: string, validator: Validator<T>, options: ParamOptions<D> = {}): T | T[] | D | undefined {
        return bindParam(this.tokens, name, validator, options);
    }

    abstract execute(): void | Promise<void>;

    /** Irreversible commands cannot be undone; they are never recorded. */
    undo(): void | Promise<void> {
        throw new UnsupportedOperationError('Undo has not been implemented.');
    }

    redo(): void | Promise<void> {
        throw new UnsupportedOperationError('Redo has not been implemented.');
    }
}

/**
 * A command that captures enough state during execute() to reverse and
 * reapply its effect. Only these are kept on the undo stack.
 */
export abstract class ReversibleCommand<S> extends Command<S> {
    override readonly kind = 'reversible';

    abstract override undo(): void | Promise<void>;
    abstract override redo(): void | Promise<void>;
}

export function isReversible<S>(command: Command<S>): command is ReversibleCommand<S> {
    return command.kind === 'reversible';
}

export interface Example {
    text: string;
    subtext: string;
}

interface DefinitionInfo {
    /** Trigger words. Fork branches may have none. */
    names: readonly string[];
    description: string;
    usage?: string;
    examples?: readonly Example[];
}

export interface LeafDefinition<S> extends DefinitionInfo {
    kind: 'command';
    /** Screen switched to before execute(). */
    screen?: string;
    create(input: CommandInput<S>): Command<S>;
}

/** Second token picks the branch. */
export interface ForkDefinition<S> extends DefinitionInfo {
    kind: 'fork';
    forks: Readonly<Record<string, CommandDefinition<S>>>;
    default?: string;
}

/** Active screen name picks the branch. */
export interface ContextualDefinition<S> extends DefinitionInfo {
    kind: 'contextual';
    forks: Readonly<Record<string, CommandDefinition<S>>>;
    default?: string;
}

export interface ProbeBranch<S> {
    label: string;
    when: Validator<unknown>;
    command: CommandDefinition<S>;
}

/** First branch whose validator accepts any pending token. Claims nothing. */
export interface ProbeDefinition<S> extends DefinitionInfo {
    kind: 'probe';
    branches: readonly ProbeBranch<S>[];
    default?: CommandDefinition<S>;
}

export type CommandDefinition<S> =
    | LeafDefinition<S>
    | ForkDefinition<S>
    | ContextualDefinition<S>
    | ProbeDefinition<S>;

export type CommandClass<S> = new (input: CommandInput<S>) => Command<S>;

/**
 * Build a leaf definition from a command class.
 */
export function defineCommand<S>(
    commandClass: CommandClass<S>,
    info: Omit<LeafDefinition<S>, 'kind' | 'create' | 'names'> & { names?: readonly string[] }
): LeafDefinition<S> {
    return {
        ...info,
        kind: 'command',
        names: info.names ?? [],
        create: input => new commandClass(input),
    };
}
