/**
 * The interactive loop: read a line, route it, redraw the active screen.
 *
 * The loop is the only writer of the terminal. Resize notifications from
 * the watcher redraw right away when the loop is idle; while a command is
 * running they are held until it finishes.
 */

import { clearScreenDown, cursorTo } from 'node:readline';
import { LOOP } from '@tally/shared';
import type { Session } from '../command/command.js';
import type { CommandController } from '../command/controller.js';
import { CommandError, DisplayError, QuitSignal, ValidationError } from '../errors.js';
import type { TerminalSize } from '../display/lines.js';
import type { RenderOptions } from '../display/screen.js';
import type { ScreenController } from '../display/screen-controller.js';
import type { Prompter } from './prompt.js';
import { ResizeWatcher } from './resize-watcher.js';

export interface Terminal {
    size(): TerminalSize;
    draw(lines: string[]): void;
}

/**
 * Terminal on a TTY stream. Non-TTY streams report 80x24.
 */
export function createStreamTerminal(stream: NodeJS.WriteStream = process.stdout): Terminal {
    return {
        size: () => ({ columns: stream.columns ?? 80, rows: stream.rows ?? 24 }),
        draw: (lines) => {
            cursorTo(stream, 0, 0);
            clearScreenDown(stream);
            stream.write(lines.join('\n') + '\n');
        },
    };
}

export interface RenderLoopOptions<S> {
    state: S;
    screens: ScreenController;
    commands: CommandController<S>;
    prompter: Prompter;
    terminal: Terminal;
    pollIntervalMs?: number;
    /** Routed before the first prompt, e.g. "list". */
    initCommand?: string;
}

export class RenderLoop<S> {
    readonly session: Session<S>;
    readonly watcher: ResizeWatcher;
    private readonly screens: ScreenController;
    private readonly commands: CommandController<S>;
    private readonly prompter: Prompter;
    private readonly terminal: Terminal;
    private readonly initCommand: string | undefined;
    private busy = false;
    private redrawPending = false;

    constructor(options: RenderLoopOptions<S>) {
        this.screens = options.screens;
        this.commands = options.commands;
        this.prompter = options.prompter;
        this.terminal = options.terminal;
        this.initCommand = options.initCommand;

        this.session = {
            state: options.state,
            screens: options.screens,
            commands: options.commands,
            io: {
                ask: question => this.prompter.question(question),
                redraw: () => this.redraw(),
                say: (message) => {
                    this.screens.message(message);
                    this.redraw();
                },
            },
        };

        this.watcher = new ResizeWatcher(() => this.terminal.size(), options.pollIntervalMs);
        this.watcher.onResize(() => this.handleResize());
    }

    get pendingRedraw(): boolean {
        return this.redrawPending;
    }

    redraw(options?: RenderOptions): void {
        this.terminal.draw(this.screens.render(options));
    }

    private handleResize(): void {
        if (this.busy) {
            this.redrawPending = true;
            return;
        }
        this.redraw({ keepMessage: true });
        this.prompter.redisplay();
    }

    /**
     * Route one line and report the outcome on the active screen. Returns
     * false once the user has quit.
     */
    async dispatch(input: string): Promise<boolean> {
        // A message kept across a resize is spent once the next line is read.
        this.screens.message('');
        this.busy = true;
        try {
            await this.commands.route(input, this.session);
        } catch (error) {
            if (error instanceof QuitSignal) {
                return false;
            }
            this.report(error);
        } finally {
            this.busy = false;
            this.redrawPending = false;
        }
        this.redraw();
        return true;
    }

    private report(error: unknown): void {
        if (error instanceof ValidationError) {
            this.screens.message(`${error.message}; ${LOOP.HELP_HINT}`);
        } else if (error instanceof CommandError) {
            this.screens.message(error.message);
        } else if (error instanceof DisplayError) {
            this.screens.error(error);
        } else {
            throw error;
        }
    }

    /**
     * Run until quit or closed input. Unexpected errors end the loop and
     * propagate.
     */
    async run(): Promise<void> {
        this.watcher.start();
        try {
            if (this.initCommand !== undefined) {
                if (!(await this.dispatch(this.initCommand))) return;
            } else {
                this.redraw();
            }

            for (;;) {
                let line: string;
                try {
                    line = await this.prompter.question(LOOP.PROMPT);
                } catch (error) {
                    if (error instanceof QuitSignal) return;
                    throw error;
                }
                if (!(await this.dispatch(line))) return;
            }
        } finally {
            this.watcher.stop();
            this.prompter.close();
        }
    }
}
