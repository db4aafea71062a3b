import { createInterface, type Interface } from 'node:readline';
import { ABORT_SENTINELS } from '@tally/shared';
import { AbortError, QuitSignal } from '../errors.js';
import type { Interaction } from '../command/command.js';

/**
 * Line input for the loop and for prompts inside commands. A closed input
 * rejects with QuitSignal.
 */
export interface Prompter {
    question(prompt: string): Promise<string>;
    /** Re-print the current prompt after the screen was redrawn under it. */
    redisplay(): void;
    close(): void;
}

/**
 * Prompter on a readline interface. Ctrl-C closes the input.
 */
export class ReadlinePrompter implements Prompter {
    private readonly rl: Interface;
    private closed = false;
    private pending: ((error: Error) => void) | undefined;

    constructor(input: NodeJS.ReadableStream = process.stdin, output: NodeJS.WritableStream = process.stdout) {
        this.rl = createInterface({ input, output });
        this.rl.on('SIGINT', () => this.rl.close());
        this.rl.on('close', () => {
            this.closed = true;
            this.pending?.(new QuitSignal());
            this.pending = undefined;
        });
    }

    question(prompt: string): Promise<string> {
        if (this.closed) {
            return Promise.reject(new QuitSignal());
        }
        return new Promise((resolve, reject) => {
            this.pending = reject;
            this.rl.question(prompt, (answer) => {
                this.pending = undefined;
                resolve(answer);
            });
        });
    }

    redisplay(): void {
        if (!this.closed) {
            this.rl.prompt(true);
        }
    }

    close(): void {
        if (!this.closed) {
            this.rl.close();
        }
    }
}

/**
 * Answers from a fixed list, for scripted sessions and tests. Running out of
 * answers behaves like closed input.
 */
export class ScriptedPrompter implements Prompter {
    readonly asked: string[] = [];
    private readonly answers: string[];

    constructor(answers: readonly string[]) {
        this.answers = [...answers];
    }

    question(prompt: string): Promise<string> {
        this.asked.push(prompt);
        const answer = this.answers.shift();
        if (answer === undefined) {
            return Promise.reject(new QuitSignal());
        }
        return Promise.resolve(answer);
    }

    redisplay(): void {}

    close(): void {
        this.answers.length = 0;
    }
}

export function isAbort(answer: string): boolean {
    const normalized = answer.trim().toLowerCase();
    return ABORT_SENTINELS.some(sentinel => sentinel === normalized);
}

/**
 * Ask until parse() accepts the answer. A rejected answer shows `invalid`
 * (or what it returns for that answer) on the message line before asking
 * again; an abort sentinel throws AbortError.
 */
export async function askUntilValid<T>(
    io: Interaction,
    question: string,
    parse: (answer: string) => T | undefined,
    invalid: string | ((answer: string) => string) = 'Invalid input.'
): Promise<T> {
    for (;;) {
        const answer = (await io.ask(question)).trim();
        if (isAbort(answer)) {
            throw new AbortError();
        }
        const value = parse(answer);
        if (value !== undefined) {
            return value;
        }
        io.say(typeof invalid === 'string' ? invalid : invalid(answer));
    }
}

/**
 * Yes/no question. Anything but y or yes is a no.
 */
export async function confirm(io: Interaction, question: string): Promise<boolean> {
    const answer = (await io.ask(`${question} [y/N] `)).trim().toLowerCase();
    if (isAbort(answer)) {
        throw new AbortError();
    }
    return answer === 'y' || answer === 'yes';
}
