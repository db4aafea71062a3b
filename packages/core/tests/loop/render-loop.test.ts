import { describe, it, expect } from 'vitest';
import { Command, ReversibleCommand, defineCommand } from '../../src/command/command.js';
import { IntegerValidator, isDigits } from '../../src/validator/builtin.js';
import { askUntilValid } from '../../src/loop/prompt.js';
import { createHarness, type Harness } from '../support/session.js';

interface Counter {
    value: number;
    pendingSeen: boolean[];
}

class Increment extends ReversibleCommand<Counter> {
    readonly amount = this.param('amount', new IntegerValidator(), { required: true });

    execute(): void {
        this.state.value += this.amount;
    }

    undo(): void {
        this.state.value -= this.amount;
    }

    redo(): void {
        this.execute();
    }
}

class Ask extends Command<Counter> {
    async execute(): Promise<void> {
        const amount = await askUntilValid(this.session.io, 'Amount: ', answer =>
            isDigits(answer) ? Number(answer) : undefined
        );
        this.state.value += amount;
    }
}

class Pick extends Command<Counter> {
    readonly line = this.param('line', new IntegerValidator(), { required: true });

    execute(): void {
        this.session.screens.select(this.line);
    }
}

class Crash extends Command<Counter> {
    execute(): void {
        throw new Error('disk full');
    }
}

function setup(answers: string[], initCommand?: string): { harness: Harness<Counter>; state: Counter } {
    const state: Counter = { value: 0, pendingSeen: [] };
    const harness = createHarness(state, { answers, initCommand });
    harness.commands.register(
        defineCommand<Counter>(Increment, { names: ['inc'], description: 'Increment.' }),
        defineCommand<Counter>(Ask, { names: ['ask'], description: 'Prompt for an amount.' }),
        defineCommand<Counter>(Pick, { names: ['pick'], description: 'Select a line.' }),
        defineCommand<Counter>(Crash, { names: ['crash'], description: 'Fail.' })
    );
    return { harness, state };
}

const lastLine = (frame: string[] | undefined) => frame?.[frame.length - 1];

describe('RenderLoop', () => {
    it('should route each line and redraw after it', async () => {
        const { harness, state } = setup(['inc 2', 'bogus', 'quit']);
        await harness.loop.run();

        expect(state.value).toBe(2);
        expect(harness.frames).toHaveLength(3);
        expect(lastLine(harness.frames[2])).toBe('Command not found.'.padEnd(60));
        expect(harness.prompter.asked).toEqual(['> ', '> ', '> ']);
    });

    it('should route the initial command before the first prompt', async () => {
        const { harness, state } = setup([], 'inc 5');
        await harness.loop.run();

        expect(state.value).toBe(5);
        expect(harness.frames).toHaveLength(1);
    });

    it('should add the help hint to missing input', async () => {
        const { harness } = setup(['inc']);
        await harness.loop.run();

        expect(lastLine(harness.frames.at(-1))).toBe(
            "Missing required input: amount; Try 'help' if you're having trouble.".padEnd(60)
        );
    });

    it('should re-ask until the answer is valid, and abort on q', async () => {
        const { harness, state } = setup(['ask', 'ten', 'q']);
        await harness.loop.run();

        expect(state.value).toBe(0);
        expect(harness.prompter.asked).toEqual(['> ', 'Amount: ', 'Amount: ', '> ']);
        expect(lastLine(harness.frames[1])).toBe('Invalid input.'.padEnd(60));
        expect(lastLine(harness.frames.at(-1))).toBe('Input aborted.'.padEnd(60));
    });

    it('should show display errors on a cleared screen', async () => {
        const { harness } = setup(['pick 4']);
        await harness.loop.run();

        expect(lastLine(harness.frames.at(-1))).toBe('Invalid line selection.'.padEnd(60));
    });

    it('should end when input closes', async () => {
        const { harness } = setup([]);
        await harness.loop.run();

        expect(harness.frames).toHaveLength(1);
        expect(harness.loop.watcher.running).toBe(false);
    });

    it('should propagate unexpected errors and stop the watcher', async () => {
        const { harness } = setup(['crash']);

        await expect(harness.loop.run()).rejects.toThrow('disk full');
        expect(harness.loop.watcher.running).toBe(false);
    });

    it('should redraw at once on resize while idle', () => {
        const { harness } = setup([]);
        harness.size.rows = 20;

        expect(harness.loop.watcher.poll()).toBe(true);
        expect(harness.frames).toHaveLength(1);
        expect(harness.frames[0]).toHaveLength(19);
    });

    it('should keep the last message through a resize', async () => {
        const { harness } = setup([]);
        await harness.loop.dispatch('bogus');

        harness.size.rows = 20;
        harness.loop.watcher.poll();
        expect(lastLine(harness.frames[1])).toBe('Command not found.'.padEnd(60));

        await harness.loop.dispatch('inc 1');
        expect(lastLine(harness.frames[2])).toBe(''.padEnd(60));
    });

    it('should hold a resize redraw until the running command finishes', async () => {
        const { harness, state } = setup([]);
        class Resize extends Command<Counter> {
            execute(): void {
                harness.size.rows = 20;
                harness.loop.watcher.poll();
                state.pendingSeen.push(harness.loop.pendingRedraw);
            }
        }
        harness.commands.register(defineCommand<Counter>(Resize, { names: ['resize'], description: 'Resize.' }));

        await harness.loop.dispatch('resize');

        expect(state.pendingSeen).toEqual([true]);
        expect(harness.frames).toHaveLength(1);
        expect(harness.loop.pendingRedraw).toBe(false);
    });
});
