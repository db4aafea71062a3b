import { CommandController, type SavedShortcut, type ShortcutStore } from '../../src/command/controller.js';
import { ScreenController } from '../../src/display/screen-controller.js';
import type { TerminalSize } from '../../src/display/lines.js';
import { ScriptedPrompter } from '../../src/loop/prompt.js';
import { RenderLoop } from '../../src/loop/render-loop.js';

export class MemoryShortcuts implements ShortcutStore {
    private readonly entries = new Map<string, { command: string; key: number }>();
    private nextKey = 1;

    list(): SavedShortcut[] {
        return [...this.entries].map(([name, { command }]) => ({ name, command }));
    }

    get(name: string): string | undefined {
        return this.entries.get(name)?.command;
    }

    keyOf(name: string): number | undefined {
        return this.entries.get(name)?.key;
    }

    add(name: string, command: string, key?: number): number {
        const stored = key ?? this.nextKey++;
        this.entries.set(name, { command, key: stored });
        return stored;
    }

    remove(name: string): number | undefined {
        const key = this.entries.get(name)?.key;
        this.entries.delete(name);
        return key;
    }
}

export interface Harness<S> {
    loop: RenderLoop<S>;
    screens: ScreenController;
    commands: CommandController<S>;
    prompter: ScriptedPrompter;
    shortcuts: MemoryShortcuts;
    size: TerminalSize;
    frames: string[][];
}

/**
 * A loop wired to an in-memory terminal with the named screens.
 */
export function createHarness<S>(
    state: S,
    options: { answers?: string[]; size?: TerminalSize; screens?: string[]; initCommand?: string } = {}
): Harness<S> {
    const size = options.size ?? { columns: 60, rows: 12 };
    const frames: string[][] = [];
    const screens = new ScreenController({ size: () => size });
    for (const name of options.screens ?? ['main']) {
        screens.add({ name });
    }
    const shortcuts = new MemoryShortcuts();
    const commands = new CommandController<S>({ screens, shortcuts });
    const prompter = new ScriptedPrompter(options.answers ?? []);
    const loop = new RenderLoop<S>({
        state,
        screens,
        commands,
        prompter,
        terminal: { size: () => size, draw: lines => frames.push(lines) },
        initCommand: options.initCommand,
    });
    return { loop, screens, commands, prompter, shortcuts, size, frames };
}
