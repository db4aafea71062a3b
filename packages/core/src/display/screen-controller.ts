import { CommandConfigError, DisplayError } from '../errors.js';
import type { TerminalSize } from './lines.js';
import { Screen, type RenderOptions, type ScreenOptions } from './screen.js';
import { createPalette, type Palette } from './style.js';

export interface ScreenControllerOptions {
    size: () => TerminalSize;
    palette?: Palette;
}

/**
 * Owns every screen and knows which one is active. The first screen added
 * becomes active.
 */
export class ScreenController {
    readonly palette: Palette;
    private readonly size: () => TerminalSize;
    private readonly screens = new Map<string, Screen>();
    private activeName: string | undefined;

    constructor(options: ScreenControllerOptions) {
        this.size = options.size;
        this.palette = options.palette ?? createPalette(false);
    }

    add(options: ScreenOptions): Screen {
        if (this.screens.has(options.name)) {
            throw new CommandConfigError(`Screen already exists: ${options.name}`);
        }
        const screen = new Screen(options, this.size, this.palette);
        this.screens.set(screen.name, screen);
        this.activeName ??= screen.name;
        return screen;
    }

    has(name: string): boolean {
        return this.screens.has(name);
    }

    names(): string[] {
        return [...this.screens.keys()];
    }

    get active(): Screen {
        if (this.activeName === undefined) {
            throw new DisplayError('No screens have been created.');
        }
        return this.get(this.activeName);
    }

    get(name?: string): Screen {
        if (name === undefined) return this.active;
        const screen = this.screens.get(name);
        if (!screen) {
            throw new DisplayError(`A screen with the name '${name}' does not exist.`);
        }
        return screen;
    }

    /**
     * Make a screen active. Every screen's buffers and message are dropped;
     * the next render refreshes the target from state.
     */
    switchTo(name: string): Screen {
        const target = this.get(name);
        for (const screen of this.screens.values()) {
            screen.reset();
        }
        this.activeName = target.name;
        return target;
    }

    push(text: string, ref?: unknown): void {
        this.active.push(text, ref);
    }

    pushHeader(text: string): void {
        this.active.pushHeader(text);
    }

    pushFooter(text: string): void {
        this.active.pushFooter(text);
    }

    message(text: string): void {
        this.active.message = text;
    }

    /** Clear the active screen and show the error as its message. */
    error(error: unknown): void {
        const screen = this.active;
        screen.clear();
        screen.message = error instanceof Error ? error.message : String(error);
    }

    select(n: number): unknown {
        return this.active.body.select(n);
    }

    selected(): unknown {
        return this.active.body.selected;
    }

    deselect(): void {
        this.active.body.deselect();
    }

    changePage(n: number): number {
        return this.active.body.changePage(n);
    }

    /** Refresh the active screen from state and return its lines. */
    render(options?: RenderOptions): string[] {
        const screen = this.active;
        screen.refresh();
        return screen.render(options);
    }
}
