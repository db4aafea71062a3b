/**
 * Line collections and the paginated screen body.
 *
 * Items are stored as pushed and laid out for the current terminal width on
 * every read, so wrapping and page boundaries always agree with the size the
 * screen is about to be drawn at.
 */

import { DISPLAY } from '@tally/shared';
import { DisplayError } from '../errors.js';
import type { Palette } from './style.js';

export interface TerminalSize {
    columns: number;
    rows: number;
}

/** Palette styles a body line can ask for. Applied only when drawing. */
export type LineStyle = 'failing' | 'passing';

/**
 * One printable line. `ref` points back at the domain object the text was
 * derived from; the line does not own it. `text` is always plain, so its
 * length is its width on screen.
 */
export interface Line {
    readonly text: string;
    readonly ref: unknown;
    readonly style?: LineStyle;
}

export interface LineGroupOptions {
    truncate?: boolean;
    numbered?: boolean;
}

export class LineGroup {
    protected items: Line[] = [];
    readonly truncate: boolean;
    readonly numbered: boolean;

    constructor(options: LineGroupOptions = {}) {
        this.truncate = options.truncate ?? false;
        this.numbered = options.numbered ?? false;
    }

    push(text: string, ref?: unknown, style?: LineStyle): void {
        this.items.push(style ? { text, ref, style } : { text, ref });
    }

    clear(): void {
        this.items = [];
    }

    get itemCount(): number {
        return this.items.length;
    }

    /**
     * Lay the items out for a terminal of the given width. Long items are
     * either cut, or wrapped onto indented continuation lines that keep the
     * item's ref.
     */
    layout(columns: number): Line[] {
        const width = Math.max(1, columns - (this.numbered ? DISPLAY.NUMBER_PREFIX_WIDTH : 0));
        const lines: Line[] = [];

        for (const item of this.items) {
            for (const segment of item.text.split('\n')) {
                const laid = this.truncate ? [segment.slice(0, width)] : wrap(segment, width);
                for (const text of laid) {
                    lines.push(item.style ? { text, ref: item.ref, style: item.style } : { text, ref: item.ref });
                }
            }
        }
        return lines;
    }

    lineCount(columns: number): number {
        return this.layout(columns).length;
    }

    render(columns: number, style: (text: string) => string = text => text): string[] {
        return this.layout(columns).map(line => style(line.text));
    }
}

function wrap(text: string, width: number): string[] {
    const indent = DISPLAY.CONTINUATION_INDENT;
    const continuationWidth = Math.max(1, width - indent.length);
    const lines = [text.slice(0, width)];

    let rest = text.slice(width);
    while (rest.length > 0) {
        lines.push(indent + rest.slice(0, continuationWidth));
        rest = rest.slice(continuationWidth);
    }
    return lines;
}

/**
 * Where the body gets its dimensions from: the owning screen, which knows
 * how much room the header, footer and chrome leave over.
 */
export interface Viewport {
    columns(): number;
    bodyHeight(): number;
}

/**
 * The paginated, optionally numbered screen body. Visible lines can be
 * selected by their 1-based number on the current page.
 */
export class BodyLines extends LineGroup {
    private readonly viewport: Viewport;
    private currentPage = 1;
    private selection: { ref: unknown } | undefined;

    constructor(viewport: Viewport, options: LineGroupOptions = {}) {
        super(options);
        this.viewport = viewport;
    }

    get pageHeight(): number {
        return Math.max(1, this.viewport.bodyHeight());
    }

    lines(): Line[] {
        return this.layout(this.viewport.columns());
    }

    get pageCount(): number {
        return Math.max(1, Math.ceil(this.lines().length / this.pageHeight));
    }

    /** The current page, clipped to the pages that exist right now. */
    get page(): number {
        return clamp(this.currentPage, 1, this.pageCount);
    }

    get selected(): unknown {
        return this.selection?.ref;
    }

    get hasSelection(): boolean {
        return this.selection !== undefined;
    }

    /**
     * Go to page n, clipped to [1, pageCount]. Leaving the current page
     * drops the selection.
     */
    changePage(n: number): number {
        const target = clamp(n, 1, this.pageCount);
        if (target !== this.page) {
            this.selection = undefined;
        }
        this.currentPage = target;
        return target;
    }

    visible(): Line[] {
        const height = this.pageHeight;
        const start = (this.page - 1) * height;
        return this.lines().slice(start, start + height);
    }

    /**
     * Resolve the n-th visible line back to the object it came from.
     */
    select(n: number): unknown {
        const visible = this.visible();
        if (!Number.isInteger(n) || n < 1 || n > visible.length) {
            throw new DisplayError('Invalid line selection.');
        }
        const ref = visible[n - 1].ref;
        this.selection = { ref };
        return ref;
    }

    deselect(): void {
        this.selection = undefined;
    }

    /**
     * Render the current page, padded with blank (or numbered) lines to the
     * full page height.
     */
    renderPage(palette: Palette): string[] {
        const output: string[] = [];
        const height = this.pageHeight;
        const visible = this.visible();

        for (let i = 0; i < height; i++) {
            const number = String(i + 1).padStart(2, '0');
            const line = visible[i];
            if (!line) {
                output.push(this.numbered ? palette.dim(number) : '');
                continue;
            }
            const styled = line.style ? palette[line.style](line.text) : line.text;
            let text = this.numbered ? `${palette.dim(number)} ${styled}` : styled;
            if (this.selection && line.ref !== undefined && line.ref === this.selection.ref) {
                text = palette.selected(text);
            }
            output.push(text);
        }
        return output;
    }
}

function clamp(value: number, min: number, max: number): number {
    return Math.min(Math.max(value, min), max);
}
