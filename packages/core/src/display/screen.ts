import { DISPLAY, SCREEN_CHROME_LINES } from '@tally/shared';
import { BodyLines, LineGroup, type LineStyle, type TerminalSize } from './lines.js';
import type { Palette } from './style.js';

export type ScreenTarget = 'header' | 'body' | 'footer';

export interface RenderOptions {
    /** Leave the message in place for the next render, as a resize redraw does. */
    keepMessage?: boolean;
}

export interface ScreenOptions {
    name: string;
    minBodyHeight?: number;
    numbered?: boolean;
    truncate?: boolean;
    /** Regenerates the screen's content from current state before each render. */
    refresh?: (screen: Screen) => void;
}

/**
 * A named, independently paginated view: header, body, footer and a
 * one-shot message line.
 */
export class Screen {
    readonly name: string;
    readonly minBodyHeight: number;
    readonly header: LineGroup;
    readonly body: BodyLines;
    readonly footer: LineGroup;
    message = '';

    private readonly refreshContent?: (screen: Screen) => void;
    private readonly size: () => TerminalSize;
    private readonly palette: Palette;
    private printed = false;

    constructor(options: ScreenOptions, size: () => TerminalSize, palette: Palette) {
        this.name = options.name;
        this.minBodyHeight = options.minBodyHeight ?? 1;
        this.refreshContent = options.refresh;
        this.size = size;
        this.palette = palette;

        this.header = new LineGroup({ truncate: true });
        this.footer = new LineGroup();
        this.body = new BodyLines(
            {
                columns: () => this.columns,
                bodyHeight: () => this.bodyHeight(),
            },
            { numbered: options.numbered ?? false, truncate: options.truncate ?? false }
        );
    }

    get columns(): number {
        return this.size().columns;
    }

    get rows(): number {
        return this.size().rows;
    }

    /** Rows left for the body once chrome, header and footer are placed. */
    bodyHeight(): number {
        const columns = this.columns;
        return this.rows - SCREEN_CHROME_LINES - this.header.lineCount(columns) - this.footer.lineCount(columns);
    }

    /** Whether the terminal is tall enough for the minimum body height. */
    fits(): boolean {
        return this.bodyHeight() >= this.minBodyHeight;
    }

    /**
     * Append a line. The first push after a render starts from empty
     * buffers, so a refresh never stacks onto what was drawn last time.
     */
    push(text: string, ref?: unknown, style?: LineStyle): void {
        this.append('body', text, ref, style);
    }

    pushHeader(text: string): void {
        this.append('header', text);
    }

    pushFooter(text: string): void {
        this.append('footer', text);
    }

    private append(target: ScreenTarget, text: string, ref?: unknown, style?: LineStyle): void {
        if (this.printed) {
            this.printed = false;
            this.clear();
        }
        this[target].push(text, ref, style);
    }

    clear(): void {
        this.header.clear();
        this.body.clear();
        this.footer.clear();
    }

    /** Drop every transient buffer, including the message. */
    reset(): void {
        this.clear();
        this.message = '';
    }

    refresh(): void {
        this.refreshContent?.(this);
    }

    /**
     * Lines to draw, top to bottom, excluding the input prompt. The message
     * is shown once and then cleared unless `keepMessage` is set.
     */
    render(options: RenderOptions = {}): string[] {
        if (!this.fits()) {
            return [DISPLAY.TOO_SMALL_MESSAGE];
        }

        const columns = this.columns;
        const lines = [
            ...this.header.render(columns, text => this.palette.header(text)),
            ...this.body.renderPage(this.palette),
            ...this.footer.render(columns),
            this.pageBar(),
            this.message.padEnd(columns),
        ];
        if (!options.keepMessage) {
            this.message = '';
        }
        this.printed = true;
        return lines;
    }

    /**
     * The divider bar with page numbers, current page marked |n|. When there
     * are more pages than fit, a window of them is shown with |<< and >>|
     * marking pages before and after.
     */
    pageBar(): string {
        const columns = this.columns;
        const pages = this.body.pageCount;
        if (pages < 2) {
            return this.palette.pageBar(' '.repeat(columns));
        }

        const page = this.body.page;
        const perWindow = Math.max(1, Math.floor(columns / DISPLAY.PAGE_LABEL_WIDTH));
        const windows = Math.ceil(pages / perWindow);
        const window = Math.ceil(page / perWindow);
        const first = (window - 1) * perWindow + 1;
        const last = Math.min(window * perWindow, pages);

        const prefix = window > 1 ? '|<<' : '   ';
        const suffix = window < windows ? '>>|' : '   ';
        let numbers = '';
        for (let n = first; n <= last; n++) {
            numbers += n === page ? `|${n}|` : ` ${n} `;
        }

        const content = `${prefix} ${numbers} ${suffix}`;
        const left = Math.max(0, Math.floor((columns - content.length) / 2));
        const right = Math.max(0, columns - left - content.length);
        return this.palette.pageBar(' '.repeat(left) + content + ' '.repeat(right));
    }
}
