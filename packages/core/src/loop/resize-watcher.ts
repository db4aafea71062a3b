import { EventEmitter } from 'node:events';
import { LOOP } from '@tally/shared';
import type { TerminalSize } from '../display/lines.js';

/**
 * Polls the terminal size and emits 'resize' when it changes. It only
 * notifies; whoever listens owns the redraw.
 */
export class ResizeWatcher {
    private readonly emitter = new EventEmitter();
    private readonly size: () => TerminalSize;
    private readonly intervalMs: number;
    private timer: NodeJS.Timeout | undefined;
    private last: TerminalSize;

    constructor(size: () => TerminalSize, intervalMs: number = LOOP.DEFAULT_POLL_INTERVAL_MS) {
        this.size = size;
        this.intervalMs = intervalMs;
        this.last = size();
    }

    get running(): boolean {
        return this.timer !== undefined;
    }

    start(): void {
        if (this.timer) return;
        this.last = this.size();
        this.timer = setInterval(() => this.poll(), this.intervalMs);
        this.timer.unref();
    }

    stop(): void {
        if (this.timer) {
            clearInterval(this.timer);
            this.timer = undefined;
        }
    }

    /** Check once. Returns true if the size changed. */
    poll(): boolean {
        const current = this.size();
        if (current.columns === this.last.columns && current.rows === this.last.rows) {
            return false;
        }
        this.last = { ...current };
        this.emitter.emit('resize', current);
        return true;
    }

    onResize(listener: (size: TerminalSize) => void): () => void {
        this.emitter.on('resize', listener);
        return () => this.emitter.off('resize', listener);
    }
}
