import { Chalk, type ChalkInstance } from 'chalk';

/**
 * Cosmetic styles applied while rendering. Never part of the data: every
 * style wraps text without changing its visible characters.
 */
export interface Palette {
    header(text: string): string;
    dim(text: string): string;
    selected(text: string): string;
    pageBar(text: string): string;
    failing(text: string): string;
    passing(text: string): string;
}

/**
 * Create a palette. With color off every style is the identity, which is
 * what the tests and non-TTY output use.
 */
export function createPalette(color: boolean): Palette {
    const chalk: ChalkInstance = new Chalk({ level: color ? 1 : 0 });
    return {
        header: text => chalk.bold(text),
        dim: text => chalk.dim(text),
        selected: text => chalk.cyan(text),
        pageBar: text => chalk.inverse.bold(text),
        failing: text => chalk.red(text),
        passing: text => chalk.green(text),
    };
}
