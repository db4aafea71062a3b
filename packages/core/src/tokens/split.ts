/**
 * Shell-style word splitting for one input line.
 */

import { RoutingError } from '../errors.js';

const DOUBLE_QUOTE_ESCAPABLE = new Set(['"', '\\', '$', '`']);

/**
 * Split a line into words the way a POSIX shell would:
 * - unquoted whitespace separates words
 * - single quotes preserve everything literally
 * - double quotes preserve everything except \" \\ \$ \`
 * - an unquoted backslash escapes the next character
 *
 * Quoted empty strings ('' or "") produce an empty word.
 */
export function splitArgs(line: string): string[] {
    const words: string[] = [];
    let current = '';
    let inWord = false;
    let quote: '"' | "'" | null = null;

    for (let i = 0; i < line.length; i++) {
        const ch = line[i];

        if (quote === "'") {
            if (ch === "'") {
                quote = null;
            } else {
                current += ch;
            }
            continue;
        }

        if (quote === '"') {
            if (ch === '"') {
                quote = null;
            } else if (ch === '\\' && i + 1 < line.length && DOUBLE_QUOTE_ESCAPABLE.has(line[i + 1])) {
                current += line[++i];
            } else {
                current += ch;
            }
            continue;
        }

        if (ch === "'" || ch === '"') {
            quote = ch;
            inWord = true;
        } else if (ch === '\\') {
            if (i + 1 >= line.length) {
                throw new RoutingError('syntax', 'No escaped character');
            }
            current += line[++i];
            inWord = true;
        } else if (/\s/.test(ch)) {
            if (inWord) {
                words.push(current);
                current = '';
                inWord = false;
            }
        } else {
            current += ch;
            inWord = true;
        }
    }

    if (quote) {
        throw new RoutingError('syntax', 'No closing quotation');
    }
    if (inWord) {
        words.push(current);
    }
    return words;
}
