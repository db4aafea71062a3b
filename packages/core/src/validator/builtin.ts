/**
 * General-purpose validators shipped with the framework.
 */

import { SHORTCUT_PREFIX } from '@tally/shared';
import { CommandConfigError } from '../errors.js';
import type { PendingToken } from '../tokens/token-list.js';
import { TextValidator, Validator, ok, fail, type Validation } from './validator.js';

export type LiteralSource = string | readonly string[] | (() => Iterable<string>);

/**
 * Accepts tokens equal to one of the literals. Case-insensitive unless
 * strict. The literals may be supplied lazily, e.g. the names of the
 * currently registered commands.
 */
export class LiteralValidator extends TextValidator {
    private readonly source: LiteralSource;
    private readonly strict: boolean;

    constructor(
        source: LiteralSource,
        options: { strict?: boolean; invert?: boolean; lower?: boolean } = {}
    ) {
        super(options);
        this.source = source;
        this.strict = options.strict ?? false;
    }

    private literals(): string[] {
        if (typeof this.source === 'string') return [this.source];
        if (typeof this.source === 'function') return [...this.source()];
        return [...this.source];
    }

    private compare(left: string, right: string): boolean {
        return this.strict ? left === right : left.toLowerCase() === right.toLowerCase();
    }

    protected accepts(token: string): boolean {
        const literals = this.literals();
        if (literals.length === 0) {
            throw new CommandConfigError('LiteralValidator needs at least one literal.');
        }
        return literals.some(literal => this.compare(token, literal));
    }
}

/**
 * Accepts tokens for which the predicate holds, e.g. isDigits.
 */
export class PredicateValidator extends TextValidator {
    private readonly predicate: (token: string) => boolean;

    constructor(predicate: (token: string) => boolean, options: { invert?: boolean; lower?: boolean } = {}) {
        super(options);
        this.predicate = predicate;
    }

    protected accepts(token: string): boolean {
        return this.predicate(token);
    }
}

/**
 * Accepts any token.
 */
export class AnyValidator extends Validator<string> {
    private readonly lower: boolean;

    constructor(options: { lower?: boolean } = {}) {
        super();
        this.lower = options.lower ?? false;
    }

    validate(token: string): Validation<string> {
        return ok(this.lower ? token.toLowerCase() : token);
    }
}

/**
 * Picks a free-text comment. Quoted tokens (those containing whitespace)
 * win; among equals, later tokens are preferred.
 */
export class CommentValidator extends Validator<string> {
    protected candidates(pending: PendingToken[]): PendingToken[] {
        const spaced = pending.filter(p => /\s/.test(p.token));
        return (spaced.length > 0 ? spaced : pending).slice().reverse();
    }

    validate(token: string): Validation<string> {
        return ok(token);
    }
}

/**
 * A single word usable as a shortcut name.
 */
export class ShortcutNameValidator extends TextValidator {
    protected accepts(token: string): boolean {
        return token.length > 0 && !/\s/.test(token) && !token.startsWith(SHORTCUT_PREFIX);
    }
}

/**
 * Digits only.
 */
export function isDigits(token: string): boolean {
    return /^\d+$/.test(token);
}

/**
 * Accepts a positive integer written in digits.
 */
export class IntegerValidator extends Validator<number> {
    validate(token: string): Validation<number> {
        return isDigits(token) ? ok(parseInt(token, 10)) : fail();
    }
}
