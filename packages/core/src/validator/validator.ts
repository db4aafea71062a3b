/**
 * Validators claim and convert tokens from a shared TokenList.
 *
 * Several validators run against the same flat list in turn. The first one
 * to accept a token claims it, taking it out of contention for the rest, so
 * command syntax does not depend on argument order.
 */

import { ValidationError } from '../errors.js';
import type { PendingToken, TokenList } from '../tokens/token-list.js';

export type Validation<T> = { ok: true; value: T } | { ok: false };

export function ok<T>(value: T): Validation<T> {
    return { ok: true, value };
}

export function fail<T>(): Validation<T> {
    return { ok: false };
}

export interface MatchOptions {
    /** Collect every accepted token instead of stopping at the first. */
    plural?: boolean;
    /** Claim accepted tokens. Fork probes pass false. */
    consume?: boolean;
}

export abstract class Validator<T> {
    /**
     * Convert one token, or fail.
     */
    abstract validate(token: string): Validation<T>;

    /**
     * Order in which pending tokens are offered to validate().
     * Input order unless a subclass prefers otherwise.
     */
    protected candidates(pending: PendingToken[]): PendingToken[] {
        return pending;
    }

    /**
     * Run validate() over the pending tokens. Returns accepted values in the
     * order they were found; claims the accepted tokens when consuming.
     */
    match(tokens: TokenList, options: MatchOptions = {}): T[] {
        const { plural = false, consume = true } = options;
        const values: T[] = [];
        const indices: number[] = [];

        for (const { index, token } of this.candidates(tokens.pending())) {
            const result = this.validate(token);
            if (!result.ok) continue;
            values.push(result.value);
            indices.push(index);
            if (!plural) break;
        }

        if (consume) {
            tokens.claim(indices);
        }
        return values;
    }

    /** True if any pending token is accepted. Claims nothing. */
    test(tokens: TokenList): boolean {
        return this.match(tokens, { consume: false }).length > 0;
    }
}

/**
 * Validators whose value is the token text itself. These can be inverted:
 * an inverted validator accepts exactly the tokens the plain one rejects,
 * which is how "must not already exist" checks are written.
 */
export abstract class TextValidator extends Validator<string> {
    protected readonly invert: boolean;
    protected readonly lower: boolean;

    constructor(options: { invert?: boolean; lower?: boolean } = {}) {
        super();
        this.invert = options.invert ?? false;
        this.lower = options.lower ?? false;
    }

    /** Whether the token satisfies the plain (non-inverted) rule. */
    protected abstract accepts(token: string): boolean;

    validate(token: string): Validation<string> {
        if (this.accepts(token) === this.invert) {
            return fail();
        }
        return ok(this.lower ? token.toLowerCase() : token);
    }
}

export interface ParamOptions<D = never> {
    plural?: boolean;
    required?: boolean;
    default?: D;
}

/**
 * Bind one named field from the token list.
 *
 * - required and nothing accepted: throws ValidationError, claims nothing
 * - optional and nothing accepted: returns the default (plural: default or [])
 * - plural: returns every accepted value
 */
export function bindParam<T>(tokens: TokenList, name: string, validator: Validator<T>, options: { plural: true; required?: boolean; default?: T[] }): T[];
export function bindParam<T>(tokens: TokenList, name: string, validator: Validator<T>, options: { required: true; plural?: false }): T;
export function bindParam<T, D>(tokens: TokenList, name: string, validator: Validator<T>, options: { default: D; required?: false }): T | D;
export function bindParam<T>(tokens: TokenList, name: string, validator: Validator<T>, options?: ParamOptions): T | undefined;
export function bindParam<T, D>(
    tokens: TokenList,
    name: string,
    validator: Validator<T>,
    options: ParamOptions<D> = {}
): T | T[] | D | undefined {
    const plural = options.plural ?? false;
    const values = validator.match(tokens, { plural, consume: true });

    if (values.length === 0) {
        if (options.required) {
            throw new ValidationError(name);
        }
        if (plural) {
            return options.default ?? [];
        }
        return options.default;
    }

    return plural ? values : values[0];
}
