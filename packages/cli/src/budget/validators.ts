/**
 * Validators for budget command fields.
 */

import { KEYWORDS, LIMITS, MONTH_NAMES } from '@tally/shared';
import { IntegerValidator, Validator, fail, ok, type Validation } from '@tally/core';
import { parseAmount } from './money.js';
import type { Category } from './state.js';

/**
 * A month by any prefix of its name, e.g. "mar", "September". Yields the
 * month number; "all" (when allowed) yields 0.
 */
export class MonthValidator extends Validator<number> {
    private readonly allowAll: boolean;

    constructor(options: { allowAll?: boolean } = {}) {
        super();
        this.allowAll = options.allowAll ?? true;
    }

    validate(token: string): Validation<number> {
        const lower = token.toLowerCase();
        if (lower === '') return fail();
        if (lower === 'all') {
            return this.allowAll ? ok(0) : fail();
        }
        const index = MONTH_NAMES.findIndex((name, i) => i > 0 && name.toLowerCase().startsWith(lower));
        return index > 0 ? ok(index) : fail();
    }
}

export class DayValidator extends Validator<number> {
    validate(token: string): Validation<number> {
        if (!/^\d{1,2}$/.test(token)) return fail();
        const day = parseInt(token, 10);
        return day >= 1 && day <= 31 ? ok(day) : fail();
    }
}

export function isValidYear(year: number): boolean {
    return Number.isInteger(year) && year >= LIMITS.YEAR_MIN && year <= LIMITS.YEAR_MAX;
}

export class YearValidator extends Validator<number> {
    validate(token: string): Validation<number> {
        if (!/^\d{4}$/.test(token)) return fail();
        const year = parseInt(token, 10);
        return isValidYear(year) ? ok(year) : fail();
    }
}

/**
 * Whether the name could be given to a new target.
 */
export function isValidTargetName(name: string): boolean {
    return name.length > 0 &&
        name.length <= LIMITS.TARGET_NAME_MAX &&
        /^[a-z][a-z0-9_-]*$/.test(name) &&
        !KEYWORDS.includes(name);
}

/**
 * An existing target name, lower-cased. Inverted, a name that is valid and
 * not taken yet.
 */
export class TargetValidator extends Validator<string> {
    private readonly names: () => readonly string[];
    private readonly invert: boolean;

    constructor(names: () => readonly string[], options: { invert?: boolean } = {}) {
        super();
        this.names = names;
        this.invert = options.invert ?? false;
    }

    validate(token: string): Validation<string> {
        const name = token.toLowerCase();
        const exists = this.names().includes(name);
        if (this.invert) {
            return !exists && isValidTargetName(name) ? ok(name) : fail();
        }
        return exists ? ok(name) : fail();
    }
}

/**
 * A signed dollar amount, yielding cents. Zero only when allowed, in which
 * case a bare "0" is accepted too.
 */
export class AmountValidator extends Validator<number> {
    private readonly allowZero: boolean;

    constructor(options: { allowZero?: boolean } = {}) {
        super();
        this.allowZero = options.allowZero ?? false;
    }

    validate(token: string): Validation<number> {
        if (this.allowZero && /^0+(\.0{1,2})?$/.test(token)) {
            return ok(0);
        }
        const cents = parseAmount(token);
        if (cents === undefined) return fail();
        if (cents === 0) {
            return this.allowZero ? ok(0) : fail();
        }
        return ok(cents);
    }
}

export class CategoryValidator extends Validator<Category> {
    validate(token: string): Validation<Category> {
        switch (token.toLowerCase()) {
            case 'income':
                return ok('income');
            case 'expense':
            case 'expenses':
                return ok('expense');
            default:
                return fail();
        }
    }
}

/**
 * A 1-based line number on the current page.
 */
export class LineNumberValidator extends IntegerValidator {
    override validate(token: string): Validation<number> {
        const result = super.validate(token);
        return result.ok && result.value > 0 ? result : fail();
    }
}

export const EDIT_FIELDS = ['date', 'amount', 'target', 'note'] as const;

export type EditField = typeof EDIT_FIELDS[number];

export class EditFieldValidator extends Validator<EditField> {
    validate(token: string): Validation<EditField> {
        const lower = token.toLowerCase();
        const field = EDIT_FIELDS.find(f => f === lower);
        return field ? ok(field) : fail();
    }
}
