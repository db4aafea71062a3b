import { describe, it, expect } from 'vitest';
import { TokenList } from '../../src/tokens/token-list.js';
import {
    AnyValidator,
    CommentValidator,
    IntegerValidator,
    LiteralValidator,
    PredicateValidator,
    ShortcutNameValidator,
    isDigits,
} from '../../src/validator/builtin.js';
import { CommandConfigError } from '../../src/errors.js';

describe('LiteralValidator', () => {
    it('should compare case-insensitively unless strict', () => {
        expect(new LiteralValidator(['Today']).validate('TODAY')).toEqual({ ok: true, value: 'TODAY' });
        expect(new LiteralValidator(['Today'], { strict: true }).validate('today')).toEqual({ ok: false });
    });

    it('should lower-case accepted tokens when asked', () => {
        expect(new LiteralValidator('food', { lower: true }).validate('FOOD')).toEqual({ ok: true, value: 'food' });
    });

    it('should accept exactly the non-literals when inverted', () => {
        const fresh = new LiteralValidator(['rent', 'food'], { invert: true });

        expect(fresh.validate('food').ok).toBe(false);
        expect(fresh.validate('travel')).toEqual({ ok: true, value: 'travel' });
    });

    it('should read lazily supplied literals on every call', () => {
        const names = ['a'];
        const validator = new LiteralValidator(() => names);

        expect(validator.validate('b').ok).toBe(false);
        names.push('b');
        expect(validator.validate('b').ok).toBe(true);
    });

    it('should refuse to run without literals', () => {
        const validator = new LiteralValidator([]);
        expect(() => validator.validate('x')).toThrow(CommandConfigError);
    });
});

describe('PredicateValidator', () => {
    it('should accept tokens the predicate holds for', () => {
        const digits = new PredicateValidator(isDigits);
        expect(digits.validate('42').ok).toBe(true);
        expect(digits.validate('4a').ok).toBe(false);
    });
});

describe('AnyValidator', () => {
    it('should accept anything', () => {
        expect(new AnyValidator({ lower: true }).validate('MiXeD')).toEqual({ ok: true, value: 'mixed' });
    });
});

describe('CommentValidator', () => {
    it('should prefer tokens containing whitespace', () => {
        const tokens = new TokenList(['food', 'lunch out', 'extra']);
        expect(new CommentValidator().match(tokens)).toEqual(['lunch out']);
        expect(tokens.remaining()).toEqual(['food', 'extra']);
    });

    it('should otherwise take the last token', () => {
        const tokens = new TokenList(['food', 'coffee']);
        expect(new CommentValidator().match(tokens)).toEqual(['coffee']);
    });
});

describe('ShortcutNameValidator', () => {
    it('should accept a single word without the shortcut prefix', () => {
        const validator = new ShortcutNameValidator();
        expect(validator.validate('bills').ok).toBe(true);
        expect(validator.validate('/bills').ok).toBe(false);
        expect(validator.validate('two words').ok).toBe(false);
    });
});

describe('IntegerValidator', () => {
    it('should parse digits only', () => {
        expect(new IntegerValidator().validate('007')).toEqual({ ok: true, value: 7 });
        expect(new IntegerValidator().validate('-1')).toEqual({ ok: false });
    });
});
