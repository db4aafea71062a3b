/**
 * Questions asked by commands that collect an entry field by field.
 */

import { LIMITS } from '@tally/shared';
import { TokenList, askUntilValid, type Interaction } from '@tally/core';
import { localIsoDate, makeIsoDate } from './dates.js';
import { hasSign, parseAmount } from './money.js';
import { DayValidator, MonthValidator, YearValidator } from './validators.js';

/**
 * "<month> <day> [year]" in any order, or nothing for today.
 */
export function parseDateAnswer(answer: string, today: Date): string | undefined {
    if (answer === '') {
        return localIsoDate(today);
    }

    const tokens = new TokenList(answer.split(/\s+/));
    const [month] = new MonthValidator({ allowAll: false }).match(tokens);
    const [year = today.getFullYear()] = new YearValidator().match(tokens);
    const [day] = new DayValidator().match(tokens);
    if (month === undefined || day === undefined || !tokens.isEmpty()) {
        return undefined;
    }
    return makeIsoDate(year, month, day);
}

export function askDate(io: Interaction, today: Date): Promise<string> {
    return askUntilValid(
        io,
        'Date (e.g. "march 5", empty for today): ',
        answer => parseDateAnswer(answer, today),
        'Invalid date.'
    );
}

export function askAmount(io: Interaction): Promise<number> {
    return askUntilValid(
        io,
        'Amount: ',
        answer => {
            const cents = parseAmount(answer);
            return cents === 0 ? undefined : cents;
        },
        answer => hasSign(answer) ? 'Invalid amount.' : 'The amount must start with + or -'
    );
}

export function askTarget(io: Interaction, names: readonly string[]): Promise<string> {
    const listing = `(${names.join(', ')})`;
    io.say(listing);
    return askUntilValid(
        io,
        'Target: ',
        answer => {
            const name = answer.toLowerCase();
            return names.includes(name) ? name : undefined;
        },
        answer => answer.toLowerCase() === 'help'
            ? listing
            : "Invalid target given. Enter 'help' to see targets."
    );
}

export function parseNoteAnswer(answer: string): string | undefined {
    if (answer === '') return LIMITS.DEFAULT_NOTE;
    return answer.length <= LIMITS.NOTE_MAX ? answer : undefined;
}

export function askNote(io: Interaction): Promise<string> {
    return askUntilValid(
        io,
        'Note: ',
        parseNoteAnswer,
        `Note must be ${LIMITS.NOTE_MAX} characters or less.`
    );
}
