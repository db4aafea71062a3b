/**
 * Constants for Tally.
 */

/**
 * Lines reserved below the body of every screen:
 * the page-number bar, the message line and the input prompt.
 */
export const SCREEN_CHROME_LINES = 3;

/**
 * Layout of rendered lines.
 */
export const DISPLAY = {
    /** Width of the "NN " prefix on numbered bodies. */
    NUMBER_PREFIX_WIDTH: 3,
    /** Indent marker for wrapped continuation lines. */
    CONTINUATION_INDENT: '    ',
    /** Each page number in the page bar takes roughly this many columns. */
    PAGE_LABEL_WIDTH: 8,
    TOO_SMALL_MESSAGE: 'Please increase the height of the terminal window.',
} as const;

/**
 * Interactive loop configuration.
 */
export const LOOP = {
    DEFAULT_POLL_INTERVAL_MS: 500,
    PROMPT: '> ',
    HELP_HINT: "Try 'help' if you're having trouble.",
} as const;

/**
 * Answers that cancel a multi-prompt command.
 */
export const ABORT_SENTINELS = ['q', 'quit'] as const;

/**
 * Shortcut invocations start with this prefix, e.g. "/bills".
 */
export const SHORTCUT_PREFIX = '/';

// ============================================================================
// Budget domain
// ============================================================================

/**
 * Screen names used by the budget application.
 */
export const SCREENS = {
    ENTRIES: 'entries',
    TARGETS: 'targets',
    GRAPH: 'graph',
    HELP: 'help',
    SHORTCUTS: 'shortcuts',
} as const;

/**
 * Month names, indexed by month number. Index 0 is the whole year.
 */
export const MONTH_NAMES = [
    'all',
    'January',
    'February',
    'March',
    'April',
    'May',
    'June',
    'July',
    'August',
    'September',
    'October',
    'November',
    'December',
] as const;

/**
 * Words that cannot be used as target names.
 */
export const KEYWORDS: readonly string[] = [
    'income',
    'expense',
    'all',
    'target',
    'targets',
    'entry',
    'entries',
    'default',
    ...MONTH_NAMES.slice(1).map(m => m.toLowerCase()),
];

/**
 * Limits on user-entered values.
 */
export const LIMITS = {
    TARGET_NAME_MAX: 12,
    NOTE_MAX: 50,
    /** Exclusive bound on the absolute value of an amount, in cents. */
    AMOUNT_MAX_CENTS: 100_000_000,
    DEFAULT_NOTE: '...',
    /** Years stored in the ledger have four digits. */
    YEAR_MIN: 1000,
    YEAR_MAX: 9999,
} as const;

/**
 * Column widths for entry and target listings.
 */
export const COLUMNS = {
    DATE: 8,
    AMOUNT: 12,
    TARGET: 13,
    NAME: 13,
} as const;
