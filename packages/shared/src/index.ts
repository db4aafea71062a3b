// Schemas
export {
    EntrySchema,
    TargetSchema,
    TargetInstanceSchema,
    ShortcutSchema,
    LedgerFileSchema,
    ScreenConfigSchema,
    TallyConfigSchema,
} from './schemas.js';

// Types
export type {
    Entry,
    Target,
    TargetInstance,
    Shortcut,
    LedgerFile,
    ScreenConfig,
    TallyConfig,
} from './schemas.js';

// Constants
export {
    SCREEN_CHROME_LINES,
    DISPLAY,
    LOOP,
    ABORT_SENTINELS,
    SHORTCUT_PREFIX,
    SCREENS,
    MONTH_NAMES,
    KEYWORDS,
    LIMITS,
    COLUMNS,
} from './constants.js';
