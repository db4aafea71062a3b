/**
 * Zod schemas for Tally data structures.
 *
 * Amounts are stored as integer cents. Convert to Decimal only at the
 * boundaries where the user types or reads dollars.
 */

import { z } from 'zod';
import { LIMITS, LOOP } from './constants.js';

// ============================================================================
// Primitive Validators
// ============================================================================

/**
 * ISO date string format: YYYY-MM-DD
 */
const isoDateString = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'Must be YYYY-MM-DD format');

const rowId = z.number().int().positive();

const cents = z.number().int();

// ============================================================================
// Ledger Schemas
// ============================================================================

/**
 * One income or expense, booked against a target.
 */
export const EntrySchema = z.object({
    id: rowId,
    date: isoDateString,
    amount: cents.refine(v => v !== 0, 'Amount cannot be zero'),
    target: rowId,
    note: z.string().max(LIMITS.NOTE_MAX),
});

export type Entry = z.infer<typeof EntrySchema>;

/**
 * A named budget goal. The default amount applies to every month without
 * an explicit instance.
 */
export const TargetSchema = z.object({
    id: rowId,
    name: z.string().min(1).max(LIMITS.TARGET_NAME_MAX),
    default_amount: cents,
});

export type Target = z.infer<typeof TargetSchema>;

/**
 * The goal of a target for one month.
 */
export const TargetInstanceSchema = z.object({
    id: rowId,
    target: rowId,
    amount: cents,
    year: z.number().int().min(LIMITS.YEAR_MIN).max(LIMITS.YEAR_MAX),
    month: z.number().int().min(1).max(12),
});

export type TargetInstance = z.infer<typeof TargetInstanceSchema>;

/**
 * A user-defined alias for a full command line.
 */
export const ShortcutSchema = z.object({
    id: rowId,
    name: z.string().min(1).regex(/^\S+$/, 'Shortcut names cannot contain whitespace'),
    command: z.string().min(1),
});

export type Shortcut = z.infer<typeof ShortcutSchema>;

/**
 * On-disk ledger file.
 */
export const LedgerFileSchema = z.object({
    version: z.literal(1),
    next_id: z.object({
        entries: rowId,
        targets: rowId,
        target_instances: rowId,
        shortcuts: rowId,
    }),
    entries: z.array(EntrySchema),
    targets: z.array(TargetSchema),
    target_instances: z.array(TargetInstanceSchema),
    shortcuts: z.array(ShortcutSchema),
});

export type LedgerFile = z.infer<typeof LedgerFileSchema>;

// ============================================================================
// Configuration Schemas
// ============================================================================

/**
 * Per-screen display options.
 */
export const ScreenConfigSchema = z.object({
    min_body_height: z.number().int().min(1).default(1),
    numbered: z.boolean().default(true),
    truncate: z.boolean().default(false),
});

export type ScreenConfig = z.infer<typeof ScreenConfigSchema>;

/**
 * Workspace configuration (tally.yaml). Every key is optional.
 */
export const TallyConfigSchema = z.object({
    ledger: z.string().min(1).default('ledger.json'),
    poll_interval_ms: z.number().int().positive().default(LOOP.DEFAULT_POLL_INTERVAL_MS),
    init_command: z.string().default('list'),
    color: z.boolean().default(true),
    screens: z.object({
        entries: ScreenConfigSchema.default({ min_body_height: 4 }),
        targets: ScreenConfigSchema.default({}),
        graph: ScreenConfigSchema.default({ numbered: false, truncate: true }),
    }).default({}),
});

export type TallyConfig = z.infer<typeof TallyConfigSchema>;
