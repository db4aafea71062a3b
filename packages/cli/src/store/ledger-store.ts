/**
 * JSON-file ledger. Every mutation is written through immediately, so there
 * is never uncommitted state to lose on exit.
 */

import { existsSync, readFileSync, writeFileSync } from 'node:fs';
import {
    LedgerFileSchema,
    type Entry,
    type LedgerFile,
    type Shortcut,
    type Target,
    type TargetInstance,
} from '@tally/shared';

export type Row<V> = V & { id: number };

/**
 * One table. Rows are handed out by reference and replaced, never mutated,
 * on update, so callers can compare them by identity.
 */
export class Table<V extends object> {
    private rows: Row<V>[];
    private next: number;
    private readonly commit: () => void;

    constructor(rows: Row<V>[], nextId: number, commit: () => void) {
        this.rows = [...rows];
        this.next = nextId;
        this.commit = commit;
    }

    get nextId(): number {
        return this.next;
    }

    /**
     * Insert a row. An explicit id is used to put a deleted row back; it
     * must be free.
     */
    insert(values: V, id?: number): Row<V> {
        if (id !== undefined && this.get(id)) {
            throw new Error(`Row ${id} already exists.`);
        }
        const rowId = id ?? this.next;
        const row: Row<V> = { ...values, id: rowId };
        this.rows.push(row);
        this.next = Math.max(this.next, rowId + 1);
        this.commit();
        return row;
    }

    update(id: number, changes: Partial<V>): Row<V> {
        const index = this.rows.findIndex(r => r.id === id);
        if (index === -1) {
            throw new Error(`Row ${id} does not exist.`);
        }
        const row: Row<V> = { ...this.rows[index], ...changes, id };
        this.rows[index] = row;
        this.commit();
        return row;
    }

    delete(id: number): Row<V> | undefined {
        const row = this.get(id);
        if (!row) return undefined;
        this.rows = this.rows.filter(r => r !== row);
        this.commit();
        return row;
    }

    deleteWhere(predicate: (row: Row<V>) => boolean): Row<V>[] {
        const removed = this.rows.filter(predicate);
        if (removed.length > 0) {
            this.rows = this.rows.filter(r => !removed.includes(r));
            this.commit();
        }
        return removed;
    }

    get(id: number): Row<V> | undefined {
        return this.rows.find(r => r.id === id);
    }

    select(predicate: (row: Row<V>) => boolean = () => true): Row<V>[] {
        return this.rows.filter(predicate);
    }

    get size(): number {
        return this.rows.length;
    }
}

function emptyLedger(): LedgerFile {
    return {
        version: 1,
        next_id: { entries: 1, targets: 1, target_instances: 1, shortcuts: 1 },
        entries: [],
        targets: [],
        target_instances: [],
        shortcuts: [],
    };
}

export class LedgerStore {
    readonly entries: Table<Omit<Entry, 'id'>>;
    readonly targets: Table<Omit<Target, 'id'>>;
    readonly targetInstances: Table<Omit<TargetInstance, 'id'>>;
    readonly shortcuts: Table<Omit<Shortcut, 'id'>>;
    private readonly path: string | undefined;

    private constructor(data: LedgerFile, path: string | undefined) {
        this.path = path;
        const commit = () => this.save();
        this.entries = new Table(data.entries, data.next_id.entries, commit);
        this.targets = new Table(data.targets, data.next_id.targets, commit);
        this.targetInstances = new Table(data.target_instances, data.next_id.target_instances, commit);
        this.shortcuts = new Table(data.shortcuts, data.next_id.shortcuts, commit);
    }

    /**
     * Open the ledger file, creating it when missing. An unreadable or
     * invalid file throws.
     */
    static open(path: string): LedgerStore {
        if (!existsSync(path)) {
            const store = new LedgerStore(emptyLedger(), path);
            store.save();
            return store;
        }

        let raw: unknown;
        try {
            raw = JSON.parse(readFileSync(path, 'utf-8'));
        } catch (err) {
            throw new Error(`Cannot read ledger ${path}: ${err instanceof Error ? err.message : String(err)}`);
        }

        const result = LedgerFileSchema.safeParse(raw);
        if (!result.success) {
            const issues = result.error.issues.map(i => `${i.path.join('.')}: ${i.message}`);
            throw new Error(`Invalid ledger ${path}: ${issues.join('; ')}`);
        }
        return new LedgerStore(result.data, path);
    }

    static inMemory(data: LedgerFile = emptyLedger()): LedgerStore {
        return new LedgerStore(LedgerFileSchema.parse(data), undefined);
    }

    toJSON(): LedgerFile {
        return {
            version: 1,
            next_id: {
                entries: this.entries.nextId,
                targets: this.targets.nextId,
                target_instances: this.targetInstances.nextId,
                shortcuts: this.shortcuts.nextId,
            },
            entries: this.entries.select(),
            targets: this.targets.select(),
            target_instances: this.targetInstances.select(),
            shortcuts: this.shortcuts.select(),
        };
    }

    private save(): void {
        if (this.path === undefined) return;
        writeFileSync(this.path, JSON.stringify(this.toJSON(), null, 2) + '\n');
    }
}
