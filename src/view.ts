import type { Element } from './hash';
import type { ElementTable } from './table';

/** Read access to a set's storage inside `withReadLock`. */
export interface ReadonlyStorageView<T extends Element> {
    readonly size: number;
    has(item: T): boolean;
    /** Snapshot of the stored elements. */
    values(): T[];
    forEach(fn: (item: T) => void): void;
}

/** Read/write access to a set's storage inside `withWriteLock`. */
export interface StorageView<T extends Element> extends ReadonlyStorageView<T> {
    add(...items: T[]): this;
    /** @returns False if the item was absent. */
    delete(item: T): boolean;
    clear(): this;
}

/**
 * A view that stays usable only while its lock is held. The owning set calls
 * `revoke()` on every exit path of the scope; any later call throws.
 * Views handed out under a read lock also refuse the mutators at run time.
 */
export class ScopedView<T extends Element> implements StorageView<T> {
    private _table: ElementTable<T> | null;
    private readonly _writable: boolean;

    constructor(table: ElementTable<T>, writable: boolean) {
        this._table = table;
        this._writable = writable;
    }

    revoke(): void { this._table = null; }

    private get table(): ElementTable<T> {
        if (this._table === null) {
            throw new Error('InvalidOperation: storage view used outside its lock scope');
        }
        return this._table;
    }

    private get writableTable(): ElementTable<T> {
        const table = this.table;
        if (!this._writable) throw new Error('InvalidOperation: storage view is read-only');
        return table;
    }

    get size(): number { return this.table.size; }

    has(item: T): boolean { return this.table.has(item); }

    values(): T[] { return this.table.values(); }

    forEach(fn: (item: T) => void): void {
        for (const item of this.table.values()) fn(item);
    }

    add(...items: T[]): this {
        const table = this.writableTable;
        table.ensureCapacity(table.size + items.length);
        for (const item of items) table.add(item);
        return this;
    }

    delete(item: T): boolean { return this.writableTable.delete(item); }

    clear(): this {
        this.writableTable.clear();
        return this;
    }
}
