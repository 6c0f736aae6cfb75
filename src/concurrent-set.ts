/**
 * @module concurrent-set
 * @description
 * A mutable hash set shared between async tasks, guarded by a reader/writer lock.
 *
 * * Locking:
 * - Mutators (`add`, `remove`, `clear`, `withWriteLock`) take the lock exclusively.
 * - Queries (`contains`, `size`, `slice`, `iterator`, `withReadLock`) take it shared.
 * - Cross-set operations take read locks on every distinct operand, ordered by
 *   instance `id`, so `a.equal(b)` racing `b.equal(a)` cannot deadlock.
 * - Sets built with `{ unsafe: true }` skip all locking.
 *
 * * Caller contracts (not checked at run time):
 * - Callbacks of `iterator`, `withReadLock` and `withWriteLock` hold the lock
 *   for their whole duration. Calling a locking method of the same set from
 *   inside one never settles. Awaiting another set's lock from inside one can
 *   deadlock against a task that does the reverse.
 * - Stored elements must not change their hash or equality.
 */

import type { Element } from './hash';
import { stringify } from './hash';
import type { Guard, Lockable } from './rwmutex';
import { NoopMutex, RWMutex, lockAll } from './rwmutex';
import { ElementTable } from './table';
import type { ReadonlyStorageView, StorageView } from './view';
import { ScopedView } from './view';

export interface SetOptions<T extends Element> {
    /** Skip all locking. Only safe while a single task uses the set. */
    unsafe?: boolean;
    /** Initial elements. */
    items?: Iterable<T>;
}

/** Return `false` to stop the traversal. */
export type Visitor<T> = (item: T) => boolean | void | Promise<boolean | void>;

let nextId = 1;

export class ConcurrentSet<T extends Element> implements Lockable {
    readonly id: number;
    /** @internal Exposed for ordered multi-set locking. */
    readonly guard: Guard;
    private readonly _unsafe: boolean;
    private _elements: ElementTable<T>;

    constructor(options: SetOptions<T> = {}) {
        this.id = nextId++;
        this._unsafe = options.unsafe ?? false;
        this.guard = this._unsafe ? new NoopMutex() : new RWMutex();
        this._elements = new ElementTable<T>();
        if (options.items) {
            for (const item of options.items) this._elements.add(item);
        }
    }

    get unsafe(): boolean { return this._unsafe; }

    // ------------------------------------------------------------------------
    // Mutation
    // ------------------------------------------------------------------------

    /** Inserts every item under a single exclusive lock. Duplicates are ignored. */
    async add(...items: T[]): Promise<this> {
        await this.guard.runExclusive(() => {
            const table = this._elements;
            table.ensureCapacity(table.size + items.length);
            for (const item of items) table.add(item);
        });
        return this;
    }

    /** Removes `item`; absent items are a no-op. */
    async remove(item: T): Promise<this> {
        await this.guard.runExclusive(() => {
            this._elements.delete(item);
        });
        return this;
    }

    async clear(): Promise<this> {
        await this.guard.runExclusive(() => {
            this._elements = new ElementTable<T>();
        });
        return this;
    }

    // ------------------------------------------------------------------------
    // Queries
    // ------------------------------------------------------------------------

    contains(item: T): Promise<boolean> {
        return this.guard.runShared(() => this._elements.has(item));
    }

    size(): Promise<number> {
        return this.guard.runShared(() => this._elements.size);
    }

    isEmpty(): Promise<boolean> {
        return this.guard.runShared(() => this._elements.size === 0);
    }

    /** Snapshot of the elements in unspecified order, detached from the set. */
    slice(): Promise<T[]> {
        return this.guard.runShared(() => this._elements.values());
    }

    /**
     * Visits the elements under a shared lock held for the whole traversal.
     * `visit` may be async; the lock stays held while it awaits.
     */
    async iterator(visit: Visitor<T>): Promise<this> {
        await this.guard.runShared(async () => {
            for (const item of this._elements) {
                if ((await visit(item)) === false) break;
            }
        });
        return this;
    }

    async join(separator: string): Promise<string> {
        const items = await this.slice();
        return items.map(stringify).join(separator);
    }

    /**
     * Comma-joined elements. Reads the storage without waiting for the lock,
     * so it may show a writer's unfinished changes.
     */
    toString(): string {
        return this._elements.values().map(stringify).join(',');
    }

    [Symbol.for('nodejs.util.inspect.custom')]() { return `ConcurrentSet {${this.toString()}}`; }

    // ------------------------------------------------------------------------
    // Scoped access
    // ------------------------------------------------------------------------

    /**
     * Runs `fn` with write access to the raw storage under the exclusive lock.
     * The view is revoked as soon as `fn` settles.
     */
    async withWriteLock(fn: (view: StorageView<T>) => void | Promise<void>): Promise<this> {
        await this.guard.runExclusive(() => this.scoped(true, fn));
        return this;
    }

    /** Read-only counterpart of `withWriteLock`, under the shared lock. */
    async withReadLock(fn: (view: ReadonlyStorageView<T>) => void | Promise<void>): Promise<this> {
        await this.guard.runShared(() => this.scoped(false, fn));
        return this;
    }

    private async scoped(writable: boolean, fn: (view: ScopedView<T>) => void | Promise<void>): Promise<void> {
        const view = new ScopedView(this._elements, writable);
        try {
            await fn(view);
        } finally {
            view.revoke();
        }
    }

    // ------------------------------------------------------------------------
    // Comparison
    // ------------------------------------------------------------------------

    async equal(other: ConcurrentSet<T>): Promise<boolean> {
        if (this === other) return true;
        return lockAll([this, other], () => {
            if (this._elements.size !== other._elements.size) return false;
            return this.allIn(other);
        });
    }

    async isSubsetOf(other: ConcurrentSet<T>): Promise<boolean> {
        if (this === other) return true;
        return lockAll([this, other], () => this.allIn(other));
    }

    isSupersetOf(other: ConcurrentSet<T>): Promise<boolean> {
        return other.isSubsetOf(this);
    }

    private allIn(other: ConcurrentSet<T>): boolean {
        const table = other._elements;
        for (const item of this._elements) {
            if (!table.has(item)) return false;
        }
        return true;
    }

    // ------------------------------------------------------------------------
    // Set algebra
    // Results are new unsynchronized sets that share nothing with the operands.
    // Operands are processed one at a time and their contributions merged.
    // ------------------------------------------------------------------------

    /** Elements of this set or of any of `others`. */
    union(...others: ConcurrentSet<T>[]): Promise<ConcurrentSet<T>> {
        return this.derive(others, (out, other) => {
            for (const item of this._elements) out.add(item);
            if (other === this) return;
            for (const item of other._elements) out.add(item);
        });
    }

    /**
     * For each operand, the elements of this set missing from it, merged.
     * With several operands this is the union of the pairwise differences, not
     * the difference from their union. An operand identical to this set adds nothing.
     */
    diff(...others: ConcurrentSet<T>[]): Promise<ConcurrentSet<T>> {
        return this.derive(others, (out, other) => {
            if (other === this) return;
            const table = other._elements;
            for (const item of this._elements) {
                if (!table.has(item)) out.add(item);
            }
        });
    }

    /**
     * For each operand, the elements of this set also found in it, merged.
     * With several operands this is the union of the pairwise intersections.
     */
    intersect(...others: ConcurrentSet<T>[]): Promise<ConcurrentSet<T>> {
        return this.derive(others, (out, other) => {
            const table = other._elements;
            for (const item of this._elements) {
                if (table.has(item)) out.add(item);
            }
        });
    }

    /**
     * Elements of `full` missing from this set. When `full` is not a superset
     * this is simply `full` minus this set.
     */
    complement(full: ConcurrentSet<T>): Promise<ConcurrentSet<T>> {
        return this.derive([full], (out, other) => {
            if (other === this) return;
            for (const item of other._elements) {
                if (!this._elements.has(item)) out.add(item);
            }
        });
    }

    /** Elements in exactly one of the two sets. */
    symmetricDifference(other: ConcurrentSet<T>): Promise<ConcurrentSet<T>> {
        return this.derive([other], (out, o) => {
            if (o === this) return;
            const mine = this._elements;
            const theirs = o._elements;
            for (const item of mine) { if (!theirs.has(item)) out.add(item); }
            for (const item of theirs) { if (!mine.has(item)) out.add(item); }
        });
    }

    /** Independent copy; keeps this set's locking mode unless overridden. */
    async clone(options: { unsafe?: boolean } = {}): Promise<ConcurrentSet<T>> {
        const items = await this.slice();
        return new ConcurrentSet<T>({ unsafe: options.unsafe ?? this._unsafe, items });
    }

    private async derive(
        others: ReadonlyArray<ConcurrentSet<T>>,
        pass: (out: ElementTable<T>, other: ConcurrentSet<T>) => void
    ): Promise<ConcurrentSet<T>> {
        const result = new ConcurrentSet<T>({ unsafe: true });
        await lockAll([this, ...others], () => {
            for (const other of others) pass(result._elements, other);
        });
        return result;
    }
}
