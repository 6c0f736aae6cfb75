import type { Element } from './hash';
import { areEqual, hashElement } from './hash';

/**
 * Raw storage of a ConcurrentSet.
 *
 * Architecture:
 * - **Dense Storage**: Elements are stored in a contiguous array (`_values`) for O(n) iteration.
 * - **Sparse Lookup**: A `Uint32Array` (`_indices`) maps hashes to positions in the dense array
 *   (position + 1, where 0 means empty).
 * - **Open Addressing**: Linear probing for collision resolution.
 *
 * The table does no locking of its own; the owning set guards every access.
 *
 * @template T The type of elements in the table.
 */
export class ElementTable<T extends Element> implements Iterable<T> {
    private _values: T[] = [];
    private _hashes: number[] = [];
    private _indices: Uint32Array;

    private _bucketCount: number;
    private _mask: number;
    private readonly LOAD_FACTOR = 0.75;
    private readonly MIN_BUCKETS = 16;

    constructor(capacity = 0) {
        this._bucketCount = this.MIN_BUCKETS;
        while (this._bucketCount * this.LOAD_FACTOR < capacity) this._bucketCount <<= 1;
        this._mask = this._bucketCount - 1;
        this._indices = new Uint32Array(this._bucketCount);
    }

    get size(): number { return this._values.length; }

    ensureCapacity(capacity: number): void {
        if (capacity <= this._bucketCount * this.LOAD_FACTOR) return;

        let target = this._bucketCount;
        while (target * this.LOAD_FACTOR < capacity) target <<= 1;
        this._bucketCount = target;
        this._mask = target - 1;

        // Only the lookup table is rebuilt; dense arrays keep their order.
        this._indices = new Uint32Array(target);
        for (let i = 0; i < this._hashes.length; i++) {
            let idx = this._hashes[i] & this._mask;
            while (this._indices[idx] !== 0) idx = (idx + 1) & this._mask;
            this._indices[idx] = i + 1;
        }
    }

    /**
     * Inserts an element.
     * @returns False if an equal element was already present.
     */
    add(e: T): boolean {
        if (this._values.length + 1 > this._bucketCount * this.LOAD_FACTOR) {
            this.ensureCapacity(this._values.length + 1);
        }

        const h = hashElement(e);
        let idx = h & this._mask;

        while (true) {
            const entry = this._indices[idx];
            if (entry === 0) {
                this._hashes.push(h);
                this._values.push(e);
                this._indices[idx] = this._values.length;
                return true;
            }
            const ptr = entry - 1;
            if (this._hashes[ptr] === h && areEqual(this._values[ptr], e)) return false;
            idx = (idx + 1) & this._mask;
        }
    }

    has(e: T): boolean {
        const h = hashElement(e);
        let idx = h & this._mask;
        while (true) {
            const entry = this._indices[idx];
            if (entry === 0) return false;
            const ptr = entry - 1;
            if (this._hashes[ptr] === h && areEqual(this._values[ptr], e)) return true;
            idx = (idx + 1) & this._mask;
        }
    }

    /**
     * Removes an element using "Swap & Pop": the last dense entry moves into
     * the gap and its lookup slot is repointed.
     * @returns False if the element was absent.
     */
    delete(e: T): boolean {
        if (this._values.length === 0) return false;

        const h = hashElement(e);
        let idx = h & this._mask;

        while (true) {
            const entry = this._indices[idx];
            if (entry === 0) return false;

            const ptr = entry - 1;
            if (this._hashes[ptr] === h && areEqual(this._values[ptr], e)) {
                this.removeIndex(idx);

                const last = this._values.length - 1;
                if (ptr < last) {
                    const lastHash = this._hashes[last];
                    this._values[ptr] = this._values[last];
                    this._hashes[ptr] = lastHash;
                    this.updateIndex(lastHash, last + 1, ptr + 1);
                }
                this._values.length = last;
                this._hashes.length = last;
                return true;
            }
            idx = (idx + 1) & this._mask;
        }
    }

    clear(): void {
        this._values = [];
        this._hashes = [];
        this._bucketCount = this.MIN_BUCKETS;
        this._mask = this._bucketCount - 1;
        this._indices = new Uint32Array(this._bucketCount);
    }

    /** Snapshot of the elements, in storage order. */
    values(): T[] { return this._values.slice(); }

    [Symbol.iterator](): Iterator<T> { return this._values[Symbol.iterator](); }

    private updateIndex(hash: number, oldLoc: number, newLoc: number): void {
        let idx = hash & this._mask;
        while (this._indices[idx] !== oldLoc) idx = (idx + 1) & this._mask;
        this._indices[idx] = newLoc;
    }

    /**
     * Repairs the probe chain after a slot is cleared: later entries that
     * sit farther from their ideal bucket than the hole move back into it.
     */
    private removeIndex(holeIdx: number): void {
        let i = (holeIdx + 1) & this._mask;
        while (this._indices[i] !== 0) {
            const entry = this._indices[i];
            const ideal = this._hashes[entry - 1] & this._mask;
            const distHole = (holeIdx - ideal + this._bucketCount) & this._mask;
            const distI = (i - ideal + this._bucketCount) & this._mask;
            if (distHole < distI) {
                this._indices[holeIdx] = entry;
                holeIdx = i;
            }
            i = (i + 1) & this._mask;
        }
        this._indices[holeIdx] = 0;
    }
}
