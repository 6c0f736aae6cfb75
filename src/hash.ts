/**
 * @module concurrent-set/hash
 * @description
 * Element model of the set: which values may be stored, how they are hashed
 * and when two of them count as the same element.
 * * Contracts:
 * - Primitives compare by value (`NaN` equals `NaN`, `0` equals `-0`).
 * - Hashable objects compare through their own `equals`, and equal objects
 *   must report the same `hashCode`.
 * - A stored element's `hashCode` must not change while it is in a set.
 */

// ============================================================================
// 1. TYPE DEFINITIONS
// ============================================================================

/** Values compared by value. */
export type Primitive = string | number | bigint | boolean;

/**
 * Objects that define their own equality.
 * Any object implementing this can be stored in a ConcurrentSet.
 */
export interface Hashable {
    /** 32-bit hash code, stable for as long as the object is stored. */
    readonly hashCode: number;

    /** Checks equality with another value. */
    equals(other: unknown): boolean;
}

export type Element = Primitive | Hashable;

// ============================================================================
// 2. HASH ENGINE
// ============================================================================

const FNV_PRIME = 0x01000193;
const FNV_OFFSET = 0x811c9dc5;

const floatBuffer = new ArrayBuffer(8);
const view = new DataView(floatBuffer);

/**
 * Integers get a direct bit mix, other numbers are hashed over their
 * IEEE-754 words. Every NaN hashes alike and -0 hashes as 0.
 */
function hashNumber(val: number): number {
    if ((val | 0) === val) {
        let h = val | 0;
        h = Math.imul((h >> 16) ^ h, 0x45d9f3b);
        h = Math.imul((h >> 16) ^ h, 0x45d9f3b);
        return ((h >> 16) ^ h) >>> 0;
    }
    if (val !== val) return 0x7ff80000;
    view.setFloat64(0, val, true);
    let h = FNV_OFFSET;
    h ^= view.getInt32(0, true);
    h = Math.imul(h, FNV_PRIME);
    h ^= view.getInt32(4, true);
    h = Math.imul(h, FNV_PRIME);
    return h >>> 0;
}

/** FNV-1a over UTF-16 code units. */
function hashString(str: string): number {
    let h = FNV_OFFSET;
    const len = str.length;
    for (let i = 0; i < len; i++) {
        h ^= str.charCodeAt(i);
        h = Math.imul(h, FNV_PRIME);
    }
    return h >>> 0;
}

/**
 * Computes the unsigned 32-bit hash of an element.
 * Booleans and bigints are salted so they do not collide with `0`/`1` or with
 * their decimal string form.
 */
export function hashElement(val: Element): number {
    switch (typeof val) {
        case 'number': return hashNumber(val);
        case 'string': return hashString(val);
        case 'boolean': return val ? 0x9e3779b9 : 0x7f4a7c15;
        case 'bigint': return (hashString(val.toString()) ^ 0x5bd1e995) >>> 0;
        default: return val.hashCode >>> 0;
    }
}

/**
 * Element equality.
 * @returns True if both values denote the same element.
 */
export function areEqual(a: Element, b: Element): boolean {
    if (a === b) return true;
    if (typeof a === 'number') return typeof b === 'number' && a !== a && b !== b;
    if (typeof a === 'object' && typeof b === 'object') return a.equals(b);
    return false;
}

/** Human-readable token for one element, as used by `join` and `toString`. */
export function stringify(val: Element): string {
    return typeof val === 'object' ? val.toString() : String(val);
}
