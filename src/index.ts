/**
 * @module concurrent-set
 * Hash set for data shared between async tasks, with an opt-out to an
 * unsynchronized mode for single-task use.
 */

import type { Element } from './hash';
import { ConcurrentSet } from './concurrent-set';

export { ConcurrentSet } from './concurrent-set';
export type { SetOptions, Visitor } from './concurrent-set';
export { areEqual, hashElement, stringify } from './hash';
export type { Element, Hashable, Primitive } from './hash';
export { NoopMutex, RWMutex, lockAll } from './rwmutex';
export type { Guard, Lockable } from './rwmutex';
export type { ReadonlyStorageView, StorageView } from './view';

/** Creates an empty set; `unsafe` disables locking. */
export function newSet<T extends Element>(unsafe = false): ConcurrentSet<T> {
    return new ConcurrentSet<T>({ unsafe });
}

/** Creates an empty, synchronized set. */
export function emptySet<T extends Element>(): ConcurrentSet<T> { return new ConcurrentSet<T>(); }

export function fromIterable<T extends Element>(items: Iterable<T>, unsafe = false): ConcurrentSet<T> {
    return new ConcurrentSet<T>({ unsafe, items });
}
