/**
 * @module concurrent-set/rwmutex
 * @description
 * Asynchronous reader/writer lock for values shared between async tasks.
 * * Semantics:
 * - Any number of readers, or exactly one writer.
 * - Waiters are admitted in arrival order. A reader arriving while a writer
 *   waits queues behind that writer, so writers are not starved.
 * - Not reentrant: acquiring a lock the current task already holds waits forever.
 */

/** Lock surface shared by the real mutex and the unsynchronized stand-in. */
export interface Guard {
    lock(): Promise<void>;
    unlock(): void;
    rLock(): Promise<void>;
    rUnlock(): void;
    runExclusive<R>(fn: () => R | Promise<R>): Promise<R>;
    runShared<R>(fn: () => R | Promise<R>): Promise<R>;
}

/** Orders multi-lock acquisition. */
export interface Lockable {
    readonly id: number;
    readonly guard: Guard;
}

interface Waiter {
    readonly exclusive: boolean;
    readonly grant: () => void;
}

export class RWMutex implements Guard {
    private _readers = 0;
    private _writer = false;
    private _queue: Waiter[] = [];

    get readers(): number { return this._readers; }
    get isWriteLocked(): boolean { return this._writer; }
    get pending(): number { return this._queue.length; }

    lock(): Promise<void> {
        if (!this._writer && this._readers === 0 && this._queue.length === 0) {
            this._writer = true;
            return Promise.resolve();
        }
        return new Promise<void>(resolve => {
            this._queue.push({ exclusive: true, grant: resolve });
        });
    }

    unlock(): void {
        if (!this._writer) throw new Error('InvalidOperation: RWMutex unlock of unlocked mutex');
        this._writer = false;
        this.dispatch();
    }

    rLock(): Promise<void> {
        if (!this._writer && this._queue.length === 0) {
            this._readers++;
            return Promise.resolve();
        }
        return new Promise<void>(resolve => {
            this._queue.push({ exclusive: false, grant: resolve });
        });
    }

    rUnlock(): void {
        if (this._readers === 0) throw new Error('InvalidOperation: RWMutex rUnlock of unlocked mutex');
        this._readers--;
        if (this._readers === 0) this.dispatch();
    }

    async runExclusive<R>(fn: () => R | Promise<R>): Promise<R> {
        await this.lock();
        try {
            return await fn();
        } finally {
            this.unlock();
        }
    }

    async runShared<R>(fn: () => R | Promise<R>): Promise<R> {
        await this.rLock();
        try {
            return await fn();
        } finally {
            this.rUnlock();
        }
    }

    /**
     * Hands the lock to the head of the queue: one writer, or every reader up
     * to the next queued writer.
     */
    private dispatch(): void {
        if (this._writer) return;
        while (this._queue.length > 0) {
            const head = this._queue[0];
            if (head.exclusive) {
                if (this._readers > 0) return;
                this._queue.shift();
                this._writer = true;
                head.grant();
                return;
            }
            this._queue.shift();
            this._readers++;
            head.grant();
        }
    }
}

/** Guard of an unsynchronized set: every acquisition succeeds at once. */
export class NoopMutex implements Guard {
    lock(): Promise<void> { return Promise.resolve(); }
    unlock(): void {}
    rLock(): Promise<void> { return Promise.resolve(); }
    rUnlock(): void {}

    async runExclusive<R>(fn: () => R | Promise<R>): Promise<R> {
        return await fn();
    }

    async runShared<R>(fn: () => R | Promise<R>): Promise<R> {
        return await fn();
    }
}

/**
 * Takes read locks on every distinct operand in ascending `id` order and runs
 * `fn` while holding them all. Two tasks locking the same operands in
 * different argument order therefore cannot deadlock each other.
 */
export async function lockAll<R>(operands: ReadonlyArray<Lockable>, fn: () => R | Promise<R>): Promise<R> {
    const ordered = [...new Set(operands)].sort((a, b) => a.id - b.id);
    const held: Guard[] = [];
    try {
        for (const operand of ordered) {
            await operand.guard.rLock();
            held.push(operand.guard);
        }
        return await fn();
    } finally {
        for (let i = held.length - 1; i >= 0; i--) held[i].rUnlock();
    }
}
