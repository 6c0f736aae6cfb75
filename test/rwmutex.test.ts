import { describe, expect, it } from 'vitest';
import { NoopMutex, RWMutex, lockAll } from '../src/rwmutex';
import type { Lockable } from '../src/rwmutex';

const tick = () => new Promise<void>(resolve => setTimeout(resolve, 0));

class RecordingGuard extends NoopMutex {
    constructor(private readonly name: string, private readonly log: string[]) { super(); }
    rLock(): Promise<void> {
        this.log.push(`lock ${this.name}`);
        return Promise.resolve();
    }
    rUnlock(): void { this.log.push(`unlock ${this.name}`); }
}

describe('RWMutex', () => {
    it('admits several readers at once', async () => {
        const m = new RWMutex();
        await m.rLock();
        await m.rLock();
        expect(m.readers).toBe(2);
        m.rUnlock();
        m.rUnlock();
        expect(m.readers).toBe(0);
    });

    it('makes a writer wait for readers', async () => {
        const m = new RWMutex();
        await m.rLock();
        let acquired = false;
        const writer = m.lock().then(() => { acquired = true; });
        await tick();
        expect(acquired).toBe(false);

        m.rUnlock();
        await writer;
        expect(acquired).toBe(true);
        expect(m.isWriteLocked).toBe(true);
        m.unlock();
    });

    it('queues new readers behind a waiting writer', async () => {
        const m = new RWMutex();
        const order: string[] = [];
        await m.rLock();

        const writer = m.lock().then(() => {
            order.push('writer');
            m.unlock();
        });
        const reader = m.rLock().then(() => {
            order.push('reader');
            m.rUnlock();
        });
        expect(m.pending).toBe(2);

        m.rUnlock();
        await Promise.all([writer, reader]);
        expect(order).toEqual(['writer', 'reader']);
    });

    it('admits queued readers together once the writer leaves', async () => {
        const m = new RWMutex();
        await m.lock();
        const readers = [m.rLock(), m.rLock()];
        expect(m.pending).toBe(2);

        m.unlock();
        await Promise.all(readers);
        expect(m.readers).toBe(2);
        expect(m.pending).toBe(0);
    });

    it('serializes writers', async () => {
        const m = new RWMutex();
        let inside = 0;
        let maxInside = 0;
        const job = () => m.runExclusive(async () => {
            inside++;
            maxInside = Math.max(maxInside, inside);
            await tick();
            inside--;
        });
        await Promise.all([job(), job(), job()]);
        expect(maxInside).toBe(1);
    });

    it('rejects unbalanced unlocks', () => {
        const m = new RWMutex();
        expect(() => m.unlock()).toThrow('InvalidOperation: RWMutex unlock of unlocked mutex');
        expect(() => m.rUnlock()).toThrow('InvalidOperation: RWMutex rUnlock of unlocked mutex');
    });

    it('releases the lock when the guarded function throws', async () => {
        const m = new RWMutex();
        await expect(m.runExclusive(() => { throw new Error('boom'); })).rejects.toThrow('boom');
        expect(m.isWriteLocked).toBe(false);

        await expect(m.runShared(async () => { throw new Error('bang'); })).rejects.toThrow('bang');
        expect(m.readers).toBe(0);
    });

    it('passes the guarded result through', async () => {
        const m = new RWMutex();
        expect(await m.runShared(() => 41 + 1)).toBe(42);
        expect(await m.runExclusive(async () => 'done')).toBe('done');
    });
});

describe('lockAll', () => {
    const operand = (id: number, log: string[]): Lockable => ({ id, guard: new RecordingGuard(String(id), log) });

    it('locks distinct operands by ascending id and unlocks in reverse', async () => {
        const log: string[] = [];
        const a = operand(1, log);
        const b = operand(2, log);
        await lockAll([b, a, b], () => { log.push('run'); });
        expect(log).toEqual(['lock 1', 'lock 2', 'run', 'unlock 2', 'unlock 1']);
    });

    it('unlocks everything when the body throws', async () => {
        const log: string[] = [];
        await expect(lockAll([operand(3, log)], () => { throw new Error('fail'); })).rejects.toThrow('fail');
        expect(log).toEqual(['lock 3', 'unlock 3']);
    });
});
