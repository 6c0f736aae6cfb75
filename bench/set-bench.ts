/**
 * @file Benchmarks for ConcurrentSet.
 * Usage: tsx bench/set-bench.ts --seed=12345 --size=20000
 */

import { ConcurrentSet, newSet } from '../src/index';

// ============================================================================
// CONFIGURATION & UTILITIES
// ============================================================================

function readArg(name: string, fallback: number): number {
    const arg = process.argv.slice(2).find(a => a.startsWith(`--${name}=`));
    const parsed = arg ? Number(arg.split('=')[1]) : fallback;
    return Number.isFinite(parsed) ? parsed : fallback;
}

const SEED = readArg('seed', 1337);
const SIZE = readArg('size', 10000);

/** Deterministic PRNG (Mulberry32). */
function createRNG(seed: number) {
    return function() {
        let t = seed += 0x6D2B79F5;
        t = Math.imul(t ^ (t >>> 15), t | 1);
        t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
        return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
    };
}
const random = createRNG(SEED);

async function measure<T>(label: string, fn: () => Promise<T>): Promise<T> {
    const start = performance.now();
    const result = await fn();
    const end = performance.now();
    console.log(`[PERF] ${label}: ${(end - start).toFixed(2)}ms`);
    return result;
}

function randomInts(count: number): number[] {
    return Array.from({ length: count }, () => Math.floor(random() * SIZE * 4));
}

// ============================================================================
// SCENARIOS
// ============================================================================

async function insertScenario(unsafe: boolean): Promise<ConcurrentSet<number>> {
    const s = newSet<number>(unsafe);
    for (const v of randomInts(SIZE)) await s.add(v);
    return s;
}

async function main(): Promise<void> {
    console.log(`=== ConcurrentSet Benchmarks ===`);
    console.log(`[Config] RNG Seed: ${SEED}, Size: ${SIZE}\n`);

    const locked = await measure(`Scenario 1: ${SIZE} single inserts (locked)`, () => insertScenario(false));
    const unlocked = await measure(`Scenario 2: ${SIZE} single inserts (unsafe)`, () => insertScenario(true));

    await measure(`Scenario 3: ${SIZE} batched insert`, async () => {
        const s = newSet<number>();
        await s.add(...randomInts(SIZE));
        return s;
    });

    await measure('Scenario 4: 8 tasks adding concurrently', async () => {
        const s = newSet<number>();
        const per = Math.floor(SIZE / 8);
        await Promise.all(Array.from({ length: 8 }, (_, t) => (async () => {
            for (let i = 0; i < per; i++) await s.add(t * per + i);
        })()));
        return s;
    });

    await measure('Scenario 5: union / intersect / diff', async () => {
        await locked.union(unlocked);
        await locked.intersect(unlocked);
        await locked.diff(unlocked);
    });

    await measure('Scenario 6: equality check', () => locked.equal(unlocked));

    console.log('\n✅ All Benchmarks Completed');
}

main().catch(err => {
    console.error(err);
    process.exit(1);
});
