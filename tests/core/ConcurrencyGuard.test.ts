/**
 * ConcurrencyGuard.test.ts — Semaphore and Ordered Concurrent Map
 */
import { describe, it, expect } from 'vitest';
import { ConcurrencyGuard, createConcurrencyGuard, mapConcurrent } from '../../src/core/ConcurrencyGuard.js';

function deferred(): { promise: Promise<void>; resolve: () => void } {
    let resolve = (): void => {};
    const promise = new Promise<void>((r) => {
        resolve = r;
    });
    return { promise, resolve };
}

describe('ConcurrencyGuard', () => {
    it('should queue acquisitions above the limit in FIFO order', async () => {
        const guard = new ConcurrencyGuard(1);
        const order: string[] = [];

        const releaseFirst = await guard.acquire();
        const second = guard.acquire().then((release) => {
            order.push('second');
            release();
        });
        const third = guard.acquire().then((release) => {
            order.push('third');
            release();
        });

        expect(guard.active).toBe(1);
        expect(guard.queued).toBe(2);

        releaseFirst();
        await Promise.all([second, third]);

        expect(order).toEqual(['second', 'third']);
        expect(guard.active).toBe(0);
        expect(guard.queued).toBe(0);
    });

    it('should release the slot when a task rejects', async () => {
        const guard = new ConcurrencyGuard(1);
        await expect(guard.run(() => Promise.reject(new Error('task failed')))).rejects.toThrow('task failed');
        expect(guard.active).toBe(0);
    });

    it('should ignore a second release call', async () => {
        const guard = new ConcurrencyGuard(2);
        const release = await guard.acquire();
        release();
        release();
        expect(guard.active).toBe(0);
    });

    it('createConcurrencyGuard should return undefined without a limit', () => {
        expect(createConcurrencyGuard()).toBeUndefined();
        expect(createConcurrencyGuard(3)).toBeInstanceOf(ConcurrencyGuard);
    });
});

describe('mapConcurrent', () => {
    it('should preserve input order regardless of completion order', async () => {
        const delays = [30, 5, 15];
        const results = await mapConcurrent(
            delays,
            (ms, index) => new Promise<string>((resolve) => setTimeout(() => resolve(`#${index}:${ms}`), ms)),
            undefined,
        );
        expect(results).toEqual(['#0:30', '#1:5', '#2:15']);
    });

    it('should never exceed the guard limit', async () => {
        const guard = new ConcurrencyGuard(2);
        let running = 0;
        let peak = 0;
        const gates = [deferred(), deferred(), deferred(), deferred()];

        const all = mapConcurrent(gates, async (gate, index) => {
            running++;
            peak = Math.max(peak, running);
            await gate.promise;
            running--;
            return index;
        }, guard);

        for (const gate of gates) {
            await new Promise((resolve) => setTimeout(resolve, 1));
            gate.resolve();
        }

        expect(await all).toEqual([0, 1, 2, 3]);
        expect(peak).toBe(2);
    });
});
