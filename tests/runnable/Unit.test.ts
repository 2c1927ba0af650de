/**
 * Unit.test.ts — Pipe Composition, Batching, Lambdas and Observed Runs
 *
 * Covers:
 *   - pipe across all four modes, including stream path selection
 *   - batch (sequential) and batchParallel (bounded, order-preserving)
 *   - lambda, syncLambda and streamingLambda
 *   - callbacks wrapped around a unit and its nested units
 */
import { describe, it, expect, vi } from 'vitest';
import { createUnit, pipe } from '../../src/runnable/Unit.js';
import { lambda, syncLambda, streamingLambda } from '../../src/runnable/lambda.js';
import { transform } from '../../src/streaming/StreamAlgebra.js';
import { fromIterable } from '../../src/streaming/sources.js';
import { CallbackManager } from '../../src/observability/CallbackManager.js';
import { type CallbackHandler } from '../../src/observability/CallbackHandler.js';
import { MODES } from '../../src/runnable/ExecutionUnit.js';
import { InvalidOptionsError } from '../../src/core/errors.js';

function sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
}

function recorder(events: string[]): CallbackHandler {
    return {
        name: 'recorder',
        onStart: (ctx, info) => {
            events.push(`start:${info.name}`);
            return ctx;
        },
        onEnd: (ctx, info) => {
            events.push(`end:${info.name}`);
            return ctx;
        },
        onError: (ctx, info) => {
            events.push(`error:${info.name}`);
            return ctx;
        },
    };
}

// ============================================================================
// pipe
// ============================================================================

describe('pipe', () => {
    it('should feed the first output into the second on invoke', async () => {
        const chain = lambda(async (n: number) => n + 1).pipe(syncLambda((n: number) => n * 2));
        expect(await chain.invoke(3)).toBe(8);
    });

    it('should name the sequence after both units', () => {
        const chain = pipe(
            syncLambda((s: string) => s, { name: 'left' }),
            syncLambda((s: string) => s, { name: 'right' }),
        );

        expect(chain.info.name).toBe('left | right');
        expect(chain.info.type).toBe('UnitSequence');
        expect(chain.info.category).toBe('chain');
    });

    it('should report all four modes as native', () => {
        const chain = pipe(syncLambda((n: number) => n), syncLambda((n: number) => n));
        expect(MODES.every((mode) => chain.supports(mode))).toBe(true);
    });

    it('should stream through the second unit when it transforms natively', async () => {
        const firstStream = vi.fn(async function* (_: string) {
            yield 'a';
            yield 'b';
        });
        const upper = createUnit<string, string>({
            transform: (input) => transform(input, (v) => v.toUpperCase()),
        });

        const chain = createUnit<string, string>({ stream: firstStream }).pipe(upper);

        expect(await chain.stream('x').toArray()).toEqual(['A', 'B']);
        expect(firstStream).toHaveBeenCalledOnce();
    });

    it('should invoke the first unit then stream the second otherwise', async () => {
        const firstStream = vi.fn(async function* (_: string) {
            yield 'never';
        });
        const firstInvoke = vi.fn(() => 'hi');
        const spell = streamingLambda(async function* (text: string) {
            for (const ch of text) yield ch;
        });

        const chain = createUnit<string, string>({ invoke: firstInvoke, stream: firstStream }).pipe(spell);

        expect(await chain.stream('ignored').toArray()).toEqual(['h', 'i']);
        expect(firstInvoke).toHaveBeenCalledOnce();
        expect(firstStream).not.toHaveBeenCalled();
    });

    it('should collect then invoke', async () => {
        const sum = createUnit<number, number>({
            collect: (input) => input.toArray().then((values) => values.reduce((a, b) => a + b, 0)),
        });
        const chain = sum.pipe(syncLambda((n: number) => `sum=${n}`));

        expect(await chain.collect(fromIterable([1, 2, 3]))).toBe('sum=6');
    });

    it('should chain transforms item by item', async () => {
        const chain = syncLambda((n: number) => n + 1).pipe(syncLambda((n: number) => n * 10));
        expect(await chain.transform(fromIterable([1, 2, 3])).toArray()).toEqual([20, 30, 40]);
    });

    it('should propagate a failure from the first unit', async () => {
        const second = vi.fn((n: number) => n);
        const chain = lambda(async (_: number): Promise<number> => {
            throw new Error('upstream failed');
        }).pipe(syncLambda(second));

        await expect(chain.invoke(1)).rejects.toThrow('upstream failed');
        expect(second).not.toHaveBeenCalled();
    });
});

// ============================================================================
// Batching
// ============================================================================

describe('batch', () => {
    it('should run inputs one at a time in order', async () => {
        let running = 0;
        let peak = 0;
        const unit = lambda(async (n: number) => {
            running++;
            peak = Math.max(peak, running);
            await sleep(2);
            running--;
            return n * n;
        });

        expect(await unit.batch([1, 2, 3])).toEqual([1, 4, 9]);
        expect(peak).toBe(1);
    });

    it('should stop at the first failure', async () => {
        const seen: number[] = [];
        const unit = syncLambda((n: number) => {
            seen.push(n);
            if (n === 2) throw new Error('bad input 2');
            return n;
        });

        await expect(unit.batch([1, 2, 3])).rejects.toThrow('bad input 2');
        expect(seen).toEqual([1, 2]);
    });
});

describe('batchParallel', () => {
    it('should preserve input order with varying latencies', async () => {
        const unit = lambda(async (ms: number) => {
            await sleep(ms);
            return `done:${ms}`;
        });
        expect(await unit.batchParallel([20, 1, 10])).toEqual(['done:20', 'done:1', 'done:10']);
    });

    it('should respect maxConcurrency', async () => {
        let running = 0;
        let peak = 0;
        const unit = lambda(async (n: number) => {
            running++;
            peak = Math.max(peak, running);
            await sleep(5);
            running--;
            return n;
        });

        expect(await unit.batchParallel([1, 2, 3, 4, 5], { maxConcurrency: 2 })).toEqual([1, 2, 3, 4, 5]);
        expect(peak).toBe(2);
    });

    it('should reject an invalid maxConcurrency', async () => {
        const unit = syncLambda((n: number) => n);
        await expect(unit.batchParallel([1], { maxConcurrency: 0 })).rejects.toBeInstanceOf(InvalidOptionsError);
    });
});

// ============================================================================
// Lambdas
// ============================================================================

describe('lambdas', () => {
    it('should default the run info of a lambda', () => {
        const unit = lambda(async (s: string) => s);

        expect(unit.info.name).toBe('Lambda');
        expect(unit.info.type).toBe('Lambda');
        expect(unit.info.category).toBe('runnable');
    });

    it('should keep a caller-supplied name', () => {
        expect(syncLambda((s: string) => s.length, { name: 'length' }).info.name).toBe('length');
    });

    it('should expose a streaming lambda as a native stream', async () => {
        const words = streamingLambda(async function* (text: string) {
            for (const word of text.split(' ')) yield word;
        });

        expect(words.supports('stream')).toBe(true);
        expect(words.supports('invoke')).toBe(false);
        expect(await words.stream('one two three').toArray()).toEqual(['one', 'two', 'three']);
        expect(await words.invoke('one two')).toBe('one');
    });
});

// ============================================================================
// Observed runs
// ============================================================================

describe('callbacks', () => {
    it('should wrap a sequence and each of its units', async () => {
        const events: string[] = [];
        const callbacks = new CallbackManager([recorder(events)]);
        const chain = syncLambda((n: number) => n + 1, { name: 'a' })
            .pipe(syncLambda((n: number) => n * 2, { name: 'b' }));

        expect(await chain.invoke(1, { callbacks })).toBe(4);
        expect(events).toEqual(['start:a | b', 'start:a', 'end:a', 'start:b', 'end:b', 'end:a | b']);
    });

    it('should fire the error hooks and rethrow', async () => {
        const events: string[] = [];
        const callbacks = new CallbackManager([recorder(events)]);
        const unit = syncLambda((_: number): number => {
            throw new Error('broken unit');
        }, { name: 'broken' });

        await expect(unit.invoke(1, { callbacks })).rejects.toThrow('broken unit');
        expect(events).toEqual(['start:broken', 'error:broken']);
    });

    it('should pass the context produced by onStart to the unit', async () => {
        const seen: unknown[] = [];
        const callbacks = new CallbackManager([{
            onStart: (ctx) => ({ ...ctx, requestId: 'req-1' }),
        }]);
        const unit = syncLambda((n: number, options) => {
            seen.push(options?.context?.['requestId']);
            return n;
        });

        await unit.invoke(1, { callbacks });
        expect(seen).toEqual(['req-1']);
    });

    it('should fire onEnd once a streamed output completes', async () => {
        const ends: unknown[] = [];
        const callbacks = new CallbackManager([{
            onEnd: (ctx, _info, output) => {
                ends.push(output.metadata);
                return ctx;
            },
        }]);
        const words = streamingLambda(async function* (text: string) {
            for (const word of text.split(' ')) yield word;
        });

        expect(await words.stream('a b', { callbacks }).toArray()).toEqual(['a', 'b']);
        expect(ends).toEqual([{ streamed: true, items: 2 }]);
    });
});
