/**
 * StreamAlgebra.test.ts — merge, mergeNamed, concat, copy, transform, first
 */
import { describe, it, expect } from 'vitest';
import { merge, mergeNamed, concat, copy, transform, first, SKIP } from '../../src/streaming/StreamAlgebra.js';
import { BroadcastBuffer } from '../../src/streaming/BroadcastBuffer.js';
import { createChannel } from '../../src/streaming/Channel.js';
import { fromIterable, fromAsyncIterable, emptyStream } from '../../src/streaming/sources.js';
import { END_ITEM, valueItem, isSourceExhausted, type StreamItem } from '../../src/streaming/StreamItem.js';
import type { StreamReader } from '../../src/streaming/StreamReader.js';
import { EmptyStreamError, InvalidOptionsError, StreamClosedError } from '../../src/core/errors.js';

// ============================================================================
// Helpers
// ============================================================================

async function drain<T>(reader: StreamReader<T>): Promise<StreamItem<T>[]> {
    const items: StreamItem<T>[] = [];
    for (;;) {
        const item = await reader.read();
        items.push(item);
        if (item.kind === 'end') return items;
    }
}

function valuesOf<T>(items: readonly StreamItem<T>[]): T[] {
    const values: T[] = [];
    for (const item of items) {
        if (item.kind === 'value') values.push(item.value);
    }
    return values;
}

function errorMessageOf<T>(item: StreamItem<T>): string | undefined {
    return item.kind === 'error' && item.error instanceof Error ? item.error.message : undefined;
}

async function* failingAfter<T>(values: readonly T[], message: string): AsyncGenerator<T> {
    for (const value of values) yield value;
    throw new Error(message);
}

// ============================================================================
// merge
// ============================================================================

describe('merge', () => {
    it('should yield every value while preserving per-source order', async () => {
        const merged = await merge([fromIterable([1, 2, 3]), fromIterable([4, 5, 6])]).toArray();

        expect([...merged].sort((a, b) => a - b)).toEqual([1, 2, 3, 4, 5, 6]);
        expect(merged.filter((v) => v <= 3)).toEqual([1, 2, 3]);
        expect(merged.filter((v) => v > 3)).toEqual([4, 5, 6]);
    });

    it('should forward an error from one source without closing the others', async () => {
        const items = await drain(merge([
            fromAsyncIterable(failingAfter([1], 'left failed')),
            fromIterable([10, 20]),
        ]));

        const errors = items.filter((item) => item.kind === 'error');
        expect(errors).toHaveLength(1);
        expect(valuesOf(items).sort((a, b) => a - b)).toEqual([1, 10, 20]);
        expect(items[items.length - 1]).toEqual(END_ITEM);
    });

    it('should return an ended stream for zero readers', async () => {
        expect(await merge<number>([]).read()).toEqual(END_ITEM);
    });

    it('should return the single reader unchanged', () => {
        const only = fromIterable([1]);
        expect(merge([only])).toBe(only);
    });

    it('should retire its inputs for the caller', async () => {
        const a = fromIterable([1]);
        const b = fromIterable([2]);
        const merged = merge([a, b]);

        expect(a.closed).toBe(true);
        await expect(a.read()).rejects.toBeInstanceOf(StreamClosedError);
        expect((await merged.toArray()).length).toBe(2);
    });

    it('should refuse a closed input without detaching the others', () => {
        const a = fromIterable([1]);
        const b = fromIterable([2]);
        b.close();

        expect(() => merge([a, b])).toThrow(StreamClosedError);
        expect(a.closed).toBe(false);
    });

    it('should cancel its sources when the output is retired', async () => {
        const { reader, writer } = createChannel<number>();
        const merged = merge([reader, fromIterable([1])]);
        merged.close();

        expect(await writer.write(5)).toBe(false);
    });
});

// ============================================================================
// mergeNamed
// ============================================================================

describe('mergeNamed', () => {
    it('should emit an exhaustion marker per drained source', async () => {
        const items = await drain(mergeNamed({ a: fromIterable([1]), b: fromIterable([2, 3]) }));

        const exhausted = items.filter(isSourceExhausted).map((item) => item.error.source);
        expect([...exhausted].sort()).toEqual(['a', 'b']);
        expect(valuesOf(items).sort((x, y) => x - y)).toEqual([1, 2, 3]);
    });

    it('should report a source only after its last value', async () => {
        const items = await drain(mergeNamed(new Map([['solo', fromIterable(['x', 'y'])]])));

        expect(items).toHaveLength(4);
        expect(items[0]).toEqual(valueItem('x'));
        expect(items[1]).toEqual(valueItem('y'));
        expect(isSourceExhausted(items[2])).toBe(true);
        expect(items[3]).toEqual(END_ITEM);
    });

    it('should carry the source name in the marker error', async () => {
        const items = await drain(mergeNamed({ docs: emptyStream<number>() }));
        const [marker] = items.filter(isSourceExhausted);

        expect(marker.error.code).toBe('SOURCE_EXHAUSTED');
        expect(marker.error.message).toBe('[runweave] Source stream "docs" is exhausted.');
    });

    it('should return an ended stream for an empty map', async () => {
        expect(await mergeNamed<number>({}).read()).toEqual(END_ITEM);
    });
});

// ============================================================================
// concat
// ============================================================================

describe('concat', () => {
    it('should drain each reader fully before the next', async () => {
        expect(await concat([fromIterable([1, 2]), fromIterable([3, 4])]).toArray()).toEqual([1, 2, 3, 4]);
    });

    it('should forward error items in position and continue with the next reader', async () => {
        const items = await drain(concat([
            fromAsyncIterable(failingAfter([1], 'first failed')),
            fromIterable([3]),
        ]));

        expect(items).toHaveLength(4);
        expect(items[0]).toEqual(valueItem(1));
        expect(errorMessageOf(items[1])).toBe('first failed');
        expect(items[2]).toEqual(valueItem(3));
        expect(items[3]).toEqual(END_ITEM);
    });

    it('should return an ended stream for zero readers', async () => {
        expect(await concat<string>([]).read()).toEqual(END_ITEM);
    });
});

// ============================================================================
// copy
// ============================================================================

describe('copy', () => {
    it('should give every copy the full sequence in order', async () => {
        const [a, b, c] = copy(fromIterable([1, 2, 3]), 3);

        expect(await a.toArray()).toEqual([1, 2, 3]);
        expect(await b.toArray()).toEqual([1, 2, 3]);
        expect(await c.toArray()).toEqual([1, 2, 3]);
    });

    it('should let copies advance at their own pace', async () => {
        const [fast, slow] = copy(fromIterable(['a', 'b', 'c']), 2);

        expect(await fast.read()).toEqual(valueItem('a'));
        expect(await fast.read()).toEqual(valueItem('b'));
        expect(await slow.read()).toEqual(valueItem('a'));
        expect(await fast.read()).toEqual(valueItem('c'));
        expect(await fast.read()).toEqual(END_ITEM);
        expect(await slow.toArray()).toEqual(['b', 'c']);
    });

    it('should keep error items at their position in every copy', async () => {
        const [a, b] = copy(fromAsyncIterable(failingAfter([1], 'broken')), 2);

        const left = await drain(a);
        const right = await drain(b);
        expect(left.map((item) => item.kind)).toEqual(['value', 'error', 'end']);
        expect(right.map((item) => item.kind)).toEqual(['value', 'error', 'end']);
    });

    it('should retire the original reader', async () => {
        const original = fromIterable([1]);
        copy(original, 2);
        await expect(original.read()).rejects.toBeInstanceOf(StreamClosedError);
    });

    it('should return the original reader for a count of 1', () => {
        const original = fromIterable([1]);
        expect(copy(original, 1)).toEqual([original]);
        expect(copy(original, 1)[0]).toBe(original);
    });

    it('should return no readers and cancel the source for a count of 0', async () => {
        const { reader, writer } = createChannel<number>();
        expect(copy(reader, 0)).toEqual([]);
        expect(reader.closed).toBe(true);
        expect(await writer.write(1)).toBe(false);
    });

    it('should reject a negative or fractional count', () => {
        expect(() => copy(fromIterable([1]), -1)).toThrow(InvalidOptionsError);
        expect(() => copy(fromIterable([1]), 2.5)).toThrow(InvalidOptionsError);
    });

    it('should cancel the source only once every copy is retired', async () => {
        const { reader, writer } = createChannel<number>({ capacity: 1 });
        const [a, b] = copy(reader, 2);

        a.close();
        expect(await writer.write(1)).toBe(true);

        b.close();
        expect(await writer.write(2)).toBe(false);
    });
});

describe('BroadcastBuffer', () => {
    it('should retain only the items between the slowest and the fastest cursor', async () => {
        const buffer = new BroadcastBuffer(fromIterable([1, 2, 3, 4]).detach(), 2);

        for (let i = 0; i < 4; i++) await buffer.next(0);
        expect(buffer.retained).toBe(4);

        expect(await buffer.next(1)).toEqual(valueItem(1));
        expect(buffer.retained).toBe(3);

        buffer.detach(1);
        expect(buffer.retained).toBe(0);
    });

    it('should raise StreamClosedError for a detached cursor', async () => {
        const buffer = new BroadcastBuffer(fromIterable([1]).detach(), 2);
        buffer.detach(0);
        await expect(buffer.next(0)).rejects.toBeInstanceOf(StreamClosedError);
    });
});

// ============================================================================
// transform
// ============================================================================

describe('transform', () => {
    it('should drop values for which the mapper returns SKIP', async () => {
        const odd = transform(fromIterable([1, 2, 3, 4, 5, 6]), (v) => (v % 2 === 0 ? SKIP : v));
        expect(await odd.toArray()).toEqual([1, 3, 5]);
    });

    it('should await async mappers in input order', async () => {
        const doubled = transform(fromIterable([3, 1, 2]), async (v) => {
            await new Promise((resolve) => setTimeout(resolve, v));
            return v * 2;
        });
        expect(await doubled.toArray()).toEqual([6, 2, 4]);
    });

    it('should replace a throwing value with an error item in position', async () => {
        const items = await drain(transform(fromIterable([1, 2, 3]), (v) => {
            if (v === 2) throw new Error('two');
            return v * 10;
        }));

        expect(items).toHaveLength(4);
        expect(items[0]).toEqual(valueItem(10));
        expect(errorMessageOf(items[1])).toBe('two');
        expect(items[2]).toEqual(valueItem(30));
        expect(items[3]).toEqual(END_ITEM);
    });

    it('should forward source error items unchanged', async () => {
        const items = await drain(transform(fromAsyncIterable(failingAfter(['a'], 'source broke')), (v) => v.toUpperCase()));

        expect(items[0]).toEqual(valueItem('A'));
        expect(errorMessageOf(items[1])).toBe('source broke');
        expect(items[2]).toEqual(END_ITEM);
    });

    it('should cancel the source when the output is retired', async () => {
        const { reader, writer } = createChannel<number>();
        const mapped = transform(reader, (v) => v + 1);
        mapped.close();

        expect(await writer.write(1)).toBe(false);
    });
});

// ============================================================================
// first
// ============================================================================

describe('first', () => {
    it('should return the first value and retire the reader', async () => {
        const reader = fromIterable([7, 8]);
        expect(await first(reader, 'test')).toBe(7);
        expect(reader.closed).toBe(true);
    });

    it('should raise EmptyStreamError naming the caller on an empty stream', async () => {
        await expect(first(emptyStream(), 'lookup')).rejects.toThrow(
            new EmptyStreamError('lookup'),
        );
        await expect(first(emptyStream(), 'lookup')).rejects.toThrow(
            '[runweave] lookup: stream ended without producing a value.',
        );
    });

    it('should throw the error of a leading error item', async () => {
        await expect(first(fromAsyncIterable(failingAfter([], 'nothing')), 'test')).rejects.toThrow('nothing');
    });
});
