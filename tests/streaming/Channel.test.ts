/**
 * Channel.test.ts — Write/Read Semantics of a Single Channel
 *
 * Categories:
 * 1. Ordering and draining
 * 2. Capacity and suspension
 * 3. Closing and retiring
 * 4. Reader conveniences
 * 5. Options validation
 */
import { describe, it, expect } from 'vitest';
import { createChannel } from '../../src/streaming/Channel.js';
import { END_ITEM, valueItem } from '../../src/streaming/StreamItem.js';
import { StreamClosedError, InvalidOptionsError } from '../../src/core/errors.js';

/** Let queued microtasks run. */
async function flush(): Promise<void> {
    for (let i = 0; i < 5; i++) await Promise.resolve();
}

// ============================================================================
// 1. Ordering and Draining
// ============================================================================

describe('Channel — ordering', () => {
    it('should deliver values in write order', async () => {
        const { reader, writer } = createChannel<number>({ capacity: 3 });
        await writer.write(1);
        await writer.write(2);
        await writer.write(3);
        writer.close();

        expect(await reader.read()).toEqual(valueItem(1));
        expect(await reader.read()).toEqual(valueItem(2));
        expect(await reader.read()).toEqual(valueItem(3));
        expect(await reader.read()).toEqual(END_ITEM);
    });

    it('should drain a suspended write that was pending when the writer closed', async () => {
        const { reader, writer } = createChannel<string>();
        const pending = writer.write('late');
        writer.close();

        expect(await reader.read()).toEqual(valueItem('late'));
        expect(await pending).toBe(true);
        expect(await reader.read()).toEqual(END_ITEM);
    });

    it('should keep the stream open after an error item', async () => {
        const { reader, writer } = createChannel<number>({ capacity: 4 });
        const boom = new Error('boom');
        await writer.writeError(boom);
        await writer.write(2);
        writer.close();

        expect(await reader.read()).toEqual({ kind: 'error', error: boom });
        expect(await reader.read()).toEqual(valueItem(2));
        expect(await reader.read()).toEqual(END_ITEM);
    });

    it('should resolve a waiting read with the next write', async () => {
        const { reader, writer } = createChannel<string>();
        const read = reader.read();
        expect(await writer.write('x')).toBe(true);
        expect(await read).toEqual(valueItem('x'));
    });
});

// ============================================================================
// 2. Capacity and Suspension
// ============================================================================

describe('Channel — capacity', () => {
    it('should suspend a capacity-0 write until a reader takes the item', async () => {
        const { reader, writer } = createChannel<string>();
        let accepted: boolean | undefined;
        const pending = writer.write('a').then((value) => {
            accepted = value;
        });

        await flush();
        expect(accepted).toBeUndefined();

        expect(await reader.read()).toEqual(valueItem('a'));
        await pending;
        expect(accepted).toBe(true);
    });

    it('should accept up to capacity writes without a reader', async () => {
        const { reader, writer } = createChannel<number>({ capacity: 2 });
        expect(await writer.write(1)).toBe(true);
        expect(await writer.write(2)).toBe(true);

        let thirdAccepted = false;
        const third = writer.write(3).then((value) => {
            thirdAccepted = value;
        });
        await flush();
        expect(thirdAccepted).toBe(false);

        expect(await reader.read()).toEqual(valueItem(1));
        await third;
        expect(thirdAccepted).toBe(true);

        writer.close();
        expect(await reader.toArray()).toEqual([2, 3]);
    });
});

// ============================================================================
// 3. Closing and Retiring
// ============================================================================

describe('Channel — closing', () => {
    it('should deliver end-of-stream once, then raise StreamClosedError', async () => {
        const { reader, writer } = createChannel<number>();
        writer.close();

        expect(await reader.read()).toEqual(END_ITEM);
        await expect(reader.read()).rejects.toBeInstanceOf(StreamClosedError);
        expect(reader.closed).toBe(true);
    });

    it('should resolve writes on a closed writer with false', async () => {
        const { writer } = createChannel<number>({ capacity: 1 });
        writer.close();
        writer.close();

        expect(writer.closed).toBe(true);
        expect(await writer.write(1)).toBe(false);
        expect(await writer.writeError(new Error('late'))).toBe(false);
    });

    it('should resolve suspended and later writes with false once the reader retires', async () => {
        const { reader, writer } = createChannel<number>();
        const suspended = writer.write(1);
        reader.close();

        expect(await suspended).toBe(false);
        expect(await writer.write(2)).toBe(false);
        expect(writer.closed).toBe(true);
    });

    it('should reject a read that is waiting when the reader retires', async () => {
        const { reader } = createChannel<number>();
        const read = reader.read();
        reader.close();

        await expect(read).rejects.toBeInstanceOf(StreamClosedError);
        await expect(reader.read()).rejects.toThrow('reader was retired');
    });

    it('should refuse to detach a retired reader', () => {
        const { reader } = createChannel<number>();
        reader.close();
        expect(() => reader.detach()).toThrow(StreamClosedError);
    });
});

// ============================================================================
// 4. Reader Conveniences
// ============================================================================

describe('Channel — reader conveniences', () => {
    it('toArray() should reject with the first in-band error and retire the reader', async () => {
        const { reader, writer } = createChannel<number>({ capacity: 3 });
        await writer.write(1);
        await writer.writeError(new Error('first'));
        await writer.writeError(new Error('second'));

        await expect(reader.toArray()).rejects.toThrow('first');
        expect(reader.closed).toBe(true);
        expect(await writer.write(4)).toBe(false);
    });

    it('for await should yield values until end-of-stream', async () => {
        const { reader, writer } = createChannel<string>({ capacity: 2 });
        await writer.write('a');
        await writer.write('b');
        writer.close();

        const seen: string[] = [];
        for await (const value of reader) seen.push(value);
        expect(seen).toEqual(['a', 'b']);
    });

    it('for await should retire the reader when the loop exits early', async () => {
        const { reader, writer } = createChannel<number>({ capacity: 3 });
        await writer.write(1);
        await writer.write(2);

        const seen: number[] = [];
        for await (const value of reader) {
            seen.push(value);
            break;
        }

        expect(seen).toEqual([1]);
        expect(reader.closed).toBe(true);
        expect(await writer.write(3)).toBe(false);
    });

    it('for await should throw on an error item', async () => {
        const { reader, writer } = createChannel<number>({ capacity: 2 });
        await writer.write(1);
        await writer.writeError(new Error('mid-stream'));

        const seen: number[] = [];
        await expect((async () => {
            for await (const value of reader) seen.push(value);
        })()).rejects.toThrow('mid-stream');
        expect(seen).toEqual([1]);
        expect(reader.closed).toBe(true);
    });
});

// ============================================================================
// 5. Options Validation
// ============================================================================

describe('Channel — options', () => {
    it('should reject a negative capacity', () => {
        expect(() => createChannel({ capacity: -1 })).toThrow(InvalidOptionsError);
    });

    it('should reject a fractional capacity with a descriptive message', () => {
        expect(() => createChannel({ capacity: 1.5 })).toThrow(/Invalid channel options: capacity:/);
    });
});
