/**
 * Stream Sources — Readers Over Existing Data
 *
 * @module
 */
import { type StreamItem, END_ITEM, valueItem, errorItem } from './StreamItem.js';
import { BaseStreamReader, type StreamReader } from './StreamReader.js';

// ── Iterable ─────────────────────────────────────────────

class IterableReader<T> extends BaseStreamReader<T> {
    private readonly _iterator: Iterator<T>;
    private _done = false;

    constructor(items: Iterable<T>) {
        super();
        this._iterator = items[Symbol.iterator]();
    }

    protected pull(): Promise<StreamItem<T>> {
        if (this._done) return Promise.resolve(END_ITEM);
        try {
            const next = this._iterator.next();
            if (next.done === true) {
                this._done = true;
                return Promise.resolve(END_ITEM);
            }
            return Promise.resolve(valueItem(next.value));
        } catch (err) {
            this._done = true;
            return Promise.resolve(errorItem(err));
        }
    }

    protected release(): void {
        if (this._done) return;
        this._done = true;
        this._iterator.return?.();
    }
}

/**
 * Reader over a synchronous iterable. Values are pulled lazily.
 *
 * @example
 * ```typescript
 * await fromIterable([1, 2, 3]).toArray(); // [1, 2, 3]
 * ```
 */
export function fromIterable<T>(items: Iterable<T>): StreamReader<T> {
    return new IterableReader(items);
}

// ── Async Iterable ───────────────────────────────────────

class AsyncIterableReader<T> extends BaseStreamReader<T> {
    private readonly _iterator: AsyncIterator<T>;
    private _done = false;

    constructor(iterable: AsyncIterable<T>) {
        super();
        this._iterator = iterable[Symbol.asyncIterator]();
    }

    protected async pull(): Promise<StreamItem<T>> {
        if (this._done) return END_ITEM;
        try {
            const next = await this._iterator.next();
            if (next.done === true) {
                this._done = true;
                return END_ITEM;
            }
            return valueItem(next.value);
        } catch (err) {
            // The iterable cannot be resumed after throwing.
            this._done = true;
            return errorItem(err);
        }
    }

    protected release(): void {
        if (this._done) return;
        this._done = true;
        const returned = this._iterator.return?.();
        if (returned) {
            returned.catch((err: unknown) => {
                console.warn('[runweave] Async iterable failed while being cancelled:', err);
            });
        }
    }
}

/**
 * Reader over an async iterable (an async generator, a Node stream, ...).
 *
 * An exception thrown by the iterable becomes one error item followed by
 * end-of-stream. Retiring the reader calls the iterator's `return()`.
 */
export function fromAsyncIterable<T>(iterable: AsyncIterable<T>): StreamReader<T> {
    return new AsyncIterableReader(iterable);
}

/**
 * Reader that is already at end-of-stream.
 */
export function emptyStream<T>(): StreamReader<T> {
    return new IterableReader<T>([]);
}

// ── Normalization ────────────────────────────────────────

/**
 * True when `value` is a {@link StreamReader} rather than a bare iterable.
 */
export function isStreamReader<T>(value: StreamReader<T> | AsyncIterable<T>): value is StreamReader<T> {
    return 'detach' in value && typeof value.detach === 'function';
}

/**
 * Accept either a reader or an async iterable, returning a reader.
 * @internal
 */
export function toStreamReader<T>(value: StreamReader<T> | AsyncIterable<T>): StreamReader<T> {
    return isStreamReader(value) ? value : fromAsyncIterable(value);
}
