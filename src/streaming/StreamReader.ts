/**
 * StreamReader — Read-End Contract Shared by Every Stream
 *
 * Channel readers, iterable sources, broadcast copies and combinator
 * outputs all extend {@link BaseStreamReader}, which owns the reader
 * lifecycle:
 *
 *   open ──read() → end──► exhausted ──read()──► StreamClosedError
 *     │
 *     ├──close()────────► retired   ──read()──► StreamClosedError
 *     └──detach()───────► retired   (ownership moved to a combinator)
 *
 * Subclasses only implement `pull()` (produce the next item) and
 * `release()` (free upstream resources, cancel the producer).
 *
 * @module
 */
import { StreamClosedError } from '../core/errors.js';
import { type StreamItem, END_ITEM, errorItem } from './StreamItem.js';

// ── Contracts ────────────────────────────────────────────

/**
 * Ownership handle over a reader's item supply, used by stream
 * combinators. `pull()` never rejects: an upstream failure becomes one
 * error item followed by end-of-stream.
 */
export interface StreamSource<T> {
    pull(): Promise<StreamItem<T>>;
    /** Stop the upstream producer and drop buffered items. Idempotent. */
    cancel(): void;
}

/**
 * The read end of a stream.
 *
 * @example
 * ```typescript
 * for await (const chunk of reader) {
 *     process.stdout.write(chunk);
 * }
 * ```
 */
export interface StreamReader<T> extends AsyncIterable<T> {
    /**
     * Next item. Suspends until one is available. Rejects with
     * {@link StreamClosedError} once end-of-stream was delivered or
     * the reader was retired.
     */
    read(): Promise<StreamItem<T>>;

    /** Drain every value; rejects with the first in-band error. */
    toArray(): Promise<T[]>;

    /** Retire this reader and cancel its producer. Idempotent. */
    close(): void;

    /** True once exhausted, retired or detached. */
    readonly closed: boolean;

    /**
     * Hand the item supply to another consumer (a stream combinator).
     * This reader is retired for its previous holder.
     */
    detach(): StreamSource<T>;
}

type ReaderState = 'open' | 'exhausted' | 'retired';

// ── Base Implementation ──────────────────────────────────

/**
 * Lifecycle bookkeeping for {@link StreamReader} implementations.
 */
export abstract class BaseStreamReader<T> implements StreamReader<T> {
    private _state: ReaderState = 'open';
    private _released = false;

    /** Produce the next item; may reject once released. */
    protected abstract pull(): Promise<StreamItem<T>>;

    /** Free upstream resources. Called at most once. */
    protected abstract release(): void;

    get closed(): boolean {
        return this._state !== 'open';
    }

    async read(): Promise<StreamItem<T>> {
        this._assertOpen();
        const item = await this.pull();
        // A concurrent read may have consumed end-of-stream while this one waited.
        this._assertOpen();
        if (item.kind === 'end') {
            this._state = 'exhausted';
            this._release();
        }
        return item;
    }

    async toArray(): Promise<T[]> {
        const values: T[] = [];
        for (;;) {
            const item = await this.read();
            if (item.kind === 'end') return values;
            if (item.kind === 'error') {
                this.close();
                throw item.error;
            }
            values.push(item.value);
        }
    }

    close(): void {
        if (this._state !== 'open') return;
        this._state = 'retired';
        this._release();
    }

    detach(): StreamSource<T> {
        if (this._state !== 'open') {
            throw new StreamClosedError('reader was already consumed or retired');
        }
        this._state = 'retired';

        let failed = false;
        return {
            pull: async () => {
                if (failed) return END_ITEM;
                try {
                    return await this.pull();
                } catch (err) {
                    failed = true;
                    return errorItem(err);
                }
            },
            cancel: () => this._release(),
        };
    }

    async *[Symbol.asyncIterator](): AsyncGenerator<T, void, undefined> {
        let finished = false;
        try {
            for (;;) {
                const item = await this.read();
                if (item.kind === 'end') {
                    finished = true;
                    return;
                }
                if (item.kind === 'error') throw item.error;
                yield item.value;
            }
        } finally {
            if (!finished) this.close();
        }
    }

    // ── Private ──────────────────────────────────────────

    private _assertOpen(): void {
        if (this._state === 'exhausted') throw new StreamClosedError('stream already delivered end-of-stream');
        if (this._state === 'retired') throw new StreamClosedError('reader was retired');
    }

    private _release(): void {
        if (this._released) return;
        this._released = true;
        this.release();
    }
}

// ── Adapters ─────────────────────────────────────────────

/**
 * Reader over an already-detached {@link StreamSource}.
 * @internal
 */
export class SourceReader<T> extends BaseStreamReader<T> {
    constructor(private readonly _source: StreamSource<T>) {
        super();
    }

    protected pull(): Promise<StreamItem<T>> {
        return this._source.pull();
    }

    protected release(): void {
        this._source.cancel();
    }
}
