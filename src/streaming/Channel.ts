/**
 * Channel — Single-Writer Conduit of Stream Items
 *
 * A channel connects exactly one writer to one reader (more readers only
 * appear through `copy()`). Items flow in write order; errors travel
 * in-band; end-of-stream is delivered once.
 *
 * Backpressure:
 * - `capacity: 0` is a synchronous handoff: `write()` suspends until a
 *   reader takes the item.
 * - `capacity: N` buffers up to N items; a write past N suspends until
 *   a read frees a slot.
 *
 * Cancellation is retiring the reader (`reader.close()`): the buffer is
 * dropped and every suspended or later write resolves `false`.
 *
 * @example
 * ```typescript
 * const { reader, writer } = createChannel<string>({ capacity: 4 });
 *
 * void (async () => {
 *     for (const token of ['a', 'b', 'c']) {
 *         if (!await writer.write(token)) return; // consumer went away
 *     }
 *     writer.close();
 * })();
 *
 * await reader.toArray(); // ['a', 'b', 'c']
 * ```
 *
 * @module
 */
import { StreamClosedError } from '../core/errors.js';
import { ChannelOptionsSchema, parseOptions, type ChannelOptions } from '../core/options.js';
import { type StreamItem, END_ITEM, valueItem, errorItem } from './StreamItem.js';
import { BaseStreamReader, SourceReader, type StreamReader } from './StreamReader.js';

// ── Contracts ────────────────────────────────────────────

/**
 * The write end of a channel.
 *
 * Writes resolve `true` once the item was accepted and `false` when the
 * channel is closed (writer closed or reader retired). They never throw.
 */
export interface ChannelWriter<T> {
    write(value: T): Promise<boolean>;
    /** Emit an in-band error item. Does not close the channel. */
    writeError(error: unknown): Promise<boolean>;
    /** Signal end-of-stream after pending items drain. Idempotent. */
    close(): void;
    /** True once no further writes will be accepted. */
    readonly closed: boolean;
}

export interface Channel<T> {
    readonly reader: StreamReader<T>;
    readonly writer: ChannelWriter<T>;
}

// ── Core ─────────────────────────────────────────────────

interface PendingWrite<T> {
    readonly item: StreamItem<T>;
    readonly resolve: (accepted: boolean) => void;
}

interface WaitingRead<T> {
    readonly resolve: (item: StreamItem<T>) => void;
    readonly reject: (error: unknown) => void;
}

/** Shared state between the two ends of one channel. */
class ChannelCore<T> {
    private readonly _buffer: StreamItem<T>[] = [];
    private readonly _pendingWrites: PendingWrite<T>[] = [];
    private readonly _waitingReads: WaitingRead<T>[] = [];
    private _writerClosed = false;
    private _retired = false;

    constructor(private readonly _capacity: number) {}

    get acceptsWrites(): boolean {
        return !this._writerClosed && !this._retired;
    }

    put(item: StreamItem<T>): Promise<boolean> {
        if (!this.acceptsWrites) return Promise.resolve(false);

        const waiting = this._waitingReads.shift();
        if (waiting) {
            waiting.resolve(item);
            return Promise.resolve(true);
        }
        if (this._buffer.length < this._capacity) {
            this._buffer.push(item);
            return Promise.resolve(true);
        }
        return new Promise<boolean>((resolve) => {
            this._pendingWrites.push({ item, resolve });
        });
    }

    take(): Promise<StreamItem<T>> {
        if (this._retired) return Promise.reject(new StreamClosedError('reader was retired'));

        const buffered = this._buffer.shift();
        if (buffered !== undefined) {
            // A slot freed up: promote the oldest suspended write.
            const promoted = this._pendingWrites.shift();
            if (promoted) {
                this._buffer.push(promoted.item);
                promoted.resolve(true);
            }
            return Promise.resolve(buffered);
        }

        const pending = this._pendingWrites.shift();
        if (pending) {
            pending.resolve(true);
            return Promise.resolve(pending.item);
        }

        if (this._writerClosed) return Promise.resolve(END_ITEM);

        return new Promise<StreamItem<T>>((resolve, reject) => {
            this._waitingReads.push({ resolve, reject });
        });
    }

    closeWriter(): void {
        if (this._writerClosed) return;
        this._writerClosed = true;
        // Waiting reads only exist while nothing is buffered or pending.
        for (const waiting of this._waitingReads.splice(0)) {
            waiting.resolve(END_ITEM);
        }
    }

    retire(): void {
        if (this._retired) return;
        this._retired = true;
        this._buffer.length = 0;
        for (const pending of this._pendingWrites.splice(0)) {
            pending.resolve(false);
        }
        for (const waiting of this._waitingReads.splice(0)) {
            waiting.reject(new StreamClosedError('reader was retired'));
        }
    }
}

// ── Ends ─────────────────────────────────────────────────

class ChannelReader<T> extends BaseStreamReader<T> {
    constructor(private readonly _core: ChannelCore<T>) {
        super();
    }

    protected pull(): Promise<StreamItem<T>> {
        return this._core.take();
    }

    protected release(): void {
        this._core.retire();
    }
}

class ChannelWriterImpl<T> implements ChannelWriter<T> {
    constructor(private readonly _core: ChannelCore<T>) {}

    get closed(): boolean {
        return !this._core.acceptsWrites;
    }

    write(value: T): Promise<boolean> {
        return this._core.put(valueItem(value));
    }

    writeError(error: unknown): Promise<boolean> {
        return this._core.put(errorItem(error));
    }

    close(): void {
        this._core.closeWriter();
    }
}

// ── Factories ────────────────────────────────────────────

/**
 * Create a channel.
 *
 * @throws {InvalidOptionsError} when `capacity` is not a non-negative integer
 */
export function createChannel<T>(options: ChannelOptions = {}): Channel<T> {
    const { capacity } = parseOptions(ChannelOptionsSchema, options, 'channel options');
    const core = new ChannelCore<T>(capacity);
    return {
        reader: new ChannelReader(core),
        writer: new ChannelWriterImpl(core),
    };
}

/**
 * Run `produce` against a fresh channel in the background and return
 * its reader.
 *
 * A rejection of `produce` becomes a trailing error item; the writer is
 * always closed afterwards. `onCancel` runs when the returned reader is
 * released (retired or exhausted), which is how combinators cancel the
 * sources their producer is still reading.
 *
 * @internal
 */
export function produceStream<T>(
    produce: (writer: ChannelWriter<T>) => Promise<void>,
    onCancel?: () => void,
    options?: ChannelOptions,
): StreamReader<T> {
    const { reader, writer } = createChannel<T>(options);
    const output = reader.detach();

    void Promise.resolve()
        .then(() => produce(writer))
        .catch((err: unknown) => writer.writeError(err))
        .finally(() => writer.close());

    return new SourceReader<T>({
        pull: () => output.pull(),
        cancel: () => {
            output.cancel();
            onCancel?.();
        },
    });
}
