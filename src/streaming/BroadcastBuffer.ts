/**
 * BroadcastBuffer — One Arena, Many Cursors
 *
 * Backs `copy(reader, n)`. The source is pulled at most once per item;
 * every copy keeps an absolute cursor into a shared arena. Items behind
 * the slowest cursor are dropped, so memory is bounded by the gap
 * between the slowest and the fastest copy.
 *
 *   arena:   [ i4 i5 i6 i7 ]      offset = 4
 *   cursors:   ▲        ▲
 *            copy#0   copy#1
 *
 * @module
 * @internal
 */
import { StreamClosedError } from '../core/errors.js';
import { type StreamItem, END_ITEM } from './StreamItem.js';
import { BaseStreamReader, type StreamSource } from './StreamReader.js';

export class BroadcastBuffer<T> {
    private _arena: StreamItem<T>[] = [];
    /** Absolute index of `_arena[0]` */
    private _offset = 0;
    private readonly _cursors = new Map<number, number>();
    private _inFlight: Promise<void> | undefined;
    private _ended = false;
    private _cancelled = false;

    constructor(private readonly _source: StreamSource<T>, copies: number) {
        for (let id = 0; id < copies; id++) this._cursors.set(id, 0);
    }

    /** Number of items currently retained. */
    get retained(): number {
        return this._arena.length;
    }

    async next(id: number): Promise<StreamItem<T>> {
        for (;;) {
            const cursor = this._cursors.get(id);
            if (cursor === undefined) throw new StreamClosedError('reader was retired');

            const index = cursor - this._offset;
            if (index < this._arena.length) {
                const item = this._arena[index];
                this._cursors.set(id, cursor + 1);
                this._trim();
                return item;
            }
            if (this._ended) return END_ITEM;

            await this._fill();
        }
    }

    /** Forget one copy; the last one out cancels the source. */
    detach(id: number): void {
        if (!this._cursors.delete(id)) return;
        if (this._cursors.size === 0) {
            this._cancelled = true;
            this._arena = [];
            this._source.cancel();
            return;
        }
        this._trim();
    }

    // ── Private ──────────────────────────────────────────

    private _fill(): Promise<void> {
        if (!this._inFlight) {
            this._inFlight = this._source.pull().then((item) => {
                this._inFlight = undefined;
                if (this._cancelled) return;
                this._arena.push(item);
                if (item.kind === 'end') this._ended = true;
            });
        }
        return this._inFlight;
    }

    private _trim(): void {
        let slowest = Number.POSITIVE_INFINITY;
        for (const cursor of this._cursors.values()) {
            if (cursor < slowest) slowest = cursor;
        }
        const drop = slowest - this._offset;
        if (drop <= 0 || !Number.isFinite(drop)) return;
        this._arena.splice(0, drop);
        this._offset = slowest;
    }
}

/**
 * One independent reader over a {@link BroadcastBuffer}.
 */
export class BroadcastReader<T> extends BaseStreamReader<T> {
    constructor(
        private readonly _buffer: BroadcastBuffer<T>,
        private readonly _id: number,
    ) {
        super();
    }

    protected pull(): Promise<StreamItem<T>> {
        return this._buffer.next(this._id);
    }

    protected release(): void {
        this._buffer.detach(this._id);
    }
}
