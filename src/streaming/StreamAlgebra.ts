/**
 * StreamAlgebra — merge, mergeNamed, concat, copy, transform
 *
 * Every combinator takes ownership of its input readers: the inputs are
 * retired for the caller (a later `read()` raises `StreamClosedError`),
 * and retiring a combinator's output cancels the sources it still reads.
 *
 * Error items are data. They are forwarded at their position and never
 * close a stream on their own.
 *
 * @example
 * ```typescript
 * const [forUi, forLog] = copy(model.stream(prompt), 2);
 * const tokens = transform(forUi, (chunk) => chunk.trim() || SKIP);
 * ```
 *
 * @module
 */
import { EmptyStreamError, SourceExhaustedError, StreamClosedError } from '../core/errors.js';
import { CopyCountSchema, parseOptions } from '../core/options.js';
import { type ChannelWriter, produceStream } from './Channel.js';
import { BroadcastBuffer, BroadcastReader } from './BroadcastBuffer.js';
import { emptyStream } from './sources.js';
import { type StreamReader, type StreamSource } from './StreamReader.js';

// ── Internals ────────────────────────────────────────────

/**
 * Forward every item of `source` to `writer` until end-of-stream.
 * Resolves `false` if the output stopped accepting items.
 * @internal
 */
export async function forward<T>(source: StreamSource<T>, writer: ChannelWriter<T>): Promise<boolean> {
    for (;;) {
        const item = await source.pull();
        if (item.kind === 'end') return true;
        const accepted = item.kind === 'value'
            ? await writer.write(item.value)
            : await writer.writeError(item.error);
        if (!accepted) return false;
    }
}

function detachAll<T>(readers: readonly StreamReader<T>[]): StreamSource<T>[] {
    // Check first so a closed input does not leave earlier inputs detached.
    if (readers.some((reader) => reader.closed)) {
        throw new StreamClosedError('a combinator input was already consumed or retired');
    }
    return readers.map((reader) => reader.detach());
}

function cancelAll<T>(sources: readonly StreamSource<T>[]): () => void {
    return () => {
        for (const source of sources) source.cancel();
    };
}

// ── Fan-in ───────────────────────────────────────────────

/**
 * Fan N readers into one. Per-source order is preserved; the global
 * interleaving is not. The output ends once every source ended.
 *
 * Zero readers give an already-ended stream; one reader is returned as-is.
 */
export function merge<T>(readers: readonly StreamReader<T>[]): StreamReader<T> {
    const [only] = readers;
    if (only === undefined) return emptyStream<T>();
    if (readers.length === 1) return only;

    const sources = detachAll(readers);
    return produceStream<T>(
        async (writer) => {
            await Promise.all(sources.map((source) => forward(source, writer)));
        },
        cancelAll(sources),
    );
}

/** Readers keyed by the name reported when each one drains. */
export type NamedReaders<T> =
    | Readonly<Record<string, StreamReader<T>>>
    | ReadonlyMap<string, StreamReader<T>>;

function isReaderMap<T>(readers: NamedReaders<T>): readers is ReadonlyMap<string, StreamReader<T>> {
    return readers instanceof Map;
}

/**
 * Like {@link merge}, but emits an error item holding a
 * {@link SourceExhaustedError} each time a named source drains.
 *
 * ```typescript
 * for (;;) {
 *     const item = await merged.read();
 *     if (item.kind === 'end') break;
 *     if (isSourceExhausted(item)) console.log(`${item.error.source} done`);
 * }
 * ```
 */
export function mergeNamed<T>(readers: NamedReaders<T>): StreamReader<T> {
    const entries: [string, StreamReader<T>][] = isReaderMap(readers)
        ? [...readers.entries()]
        : Object.entries(readers);
    if (entries.length === 0) return emptyStream<T>();

    const sources = detachAll(entries.map(([, reader]) => reader));
    const named = entries.map(([name], i) => ({ name, source: sources[i] }));

    return produceStream<T>(
        async (writer) => {
            await Promise.all(named.map(async ({ name, source }) => {
                const drained = await forward(source, writer);
                if (drained) await writer.writeError(new SourceExhaustedError(name));
            }));
        },
        cancelAll(sources),
    );
}

// ── Sequencing ───────────────────────────────────────────

/**
 * Drain each reader fully, in order, before the next.
 */
export function concat<T>(readers: readonly StreamReader<T>[]): StreamReader<T> {
    const [only] = readers;
    if (only === undefined) return emptyStream<T>();
    if (readers.length === 1) return only;

    const sources = detachAll(readers);
    return produceStream<T>(
        async (writer) => {
            for (const source of sources) {
                if (!await forward(source, writer)) return;
            }
        },
        cancelAll(sources),
    );
}

// ── Fan-out ──────────────────────────────────────────────

/**
 * Split one reader into `count` independent readers, each seeing the full
 * sequence in the original order at its own pace.
 *
 * `count` 0 cancels the source; 1 returns the original reader.
 *
 * @throws {InvalidOptionsError} when `count` is negative or not an integer
 */
export function copy<T>(reader: StreamReader<T>, count: number): StreamReader<T>[] {
    const copies = parseOptions(CopyCountSchema, count, 'copy count');
    if (copies === 0) {
        reader.close();
        return [];
    }
    if (copies === 1) return [reader];

    const buffer = new BroadcastBuffer(reader.detach(), copies);
    return Array.from({ length: copies }, (_, id) => new BroadcastReader(buffer, id));
}

// ── Mapping ──────────────────────────────────────────────

/**
 * Returned from a {@link transform} mapper to drop the current value.
 */
export const SKIP: unique symbol = Symbol('runweave.skip');
export type Skip = typeof SKIP;

type MapperOutcome<R> =
    | { readonly ok: true; readonly value: R | Skip }
    | { readonly ok: false; readonly error: unknown };

function applyMapper<T, R>(
    fn: (value: T) => R | Skip | Promise<R | Skip>,
    value: T,
): Promise<MapperOutcome<R>> {
    return new Promise<R | Skip>((resolve) => resolve(fn(value))).then(
        (mapped): MapperOutcome<R> => ({ ok: true, value: mapped }),
        (error: unknown): MapperOutcome<R> => ({ ok: false, error }),
    );
}

/**
 * Map each value of `reader` through `fn` (sync or async).
 *
 * A thrown error becomes an error item in place of that value; source
 * error items pass through unchanged.
 */
export function transform<T, R>(
    reader: StreamReader<T>,
    fn: (value: T) => R | Skip | Promise<R | Skip>,
): StreamReader<R> {
    const source = reader.detach();

    return produceStream<R>(
        async (writer) => {
            for (;;) {
                const item = await source.pull();
                if (item.kind === 'end') return;

                let accepted: boolean;
                if (item.kind === 'error') {
                    accepted = await writer.writeError(item.error);
                } else {
                    const outcome = await applyMapper(fn, item.value);
                    if (!outcome.ok) {
                        accepted = await writer.writeError(outcome.error);
                    } else if (outcome.value === SKIP) {
                        continue;
                    } else {
                        accepted = await writer.write(outcome.value);
                    }
                }
                if (!accepted) return;
            }
        },
        () => source.cancel(),
    );
}

// ── Sinks ────────────────────────────────────────────────

/**
 * Read the first value of `reader` and retire it.
 *
 * @param context - Names the caller in the {@link EmptyStreamError} message
 * @throws the error of a leading error item
 * @throws {EmptyStreamError} when the stream ends without a value
 */
export async function first<T>(reader: StreamReader<T>, context: string): Promise<T> {
    const item = await reader.read();
    reader.close();
    if (item.kind === 'value') return item.value;
    if (item.kind === 'error') throw item.error;
    throw new EmptyStreamError(context);
}
