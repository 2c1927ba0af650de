/**
 * UnitDerivation — Strategy Table for Missing Modes
 *
 * Each missing mode is derived on first use from the modes the
 * implementation provides natively, then cached. Derivations only ever
 * read native implementations, never other derived modes, so no mode
 * can recurse into itself.
 *
 * | Missing     | Derived from (first native one wins)                              |
 * |-------------|-------------------------------------------------------------------|
 * | `invoke`    | first item of `stream` → `collect`(one item) → first of `transform`(one item) |
 * | `stream`    | one-item stream of `invoke` → `transform`(one item) → one-item stream of `collect` |
 * | `collect`   | first output of `transform` → `invoke`(first input) → first of `stream`(first input) |
 * | `transform` | one-item stream of `collect` → `stream` per input, concatenated → `invoke` per input |
 *
 * Where a derivation uses only the first input or output item, the rest
 * of that stream is retired.
 *
 * @module
 * @internal
 */
import { UnitDefinitionError } from '../core/errors.js';
import { produceStream } from '../streaming/Channel.js';
import { first, forward, transform as mapStream } from '../streaming/StreamAlgebra.js';
import { fromIterable, toStreamReader } from '../streaming/sources.js';
import { type StreamReader, type StreamSource } from '../streaming/StreamReader.js';
import { type Mode, type MaybePromise, type ReaderLike, type RunOptions, type UnitImplementation, MODES } from './ExecutionUnit.js';

// ── Normalized Mode Signatures ───────────────────────────

export type InvokeFn<I, O> = (input: I, options?: RunOptions) => Promise<O>;
export type StreamFn<I, O> = (input: I, options?: RunOptions) => StreamReader<O>;
export type CollectFn<I, O> = (input: StreamReader<I>, options?: RunOptions) => Promise<O>;
export type TransformFn<I, O> = (input: StreamReader<I>, options?: RunOptions) => StreamReader<O>;

interface ModeFunctions<I, O> {
    invoke: InvokeFn<I, O>;
    stream: StreamFn<I, O>;
    collect: CollectFn<I, O>;
    transform: TransformFn<I, O>;
}

/**
 * Run `fn`, turning a synchronous throw into a rejected promise.
 */
export function settle<T>(fn: () => MaybePromise<T>): Promise<T> {
    return new Promise<T>((resolve) => resolve(fn()));
}

/**
 * Open a native stream, turning a synchronous throw into a stream
 * holding one error item.
 */
function openStream<T>(open: () => ReaderLike<T>): StreamReader<T> {
    try {
        return toStreamReader(open());
    } catch (error) {
        return produceStream<T>(() => Promise.reject(error));
    }
}

/** One-item stream holding the eventual result of `produce`. */
function singleValueStream<T>(produce: () => Promise<T>): StreamReader<T> {
    return produceStream<T>(
        async (writer) => {
            await produce().then((value) => writer.write(value));
        },
        undefined,
        { capacity: 1 },
    );
}

function nativeModes<I, O>(impl: UnitImplementation<I, O>): Partial<ModeFunctions<I, O>> {
    const table: Partial<ModeFunctions<I, O>> = {};

    const invoke = impl.invoke?.bind(impl);
    if (invoke) table.invoke = (input, options) => settle(() => invoke(input, options));

    const stream = impl.stream?.bind(impl);
    if (stream) table.stream = (input, options) => openStream(() => stream(input, options));

    const collect = impl.collect?.bind(impl);
    if (collect) table.collect = (input, options) => settle(() => collect(input, options));

    const transform = impl.transform?.bind(impl);
    if (transform) table.transform = (input, options) => openStream(() => transform(input, options));

    return table;
}

// ============================================================================
// ModeTable
// ============================================================================

/**
 * All four modes of one unit: native ones as given, missing ones derived
 * lazily and cached.
 */
export class ModeTable<I, O> {
    private readonly _native: Partial<ModeFunctions<I, O>>;
    private readonly _derived: Partial<ModeFunctions<I, O>> = {};

    /**
     * @param label - Unit name used in error messages
     * @throws {UnitDefinitionError} when no mode is implemented
     */
    constructor(impl: UnitImplementation<I, O>, private readonly _label: string) {
        this._native = nativeModes(impl);
        if (MODES.every((mode) => this._native[mode] === undefined)) {
            throw new UnitDefinitionError(
                `Execution unit "${_label}" must implement at least one of invoke, stream, collect or transform.`,
            );
        }
    }

    supports(mode: Mode): boolean {
        return this._native[mode] !== undefined;
    }

    /** Modes implemented natively, in canonical order. */
    get nativeModes(): Mode[] {
        return MODES.filter((mode) => this.supports(mode));
    }

    get invoke(): InvokeFn<I, O> {
        return this._native.invoke ?? (this._derived.invoke ??= this._deriveInvoke());
    }

    get stream(): StreamFn<I, O> {
        return this._native.stream ?? (this._derived.stream ??= this._deriveStream());
    }

    get collect(): CollectFn<I, O> {
        return this._native.collect ?? (this._derived.collect ??= this._deriveCollect());
    }

    get transform(): TransformFn<I, O> {
        return this._native.transform ?? (this._derived.transform ??= this._deriveTransform());
    }

    // ── Derivations ──────────────────────────────────────

    private _deriveInvoke(): InvokeFn<I, O> {
        const { stream, collect, transform } = this._native;
        const where = `Execution unit "${this._label}" invoke`;

        if (stream) return (input, options) => first(stream(input, options), where);
        if (collect) return (input, options) => collect(fromIterable([input]), options);
        if (transform) return (input, options) => first(transform(fromIterable([input]), options), where);
        throw this._unreachable('invoke');
    }

    private _deriveStream(): StreamFn<I, O> {
        const { invoke, transform, collect } = this._native;

        if (invoke) return (input, options) => singleValueStream(() => invoke(input, options));
        if (transform) return (input, options) => transform(fromIterable([input]), options);
        if (collect) return (input, options) => singleValueStream(() => collect(fromIterable([input]), options));
        throw this._unreachable('stream');
    }

    private _deriveCollect(): CollectFn<I, O> {
        const { transform, invoke, stream } = this._native;
        const where = `Execution unit "${this._label}" collect`;

        if (transform) return (input, options) => first(transform(input, options), where);
        // Only the first input item is used; the input reader is retired after it.
        if (invoke) return (input, options) => first(input, where).then((head) => invoke(head, options));
        if (stream) {
            return (input, options) => first(input, where).then((head) => first(stream(head, options), where));
        }
        throw this._unreachable('collect');
    }

    private _deriveTransform(): TransformFn<I, O> {
        const { collect, stream, invoke } = this._native;

        if (collect) {
            return (input, options) => produceStream<O>(
                async (writer) => {
                    await collect(input, options).then((value) => writer.write(value));
                },
                () => input.close(),
            );
        }
        if (stream) return (input, options) => streamEach(input, (value) => stream(value, options));
        if (invoke) return (input, options) => mapStream(input, (value) => invoke(value, options));
        throw this._unreachable('transform');
    }

    private _unreachable(mode: Mode): UnitDefinitionError {
        return new UnitDefinitionError(`Execution unit "${this._label}" has no mode to derive ${mode} from.`);
    }
}

/**
 * Run `open` per input value and concatenate the resulting streams in
 * input order. Input error items pass through in position.
 */
function streamEach<I, O>(input: StreamReader<I>, open: (value: I) => StreamReader<O>): StreamReader<O> {
    const source = input.detach();
    let current: StreamSource<O> | undefined;

    return produceStream<O>(
        async (writer) => {
            for (;;) {
                const item = await source.pull();
                if (item.kind === 'end') return;
                if (item.kind === 'error') {
                    if (!await writer.writeError(item.error)) return;
                    continue;
                }
                const inner = open(item.value).detach();
                current = inner;
                const drained = await forward(inner, writer);
                current = undefined;
                if (!drained) {
                    inner.cancel();
                    return;
                }
            }
        },
        () => {
            source.cancel();
            current?.cancel();
        },
    );
}
