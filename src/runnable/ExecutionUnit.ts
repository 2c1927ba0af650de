/**
 * ExecutionUnit — The Four-Mode Execution Contract
 *
 * Any computational unit (a model client, a retriever, a prompt, a whole
 * graph) can be run four ways:
 *
 * | Mode        | Input             | Output            |
 * |-------------|-------------------|-------------------|
 * | `invoke`    | `I`               | `Promise<O>`      |
 * | `stream`    | `I`               | `StreamReader<O>` |
 * | `collect`   | `StreamReader<I>` | `Promise<O>`      |
 * | `transform` | `StreamReader<I>` | `StreamReader<O>` |
 *
 * An implementation provides at least one mode natively
 * ({@link UnitImplementation}); the library derives the others, so
 * callers never need to know which universe a component favors.
 *
 * @module
 */
import { type BatchOptions } from '../core/options.js';
import { type RunContext } from '../observability/CallbackHandler.js';
import { type CallbackManager } from '../observability/CallbackManager.js';
import { type RunInfo } from '../observability/RunInfo.js';
import { type StreamReader } from '../streaming/StreamReader.js';

// ── Modes ────────────────────────────────────────────────

export type Mode = 'invoke' | 'stream' | 'collect' | 'transform';

export const MODES: readonly Mode[] = ['invoke', 'stream', 'collect', 'transform'];

export type MaybePromise<T> = T | Promise<T>;

/** Native stream outputs may be readers or any async iterable (e.g. an async generator). */
export type ReaderLike<T> = StreamReader<T> | AsyncIterable<T>;

// ── Options ──────────────────────────────────────────────

/**
 * Per-call options, passed down to nested units.
 */
export interface RunOptions {
    /** Observer chain wrapped around this run and every nested run */
    readonly callbacks?: CallbackManager;
    /** Initial observer context. Default: `{}` */
    readonly context?: RunContext;
    readonly metadata?: Readonly<Record<string, unknown>>;
    readonly tags?: readonly string[];
}

export type BatchRunOptions = RunOptions & BatchOptions;

// ── Contracts ────────────────────────────────────────────

/**
 * Partial implementation supplied by a component. Provide any subset of
 * the four modes; at least one is required.
 *
 * @example
 * ```typescript
 * const upper: UnitImplementation<string, string> = {
 *     invoke: (text) => text.toUpperCase(),
 *     async *stream(text) {
 *         for (const ch of text) yield ch.toUpperCase();
 *     },
 * };
 * ```
 */
export interface UnitImplementation<I, O> {
    invoke?(input: I, options?: RunOptions): MaybePromise<O>;
    stream?(input: I, options?: RunOptions): ReaderLike<O>;
    collect?(input: StreamReader<I>, options?: RunOptions): MaybePromise<O>;
    transform?(input: StreamReader<I>, options?: RunOptions): ReaderLike<O>;
}

/**
 * A unit with all four modes available, plus composition and batching.
 */
export interface ExecutionUnit<I, O> {
    readonly info: RunInfo;

    invoke(input: I, options?: RunOptions): Promise<O>;
    stream(input: I, options?: RunOptions): StreamReader<O>;
    collect(input: StreamReader<I>, options?: RunOptions): Promise<O>;
    transform(input: StreamReader<I>, options?: RunOptions): StreamReader<O>;

    /** Feed this unit's output into `next`. */
    pipe<O2>(next: ExecutionUnit<O, O2>): ExecutionUnit<I, O2>;

    /** Invoke once per input, one after another. */
    batch(inputs: readonly I[], options?: RunOptions): Promise<O[]>;

    /**
     * Invoke concurrently; output `i` belongs to input `i`.
     * `maxConcurrency` bounds how many invocations run at once.
     */
    batchParallel(inputs: readonly I[], options?: BatchRunOptions): Promise<O[]>;

    /** True when `mode` is implemented natively rather than derived. */
    supports(mode: Mode): boolean;
}
