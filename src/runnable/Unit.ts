/**
 * Unit — Concrete Execution Unit, Pipe Composition, Batching
 *
 * Wraps a partial {@link UnitImplementation} into a full
 * {@link ExecutionUnit}: missing modes come from the {@link ModeTable},
 * and every mode runs inside the observer chain when
 * `options.callbacks` is supplied.
 *
 * @example
 * ```typescript
 * const retrieve = createUnit<string, string[]>(
 *     { invoke: (query) => index.search(query) },
 *     { name: 'retrieve', category: 'retriever' },
 * );
 * const answer = retrieve.pipe(prompt).pipe(model);
 *
 * const callbacks = new CallbackManager([new LoggingHandler()]);
 * await answer.invoke('what is a channel?', { callbacks });
 * ```
 *
 * @module
 */
import { mapConcurrent, createConcurrencyGuard } from '../core/ConcurrencyGuard.js';
import { BatchOptionsSchema, parseOptions } from '../core/options.js';
import { type RunInfo, type RunInfoInput, createRunInfo } from '../observability/RunInfo.js';
import { produceStream } from '../streaming/Channel.js';
import { forward } from '../streaming/StreamAlgebra.js';
import { type StreamReader, type StreamSource } from '../streaming/StreamReader.js';
import {
    type BatchRunOptions,
    type ExecutionUnit,
    type Mode,
    type RunOptions,
    type UnitImplementation,
} from './ExecutionUnit.js';
import { ModeTable } from './UnitDerivation.js';

// ============================================================================
// Unit
// ============================================================================

export class Unit<I, O> implements ExecutionUnit<I, O> {
    readonly info: RunInfo;
    private readonly _modes: ModeTable<I, O>;

    /**
     * @throws {UnitDefinitionError} when `impl` has no mode
     */
    constructor(impl: UnitImplementation<I, O>, info: RunInfo) {
        this.info = info;
        this._modes = new ModeTable(impl, info.name);
    }

    invoke(input: I, options: RunOptions = {}): Promise<O> {
        const { callbacks } = options;
        if (!callbacks) return this._modes.invoke(input, options);

        return callbacks.runWithCallbacks(
            options.context ?? {}, this.info, input,
            (context) => this._modes.invoke(input, { ...options, context }),
        );
    }

    stream(input: I, options: RunOptions = {}): StreamReader<O> {
        const { callbacks } = options;
        if (!callbacks) return this._modes.stream(input, options);

        return callbacks.runStreamWithCallbacks(
            options.context ?? {}, this.info, input,
            (context) => this._modes.stream(input, { ...options, context }),
        );
    }

    collect(input: StreamReader<I>, options: RunOptions = {}): Promise<O> {
        const { callbacks } = options;
        if (!callbacks) return this._modes.collect(input, options);

        return callbacks.runWithCallbacks(
            options.context ?? {}, this.info, undefined,
            (context) => this._modes.collect(input, { ...options, context }),
            { streamInput: true },
        );
    }

    transform(input: StreamReader<I>, options: RunOptions = {}): StreamReader<O> {
        const { callbacks } = options;
        if (!callbacks) return this._modes.transform(input, options);

        return callbacks.runStreamWithCallbacks(
            options.context ?? {}, this.info, undefined,
            (context) => this._modes.transform(input, { ...options, context }),
            { streamInput: true },
        );
    }

    pipe<O2>(next: ExecutionUnit<O, O2>): ExecutionUnit<I, O2> {
        return pipe(this, next);
    }

    async batch(inputs: readonly I[], options?: RunOptions): Promise<O[]> {
        const outputs: O[] = [];
        for (const input of inputs) {
            await this.invoke(input, options).then((output) => {
                outputs.push(output);
            });
        }
        return outputs;
    }

    async batchParallel(inputs: readonly I[], options: BatchRunOptions = {}): Promise<O[]> {
        const { maxConcurrency, ...runOptions } = options;
        const batch = parseOptions(BatchOptionsSchema, { maxConcurrency }, 'batch options');
        return mapConcurrent(
            inputs,
            (input) => this.invoke(input, runOptions),
            createConcurrencyGuard(batch.maxConcurrency),
        );
    }

    supports(mode: Mode): boolean {
        return this._modes.supports(mode);
    }
}

// ============================================================================
// Factories
// ============================================================================

/**
 * Build an execution unit from any subset of the four modes.
 *
 * `info` defaults to `{ name: 'Unit', type: 'Unit', category: 'runnable' }`.
 *
 * @throws {UnitDefinitionError} when `impl` has no mode
 * @throws {InvalidOptionsError} when `info` is malformed
 */
export function createUnit<I, O>(impl: UnitImplementation<I, O>, info: Partial<RunInfoInput> = {}): Unit<I, O> {
    return new Unit(impl, createRunInfo({ name: 'Unit', type: 'Unit', category: 'runnable', ...info }));
}

/**
 * Compose two units so that `first`'s output feeds `second`.
 *
 * - invoke: `first.invoke` then `second.invoke`
 * - stream: `first.stream` through `second.transform` when `second`
 *   transforms natively, else `first.invoke` then `second.stream`
 * - collect: `first.collect` then `second.invoke`
 * - transform: `first.transform` then `second.transform`
 *
 * The sequence reports all four modes as native.
 */
export function pipe<I, M, O>(
    first: ExecutionUnit<I, M>,
    second: ExecutionUnit<M, O>,
    info?: Partial<RunInfoInput>,
): Unit<I, O> {
    const impl: UnitImplementation<I, O> = {
        invoke: (input, options) => first.invoke(input, options).then((mid) => second.invoke(mid, options)),
        stream: (input, options) => (second.supports('transform')
            ? second.transform(first.stream(input, options), options)
            : invokeThenStream(first, second, input, options)),
        collect: (input, options) => first.collect(input, options).then((mid) => second.invoke(mid, options)),
        transform: (input, options) => second.transform(first.transform(input, options), options),
    };

    return new Unit(impl, createRunInfo({
        name: `${first.info.name} | ${second.info.name}`,
        type: 'UnitSequence',
        category: 'chain',
        ...info,
    }));
}

function invokeThenStream<I, M, O>(
    first: ExecutionUnit<I, M>,
    second: ExecutionUnit<M, O>,
    input: I,
    options: RunOptions | undefined,
): StreamReader<O> {
    let inner: StreamSource<O> | undefined;

    return produceStream<O>(
        (writer) => first.invoke(input, options).then(async (mid) => {
            const source = second.stream(mid, options).detach();
            inner = source;
            if (!await forward(source, writer)) source.cancel();
        }),
        () => inner?.cancel(),
    );
}
