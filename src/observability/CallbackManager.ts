/**
 * CallbackManager — Ordered Dispatch Over Observer Handlers
 *
 * Runs the hooks of its handlers strictly in registration order
 * (instance handlers first, then global ones), threading the context
 * from one handler to the next.
 *
 * A handler that throws is reported to `onHandlerError` and skipped: the
 * context it received passes on unchanged, and the observed unit runs
 * as if the handler were absent.
 *
 * @example
 * ```typescript
 * const callbacks = new CallbackManager([new LoggingHandler(), metrics]);
 *
 * const answer = await chain.invoke(question, { callbacks });
 * console.log(metrics.summary());
 * ```
 *
 * @module
 */
import { produceStream } from '../streaming/Channel.js';
import { type StreamReader, type StreamSource } from '../streaming/StreamReader.js';
import {
    type CallbackHandler, type CallbackInput, type CallbackOutput,
    type HookName, type RunContext, type StreamObservation,
} from './CallbackHandler.js';
import { type RunInfo } from './RunInfo.js';

// ── Types ────────────────────────────────────────────────

/** A handler failure, as reported to `onHandlerError`. */
export interface HandlerFailure {
    /** Handler label (`handler.name`, else its constructor name) */
    readonly handler: string;
    readonly hook: HookName;
    readonly info: RunInfo;
    readonly error: unknown;
}

export type HandlerErrorSink = (failure: HandlerFailure) => void;

export interface CallbackManagerOptions {
    /** Receives handler failures. Default: `console.warn` */
    readonly onHandlerError?: HandlerErrorSink;
}

export interface RunCallbackOptions {
    /** The observed unit consumes a stream: fire `onStartWithStreamInput` instead of `onStart` */
    readonly streamInput?: boolean;
}

type HookCall = (handler: CallbackHandler, context: RunContext) =>
    RunContext | Promise<RunContext> | undefined;

const defaultHandlerErrorSink: HandlerErrorSink = (failure) => {
    console.warn(
        `[runweave] Callback handler ${failure.handler} failed in ${failure.hook} for "${failure.info.name}":`,
        failure.error,
    );
};

function handlerLabel(handler: CallbackHandler): string {
    return handler.name ?? handler.constructor.name;
}

function snapshot(context: RunContext): RunContext {
    return Object.freeze({ ...context });
}

function observe(direction: StreamObservation['direction']): StreamObservation {
    return Object.freeze({ direction, startedAt: Date.now() });
}

// ============================================================================
// CallbackManager
// ============================================================================

export class CallbackManager {
    private static readonly _globalHandlers: CallbackHandler[] = [];

    private readonly _handlers: CallbackHandler[];
    private readonly _onHandlerError: HandlerErrorSink;

    constructor(handlers: readonly CallbackHandler[] = [], options: CallbackManagerOptions = {}) {
        this._handlers = [...handlers];
        this._onHandlerError = options.onHandlerError ?? defaultHandlerErrorSink;
    }

    // ── Registration ─────────────────────────────────────

    /** Instance handlers followed by global handlers. */
    get handlers(): readonly CallbackHandler[] {
        return [...this._handlers, ...CallbackManager._globalHandlers];
    }

    addHandler(handler: CallbackHandler): void {
        this._handlers.push(handler);
    }

    /** @returns `false` when the handler was not registered here */
    removeHandler(handler: CallbackHandler): boolean {
        const index = this._handlers.indexOf(handler);
        if (index === -1) return false;
        this._handlers.splice(index, 1);
        return true;
    }

    /** New manager with `extra` appended; the error sink carries over. */
    withHandlers(extra: readonly CallbackHandler[]): CallbackManager {
        return new CallbackManager([...this._handlers, ...extra], { onHandlerError: this._onHandlerError });
    }

    /** Register a handler that every manager runs after its own. */
    static addGlobalHandler(handler: CallbackHandler): void {
        CallbackManager._globalHandlers.push(handler);
    }

    static removeGlobalHandler(handler: CallbackHandler): boolean {
        const index = CallbackManager._globalHandlers.indexOf(handler);
        if (index === -1) return false;
        CallbackManager._globalHandlers.splice(index, 1);
        return true;
    }

    static clearGlobalHandlers(): void {
        CallbackManager._globalHandlers.length = 0;
    }

    // ── Triggers ─────────────────────────────────────────

    triggerStart(context: RunContext, info: RunInfo, input: CallbackInput): Promise<RunContext> {
        return this._dispatch('onStart', context, info, (h, ctx) => h.onStart?.(ctx, info, input));
    }

    triggerEnd(context: RunContext, info: RunInfo, output: CallbackOutput): Promise<RunContext> {
        return this._dispatch('onEnd', context, info, (h, ctx) => h.onEnd?.(ctx, info, output));
    }

    triggerError(context: RunContext, info: RunInfo, error: unknown): Promise<RunContext> {
        return this._dispatch('onError', context, info, (h, ctx) => h.onError?.(ctx, info, error));
    }

    triggerStartWithStreamInput(
        context: RunContext,
        info: RunInfo,
        input: StreamObservation,
    ): Promise<RunContext> {
        return this._dispatch(
            'onStartWithStreamInput', context, info,
            (h, ctx) => h.onStartWithStreamInput?.(ctx, info, input),
        );
    }

    triggerEndWithStreamOutput(
        context: RunContext,
        info: RunInfo,
        output: StreamObservation,
    ): Promise<RunContext> {
        return this._dispatch(
            'onEndWithStreamOutput', context, info,
            (h, ctx) => h.onEndWithStreamOutput?.(ctx, info, output),
        );
    }

    // ── Wrappers ─────────────────────────────────────────

    /**
     * Run `fn` between start and end hooks. On failure the error hooks
     * run and the error is re-thrown.
     *
     * `fn` receives the context produced by the start hooks, to pass on
     * to nested units.
     */
    async runWithCallbacks<T>(
        context: RunContext,
        info: RunInfo,
        input: unknown,
        fn: (context: RunContext) => Promise<T>,
        options: RunCallbackOptions = {},
    ): Promise<T> {
        const started = options.streamInput
            ? await this.triggerStartWithStreamInput(context, info, observe('input'))
            : await this.triggerStart(context, info, { data: input });

        return fn(started).then(
            async (result) => {
                await this.triggerEnd(started, info, { data: result });
                return result;
            },
            async (error: unknown) => {
                await this.triggerError(started, info, error);
                throw error;
            },
        );
    }

    /**
     * Wrap the reader returned by `fn`: start hooks, stream-output hooks,
     * then every item passes through unchanged. Error items fire the
     * error hooks; end-of-stream fires the end hooks with
     * `{ streamed: true, items }` output metadata.
     */
    runStreamWithCallbacks<T>(
        context: RunContext,
        info: RunInfo,
        input: unknown,
        fn: (context: RunContext) => StreamReader<T>,
        options: RunCallbackOptions = {},
    ): StreamReader<T> {
        let source: StreamSource<T> | undefined;

        return produceStream<T>(
            async (writer) => {
                let current = options.streamInput
                    ? await this.triggerStartWithStreamInput(context, info, observe('input'))
                    : await this.triggerStart(context, info, { data: input });

                let output: StreamSource<T>;
                try {
                    output = fn(current).detach();
                } catch (error) {
                    await this.triggerError(current, info, error);
                    throw error;
                }
                source = output;
                current = await this.triggerEndWithStreamOutput(current, info, observe('output'));

                let items = 0;
                let cancelled = false;
                for (;;) {
                    const item = await output.pull();
                    if (item.kind === 'end') break;

                    let accepted: boolean;
                    if (item.kind === 'error') {
                        current = await this.triggerError(current, info, item.error);
                        accepted = await writer.writeError(item.error);
                    } else {
                        items++;
                        accepted = await writer.write(item.value);
                    }
                    if (!accepted) {
                        cancelled = true;
                        output.cancel();
                        break;
                    }
                }

                const metadata = cancelled ? { streamed: true, items, cancelled } : { streamed: true, items };
                await this.triggerEnd(current, info, { data: undefined, metadata });
            },
            () => source?.cancel(),
        );
    }

    // ── Private ──────────────────────────────────────────

    private async _dispatch(
        hook: HookName,
        context: RunContext,
        info: RunInfo,
        call: HookCall,
    ): Promise<RunContext> {
        let current = snapshot(context);
        for (const handler of this.handlers) {
            try {
                const next = await call(handler, snapshot(current));
                if (next !== undefined) current = snapshot(next);
            } catch (error) {
                this._onHandlerError({ handler: handlerLabel(handler), hook, info, error });
            }
        }
        return current;
    }
}
