/**
 * CallbackHandler — Observer Contract for Unit Execution
 *
 * Handlers see each run start, end and fail. Every hook receives the
 * current {@link RunContext} and returns the context the next handler
 * (and the nested units of this run) will see. Contexts are frozen
 * shallow copies: a handler derives a new record instead of mutating.
 *
 * @example
 * ```typescript
 * const timer: CallbackHandler = {
 *     name: 'timer',
 *     onStart: (ctx) => ({ ...ctx, startedAt: Date.now() }),
 *     onEnd: (ctx, info) => {
 *         const startedAt = ctx['startedAt'];
 *         if (typeof startedAt === 'number') console.log(info.name, Date.now() - startedAt);
 *         return ctx;
 *     },
 * };
 * ```
 *
 * @module
 */
import { type RunInfo } from './RunInfo.js';

// ── Payloads ─────────────────────────────────────────────

/**
 * Request-level record threaded through the observer chain.
 */
export type RunContext = Readonly<Record<string, unknown>>;

export interface CallbackInput {
    readonly data: unknown;
    readonly metadata?: Readonly<Record<string, unknown>>;
}

export interface CallbackOutput {
    readonly data: unknown;
    readonly metadata?: Readonly<Record<string, unknown>>;
}

/**
 * What a handler learns about a streamed input or output. Handlers
 * never receive the reader itself, so they cannot consume its items.
 */
export interface StreamObservation {
    readonly direction: 'input' | 'output';
    /** Epoch milliseconds when the stream was handed over */
    readonly startedAt: number;
}

export type HookResult = RunContext | Promise<RunContext>;

// ── Contract ─────────────────────────────────────────────

/**
 * Observer handler. Every hook is optional.
 */
export interface CallbackHandler {
    /** Label used when reporting a failure of this handler */
    readonly name?: string;

    onStart?(context: RunContext, info: RunInfo, input: CallbackInput): HookResult;
    onEnd?(context: RunContext, info: RunInfo, output: CallbackOutput): HookResult;
    onError?(context: RunContext, info: RunInfo, error: unknown): HookResult;
    onStartWithStreamInput?(context: RunContext, info: RunInfo, input: StreamObservation): HookResult;
    onEndWithStreamOutput?(context: RunContext, info: RunInfo, output: StreamObservation): HookResult;
}

/** Hook names, as reported to `onHandlerError`. */
export type HookName = Exclude<keyof CallbackHandler, 'name'>;

// ── Base Class ───────────────────────────────────────────

/**
 * Identity implementations of every hook.
 *
 * `onStartWithStreamInput` delegates to `onStart` with the observation as
 * data, so a subclass overriding only `onStart` still sees streamed-input
 * runs. `onEndWithStreamOutput` stays an identity: `onEnd` fires anyway
 * once a streamed output completes.
 */
export abstract class BaseCallbackHandler implements CallbackHandler {
    get name(): string {
        return this.constructor.name;
    }

    onStart(context: RunContext, _info: RunInfo, _input: CallbackInput): HookResult {
        return context;
    }

    onEnd(context: RunContext, _info: RunInfo, _output: CallbackOutput): HookResult {
        return context;
    }

    onError(context: RunContext, _info: RunInfo, _error: unknown): HookResult {
        return context;
    }

    onStartWithStreamInput(context: RunContext, info: RunInfo, input: StreamObservation): HookResult {
        return this.onStart(context, info, { data: input });
    }

    onEndWithStreamOutput(context: RunContext, _info: RunInfo, _output: StreamObservation): HookResult {
        return context;
    }
}
