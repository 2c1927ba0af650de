/**
 * TracingHandler — Nested Execution Trace
 *
 * Records a {@link TraceEvent} per hook, with the nesting depth threaded
 * through the run context: a unit started from inside another unit's run
 * sits one level deeper.
 *
 * ```
 * [START] 2026-01-01T00:00:00.000Z - pipeline (UnitSequence)
 *   [START] 2026-01-01T00:00:00.001Z - retrieve (Lambda)
 *   [END]   2026-01-01T00:00:00.020Z - retrieve
 * [END]   2026-01-01T00:00:00.051Z - pipeline
 * ```
 *
 * With a {@link WeaveTracer}, every run also opens a span named
 * `runweave.<category>.<name>` that ends with the run.
 *
 * @module
 */
import { BaseCallbackHandler, type CallbackInput, type CallbackOutput, type RunContext, type StreamObservation } from '../CallbackHandler.js';
import { type RunInfo } from '../RunInfo.js';
import { SpanStatusCode, type WeaveSpan, type WeaveTracer } from '../Tracing.js';

const DEPTH_KEY = '__runweave.trace.depth';
const SPAN_KEY = '__runweave.trace.span';

export type TraceEventType = 'start' | 'end' | 'error' | 'stream.start' | 'stream.output';

export interface TraceEvent {
    /** Epoch milliseconds */
    readonly timestamp: number;
    readonly type: TraceEventType;
    readonly name: string;
    readonly componentType: string;
    readonly depth: number;
    /** Input or output data, when `captureData` is on */
    readonly data?: unknown;
    readonly error?: unknown;
}

export interface TracingHandlerOptions {
    /** Capture input/output data in events. Default: `false` */
    readonly captureData?: boolean;
    /** Events deeper than this are not recorded. Default: `10` */
    readonly maxDepth?: number;
    /** Optional OpenTelemetry-compatible tracer */
    readonly tracer?: WeaveTracer;
    /** Line sink for `printTrace()` / `printTimeline()`. Default: `console.log` */
    readonly log?: (line: string) => void;
    /** Default: `Date.now` */
    readonly now?: () => number;
}

/**
 * Render one event as an indented trace line.
 */
export function formatTraceEvent(event: TraceEvent): string {
    const indent = '  '.repeat(event.depth);
    const time = new Date(event.timestamp).toISOString();
    switch (event.type) {
        case 'start':
            return `${indent}[START] ${time} - ${event.name} (${event.componentType})`;
        case 'end':
            return `${indent}[END]   ${time} - ${event.name}`;
        case 'error':
            return `${indent}[ERROR] ${time} - ${event.name}: ${String(event.error)}`;
        case 'stream.start':
            return `${indent}[STREAM START]  ${time} - ${event.name}`;
        case 'stream.output':
            return `${indent}[STREAM OUTPUT] ${time} - ${event.name}`;
    }
}

export class TracingHandler extends BaseCallbackHandler {
    private readonly _events: TraceEvent[] = [];
    private readonly _spans = new Map<number, WeaveSpan>();
    private _nextSpanId = 1;

    private readonly _captureData: boolean;
    private readonly _maxDepth: number;
    private readonly _tracer: WeaveTracer | undefined;
    private readonly _log: (line: string) => void;
    private readonly _now: () => number;

    constructor(options: TracingHandlerOptions = {}) {
        super();
        this._captureData = options.captureData ?? false;
        this._maxDepth = options.maxDepth ?? 10;
        this._tracer = options.tracer;
        this._log = options.log ?? ((line) => console.log(line));
        this._now = options.now ?? Date.now;
    }

    // ── Queries ──────────────────────────────────────────

    get events(): readonly TraceEvent[] {
        return this._events;
    }

    /** Spans started and not yet ended. */
    get openSpans(): number {
        return this._spans.size;
    }

    clear(): void {
        this._events.length = 0;
    }

    eventsFor(name: string): TraceEvent[] {
        return this._events.filter((e) => e.name === name);
    }

    /**
     * Duration in ms from the latest start to the following end, per name.
     */
    timeline(): Map<string, number> {
        const timeline = new Map<string, number>();
        const started = new Map<string, number>();
        for (const event of this._events) {
            if (event.type === 'start' || event.type === 'stream.start') {
                started.set(event.name, event.timestamp);
            } else if (event.type === 'end') {
                const startedAt = started.get(event.name);
                if (startedAt !== undefined) timeline.set(event.name, event.timestamp - startedAt);
            }
        }
        return timeline;
    }

    printTrace(): void {
        this._log('=== Execution Trace ===');
        for (const event of this._events) this._log(formatTraceEvent(event));
        this._log('=======================');
    }

    printTimeline(): void {
        this._log('=== Execution Timeline ===');
        for (const [name, ms] of this.timeline()) this._log(`${name}: ${ms}ms`);
        this._log('==========================');
    }

    // ── Hooks ────────────────────────────────────────────

    onStart(context: RunContext, info: RunInfo, input: CallbackInput): RunContext {
        return this._enter(context, info, 'start', this._captureData ? input.data : undefined);
    }

    onStartWithStreamInput(context: RunContext, info: RunInfo, _input: StreamObservation): RunContext {
        return this._enter(context, info, 'stream.start', undefined);
    }

    onEndWithStreamOutput(context: RunContext, info: RunInfo, _output: StreamObservation): RunContext {
        // Depth is unchanged: the run is still open until its stream ends.
        this._push(info, 'stream.output', depthOf(context) - 1, {});
        this._spanOf(context)?.addEvent?.('runweave.stream.output');
        return context;
    }

    onEnd(context: RunContext, info: RunInfo, output: CallbackOutput): RunContext {
        const depth = depthOf(context) - 1;
        this._push(info, 'end', depth, this._captureData ? { data: output.data } : {});

        const span = this._closeSpan(context);
        if (span) {
            span.setStatus({ code: SpanStatusCode.OK });
            span.end();
        }
        return { ...context, [DEPTH_KEY]: depth, [SPAN_KEY]: undefined };
    }

    onError(context: RunContext, info: RunInfo, error: unknown): RunContext {
        const depth = depthOf(context) - 1;
        this._push(info, 'error', depth, { error });

        const span = this._closeSpan(context);
        if (span) {
            span.recordException(error instanceof Error ? error : String(error));
            span.setStatus({ code: SpanStatusCode.ERROR, message: error instanceof Error ? error.message : String(error) });
            span.end();
        }
        // Depth stays: a streamed run still reports onEnd after an in-band error.
        return { ...context, [SPAN_KEY]: undefined };
    }

    // ── Private ──────────────────────────────────────────

    private _enter(context: RunContext, info: RunInfo, type: 'start' | 'stream.start', data: unknown): RunContext {
        const depth = depthOf(context);
        this._push(info, type, depth, data === undefined ? {} : { data });

        const next: Record<string, unknown> = { ...context, [DEPTH_KEY]: depth + 1 };
        if (this._tracer) {
            const span = this._tracer.startSpan(`runweave.${info.category}.${info.name}`, {
                attributes: {
                    'runweave.name': info.name,
                    'runweave.type': info.type,
                    'runweave.category': info.category,
                    'runweave.depth': depth,
                },
            });
            const id = this._nextSpanId++;
            this._spans.set(id, span);
            next[SPAN_KEY] = id;
        }
        return next;
    }

    private _push(
        info: RunInfo,
        type: TraceEventType,
        depth: number,
        extra: { data?: unknown; error?: unknown },
    ): void {
        if (depth >= this._maxDepth) return;
        this._events.push({
            timestamp: this._now(),
            type,
            name: info.name,
            componentType: info.type,
            depth: Math.max(0, depth),
            ...extra,
        });
    }

    private _spanOf(context: RunContext): WeaveSpan | undefined {
        const id = context[SPAN_KEY];
        return typeof id === 'number' ? this._spans.get(id) : undefined;
    }

    private _closeSpan(context: RunContext): WeaveSpan | undefined {
        const id = context[SPAN_KEY];
        if (typeof id !== 'number') return undefined;
        const span = this._spans.get(id);
        this._spans.delete(id);
        return span;
    }
}

function depthOf(context: RunContext): number {
    const depth = context[DEPTH_KEY];
    return typeof depth === 'number' ? depth : 0;
}
