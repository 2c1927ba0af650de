/**
 * MetricsHandler — Run Durations and Outcomes
 *
 * Records one {@link ExecutionMetrics} entry per completed or failed run.
 * The start time travels in the run context, so nested and concurrent
 * runs are timed independently.
 *
 * @example
 * ```typescript
 * const metrics = new MetricsHandler();
 * await chain.invoke(input, { callbacks: new CallbackManager([metrics]) });
 *
 * metrics.averageDuration('retrieve'); // ms
 * metrics.printSummary();
 * ```
 *
 * @module
 */
import { BaseCallbackHandler, type CallbackInput, type CallbackOutput, type RunContext } from '../CallbackHandler.js';
import { type ComponentCategory, type RunInfo } from '../RunInfo.js';

const START_KEY = '__runweave.metrics.start';

type RunOutcome = { readonly ok: true } | { readonly ok: false; readonly error: unknown };

export interface ExecutionMetrics {
    readonly name: string;
    readonly type: string;
    readonly category: ComponentCategory;
    /** Epoch milliseconds */
    readonly startTime: number;
    readonly endTime: number;
    readonly durationMs: number;
    readonly ok: boolean;
    readonly error?: unknown;
    readonly metadata?: Readonly<Record<string, unknown>>;
}

export interface MetricsSummary {
    readonly total: number;
    readonly succeeded: number;
    readonly failed: number;
    readonly averageDurationMs: number;
    readonly byName: Readonly<Record<string, { readonly calls: number; readonly averageDurationMs: number }>>;
}

export interface MetricsHandlerOptions {
    /** Log one line per recorded run. Default: `false` */
    readonly autoLog?: boolean;
    /** Line sink for `autoLog` and `printSummary()`. Default: `console.log` */
    readonly log?: (line: string) => void;
    /** Default: `Date.now` */
    readonly now?: () => number;
}

export class MetricsHandler extends BaseCallbackHandler {
    private readonly _metrics: ExecutionMetrics[] = [];
    private readonly _autoLog: boolean;
    private readonly _log: (line: string) => void;
    private readonly _now: () => number;

    constructor(options: MetricsHandlerOptions = {}) {
        super();
        this._autoLog = options.autoLog ?? false;
        this._log = options.log ?? ((line) => console.log(line));
        this._now = options.now ?? Date.now;
    }

    // ── Queries ──────────────────────────────────────────

    get metrics(): readonly ExecutionMetrics[] {
        return this._metrics;
    }

    clear(): void {
        this._metrics.length = 0;
    }

    metricsFor(name: string): ExecutionMetrics[] {
        return this._metrics.filter((m) => m.name === name);
    }

    /** Mean duration in ms of the runs named `name`, or `undefined` when none ran. */
    averageDuration(name: string): number | undefined {
        const runs = this.metricsFor(name);
        if (runs.length === 0) return undefined;
        return mean(runs.map((m) => m.durationMs));
    }

    summary(): MetricsSummary {
        const byName: Record<string, { calls: number; averageDurationMs: number }> = {};
        for (const name of new Set(this._metrics.map((m) => m.name))) {
            const runs = this.metricsFor(name);
            byName[name] = { calls: runs.length, averageDurationMs: mean(runs.map((m) => m.durationMs)) };
        }
        const succeeded = this._metrics.filter((m) => m.ok).length;
        return {
            total: this._metrics.length,
            succeeded,
            failed: this._metrics.length - succeeded,
            averageDurationMs: mean(this._metrics.map((m) => m.durationMs)),
            byName,
        };
    }

    printSummary(): void {
        const s = this.summary();
        this._log('=== Execution Metrics Summary ===');
        this._log(`Total executions: ${s.total}`);
        this._log(`Successful: ${s.succeeded}`);
        this._log(`Failed: ${s.failed}`);
        this._log(`Average duration: ${s.averageDurationMs.toFixed(1)}ms`);
        for (const [name, entry] of Object.entries(s.byName)) {
            this._log(`  ${name}: ${entry.calls} calls, avg ${entry.averageDurationMs.toFixed(1)}ms`);
        }
    }

    // ── Hooks ────────────────────────────────────────────

    onStart(context: RunContext, _info: RunInfo, _input: CallbackInput): RunContext {
        return { ...context, [START_KEY]: this._now() };
    }

    onEnd(context: RunContext, info: RunInfo, _output: CallbackOutput): RunContext {
        const entry = this._record(context, info, { ok: true });
        if (entry && this._autoLog) {
            this._log(`[runweave] metrics ${entry.name}: ${entry.durationMs}ms`);
        }
        return context;
    }

    onError(context: RunContext, info: RunInfo, error: unknown): RunContext {
        const entry = this._record(context, info, { ok: false, error });
        if (entry && this._autoLog) {
            this._log(`[runweave] metrics ${entry.name} FAILED: ${entry.durationMs}ms - ${String(error)}`);
        }
        // A streamed run reports end-of-stream after in-band errors; record it once.
        return { ...context, [START_KEY]: undefined };
    }

    // ── Private ──────────────────────────────────────────

    private _record(context: RunContext, info: RunInfo, outcome: RunOutcome): ExecutionMetrics | undefined {
        const startTime = context[START_KEY];
        if (typeof startTime !== 'number') return undefined;

        const endTime = this._now();
        const entry: ExecutionMetrics = {
            name: info.name,
            type: info.type,
            category: info.category,
            startTime,
            endTime,
            durationMs: endTime - startTime,
            ok: outcome.ok,
            ...(outcome.ok ? {} : { error: outcome.error }),
            ...(info.metadata !== undefined ? { metadata: info.metadata } : {}),
        };
        this._metrics.push(entry);
        return entry;
    }
}

function mean(values: readonly number[]): number {
    if (values.length === 0) return 0;
    return values.reduce((sum, v) => sum + v, 0) / values.length;
}
