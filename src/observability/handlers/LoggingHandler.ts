/**
 * LoggingHandler — Console Lines Per Run
 *
 * ```
 * [runweave] START: summarizer
 * [runweave] END: summarizer
 * [runweave] ERROR in summarizer: Error: rate limited
 * ```
 *
 * @module
 */
import { BaseCallbackHandler, type CallbackInput, type CallbackOutput, type RunContext, type StreamObservation } from '../CallbackHandler.js';
import { type RunInfo } from '../RunInfo.js';

export interface LoggingHandlerOptions {
    /** Timestamps, component type and metadata on every line. Default: `false` */
    readonly verbose?: boolean;
    /** Log input data (verbose only). Default: `false` */
    readonly logInputs?: boolean;
    /** Log output data (verbose only). Default: `false` */
    readonly logOutputs?: boolean;
    /** Default: `'[runweave]'` */
    readonly prefix?: string;
    /** Line sink. Default: `console.log` */
    readonly log?: (line: string) => void;
    /** Clock for verbose timestamps */
    readonly now?: () => Date;
}

export class LoggingHandler extends BaseCallbackHandler {
    private readonly _verbose: boolean;
    private readonly _logInputs: boolean;
    private readonly _logOutputs: boolean;
    private readonly _prefix: string;
    private readonly _log: (line: string) => void;
    private readonly _now: () => Date;

    constructor(options: LoggingHandlerOptions = {}) {
        super();
        this._verbose = options.verbose ?? false;
        this._logInputs = options.logInputs ?? false;
        this._logOutputs = options.logOutputs ?? false;
        this._prefix = options.prefix ?? '[runweave]';
        this._log = options.log ?? ((line) => console.log(line));
        this._now = options.now ?? (() => new Date());
    }

    onStart(context: RunContext, info: RunInfo, input: CallbackInput): RunContext {
        if (!this._verbose) {
            this._log(`${this._prefix} START: ${info.name}`);
            return context;
        }
        this._log(`${this._prefix} [${this._timestamp()}] START: ${info.name} (${info.type})`);
        this._log(`  Category: ${info.category}`);
        if (info.metadata) this._log(`  Metadata: ${formatValue(info.metadata)}`);
        if (this._logInputs) {
            this._log(`  Input: ${formatValue(input.data)}`);
            if (input.metadata) this._log(`  Input Metadata: ${formatValue(input.metadata)}`);
        }
        return context;
    }

    onEnd(context: RunContext, info: RunInfo, output: CallbackOutput): RunContext {
        if (!this._verbose) {
            this._log(`${this._prefix} END: ${info.name}`);
            return context;
        }
        this._log(`${this._prefix} [${this._timestamp()}] END: ${info.name}`);
        if (this._logOutputs) {
            this._log(`  Output: ${formatValue(output.data)}`);
            if (output.metadata) this._log(`  Output Metadata: ${formatValue(output.metadata)}`);
        }
        return context;
    }

    onError(context: RunContext, info: RunInfo, error: unknown): RunContext {
        const stamp = this._verbose ? ` [${this._timestamp()}]` : '';
        this._log(`${this._prefix}${stamp} ERROR in ${info.name}: ${String(error)}`);
        if (this._verbose) {
            this._log(`  Component: ${info.type} (${info.category})`);
            if (error instanceof Error && error.stack) this._log(error.stack);
        }
        return context;
    }

    onStartWithStreamInput(context: RunContext, info: RunInfo, _input: StreamObservation): RunContext {
        const stamp = this._verbose ? ` [${this._timestamp()}]` : '';
        this._log(`${this._prefix}${stamp} START (streaming input): ${info.name}`);
        return context;
    }

    onEndWithStreamOutput(context: RunContext, info: RunInfo, _output: StreamObservation): RunContext {
        const stamp = this._verbose ? ` [${this._timestamp()}]` : '';
        this._log(`${this._prefix}${stamp} STREAMING: ${info.name}`);
        return context;
    }

    private _timestamp(): string {
        return this._now().toISOString();
    }
}

function formatValue(value: unknown): string {
    if (typeof value === 'string') return value;
    try {
        return JSON.stringify(value) ?? String(value);
    } catch {
        return String(value);
    }
}
