/**
 * Errors — Runweave Error Taxonomy
 *
 * Every failure raised by the library is a {@link RunweaveError} carrying a
 * stable `code`, so callers can branch on `err.code` instead of matching
 * message text.
 *
 * Stream-level conditions split into three kinds:
 * - exhaustion is not an error at all (an `{ kind: 'end' }` item);
 * - reading a retired reader is a programming error ({@link StreamClosedError});
 * - a named-merge source draining is informational
 *   ({@link SourceExhaustedError}, delivered in-band).
 *
 * @module
 */

// ── Codes ────────────────────────────────────────────────

/**
 * Stable error codes.
 */
export type ErrorCode =
    | 'STREAM_CLOSED'
    | 'STREAM_EMPTY'
    | 'SOURCE_EXHAUSTED'
    | 'UNIT_DEFINITION'
    | 'GRAPH_DEFINITION'
    | 'GRAPH_EXECUTION'
    | 'ITERATION_LIMIT'
    | 'INVALID_OPTIONS';

// ── Base ─────────────────────────────────────────────────

/**
 * Base class of every error the library throws or emits in-band.
 */
export class RunweaveError extends Error {
    readonly code: ErrorCode;

    constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'RunweaveError';
        this.code = code;
    }
}

// ── Streaming ────────────────────────────────────────────

/**
 * Raised by `read()` on a reader that already delivered end-of-stream,
 * was retired with `close()`, or was handed to a stream combinator.
 */
export class StreamClosedError extends RunweaveError {
    constructor(detail = 'reader is closed') {
        super('STREAM_CLOSED', `[runweave] Cannot read from stream: ${detail}.`);
        this.name = 'StreamClosedError';
    }
}

/**
 * Raised when a single value is required from a stream that ended
 * without producing one.
 */
export class EmptyStreamError extends RunweaveError {
    constructor(context: string) {
        super('STREAM_EMPTY', `[runweave] ${context}: stream ended without producing a value.`);
        this.name = 'EmptyStreamError';
    }
}

/**
 * In-band marker emitted by `mergeNamed()` when one named source drains.
 */
export class SourceExhaustedError extends RunweaveError {
    readonly source: string;

    constructor(source: string) {
        super('SOURCE_EXHAUSTED', `[runweave] Source stream "${source}" is exhausted.`);
        this.name = 'SourceExhaustedError';
        this.source = source;
    }
}

// ── Execution Units ──────────────────────────────────────

/**
 * Raised when an execution unit is created without any native mode.
 */
export class UnitDefinitionError extends RunweaveError {
    constructor(message: string) {
        super('UNIT_DEFINITION', `[runweave] ${message}`);
        this.name = 'UnitDefinitionError';
    }
}

// ── Graph ────────────────────────────────────────────────

/**
 * Raised while building a graph, or when invoking an incomplete one.
 */
export class GraphDefinitionError extends RunweaveError {
    constructor(message: string) {
        super('GRAPH_DEFINITION', `[runweave] ${message}`);
        this.name = 'GraphDefinitionError';
    }
}

/**
 * Raised when a node fails or a router returns an unknown route.
 * The original failure is kept as `cause`.
 */
export class GraphExecutionError extends RunweaveError {
    /** Node that was executing (or routing) when the run failed */
    readonly node: string;

    constructor(node: string, message: string, options?: { cause?: unknown }) {
        super('GRAPH_EXECUTION', `[runweave] Node "${node}": ${message}`, options);
        this.name = 'GraphExecutionError';
        this.node = node;
    }
}

/**
 * Raised when a graph run reaches its iteration ceiling without
 * reaching `END`. Always fatal.
 */
export class GraphIterationLimitError extends RunweaveError {
    readonly maxIterations: number;
    /** Visited nodes up to the moment the ceiling tripped */
    readonly path: readonly string[];

    constructor(maxIterations: number, path: readonly string[]) {
        super(
            'ITERATION_LIMIT',
            `[runweave] Graph exceeded the iteration ceiling (${maxIterations}). Possible infinite loop.`,
        );
        this.name = 'GraphIterationLimitError';
        this.maxIterations = maxIterations;
        this.path = Object.freeze([...path]);
    }
}

// ── Configuration ────────────────────────────────────────

/**
 * Raised when an options object fails schema validation.
 */
export class InvalidOptionsError extends RunweaveError {
    readonly issues: readonly string[];

    constructor(label: string, issues: readonly string[]) {
        super('INVALID_OPTIONS', `[runweave] Invalid ${label}: ${issues.join('; ')}`);
        this.name = 'InvalidOptionsError';
        this.issues = Object.freeze([...issues]);
    }
}

// ── Utilities ────────────────────────────────────────────

/**
 * Normalize an unknown thrown value into an `Error`.
 * @internal
 */
export function toError(value: unknown): Error {
    return value instanceof Error ? value : new Error(String(value));
}
