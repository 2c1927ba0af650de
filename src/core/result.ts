/**
 * Result\<T\> — Railway-Oriented Error Handling
 *
 * A lightweight discriminated union for expressing success/failure
 * without throwing. Used by {@link safeParseOptions} and available to
 * collaborators that prefer checking `result.ok` to catching.
 *
 * @example
 * ```typescript
 * import { safeParseOptions, GraphOptionsSchema } from 'runweave';
 *
 * const result = safeParseOptions(GraphOptionsSchema, raw, 'graph options');
 * if (!result.ok) return report(result.error);  // Failure path
 * const options = result.value;                  // Narrowed
 * ```
 *
 * @module
 */
import { type RunweaveError } from './errors.js';

// ── Discriminated Union ──────────────────────────────────

/**
 * Successful result containing a typed value.
 *
 * @typeParam T - The success value type
 */
export interface Success<T> {
    readonly ok: true;
    readonly value: T;
}

/**
 * Failed result carrying the error that would have been thrown.
 */
export interface Failure {
    readonly ok: false;
    readonly error: RunweaveError;
}

/**
 * Either `Success<T>` or `Failure`. Check `result.ok` to narrow.
 */
export type Result<T> = Success<T> | Failure;

// ── Constructors ─────────────────────────────────────────

/**
 * Create a successful result.
 *
 * @example
 * ```typescript
 * return succeed(42);
 * ```
 */
export function succeed<T>(value: T): Success<T> {
    return { ok: true, value };
}

/**
 * Create a failed result.
 *
 * @example
 * ```typescript
 * return fail(new InvalidOptionsError('graph options', ['maxIterations: too small']));
 * ```
 */
export function fail(error: RunweaveError): Failure {
    return { ok: false, error };
}

/**
 * Unwrap a result, throwing its error on failure.
 */
export function unwrap<T>(result: Result<T>): T {
    if (!result.ok) throw result.error;
    return result.value;
}
