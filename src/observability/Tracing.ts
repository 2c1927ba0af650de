/**
 * Tracing — OpenTelemetry-Compatible Tracing Abstraction
 *
 * Minimal interfaces structurally compatible with OpenTelemetry's
 * `Tracer` and `Span`, so an OTel tracer can be handed to
 * {@link TracingHandler} directly, without an adapter and without an
 * `@opentelemetry/*` dependency.
 *
 * @example
 * ```typescript
 * import { trace } from '@opentelemetry/api';
 *
 * const callbacks = new CallbackManager([
 *     new TracingHandler({ tracer: trace.getTracer('my-app') }),
 * ]);
 * await graph.invoke(initial, { callbacks });
 * ```
 *
 * @example
 * ```typescript
 * // Custom tracer (e.g. for testing)
 * const ended: string[] = [];
 * const testTracer: WeaveTracer = {
 *     startSpan(name) {
 *         return {
 *             setAttribute() {},
 *             setStatus() {},
 *             end() { ended.push(name); },
 *             recordException() {},
 *         };
 *     },
 * };
 * ```
 *
 * @module
 */

// ============================================================================
// Constants
// ============================================================================

/**
 * Span status codes matching OpenTelemetry's `SpanStatusCode` enum.
 *
 * - `UNSET` (0): default
 * - `OK` (1): the unit completed
 * - `ERROR` (2): the unit threw, or its stream carried an error item
 */
export const SpanStatusCode = { UNSET: 0, OK: 1, ERROR: 2 } as const;

// ============================================================================
// Types
// ============================================================================

/**
 * Attribute value type, matching OpenTelemetry's `SpanAttributeValue`.
 *
 * Using `unknown` here would cause contravariance errors when assigning
 * an OTel `Tracer` to `WeaveTracer` under `strict`.
 */
export type WeaveAttributeValue =
    | string
    | number
    | boolean
    | ReadonlyArray<string>
    | ReadonlyArray<number>
    | ReadonlyArray<boolean>;

/**
 * Minimal span interface, a structural subtype of OTel's `Span`.
 */
export interface WeaveSpan {
    /**
     * @param key - Attribute key (`runweave.*` namespace for library attributes)
     */
    setAttribute(key: string, value: WeaveAttributeValue): void;

    setStatus(status: { code: number; message?: string }): void;

    /**
     * Add a timestamped event. Optional: not every tracer supports it,
     * so callers use `span.addEvent?.()`.
     */
    addEvent?(name: string, attributes?: Record<string, WeaveAttributeValue>): void;

    /** End this span. Called exactly once. */
    end(): void;

    recordException(exception: Error | string): void;
}

/**
 * Minimal tracer interface, a structural subtype of OTel's `Tracer`.
 *
 * Only the first two parameters of OTel's `startSpan(name, options?, context?)`
 * are used. Without OTel's `Context` API, spans opened by auto-instrumented
 * code inside a unit appear as siblings of the unit's span.
 */
export interface WeaveTracer {
    /**
     * @returns A started span that must be ended via `span.end()`
     */
    startSpan(name: string, options?: {
        attributes?: Record<string, WeaveAttributeValue>;
    }): WeaveSpan;
}
