/**
 * @module
 * @description
 * Error taxonomy, option schemas and the concurrency guard.
 */
// ── Core ─────────────────────────────────────────────────
/** @category Core */
export {
    type ErrorCode,
    RunweaveError,
    StreamClosedError,
    EmptyStreamError,
    SourceExhaustedError,
    UnitDefinitionError,
    GraphDefinitionError,
    GraphExecutionError,
    GraphIterationLimitError,
    InvalidOptionsError,
} from './core/errors.js';
/** @category Core */
export { type Result, type Success, type Failure, succeed, fail, unwrap } from './core/result.js';
/** @category Core */
export {
    ChannelOptionsSchema,
    GraphOptionsSchema,
    BatchOptionsSchema,
    CopyCountSchema,
    DEFAULT_MAX_ITERATIONS,
    DEFAULT_CHANNEL_CAPACITY,
    type ChannelOptions,
    type ResolvedChannelOptions,
    type GraphOptionsInput,
    type ResolvedGraphOptions,
    type BatchOptions,
    safeParseOptions,
    parseOptions,
} from './core/options.js';
/** @category Core */
export { ConcurrencyGuard, createConcurrencyGuard, mapConcurrent } from './core/ConcurrencyGuard.js';

/**
 * @module
 * @description
 * Channels, readers and the stream algebra.
 */
// ── Streaming ────────────────────────────────────────────
/** @category Streaming */
export {
    type StreamItem,
    type ValueItem,
    type ErrorItem,
    type EndItem,
    valueItem,
    errorItem,
    END_ITEM,
    isSourceExhausted,
} from './streaming/StreamItem.js';
/** @category Streaming */
export { type StreamReader, type StreamSource, BaseStreamReader } from './streaming/StreamReader.js';
/** @category Streaming */
export { type Channel, type ChannelWriter, createChannel, produceStream } from './streaming/Channel.js';
/** @category Streaming */
export { BroadcastBuffer, BroadcastReader } from './streaming/BroadcastBuffer.js';
/** @category Streaming */
export { fromIterable, fromAsyncIterable, emptyStream, toStreamReader } from './streaming/sources.js';
/** @category Streaming */
export {
    forward,
    merge,
    mergeNamed,
    type NamedReaders,
    concat,
    copy,
    transform,
    SKIP,
    type Skip,
    first,
} from './streaming/StreamAlgebra.js';

/**
 * @module
 * @description
 * Four-mode execution units, composition and batching.
 */
// ── Execution Units ──────────────────────────────────────
/** @category Execution Units */
export {
    type Mode,
    MODES,
    type MaybePromise,
    type ReaderLike,
    type RunOptions,
    type BatchRunOptions,
    type UnitImplementation,
    type ExecutionUnit,
} from './runnable/ExecutionUnit.js';
/** @category Execution Units */
export { Unit, createUnit, pipe } from './runnable/Unit.js';
/** @category Execution Units */
export { lambda, syncLambda, streamingLambda } from './runnable/lambda.js';

/**
 * @module
 * @description
 * Stateful graph engine.
 */
// ── Graph ────────────────────────────────────────────────
/** @category Graph */
export {
    END,
    START,
    type NodeFn,
    type RouterFn,
    type RoutePredicate,
    type RouteEntry,
    type RouteTable,
    type MergerFn,
    type GraphNode,
    type NodeDetails,
    type DirectEdge,
    type ConditionalEdge,
    type MultiRouteEdge,
    type ParallelEdge,
    type GraphEdge,
    type GraphResult,
    type StateGraphOptions,
} from './graph/GraphTypes.js';
/** @category Graph */
export { StateGraph } from './graph/StateGraph.js';
/** @category Graph */
export {
    GraphBuilder,
    type RouteIfOptions,
    type RouteWhenOptions,
    type ParallelOptions,
} from './graph/GraphBuilder.js';
/** @category Graph */
export { GraphPatterns, type NamedNode, type LoopPattern, type MapReducePattern } from './graph/GraphPatterns.js';
/** @category Graph */
export { MapState } from './graph/MapState.js';
/** @category Graph */
export { asNode, type UnitNodeMapping } from './graph/UnitNode.js';

/**
 * @module
 * @description
 * Observer chain, bundled handlers, debug events and tracer types.
 */
// ── Observability ────────────────────────────────────────
/** @category Observability */
export {
    COMPONENT_CATEGORIES,
    type ComponentCategory,
    RunInfoSchema,
    type RunInfoInput,
    type RunInfo,
    createRunInfo,
} from './observability/RunInfo.js';
/** @category Observability */
export {
    type RunContext,
    type CallbackInput,
    type CallbackOutput,
    type StreamObservation,
    type HookResult,
    type CallbackHandler,
    type HookName,
    BaseCallbackHandler,
} from './observability/CallbackHandler.js';
/** @category Observability */
export {
    CallbackManager,
    type HandlerFailure,
    type HandlerErrorSink,
    type CallbackManagerOptions,
    type RunCallbackOptions,
} from './observability/CallbackManager.js';
/** @category Observability */
export { LoggingHandler, type LoggingHandlerOptions } from './observability/handlers/LoggingHandler.js';
/** @category Observability */
export {
    MetricsHandler,
    type ExecutionMetrics,
    type MetricsSummary,
    type MetricsHandlerOptions,
} from './observability/handlers/MetricsHandler.js';
/** @category Observability */
export {
    TracingHandler,
    type TraceEvent,
    type TraceEventType,
    type TracingHandlerOptions,
    formatTraceEvent,
} from './observability/handlers/TracingHandler.js';
/** @category Observability */
export {
    createDebugObserver,
    type DebugEvent,
    type DebugObserverFn,
    type GraphStartEvent,
    type NodeEvent,
    type RouteEvent,
    type FanoutEvent,
    type GraphEndEvent,
    type ErrorEvent,
} from './observability/DebugObserver.js';
/** @category Observability */
export { SpanStatusCode, type WeaveAttributeValue, type WeaveSpan, type WeaveTracer } from './observability/Tracing.js';
