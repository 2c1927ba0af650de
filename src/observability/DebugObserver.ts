/**
 * DebugObserver — Structured Debug Events for Graph Runs
 *
 * A `StateGraph` configured with a debug observer emits one typed event
 * at each step of its run loop. Without one, the loop emits nothing.
 *
 * Design principles:
 * - Pure function observer (no class hierarchy)
 * - Discriminated union events (exhaustive switch possible)
 * - Immutable event payloads (readonly)
 *
 * @example
 * ```typescript
 * import { StateGraph, createDebugObserver } from 'runweave';
 *
 * // Default: pretty console.debug output
 * const graph = new StateGraph<State>({ debug: createDebugObserver() });
 *
 * // Custom handler (e.g. collect in tests)
 * const events: DebugEvent[] = [];
 * const graph = new StateGraph<State>({ debug: createDebugObserver((e) => events.push(e)) });
 * ```
 *
 * @module
 */

// ============================================================================
// Event Types (Discriminated Union)
// ============================================================================

/** Emitted once per invocation, before the entry node runs. */
export interface GraphStartEvent {
    readonly type: 'graph.start';
    readonly graph: string;
    readonly entry: string;
    readonly timestamp: number;
}

/** Emitted after a node's transform returned. */
export interface NodeEvent {
    readonly type: 'node';
    readonly graph: string;
    readonly node: string;
    /** 1-based iteration the node ran in */
    readonly iteration: number;
    readonly durationMs: number;
    readonly timestamp: number;
}

/** Emitted when an edge resolved the next step. */
export interface RouteEvent {
    readonly type: 'route';
    readonly graph: string;
    readonly from: string;
    /** Next node, or `'__end__'` */
    readonly to: string;
    readonly edge: 'direct' | 'conditional' | 'multi-route' | 'parallel' | 'none';
    readonly timestamp: number;
}

/** Emitted after the branches of a parallel edge joined and merged. */
export interface FanoutEvent {
    readonly type: 'fanout';
    readonly graph: string;
    readonly from: string;
    readonly targets: readonly string[];
    readonly merged: boolean;
    readonly durationMs: number;
    readonly timestamp: number;
}

/** Emitted when a run terminated normally. */
export interface GraphEndEvent {
    readonly type: 'graph.end';
    readonly graph: string;
    readonly iterations: number;
    readonly path: readonly string[];
    readonly durationMs: number;
    readonly timestamp: number;
}

/** Emitted when a run aborted: node failure, unknown route or iteration ceiling. */
export interface ErrorEvent {
    readonly type: 'error';
    readonly graph: string;
    /** Node executing or routing when the run aborted */
    readonly node?: string;
    readonly error: string;
    readonly timestamp: number;
}

/**
 * Union of all debug event types.
 *
 * ```typescript
 * function handle(event: DebugEvent) {
 *     switch (event.type) {
 *         case 'graph.start':
 *         case 'node':
 *         case 'route':
 *         case 'fanout':
 *         case 'graph.end':
 *         case 'error':
 *     }
 * }
 * ```
 */
export type DebugEvent =
    | GraphStartEvent
    | NodeEvent
    | RouteEvent
    | FanoutEvent
    | GraphEndEvent
    | ErrorEvent;

/**
 * Observer function that receives debug events.
 */
export type DebugObserverFn = (event: DebugEvent) => void;

// ============================================================================
// Factory
// ============================================================================

/**
 * Create a debug observer with compact console output.
 *
 * If a custom handler is provided, events are forwarded to it instead.
 * The default handler prints:
 *
 * ```
 * [runweave] start     agent → plan
 * [runweave] node      agent/plan #1 0.4ms
 * [runweave] route     agent/plan → act (conditional)
 * [runweave] fanout    agent/act ⇉ search,browse 12.0ms
 * [runweave] end       agent ✓ 3 iterations 15.2ms
 * ```
 *
 * @param handler - Optional custom event handler. If omitted, uses `console.debug`.
 */
export function createDebugObserver(handler?: DebugObserverFn): DebugObserverFn {
    if (handler) return handler;

    return (event: DebugEvent): void => {
        const prefix = '[runweave]';

        switch (event.type) {
            case 'graph.start':
                console.debug(`${prefix} start     ${event.graph} → ${event.entry}`);
                break;

            case 'node':
                console.debug(`${prefix} node      ${event.graph}/${event.node} #${event.iteration} ${event.durationMs.toFixed(1)}ms`);
                break;

            case 'route':
                console.debug(`${prefix} route     ${event.graph}/${event.from} → ${event.to} (${event.edge})`);
                break;

            case 'fanout':
                console.debug(
                    `${prefix} fanout    ${event.graph}/${event.from} ⇉ ${event.targets.join(',')} ${event.durationMs.toFixed(1)}ms`,
                );
                break;

            case 'graph.end':
                console.debug(
                    `${prefix} end       ${event.graph} ✓ ${event.iterations} iterations ${event.durationMs.toFixed(1)}ms`,
                );
                break;

            case 'error': {
                const where = event.node ? `${event.graph}/${event.node}` : event.graph;
                console.debug(`${prefix} ERROR     ${where} ${event.error}`);
                break;
            }
        }
    };
}
