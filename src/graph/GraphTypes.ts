/**
 * Graph Types — Nodes, Edges, Results
 *
 * A graph is a name → node table plus at most one outgoing edge per node.
 * Edges are a tagged union resolved by the run loop; there is no object
 * graph, so cycles need no special handling.
 *
 * @module
 */
import { type GraphOptionsInput } from '../core/options.js';
import { type DebugObserverFn } from '../observability/DebugObserver.js';
import { type RunInfo } from '../observability/RunInfo.js';
import { type MaybePromise, type RunOptions } from '../runnable/ExecutionUnit.js';

/** Termination sentinel. Routing here stops the run. */
export const END = '__end__';

/** Pseudo-node drawn before the entry point in diagrams. */
export const START = '__start__';

// ── Functions ────────────────────────────────────────────

/**
 * State transform run when a node is visited.
 *
 * `options` carries the observer chain of the current run, to pass to
 * nested units.
 */
export type NodeFn<S> = (state: S, options: RunOptions) => MaybePromise<S>;

/** Returns the next node name, or {@link END}. */
export type RouterFn<S> = (state: S) => MaybePromise<string>;

export type RoutePredicate<S> = (state: S) => boolean;

/** One named route of a multi-route edge. */
export type RouteEntry<S> = readonly [name: string, predicate: RoutePredicate<S>];

/**
 * Routes in the order they are checked: a `Map` or an array of
 * `[name, predicate]` pairs.
 */
export type RouteTable<S> = ReadonlyMap<string, RoutePredicate<S>> | readonly RouteEntry<S>[];

/**
 * Combines parallel branch results. `results` follows the declared
 * target order.
 */
export type MergerFn<S> = (original: S, results: readonly S[]) => MaybePromise<S>;

// ── Nodes ────────────────────────────────────────────────

export interface GraphNode<S> {
    readonly name: string;
    readonly fn: NodeFn<S>;
    readonly description?: string;
    /** Identity reported to observer handlers */
    readonly info: RunInfo;
}

export interface NodeDetails {
    readonly description?: string;
}

// ── Edges ────────────────────────────────────────────────

export interface DirectEdge {
    readonly kind: 'direct';
    readonly from: string;
    readonly to: string;
}

export interface ConditionalEdge<S> {
    readonly kind: 'conditional';
    readonly from: string;
    readonly router: RouterFn<S>;
    readonly description?: string;
}

/**
 * Named routes checked in order; the first predicate that
 * holds wins, else `defaultRoute`.
 */
export interface MultiRouteEdge<S> {
    readonly kind: 'multi-route';
    readonly from: string;
    readonly routes: readonly RouteEntry<S>[];
    readonly defaultRoute: string;
}

/**
 * Fan-out to `to`. `END` targets are dropped when the edge is taken; with
 * one target left it is an ordinary transition.
 */
export interface ParallelEdge<S> {
    readonly kind: 'parallel';
    readonly from: string;
    readonly to: readonly string[];
    readonly merger?: MergerFn<S>;
}

export type GraphEdge<S> = DirectEdge | ConditionalEdge<S> | MultiRouteEdge<S> | ParallelEdge<S>;

// ── Results ──────────────────────────────────────────────

/**
 * Outcome of one graph invocation. Frozen.
 */
export interface GraphResult<S> {
    readonly state: S;
    /** Nodes visited as the current node, in order. Parallel branches are not listed */
    readonly path: readonly string[];
    readonly iterations: number;
}

// ── Options ──────────────────────────────────────────────

export interface StateGraphOptions<S> extends GraphOptionsInput {
    /** Receives a structured event at each step of the run loop */
    readonly debug?: DebugObserverFn;
    /**
     * View of the pre-fan-out state handed to each parallel branch.
     * Default: a shallow copy of plain objects and arrays, other values
     * as they are.
     */
    readonly branchState?: (state: S) => S;
}
