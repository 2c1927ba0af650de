/**
 * GraphBuilder — Fluent Graph Definition
 *
 * Reads like the flow it describes; every call delegates to the
 * underlying {@link StateGraph} and fails the same way.
 *
 * @example
 * ```typescript
 * const graph = new GraphBuilder<Draft>({ name: 'editor' })
 *     .withNode('write', write)
 *     .withNode('review', review)
 *     .connect('write', 'review')
 *     .routeIf({ from: 'review', condition: (d) => d.approved, then: END, otherwise: 'write' })
 *     .startFrom('write')
 *     .build();
 * ```
 *
 * @module
 */
import { type MergerFn, type NodeFn, type RoutePredicate, type RouteTable, type StateGraphOptions, END } from './GraphTypes.js';
import { StateGraph } from './StateGraph.js';

export interface RouteIfOptions<S> {
    readonly from: string;
    readonly condition: RoutePredicate<S>;
    readonly then: string;
    readonly otherwise: string;
}

export interface RouteWhenOptions<S> {
    readonly from: string;
    /** Checked in order; the first predicate that holds wins */
    readonly routes: RouteTable<S>;
    /** Default: `END` */
    readonly defaultRoute?: string;
}

export interface ParallelOptions<S> {
    readonly from: string;
    readonly to: readonly string[];
    readonly merger?: MergerFn<S>;
}

export class GraphBuilder<S> {
    private readonly _graph: StateGraph<S>;

    constructor(options: StateGraphOptions<S> = {}) {
        this._graph = new StateGraph<S>(options);
    }

    withNode(name: string, fn: NodeFn<S>, description?: string): this {
        this._graph.addNode(name, fn, description !== undefined ? { description } : {});
        return this;
    }

    connect(from: string, to: string): this {
        this._graph.addEdge(from, to);
        return this;
    }

    /** Two-way branch: `then` when `condition` holds, else `otherwise`. */
    routeIf(options: RouteIfOptions<S>): this {
        this._graph.addConditionalRouter(options.from, [[options.then, options.condition]], options.otherwise);
        return this;
    }

    routeWhen(options: RouteWhenOptions<S>): this {
        this._graph.addConditionalRouter(options.from, options.routes, options.defaultRoute ?? END);
        return this;
    }

    parallel(options: ParallelOptions<S>): this {
        this._graph.addParallelEdge(options.from, options.to, options.merger);
        return this;
    }

    startFrom(name: string): this {
        this._graph.setEntryPoint(name);
        return this;
    }

    build(): StateGraph<S> {
        return this._graph;
    }
}
