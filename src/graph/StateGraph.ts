/**
 * StateGraph — Stateful Graph Engine
 *
 * Named nodes transform a state value; edges pick the next node. A run
 * starts at the entry point and loops until a node routes to {@link END}
 * or the iteration ceiling trips. Cycles are allowed: a node may be
 * visited any number of times within the ceiling.
 *
 * | Edge          | Next step                                             |
 * |---------------|-------------------------------------------------------|
 * | direct        | its target                                            |
 * | conditional   | the router's return value (a node name or `END`)      |
 * | multi-route   | first route whose predicate holds, else the default   |
 * | parallel      | every target, concurrently, then the merged state     |
 *
 * A fan-out belongs to the iteration of the node that took the edge; only
 * that node is recorded in the path.
 *
 * @example
 * ```typescript
 * const graph = new StateGraph<{ draft: string; approved: boolean }>({ name: 'review' })
 *     .addNode('write', write)
 *     .addNode('check', check)
 *     .addEdge('write', 'check')
 *     .addConditionalEdge('check', (s) => (s.approved ? END : 'write'))
 *     .setEntryPoint('write');
 *
 * const { state, path } = await graph.invoke({ draft: '', approved: false });
 * ```
 *
 * @module
 */
import { createConcurrencyGuard, mapConcurrent } from '../core/ConcurrencyGuard.js';
import { GraphDefinitionError, GraphExecutionError, GraphIterationLimitError, toError } from '../core/errors.js';
import { GraphOptionsSchema, type ResolvedGraphOptions, parseOptions } from '../core/options.js';
import { type DebugEvent, type DebugObserverFn, type RouteEvent } from '../observability/DebugObserver.js';
import { type RunInfo, type RunInfoInput, createRunInfo } from '../observability/RunInfo.js';
import { type RunOptions } from '../runnable/ExecutionUnit.js';
import { type Unit, createUnit } from '../runnable/Unit.js';
import { settle } from '../runnable/UnitDerivation.js';
import { renderMermaid } from './GraphMermaid.js';
import {
    type GraphEdge,
    type GraphNode,
    type GraphResult,
    type MergerFn,
    type NodeDetails,
    type NodeFn,
    type RouteEntry,
    type RouteTable,
    type RouterFn,
    type StateGraphOptions,
    END,
} from './GraphTypes.js';

// ── Run Loop Steps ───────────────────────────────────────

interface NodeStep {
    readonly kind: 'node';
    readonly node: string;
}

interface FanoutStep<S> {
    readonly kind: 'fanout';
    readonly from: string;
    readonly targets: readonly string[];
    readonly merger?: MergerFn<S>;
}

type Step<S> = NodeStep | FanoutStep<S> | { readonly kind: 'end' };

const END_STEP = { kind: 'end' } as const;

/** Holds a state across `await` without unwrapping it. */
interface StateHolder<S> {
    readonly state: S;
}

/**
 * Shallow copy of plain objects and arrays; other values pass through.
 */
function shallowCopy<S>(state: S): S {
    if (Array.isArray(state)) return Object.assign([], state);
    if (typeof state === 'object' && state !== null && Object.getPrototypeOf(state) === Object.prototype) {
        return Object.assign({}, state);
    }
    return state;
}

// ============================================================================
// StateGraph
// ============================================================================

export class StateGraph<S> {
    private readonly _nodes = new Map<string, GraphNode<S>>();
    private readonly _edges = new Map<string, GraphEdge<S>>();
    private _entryPoint: string | undefined;

    private readonly _options: ResolvedGraphOptions;
    private readonly _debug: DebugObserverFn | undefined;
    private readonly _branchState: (state: S) => S;

    /**
     * @throws {InvalidOptionsError} when `maxIterations` or
     * `maxParallelBranches` is not a positive integer
     */
    constructor(options: StateGraphOptions<S> = {}) {
        const { debug, branchState, ...graphOptions } = options;
        this._options = parseOptions(GraphOptionsSchema, graphOptions, 'graph options');
        this._debug = debug;
        this._branchState = branchState ?? shallowCopy;
    }

    get name(): string {
        return this._options.name;
    }

    get maxIterations(): number {
        return this._options.maxIterations;
    }

    get entryPoint(): string | undefined {
        return this._entryPoint;
    }

    get nodes(): readonly GraphNode<S>[] {
        return [...this._nodes.values()];
    }

    get edges(): readonly GraphEdge<S>[] {
        return [...this._edges.values()];
    }

    // ── Definition ───────────────────────────────────────

    addNode(name: string, fn: NodeFn<S>, details: NodeDetails = {}): this {
        if (name.length === 0) throw new GraphDefinitionError('Node name must not be empty.');
        if (name === END) throw new GraphDefinitionError(`"${END}" is reserved for the termination sentinel.`);
        if (this._nodes.has(name)) throw new GraphDefinitionError(`Node "${name}" already exists.`);

        const { description } = details;
        this._nodes.set(name, {
            name,
            fn,
            ...(description !== undefined ? { description } : {}),
            info: createRunInfo({
                name,
                type: 'GraphNode',
                category: 'node',
                metadata: description !== undefined
                    ? { graph: this.name, description }
                    : { graph: this.name },
            }),
        });
        return this;
    }

    addEdge(from: string, to: string): this {
        this._assertSource(from);
        this._assertTarget(to, 'edge target');
        this._edges.set(from, { kind: 'direct', from, to });
        return this;
    }

    /**
     * Route by the name `router` returns. The name is checked when the
     * edge is taken; an unknown one fails the run.
     */
    addConditionalEdge(from: string, router: RouterFn<S>, details: NodeDetails = {}): this {
        this._assertSource(from);
        const { description } = details;
        this._edges.set(from, {
            kind: 'conditional',
            from,
            router,
            ...(description !== undefined ? { description } : {}),
        });
        return this;
    }

    /**
     * Route to the first name in `routes` whose predicate holds, checked
     * in iteration order, else to `defaultRoute`.
     *
     * @example
     * ```typescript
     * graph.addConditionalRouter('inspect', [
     *     ['big', (s) => s.value > 100],
     *     ['small', (s) => s.value > 0],
     * ], 'zero');
     * ```
     */
    addConditionalRouter(from: string, routes: RouteTable<S>, defaultRoute: string = END): this {
        this._assertSource(from);
        const entries: RouteEntry<S>[] = [...routes];
        const seen = new Set<string>();
        for (const [name] of entries) {
            this._assertTarget(name, 'route');
            if (seen.has(name)) throw new GraphDefinitionError(`Route "${name}" from "${from}" is listed twice.`);
            seen.add(name);
        }
        this._assertTarget(defaultRoute, 'default route');

        this._edges.set(from, { kind: 'multi-route', from, routes: entries, defaultRoute });
        return this;
    }

    /**
     * Run every target concurrently on its own view of the current state,
     * then combine the results with `merger`. Without a merger the result
     * of the last declared target wins.
     *
     * `END` targets are dropped when the edge is taken. A single remaining
     * target is an ordinary transition and `merger` is not called.
     */
    addParallelEdge(from: string, to: readonly string[], merger?: MergerFn<S>): this {
        this._assertSource(from);
        if (to.length === 0) {
            throw new GraphDefinitionError(`Parallel edge from "${from}" needs at least one target.`);
        }
        for (const target of to) {
            if (target !== END && !this._nodes.has(target)) {
                throw new GraphDefinitionError(`Unknown node "${target}" in parallel edge from "${from}".`);
            }
        }
        this._edges.set(from, {
            kind: 'parallel',
            from,
            to: [...to],
            ...(merger !== undefined ? { merger } : {}),
        });
        return this;
    }

    setEntryPoint(name: string): this {
        if (!this._nodes.has(name)) throw new GraphDefinitionError(`Entry point "${name}" is not a node.`);
        this._entryPoint = name;
        return this;
    }

    // ── Execution ────────────────────────────────────────

    /**
     * Run the graph from its entry point.
     *
     * With `options.callbacks`, the whole run and every node visit are
     * observed (categories `graph` and `node`).
     *
     * @throws {GraphDefinitionError} when no entry point is set
     * @throws {GraphExecutionError} when a node, router or merger fails,
     * or a router returns an unknown name
     * @throws {GraphIterationLimitError} when the ceiling trips
     */
    async invoke(initial: S, options: RunOptions = {}): Promise<GraphResult<S>> {
        const entry = this._requireEntry();
        const { callbacks } = options;
        if (!callbacks) return this._execute(entry, initial, options);

        return callbacks.runWithCallbacks(
            options.context ?? {}, this._runInfo(entry), initial,
            (context) => this._execute(entry, initial, { ...options, context }),
        );
    }

    /**
     * This graph as an execution unit with native `invoke`; the other
     * modes are derived.
     */
    asUnit(info: Partial<RunInfoInput> = {}): Unit<S, GraphResult<S>> {
        return createUnit<S, GraphResult<S>>(
            { invoke: (state, options) => this._execute(this._requireEntry(), state, options ?? {}) },
            { name: this.name, type: 'StateGraph', category: 'graph', ...info },
        );
    }

    /** Mermaid flowchart of the nodes and edges. */
    toMermaid(): string {
        return renderMermaid(this.nodes, this.edges, this._entryPoint);
    }

    toString(): string {
        return `StateGraph(${this.name}: nodes=${this._nodes.size}, edges=${this._edges.size}, entry=${this._entryPoint ?? 'none'})`;
    }

    // ── Run Loop ─────────────────────────────────────────

    private async _execute(entry: string, initial: S, options: RunOptions): Promise<GraphResult<S>> {
        const graph = this.name;
        const { maxIterations } = this._options;
        const startedAt = Date.now();
        const path: string[] = [];
        let iterations = 0;
        let current: StateHolder<S> = { state: initial };
        let step: Step<S> = { kind: 'node', node: entry };

        this._emit({ type: 'graph.start', graph, entry, timestamp: startedAt });

        try {
            while (step.kind !== 'end') {
                if (iterations >= maxIterations) throw new GraphIterationLimitError(maxIterations, path);
                iterations++;

                if (step.kind === 'node') {
                    path.push(step.node);
                    current = await this._runNode(step.node, current.state, iterations, options);
                    step = await this._resolve(step.node, current.state);
                }
                if (step.kind === 'fanout') {
                    current = await this._fanOut(step, current.state, iterations, options);
                    // A fan-out resolved from a branch runs as the next iteration.
                    step = await this._resolveAfterFanout(step.targets, current.state);
                }
            }
        } catch (error) {
            this._emit({
                type: 'error',
                graph,
                ...(error instanceof GraphExecutionError ? { node: error.node } : {}),
                error: toError(error).message,
                timestamp: Date.now(),
            });
            throw error;
        }

        const finishedAt = Date.now();
        this._emit({
            type: 'graph.end',
            graph,
            iterations,
            path: [...path],
            durationMs: finishedAt - startedAt,
            timestamp: finishedAt,
        });

        return Object.freeze({ state: current.state, path: Object.freeze(path), iterations });
    }

    private _runNode(name: string, state: S, iteration: number, options: RunOptions): Promise<StateHolder<S>> {
        const node = this._nodes.get(name);
        if (!node) return Promise.reject(new GraphExecutionError(name, 'node is not registered'));

        const startedAt = Date.now();
        const run = (nodeOptions: RunOptions): Promise<S> => settle(() => node.fn(state, nodeOptions));
        const { callbacks } = options;
        const result = callbacks
            ? callbacks.runWithCallbacks(
                options.context ?? {}, node.info, state,
                (context) => run({ ...options, context }),
            )
            : run(options);

        return result.then(
            (next): StateHolder<S> => {
                const finishedAt = Date.now();
                this._emit({
                    type: 'node',
                    graph: this.name,
                    node: name,
                    iteration,
                    durationMs: finishedAt - startedAt,
                    timestamp: finishedAt,
                });
                return { state: next };
            },
            (error: unknown) => {
                throw new GraphExecutionError(name, `failed: ${toError(error).message}`, { cause: error });
            },
        );
    }

    private _fanOut(step: FanoutStep<S>, state: S, iteration: number, options: RunOptions): Promise<StateHolder<S>> {
        const startedAt = Date.now();
        const guard = createConcurrencyGuard(this._options.maxParallelBranches);
        const branch = (target: string): Promise<S> =>
            this._runNode(target, this._branchState(state), iteration, options).then((held) => held.state);

        return mapConcurrent(step.targets, branch, guard)
            .then((results) => this._merge(step, state, results))
            .then((merged): StateHolder<S> => {
                const finishedAt = Date.now();
                this._emit({
                    type: 'fanout',
                    graph: this.name,
                    from: step.from,
                    targets: step.targets,
                    merged: step.merger !== undefined,
                    durationMs: finishedAt - startedAt,
                    timestamp: finishedAt,
                });
                return { state: merged };
            });
    }

    private _merge(step: FanoutStep<S>, original: S, results: readonly S[]): Promise<S> {
        const { merger } = step;
        if (!merger) return settle(() => results[results.length - 1]);

        return settle(() => merger(original, results)).catch((error: unknown) => {
            throw new GraphExecutionError(step.from, `parallel merge failed: ${toError(error).message}`, { cause: error });
        });
    }

    // ── Routing ──────────────────────────────────────────

    private async _resolve(from: string, state: S): Promise<Step<S>> {
        const edge = this._edges.get(from);
        if (!edge) return this._route(from, END, 'none');

        switch (edge.kind) {
            case 'direct':
                return this._route(from, edge.to, 'direct');

            case 'conditional': {
                const target = await settle(() => edge.router(state)).catch((error: unknown) => {
                    throw new GraphExecutionError(from, `router failed: ${toError(error).message}`, { cause: error });
                });
                if (target !== END && !this._nodes.has(target)) {
                    throw new GraphExecutionError(from, `router returned unknown node "${target}"`);
                }
                return this._route(from, target, 'conditional');
            }

            case 'multi-route': {
                let target = edge.defaultRoute;
                try {
                    const match = edge.routes.find(([, predicate]) => predicate(state));
                    if (match) target = match[0];
                } catch (error) {
                    throw new GraphExecutionError(from, `route predicate failed: ${toError(error).message}`, { cause: error });
                }
                return this._route(from, target, 'multi-route');
            }

            case 'parallel': {
                const targets = edge.to.filter((target) => target !== END);
                if (targets.length === 0) return this._route(from, END, 'parallel');
                if (targets.length === 1) return this._route(from, targets[0], 'parallel');
                return {
                    kind: 'fanout',
                    from,
                    targets,
                    ...(edge.merger !== undefined ? { merger: edge.merger } : {}),
                };
            }
        }
    }

    /**
     * After a fan-out, continue from the first target (in declared order)
     * whose edge does not terminate.
     */
    private async _resolveAfterFanout(targets: readonly string[], state: S): Promise<Step<S>> {
        for (const target of targets) {
            const next = await this._resolve(target, state);
            if (next.kind !== 'end') return next;
        }
        return END_STEP;
    }

    private _route(from: string, to: string, edge: RouteEvent['edge']): Step<S> {
        this._emit({ type: 'route', graph: this.name, from, to, edge, timestamp: Date.now() });
        return to === END ? END_STEP : { kind: 'node', node: to };
    }

    // ── Helpers ──────────────────────────────────────────

    /** A failing observer is reported and the run goes on. */
    private _emit(event: DebugEvent): void {
        if (!this._debug) return;
        try {
            this._debug(event);
        } catch (error) {
            console.warn(`[runweave] Debug observer failed on "${event.type}" event in graph "${this.name}":`, error);
        }
    }

    private _requireEntry(): string {
        if (this._entryPoint === undefined) {
            throw new GraphDefinitionError('Entry point not set. Call setEntryPoint() first.');
        }
        return this._entryPoint;
    }

    private _runInfo(entry: string): RunInfo {
        return createRunInfo({
            name: this.name,
            type: 'StateGraph',
            category: 'graph',
            metadata: { entryPoint: entry, nodeCount: this._nodes.size, edgeCount: this._edges.size },
        });
    }

    private _assertSource(from: string): void {
        if (!this._nodes.has(from)) throw new GraphDefinitionError(`Unknown node "${from}" in edge source.`);
        if (this._edges.has(from)) {
            throw new GraphDefinitionError(`Node "${from}" already has an outgoing edge.`);
        }
    }

    private _assertTarget(to: string, role: string): void {
        if (to !== END && !this._nodes.has(to)) throw new GraphDefinitionError(`Unknown node "${to}" in ${role}.`);
    }
}
