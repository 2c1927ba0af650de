/**
 * GraphPatterns — prebuilt graph shapes.
 *
 * @module
 */
import { GraphDefinitionError } from '../core/errors.js';
import { type MergerFn, type NodeFn, type RoutePredicate, type StateGraphOptions, END } from './GraphTypes.js';
import { StateGraph } from './StateGraph.js';

export type NamedNode<S> = readonly [name: string, fn: NodeFn<S>];

export interface LoopPattern<S> {
    /** Node the loop restarts from. Must be one of `nodes`. */
    readonly entryNode: string;
    readonly nodes: readonly NamedNode<S>[];
    /** Checked after the last node: `true` loops back, `false` ends. */
    readonly shouldContinue: RoutePredicate<S>;
}

export interface MapReducePattern<S> {
    readonly split: NamedNode<S>;
    readonly mappers: readonly NamedNode<S>[];
    readonly reduce: NamedNode<S>;
    /** Combines mapper results before `reduce` runs; unused with one mapper. Default: last mapper wins. */
    readonly merger?: MergerFn<S>;
}

function requireNodes<S>(nodes: readonly NamedNode<S>[], pattern: string): void {
    if (nodes.length === 0) throw new GraphDefinitionError(`The ${pattern} pattern needs at least one node.`);
}

function chain<S>(graph: StateGraph<S>, nodes: readonly NamedNode<S>[]): void {
    for (const [name, fn] of nodes) graph.addNode(name, fn);
    for (let i = 0; i < nodes.length - 1; i++) graph.addEdge(nodes[i][0], nodes[i + 1][0]);
}

export const GraphPatterns = {
    /** `A → B → … → END`, entry at the first node. */
    linear<S>(nodes: readonly NamedNode<S>[], options: StateGraphOptions<S> = {}): StateGraph<S> {
        requireNodes(nodes, 'linear');
        const graph = new StateGraph<S>(options);
        chain(graph, nodes);
        return graph
            .addEdge(nodes[nodes.length - 1][0], END)
            .setEntryPoint(nodes[0][0]);
    },

    /** `A → B → … → (entryNode | END)`, repeating while `shouldContinue` holds. */
    loop<S>(pattern: LoopPattern<S>, options: StateGraphOptions<S> = {}): StateGraph<S> {
        const { entryNode, nodes, shouldContinue } = pattern;
        requireNodes(nodes, 'loop');
        const graph = new StateGraph<S>(options);
        chain(graph, nodes);
        return graph
            .addConditionalRouter(nodes[nodes.length - 1][0], [[entryNode, shouldContinue]])
            .setEntryPoint(entryNode);
    },

    /** `split ⇉ mappers → reduce → END`. */
    mapReduce<S>(pattern: MapReducePattern<S>, options: StateGraphOptions<S> = {}): StateGraph<S> {
        const { split, mappers, reduce, merger } = pattern;
        requireNodes(mappers, 'map-reduce');
        const graph = new StateGraph<S>(options);

        graph.addNode(split[0], split[1]);
        for (const [name, fn] of mappers) graph.addNode(name, fn);
        graph.addNode(reduce[0], reduce[1]);

        graph.addParallelEdge(split[0], mappers.map(([name]) => name), merger);
        for (const [name] of mappers) graph.addEdge(name, reduce[0]);

        return graph
            .addEdge(reduce[0], END)
            .setEntryPoint(split[0]);
    },
};
