/**
 * Execution units as graph nodes.
 *
 * @module
 */
import { type ExecutionUnit } from '../runnable/ExecutionUnit.js';
import { type NodeFn } from './GraphTypes.js';

export interface UnitNodeMapping<S, I, O> {
    /** Unit input read from the state */
    readonly getInput: (state: S) => I;
    /** Next state from the current state and the unit's output */
    readonly setOutput: (state: S, output: O) => S;
}

/**
 * Node that invokes `unit` on a slice of the state and writes its output
 * back. The node's observer context is passed on to the unit.
 *
 * @example
 * ```typescript
 * graph.addNode('count', asNode(lengthUnit, {
 *     getInput: (s) => s.text,
 *     setOutput: (s, length) => ({ ...s, length }),
 * }));
 * ```
 */
export function asNode<S, I, O>(unit: ExecutionUnit<I, O>, mapping: UnitNodeMapping<S, I, O>): NodeFn<S> {
    return (state, options) =>
        unit.invoke(mapping.getInput(state), options).then((output) => mapping.setOutput(state, output));
}
