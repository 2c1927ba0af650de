/**
 * Lambda units — wrap plain functions as execution units.
 *
 * @module
 */
import { type RunInfoInput } from '../observability/RunInfo.js';
import { type RunOptions } from './ExecutionUnit.js';
import { type Unit, createUnit } from './Unit.js';

type LambdaInfo = Partial<RunInfoInput>;

function lambdaInfo(info: LambdaInfo): LambdaInfo {
    return { name: 'Lambda', type: 'Lambda', category: 'runnable', ...info };
}

/**
 * Async function as a unit with native `invoke`.
 *
 * @example
 * ```typescript
 * const fetchDocs = lambda(async (query: string) => store.search(query), { name: 'fetch_docs' });
 * ```
 */
export function lambda<I, O>(
    fn: (input: I, options?: RunOptions) => Promise<O>,
    info: LambdaInfo = {},
): Unit<I, O> {
    return createUnit<I, O>({ invoke: fn }, lambdaInfo(info));
}

/** Synchronous function as a unit with native `invoke`. */
export function syncLambda<I, O>(
    fn: (input: I, options?: RunOptions) => O,
    info: LambdaInfo = {},
): Unit<I, O> {
    return createUnit<I, O>({ invoke: fn }, lambdaInfo(info));
}

/**
 * Async generator as a unit with native `stream`.
 *
 * ```typescript
 * const words = streamingLambda(async function* (text: string) {
 *     for (const word of text.split(' ')) yield word;
 * });
 * ```
 */
export function streamingLambda<I, O>(
    fn: (input: I, options?: RunOptions) => AsyncIterable<O>,
    info: LambdaInfo = {},
): Unit<I, O> {
    return createUnit<I, O>({ stream: fn }, lambdaInfo(info));
}
