/**
 * RunInfo — Identity of a Running Unit
 *
 * Three levels of identification, read by every observer handler:
 * - `name`: caller-chosen instance name (`'summarizer'`, `'retrieve_docs'`)
 * - `type`: concrete implementation tag (`'Lambda'`, `'StateGraph'`)
 * - `category`: abstract component category, for per-category handling
 *
 * @module
 */
import { z } from 'zod';
import { parseOptions } from '../core/options.js';

// ── Categories ───────────────────────────────────────────

export const COMPONENT_CATEGORIES = [
    'model',
    'tool',
    'chain',
    'retriever',
    'embedder',
    'prompt',
    'runnable',
    'agent',
    'graph',
    'node',
    'custom',
] as const;

export type ComponentCategory = typeof COMPONENT_CATEGORIES[number];

// ── Shape ────────────────────────────────────────────────

export const RunInfoSchema = z.object({
    name: z.string().min(1),
    type: z.string().min(1).optional(),
    category: z.enum(COMPONENT_CATEGORIES).default('custom'),
    metadata: z.record(z.unknown()).optional(),
}).strict();

export type RunInfoInput = z.input<typeof RunInfoSchema>;

/**
 * Immutable identity of one unit.
 */
export interface RunInfo {
    readonly name: string;
    readonly type: string;
    readonly category: ComponentCategory;
    readonly metadata?: Readonly<Record<string, unknown>>;
}

// ── Factories ────────────────────────────────────────────

/**
 * Build a frozen {@link RunInfo}. `type` defaults to `name`,
 * `category` to `'custom'`.
 *
 * @throws {InvalidOptionsError} on an empty name or unknown category
 *
 * @example
 * ```typescript
 * const info = createRunInfo({ name: 'summarizer', type: 'LLMChain', category: 'chain' });
 * ```
 */
export function createRunInfo(input: RunInfoInput): RunInfo {
    const parsed = parseOptions(RunInfoSchema, input, 'run info');
    return Object.freeze({
        name: parsed.name,
        type: parsed.type ?? parsed.name,
        category: parsed.category,
        ...(parsed.metadata !== undefined ? { metadata: Object.freeze({ ...parsed.metadata }) } : {}),
    });
}
