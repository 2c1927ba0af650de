/**
 * Options — Zod Schemas for Runtime Configuration
 *
 * Every tunable of the library is a plain options object with defaults.
 * The schemas below validate caller input at the boundary (channel
 * creation, graph construction, batch calls) so that a bad capacity or
 * ceiling fails fast with an {@link InvalidOptionsError} instead of
 * misbehaving at run time.
 *
 * @module
 */
import { z, type ZodType, type ZodTypeDef } from 'zod';
import { InvalidOptionsError } from './errors.js';
import { type Result, succeed, fail, unwrap } from './result.js';

// ── Defaults ─────────────────────────────────────────────

/** Default iteration ceiling for graph runs */
export const DEFAULT_MAX_ITERATIONS = 100;

/** Default channel capacity (synchronous handoff) */
export const DEFAULT_CHANNEL_CAPACITY = 0;

// ── Schemas ──────────────────────────────────────────────

const nonNegativeInt = z.number().int().nonnegative();
const positiveInt = z.number().int().positive();

/**
 * Channel options. `capacity: 0` is a synchronous handoff.
 */
export const ChannelOptionsSchema = z.object({
    capacity: nonNegativeInt.default(DEFAULT_CHANNEL_CAPACITY),
}).strict();

/**
 * Graph options.
 *
 * `maxParallelBranches` bounds how many parallel-edge targets run at once;
 * when omitted every target starts immediately.
 */
export const GraphOptionsSchema = z.object({
    name: z.string().min(1).default('StateGraph'),
    maxIterations: positiveInt.default(DEFAULT_MAX_ITERATIONS),
    maxParallelBranches: positiveInt.optional(),
}).strict();

/**
 * Options for `batchParallel()`.
 */
export const BatchOptionsSchema = z.object({
    maxConcurrency: positiveInt.optional(),
}).strict();

/** Number of broadcast copies requested from `copy()` */
export const CopyCountSchema = nonNegativeInt;

export type ChannelOptions = z.input<typeof ChannelOptionsSchema>;
export type ResolvedChannelOptions = z.output<typeof ChannelOptionsSchema>;
export type GraphOptionsInput = z.input<typeof GraphOptionsSchema>;
export type ResolvedGraphOptions = z.output<typeof GraphOptionsSchema>;
export type BatchOptions = z.input<typeof BatchOptionsSchema>;

// ── Parsing ──────────────────────────────────────────────

/**
 * Validate `input` against `schema` without throwing.
 *
 * @param label - Human-readable name used in the error message
 */
export function safeParseOptions<Out, In>(
    schema: ZodType<Out, ZodTypeDef, In>,
    input: unknown,
    label: string,
): Result<Out> {
    const parsed = schema.safeParse(input);
    if (parsed.success) return succeed(parsed.data);

    const issues = parsed.error.issues.map((issue) => {
        const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
        return `${path}: ${issue.message}`;
    });
    return fail(new InvalidOptionsError(label, issues));
}

/**
 * Validate `input` against `schema`, throwing {@link InvalidOptionsError}.
 */
export function parseOptions<Out, In>(
    schema: ZodType<Out, ZodTypeDef, In>,
    input: unknown,
    label: string,
): Out {
    return unwrap(safeParseOptions(schema, input, label));
}
