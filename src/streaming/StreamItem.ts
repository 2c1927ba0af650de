/**
 * StreamItem — The Unit of Data Flowing Through a Channel
 *
 * Errors travel in-band as items so that a consumer sees them at the
 * exact position the producer emitted them, and can keep reading
 * afterwards. End-of-stream is an item too, delivered exactly once.
 *
 * @module
 */
import { SourceExhaustedError } from '../core/errors.js';

// ── Discriminated Union ──────────────────────────────────

export interface ValueItem<T> {
    readonly kind: 'value';
    readonly value: T;
}

export interface ErrorItem {
    readonly kind: 'error';
    readonly error: unknown;
}

export interface EndItem {
    readonly kind: 'end';
}

/**
 * One item read from a stream: a value, an in-band error, or end-of-stream.
 *
 * ```typescript
 * switch (item.kind) {
 *     case 'value': use(item.value); break;
 *     case 'error': report(item.error); break;
 *     case 'end':   return;
 * }
 * ```
 */
export type StreamItem<T> = ValueItem<T> | ErrorItem | EndItem;

// ── Constructors ─────────────────────────────────────────

export function valueItem<T>(value: T): ValueItem<T> {
    return { kind: 'value', value };
}

export function errorItem(error: unknown): ErrorItem {
    return { kind: 'error', error };
}

/** Shared end-of-stream item (immutable). */
export const END_ITEM: EndItem = Object.freeze({ kind: 'end' });

// ── Guards ───────────────────────────────────────────────

/**
 * True for the in-band marker `mergeNamed()` emits when a source drains.
 */
export function isSourceExhausted<T>(
    item: StreamItem<T>,
): item is ErrorItem & { readonly error: SourceExhaustedError } {
    return item.kind === 'error' && item.error instanceof SourceExhaustedError;
}
