/**
 * ConcurrencyGuard — Semaphore for Concurrent Fan-Out
 *
 * Bounds how many tasks of one fan-out run at the same time
 * (`batchParallel({ maxConcurrency })`, graph parallel edges with
 * `maxParallelBranches`). Callers above the limit wait in FIFO order.
 *
 *   ┌─────────────────────────────────────────────┐
 *   │  task                                       │
 *   │    │  slot free? ──YES──► run, release()    │
 *   │    └──────────── NO ───► wait in queue      │
 *   │                           (FIFO, resumed on │
 *   │                            next release)    │
 *   └─────────────────────────────────────────────┘
 *
 * @module
 * @internal
 */

/** Pending waiter: resolved when a slot becomes available */
type PendingWaiter = () => void;

/**
 * A counting semaphore.
 *
 * Created per fan-out via {@link createConcurrencyGuard}.
 */
export class ConcurrencyGuard {
    private readonly _maxActive: number;
    private _active = 0;
    private readonly _pending: PendingWaiter[] = [];

    constructor(maxActive: number) {
        this._maxActive = Math.max(1, Math.floor(maxActive));
    }

    // ── Public API ───────────────────────────────────────

    /**
     * Acquire a slot. Resolves with an idempotent release function.
     */
    acquire(): Promise<() => void> {
        if (this._active < this._maxActive) {
            this._active++;
            return Promise.resolve(this._createRelease());
        }

        return new Promise<() => void>((resolve) => {
            this._pending.push(() => resolve(this._createRelease()));
        });
    }

    /**
     * Run `task` inside a slot, releasing it however the task settles.
     */
    async run<T>(task: () => Promise<T>): Promise<T> {
        const release = await this.acquire();
        try {
            return await task();
        } finally {
            release();
        }
    }

    /** Current number of in-flight tasks. */
    get active(): number {
        return this._active;
    }

    /** Current number of waiting tasks. */
    get queued(): number {
        return this._pending.length;
    }

    // ── Private ──────────────────────────────────────────

    private _createRelease(): () => void {
        let released = false;
        return () => {
            if (released) return;
            released = true;
            this._active--;
            this._drainNext();
        };
    }

    private _drainNext(): void {
        if (this._active >= this._maxActive) return;
        const next = this._pending.shift();
        if (next) {
            this._active++;
            next();
        }
    }
}

// ── Factory ──────────────────────────────────────────────

/**
 * Create a guard, or `undefined` when no limit is configured so the
 * unbounded path stays a plain `Promise.all`.
 *
 * @internal
 */
export function createConcurrencyGuard(maxActive?: number): ConcurrencyGuard | undefined {
    if (maxActive === undefined) return undefined;
    return new ConcurrencyGuard(maxActive);
}

/**
 * Map `items` through `task` concurrently, preserving index order in the
 * output. With a guard, at most `guard.maxActive` tasks run at once.
 *
 * @internal
 */
export async function mapConcurrent<T, R>(
    items: readonly T[],
    task: (item: T, index: number) => Promise<R>,
    guard: ConcurrencyGuard | undefined,
): Promise<R[]> {
    const results = new Array<R>(items.length);
    const runOne = (item: T, index: number): Promise<void> =>
        task(item, index).then((value) => {
            results[index] = value;
        });

    await Promise.all(items.map((item, i) => (guard ? guard.run(() => runOne(item, i)) : runOne(item, i))));
    return results;
}
