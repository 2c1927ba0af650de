/**
 * MapState — immutable key/value graph state for quick prototyping.
 *
 * Every update returns a new instance; the receiver never changes, so a
 * `MapState` is safe to hand to parallel branches as-is.
 *
 * ```typescript
 * const graph = new StateGraph<MapState<number>>()
 *     .addNode('count', (s) => s.set('count', (s.get('count') ?? 0) + 1));
 * ```
 *
 * @module
 */
type MapStateData<V> = Readonly<Record<string, V>> | ReadonlyMap<string, V>;

function isMap<V>(data: MapStateData<V>): data is ReadonlyMap<string, V> {
    return data instanceof Map;
}

export class MapState<V = unknown> {
    private readonly _data: ReadonlyMap<string, V>;

    constructor(data: MapStateData<V> = {}) {
        this._data = isMap(data) ? new Map(data) : new Map(Object.entries(data));
    }

    get size(): number {
        return this._data.size;
    }

    get(key: string): V | undefined {
        return this._data.get(key);
    }

    has(key: string): boolean {
        return this._data.has(key);
    }

    keys(): string[] {
        return [...this._data.keys()];
    }

    set(key: string, value: V): MapState<V> {
        const next = new Map(this._data);
        next.set(key, value);
        return new MapState(next);
    }

    setAll(updates: Readonly<Record<string, V>>): MapState<V> {
        const next = new Map(this._data);
        for (const [key, value] of Object.entries(updates)) next.set(key, value);
        return new MapState(next);
    }

    remove(key: string): MapState<V> {
        if (!this._data.has(key)) return this;
        const next = new Map(this._data);
        next.delete(key);
        return new MapState(next);
    }

    toObject(): Record<string, V> {
        return Object.fromEntries(this._data);
    }

    /** Same keys, with values compared by `===`. */
    equals(other: MapState<V>): boolean {
        if (other === this) return true;
        if (other.size !== this.size) return false;
        for (const [key, value] of this._data) {
            if (!other.has(key) || other.get(key) !== value) return false;
        }
        return true;
    }

    toString(): string {
        return `MapState(${JSON.stringify(this.toObject())})`;
    }
}
