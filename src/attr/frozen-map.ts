// src/attr/frozen-map.ts

/**
 * A `Map` that rejects writes once constructed. Used for converted dict
 * values and select branches.
 */
export class FrozenMap<K, V> extends Map<K, V> {
    private sealed = false;

    constructor(entries?: Iterable<readonly [K, V]> | null) {
        super(entries);
        this.sealed = true;
    }

    override set(key: K, value: V): this {
        // Map's constructor calls set() before sealed is assigned.
        if (this.sealed) throw frozen();
        return super.set(key, value);
    }

    override delete(key: K): boolean {
        if (this.sealed) throw frozen();
        return super.delete(key);
    }

    override clear(): void {
        if (this.sealed) throw frozen();
        super.clear();
    }
}

function frozen(): TypeError {
    return new TypeError('Cannot modify a frozen map');
}
