/**
 * A small seeded pseudo-random number generator (mulberry32).
 *
 * Every engine owns exactly one of these. Two generators built from the same
 * seed produce the same stream on every platform.
 */
export class SeededRandom {
    private _state: number;

    constructor(seed: number) {
        this._state = seed | 0;
    }

    /**
     * Returns a float in [0, 1).
     */
    public next(): number {
        this._state = (this._state + 0x6d2b79f5) | 0;
        let t = Math.imul(this._state ^ (this._state >>> 15), 1 | this._state);
        t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
        return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
    }

    /**
     * Returns an integer in [0, max).
     */
    public int(max: number): number {
        return Math.floor(this.next() * max);
    }

    public pick<T>(lst: readonly T[]): T {
        if (lst.length === 0) {
            throw new Error("Cannot pick from an empty list.");
        }
        return lst[this.int(lst.length)];
    }

    public get state(): number {
        return this._state;
    }
}

// murmur3 finalizer; a bijection on 32-bit integers
export const mix32 = (n: number): number => {
    let h = n >>> 0;
    h ^= h >>> 16;
    h = Math.imul(h, 0x85ebca6b);
    h ^= h >>> 13;
    h = Math.imul(h, 0xc2b2ae35);
    h ^= h >>> 16;
    return h >>> 0;
}

/**
 * Derives a child seed from a base seed, a context value (usually the turn
 * number) and a slot number.
 *
 * For a fixed base and context the mapping from slot to seed is a bijection,
 * so distinct slots never share a seed.
 */
export const deriveSeed = (base: number, context: number, slot: number): number => {
    const prefix = mix32(mix32(base) ^ Math.imul(context + 1, 0x9e3779b1));
    return mix32(prefix ^ (slot >>> 0));
}

export const randomSeed = (): number => {
    return Math.floor(Math.random() * 0x7fffffff);
}
