/**
 * Injectable pseudo-random source. Simulation code never reads ambient
 * randomness (Math.random, crypto); callers pass a seeded instance so runs
 * are reproducible.
 */
export interface RandomSource {
    /** Uniform integer in [0, 2^32). */
    nextU32(): number;
    /** Uniform float in [0, 1). */
    nextFloat(): number;
}

/**
 * mulberry32: small, fast, not cryptographic.
 */
export class SeededRandom implements RandomSource {
    private state: number;

    constructor(seed: number) {
        this.state = seed >>> 0;
    }

    nextU32(): number {
        this.state = (this.state + 0x6d2b79f5) >>> 0;
        let x = this.state;
        x = Math.imul(x ^ (x >>> 15), x | 1);
        x ^= x + Math.imul(x ^ (x >>> 7), x | 61);
        return (x ^ (x >>> 14)) >>> 0;
    }

    nextFloat(): number {
        return this.nextU32() / 4294967296;
    }
}

export function randomU32Array(random: RandomSource, length: number): Uint32Array {
    const out = new Uint32Array(length);
    for (let i = 0; i < length; i++) {
        out[i] = random.nextU32();
    }
    return out;
}

export function randomFloatArray(random: RandomSource, length: number): Float32Array {
    const out = new Float32Array(length);
    for (let i = 0; i < length; i++) {
        out[i] = random.nextFloat();
    }
    return out;
}
