/**
 * Deterministic RNG for round table generation.
 * Implementation: MT19937 (32-bit Mersenne Twister), seeded with init_by_array.
 *
 * Integer seeds are split into little-endian 32-bit words of |seed| and fed to
 * init_by_array. Together with the draw order in schedule.ts this fixes the
 * tables a seed produces.
 */

import { ConfigurationError } from './errors.js';
import type { Seed } from './types.js';

const N = 624;
const M = 397;
const MATRIX_A = 0x9908b0df;
const UPPER_MASK = 0x80000000;
const LOWER_MASK = 0x7fffffff;

/**
 * Splits |seed| into 32-bit words, least significant first.
 * Zero yields a single zero word.
 */
export function seedToKey(seed: Seed): number[] {
    if (typeof seed === 'number' && !Number.isSafeInteger(seed)) {
        throw new ConfigurationError(`MersenneTwister: seed must be a safe integer or bigint, got ${seed}`);
    }
    let rest = BigInt(seed);
    if (rest < 0n) rest = -rest;

    const key: number[] = [];
    do {
        key.push(Number(rest & 0xffffffffn));
        rest >>= 32n;
    } while (rest > 0n);
    return key;
}

export class MersenneTwister {
    private readonly mt = new Uint32Array(N);
    private index = N + 1;

    constructor(seed: Seed) {
        this.initByArray(seedToKey(seed));
    }

    private initGenrand(s: number): void {
        this.mt[0] = s >>> 0;
        for (let i = 1; i < N; i++) {
            const prev = this.mt[i - 1] ^ (this.mt[i - 1] >>> 30);
            this.mt[i] = (Math.imul(1812433253, prev) + i) >>> 0;
        }
        this.index = N;
    }

    private initByArray(key: readonly number[]): void {
        this.initGenrand(19650218);
        let i = 1;
        let j = 0;

        for (let k = Math.max(N, key.length); k > 0; k--) {
            const prev = this.mt[i - 1] ^ (this.mt[i - 1] >>> 30);
            this.mt[i] = ((this.mt[i] ^ Math.imul(prev, 1664525)) + key[j] + j) >>> 0;
            i++;
            j++;
            if (i >= N) {
                this.mt[0] = this.mt[N - 1];
                i = 1;
            }
            if (j >= key.length) j = 0;
        }

        for (let k = N - 1; k > 0; k--) {
            const prev = this.mt[i - 1] ^ (this.mt[i - 1] >>> 30);
            this.mt[i] = ((this.mt[i] ^ Math.imul(prev, 1566083941)) - i) >>> 0;
            i++;
            if (i >= N) {
                this.mt[0] = this.mt[N - 1];
                i = 1;
            }
        }

        // MSB set: non-zero initial state
        this.mt[0] = UPPER_MASK;
        this.index = N;
    }

    private twist(): void {
        for (let kk = 0; kk < N; kk++) {
            const y = (this.mt[kk] & UPPER_MASK) | (this.mt[(kk + 1) % N] & LOWER_MASK);
            this.mt[kk] = this.mt[(kk + M) % N] ^ (y >>> 1) ^ (y & 1 ? MATRIX_A : 0);
        }
        this.index = 0;
    }

    /**
     * Returns the next tempered output in [0, 2^32).
     */
    nextUint32(): number {
        if (this.index >= N) this.twist();

        let y = this.mt[this.index++];
        y ^= y >>> 11;
        y ^= (y << 7) & 0x9d2c5680;
        y ^= (y << 15) & 0xefc60000;
        y ^= y >>> 18;
        return y >>> 0;
    }

    /**
     * Returns a uniform integer in [0, 2^k) from the top k bits of one output.
     */
    getBits(k: number): number {
        if (!Number.isInteger(k) || k < 1 || k > 32) {
            throw new RangeError(`MersenneTwister: bit count must be an integer in [1, 32], got ${k}`);
        }
        return this.nextUint32() >>> (32 - k);
    }
}
