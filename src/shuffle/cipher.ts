/**
 * Shuffle Cipher
 *
 * Keyed bijection over [0, 2^bitSize). The value is split into a low half x
 * and a high half y; every round adds a table entry to x (indexed by y), then
 * adds a table entry to y (indexed by the new x). Addition mod 2^halfSize is
 * exactly invertible, so decode subtracts the same entries in reverse order.
 *
 * Not a vetted cipher: use it to hide ordering of identifiers, not to protect data.
 */

import { ConfigurationError, DomainError } from './errors.js';
import { generateSchedule, scheduleGeometry } from './schedule.js';
import { DEFAULT_ROUNDS } from './types.js';
import type { CipherOptions, RoundTable, Seed, ShuffleLogger } from './types.js';

function isTableLike(value: unknown): value is readonly number[] {
    return Array.isArray(value);
}

export class ShuffleCipher {
    readonly bitSize: number;
    readonly halfSize: number;
    readonly maxShuffle: number;
    readonly domainSize: number;
    readonly roundTables: readonly RoundTable[];

    private readonly mask: number;
    private readonly logger: ShuffleLogger | null;

    static fromSeed(
        bitSize: number,
        seed: Seed,
        rounds: number = DEFAULT_ROUNDS,
        options: CipherOptions = {}
    ): ShuffleCipher {
        return new ShuffleCipher(bitSize, generateSchedule(bitSize, seed, rounds), options);
    }

    constructor(bitSize: number, roundTables: readonly (readonly number[])[], options: CipherOptions = {}) {
        const defaults: Required<CipherOptions> = {
            logger: null,
        };
        this.logger = { ...defaults, ...options }.logger;

        const geometry = scheduleGeometry(bitSize);
        this.bitSize = geometry.bitSize;
        this.halfSize = geometry.halfSize;
        this.maxShuffle = geometry.maxShuffle;
        this.domainSize = geometry.domainSize;
        this.mask = geometry.maxShuffle - 1;

        if (roundTables.length === 0) {
            this.fail('at least one round table is required');
        }

        const tables: RoundTable[] = [];
        roundTables.forEach((table, round) => {
            // reachable from untyped callers
            if (!isTableLike(table)) {
                this.fail(`round ${round} is not a list`);
            }
            if (table.length !== geometry.tableLength) {
                this.fail(`round ${round} has ${table.length} entries, expected ${geometry.tableLength}`);
            }
            for (let pos = 0; pos < table.length; pos++) {
                const entry = table[pos];
                if (!Number.isInteger(entry) || entry < 0 || entry >= geometry.maxShuffle) {
                    this.fail(`round ${round} entry ${pos} is ${entry}, expected an integer in [0, ${geometry.maxShuffle})`);
                }
            }
            tables.push(Object.freeze([...table]));
        });
        this.roundTables = Object.freeze(tables);

        this.logger?.info?.(`ShuffleCipher: ${tables.length} round(s) over ${bitSize}-bit domain`);
    }

    get rounds(): number {
        return this.roundTables.length;
    }

    encode(value: number): number {
        this.checkDomain(value, 'encode');
        const { halfSize, mask } = this;

        let x = value & mask;
        let y = (value >>> halfSize) & mask;

        // & mask is mod maxShuffle (a power of two)
        for (const table of this.roundTables) {
            x = (x + table[y]) & mask;
            y = (y + table[x + halfSize]) & mask;
        }

        return ((y << halfSize) | x) >>> 0;
    }

    decode(value: number): number {
        this.checkDomain(value, 'decode');
        const { halfSize, mask } = this;

        let x = value & mask;
        let y = (value >>> halfSize) & mask;

        for (let round = this.roundTables.length - 1; round >= 0; round--) {
            const table = this.roundTables[round];
            y = (y - table[x + halfSize]) & mask;
            x = (x - table[y]) & mask;
        }

        return ((y << halfSize) | x) >>> 0;
    }

    private checkDomain(value: number, op: 'encode' | 'decode'): void {
        if (!Number.isInteger(value) || value < 0 || value >= this.domainSize) {
            throw new DomainError(`ShuffleCipher.${op}: ${value} is outside [0, ${this.domainSize})`);
        }
    }

    private fail(detail: string): never {
        const message = `ShuffleCipher: ${detail}`;
        this.logger?.error?.(message);
        throw new ConfigurationError(message);
    }
}
