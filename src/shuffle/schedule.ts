import { ConfigurationError } from './errors.js';
import { MersenneTwister } from './mt19937.js';
import { DEFAULT_ROUNDS, MAX_BIT_SIZE, MIN_BIT_SIZE } from './types.js';
import type { RoundTable, ScheduleGeometry, Seed } from './types.js';

/**
 * Validates a bit width and derives the table geometry for it.
 * Odd widths are rejected: the (x, y) split would leave part of the domain uncovered.
 */
export function scheduleGeometry(bitSize: number): ScheduleGeometry {
    if (!Number.isInteger(bitSize) || bitSize < MIN_BIT_SIZE || bitSize > MAX_BIT_SIZE) {
        throw new ConfigurationError(
            `KeySchedule: bitSize must be an integer in [${MIN_BIT_SIZE}, ${MAX_BIT_SIZE}], got ${bitSize}`
        );
    }
    if (bitSize % 2 !== 0) {
        throw new ConfigurationError(`KeySchedule: bitSize must be even, got ${bitSize}`);
    }

    const halfSize = bitSize / 2;
    const maxShuffle = 2 ** halfSize;
    return {
        bitSize,
        halfSize,
        maxShuffle,
        tableLength: 2 * maxShuffle,
        domainSize: 2 ** bitSize,
    };
}

export function validateRounds(rounds: number): void {
    if (!Number.isInteger(rounds) || rounds < 1) {
        throw new ConfigurationError(`KeySchedule: rounds must be an integer >= 1, got ${rounds}`);
    }
}

/**
 * Derives the round tables for a seed.
 *
 * Draw order is fixed: rounds outer, table positions inner, one MT19937 output
 * per entry (its top `halfSize` bits). Same inputs, same tables.
 */
export function generateSchedule(bitSize: number, seed: Seed, rounds: number = DEFAULT_ROUNDS): RoundTable[] {
    const { halfSize, tableLength } = scheduleGeometry(bitSize);
    validateRounds(rounds);

    const rng = new MersenneTwister(seed);
    const tables: RoundTable[] = [];
    for (let round = 0; round < rounds; round++) {
        const table = new Array<number>(tableLength);
        for (let pos = 0; pos < tableLength; pos++) {
            table[pos] = rng.getBits(halfSize);
        }
        tables.push(table);
    }
    return tables;
}
