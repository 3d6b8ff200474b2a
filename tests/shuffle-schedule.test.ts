import { generateSchedule, scheduleGeometry, validateRounds } from '../src/shuffle/schedule.js';
import { MersenneTwister } from '../src/shuffle/mt19937.js';
import { ConfigurationError } from '../src/shuffle/errors.js';
import { DEFAULT_ROUNDS } from '../src/shuffle/types.js';

describe('Key schedule', () => {
    describe('scheduleGeometry', () => {
        it('should derive half width, table bound and table length', () => {
            expect(scheduleGeometry(8)).toEqual({
                bitSize: 8,
                halfSize: 4,
                maxShuffle: 16,
                tableLength: 32,
                domainSize: 256,
            });
            expect(scheduleGeometry(2)).toEqual({
                bitSize: 2,
                halfSize: 1,
                maxShuffle: 2,
                tableLength: 4,
                domainSize: 4,
            });
            expect(scheduleGeometry(32).domainSize).toBe(2 ** 32);
        });

        it('should reject odd widths', () => {
            expect(() => scheduleGeometry(7)).toThrow(ConfigurationError);
            expect(() => scheduleGeometry(7)).toThrow('KeySchedule: bitSize must be even, got 7');
        });

        it('should reject widths outside [2, 32]', () => {
            for (const bad of [0, -2, 1, 34, 64, 2.5, Number.NaN]) {
                expect(() => scheduleGeometry(bad)).toThrow(ConfigurationError);
            }
            expect(() => scheduleGeometry(0)).toThrow('KeySchedule: bitSize must be an integer in [2, 32], got 0');
        });
    });

    describe('validateRounds', () => {
        it('should accept positive integers and reject the rest', () => {
            expect(() => validateRounds(1)).not.toThrow();
            expect(() => validateRounds(0)).toThrow('KeySchedule: rounds must be an integer >= 1, got 0');
            expect(() => validateRounds(-3)).toThrow(ConfigurationError);
            expect(() => validateRounds(1.5)).toThrow(ConfigurationError);
        });
    });

    describe('generateSchedule', () => {
        it('should default to five rounds', () => {
            expect(DEFAULT_ROUNDS).toBe(5);
            expect(generateSchedule(8, 42)).toHaveLength(5);
        });

        it('should produce tables of 2 * maxShuffle entries within [0, maxShuffle)', () => {
            for (const bitSize of [2, 4, 8, 16]) {
                const { maxShuffle, tableLength } = scheduleGeometry(bitSize);
                const tables = generateSchedule(bitSize, 1234, 3);
                expect(tables).toHaveLength(3);
                for (const table of tables) {
                    expect(table).toHaveLength(tableLength);
                    for (const entry of table) {
                        expect(Number.isInteger(entry)).toBe(true);
                        expect(entry).toBeGreaterThanOrEqual(0);
                        expect(entry).toBeLessThan(maxShuffle);
                    }
                }
            }
        });

        it('should consume one generator output per entry, rounds outer and positions inner', () => {
            const tables = generateSchedule(8, 42, 2);
            const rng = new MersenneTwister(42);
            const expected = Array.from({ length: 2 }, () =>
                Array.from({ length: 32 }, () => rng.nextUint32() >>> 28)
            );
            expect(tables).toEqual(expected);
        });

        it('should be deterministic for identical inputs', () => {
            expect(generateSchedule(16, 987654321, 4)).toEqual(generateSchedule(16, 987654321, 4));
            expect(generateSchedule(8, 42n, 5)).toEqual(generateSchedule(8, 42, 5));
        });

        it('should extend, not reshuffle, when more rounds are requested', () => {
            const three = generateSchedule(8, 7, 3);
            const five = generateSchedule(8, 7, 5);
            expect(five.slice(0, 3)).toEqual(three);
        });

        it('should differ between seeds', () => {
            expect(generateSchedule(8, 1, 1)).not.toEqual(generateSchedule(8, 2, 1));
        });

        it('should fail with ConfigurationError on bad input', () => {
            expect(() => generateSchedule(9, 1)).toThrow(ConfigurationError);
            expect(() => generateSchedule(0, 1)).toThrow(ConfigurationError);
            expect(() => generateSchedule(8, 1, 0)).toThrow(ConfigurationError);
            expect(() => generateSchedule(8, 0.5)).toThrow(ConfigurationError);
        });
    });
});
