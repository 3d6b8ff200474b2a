/**
 * id-shuffle Public API
 *
 * @module id-shuffle
 */

import { ShuffleCipher } from './shuffle/cipher.js';
import { exportSchedule, importSchedule } from './shuffle/schedule-codec.js';
import { DEFAULT_ROUNDS } from './shuffle/types.js';
import type { CipherOptions, Seed } from './shuffle/types.js';

export { ShuffleCipher } from './shuffle/cipher.js';
export { ShuffleError, ConfigurationError, DomainError } from './shuffle/errors.js';
export { generateSchedule, scheduleGeometry } from './shuffle/schedule.js';
export { exportSchedule, importSchedule, parseSchedule } from './shuffle/schedule-codec.js';
export { MersenneTwister } from './shuffle/mt19937.js';
export { DEFAULT_ROUNDS, MIN_BIT_SIZE, MAX_BIT_SIZE } from './shuffle/types.js';
export type {
    CipherOptions,
    RoundTable,
    ScheduleGeometry,
    Seed,
    ShuffleLogger as Logger,
} from './shuffle/types.js';

export const ShuffleID = {
    /**
     * Builds a cipher whose round tables are derived from a secret seed.
     */
    fromSeed: (bitSize: number, seed: Seed, rounds: number = DEFAULT_ROUNDS, options?: CipherOptions): ShuffleCipher =>
        ShuffleCipher.fromSeed(bitSize, seed, rounds, options),

    /**
     * Builds a cipher from explicit round tables (e.g. loaded from storage).
     */
    fromTables: (bitSize: number, roundTables: readonly (readonly number[])[], options?: CipherOptions): ShuffleCipher =>
        new ShuffleCipher(bitSize, roundTables, options),

    exportSchedule,
    importSchedule,

    Cipher: ShuffleCipher,
};

export default ShuffleID;
