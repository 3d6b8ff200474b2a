export type ShuffleLogger = {
    info?: (msg: string) => void;
    error?: (msg: string) => void;
};

/** Secret key. Numbers must be safe integers; larger keys go through bigint. */
export type Seed = number | bigint;

/** One round's keying material: `2 * maxShuffle` entries in [0, maxShuffle). */
export type RoundTable = readonly number[];

export const DEFAULT_ROUNDS = 5;
export const MIN_BIT_SIZE = 2;
/** Values are handled with 32-bit bitwise operators. */
export const MAX_BIT_SIZE = 32;

export type CipherOptions = {
    /** Optional logger hook to surface construction messages without console.* in src/. */
    logger?: ShuffleLogger | null;
};

export interface ScheduleGeometry {
    bitSize: number;
    /** Width of each half (x low, y high). */
    halfSize: number;
    /** 2^halfSize */
    maxShuffle: number;
    /** Entries per round table (2 * maxShuffle). */
    tableLength: number;
    /** 2^bitSize */
    domainSize: number;
}
