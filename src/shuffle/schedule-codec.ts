/**
 * Persisted form of a round schedule: a JSON list of rounds, each a list of
 * table entries in generation order. Lengths and ranges are checked by the
 * cipher constructor on import.
 */

import { ShuffleCipher } from './cipher.js';
import { ConfigurationError } from './errors.js';
import type { CipherOptions } from './types.js';

export function exportSchedule(cipher: ShuffleCipher): string {
    return JSON.stringify(cipher.roundTables);
}

export function parseSchedule(text: string): number[][] {
    let raw: unknown;
    try {
        raw = JSON.parse(text);
    } catch (err) {
        throw new ConfigurationError(
            `ScheduleCodec: schedule is not valid JSON: ${err instanceof Error ? err.message : String(err)}`,
            err
        );
    }

    if (!Array.isArray(raw)) {
        throw new ConfigurationError('ScheduleCodec: schedule must be a list of round tables');
    }

    return raw.map((table: unknown, round: number) => {
        if (!Array.isArray(table)) {
            throw new ConfigurationError(`ScheduleCodec: round ${round} is not a list`);
        }
        return table.map((entry: unknown, pos: number) => {
            if (typeof entry !== 'number' || !Number.isInteger(entry)) {
                throw new ConfigurationError(`ScheduleCodec: round ${round} entry ${pos} is not an integer`);
            }
            return entry;
        });
    });
}

export function importSchedule(bitSize: number, text: string, options: CipherOptions = {}): ShuffleCipher {
    return new ShuffleCipher(bitSize, parseSchedule(text), options);
}
