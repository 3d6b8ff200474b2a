export class ShuffleError extends Error {
    constructor(message: string, public originalError?: unknown) {
        super(message);
        this.name = 'ShuffleError';
    }
}

/**
 * Rejected construction input: bit width, round count, seed, or explicit
 * round tables that do not fit the cipher geometry.
 */
export class ConfigurationError extends ShuffleError {
    constructor(message: string, originalError?: unknown) {
        super(message, originalError);
        this.name = 'ConfigurationError';
    }
}

/** Value passed to encode/decode lies outside [0, 2^bitSize). */
export class DomainError extends ShuffleError {
    constructor(message: string) {
        super(message);
        this.name = 'DomainError';
    }
}
