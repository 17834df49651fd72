// src/errors.ts

/**
 * Ledger Errors
 *
 * Validation of the chain never throws; these cover rejected input and broken
 * internal invariants.
 */

export class LedgerError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'LedgerError';
    }
}

export class MalformedTransactionError extends LedgerError {
    readonly fields: string[];

    constructor(fields: string[]) {
        super(
            fields.length > 0
                ? `Transaction is missing or has invalid fields: ${fields.join(', ')}`
                : 'Transaction must be an object'
        );
        this.name = 'MalformedTransactionError';
        this.fields = fields;
    }
}

/** Raised only when genesis construction was skipped. */
export class EmptyChainError extends LedgerError {
    constructor() {
        super('Chain has no blocks');
        this.name = 'EmptyChainError';
    }
}

export class MiningInProgressError extends LedgerError {
    constructor() {
        super('A block is already being mined on this ledger');
        this.name = 'MiningInProgressError';
    }
}

export class MiningAbortedError extends LedgerError {
    constructor(index: number, nonce: number) {
        super(`Mining of block #${index} aborted at nonce ${nonce}`);
        this.name = 'MiningAbortedError';
    }
}

/** A value with no canonical JSON form: non-finite number, bigint, function or non-plain object. */
export class UnhashableValueError extends LedgerError {
    readonly path: (string | number)[];

    constructor(path: (string | number)[], description: string) {
        super(`Cannot hash ${description} at ${path.length > 0 ? path.join('.') : '<root>'}`);
        this.name = 'UnhashableValueError';
        this.path = path;
    }
}

export class ConfigError extends LedgerError {
    constructor(message: string) {
        super(message);
        this.name = 'ConfigError';
    }
}
