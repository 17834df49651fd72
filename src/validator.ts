// src/validator.ts

import { computeBlockHash } from './block';
import type { BlockData } from './block';
import { sha3_256 } from './hash';
import type { HashFunction } from './hash';
import { UnhashableValueError } from './errors';
import { meetsDifficulty } from './miner';

// A stored value that can no longer be hashed was edited after mining.
function hashMatches(block: BlockData, hashFunction: HashFunction): boolean {
    try {
        return block.hash === computeBlockHash(block, hashFunction);
    } catch (error) {
        if (error instanceof UnhashableValueError) return false;
        throw error;
    }
}

export type InvalidBlockReason = 'hash-mismatch' | 'broken-link' | 'insufficient-work';

export type ValidationResult =
    | { valid: true }
    | { valid: false; index: number; reason: InvalidBlockReason };

/**
 * Walks blocks 1..n-1 and reports the first one whose stored hash differs from
 * its recomputed hash, whose previousHash does not match its predecessor, or
 * whose hash misses the difficulty prefix. The genesis block is trusted.
 */
export function validateChain(
    chain: readonly BlockData[],
    difficulty: number,
    hashFunction: HashFunction = sha3_256
): ValidationResult {
    for (let i = 1; i < chain.length; i++) {
        const currentBlock = chain[i];
        const previousBlock = chain[i - 1];
        if (!hashMatches(currentBlock, hashFunction)) {
            return { valid: false, index: i, reason: 'hash-mismatch' };
        }
        if (currentBlock.previousHash !== previousBlock.hash) {
            return { valid: false, index: i, reason: 'broken-link' };
        }
        if (!meetsDifficulty(currentBlock.hash, difficulty)) {
            return { valid: false, index: i, reason: 'insufficient-work' };
        }
    }
    return { valid: true };
}

export function isValidChain(
    chain: readonly BlockData[],
    difficulty: number,
    hashFunction: HashFunction = sha3_256
): boolean {
    return validateChain(chain, difficulty, hashFunction).valid;
}
