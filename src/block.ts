// src/block.ts

import { canonicalize, sha3_256 } from './hash';
import type { HashFunction } from './hash';
import type { LedgerEntry } from './transaction';

export interface BlockData {
    index: number;
    timestamp: number;
    transactions: LedgerEntry[];
    previousHash: string;
    nonce: number;
    hash: string;
}

export type HashedFields = Omit<BlockData, 'hash'>;

export function computeBlockHash(fields: HashedFields, hashFunction: HashFunction = sha3_256): string {
    return hashFunction(canonicalize({
        index: fields.index,
        timestamp: fields.timestamp,
        transactions: fields.transactions,
        previousHash: fields.previousHash,
        nonce: fields.nonce
    }));
}

export class Block implements BlockData {
    index: number;
    timestamp: number;
    transactions: LedgerEntry[];
    previousHash: string;
    nonce: number;
    hash: string;

    private readonly hashFunction: HashFunction;

    constructor(
        index: number,
        transactions: LedgerEntry[],
        previousHash: string,
        timestamp: number = Date.now(),
        hashFunction: HashFunction = sha3_256
    ) {
        this.index = index;
        this.timestamp = timestamp;
        this.transactions = transactions;
        this.previousHash = previousHash;
        this.nonce = 0;
        this.hashFunction = hashFunction;
        this.hash = this.computeHash();
    }

    computeHash(): string {
        return computeBlockHash(this, this.hashFunction);
    }

    toDict(): BlockData {
        return {
            index: this.index,
            timestamp: this.timestamp,
            transactions: structuredClone(this.transactions),
            previousHash: this.previousHash,
            nonce: this.nonce,
            hash: this.hash
        };
    }
}
