// src/chain.ts

import { Block } from './block';
import { EmptyChainError, LedgerError } from './errors';
import { sha3_256 } from './hash';
import type { HashFunction } from './hash';
import { Miner } from './miner';
import type { GenesisRecord } from './transaction';

export const GENESIS_PREVIOUS_HASH = '0';
export const GENESIS_MESSAGE = 'Genesis Block';

export interface ChainOptions {
    difficulty: number;
    miner?: Miner;
    hashFunction?: HashFunction;
    now?: () => number;
}

/**
 * Append-only list of blocks. Index and link of appended blocks are the
 * caller's responsibility; the validator catches mistakes.
 */
export class Chain {
    readonly difficulty: number;

    private readonly chain: Block[] = [];
    private readonly miner: Miner;
    private readonly hashFunction: HashFunction;
    private readonly now: () => number;

    constructor({ difficulty, miner = new Miner(), hashFunction = sha3_256, now = Date.now }: ChainOptions) {
        this.difficulty = difficulty;
        this.miner = miner;
        this.hashFunction = hashFunction;
        this.now = now;
    }

    appendGenesis(): Block {
        if (this.chain.length > 0) {
            throw new LedgerError('Genesis block already exists');
        }
        const marker: GenesisRecord = { type: 'genesis', message: GENESIS_MESSAGE };
        const genesisBlock = new Block(0, [marker], GENESIS_PREVIOUS_HASH, this.now(), this.hashFunction);
        this.miner.mine(genesisBlock, this.difficulty);
        this.chain.push(genesisBlock);
        return genesisBlock;
    }

    latest(): Block {
        const last = this.chain[this.chain.length - 1];
        if (last === undefined) {
            throw new EmptyChainError();
        }
        return last;
    }

    append(block: Block): void {
        this.chain.push(block);
    }

    at(index: number): Block | undefined {
        return this.chain[index];
    }

    get length(): number {
        return this.chain.length;
    }

    get blocks(): readonly Block[] {
        return this.chain;
    }
}
