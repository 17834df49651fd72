// src/ledger.ts

import { EventEmitter } from 'events';
import { Mutex } from 'async-mutex';
import { Block } from './block';
import type { BlockData } from './block';
import { Chain } from './chain';
import { LedgerError, MiningInProgressError } from './errors';
import { sha3_256 } from './hash';
import type { HashFunction } from './hash';
import { logger as rootLogger } from './logger';
import type { Logger } from './logger';
import { Miner } from './miner';
import type { MineAsyncOptions } from './miner';
import { TransactionPool } from './pool';
import { isTransaction, parseTransaction, rewardTransaction } from './transaction';
import type { Transaction } from './transaction';
import { validateChain } from './validator';
import type { ValidationResult } from './validator';

export const DEFAULT_DIFFICULTY = 4;
export const DEFAULT_MINING_REWARD = 100;

export interface LedgerOptions {
    /** Leading hex zeros required of every block hash. */
    difficulty?: number;
    miningReward?: number;
    hashFunction?: HashFunction;
    /** Clock in milliseconds since the epoch. */
    now?: () => number;
    logger?: Logger;
}

export interface ChainInfo {
    length: number;
    difficulty: number;
    isValid: boolean;
    pendingCount: number;
    latest: {
        index: number;
        hash: string;
        timestamp: number;
    };
}

export class Ledger {
    readonly difficulty: number;
    readonly miningReward: number;
    /**
     * - transactionAdded (transaction)
     * - miningStarted (block): the pool has been snapshotted, the search is about to run
     * - blockMined (block): the block is on the chain and the pool holds the reward
     */
    readonly events = new EventEmitter();

    private readonly chain: Chain;
    private readonly pool = new TransactionPool();
    private readonly miner: Miner;
    private readonly mutex = new Mutex();
    private readonly hashFunction: HashFunction;
    private readonly now: () => number;
    private readonly logger: Logger;
    private mining = false;

    constructor(options: LedgerOptions = {}) {
        const difficulty = options.difficulty ?? DEFAULT_DIFFICULTY;
        const miningReward = options.miningReward ?? DEFAULT_MINING_REWARD;
        if (!Number.isInteger(difficulty) || difficulty < 0) {
            throw new LedgerError(`Difficulty must be a non-negative integer, got ${difficulty}`);
        }
        if (!Number.isFinite(miningReward)) {
            throw new LedgerError(`Mining reward must be a finite number, got ${miningReward}`);
        }

        this.difficulty = difficulty;
        this.miningReward = miningReward;
        this.hashFunction = options.hashFunction ?? sha3_256;
        this.now = options.now ?? Date.now;
        this.logger = options.logger ?? rootLogger.child({ module: 'ledger' });
        this.miner = new Miner(this.logger.child({ component: 'miner' }));
        this.chain = new Chain({
            difficulty,
            miner: this.miner,
            hashFunction: this.hashFunction,
            now: this.now,
        });

        const genesisBlock = this.chain.appendGenesis();
        this.logger.debug({ hash: genesisBlock.hash, difficulty }, 'Genesis block created');
    }

    get length(): number {
        return this.chain.length;
    }

    /** Read-only view of the chain; blocks are only ever added by mining. */
    get blocks(): readonly Block[] {
        return [...this.chain.blocks];
    }

    latest(): Block {
        return this.chain.latest();
    }

    /** Throws MalformedTransactionError and leaves the pool untouched when a required field is missing. */
    addTransaction(input: unknown): Transaction {
        const transaction = parseTransaction(input);
        this.pool.add(transaction);
        this.logger.debug({ from: transaction.from, to: transaction.to, amount: transaction.amount }, 'Transaction added');
        this.events.emit('transactionAdded', transaction);
        return transaction;
    }

    pendingTransactions(): Transaction[] {
        return this.pool.snapshot();
    }

    get pendingCount(): number {
        return this.pool.size;
    }

    mineBlock(minerAddress: string): Block {
        if (this.mining) {
            throw new MiningInProgressError();
        }
        this.mining = true;
        try {
            const block = this.prepareBlock();
            this.miner.mine(block, this.difficulty);
            return this.commitBlock(block, minerAddress);
        } finally {
            this.mining = false;
        }
    }

    /**
     * Cooperative variant of mineBlock. Calls queue behind each other; an abort
     * leaves both the chain and the pool as they were.
     */
    async mineBlockAsync(minerAddress: string, options: MineAsyncOptions = {}): Promise<Block> {
        return this.mutex.runExclusive(async () => {
            this.mining = true;
            try {
                const block = this.prepareBlock();
                await this.miner.mineAsync(block, this.difficulty, options);
                return this.commitBlock(block, minerAddress);
            } finally {
                this.mining = false;
            }
        });
    }

    isValid(): boolean {
        return this.validate().valid;
    }

    validate(): ValidationResult {
        const result = validateChain(this.chain.blocks, this.difficulty, this.hashFunction);
        if (!result.valid) {
            this.logger.warn({ index: result.index, reason: result.reason }, 'Chain failed validation');
        }
        return result;
    }

    /** Net of every transfer to and from `address`, replayed from genesis. */
    balanceOf(address: string): number {
        let balance = 0;
        for (const block of this.chain.blocks) {
            for (const entry of block.transactions) {
                if (!isTransaction(entry)) continue;
                if (entry.from === address) {
                    balance -= entry.amount;
                }
                if (entry.to === address) {
                    balance += entry.amount;
                }
            }
        }
        return balance;
    }

    chainInfo(): ChainInfo {
        const latestBlock = this.chain.latest();
        return {
            length: this.chain.length,
            difficulty: this.difficulty,
            isValid: this.isValid(),
            pendingCount: this.pendingCount,
            latest: {
                index: latestBlock.index,
                hash: latestBlock.hash,
                timestamp: latestBlock.timestamp,
            },
        };
    }

    getChain(): BlockData[] {
        return this.chain.blocks.map(block => block.toDict());
    }

    private prepareBlock(): Block {
        const lastBlock = this.chain.latest();
        const block = new Block(
            this.chain.length,
            this.pool.snapshot(),
            lastBlock.hash,
            Math.max(this.now(), lastBlock.timestamp),
            this.hashFunction
        );
        this.events.emit('miningStarted', block);
        return block;
    }

    // Replaces rather than merges: anything added since prepareBlock is dropped.
    private commitBlock(block: Block, minerAddress: string): Block {
        this.chain.append(block);
        this.pool.replace([rewardTransaction(minerAddress, this.miningReward)]);
        this.logger.info(
            { index: block.index, nonce: block.nonce, hash: block.hash, transactions: block.transactions.length },
            'Block mined'
        );
        this.events.emit('blockMined', block);
        return block;
    }
}
