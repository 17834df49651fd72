// src/miner.ts

import type { Block } from './block';
import { MiningAbortedError } from './errors';
import { logger as rootLogger } from './logger';
import type { Logger } from './logger';

const PROGRESS_LOG_INTERVAL = 100_000;
const DEFAULT_YIELD_EVERY = 1000;

export interface MineAsyncOptions {
    signal?: AbortSignal;
    /** Nonces tried between yields to the event loop; non-finite values fall back to the default. */
    yieldEvery?: number;
}

export function meetsDifficulty(hash: string, difficulty: number): boolean {
    return hash.startsWith('0'.repeat(difficulty));
}

function resolveYieldEvery(value: number | undefined): number {
    if (value === undefined || !Number.isFinite(value)) {
        return DEFAULT_YIELD_EVERY;
    }
    return Math.max(1, Math.floor(value));
}

const yieldToEventLoop = (): Promise<void> => new Promise(resolve => setImmediate(resolve));

export class Miner {
    private readonly logger: Logger;

    constructor(logger: Logger = rootLogger.child({ module: 'miner' })) {
        this.logger = logger;
    }

    /**
     * Proof of work: bumps the nonce until the block hash carries `difficulty`
     * leading zeros. Mutates and returns the block. Runs until it succeeds.
     */
    mine(block: Block, difficulty: number): Block {
        while (!meetsDifficulty(block.hash, difficulty)) {
            this.step(block);
        }
        this.logger.debug({ index: block.index, nonce: block.nonce, hash: block.hash }, 'Nonce found');
        return block;
    }

    /**
     * Same search as `mine`, but yields every `yieldEvery` nonces and stops with
     * MiningAbortedError once `signal` is aborted, even before the first hash is
     * checked. An aborted block keeps the nonce and hash it reached.
     */
    async mineAsync(block: Block, difficulty: number, options: MineAsyncOptions = {}): Promise<Block> {
        const { signal } = options;
        const yieldEvery = resolveYieldEvery(options.yieldEvery);

        for (;;) {
            if (signal?.aborted) {
                this.logger.info({ index: block.index, nonce: block.nonce }, 'Mining aborted');
                throw new MiningAbortedError(block.index, block.nonce);
            }
            if (meetsDifficulty(block.hash, difficulty)) break;
            this.step(block);
            if (block.nonce % yieldEvery === 0) {
                await yieldToEventLoop();
            }
        }
        this.logger.debug({ index: block.index, nonce: block.nonce, hash: block.hash }, 'Nonce found');
        return block;
    }

    private step(block: Block): void {
        block.nonce += 1;
        block.hash = block.computeHash();
        if (block.nonce % PROGRESS_LOG_INTERVAL === 0) {
            this.logger.trace({ index: block.index, nonce: block.nonce }, 'Still mining');
        }
    }
}
