import { describe, it, expect } from 'vitest';
import { Block, computeBlockHash } from './block';
import type { BlockData } from './block';
import { Ledger } from './ledger';
import { isTransaction } from './transaction';
import { isValidChain, validateChain } from './validator';

function minedChain(): BlockData[] {
    const ledger = new Ledger({ difficulty: 1 });
    ledger.addTransaction({ from: 'alice', to: 'bob', amount: 10 });
    ledger.mineBlock('miner');
    ledger.addTransaction({ from: 'bob', to: 'carol', amount: 4 });
    ledger.mineBlock('miner');
    return ledger.getChain();
}

function firstTransfer(block: BlockData) {
    const entry = block.transactions[0];
    if (entry === undefined || !isTransaction(entry)) {
        throw new Error(`Block #${block.index} has no transfer`);
    }
    return entry;
}

describe('validateChain', () => {
    it('accepts an untouched chain', () => {
        const chain = minedChain();

        expect(validateChain(chain, 1)).toEqual({ valid: true });
        expect(isValidChain(chain, 1)).toBe(true);
    });

    it('accepts a chain holding only genesis', () => {
        expect(isValidChain(new Ledger({ difficulty: 1 }).getChain(), 1)).toBe(true);
    });

    it('detects an edited transaction', () => {
        const chain = minedChain();
        firstTransfer(chain[1]).amount = 1000;

        expect(validateChain(chain, 1)).toEqual({ valid: false, index: 1, reason: 'hash-mismatch' });
    });

    it('detects a rewritten link even when the hash is recomputed', () => {
        const chain = minedChain();
        chain[2].previousHash = 'f'.repeat(64);
        chain[2].hash = computeBlockHash(chain[2]);

        expect(validateChain(chain, 0)).toEqual({ valid: false, index: 2, reason: 'broken-link' });
    });

    it('detects reordered and deleted blocks', () => {
        const reordered = minedChain();
        [reordered[1], reordered[2]] = [reordered[2], reordered[1]];
        expect(validateChain(reordered, 1)).toEqual({ valid: false, index: 1, reason: 'broken-link' });

        const truncated = minedChain();
        truncated.splice(1, 1);
        expect(validateChain(truncated, 1)).toEqual({ valid: false, index: 1, reason: 'broken-link' });
    });

    it('detects a block that was never mined', () => {
        const [genesis] = minedChain();
        const unmined = new Block(1, [], genesis.hash, genesis.timestamp);
        while (unmined.hash.startsWith('0')) {
            unmined.nonce += 1;
            unmined.hash = unmined.computeHash();
        }

        expect(validateChain([genesis, unmined.toDict()], 1)).toEqual({
            valid: false,
            index: 1,
            reason: 'insufficient-work',
        });
    });

    it('reports the first failing block', () => {
        const chain = minedChain();
        firstTransfer(chain[1]).amount = 1;
        firstTransfer(chain[2]).amount = 1;

        expect(validateChain(chain, 1)).toMatchObject({ valid: false, index: 1 });
    });

    it('trusts the genesis block', () => {
        const chain = minedChain();
        chain[0].transactions = [];

        expect(validateChain(chain, 1)).toEqual({ valid: true });
    });
});
