import { describe, it, expect } from 'vitest';
import { MalformedTransactionError } from './errors';
import { isTransaction, parseTransaction, rewardTransaction } from './transaction';

function rejectedFields(input: unknown): string[] {
    try {
        parseTransaction(input);
    } catch (error) {
        if (error instanceof MalformedTransactionError) {
            return error.fields;
        }
        throw error;
    }
    throw new Error('Transaction was accepted');
}

describe('parseTransaction', () => {
    it('accepts the required fields and passes extra fields through', () => {
        expect(parseTransaction({ from: 'a', to: 'b', amount: 5, type: 'transfer', memo: 'rent' })).toEqual({
            from: 'a',
            to: 'b',
            amount: 5,
            type: 'transfer',
            memo: 'rent',
        });
    });

    it('accepts negative and zero amounts', () => {
        expect(parseTransaction({ from: 'a', to: 'b', amount: -20 }).amount).toBe(-20);
        expect(parseTransaction({ from: 'a', to: 'b', amount: 0 }).amount).toBe(0);
    });

    it('names each missing or invalid field', () => {
        expect(rejectedFields({ to: 'x', amount: 5 })).toEqual(['from']);
        expect(rejectedFields({ from: 'x', to: '', amount: 5 })).toEqual(['to']);
        expect(rejectedFields({ from: 'x', to: 'y', amount: '5' })).toEqual(['amount']);
        expect(rejectedFields({ from: 'x', to: 'y', amount: Number.NaN })).toEqual(['amount']);
        expect(rejectedFields({})).toEqual(['from', 'to', 'amount']);
    });

    it('rejects infinite amounts', () => {
        expect(rejectedFields({ from: 'x', to: 'y', amount: Number.POSITIVE_INFINITY })).toEqual(['amount']);
        expect(rejectedFields({ from: 'x', to: 'y', amount: Number.NEGATIVE_INFINITY })).toEqual(['amount']);
    });

    it('rejects pass-through fields that are not plain JSON', () => {
        expect(rejectedFields({ from: 'x', to: 'y', amount: 1, memo: new Date(0) })).toEqual(['memo']);
        expect(rejectedFields({ from: 'x', to: 'y', amount: 1, tags: ['a', Number.NaN] })).toEqual(['tags.1']);
    });

    it('rejects non-objects', () => {
        expect(() => parseTransaction(null)).toThrow('Transaction must be an object');
    });
});

describe('isTransaction', () => {
    it('tells transfers apart from the genesis marker', () => {
        expect(isTransaction({ from: 'a', to: 'b', amount: 1 })).toBe(true);
        expect(isTransaction({ type: 'genesis', message: 'Genesis Block' })).toBe(false);
    });
});

describe('rewardTransaction', () => {
    it('credits the miner from the system account', () => {
        expect(rewardTransaction('miner1', 100)).toEqual({
            from: 'system',
            to: 'miner1',
            amount: 100,
            type: 'mining_reward',
        });
    });
});
