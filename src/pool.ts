// src/pool.ts

import type { Transaction } from './transaction';

/** Transactions accepted but not yet committed to a block. */
export class TransactionPool {
    private transactions: Transaction[] = [];

    add(transaction: Transaction): void {
        this.transactions.push(transaction);
    }

    /** Deep copy, so later additions or edits do not reach a block being mined. */
    snapshot(): Transaction[] {
        return structuredClone(this.transactions);
    }

    /** Discards everything pending, including anything added after the last snapshot. */
    replace(transactions: Transaction[]): void {
        this.transactions = [...transactions];
    }

    get size(): number {
        return this.transactions.length;
    }
}
