// src/transaction.ts

import { z } from 'zod';
import { MalformedTransactionError, UnhashableValueError } from './errors';
import { canonicalize } from './hash';

/**
 * Transaction accepted into the pool
 * - from / to: non-empty address strings (unauthenticated)
 * - amount: any finite number, sign unrestricted
 * - type: optional tag such as "mining_reward"
 * Extra fields pass through untouched but must be plain JSON values.
 */
export const TransactionSchema = z
    .object({
        from: z.string().min(1, 'from is required'),
        to: z.string().min(1, 'to is required'),
        amount: z.number().finite('amount must be a finite number'),
        type: z.string().optional(),
    })
    .passthrough()
    .superRefine((transaction, ctx) => {
        try {
            canonicalize(transaction);
        } catch (error) {
            if (!(error instanceof UnhashableValueError)) throw error;
            ctx.addIssue({ code: z.ZodIssueCode.custom, path: error.path, message: error.message });
        }
    });

export type Transaction = z.infer<typeof TransactionSchema>;

/** Marker entry carried by the genesis block. */
export interface GenesisRecord {
    type: 'genesis';
    message: string;
}

export type LedgerEntry = Transaction | GenesisRecord;

export const SYSTEM_ADDRESS = 'system';
export const MINING_REWARD_TYPE = 'mining_reward';

export function parseTransaction(input: unknown): Transaction {
    const result = TransactionSchema.safeParse(input);
    if (!result.success) {
        const fields = result.error.issues
            .map((issue) => issue.path.join('.'))
            .filter((field) => field.length > 0);
        throw new MalformedTransactionError([...new Set(fields)]);
    }
    return result.data;
}

export function isTransaction(entry: LedgerEntry): entry is Transaction {
    return 'amount' in entry && 'from' in entry && 'to' in entry;
}

export function rewardTransaction(minerAddress: string, amount: number): Transaction {
    return {
        from: SYSTEM_ADDRESS,
        to: minerAddress,
        amount,
        type: MINING_REWARD_TYPE,
    };
}
