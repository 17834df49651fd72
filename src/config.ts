// src/config.ts

import { z } from 'zod';
import { ConfigError } from './errors';
import { HASH_ALGORITHMS } from './hash';
import type { HashAlgorithm } from './hash';
import { DEFAULT_DIFFICULTY, DEFAULT_MINING_REWARD } from './ledger';

const DEFAULT_PORT = 5000;

/**
 * Environment schema for a ledger node
 * - LEDGER_DIFFICULTY: leading hex zeros per block hash
 * - LEDGER_MINING_REWARD: amount credited to the miner of each block
 * - LEDGER_HASH_ALGORITHM: digest used for block hashes
 * - PORT: HTTP port
 */
const EnvSchema = z.object({
    LEDGER_DIFFICULTY: z.coerce
        .number()
        .int('LEDGER_DIFFICULTY must be a whole number')
        .min(0, 'LEDGER_DIFFICULTY cannot be negative')
        .default(DEFAULT_DIFFICULTY),
    LEDGER_MINING_REWARD: z.coerce
        .number()
        .finite('LEDGER_MINING_REWARD must be finite')
        .default(DEFAULT_MINING_REWARD),
    LEDGER_HASH_ALGORITHM: z
        .enum(HASH_ALGORITHMS)
        .default('sha3-256'),
    PORT: z.coerce.number().int().min(0).max(65535).default(DEFAULT_PORT),
});

export type NodeConfig = {
    difficulty: number;
    miningReward: number;
    hashAlgorithm: HashAlgorithm;
    port: number;
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): NodeConfig {
    const result = EnvSchema.safeParse(env);
    if (!result.success) {
        const details = result.error.issues
            .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
            .join('; ');
        throw new ConfigError(`Invalid ledger configuration: ${details}`);
    }

    return {
        difficulty: result.data.LEDGER_DIFFICULTY,
        miningReward: result.data.LEDGER_MINING_REWARD,
        hashAlgorithm: result.data.LEDGER_HASH_ALGORITHM,
        port: result.data.PORT,
    };
}
