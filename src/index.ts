// src/index.ts

export { Block, computeBlockHash } from './block';
export type { BlockData, HashedFields } from './block';
export { Chain, GENESIS_MESSAGE, GENESIS_PREVIOUS_HASH } from './chain';
export type { ChainOptions } from './chain';
export { loadConfig } from './config';
export type { NodeConfig } from './config';
export {
    ConfigError,
    EmptyChainError,
    LedgerError,
    MalformedTransactionError,
    MiningAbortedError,
    MiningInProgressError,
    UnhashableValueError,
} from './errors';
export { HASH_ALGORITHMS, canonicalize, createHashFunction, sha256, sha3_256 } from './hash';
export type { HashAlgorithm, HashFunction } from './hash';
export { DEFAULT_DIFFICULTY, DEFAULT_MINING_REWARD, Ledger } from './ledger';
export type { ChainInfo, LedgerOptions } from './ledger';
export { createLogger, logger } from './logger';
export { Miner, meetsDifficulty } from './miner';
export type { MineAsyncOptions } from './miner';
export { TransactionPool } from './pool';
export {
    MINING_REWARD_TYPE,
    SYSTEM_ADDRESS,
    TransactionSchema,
    isTransaction,
    parseTransaction,
    rewardTransaction,
} from './transaction';
export type { GenesisRecord, LedgerEntry, Transaction } from './transaction';
export { isValidChain, validateChain } from './validator';
export type { InvalidBlockReason, ValidationResult } from './validator';
export { createApp } from './app';
