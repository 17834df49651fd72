// src/node.ts

import { createApp } from './app';
import { loadConfig } from './config';
import { createHashFunction } from './hash';
import { Ledger } from './ledger';
import { logger } from './logger';

// Usage: node dist/node.js [PORT]
const config = loadConfig();
const port: number = parseInt(process.argv[2] ?? '', 10) || config.port;

const ledger = new Ledger({
    difficulty: config.difficulty,
    miningReward: config.miningReward,
    hashFunction: createHashFunction(config.hashAlgorithm),
});

const app = createApp(ledger);

app.listen(port, () => {
    logger.info(
        { port, difficulty: config.difficulty, hashAlgorithm: config.hashAlgorithm, genesis: ledger.latest().hash },
        'Ledger node listening'
    );
});
