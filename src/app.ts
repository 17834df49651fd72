// src/app.ts

import express from 'express';
import type { Application, ErrorRequestHandler, Request, RequestHandler, Response } from 'express';
import bodyParser from 'body-parser';
import { z } from 'zod';
import { MalformedTransactionError } from './errors';
import type { Ledger } from './ledger';
import { logger as rootLogger } from './logger';
import type { Logger } from './logger';

const MineRequestSchema = z.object({
    minerAddress: z.string().min(1, 'minerAddress is required'),
});

// body-parser errors (unparseable JSON, oversized body) carry a 4xx `status`.
function clientErrorStatus(error: unknown): number | undefined {
    if (typeof error !== 'object' || error === null) return undefined;
    const status = 'status' in error ? error.status : 'statusCode' in error ? error.statusCode : undefined;
    if (typeof status === 'number' && status >= 400 && status < 500) {
        return status;
    }
    return undefined;
}

/**
 * Builds the HTTP surface of a single ledger node. The ledger is owned by the
 * caller; nothing here talks to other nodes.
 */
export function createApp(ledger: Ledger, logger: Logger = rootLogger.child({ module: 'http' })): Application {
    const app: Application = express();

    app.use(bodyParser.json({ limit: '10mb' }));

    /**
     * POST /transactions
     * Validates the body and queues it for the next block. Responds 400 with the
     * offending fields when from, to or amount is missing.
     */
    const newTransactionHandler: RequestHandler = (req: Request, res: Response): void => {
        try {
            const transaction = ledger.addTransaction(req.body);
            res.status(201).json({ transaction, pendingCount: ledger.pendingCount });
        } catch (error) {
            if (error instanceof MalformedTransactionError) {
                logger.info({ fields: error.fields }, 'Rejected malformed transaction');
                res.status(400).json({ error: error.message, fields: error.fields });
                return;
            }
            throw error;
        }
    };
    app.post('/transactions', newTransactionHandler);

    /**
     * POST /mine
     * Mines the pending pool into a new block credited to `minerAddress`.
     * Concurrent requests are served one after another.
     */
    const mineHandler: RequestHandler = async (req, res, next): Promise<void> => {
        const parsed = MineRequestSchema.safeParse(req.body);
        if (!parsed.success) {
            res.status(400).json({ error: 'Validation failed', issues: parsed.error.issues });
            return;
        }

        try {
            const block = await ledger.mineBlockAsync(parsed.data.minerAddress);
            res.status(201).json(block.toDict());
        } catch (error) {
            next(error);
        }
    };
    app.post('/mine', mineHandler);

    const getChainHandler: RequestHandler = (_req, res) => {
        const chain = ledger.getChain();
        res.json({ length: chain.length, chain });
    };
    app.get('/chain', getChainHandler);

    app.get('/chain/info', (_req, res) => {
        res.json(ledger.chainInfo());
    });

    app.get('/chain/validate', (_req, res) => {
        res.json(ledger.validate());
    });

    app.get('/balance/:address', (req, res) => {
        const { address } = req.params;
        res.json({ address, balance: ledger.balanceOf(address) });
    });

    app.get('/pending', (_req, res) => {
        res.json({ transactions: ledger.pendingTransactions() });
    });

    app.get('/health', (_req, res) => res.json({ ok: true }));

    const errorHandler: ErrorRequestHandler = (error: unknown, req, res, _next) => {
        const status = clientErrorStatus(error);
        if (status !== undefined) {
            const message = error instanceof Error ? error.message : 'Bad Request';
            logger.info({ status, path: req.path, message }, 'Rejected request');
            res.status(status).json({ error: message });
            return;
        }
        logger.error({ err: error, path: req.path }, 'Request failed');
        res.status(500).json({ error: 'Internal Server Error' });
    };
    app.use(errorHandler);

    return app;
}
