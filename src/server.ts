import express, { type Express, type Request, type Response } from 'express';
import cors from 'cors';
import { fetchBlock, type BlockRpc } from './blockFetcher';
import { summarize } from './blockSummarizer';
import { InvalidArgumentError, type BlockFetchError } from './errors';
import type { Logger } from './logger';
import { blockQuerySchema } from './schemas';

export interface AppDependencies {
    rpcClient: BlockRpc;
    logger: Logger;
}

export const CAPABILITIES = {
    message: 'Ethereum block summary API',
    endpoints: {
        '/block': {
            method: 'GET',
            query_params: {
                number: "optional integer block number; if omitted, uses 'latest'",
            },
            examples: ['/block', '/block?number=21000000'],
        },
    },
};

export function httpStatusFor(error: BlockFetchError): number {
    switch (error.kind) {
        case 'InvalidArgument':
            return 400;
        case 'TransportError':
        case 'RpcProtocolError':
        case 'NotFound':
            return 502;
    }
}

/**
 * Builds the express application. The RPC client is injected so the HTTP
 * surface can run against any endpoint, including in-process fakes.
 */
export function createApp({ rpcClient, logger }: AppDependencies): Express {
    const log = logger.child({ component: 'http' });
    const app = express();

    app.disable('x-powered-by');
    app.use(cors());

    app.get('/', (_req: Request, res: Response) => {
        res.json(CAPABILITIES);
    });

    app.get('/block', async (req: Request, res: Response) => {
        // Abort the outbound call if the caller disconnects first.
        const controller = new AbortController();
        res.on('close', () => {
            if (!res.writableFinished) {
                controller.abort();
            }
        });

        try {
            const query = blockQuerySchema.safeParse(req.query);
            if (!query.success) {
                const error = new InvalidArgumentError(query.error.issues.map((issue) => issue.message).join('; '));
                res.status(httpStatusFor(error)).json({ error: error.message });
                return;
            }

            const block = await fetchBlock(rpcClient, query.data.number, controller.signal);
            if (controller.signal.aborted) {
                log.debug({ query: req.query }, 'Client disconnected before the block was fetched');
                return;
            }
            if (block.isErr()) {
                const status = httpStatusFor(block.error);
                log.warn({ kind: block.error.kind, status, query: req.query }, block.error.message);
                res.status(status).json({ error: block.error.message });
                return;
            }

            res.json(summarize(block.value));
        } catch (error) {
            log.error({ err: error, query: req.query }, 'Unexpected error while summarizing block');
            if (!res.headersSent) {
                res.status(500).json({ error: 'Internal server error' });
            }
        }
    });

    return app;
}
