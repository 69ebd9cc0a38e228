import dotenv from 'dotenv';
import http from 'http';
import { loadConfig } from './config/config';
import { createLogger } from './logger';
import { RpcClient } from './rpcClient';
import { createApp } from './server';

dotenv.config();

/**
 * Loads configuration, wires the RPC client into the HTTP app and starts listening.
 */
function start(): http.Server {
    const config = loadConfig();
    const logger = createLogger(config.logLevel);

    const rpcClient = new RpcClient({ url: config.rpcUrl, timeoutMs: config.rpcTimeoutMs, logger });
    const server = http.createServer(createApp({ rpcClient, logger }));

    server.on('listening', () => {
        logger.info({ rpcUrl: config.rpcUrl, timeoutMs: config.rpcTimeoutMs }, `Block summary API listening on http://${config.host}:${config.port}`);
    });
    server.on('error', (err) => {
        logger.fatal({ err }, 'Failed to start HTTP server. Exiting.');
        process.exit(1);
    });

    // Graceful shutdown handler
    const shutdown = (signal: NodeJS.Signals) => {
        logger.info({ signal }, 'Shutting down...');
        server.close((err) => {
            if (err) {
                logger.error({ err }, 'Error while closing HTTP server');
                process.exit(1);
            }
            logger.info('Shutdown complete.');
            process.exit(0);
        });
        server.closeAllConnections();
    };
    process.once('SIGINT', shutdown);
    process.once('SIGTERM', shutdown);

    server.listen(config.port, config.host);
    return server;
}

try {
    start();
} catch (error) {
    // Configuration may be what failed, so fall back to a default-level logger.
    createLogger('info').fatal({ err: error }, 'Fatal error during start-up. Exiting.');
    process.exit(1);
}
