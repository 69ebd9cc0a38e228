import { describe, it, expect, vi, beforeAll, afterAll } from 'vitest';
import http from 'http';
import { createLogger } from '../logger';
import { createAxiosTransport, RpcClient, type RpcTransport } from '../rpcClient';
import { RpcProtocolError, TransportError } from '../errors';

const logger = createLogger('silent');

function portOf(server: http.Server): number {
    const address = server.address();
    if (address === null || typeof address === 'string') {
        throw new Error('Server is not listening on a TCP port');
    }
    return address.port;
}

function createClient(transport: RpcTransport) {
    return new RpcClient({ url: 'http://rpc.invalid', timeoutMs: 10000, logger, transport });
}

describe('RpcClient', () => {
    it('sends a JSON-RPC 2.0 request and returns the result', async () => {
        const transport = vi.fn<RpcTransport>().mockResolvedValue({
            status: 200,
            data: { jsonrpc: '2.0', id: 1, result: '0x10' },
        });

        const result = await createClient(transport).call('eth_blockNumber', []);

        expect(result._unsafeUnwrap()).toBe('0x10');
        expect(transport).toHaveBeenCalledWith({ jsonrpc: '2.0', id: 1, method: 'eth_blockNumber', params: [] }, undefined);
    });

    it('passes a null result through', async () => {
        const transport = vi.fn<RpcTransport>().mockResolvedValue({ status: 200, data: { jsonrpc: '2.0', id: 1, result: null } });

        const result = await createClient(transport).call('eth_getBlockByNumber', ['0xffffffff', true]);

        expect(result.isOk()).toBe(true);
        expect(result._unsafeUnwrap()).toBeNull();
    });

    it('returns RpcProtocolError when the body carries an error member', async () => {
        const rpcError = { code: -32602, message: 'invalid argument 0' };
        const transport = vi.fn<RpcTransport>().mockResolvedValue({ status: 200, data: { jsonrpc: '2.0', id: 1, error: rpcError } });

        const result = await createClient(transport).call('eth_getBlockByNumber', ['bogus', true]);

        const error = result._unsafeUnwrapErr();
        expect(error).toBeInstanceOf(RpcProtocolError);
        expect(error.message).toBe('RPC error (-32602): invalid argument 0');
        expect(error instanceof RpcProtocolError && error.payload).toEqual(rpcError);
    });

    it('prefers the JSON-RPC error over a failing HTTP status', async () => {
        const transport = vi.fn<RpcTransport>().mockResolvedValue({
            status: 500,
            data: { jsonrpc: '2.0', id: 1, error: { code: -32000, message: 'header not found' } },
        });

        const result = await createClient(transport).call('eth_getBlockByNumber', ['0x1', true]);

        expect(result._unsafeUnwrapErr().kind).toBe('RpcProtocolError');
        expect(result._unsafeUnwrapErr().message).toBe('RPC error (-32000): header not found');
    });

    it('renders error payloads without a message as JSON', async () => {
        const transport = vi.fn<RpcTransport>().mockResolvedValue({ status: 200, data: { error: 'rate limited' } });

        const result = await createClient(transport).call('eth_chainId', []);

        expect(result._unsafeUnwrapErr().message).toBe('RPC error: "rate limited"');
    });

    it('treats a present but null error member as a failure', async () => {
        const transport = vi.fn<RpcTransport>().mockResolvedValue({ status: 200, data: { jsonrpc: '2.0', id: 1, error: null, result: '0x1' } });

        const result = await createClient(transport).call('eth_blockNumber', []);

        expect(result._unsafeUnwrapErr().kind).toBe('RpcProtocolError');
        expect(result._unsafeUnwrapErr().message).toBe('RPC error: null');
    });

    it('returns TransportError for a non-2xx status without an error member', async () => {
        const transport = vi.fn<RpcTransport>().mockResolvedValue({ status: 503, data: 'Service Unavailable' });

        const result = await createClient(transport).call('eth_blockNumber', []);

        const error = result._unsafeUnwrapErr();
        expect(error).toBeInstanceOf(TransportError);
        expect(error.message).toBe('RPC endpoint responded with HTTP 503');
        expect(error instanceof TransportError && error.status).toBe(503);
    });

    it('wraps a transport failure and makes a single attempt', async () => {
        const cause = new Error('connect ECONNREFUSED 127.0.0.1:8545');
        const transport = vi.fn<RpcTransport>().mockRejectedValue(cause);

        const result = await createClient(transport).call('eth_blockNumber', []);

        const error = result._unsafeUnwrapErr();
        expect(error.kind).toBe('TransportError');
        expect(error.message).toBe('Network error while calling RPC: connect ECONNREFUSED 127.0.0.1:8545');
        expect(error.cause).toBe(cause);
        expect(transport).toHaveBeenCalledTimes(1);
    });

    it('rejects a body that is not a JSON object', async () => {
        const transport = vi.fn<RpcTransport>().mockResolvedValue({ status: 200, data: '<html>gateway</html>' });

        const result = await createClient(transport).call('eth_blockNumber', []);

        expect(result._unsafeUnwrapErr().kind).toBe('RpcProtocolError');
        expect(result._unsafeUnwrapErr().message).toBe('Malformed JSON-RPC response: expected a JSON object');
    });
});

describe('createAxiosTransport', () => {
    let server: http.Server;
    let baseUrl: string;
    const received: Array<{ contentType: string | undefined; body: unknown }> = [];

    beforeAll(async () => {
        server = http.createServer((req, res) => {
            let raw = '';
            req.on('data', (chunk: Buffer) => {
                raw += chunk.toString();
            });
            req.on('end', () => {
                const body: unknown = JSON.parse(raw);
                received.push({ contentType: req.headers['content-type'], body });

                if (req.url === '/hang') {
                    return; // never answers
                }
                if (req.url === '/unavailable') {
                    res.writeHead(503, { 'Content-Type': 'text/plain' });
                    res.end('upstream down');
                    return;
                }
                res.writeHead(200, { 'Content-Type': 'application/json' });
                res.end(JSON.stringify({ jsonrpc: '2.0', id: 1, result: '0x2a' }));
            });
        });
        await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
        baseUrl = `http://127.0.0.1:${portOf(server)}`;
    });

    afterAll(async () => {
        server.closeAllConnections();
        await new Promise<void>((resolve) => server.close(() => resolve()));
    });

    it('posts the request as JSON and returns status and body', async () => {
        const transport = createAxiosTransport(baseUrl, 1000);
        const request = { jsonrpc: '2.0' as const, id: 1, method: 'eth_blockNumber', params: [] };

        const response = await transport(request);

        expect(response).toEqual({ status: 200, data: { jsonrpc: '2.0', id: 1, result: '0x2a' } });
        expect(received.at(-1)).toEqual({ contentType: 'application/json', body: request });
    });

    it('resolves with non-2xx statuses instead of throwing', async () => {
        const client = new RpcClient({ url: `${baseUrl}/unavailable`, timeoutMs: 1000, logger });

        const result = await client.call('eth_blockNumber', []);

        expect(result._unsafeUnwrapErr().message).toBe('RPC endpoint responded with HTTP 503');
    });

    it('fails with a TransportError once the timeout elapses', async () => {
        const client = new RpcClient({ url: `${baseUrl}/hang`, timeoutMs: 50, logger });

        const result = await client.call('eth_blockNumber', []);

        expect(result._unsafeUnwrapErr().kind).toBe('TransportError');
        expect(result._unsafeUnwrapErr().message).toBe('RPC request timed out after 50ms');
    });

    it('fails with a TransportError when the request is aborted', async () => {
        const client = new RpcClient({ url: `${baseUrl}/hang`, timeoutMs: 5000, logger });
        const controller = new AbortController();

        const pending = client.call('eth_blockNumber', [], controller.signal);
        controller.abort();
        const result = await pending;

        expect(result._unsafeUnwrapErr().kind).toBe('TransportError');
        expect(result._unsafeUnwrapErr().message).toBe('RPC request was cancelled');
    });

    it('fails with a TransportError when the connection is refused', async () => {
        const closed = http.createServer();
        await new Promise<void>((resolve) => closed.listen(0, '127.0.0.1', resolve));
        const port = portOf(closed);
        await new Promise<void>((resolve) => closed.close(() => resolve()));

        const client = new RpcClient({ url: `http://127.0.0.1:${port}`, timeoutMs: 1000, logger });
        const result = await client.call('eth_blockNumber', []);

        const error = result._unsafeUnwrapErr();
        expect(error.kind).toBe('TransportError');
        expect(error.message.startsWith('Network error while calling RPC:')).toBe(true);
    });
});
