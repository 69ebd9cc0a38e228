import axios, { AxiosError } from 'axios';
import { err, ok, type Result } from 'neverthrow';
import { describeRpcError, RpcProtocolError, TransportError, type RpcCallError } from './errors';
import type { Logger } from './logger';
import { rpcResponseSchema } from './schemas';
import type { RpcRequest } from './types';

export interface RpcHttpResponse {
    status: number;
    data: unknown;
}

/**
 * Sends one JSON-RPC request body and resolves with the raw HTTP status and decoded body.
 * Rejects only when no response was received (connection failure, timeout, abort).
 */
export type RpcTransport = (request: RpcRequest, signal?: AbortSignal) => Promise<RpcHttpResponse>;

export interface RpcClientOptions {
    url: string;
    timeoutMs: number;
    logger: Logger;
    transport?: RpcTransport;
}

export function createAxiosTransport(url: string, timeoutMs: number): RpcTransport {
    const axiosInstance = axios.create({
        baseURL: url,
        headers: { 'Content-Type': 'application/json' },
        timeout: timeoutMs,
        // Status handling happens in RpcClient, where a JSON-RPC error body takes precedence.
        validateStatus: () => true,
    });

    return async (request, signal) => {
        const response = await axiosInstance.post<unknown>('', request, { signal });
        return { status: response.status, data: response.data };
    };
}

function describeTransportFailure(error: unknown, timeoutMs: number): string {
    if (axios.isCancel(error)) {
        return 'RPC request was cancelled';
    }
    if (error instanceof AxiosError) {
        if (error.code === AxiosError.ECONNABORTED || error.code === AxiosError.ETIMEDOUT) {
            return `RPC request timed out after ${timeoutMs}ms`;
        }
        return `Network error while calling RPC: ${error.message}`;
    }
    return `Network error while calling RPC: ${error instanceof Error ? error.message : String(error)}`;
}

/**
 * Client for a single JSON-RPC endpoint. One attempt per call; failures are
 * returned, never retried.
 */
export class RpcClient {
    private readonly transport: RpcTransport;
    private readonly logger: Logger;
    private readonly timeoutMs: number;

    constructor(options: RpcClientOptions) {
        this.timeoutMs = options.timeoutMs;
        this.transport = options.transport ?? createAxiosTransport(options.url, options.timeoutMs);
        this.logger = options.logger.child({ component: 'RpcClient' });
    }

    async call(method: string, params: unknown[], signal?: AbortSignal): Promise<Result<unknown, RpcCallError>> {
        const payload: RpcRequest = {
            jsonrpc: '2.0',
            id: 1,
            method,
            params,
        };

        this.logger.trace({ method, params }, 'Making RPC request');

        let response: RpcHttpResponse;
        try {
            response = await this.transport(payload, signal);
        } catch (error) {
            const message = describeTransportFailure(error, this.timeoutMs);
            this.logger.warn({ err: error, method, params }, message);
            return err(new TransportError(message, { cause: error }));
        }

        const parsed = rpcResponseSchema.safeParse(response.data);
        if (parsed.success && 'error' in parsed.data) {
            const message = describeRpcError(parsed.data.error);
            this.logger.warn({ rpcError: parsed.data.error, method, params, status: response.status }, 'RPC error received');
            return err(new RpcProtocolError(message, parsed.data.error));
        }

        if (response.status < 200 || response.status >= 300) {
            const message = `RPC endpoint responded with HTTP ${response.status}`;
            this.logger.warn({ method, params, status: response.status }, message);
            return err(new TransportError(message, { status: response.status }));
        }

        if (!parsed.success) {
            this.logger.warn({ method, params, body: response.data }, 'Malformed JSON-RPC response');
            return err(new RpcProtocolError('Malformed JSON-RPC response: expected a JSON object', response.data));
        }

        this.logger.debug({ method, params }, 'RPC request successful');
        return ok(parsed.data.result);
    }
}
