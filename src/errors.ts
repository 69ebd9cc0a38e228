import type { RpcErrorPayload } from './types';

// `kind` names the failure class; the HTTP layer maps it to a status code.

export class InvalidArgumentError extends Error {
    readonly kind = 'InvalidArgument' as const;

    constructor(message: string) {
        super(message);
        this.name = 'InvalidArgumentError';
    }
}

export class TransportError extends Error {
    readonly kind = 'TransportError' as const;
    readonly status: number | undefined;

    constructor(message: string, options: { cause?: unknown; status?: number } = {}) {
        super(message, { cause: options.cause });
        this.name = 'TransportError';
        this.status = options.status;
    }
}

export class RpcProtocolError extends Error {
    readonly kind = 'RpcProtocolError' as const;

    constructor(
        message: string,
        public readonly payload?: unknown
    ) {
        super(message);
        this.name = 'RpcProtocolError';
    }
}

export class BlockNotFoundError extends Error {
    readonly kind = 'NotFound' as const;

    constructor(public readonly blockId: string) {
        super(`No block found for ${blockId}`);
        this.name = 'BlockNotFoundError';
    }
}

export type RpcCallError = TransportError | RpcProtocolError;

export type BlockFetchError = InvalidArgumentError | RpcCallError | BlockNotFoundError;

function isRpcErrorPayload(value: unknown): value is RpcErrorPayload {
    return typeof value === 'object' && value !== null && 'message' in value && typeof value.message === 'string';
}

/** Renders a JSON-RPC `error` member for an error message. */
export function describeRpcError(payload: unknown): string {
    if (isRpcErrorPayload(payload)) {
        return payload.code !== undefined
            ? `RPC error (${payload.code}): ${payload.message}`
            : `RPC error: ${payload.message}`;
    }
    return `RPC error: ${JSON.stringify(payload)}`;
}
