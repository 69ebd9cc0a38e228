// Basic structure based on common Ethereum JSON-RPC responses.
// Every field is optional: the summary tolerates partial payloads.

export interface Transaction {
    hash?: string;
    nonce?: string; // hex
    blockHash?: string | null; // hex, null when pending
    blockNumber?: string | null; // hex, null when pending
    transactionIndex?: string | null; // hex, null when pending
    from?: string | null; // address hex
    to?: string | null; // address hex, null for contract creation
    value?: string; // hex of wei value
    gasPrice?: string; // hex
    gas?: string; // hex
    input?: string; // hex
}

export interface Block {
    number?: string | null; // hex
    hash?: string | null; // hex
    parentHash?: string; // hex
    miner?: string; // address hex
    timestamp?: string; // hex (unix timestamp)
    gasLimit?: string; // hex
    gasUsed?: string; // hex
    transactions?: Transaction[] | null; // full tx objects, requested with the `true` flag
}

/** `"latest"` or a `0x`-prefixed lowercase hex block number. */
export type BlockIdentifier = 'latest' | `0x${string}`;

export interface RpcRequest {
    jsonrpc: '2.0';
    id: number;
    method: string;
    params: unknown[];
}

export interface RpcErrorPayload {
    code?: number;
    message?: string;
    data?: unknown;
}

export interface RpcResponse {
    jsonrpc?: string;
    id?: number | string | null;
    result?: unknown;
    error?: unknown;
}

/** Output of `GET /block`. Keys are part of the public JSON contract. */
export interface BlockSummary {
    block_number: number | null;
    block_hash: string | null;
    total_transactions: number;
    by_sender: Record<string, number>;
    by_receiver: Record<string, number>;
}
