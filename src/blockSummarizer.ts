import type { Block, BlockSummary } from './types';

/** Key used in `by_receiver` for contract-creation transactions. */
export const CONTRACT_CREATION_KEY = 'null';

const HEX_QUANTITY = /^0x[0-9a-f]+$/i;

export function parseHexQuantity(value: string | null | undefined): number | null {
    if (!value || !HEX_QUANTITY.test(value)) {
        return null;
    }
    return parseInt(value, 16);
}

function increment(counts: Map<string, number>, key: string): void {
    counts.set(key, (counts.get(key) ?? 0) + 1);
}

/**
 * Counts a block's transactions and groups them by sender and receiver.
 * Transactions without a sender are counted in the total only.
 */
export function summarize(block: Block): BlockSummary {
    const transactions = block.transactions ?? [];
    const senders = new Map<string, number>();
    const receivers = new Map<string, number>();

    for (const tx of transactions) {
        if (!tx.from) {
            continue;
        }
        increment(senders, tx.from);
        increment(receivers, tx.to ?? CONTRACT_CREATION_KEY);
    }

    return {
        block_number: parseHexQuantity(block.number),
        block_hash: block.hash ?? null,
        total_transactions: transactions.length,
        by_sender: Object.fromEntries(senders),
        by_receiver: Object.fromEntries(receivers),
    };
}
