import { err, ok, type Result } from 'neverthrow';
import { BlockNotFoundError, InvalidArgumentError, RpcProtocolError, type BlockFetchError } from './errors';
import type { RpcClient } from './rpcClient';
import { blockSchema } from './schemas';
import type { Block, BlockIdentifier } from './types';

export type BlockRpc = Pick<RpcClient, 'call'>;

/**
 * Translates an optional block number into its JSON-RPC form:
 * `undefined` becomes `"latest"`, `n` becomes lowercase hex (`0` is `"0x0"`).
 */
export function toBlockIdentifier(blockNumber?: bigint): Result<BlockIdentifier, InvalidArgumentError> {
    if (blockNumber === undefined) {
        return ok<BlockIdentifier, InvalidArgumentError>('latest');
    }
    if (blockNumber < 0n) {
        return err(new InvalidArgumentError('Block number cannot be negative'));
    }
    const hex: BlockIdentifier = `0x${blockNumber.toString(16)}`;
    return ok(hex);
}

/**
 * Fetches a block with full transaction objects.
 * A null result (block beyond the chain head) is reported as `NotFound`.
 */
export async function fetchBlock(
    client: BlockRpc,
    blockNumber?: bigint,
    signal?: AbortSignal
): Promise<Result<Block, BlockFetchError>> {
    const blockId = toBlockIdentifier(blockNumber);
    if (blockId.isErr()) {
        return err(blockId.error);
    }

    const result = await client.call('eth_getBlockByNumber', [blockId.value, true], signal);
    if (result.isErr()) {
        return err(result.error);
    }
    if (result.value === null || result.value === undefined) {
        return err(new BlockNotFoundError(blockId.value));
    }

    const block = blockSchema.safeParse(result.value);
    if (!block.success) {
        return err(new RpcProtocolError(`Unexpected block payload for ${blockId.value}`, result.value));
    }
    return ok(block.data);
}
