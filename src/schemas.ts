import { z } from 'zod';
import type { Block, RpcResponse, Transaction } from './types';

export const rpcResponseSchema: z.ZodType<RpcResponse> = z.object({
    jsonrpc: z.string().optional(),
    id: z.union([z.number(), z.string(), z.null()]).optional(),
    result: z.unknown().optional(),
    error: z.unknown().optional(),
});

// Only the fields the summary reads are kept; the rest of the payload is stripped.
const transactionSchema: z.ZodType<Transaction> = z.object({
    hash: z.string().optional(),
    from: z.string().nullish(),
    to: z.string().nullish(),
});

export const blockSchema: z.ZodType<Block> = z.object({
    number: z.string().nullish(),
    hash: z.string().nullish(),
    transactions: z.array(transactionSchema).nullish(),
});

// Query values arrive as strings; anything but one integer literal is rejected here.
export const blockQuerySchema = z.object({
    number: z
        .string({ invalid_type_error: 'number must be a single integer' })
        .trim()
        .regex(/^[+-]?\d+$/, { message: 'number must be an integer' })
        .transform((value) => BigInt(value))
        .optional(),
});

export type BlockQuery = z.infer<typeof blockQuerySchema>;
