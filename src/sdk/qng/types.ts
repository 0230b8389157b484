import type { JsonCompatibleArray } from '@cosmjs/json-rpc/build/compatibility';
import type { JsonRpcRequest } from '@cosmjs/json-rpc';
import { z } from 'zod';

export const QNG_JSONRPC_VERSION = '2.0';

// Calls are never pipelined, so every request carries the same id.
export const QNG_REQUEST_ID = 1;

export type QngMethod =
  | 'qng_getBalance'
  | 'qng_addBalance'
  | 'qng_getUTXOs'
  | 'qng_sendRawTransaction';

export type QngParams = JsonCompatibleArray;

export interface QngRequest extends JsonRpcRequest {
  readonly id: typeof QNG_REQUEST_ID;
  readonly params: QngParams;
}

export const QngWeb3ErrorSchema = z.object({
  code: z.number().int(),
  message: z.string().default(''),
});

export const QngWeb3ResultSchema = z.object({
  // `null` members mean absent: nodes send `"error": null` on success, `"id": null` on parse errors
  id: z.number().int().nullish(),
  jsonrpc: z.string().nullish(),
  message: z.string().nullish(),
  result: z.unknown().optional(),
  error: QngWeb3ErrorSchema.nullish(),
});

export type QngWeb3Error = z.infer<typeof QngWeb3ErrorSchema>;
export type QngWeb3Result = z.infer<typeof QngWeb3ResultSchema>;

export function makeQngRequest(method: string, params: QngParams): QngRequest {
  return { method, params, id: QNG_REQUEST_ID, jsonrpc: QNG_JSONRPC_VERSION };
}

export type QngWeb3Func = (method: string, params: QngParams) => Promise<unknown>;
