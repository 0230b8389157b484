import { jsonRpcCode, type JsonRpcError } from '@cosmjs/json-rpc';
import { z } from 'zod';

import type { QngCrossSender } from '../bridge/types';
import {
  BackendError,
  BridgeNotConfiguredError,
  InvalidParamsError,
  MethodNotFoundError,
  RpcError,
} from '../errors';
import type { Logger } from '../logger';
import { setupQngExtension, type QngExtension } from '../qng/extensions/qng';
import type { QngWeb3Func } from '../qng/types';

export type MethodHandler = (params: readonly unknown[]) => Promise<unknown>;

const Uint = z.number().int().nonnegative();
// uint64 does not fit a JSON number, so the wire form is a decimal string.
const Fee = z
  .union([z.bigint(), z.string().regex(/^\d+$/, 'fee must be a decimal string')])
  .transform((v) => BigInt(v));

const GetBalanceParams = z.tuple([z.string(), z.number().int()]);
const AddBalanceParams = z.tuple([z.string()]);
const GetUTXOsParams = z.tuple([z.string(), Uint, z.boolean()]);
const SendRawTransactionParams = z.tuple([z.string(), z.boolean()]);
const CrossSendParams = z.tuple([z.string(), Uint, Fee, z.string()]);

export interface QngRpcAdapterConfig {
  invoke: QngWeb3Func;
  cross?: QngCrossSender;
  logger?: Logger;
}

/**
 * The `qng_*` surface the bundler exposes. Every method is a pass-through: the qng node or
 * the bridge decides what a valid argument is.
 */
export class QngRpcAdapter {
  private readonly extension: QngExtension;
  private readonly cross?: QngCrossSender;
  private readonly logger?: Logger;
  private readonly handlers: Readonly<Record<string, MethodHandler>>;

  constructor(cfg: QngRpcAdapterConfig) {
    this.extension = setupQngExtension(cfg.invoke);
    this.cross = cfg.cross;
    this.logger = cfg.logger;
    this.handlers = Object.freeze({
      qng_getBalance: async (params) => {
        const [addr, coinId] = parseParams(GetBalanceParams, params);
        return this.qngGetBalance(addr, coinId);
      },
      qng_addBalance: async (params) => {
        const [addr] = parseParams(AddBalanceParams, params);
        return this.qngAddBalance(addr);
      },
      qng_getUTXOs: async (params) => {
        const [addr, limit, locked] = parseParams(GetUTXOsParams, params);
        return this.qngGetUTXOs(addr, limit, locked);
      },
      qng_sendRawTransaction: async (params) => {
        const [rawTx, allowHighFee] = parseParams(SendRawTransactionParams, params);
        return this.qngSendRawTransaction(rawTx, allowHighFee);
      },
      qng_crossSend: async (params) => {
        const [txid, idx, fee, sig] = parseParams(CrossSendParams, params);
        return this.qngCrossSend(txid, idx, fee, sig);
      },
    } satisfies Record<string, MethodHandler>);
  }

  qngGetBalance(addr: string, coinId: number): Promise<unknown> {
    return this.extension.qng.getBalance(addr, coinId);
  }

  qngAddBalance(addr: string): Promise<unknown> {
    return this.extension.qng.addBalance(addr);
  }

  qngGetUTXOs(addr: string, limit: number, locked: boolean): Promise<unknown> {
    return this.extension.qng.getUTXOs(addr, limit, locked);
  }

  qngSendRawTransaction(signedRawTx: string, allowHighFee: boolean): Promise<unknown> {
    return this.extension.qng.sendRawTransaction(signedRawTx, allowHighFee);
  }

  /** Resolves with the primary-chain transaction hash once the bridge call is submitted. */
  async qngCrossSend(txid: string, idx: number, fee: bigint, sig: string): Promise<string> {
    if (!this.cross) throw new BridgeNotConfiguredError('cross-chain bridge is not configured');
    return this.cross.send({ txid, idx, fee, sig });
  }

  methods(): string[] {
    return Object.keys(this.handlers);
  }

  async dispatch(method: string, params: readonly unknown[]): Promise<unknown> {
    const handler = Object.hasOwn(this.handlers, method) ? this.handlers[method] : undefined;
    if (!handler) throw new MethodNotFoundError(`method ${method} not found`);
    this.logger?.debug?.('dispatch', { method });
    return handler(params);
  }
}

// ————————————————————————————————————————————————————————————————
// helpers
// ————————————————————————————————————————————————————————————————

function parseParams<T extends z.ZodTypeAny>(schema: T, params: readonly unknown[]): z.output<T> {
  const parsed = schema.safeParse(params);
  if (!parsed.success) {
    throw new InvalidParamsError(parsed.error.issues.map((i) => i.message).join('; '), {
      issues: parsed.error.issues,
    });
  }
  return parsed.data;
}

/** Maps a failure from `dispatch` onto a JSON-RPC error object. */
export function toJsonRpcError(err: unknown): JsonRpcError {
  if (err instanceof MethodNotFoundError) {
    return { code: jsonRpcCode.methodNotFound, message: err.message };
  }
  if (err instanceof InvalidParamsError) {
    return { code: jsonRpcCode.invalidParams, message: err.message };
  }
  if (err instanceof RpcError) {
    return { code: err.rpcCode, message: err.message };
  }
  if (err instanceof BackendError) {
    return { code: jsonRpcCode.serverError.default, message: err.message };
  }
  return { code: jsonRpcCode.internalError, message: 'internal error' };
}
