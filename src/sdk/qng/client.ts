import { ProtocolError, RpcError, TransportError } from '../errors';
import type { Logger } from '../logger';
import { makeQngRequest, QngWeb3ResultSchema, type QngParams, type QngWeb3Func } from './types';

export interface QngWeb3Options {
  /** Shared fetch implementation; defaults to the global one. */
  fetch?: typeof fetch;
  logger?: Logger;
}

/**
 * Returns an invoker that POSTs one JSON-RPC 2.0 request per call to `rpcUrl` and
 * resolves the envelope's `result` untouched.
 */
export function qngWeb3Request(rpcUrl: string, options: QngWeb3Options = {}): QngWeb3Func {
  const doFetch = options.fetch ?? fetch;
  const logger = options.logger;

  return async (method: string, params: QngParams): Promise<unknown> => {
    const body = JSON.stringify(makeQngRequest(method, params));
    logger?.debug?.('qng request', { method });

    let payload: unknown;
    try {
      const res = await doFetch(rpcUrl, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body,
      });
      payload = await res.json();
    } catch (e) {
      logger?.warn?.('qng transport failed', { method, error: e });
      throw new TransportError(`${method}: transport failed`, { cause: e });
    }

    const parsed = QngWeb3ResultSchema.safeParse(payload);
    if (!parsed.success) {
      throw new ProtocolError('malformed response envelope', { method, issues: parsed.error.issues });
    }

    const { error, result } = parsed.data;
    if (error && error.code !== 0) {
      logger?.warn?.('qng rpc error', { method, code: error.code, message: error.message });
      throw new RpcError(error.message, error.code, { method });
    }
    if (result === undefined || result === null) {
      throw new ProtocolError('network request exception', { method });
    }
    return result;
  };
}
