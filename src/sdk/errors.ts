export type BackendErrorCode =
  | 'TRANSPORT'
  | 'PROTOCOL'
  | 'RPC'
  | 'ENCODING'
  | 'SUBMISSION'
  | 'GAS_PRICE_UNAVAILABLE'
  | 'BRIDGE_NOT_CONFIGURED'
  | 'METHOD_NOT_FOUND'
  | 'INVALID_PARAMS'
  | 'CONFIG';

export abstract class BackendError extends Error {
  abstract code: BackendErrorCode;
  constructor(
    message?: string,
    public readonly details?: unknown,
  ) {
    super(message);
    this.name = new.target.name;
  }
}

/** The HTTP round trip failed or the body was not JSON. */
export class TransportError extends BackendError {
  code = 'TRANSPORT' as const;
}

/** The node answered with an envelope carrying neither a result nor an error. */
export class ProtocolError extends BackendError {
  code = 'PROTOCOL' as const;
}

/** The node reported an application error; `message` is the node's own text. */
export class RpcError extends BackendError {
  code = 'RPC' as const;
  constructor(
    message: string,
    public readonly rpcCode: number,
    details?: unknown,
  ) {
    super(message, details);
  }
}

export class EncodingError extends BackendError {
  code = 'ENCODING' as const;
}
export class SubmissionError extends BackendError {
  code = 'SUBMISSION' as const;
}
export class GasPriceUnavailableError extends BackendError {
  code = 'GAS_PRICE_UNAVAILABLE' as const;
}
export class BridgeNotConfiguredError extends BackendError {
  code = 'BRIDGE_NOT_CONFIGURED' as const;
}
export class MethodNotFoundError extends BackendError {
  code = 'METHOD_NOT_FOUND' as const;
}
export class InvalidParamsError extends BackendError {
  code = 'INVALID_PARAMS' as const;
}
export class ConfigError extends BackendError {
  code = 'CONFIG' as const;
}

export function causeOf(err: BackendError): unknown {
  const { details } = err;
  if (typeof details === 'object' && details !== null && 'cause' in details) {
    return details.cause;
  }
  return undefined;
}
