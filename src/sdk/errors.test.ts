import { describe, expect, it } from 'vitest';

import {
  BackendError,
  causeOf,
  EncodingError,
  ProtocolError,
  RpcError,
  SubmissionError,
  TransportError,
} from './errors';

describe('BackendError', () => {
  it.each([
    [new TransportError('t'), 'TransportError', 'TRANSPORT'],
    [new ProtocolError('p'), 'ProtocolError', 'PROTOCOL'],
    [new RpcError('r', 5), 'RpcError', 'RPC'],
    [new EncodingError('e'), 'EncodingError', 'ENCODING'],
    [new SubmissionError('s'), 'SubmissionError', 'SUBMISSION'],
  ])('%s carries its name and code', (err, name, code) => {
    expect(err).toBeInstanceOf(Error);
    expect(err).toBeInstanceOf(BackendError);
    expect(err.name).toBe(name);
    expect(err.code).toBe(code);
  });

  it('keeps the node error code on RpcError', () => {
    const err = new RpcError('bad address', -32000, { method: 'qng_getUTXOs' });
    expect(err.rpcCode).toBe(-32000);
    expect(err.details).toEqual({ method: 'qng_getUTXOs' });
  });

  it('causeOf reads the wrapped cause', () => {
    const cause = new Error('ECONNREFUSED');
    expect(causeOf(new TransportError('down', { cause }))).toBe(cause);
    expect(causeOf(new TransportError('down'))).toBeUndefined();
    expect(causeOf(new TransportError('down', 'text'))).toBeUndefined();
  });
});
