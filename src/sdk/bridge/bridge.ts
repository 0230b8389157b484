import { randomUUID } from 'node:crypto';
import { fromHex } from '@cosmjs/encoding';
import { Contract, zeroPadValue, type ContractRunner } from 'ethers';

import { BackendError, EncodingError, SubmissionError } from '../errors';
import type { Logger } from '../logger';
import { MEERCHANGE_ABI } from './abi';
import type { CrossEvent, CrossListener } from './events';
import type {
  MeerChangeBridgeConfig,
  MeerChangeContract,
  MeerChangeFactory,
  QngCrossOp,
  QngCrossSender,
} from './types';

const MAX_UINT32 = 0xffff_ffff;
const MAX_UINT64 = (1n << 64n) - 1n;

// ———————————————————————————————————————————————————————————————————————————

export const connectMeerChange: MeerChangeFactory = (address, runner: ContractRunner) => {
  const contract = new Contract(address, MEERCHANGE_ABI, runner);
  const export4337 = contract.getFunction('export4337');
  return {
    export4337: (txid, idx, fee, sig, overrides) => export4337.send(txid, idx, fee, sig, overrides),
  };
};

/**
 * Submits qng operations to the primary chain through the MeerChange contract's
 * `export4337` method. A resolved hash means the node accepted the transaction, not that
 * it was mined.
 */
export class MeerChangeBridge implements QngCrossSender {
  private readonly config: MeerChangeBridgeConfig;
  private readonly contractFactory: MeerChangeFactory;
  private readonly logger?: Logger;
  private listeners = new Set<CrossListener>();

  constructor(config: MeerChangeBridgeConfig) {
    this.config = config;
    this.contractFactory = config.contractFactory ?? connectMeerChange;
    this.logger = config.logger;
    for (const listener of config.listeners ?? []) this.listeners.add(listener);
  }

  on(listener: CrossListener) {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  async send(op: QngCrossOp): Promise<string> {
    const cid = newCorrelationId();

    let txid: string;
    try {
      txid = encodeTxid(op.txid);
      checkRanges(op);
    } catch (e) {
      const err = e instanceof BackendError ? e : new EncodingError('invalid cross op', { cause: e });
      this.dispatch({ type: 'onFailed', op, error: err, ts: Date.now(), correlationId: cid });
      throw err;
    }

    this.dispatch({ type: 'onSubmitting', op, ts: Date.now(), correlationId: cid });

    let hash: string;
    try {
      const signer = this.config.signer.getSigner(this.config.provider);
      const contract: MeerChangeContract = this.contractFactory(this.config.meerChangeAddress, signer);
      const tx = await contract.export4337(txid, op.idx, op.fee, op.sig, {
        chainId: this.config.chainId,
      });
      hash = tx.hash;
    } catch (e) {
      const err = new SubmissionError('export4337 submission failed', { cause: e, txid });
      this.logger?.warn?.('cross send failed', { txid, correlationId: cid, error: e });
      this.dispatch({ type: 'onFailed', op, error: err, ts: Date.now(), correlationId: cid });
      throw err;
    }

    this.logger?.info?.('cross send submitted', { txid, txHash: hash, correlationId: cid });
    this.dispatch({ type: 'onSubmitted', op, txHash: hash, ts: Date.now(), correlationId: cid });
    return hash;
  }

  private dispatch(evt: CrossEvent) {
    for (const listener of this.listeners) {
      try {
        listener(evt);
      } catch (e) {
        this.logger?.warn?.('listener threw', e);
      }
    }
  }
}

// ————————————————————————————————————————————————————————————————
// helpers
// ————————————————————————————————————————————————————————————————

/** Hex txid (optional 0x) to a 0x-prefixed bytes32, left-padded like a hash. */
export function encodeTxid(txid: string): string {
  const hex = txid.startsWith('0x') || txid.startsWith('0X') ? txid.slice(2) : txid;
  if (hex.length === 0) throw new EncodingError('txid is empty');

  let bytes: Uint8Array;
  try {
    bytes = fromHex(hex);
  } catch (e) {
    throw new EncodingError(`txid is not valid hex: ${txid}`, { cause: e });
  }
  if (bytes.length > 32) {
    throw new EncodingError(`txid is ${bytes.length} bytes, expected at most 32`);
  }
  return zeroPadValue(bytes, 32);
}

function checkRanges(op: QngCrossOp) {
  if (!Number.isInteger(op.idx) || op.idx < 0 || op.idx > MAX_UINT32) {
    throw new EncodingError(`idx out of uint32 range: ${op.idx}`);
  }
  if (op.fee < 0n || op.fee > MAX_UINT64) {
    throw new EncodingError(`fee out of uint64 range: ${op.fee}`);
  }
}

function newCorrelationId(): string {
  return randomUUID();
}
