import type { BaseWallet, ContractRunner, Provider } from 'ethers';
import type { Logger } from '../logger';
import type { CrossListener } from './events';

/** One cross-chain transfer request, already validated on the qng side. */
export interface QngCrossOp {
  txid: string;
  idx: number;
  fee: bigint;
  sig: string;
}

export interface CrossOverrides {
  chainId: bigint;
}

/** The slice of the bridging contract this package calls. */
export interface MeerChangeContract {
  export4337(
    txid: string,
    idx: number,
    fee: bigint,
    sig: string,
    overrides: CrossOverrides,
  ): Promise<{ hash: string }>;
}

export type MeerChangeFactory = (address: string, runner: ContractRunner) => MeerChangeContract;

export interface QngCrossSender {
  send(op: QngCrossOp): Promise<string>;
}

export interface MeerChangeBridgeConfig {
  /** Produces the signer; see `Wallet.getSigner`. */
  signer: { getSigner(provider: Provider): BaseWallet };
  provider: Provider;
  meerChangeAddress: string;
  chainId: bigint;
  contractFactory?: MeerChangeFactory;
  listeners?: CrossListener[];
  logger?: Logger;
}
