import type { QngMethod, QngWeb3Func } from '../types';

export interface QngExtension {
  readonly qng: {
    getBalance(addr: string, coinId: number): Promise<unknown>;
    addBalance(addr: string): Promise<unknown>;
    getUTXOs(addr: string, limit: number, locked: boolean): Promise<unknown>;
    sendRawTransaction(signedRawTx: string, allowHighFee: boolean): Promise<unknown>;
  };
}

export function setupQngExtension(invoke: QngWeb3Func): QngExtension {
  const call = (method: QngMethod, params: Parameters<QngWeb3Func>[1]) => invoke(method, params);

  return {
    qng: {
      getBalance: (addr, coinId) => call('qng_getBalance', [addr, coinId]),
      addBalance: (addr) => call('qng_addBalance', [addr]),
      getUTXOs: (addr, limit, locked) => call('qng_getUTXOs', [addr, limit, locked]),
      sendRawTransaction: (signedRawTx, allowHighFee) =>
        call('qng_sendRawTransaction', [signedRawTx, allowHighFee]),
    },
  };
}
