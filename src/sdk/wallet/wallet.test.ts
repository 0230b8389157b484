import * as bip39 from 'bip39';
import { JsonRpcProvider, Wallet as EthersWallet } from 'ethers';
import { afterAll, describe, expect, it } from 'vitest';

import { ConfigError } from '../errors';
import { Wallet } from './wallet';

const KEY = '0x' + '11'.repeat(32);

const provider = new JsonRpcProvider('http://127.0.0.1:8545', 813n, { staticNetwork: true });

afterAll(() => {
  provider.destroy();
});

describe('Wallet', () => {
  it('derives the address from a private key', () => {
    expect(Wallet.fromPrivateKey(KEY).getAddress()).toBe(new EthersWallet(KEY).address);
  });

  it('rejects a malformed private key with a ConfigError', () => {
    expect(() => Wallet.fromPrivateKey('0x1234')).toThrow(ConfigError);
  });

  it('generates 24-word mnemonics that round-trip deterministically', () => {
    const mnemonic = Wallet.generateMnemonic();

    expect(mnemonic.split(' ')).toHaveLength(24);
    expect(bip39.validateMnemonic(mnemonic)).toBe(true);
    expect(Wallet.fromMnemonic(mnemonic).getAddress()).toBe(
      Wallet.fromMnemonic(mnemonic).getAddress(),
    );
  });

  it('rejects an invalid mnemonic', () => {
    expect(() => Wallet.fromMnemonic('not a real phrase')).toThrow(ConfigError);
  });

  it('hands out signers bound to the given provider', () => {
    const wallet = Wallet.fromPrivateKey(KEY);
    const signer = wallet.getSigner(provider);

    expect(signer.provider).toBe(provider);
    expect(signer.address).toBe(wallet.getAddress());
  });
});
