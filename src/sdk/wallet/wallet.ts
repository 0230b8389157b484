import { BaseWallet, HDNodeWallet, Wallet as EthersWallet, type Provider } from 'ethers';
import * as bip39 from 'bip39';
import { ConfigError } from '../errors';

export class Wallet {
  private readonly wallet: BaseWallet;
  private readonly address: string;

  private constructor(wallet: BaseWallet) {
    this.wallet = wallet;
    this.address = wallet.address;
  }

  public static fromPrivateKey(privateKey: string): Wallet {
    try {
      return new Wallet(new EthersWallet(privateKey));
    } catch (e) {
      throw new ConfigError('invalid private key', { cause: e });
    }
  }

  public static fromMnemonic(mnemonic: string, path?: string): Wallet {
    if (!bip39.validateMnemonic(mnemonic)) {
      throw new ConfigError('invalid mnemonic');
    }
    return new Wallet(HDNodeWallet.fromPhrase(mnemonic, undefined, path));
  }

  public static generateMnemonic(): string {
    return bip39.generateMnemonic(256);
  }

  public getAddress(): string {
    return this.address;
  }

  /** A signer bound to `provider`; the key never leaves this object otherwise. */
  public getSigner(provider: Provider): BaseWallet {
    return this.wallet.connect(provider);
  }
}
