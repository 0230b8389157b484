import { describe, expect, it } from 'vitest';

import { ConfigError } from '../errors';
import { loadConfigFromEnv, parseConfig } from './loader';

const ADDRESS = '0x' + '42'.repeat(20);
const KEY = '0x' + '11'.repeat(32);

describe('loadConfigFromEnv', () => {
  it('reads every variable', () => {
    const cfg = loadConfigFromEnv({
      QNG_RPC_URL: 'http://127.0.0.1:18131',
      ETH_RPC_URL: 'http://127.0.0.1:8545',
      CHAIN_ID: '813',
      MEERCHANGE_ADDRESS: ADDRESS,
      BUNDLER_PRIVATE_KEY: KEY,
      MAX_GAS_LIMIT: '25000000',
      GAS_TRACER: 'bundlerCollectorTracer',
      LOG_LEVEL: 'debug',
    });

    expect(cfg).toEqual({
      qngRpcUrl: 'http://127.0.0.1:18131',
      ethRpcUrl: 'http://127.0.0.1:8545',
      chainId: 813n,
      meerChangeAddress: ADDRESS,
      privateKey: KEY,
      maxGasLimit: 25_000_000n,
      tracer: 'bundlerCollectorTracer',
      logLevel: 'debug',
    });
  });

  it('applies defaults and treats blank values as unset', () => {
    const cfg = loadConfigFromEnv({
      QNG_RPC_URL: 'http://127.0.0.1:18131',
      CHAIN_ID: '813',
      GAS_TRACER: '  ',
    });

    expect(cfg).toEqual({
      qngRpcUrl: 'http://127.0.0.1:18131',
      chainId: 813n,
      maxGasLimit: 30_000_000n,
      logLevel: 'info',
    });
  });

  it('names the missing variable', () => {
    expect(() => loadConfigFromEnv({ CHAIN_ID: '813' })).toThrow(
      'invalid backend config: qngRpcUrl: Required',
    );
  });
});

describe('parseConfig', () => {
  it('requires the key and node url when the bridge contract is set', () => {
    const run = () =>
      parseConfig({ qngRpcUrl: 'http://127.0.0.1:18131', chainId: 813, meerChangeAddress: ADDRESS });

    expect(run).toThrow(ConfigError);
    expect(run).toThrow(
      'invalid backend config: privateKey: privateKey is required when meerChangeAddress is set; ' +
        'ethRpcUrl: ethRpcUrl is required when meerChangeAddress is set',
    );
  });

  it('rejects a malformed contract address', () => {
    expect(() =>
      parseConfig({ qngRpcUrl: 'http://127.0.0.1:18131', chainId: 813, meerChangeAddress: '0x1234' }),
    ).toThrow('meerChangeAddress: meerChangeAddress is not an EVM address');
  });

  it('rejects a non-positive chain id', () => {
    expect(() => parseConfig({ qngRpcUrl: 'http://127.0.0.1:18131', chainId: '0' })).toThrow(
      'chainId: chainId must be positive',
    );
  });

  it('exposes the zod issues on the error', () => {
    const err = (() => {
      try {
        parseConfig({ qngRpcUrl: 'not a url', chainId: 1 });
      } catch (e) {
        return e;
      }
    })();

    expect(err).toBeInstanceOf(ConfigError);
    expect(err).toMatchObject({ code: 'CONFIG', details: { issues: ['qngRpcUrl: Invalid url'] } });
  });
});
