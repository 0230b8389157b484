import type { Provider } from 'ethers';
import { GasPriceUnavailableError } from '../errors';
import type { GasPriceProvider, GasPrices } from './types';

export function getGasPricesNoop(): GasPriceProvider {
  return {
    getGasPrices: async (): Promise<GasPrices> => ({
      maxFeePerGas: 0n,
      maxPriorityFeePerGas: 0n,
    }),
  };
}

/**
 * Live gas prices straight from the node's fee data. Nodes without EIP-1559 support only
 * report `gasPrice`, which is then used for both fields.
 */
export function getGasPricesWithProvider(provider: Pick<Provider, 'getFeeData'>): GasPriceProvider {
  return {
    getGasPrices: async (): Promise<GasPrices> => {
      const { maxFeePerGas, maxPriorityFeePerGas, gasPrice } = await provider.getFeeData();
      if (maxFeePerGas !== null && maxPriorityFeePerGas !== null) {
        return { maxFeePerGas, maxPriorityFeePerGas };
      }
      if (gasPrice !== null) {
        return { maxFeePerGas: gasPrice, maxPriorityFeePerGas: gasPrice };
      }
      throw new GasPriceUnavailableError('node returned no fee data');
    },
  };
}
