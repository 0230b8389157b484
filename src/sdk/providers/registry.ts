import type { JsonRpcProvider } from 'ethers';
import type { Logger } from '../logger';
import { getGasEstimateNoop, getGasEstimateWithProvider } from './gasEstimate';
import { getGasPricesNoop, getGasPricesWithProvider } from './gasPrices';
import { getUserOpReceiptNoop, getUserOpReceiptWithProvider } from './receipt';
import { getUserOpByHashNoop, getUserOpByHashWithProvider } from './userOpByHash';
import {
  DEFAULT_GAS_OVERHEAD,
  type Capabilities,
  type GasEstimator,
  type GasOverhead,
  type UserOperationFilter,
} from './types';

export interface CapabilitiesOptions {
  /** Primary-chain connection; without it every slot stays a no-op. */
  provider?: JsonRpcProvider;
  filter?: UserOperationFilter;
  estimator?: GasEstimator;
  chainId?: bigint;
  maxGasLimit?: bigint;
  overhead?: GasOverhead;
  tracer?: string;
  logger?: Logger;
}

export function createNoopCapabilities(): Capabilities {
  return Object.freeze({
    receipt: getUserOpReceiptNoop(),
    gasPrices: getGasPricesNoop(),
    gasEstimate: getGasEstimateNoop(),
    userOpByHash: getUserOpByHashNoop(),
  });
}

/**
 * Picks live or no-op per slot. A slot goes live only when the provider and the
 * subsystem it forwards to are both present. Meant to be called once at startup.
 */
export function createCapabilities(options: CapabilitiesOptions = {}): Capabilities {
  const { provider, filter, estimator, logger } = options;
  const noop = createNoopCapabilities();
  if (!provider) {
    logger?.info?.('no primary-chain provider configured, capabilities are no-op');
    return noop;
  }

  let gasEstimate = noop.gasEstimate;
  if (estimator) {
    if (options.chainId === undefined || options.maxGasLimit === undefined) {
      logger?.warn?.('gas estimator supplied without chainId/maxGasLimit, using no-op');
    } else {
      gasEstimate = getGasEstimateWithProvider(
        provider,
        options.overhead ?? DEFAULT_GAS_OVERHEAD,
        options.chainId,
        options.maxGasLimit,
        options.tracer,
        estimator,
      );
    }
  }

  const capabilities: Capabilities = {
    receipt: filter ? getUserOpReceiptWithProvider(provider, filter) : noop.receipt,
    gasPrices: getGasPricesWithProvider(provider),
    gasEstimate,
    userOpByHash: filter ? getUserOpByHashWithProvider(provider, filter) : noop.userOpByHash,
  };

  logger?.info?.('capabilities selected', {
    receipt: filter ? 'live' : 'noop',
    gasPrices: 'live',
    gasEstimate: gasEstimate === noop.gasEstimate ? 'noop' : 'live',
    userOpByHash: filter ? 'live' : 'noop',
  });

  return Object.freeze(capabilities);
}
