import { JsonRpcProvider } from 'ethers';

import { QngRpcAdapter } from './adapter/adapter';
import { MeerChangeBridge } from './bridge/bridge';
import type { MeerChangeFactory } from './bridge/types';
import type { BackendConfig } from './config/schema';
import { createLogger, type Logger } from './logger';
import { createCapabilities } from './providers/registry';
import type { Capabilities, GasEstimator, GasOverhead, UserOperationFilter } from './providers/types';
import { qngWeb3Request } from './qng/client';
import type { QngWeb3Func } from './qng/types';
import { Wallet } from './wallet/wallet';

export interface BackendCollaborators {
  filter?: UserOperationFilter;
  estimator?: GasEstimator;
  overhead?: GasOverhead;
  /** Overrides the provider that would be built from `ethRpcUrl`. */
  provider?: JsonRpcProvider;
  fetch?: typeof fetch;
  contractFactory?: MeerChangeFactory;
  logger?: Logger;
}

export interface Backends {
  readonly invoke: QngWeb3Func;
  readonly provider?: JsonRpcProvider;
  readonly capabilities: Capabilities;
  readonly cross?: MeerChangeBridge;
  readonly adapter: QngRpcAdapter;
}

/** Builds every backend once, at process start. Nothing here is swapped afterwards. */
export function createBackends(config: BackendConfig, collaborators: BackendCollaborators = {}): Backends {
  const logger = collaborators.logger ?? createLogger('qng-backends', { level: config.logLevel });

  const invoke = qngWeb3Request(config.qngRpcUrl, { fetch: collaborators.fetch, logger });

  const provider =
    collaborators.provider ??
    (config.ethRpcUrl
      ? new JsonRpcProvider(config.ethRpcUrl, config.chainId, { staticNetwork: true })
      : undefined);

  const capabilities = createCapabilities({
    provider,
    filter: collaborators.filter,
    estimator: collaborators.estimator,
    overhead: collaborators.overhead,
    chainId: config.chainId,
    maxGasLimit: config.maxGasLimit,
    tracer: config.tracer,
    logger,
  });

  let cross: MeerChangeBridge | undefined;
  if (config.meerChangeAddress && config.privateKey && provider) {
    cross = new MeerChangeBridge({
      signer: Wallet.fromPrivateKey(config.privateKey),
      provider,
      meerChangeAddress: config.meerChangeAddress,
      chainId: config.chainId,
      contractFactory: collaborators.contractFactory,
      logger,
    });
  } else {
    logger.info('cross-chain bridge disabled');
  }

  const adapter = new QngRpcAdapter({ invoke, cross, logger });

  return Object.freeze({ invoke, provider, capabilities, cross, adapter });
}
