import type { JsonRpcProvider } from 'ethers';
import type { GasEstimate, GasEstimateProvider, GasEstimator, GasOverhead } from './types';

export function getGasEstimateNoop(): GasEstimateProvider {
  return {
    getGasEstimate: async (): Promise<GasEstimate> => ({ verificationGas: 0n, callGas: 0n }),
  };
}

/**
 * Live estimate of verificationGasLimit and callGasLimit. The execution environment
 * (overhead schedule, chain, gas ceiling, tracer) is fixed here once; each call only
 * supplies the op and its state overrides.
 */
export function getGasEstimateWithProvider(
  rpc: JsonRpcProvider,
  ov: GasOverhead,
  chainId: bigint,
  maxGasLimit: bigint,
  tracer: string | undefined,
  estimator: GasEstimator,
): GasEstimateProvider {
  return {
    getGasEstimate: (entryPoint, op, sos) =>
      estimator.estimateGas({
        rpc,
        entryPoint,
        op,
        sos,
        ov,
        chainId,
        maxGasLimit,
        tracer,
      }),
  };
}
