import type { Provider } from 'ethers';
import type { UserOperationFilter, UserOpByHashProvider } from './types';

export function getUserOpByHashNoop(): UserOpByHashProvider {
  return {
    getUserOpByHash: async () => null,
  };
}

export function getUserOpByHashWithProvider(
  provider: Provider,
  filter: Pick<UserOperationFilter, 'getUserOperationByHash'>,
): UserOpByHashProvider {
  return {
    getUserOpByHash: (hash, entryPoint, chainId, blkRange) =>
      filter.getUserOperationByHash(provider, hash, entryPoint, chainId, blkRange),
  };
}
