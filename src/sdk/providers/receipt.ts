import type { Provider } from 'ethers';
import type { UserOperationFilter, UserOpReceiptProvider } from './types';

export function getUserOpReceiptNoop(): UserOpReceiptProvider {
  return {
    getUserOpReceipt: async () => null,
  };
}

/**
 * Live receipt lookup: forwards to the log filter over `provider`. Filter errors surface
 * unchanged.
 */
export function getUserOpReceiptWithProvider(
  provider: Provider,
  filter: Pick<UserOperationFilter, 'getUserOperationReceipt'>,
): UserOpReceiptProvider {
  return {
    getUserOpReceipt: (hash, entryPoint, blkRange) =>
      filter.getUserOperationReceipt(provider, hash, entryPoint, blkRange),
  };
}
