export * from './types';
export * from './receipt';
export * from './gasPrices';
export * from './gasEstimate';
export * from './userOpByHash';
export * from './registry';
