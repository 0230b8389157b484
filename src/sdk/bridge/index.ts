export * from './abi';
export * from './bridge';
export * from './events';
export * from './types';
