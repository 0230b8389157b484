export * from './sdk/errors';
export * from './sdk/logger';
export * from './sdk/qng';
export * from './sdk/providers';
export * from './sdk/bridge';
export * from './sdk/adapter/adapter';
export * from './sdk/wallet/wallet';
export * from './sdk/config';
export * from './sdk/backend';
