import type { JsonRpcProvider, Log, Provider, TransactionReceipt } from 'ethers';

export type Address = string;
export type Hex = string;

/** ERC-4337 v0.6 user operation. */
export interface UserOperation {
  sender: Address;
  nonce: bigint;
  initCode: Hex;
  callData: Hex;
  callGasLimit: bigint;
  verificationGasLimit: bigint;
  preVerificationGas: bigint;
  maxFeePerGas: bigint;
  maxPriorityFeePerGas: bigint;
  paymasterAndData: Hex;
  signature: Hex;
}

export interface UserOperationReceipt {
  userOpHash: Hex;
  sender: Address;
  paymaster: Address;
  nonce: bigint;
  success: boolean;
  actualGasCost: bigint;
  actualGasUsed: bigint;
  from: Address;
  logs: readonly Log[];
  receipt: TransactionReceipt;
}

export interface HashLookupResult {
  userOperation: UserOperation;
  entryPoint: Address;
  blockNumber: bigint;
  blockHash: Hex;
  transactionHash: Hex;
}

export interface StateOverride {
  balance?: bigint;
  nonce?: bigint;
  code?: Hex;
  state?: Record<Hex, Hex>;
  stateDiff?: Record<Hex, Hex>;
}

export type StateOverrideSet = Record<Address, StateOverride>;

export interface GasPrices {
  maxFeePerGas: bigint;
  maxPriorityFeePerGas: bigint;
}

export interface GasEstimate {
  verificationGas: bigint;
  callGas: bigint;
}

/** Per-bundle and per-op gas overhead schedule used for preVerificationGas. */
export interface GasOverhead {
  readonly fixed: number;
  readonly perUserOp: number;
  readonly perUserOpWord: number;
  readonly zeroByte: number;
  readonly nonZeroByte: number;
  readonly minBundleSize: number;
  readonly warmStorageRead: number;
  readonly nonZeroValueCall: number;
  readonly callOpcode: number;
  readonly nonZeroValueStipend: number;
}

export const DEFAULT_GAS_OVERHEAD: GasOverhead = Object.freeze({
  fixed: 21_000,
  perUserOp: 18_300,
  perUserOpWord: 4,
  zeroByte: 4,
  nonZeroByte: 16,
  minBundleSize: 1,
  warmStorageRead: 100,
  nonZeroValueCall: 9_000,
  callOpcode: 700,
  nonZeroValueStipend: 2_300,
});

// ————————————————————————————————————————————————————————————————
// External subsystems the live providers forward to
// ————————————————————————————————————————————————————————————————

export interface UserOperationFilter {
  getUserOperationReceipt(
    provider: Provider,
    hash: Hex,
    entryPoint: Address,
    blkRange: bigint,
  ): Promise<UserOperationReceipt | null>;
  getUserOperationByHash(
    provider: Provider,
    hash: Hex,
    entryPoint: Address,
    chainId: bigint,
    blkRange: bigint,
  ): Promise<HashLookupResult | null>;
}

export interface EstimateInput {
  rpc: JsonRpcProvider;
  entryPoint: Address;
  op: UserOperation;
  sos: StateOverrideSet;
  ov: GasOverhead;
  chainId: bigint;
  maxGasLimit: bigint;
  tracer?: string;
}

export interface GasEstimator {
  estimateGas(input: EstimateInput): Promise<GasEstimate>;
}

// ————————————————————————————————————————————————————————————————
// Capability slots
// ————————————————————————————————————————————————————————————————

export interface UserOpReceiptProvider {
  getUserOpReceipt(
    hash: Hex,
    entryPoint: Address,
    blkRange: bigint,
  ): Promise<UserOperationReceipt | null>;
}

export interface GasPriceProvider {
  getGasPrices(): Promise<GasPrices>;
}

export interface GasEstimateProvider {
  getGasEstimate(entryPoint: Address, op: UserOperation, sos: StateOverrideSet): Promise<GasEstimate>;
}

export interface UserOpByHashProvider {
  getUserOpByHash(
    hash: Hex,
    entryPoint: Address,
    chainId: bigint,
    blkRange: bigint,
  ): Promise<HashLookupResult | null>;
}

export interface Capabilities {
  readonly receipt: UserOpReceiptProvider;
  readonly gasPrices: GasPriceProvider;
  readonly gasEstimate: GasEstimateProvider;
  readonly userOpByHash: UserOpByHashProvider;
}
