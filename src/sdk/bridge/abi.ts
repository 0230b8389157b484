export const MEERCHANGE_ABI = [
  'function export4337(bytes32 txid, uint32 idx, uint64 fee, string sig)',
] as const;
