import { ConfigError } from '../errors';
import { BackendConfigSchema, type BackendConfig } from './schema';

const ENV_KEYS = {
  qngRpcUrl: 'QNG_RPC_URL',
  ethRpcUrl: 'ETH_RPC_URL',
  chainId: 'CHAIN_ID',
  meerChangeAddress: 'MEERCHANGE_ADDRESS',
  privateKey: 'BUNDLER_PRIVATE_KEY',
  maxGasLimit: 'MAX_GAS_LIMIT',
  tracer: 'GAS_TRACER',
  logLevel: 'LOG_LEVEL',
} as const;

export function parseConfig(input: unknown): BackendConfig {
  const parsed = BackendConfigSchema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`);
    throw new ConfigError(`invalid backend config: ${issues.join('; ')}`, { issues });
  }
  return parsed.data;
}

/** Reads the config from environment variables; empty values count as unset. */
export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): BackendConfig {
  const raw: Record<string, string> = {};
  for (const [key, envKey] of Object.entries(ENV_KEYS)) {
    const value = env[envKey]?.trim();
    if (value) raw[key] = value;
  }
  return parseConfig(raw);
}
