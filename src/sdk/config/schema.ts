import { isAddress } from 'ethers';
import { z } from 'zod';

const BigIntLike = z
  .union([z.bigint(), z.number().int(), z.string().regex(/^\d+$/, 'expected a decimal integer')])
  .transform((v) => BigInt(v));

export const LogLevelSchema = z
  .enum(['silly', 'trace', 'debug', 'info', 'warn', 'error', 'fatal'])
  .default('info');

export const BackendConfigSchema = z
  .object({
    qngRpcUrl: z.string().url(),
    ethRpcUrl: z.string().url().optional(),
    chainId: BigIntLike.refine((v) => v > 0n, 'chainId must be positive'),
    meerChangeAddress: z
      .string()
      .refine((v) => isAddress(v), 'meerChangeAddress is not an EVM address')
      .optional(),
    privateKey: z
      .string()
      .regex(/^(0x)?[0-9a-fA-F]{64}$/, 'privateKey must be 32 bytes of hex')
      .optional(),
    maxGasLimit: BigIntLike.default(30_000_000n),
    tracer: z.string().min(1).optional(),
    logLevel: LogLevelSchema,
  })
  .superRefine((cfg, ctx) => {
    if (cfg.meerChangeAddress === undefined) return;
    if (cfg.privateKey === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['privateKey'],
        message: 'privateKey is required when meerChangeAddress is set',
      });
    }
    if (cfg.ethRpcUrl === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['ethRpcUrl'],
        message: 'ethRpcUrl is required when meerChangeAddress is set',
      });
    }
  });

export type BackendConfigInput = z.input<typeof BackendConfigSchema>;
export type BackendConfig = z.output<typeof BackendConfigSchema>;
