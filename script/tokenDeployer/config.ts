import { getAddress, isAddress, parseEther, parseGwei } from 'viem'
import { z } from 'zod'

import {
  DEFAULT_GAS_LIMIT_BUFFER,
  DEFAULT_MIGRATION_THRESHOLD_ETH,
  RECEIPT_POLLING_INTERVAL_MS,
  RECEIPT_TIMEOUT_MS,
  RPC_RETRY_COUNT,
  RPC_RETRY_DELAY_MS,
  RPC_TIMEOUT_MS,
} from './constants'
import { ConfigurationError } from './errors'
import type { IDeployerConfig } from './types'

const DECIMAL_PATTERN = /^\d+(\.\d+)?$/

// Unset and blank values both mean "not configured"
const optionalSetting = z
  .string()
  .optional()
  .transform((value) => value?.trim() || undefined)

const integerSetting = (fallback: number, min: number) =>
  z
    .string()
    .trim()
    .default(String(fallback))
    .pipe(z.coerce.number().int().min(min))

const decimalSetting = (fallback: string) =>
  z
    .string()
    .trim()
    .default(fallback)
    .refine(
      (value) => DECIMAL_PATTERN.test(value),
      'must be a non-negative decimal amount'
    )

const envSchema = z.object({
  RPC_URL: z.string({ required_error: 'RPC URL not set' }).trim().url(),
  PRIVATE_KEY: optionalSetting,
  CONTRACT_ARTIFACT_PATH: optionalSetting,
  FEE_RECIPIENT_ADDRESS: z
    .string({ required_error: 'Fee recipient address not set' })
    .trim()
    .refine(
      (value) => isAddress(value, { strict: false }),
      'must be a valid EVM address'
    )
    .transform((value) => getAddress(value)),
  MIGRATION_THRESHOLD_ETH: decimalSetting(
    DEFAULT_MIGRATION_THRESHOLD_ETH
  ).transform((value) => parseEther(value)),
  RECEIPT_TIMEOUT_MS: integerSetting(RECEIPT_TIMEOUT_MS, 1),
  GAS_LIMIT_BUFFER: z
    .string()
    .trim()
    .default(DEFAULT_GAS_LIMIT_BUFFER.toString())
    .refine((value) => /^\d+$/.test(value), 'must be a whole number of gas')
    .transform((value) => BigInt(value)),
  FALLBACK_GAS_PRICE_GWEI: decimalSetting('1').transform((value) =>
    parseGwei(value)
  ),
  RPC_TIMEOUT_MS: integerSetting(RPC_TIMEOUT_MS, 1),
  RPC_RETRY_COUNT: integerSetting(RPC_RETRY_COUNT, 0),
  RPC_RETRY_DELAY_MS: integerSetting(RPC_RETRY_DELAY_MS, 0),
  RECEIPT_POLLING_INTERVAL_MS: integerSetting(RECEIPT_POLLING_INTERVAL_MS, 1),
})

/**
 * Reads the deployer configuration from the environment.
 *
 * A missing key or artifact path is not an error here: the process still
 * starts and each deployment fails with a configuration reason instead.
 * @throws {ConfigurationError} naming every missing or invalid variable
 */
export const loadDeployerConfig = (
  env: NodeJS.ProcessEnv = process.env
): IDeployerConfig => {
  const parsed = envSchema.safeParse(env)
  if (!parsed.success) {
    const fields = [
      ...new Set(parsed.error.issues.map((issue) => String(issue.path[0]))),
    ]
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ')
    throw new ConfigurationError(
      `Invalid deployer configuration: ${details}`,
      fields
    )
  }

  const settings = parsed.data
  return {
    rpc: {
      rpcUrl: settings.RPC_URL,
      retryCount: settings.RPC_RETRY_COUNT,
      retryDelayMs: settings.RPC_RETRY_DELAY_MS,
      timeoutMs: settings.RPC_TIMEOUT_MS,
      pollingIntervalMs: settings.RECEIPT_POLLING_INTERVAL_MS,
    },
    privateKey: settings.PRIVATE_KEY,
    artifactPath: settings.CONTRACT_ARTIFACT_PATH,
    feeRecipient: settings.FEE_RECIPIENT_ADDRESS,
    migrationThreshold: settings.MIGRATION_THRESHOLD_ETH,
    orchestrator: {
      gasLimitBuffer: settings.GAS_LIMIT_BUFFER,
      fallbackGasPrice: settings.FALLBACK_GAS_PRICE_GWEI,
      receiptTimeoutMs: settings.RECEIPT_TIMEOUT_MS,
    },
  }
}
