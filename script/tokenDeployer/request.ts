import { z } from 'zod'

import { left, right, type Result } from './result'
import type {
  DeploymentResponse,
  DeploymentResult,
  IDeployerConfig,
  IDeploymentInput,
  IDeploymentRequest,
} from './types'

const deploymentInputSchema = z.object({
  name: z.string().trim().min(1),
  symbol: z.string().trim().min(1),
})

/**
 * Validates the caller's token details. The error side is a message fit to
 * hand back to the caller as is.
 */
export const parseDeploymentInput = (
  value: unknown
): Result<string, IDeploymentInput> => {
  if (typeof value !== 'object' || value === null || Array.isArray(value))
    return left('Invalid request body: expected an object')

  const parsed = deploymentInputSchema.safeParse(value)
  if (!parsed.success) return left('Missing token name or symbol')

  return right(parsed.data)
}

export const createDeploymentRequest = (
  input: IDeploymentInput,
  config: Pick<IDeployerConfig, 'feeRecipient' | 'migrationThreshold'>
): IDeploymentRequest =>
  Object.freeze({
    name: input.name,
    symbol: input.symbol,
    feeRecipient: config.feeRecipient,
    migrationThreshold: config.migrationThreshold,
  })

export const toDeploymentResponse = (
  result: DeploymentResult
): DeploymentResponse =>
  result.success
    ? { contractAddress: result.contractAddress }
    : { error: result.reason }
