import { encodeDeployData, type Address, type Hex } from 'viem'

import { DEFAULT_GAS_LIMIT_BUFFER } from './constants'
import { TransactionBuildError, describeError } from './errors'
import type {
  ConstructorArgs,
  IContractArtifact,
  IDeploymentRequest,
  IUnsignedTransaction,
} from './types'

export interface IBuildTransactionParams {
  artifact: IContractArtifact
  from: Address
  constructorArgs: ConstructorArgs
  nonce: number
  gasLimit: bigint
  gasPrice: bigint
  chainId: number
}

/**
 * Orders the request fields the way the token constructor declares them:
 * name, symbol, migrationThreshold, feeRecipient
 */
export const buildConstructorArgs = (
  request: IDeploymentRequest
): ConstructorArgs => [
  request.name,
  request.symbol,
  request.migrationThreshold,
  request.feeRecipient,
]

export const applyGasBuffer = (
  estimate: bigint,
  buffer: bigint = DEFAULT_GAS_LIMIT_BUFFER
): bigint => estimate + buffer

/**
 * Bytecode followed by the ABI-encoded constructor arguments
 */
export const encodeDeploymentData = (
  artifact: IContractArtifact,
  constructorArgs: ConstructorArgs
): Hex => {
  try {
    return encodeDeployData({
      abi: artifact.abi,
      bytecode: artifact.bytecode,
      args: constructorArgs,
    })
  } catch (error) {
    throw new TransactionBuildError(
      `Could not encode constructor arguments against the artifact ABI: ${describeError(
        error
      )}`
    )
  }
}

/**
 * Assembles an unsigned contract-creation transaction. Pure: identical inputs
 * always produce the identical payload. `gasLimit` is used as given, so any
 * safety buffer must already be applied.
 */
export const buildDeploymentTransaction = (
  params: IBuildTransactionParams
): IUnsignedTransaction => ({
  from: params.from,
  nonce: params.nonce,
  gasLimit: params.gasLimit,
  gasPrice: params.gasPrice,
  chainId: params.chainId,
  data: encodeDeploymentData(params.artifact, params.constructorArgs),
})
