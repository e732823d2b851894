import { consola, type ConsolaInstance } from 'consola'
import { formatGwei, type Hash, type Hex } from 'viem'

import { artifactExists, loadArtifact } from './artifact'
import {
  DEFAULT_FALLBACK_GAS_PRICE,
  DEFAULT_GAS_LIMIT_BUFFER,
  LOG_TAG,
  RECEIPT_TIMEOUT_MS,
} from './constants'
import { ChainClientError, describeError } from './errors'
import { deriveSigningIdentity } from './identity'
import { isLeft, type Result } from './result'
import {
  applyGasBuffer,
  buildConstructorArgs,
  buildDeploymentTransaction,
  encodeDeploymentData,
} from './transaction'
import type {
  DeploymentFailureKind,
  DeploymentResult,
  DeploymentStage,
  IChainClient,
  IDeploymentFailure,
  IDeploymentReceipt,
  IDeploymentRequest,
  IOrchestratorOptions,
  ISignedTransaction,
  IUnsignedTransaction,
} from './types'

export interface IDeploymentOrchestratorParams {
  chainClient: IChainClient
  privateKey?: string
  artifactPath?: string
  options?: Partial<IOrchestratorOptions>
  logger?: ConsolaInstance
}

export const DEFAULT_ORCHESTRATOR_OPTIONS: IOrchestratorOptions = {
  gasLimitBuffer: DEFAULT_GAS_LIMIT_BUFFER,
  fallbackGasPrice: DEFAULT_FALLBACK_GAS_PRICE,
  receiptTimeoutMs: RECEIPT_TIMEOUT_MS,
}

const failure = (
  stage: DeploymentStage,
  kind: DeploymentFailureKind,
  reason: string,
  transactionHash?: Hash
): IDeploymentFailure => ({
  success: false,
  stage,
  kind,
  reason,
  ...(transactionHash ? { transactionHash } : {}),
})

const chainFailure = (
  stage: DeploymentStage,
  action: string,
  error: unknown,
  transactionHash?: Hash
): IDeploymentFailure => {
  const kind =
    error instanceof ChainClientError ? error.code : ('RpcError' as const)
  return failure(
    stage,
    kind,
    `Error ${action}: ${describeError(error)}`,
    transactionHash
  )
}

/**
 * Drives one token deployment from key and artifact to a mined contract.
 *
 * Each call is a single attempt: nothing is retried, resubmitted or repriced.
 * Every failure is mapped to a stage-tagged result where it happens, so the
 * caller never sees a raw node error or anything derived from the key.
 * Concurrent calls are independent, but two calls signing with the same key
 * race on the nonce.
 */
export class DeploymentOrchestrator {
  private readonly chainClient: IChainClient
  private readonly privateKey?: string
  private readonly artifactPath?: string
  private readonly options: IOrchestratorOptions
  private readonly logger: ConsolaInstance

  public constructor(params: IDeploymentOrchestratorParams) {
    this.chainClient = params.chainClient
    this.privateKey = params.privateKey?.trim() || undefined
    this.artifactPath = params.artifactPath?.trim() || undefined
    this.options = { ...DEFAULT_ORCHESTRATOR_OPTIONS, ...params.options }
    this.logger = params.logger ?? consola.withTag(LOG_TAG)
  }

  public async deploy(request: IDeploymentRequest): Promise<DeploymentResult> {
    const result = await this.run(request)
    if (!result.success)
      this.logger.error(
        `Deployment of ${request.symbol} failed after ${result.stage} (${result.kind}): ${result.reason}`
      )
    return result
  }

  private async run(request: IDeploymentRequest): Promise<DeploymentResult> {
    const { chainClient, logger, options } = this

    // Init: configuration is checked before the node is touched
    if (!this.privateKey)
      return failure(
        'Init',
        'ConfigurationError',
        'Private key not configured in environment variables.'
      )
    if (!this.artifactPath)
      return failure(
        'Init',
        'ConfigurationError',
        'Contract artifact path not configured in environment variables.'
      )
    let connected: boolean
    try {
      connected = await chainClient.isConnected()
    } catch (error) {
      return chainFailure('Init', 'checking connectivity', error)
    }
    if (!connected)
      return failure(
        'Init',
        'ConfigurationError',
        'Deployer is not connected to the network. Check the RPC endpoint.'
      )

    const artifactPath = this.artifactPath
    if (!artifactExists(artifactPath))
      return failure(
        'Init',
        'ArtifactNotFound',
        `Contract artifact file not found at ${artifactPath}. Ensure the contract is compiled and the path is correct.`
      )

    const identityResult = deriveSigningIdentity(this.privateKey)
    if (isLeft(identityResult))
      return failure('Init', 'InvalidKey', identityResult.error.message)
    const identity = identityResult.data
    logger.info(
      `Deploying ${request.name} (${request.symbol}) from ${identity.address}`
    )

    // IdentityReady
    const artifactResult = await loadArtifact(artifactPath)
    if (isLeft(artifactResult))
      return failure(
        'IdentityReady',
        artifactResult.error.code === 'NotFound'
          ? 'ArtifactNotFound'
          : 'ArtifactMalformed',
        artifactResult.error.message
      )
    const artifact = artifactResult.data
    const constructorArgs = buildConstructorArgs(request)

    let deployData: Hex
    try {
      deployData = encodeDeploymentData(artifact, constructorArgs)
    } catch (error) {
      return failure(
        'IdentityReady',
        'TransactionBuildError',
        describeError(error)
      )
    }

    // ArtifactReady
    let nonce: number
    try {
      nonce = await chainClient.getNonce(identity.address)
    } catch (error) {
      return chainFailure('ArtifactReady', 'fetching nonce', error)
    }

    // NonceReady
    let gasEstimate: bigint
    try {
      gasEstimate = await chainClient.estimateGas({
        from: identity.address,
        data: deployData,
      })
    } catch (error) {
      return failure(
        'NonceReady',
        'GasEstimationFailure',
        `Error estimating gas: ${describeError(
          error
        )}.${await this.describeCurrentGasPrice()} Check the deployer balance and constructor args.`
      )
    }
    logger.info(`Gas estimate: ${gasEstimate}`)

    // GasEstimated
    let gasPrice: bigint
    try {
      gasPrice = await chainClient.getGasPrice()
    } catch (error) {
      gasPrice = options.fallbackGasPrice
      logger.warn(
        `Error fetching gas price, using fallback of ${formatGwei(
          gasPrice
        )} gwei: ${describeError(error)}`
      )
    }

    // PriceReady
    let chainId: number
    try {
      chainId = await chainClient.getChainId()
    } catch (error) {
      return chainFailure('PriceReady', 'fetching chain id', error)
    }

    let transaction: IUnsignedTransaction
    try {
      transaction = buildDeploymentTransaction({
        artifact,
        from: identity.address,
        constructorArgs,
        nonce,
        gasLimit: applyGasBuffer(gasEstimate, options.gasLimitBuffer),
        gasPrice,
        chainId,
      })
    } catch (error) {
      return failure(
        'PriceReady',
        'TransactionBuildError',
        describeError(error)
      )
    }
    logger.info(
      `Transaction built: nonce ${transaction.nonce}, gas limit ${
        transaction.gasLimit
      }, gas price ${formatGwei(transaction.gasPrice)} gwei, chain ${
        transaction.chainId
      }`
    )

    // Built
    let signed: ISignedTransaction
    try {
      signed = await identity.sign(transaction)
    } catch (error) {
      return failure('Built', 'SigningError', describeError(error))
    }

    // Signed
    let transactionHash: Hash
    try {
      transactionHash = await chainClient.submit(signed)
    } catch (error) {
      return chainFailure('Signed', 'sending transaction', error, signed.hash)
    }
    logger.info(`Transaction sent: ${transactionHash}`)

    // Submitted
    let receiptResult: Result<ChainClientError, IDeploymentReceipt>
    try {
      receiptResult = await chainClient.waitForReceipt(
        transactionHash,
        options.receiptTimeoutMs
      )
    } catch (error) {
      return chainFailure(
        'Submitted',
        'waiting for receipt',
        error,
        transactionHash
      )
    }
    if (isLeft(receiptResult))
      return failure(
        'Submitted',
        'SubmissionTimeout',
        `Transaction ${transactionHash} was not mined within ${options.receiptTimeoutMs}ms. It may still be mined later; check the block explorer before deploying again.`,
        transactionHash
      )

    const receipt = receiptResult.data
    if (receipt.status !== 'success') {
      await this.logRevertDetails(transactionHash)
      return failure(
        'Submitted',
        'OnChainRevert',
        `Transaction ${transactionHash} was mined in block ${receipt.blockNumber} but reverted during deployment. Check the block explorer.`,
        transactionHash
      )
    }

    if (!receipt.contractAddress)
      return failure(
        'Submitted',
        'RpcError',
        `Receipt for ${transactionHash} reports success but no contract address.`,
        transactionHash
      )

    // Confirmed
    logger.success(`Contract deployed at address: ${receipt.contractAddress}`)
    return {
      success: true,
      contractAddress: receipt.contractAddress,
      transactionHash,
    }
  }

  /**
   * Current gas price for the estimation-failure message. Best effort: when
   * the lookup fails too, an empty string is returned and the primary reason
   * stands on its own.
   */
  private async describeCurrentGasPrice(): Promise<string> {
    try {
      const price = await this.chainClient.getGasPrice()
      this.logger.info(`Current estimated gas price: ${formatGwei(price)} gwei`)
      return ` Current gas price: ${formatGwei(price)} gwei.`
    } catch (error) {
      this.logger.warn(
        `Could not retrieve current gas price for diagnostics: ${describeError(
          error
        )}`
      )
      return ''
    }
  }

  private async logRevertDetails(hash: Hash): Promise<void> {
    try {
      const details = await this.chainClient.getTransaction(hash)
      this.logger.warn(
        `Reverted transaction ${details.hash}: nonce ${details.nonce}, gas ${
          details.gas
        }, block ${details.blockNumber ?? 'pending'}`
      )
    } catch (error) {
      this.logger.warn(
        `Could not retrieve transaction details for troubleshooting: ${describeError(
          error
        )}`
      )
    }
  }
}
